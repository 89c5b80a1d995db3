export interface RawCandidate {
  title: string;
  priceText: string | null;
  ratingText: string | null;
  url: string | null;
  sourcePage: number;
}

export interface Product {
  title: string;
  price: number | null;
  rating: number | null;
  url: string;
  platform: string;
  scrapedAt: string; // ISO-8601, UTC
}

export interface QueryResult {
  query: string;
  products: Product[];
  createdAt: Date;
  cached: boolean;
}

export interface SearchOptions {
  limit?: number;
  minRating?: number;
  forceRefresh?: boolean;
}

export type Clock = () => Date;
