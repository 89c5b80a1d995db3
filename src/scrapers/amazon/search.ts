export function buildSearchPageUrl(baseUrl: string, query: string, page: number): string {
  const url = new URL('/s', baseUrl);
  url.searchParams.set('k', query.trim().replace(/\s+/g, ' '));
  url.searchParams.set('page', String(page));
  return url.toString();
}

export function resolveListingUrl(href: string, baseUrl: string): string {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return href;
  }
}
