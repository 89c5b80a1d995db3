export interface CardOptions {
  href?: string;
  price?: string;
  rating?: string;
}

export function resultCard(title: string, options: CardOptions = {}): string {
  const link = options.href
    ? `<a class="a-link-normal" href="${options.href}"><span class="a-text-normal">${title}</span></a>`
    : `<span class="a-text-normal">${title}</span>`;
  const price = options.price
    ? `<span class="a-price"><span class="a-offscreen">${options.price}</span></span>`
    : '';
  const rating = options.rating ? `<span class="a-icon-alt">${options.rating}</span>` : '';
  return `<div data-component-type="s-search-result"><h2>${link}</h2>${price}${rating}</div>`;
}

export function resultsPage(...cards: string[]): string {
  return `<html><body><div class="s-main-slot">${cards.join('\n')}</div></body></html>`;
}
