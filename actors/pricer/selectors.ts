// ================================================
// REQUEST SIGNATURE
// ================================================

export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

export const STATIC_REQUEST_HEADERS: Readonly<Record<string, string>> = {
  'User-Agent': BROWSER_USER_AGENT,
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
};

export const BROWSER_LAUNCH_ARGS = [
  '--no-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
];

export const BROWSER_VIEWPORT = { width: 1920, height: 1080 } as const;

// ================================================
// SELECTORS
// ================================================

// Ordered most specific first: the generic patterns also match
// sponsored and "similar items" prices further down product pages.

export const STATIC_PRICE_SELECTORS = [
  // Walmart main product
  '[data-testid="price-wrap"] span[itemprop="price"]',
  '[data-testid="price-wrap"] span.inline-flex span.primary',
  // Amazon buy box
  '#corePrice_feature_div .a-price .a-offscreen',
  '#priceblock_ourprice',
  '#priceblock_dealprice',
  // schema.org markup
  '[itemprop="price"]',
  // Walmart legacy layouts
  '[data-automation-id="price-value"]',
  '.price-characteristic',
  '.prod-PriceSection [aria-hidden="false"]',
  'span.price-group',
  // Open Graph product tags (value in the content attribute)
  'meta[property="product:price:amount"]',
  'meta[property="og:price:amount"]',
] as const;

export const RENDERED_PRICE_SELECTORS = [
  "div[data-testid='price-wrap'] span[itemprop='price']",
  "[data-automation-id='product-price']:not([data-automation-id*='sponsored'])",
  "[data-testid='price-view'] span",
  '#corePrice_feature_div .a-price .a-offscreen',
  '#apex_desktop .a-price .a-offscreen',
  '[itemprop="price"]',
  '.price-characteristic',
  ".prod-PriceSection [aria-hidden='false']",
  'span.price-group',
  '.price-display',
] as const;
