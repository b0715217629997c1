// Currency glyphs and the decimal literal matcher
const CURRENCY_GLYPHS = /[$€£¥₩₹]/g;
const DECIMAL_LITERAL = /\d+\.\d+|\d+/;

export class PricerUtils {
  /**
   * Parse the first decimal number out of a price text.
   * Comma thousands-separators and currency glyphs are ignored.
   */
  static parsePrice(priceStr: string | null | undefined): number | null {
    if (!priceStr) {
      return null;
    }

    const cleaned = priceStr.replace(/,/g, '').replace(CURRENCY_GLYPHS, '');
    const match = DECIMAL_LITERAL.exec(cleaned);
    if (!match) {
      return null;
    }

    const price = Number.parseFloat(match[0]);
    return Number.isNaN(price) ? null : price;
  }

  /**
   * Parse a product URL, requiring both a scheme and a host
   */
  static parseProductUrl(url: string): URL | null {
    let parsed: URL;
    try {
      parsed = new URL(url.trim());
    } catch {
      return null;
    }

    if (!parsed.protocol || !parsed.host) {
      return null;
    }
    return parsed;
  }

  static defaultItemName(url: URL): string {
    return `Item from ${url.host}`;
  }

  static formatPrice(price: number | null): string {
    return price === null ? 'n/a' : `$${price.toFixed(2)}`;
  }

  /**
   * Resolve a Location header against the URL that produced it
   */
  static resolveLocation(location: string, baseUrl: string): string {
    try {
      return new URL(location, baseUrl).toString();
    } catch {
      return location;
    }
  }
}
