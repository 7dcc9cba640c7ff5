/**
 * PriceParser utility
 *
 * Pattern: utility class (static methods)
 * Handles marketplace price text such as "$1,299.99", "US $45.00",
 * "1 299,50" and plain numbers from structured data.
 */

export class PriceParser {
  /**
   * First amount found in free text, or null
   *
   * "US $1,299.99" -> 1299.99
   * "Free" -> null (callers decide what free means for their field)
   */
  static parse(text: string | number | null | undefined): number | null {
    if (typeof text === "number") {
      return Number.isFinite(text) && text >= 0 ? text : null;
    }
    if (!text || typeof text !== "string") {
      return null;
    }

    const match = text.match(/\d[\d\s,.]*/);
    if (!match) {
      return null;
    }

    const value = PriceParser.normalizeNumber(match[0].trim());
    return value !== null && value >= 0 ? value : null;
  }

  /**
   * Shipping text: "Free shipping" -> 0, otherwise the first amount
   */
  static parseShipping(text: string | null | undefined): number | null {
    if (!text) return null;
    if (/\bfree\b/i.test(text)) return 0;
    return PriceParser.parse(text);
  }

  /**
   * Decide which of "," and "." is the decimal separator.
   * A separator followed by exactly two trailing digits is decimal.
   */
  private static normalizeNumber(raw: string): number | null {
    const compact = raw.replace(/\s/g, "").replace(/[.,]$/, "");
    if (!compact) return null;

    const lastComma = compact.lastIndexOf(",");
    const lastDot = compact.lastIndexOf(".");
    const decimalIndex = Math.max(lastComma, lastDot);

    let normalized: string;
    if (decimalIndex === -1) {
      normalized = compact;
    } else {
      const fraction = compact.slice(decimalIndex + 1);
      const isDecimal = fraction.length > 0 && fraction.length <= 2;
      normalized = isDecimal
        ? `${compact.slice(0, decimalIndex).replace(/[.,]/g, "")}.${fraction}`
        : compact.replace(/[.,]/g, "");
    }

    const value = Number(normalized);
    return Number.isFinite(value) ? value : null;
  }
}
