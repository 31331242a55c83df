import axios from 'axios';

class Utils {
  /**
   * First four digits of a date string ("2011-01-24T08:00:00Z", "1724", "+1724-00-00T00:00:00Z").
   * Returns null for negative or malformed dates.
   */
  public extractYear(value: string | null | undefined): string | null {
    if (!value) return null;
    const match = value.trim().match(/^\+?(\d{4})/);
    return match ? match[1] : null;
  }

  public isYear(value: string): boolean {
    return /^\d{4}$/.test(value);
  }

  /**
   * Name parts long enough to be matched against free text ("George Frideric Handel" -> all three).
   */
  public significantNameParts(name: string, minLength: number = 4): string[] {
    return name
      .toLowerCase()
      .split(/\s+/)
      .map((part) => part.replace(/[.,]/g, ''))
      .filter((part) => part.length >= minLength);
  }

  /**
   * Words of a query worth scoring on, lower-cased, punctuation removed
   */
  public keywords(text: string, minLength: number = 3): string[] {
    return text
      .toLowerCase()
      .replace(/[^\p{L}\p{N}\s]/gu, ' ')
      .split(/\s+/)
      .filter((word) => word.length >= minLength);
  }

  public stripHtml(html: string): string {
    return html
      .replace(/<[^>]+>/g, '')
      .replace(/&quot;/g, '"')
      .replace(/&amp;/g, '&')
      .replace(/&#39;/g, "'")
      .replace(/\s+/g, ' ')
      .trim();
  }

  public escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  }

  public describeError(error: unknown): string {
    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      return status ? `HTTP ${status}: ${error.message}` : error.message;
    }
    if (error instanceof Error) {
      return error.message;
    }
    return String(error);
  }
}

export default Utils;
