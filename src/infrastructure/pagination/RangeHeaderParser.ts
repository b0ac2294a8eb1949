import { RangeBound, RangePair } from '../../domain/value-objects/RangePair';

/**
 * Parses and formats pagination Range values ("<start>-<end>")
 */
export class RangeHeaderParser {
  private static readonly RANGE_SEPARATOR = '-';
  private static readonly CANONICAL_INTEGER = /^(0|[1-9]\d*)$/;

  /**
   * Splits a Range value into a [start, end] pair.
   *
   * The value is split on every separator and the first two tokens are kept,
   * so negative or multi-segment values come out split in the wrong place
   * ("-5--1" gives ["", 5]). A missing token becomes the empty string.
   */
  static parse(range: string): RangePair {
    const parts = range.split(this.RANGE_SEPARATOR);
    return [this.toBound(parts[0] ?? ''), this.toBound(parts[1] ?? '')];
  }

  /**
   * Formats a pair as "<start>-<end>"
   */
  static format(range: RangePair): string {
    return `${range[0]}${this.RANGE_SEPARATOR}${range[1]}`;
  }

  /**
   * Returns the bound as an integer, or null when it is not one
   */
  static toInteger(bound: RangeBound): number | null {
    if (typeof bound === 'number') {
      return Number.isSafeInteger(bound) ? bound : null;
    }
    return this.CANONICAL_INTEGER.test(bound) && Number.isSafeInteger(Number(bound)) ? Number(bound) : null;
  }

  private static toBound(token: string): RangeBound {
    // Only canonical integers become numbers, so formatting gives back the same text
    if (!this.CANONICAL_INTEGER.test(token)) {
      return token;
    }
    const value = Number(token);
    return Number.isSafeInteger(value) ? value : token;
  }
}
