import { PaginationContext } from '../../domain/entities/PaginationContext';
import { RangePair } from '../../domain/value-objects/RangePair';
import { HTTP_HEADERS, UNKNOWN_TOTAL } from './constants/HttpConstants';
import { RangeHeaderParser } from './RangeHeaderParser';

/**
 * Headers of a partial-content reply
 */
export type PartialContentHeaders = {
  [HTTP_HEADERS.CONTENT_RANGE]: string;
  [HTTP_HEADERS.RANGE_UNIT]: string;
  [HTTP_HEADERS.ACCEPT_RANGES]: string;
};

/**
 * Resolves the partial-content headers from a pagination context
 */
export class ContentRangeBuilder {
  /**
   * Builds the headers, falling back to the inbound range and unit for every
   * override the handler left unset
   */
  static build(range: RangePair, rangeUnit: string, context: PaginationContext): PartialContentHeaders {
    const total = context.total ?? UNKNOWN_TOTAL;
    const returnedRange = context.returnRange ?? range;
    const returnedRangeUnit = context.returnRangeUnit ?? rangeUnit;
    const acceptRanges = context.acceptRanges ?? rangeUnit;

    return {
      [HTTP_HEADERS.CONTENT_RANGE]: `${RangeHeaderParser.format(returnedRange)}/${total}`,
      [HTTP_HEADERS.RANGE_UNIT]: returnedRangeUnit,
      [HTTP_HEADERS.ACCEPT_RANGES]: acceptRanges
    };
  }
}
