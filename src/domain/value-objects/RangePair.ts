/**
 * One end of a requested range.
 * Canonical non-negative integers are carried as numbers, anything else verbatim.
 */
export type RangeBound = number | string;

/**
 * Ordered [start, end] pair taken from a Range value
 */
export type RangePair = readonly [start: RangeBound, end: RangeBound];

/**
 * Where pagination directives are read from.
 * In 'both', headers are preferred and query parameters are the fallback.
 */
export type PaginationSource = 'headers' | 'parameters' | 'both';

/**
 * Pagination directives found on a request
 */
export interface RangeDirectives {
  range: RangePair;
  rangeUnit: string;
}
