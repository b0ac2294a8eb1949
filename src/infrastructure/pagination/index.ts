export { RangeHeaderParser } from './RangeHeaderParser';
export { PaginationDirectiveExtractor } from './PaginationDirectiveExtractor';
export { ContentRangeBuilder } from './ContentRangeBuilder';
export type { PartialContentHeaders } from './ContentRangeBuilder';
