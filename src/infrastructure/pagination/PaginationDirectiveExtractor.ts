import { IPaginationRequest } from '../../domain/interfaces/IPaginationRequest';
import { PaginationSource, RangeDirectives } from '../../domain/value-objects/RangePair';
import { HTTP_HEADERS, QUERY_PARAMS } from './constants/HttpConstants';
import { RangeHeaderParser } from './RangeHeaderParser';

/**
 * Reads Range / Range-Unit directives from a request
 */
export class PaginationDirectiveExtractor {
  /**
   * Returns the parsed directives, or null when the range or the unit is missing
   */
  static extract(request: IPaginationRequest, source: PaginationSource): RangeDirectives | null {
    const range = this.read(request, source, HTTP_HEADERS.RANGE, QUERY_PARAMS.RANGE);
    const rangeUnit = this.read(request, source, HTTP_HEADERS.RANGE_UNIT, QUERY_PARAMS.RANGE_UNIT);

    if (range === undefined || rangeUnit === undefined) {
      return null;
    }

    return { range: RangeHeaderParser.parse(range), rangeUnit };
  }

  private static read(
    request: IPaginationRequest,
    source: PaginationSource,
    header: string,
    param: string
  ): string | undefined {
    switch (source) {
      case 'headers':
        return request.header(header);
      case 'parameters':
        return request.param(param);
      case 'both':
        return request.header(header) ?? request.param(param);
    }
  }
}
