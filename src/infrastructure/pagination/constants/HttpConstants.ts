/**
 * HTTP status codes used by pagination
 */
export const HTTP_STATUS = {
  OK: 200,
  PARTIAL_CONTENT: 206,
  RANGE_NOT_SATISFIABLE: 416,
  INTERNAL_SERVER_ERROR: 500
} as const;

/**
 * Header names read and written by the pagination middleware
 */
export const HTTP_HEADERS = {
  RANGE: 'Range',
  RANGE_UNIT: 'Range-Unit',
  CONTENT_RANGE: 'Content-Range',
  ACCEPT_RANGES: 'Accept-Ranges'
} as const;

/**
 * Query parameter names used when pagination is read from parameters
 */
export const QUERY_PARAMS = {
  RANGE: 'range',
  RANGE_UNIT: 'range_unit'
} as const;

/**
 * Reported in Content-Range when the handler does not know the total
 */
export const UNKNOWN_TOTAL = '*';
