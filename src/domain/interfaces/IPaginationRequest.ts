/**
 * Read-only view of an incoming request, as needed by the pagination middleware.
 * Keeps the core independent of the host framework.
 */
export interface IPaginationRequest {
  /**
   * Whether the request was sent by in-page script (X-Requested-With: XMLHttpRequest)
   */
  isAjax(): boolean;

  /**
   * Returns a request header by case-insensitive name
   */
  header(name: string): string | undefined;

  /**
   * Returns a query parameter by name
   */
  param(name: string): string | undefined;
}
