/**
 * Mutable response the pagination middleware writes into
 */
export interface IPaginationResponse<TBody> {
  getStatus(): number;
  setStatus(status: number): void;
  setHeader(name: string, value: string): void;
  getHeader(name: string): string | undefined;
  getBody(): TBody | undefined;
  setBody(body: TBody): void;
}
