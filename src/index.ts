/**
 * HTTP Range-based pagination for Express routes
 */

export { createPaginate } from './presentation/http/middleware/paginate';
export type { Paginate, PaginatedRouteHandler } from './presentation/http/middleware/paginate';
export { ExpressPaginationRequest, ExpressPaginationResponse } from './presentation/http/adapters';
export { PaginateUseCase, DEFAULT_PAGINATION_OPTIONS } from './application/use-cases/PaginateUseCase';
export type { PaginationOptions, PaginatedHandler, WrappedHandler } from './application/use-cases/PaginateUseCase';
export { PaginationContext } from './domain/entities/PaginationContext';
export type { IPaginationRequest, IPaginationResponse, ILogger } from './domain/interfaces';
export type { RangeBound, RangePair, PaginationSource, RangeDirectives } from './domain/value-objects/RangePair';
export { RangeHeaderParser, PaginationDirectiveExtractor, ContentRangeBuilder } from './infrastructure/pagination';
export type { PartialContentHeaders } from './infrastructure/pagination';
export { ConsoleLogger } from './infrastructure/logging/ConsoleLogger';
