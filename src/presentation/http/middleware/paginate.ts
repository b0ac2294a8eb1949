/**
 * Express binding of the Range pagination middleware
 *
 * Usage:
 *   const paginate = createPaginate({ ajaxOnly: true, mode: 'headers' }, logger);
 *
 *   router.get('/items', paginate((req, res, pagination) => {
 *     pagination.total = 500;
 *     return items;
 *   }));
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { PaginationContext } from '../../../domain/entities/PaginationContext';
import { ILogger } from '../../../domain/interfaces/ILogger';
import { PaginateUseCase, PaginationOptions } from '../../../application/use-cases/PaginateUseCase';
import { HTTP_HEADERS } from '../../../infrastructure/pagination/constants/HttpConstants';
import { ExpressPaginationRequest } from '../adapters/ExpressPaginationRequest';
import { ExpressPaginationResponse } from '../adapters/ExpressPaginationResponse';

/**
 * Route handler run under pagination. The returned value becomes the response body.
 */
export type PaginatedRouteHandler<TBody = unknown> = (
    req: Request,
    res: Response,
    pagination: PaginationContext
) => TBody | Promise<TBody>;

export type Paginate = <TBody>(
    handler: PaginatedRouteHandler<TBody>,
    options?: Partial<PaginationOptions>
) => RequestHandler;

/**
 * Creates a `paginate` wrapper bound to default options and a logger.
 * Options passed for a single route override the defaults.
 */
export function createPaginate(defaults: Partial<PaginationOptions>, logger: ILogger): Paginate {
    return <TBody>(handler: PaginatedRouteHandler<TBody>, options: Partial<PaginationOptions> = {}) => {
        const useCase = new PaginateUseCase({ ...defaults, ...options }, logger);

        return (req: Request, res: Response, next: NextFunction): void => {
            const response = new ExpressPaginationResponse<TBody>(res);

            useCase
                .execute(new ExpressPaginationRequest(req), response, (pagination) => {
                    res.locals.pagination = pagination;
                    return handler(req, res, pagination);
                })
                .then(() => {
                    const contentRange = response.getHeader(HTTP_HEADERS.CONTENT_RANGE);
                    logger.debug(
                        contentRange
                            ? `[${req.method} ${req.path}] ${response.getStatus()} Content-Range: ${contentRange}`
                            : `[${req.method} ${req.path}] ${response.getStatus()} not paginated`
                    );
                    response.send();
                })
                .catch(next);
        };
    };
}
