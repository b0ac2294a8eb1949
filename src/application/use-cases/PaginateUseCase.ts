/**
 * Use case wrapping a handler with Range-based pagination
 * Decides whether pagination applies, runs the handler and rewrites a
 * successful response into a 206 Partial Content reply
 */

import { IPaginationRequest, IPaginationResponse, ILogger } from '../../domain/interfaces';
import { PaginationContext } from '../../domain/entities';
import { PaginationSource, RangeDirectives } from '../../domain/value-objects/RangePair';
import { ContentRangeBuilder } from '../../infrastructure/pagination/ContentRangeBuilder';
import { PaginationDirectiveExtractor } from '../../infrastructure/pagination/PaginationDirectiveExtractor';
import { HTTP_STATUS } from '../../infrastructure/pagination/constants/HttpConstants';

export interface PaginationOptions {
    /** Skip pagination for requests that are not AJAX (default: true) */
    ajaxOnly: boolean;
    /** Where Range and Range-Unit are read from (default: 'headers') */
    mode: PaginationSource;
}

export const DEFAULT_PAGINATION_OPTIONS: PaginationOptions = {
    ajaxOnly: true,
    mode: 'headers'
};

/**
 * Handler run inside the middleware. Returns the response body.
 */
export type PaginatedHandler<TBody> = (context: PaginationContext) => TBody | Promise<TBody>;

/**
 * Handler with the request and response passed explicitly
 */
export type WrappedHandler<TBody> = (
    request: IPaginationRequest,
    response: IPaginationResponse<TBody>
) => Promise<IPaginationResponse<TBody>>;

export class PaginateUseCase {
    private readonly options: PaginationOptions;

    constructor(
        options: Partial<PaginationOptions>,
        private logger: ILogger
    ) {
        this.options = { ...DEFAULT_PAGINATION_OPTIONS, ...options };
    }

    /**
     * Wraps a handler so that every call goes through pagination
     */
    wrap<TBody>(handler: PaginatedHandler<TBody>): WrappedHandler<TBody> {
        return (request, response) => this.execute(request, response, handler);
    }

    /**
     * Runs the handler for one request. Errors thrown by the handler propagate.
     */
    async execute<TBody>(
        request: IPaginationRequest,
        response: IPaginationResponse<TBody>,
        handler: PaginatedHandler<TBody>
    ): Promise<IPaginationResponse<TBody>> {
        const directives = this.resolveDirectives(request);

        if (!directives) {
            response.setBody(await handler(new PaginationContext()));
            return response;
        }

        const context = new PaginationContext(directives.range, directives.rangeUnit);
        response.setBody(await handler(context));

        // Handler signalled an error or another status: leave it alone
        if (response.getStatus() !== HTTP_STATUS.OK) {
            this.logger.debug(`Pagination skipped: handler responded with status ${response.getStatus()}`);
            return response;
        }

        const headers = ContentRangeBuilder.build(directives.range, directives.rangeUnit, context);
        for (const [name, value] of Object.entries(headers)) {
            response.setHeader(name, value);
        }
        response.setStatus(HTTP_STATUS.PARTIAL_CONTENT);

        return response;
    }

    private resolveDirectives(request: IPaginationRequest): RangeDirectives | null {
        if (this.options.ajaxOnly && !request.isAjax()) {
            this.logger.debug('Pagination skipped: not an AJAX request');
            return null;
        }

        const directives = PaginationDirectiveExtractor.extract(request, this.options.mode);
        if (!directives) {
            this.logger.debug(`Pagination skipped: no range in ${this.options.mode}`);
        }
        return directives;
    }
}
