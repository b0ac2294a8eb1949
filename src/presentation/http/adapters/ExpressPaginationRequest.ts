import type { Request } from 'express';
import { IPaginationRequest } from '../../../domain/interfaces/IPaginationRequest';

/**
 * Exposes an Express request through the pagination request port
 */
export class ExpressPaginationRequest implements IPaginationRequest {
    constructor(private readonly req: Request) { }

    isAjax(): boolean {
        return this.req.xhr;
    }

    header(name: string): string | undefined {
        return this.req.get(name);
    }

    /**
     * Repeated parameters resolve to their first value; nested objects are ignored
     */
    param(name: string): string | undefined {
        const value = this.req.query[name];
        if (typeof value === 'string') {
            return value;
        }
        if (Array.isArray(value)) {
            const first = value[0];
            return typeof first === 'string' ? first : undefined;
        }
        return undefined;
    }
}
