import type { Response } from 'express';
import { IPaginationResponse } from '../../../domain/interfaces/IPaginationResponse';

/**
 * Exposes an Express response through the pagination response port.
 * The body is held until `send()` so headers can still change after the handler ran.
 * Once the handler has sent the response itself, status and header writes are ignored.
 */
export class ExpressPaginationResponse<TBody> implements IPaginationResponse<TBody> {
    private body: TBody | undefined;

    constructor(private readonly res: Response) { }

    getStatus(): number {
        return this.res.statusCode;
    }

    setStatus(status: number): void {
        if (!this.res.headersSent) {
            this.res.status(status);
        }
    }

    setHeader(name: string, value: string): void {
        if (!this.res.headersSent) {
            this.res.set(name, value);
        }
    }

    getHeader(name: string): string | undefined {
        const value = this.res.get(name);
        return typeof value === 'string' ? value : undefined;
    }

    getBody(): TBody | undefined {
        return this.body;
    }

    setBody(body: TBody): void {
        this.body = body;
    }

    /**
     * Writes the held body, unless the handler already answered on its own
     */
    send(): void {
        if (this.res.headersSent) {
            return;
        }
        // res.send(number) would be taken as a status code
        if (typeof this.body === 'number') {
            this.res.json(this.body);
            return;
        }
        this.res.send(this.body);
    }
}
