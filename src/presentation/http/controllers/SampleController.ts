import { Request, Response } from 'express';
import { PaginationContext } from '../../../domain/entities/PaginationContext';
import { RangeBound } from '../../../domain/value-objects/RangePair';

export interface RangeEchoBody {
    start?: RangeBound;
    end?: RangeBound;
    unit?: string;
}

/**
 * Small routes showing how a handler reads and overrides the pagination context
 */
export class SampleController {
    /**
     * Handles GET /
     */
    index(): string {
        return 'Index ok';
    }

    /**
     * Handles GET /page, echoing the requested range
     */
    page(_req: Request, _res: Response, pagination: PaginationContext): RangeEchoBody {
        return {
            start: pagination.range?.[0],
            end: pagination.range?.[1],
            unit: pagination.rangeUnit
        };
    }

    /**
     * Handles GET /total, reporting a known total
     */
    total(_req: Request, _res: Response, pagination: PaginationContext): { total: number } {
        pagination.total = 100;
        return { total: 100 };
    }

    /**
     * Handles GET /range, replying with a different range than requested
     */
    range(_req: Request, _res: Response, pagination: PaginationContext): { start: number; end: number } {
        pagination.returnRange = [0, 100];
        return { start: 0, end: 100 };
    }
}
