/**
 * Use case for listing items, optionally restricted to a requested range
 * Contains the slicing rules behind the paginated /items route
 */

import { IItemRepository } from '../../domain/interfaces';
import { ItemEntity } from '../../domain/entities';
import { RangePair } from '../../domain/value-objects/RangePair';
import { RangeHeaderParser } from '../../infrastructure/pagination/RangeHeaderParser';

export interface ListItemsRequest {
    range?: RangePair;
}

export interface ListItemsResponse {
    success: boolean;
    items: ItemEntity[];
    total: number;
    returnedRange?: RangePair;
    error?: string;
}

export class ListItemsUseCase {
    constructor(
        private itemRepository: IItemRepository
    ) { }

    execute(request: ListItemsRequest = {}): ListItemsResponse {
        const total = this.itemRepository.count();

        if (!request.range) {
            return {
                success: true,
                items: this.itemRepository.getAll(),
                total
            };
        }

        const start = RangeHeaderParser.toInteger(request.range[0]);
        const end = RangeHeaderParser.toInteger(request.range[1]);

        if (start === null || end === null) {
            return this.failure(total, `Range bounds must be non-negative integers, got '${RangeHeaderParser.format(request.range)}'`);
        }

        if (start > end) {
            return this.failure(total, `Range start ${start} is after end ${end}`);
        }

        if (start >= total) {
            return this.failure(total, `Range start ${start} is beyond the ${total} available items`);
        }

        const lastIndex = Math.min(end, total - 1);

        return {
            success: true,
            items: this.itemRepository.slice(start, lastIndex),
            total,
            returnedRange: [start, lastIndex]
        };
    }

    private failure(total: number, error: string): ListItemsResponse {
        return { success: false, items: [], total, error };
    }
}
