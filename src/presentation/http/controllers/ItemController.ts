import { Request, Response } from 'express';
import { ListItemsUseCase } from '../../../application/use-cases/ListItemsUseCase';
import { PaginationContext } from '../../../domain/entities/PaginationContext';
import { ItemEntity } from '../../../domain/entities/Item';
import { HTTP_STATUS } from '../../../infrastructure/pagination/constants/HttpConstants';

export type ItemListBody = ItemEntity[] | { error: string };

/**
 * Controller for the paginated item collection
 */
export class ItemController {
    constructor(
        private listItemsUseCase: ListItemsUseCase
    ) { }

    /**
     * Handles GET /items, run under the pagination middleware
     */
    list(_req: Request, res: Response, pagination: PaginationContext): ItemListBody {
        const result = this.listItemsUseCase.execute({ range: pagination.range });

        if (!result.success) {
            res.status(HTTP_STATUS.RANGE_NOT_SATISFIABLE);
            return { error: result.error ?? 'Requested range not satisfiable' };
        }

        pagination.total = result.total;
        if (result.returnedRange) {
            pagination.returnRange = result.returnedRange;
        }

        return result.items;
    }
}
