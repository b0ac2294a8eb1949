import express, { Express } from 'express';
import config from '../../config';
import { ILogger } from '../../domain/interfaces';
import { IItemRepository } from '../../domain/interfaces/IItemRepository';
import { ConsoleLogger } from '../../infrastructure/logging/ConsoleLogger';
import { InMemoryItemRepository } from '../../infrastructure/items/InMemoryItemRepository';
import { ListItemsUseCase } from '../../application/use-cases/ListItemsUseCase';
import { PaginationOptions } from '../../application/use-cases/PaginateUseCase';
import { ItemController } from './controllers/ItemController';
import { SampleController } from './controllers/SampleController';
import { HttpErrorHandler } from './middleware/HttpErrorHandler';
import { createPaginate } from './middleware/paginate';
import { createItemRoutes } from './routes/item.routes';

export interface AppDependencies {
    itemRepository?: IItemRepository;
    logger?: ILogger;
    pagination?: Partial<PaginationOptions>;
}

/**
 * Creates and configures Express application
 * Can be used both for production server and testing
 */
export function createApp(dependencies: AppDependencies = {}): Express {
    // Initialize dependencies (allow injection for testing)
    const appLogger = dependencies.logger ?? new ConsoleLogger(config.LOG_LEVEL);
    const repo = dependencies.itemRepository ?? InMemoryItemRepository.generate(config.DEMO_ITEM_COUNT);
    const paginate = createPaginate(
        {
            ajaxOnly: config.PAGINATE_AJAX_ONLY,
            mode: config.PAGINATE_MODE,
            ...dependencies.pagination
        },
        appLogger
    );

    // Initialize use cases
    const listItemsUseCase = new ListItemsUseCase(repo);

    // Initialize controllers
    const itemController = new ItemController(listItemsUseCase);
    const sampleController = new SampleController();

    // Initialize Express app
    const app: Express = express();

    // Setup routes
    app.use('/', createItemRoutes(paginate, itemController, sampleController));

    // Errors thrown by handlers end up here
    app.use(HttpErrorHandler.middleware(appLogger));

    return app;
}
