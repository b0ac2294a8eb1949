import { IItemRepository } from '../../domain/interfaces/IItemRepository';
import { ItemEntity } from '../../domain/entities/Item';

const EPOCH = Date.UTC(2024, 0, 1);
const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Fixed in-memory item collection backing the demo routes
 */
export class InMemoryItemRepository implements IItemRepository {
  private readonly items: ItemEntity[];

  constructor(items: ItemEntity[]) {
    this.items = [...items];
  }

  /**
   * Builds `count` items with ids 0..count-1, one per day from 2024-01-01
   */
  static generate(count: number): InMemoryItemRepository {
    const items = Array.from({ length: count }, (_, id): ItemEntity => ({
      id,
      name: `Item ${id}`,
      createdAt: new Date(EPOCH + id * DAY_MS).toISOString()
    }));
    return new InMemoryItemRepository(items);
  }

  count(): number {
    return this.items.length;
  }

  slice(start: number, end: number): ItemEntity[] {
    if (end < start) {
      return [];
    }
    return this.items.slice(Math.max(start, 0), end + 1);
  }

  getAll(): ItemEntity[] {
    return [...this.items];
  }
}
