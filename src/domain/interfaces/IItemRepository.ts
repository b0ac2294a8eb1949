/**
 * Repository interface for the demo item collection
 */

import { ItemEntity } from '../entities/Item';

export interface IItemRepository {
  /**
   * Number of items in the collection
   */
  count(): number;

  /**
   * Returns items from start to end, both inclusive, clamped to the collection
   */
  slice(start: number, end: number): ItemEntity[];

  /**
   * Returns every item
   */
  getAll(): ItemEntity[];
}
