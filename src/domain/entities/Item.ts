/**
 * Item served by the demo collection
 */
export interface ItemEntity {
  id: number;
  name: string;
  createdAt: string;
}
