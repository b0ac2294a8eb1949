export { PaginationContext } from './PaginationContext';
export type { ItemEntity } from './Item';
