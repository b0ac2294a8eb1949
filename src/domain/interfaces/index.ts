/**
 * Domain interfaces (ports) - exports all interfaces
 */

export type { IPaginationRequest } from './IPaginationRequest';
export type { IPaginationResponse } from './IPaginationResponse';
export type { IItemRepository } from './IItemRepository';
export type { ILogger } from './ILogger';
