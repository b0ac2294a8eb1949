import { RangePair } from '../value-objects/RangePair';

/**
 * Request-scoped pagination state shared between the middleware and a handler.
 *
 * `range` and `rangeUnit` are filled in before the handler runs and stay
 * undefined when pagination does not apply to the request. The handler may set
 * any of the override fields to shape the partial-content headers; an override
 * left undefined (or null) falls back to the inbound value.
 */
export class PaginationContext {
  /** Total number of units in the resource, reported as `*` when absent */
  total?: number | string | null;

  /** Range actually returned, defaults to the requested range */
  returnRange?: RangePair | null;

  /** Unit of the returned range, defaults to the requested unit */
  returnRangeUnit?: string | null;

  /** Value of Accept-Ranges, defaults to the requested unit */
  acceptRanges?: string | null;

  constructor(
    public readonly range?: RangePair,
    public readonly rangeUnit?: string
  ) { }

  /**
   * True when the request carried both a range and a unit
   */
  get isActive(): boolean {
    return this.range !== undefined && this.rangeUnit !== undefined;
  }
}
