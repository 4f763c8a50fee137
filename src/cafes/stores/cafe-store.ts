import type { Cafe, NewCafe } from '../cafe.types';

/**
 * Storage contract for cafe records, used as the injection token.
 *
 * Implementations reject with `PersistenceError` when the table is
 * unavailable. Records come back ordered by id, and `findByName` picks the
 * lowest id when a name was added more than once.
 */
export abstract class CafeStore {
  abstract add(record: NewCafe): Promise<Cafe>;

  abstract listAll(): Promise<Cafe[]>;

  abstract findByName(name: string): Promise<Cafe | null>;
}
