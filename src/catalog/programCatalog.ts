/**
 * In-memory program catalog
 *
 * Ordered, append-only collection of program records. Insertion order
 * defines the index space used by the ranker and the order of results.
 */

import type { ProgramRecord } from "@/types/catalog";

export class ProgramCatalog {
  private readonly records: ProgramRecord[];

  /**
   * @param initial - Records to start with (copied, order preserved)
   */
  constructor(initial: Iterable<ProgramRecord> = []) {
    this.records = [...initial];
  }

  /**
   * Appends a record. No validation: missing fields are tolerated
   * and handled when features are built.
   */
  add(record: ProgramRecord): void {
    this.records.push(record);
  }

  /**
   * All records in insertion order.
   */
  all(): readonly ProgramRecord[] {
    return this.records;
  }

  get size(): number {
    return this.records.length;
  }
}
