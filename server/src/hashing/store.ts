/**
 * Result Store
 *
 * Append-only map from hash id to encoded digest, plus the counter that
 * issues ids. An id in [1, counter] without a value is pending; anything
 * outside that range was never issued.
 *
 * Every method is synchronous, so each call runs to completion on the
 * event loop before any other request or timer callback touches the
 * store. The counter bump in `reserve` and the range check in `get`
 * can never interleave.
 */

import type { LookupResult } from "./types.js";

export class ResultStore {
  private counter = 0;
  private readonly values = new Map<number, string>();

  /**
   * Issue the next id. The id is valid (and pending) from this point on.
   */
  reserve(): number {
    this.counter += 1;
    return this.counter;
  }

  /**
   * Record the digest for a reserved id. Returns false, leaving the store
   * untouched, when the id was never issued or already has a value.
   */
  complete(id: number, value: string): boolean {
    if (!this.isIssued(id) || this.values.has(id)) {
      return false;
    }
    this.values.set(id, value);
    return true;
  }

  get(id: number): LookupResult {
    if (!this.isIssued(id)) {
      return { status: "out_of_range" };
    }
    const value = this.values.get(id);
    return value === undefined ? { status: "pending" } : { status: "found", value };
  }

  /** Highest id issued so far (0 before the first reservation) */
  get lastIssued(): number {
    return this.counter;
  }

  /** Number of completed entries */
  get completedCount(): number {
    return this.values.size;
  }

  private isIssued(id: number): boolean {
    return Number.isInteger(id) && id >= 1 && id <= this.counter;
  }
}
