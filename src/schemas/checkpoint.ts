/**
 * Query Checkpoint Schema
 *
 * The checkpoint records which search queries have already run so that a
 * later run only issues the new ones.
 */

import { z } from 'zod';

export const QueryCheckpointSchema = z.object({
  completed_queries: z.array(z.string()),
});

export type QueryCheckpoint = z.infer<typeof QueryCheckpointSchema>;

/**
 * Ordered, append-only set of completed query strings.
 */
export class QueryLog {
  private readonly order: string[] = [];
  private readonly seen = new Set<string>();

  constructor(queries: Iterable<string> = []) {
    for (const query of queries) {
      this.add(query);
    }
  }

  /**
   * Record a query as completed. Returns false if it was already recorded.
   */
  add(query: string): boolean {
    if (this.seen.has(query)) {
      return false;
    }
    this.seen.add(query);
    this.order.push(query);
    return true;
  }

  has(query: string): boolean {
    return this.seen.has(query);
  }

  get size(): number {
    return this.order.length;
  }

  toArray(): string[] {
    return [...this.order];
  }

  toCheckpoint(): QueryCheckpoint {
    return { completed_queries: this.toArray() };
  }
}
