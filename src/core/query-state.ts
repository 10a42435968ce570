/**
 * interbus - Query State
 *
 * Visited set of a single interface query. Bus graphs may contain cycles
 * (siblings, re-entrant buses), so every object marks itself before it
 * delegates and nobody is asked twice during one traversal.
 */

import type { RefCounted } from '../types';

export class QueryState {
  private readonly searched = new Set<number>();

  addSearched(obj: RefCounted): void {
    this.searched.add(obj.objectId);
  }

  isSearched(obj: RefCounted): boolean {
    return this.searched.has(obj.objectId);
  }

  /**
   * Number of objects visited so far
   */
  get size(): number {
    return this.searched.size;
  }
}
