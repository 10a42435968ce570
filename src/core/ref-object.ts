/**
 * interbus - Reference-Counted Object
 *
 * Base class of every object in the model. Lifetime is driven by an explicit
 * counter: the object is destroyed the moment unref() takes the count from
 * one to zero. Destruction runs beforeDestroy() then onDestroy(), each
 * exactly once.
 */

import { BusErrorFactory } from '../errors';
import { safeExecute } from './utils';
import { RefApi, RefCounted, RefMonitor, RefObjectOptions } from '../types';

let nextObjectId = 1;

/**
 * Allocates the next stable object id
 */
export function allocateObjectId(): number {
  return nextObjectId++;
}

export class RefObject implements RefCounted {
  readonly objectId: number;

  private refCount = 0;
  private destroyed = false;
  private destroying = false;
  private readonly monitor?: RefMonitor;

  constructor(options: RefObjectOptions = {}) {
    this.objectId = allocateObjectId();
    this.monitor = options.monitor;
  }

  ref(): void {
    this.throwIfDestroyed('ref');
    this.notify(RefApi.REF);
    this.refCount++;
  }

  unref(): void {
    this.throwIfDestroyed('unref');
    this.notify(RefApi.UNREF);
    if (this.refCount === 0) {
      throw BusErrorFactory.refUnderflow('unref()', { objectId: this.objectId });
    }

    this.refCount--;
    if (this.refCount === 0 && !this.destroying) {
      this.destroying = true;
      try {
        // still alive here: teardown may query through this object
        this.beforeDestroy();
      } finally {
        this.destroyed = true;
        this.onDestroy();
      }
    }
  }

  unrefNoDelete(): void {
    this.throwIfDestroyed('unrefNoDelete');
    this.notify(RefApi.UNREF_NODELETE);
    if (this.refCount === 0) {
      throw BusErrorFactory.refUnderflow('unrefNoDelete()', { objectId: this.objectId });
    }
    this.refCount--;
  }

  count(): number {
    return this.refCount;
  }

  isDestroyed(): boolean {
    return this.destroyed;
  }

  /**
   * Called once when the last reference is released, while the object can
   * still be queried. A ref/unref pair taken during this hook does not
   * destroy the object a second time.
   */
  protected beforeDestroy(): void {}

  /**
   * Called once after the object has been marked destroyed
   */
  protected onDestroy(): void {}

  protected throwIfDestroyed(op: string): void {
    if (this.destroyed) {
      throw BusErrorFactory.destroyed(op, { objectId: this.objectId });
    }
  }

  private notify(api: RefApi): void {
    const monitor = this.monitor;
    if (!monitor) {
      return;
    }
    safeExecute(() => monitor(this, this.refCount, api), `ref monitor (${api})`);
  }
}
