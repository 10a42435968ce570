/**
 * interbus - Smart Handle
 *
 * AutoRef owns one reference of a counted object and releases it on
 * clear(). It also performs interface-casting construction and assignment:
 * the reference taken by a query is adopted instead of being taken twice.
 */

import { BusErrorFactory, ErrorMessages } from '../errors';
import { InterfaceKey } from './interface-id';
import { IInterface, QueryCode, RefCounted } from '../types';

export type QuerySource = IInterface | AutoRef<IInterface> | null | undefined;

function sourceOf(source: QuerySource): IInterface | null {
  if (source instanceof AutoRef) {
    return source.get();
  }
  return source ?? null;
}

export class AutoRef<T extends RefCounted> {
  private target: T | null;

  /**
   * @param target Object to hold
   * @param refIt Take a new reference (false adopts one already taken)
   */
  constructor(target: T | null = null, refIt: boolean = true) {
    this.target = target;
    if (refIt && target) {
      target.ref();
    }
  }

  /**
   * Takes over a reference the caller already owns, such as one returned
   * by queryInterface()
   */
  static adopt<T extends RefCounted>(target: T | null): AutoRef<T> {
    return new AutoRef(target, false);
  }

  /**
   * Interface-casting construction: holds the result of querying `source`
   * for `key`, or nothing when the interface cannot be resolved
   */
  static query<T extends RefCounted>(source: QuerySource, key: InterfaceKey<T>): AutoRef<T> {
    const from = sourceOf(source);
    if (!from) {
      return new AutoRef<T>();
    }

    const result = from.queryInterface(key);
    return result.code === QueryCode.OK ? AutoRef.adopt(result.target) : new AutoRef<T>();
  }

  /**
   * Holds `target` while `fn` runs and releases it on every exit path
   */
  static using<T extends RefCounted, R>(target: T, fn: (handle: AutoRef<T>) => R): R {
    const handle = new AutoRef(target);
    try {
      return fn(handle);
    } finally {
      handle.clear();
    }
  }

  get(): T | null {
    return this.target;
  }

  valid(): boolean {
    return this.target !== null;
  }

  /**
   * Returns the held object, throwing when the handle is empty
   */
  require(): T {
    if (!this.target) {
      throw BusErrorFactory.badRequest('AutoRef.require', ErrorMessages.EMPTY_HANDLE);
    }
    return this.target;
  }

  /**
   * Reference count of the held object, 0 when empty
   */
  count(): number {
    return this.target?.count() ?? 0;
  }

  /**
   * Holds another object (ref'd), releasing the current one
   */
  reset(target: T | null = null): void {
    if (this.sameAs(target)) {
      return;
    }

    target?.ref();
    const previous = this.target;
    this.target = target;
    previous?.unref();
  }

  /**
   * Copy-assignment from another handle
   */
  assign(other: AutoRef<T>): void {
    this.reset(other.get());
  }

  /**
   * Interface-casting assignment
   */
  assignQuery(source: QuerySource, key: InterfaceKey<T>): void {
    const queried = AutoRef.query(source, key);
    if (this.sameAs(queried.get())) {
      queried.clear();
      return;
    }

    const previous = this.target;
    this.target = queried.detach();
    previous?.unref();
  }

  /**
   * Queries the held interface for another one
   */
  as<U extends RefCounted>(this: AutoRef<IInterface>, key: InterfaceKey<U>): AutoRef<U> {
    return AutoRef.query(this, key);
  }

  /**
   * Returns the held object with a new reference for the caller to own
   */
  getRef(): T | null {
    this.target?.ref();
    return this.target;
  }

  /**
   * Gives up ownership without releasing; the caller now owns the reference
   */
  detach(): T | null {
    const target = this.target;
    this.target = null;
    return target;
  }

  /**
   * Releases the held reference
   */
  clear(): void {
    const target = this.detach();
    target?.unref();
  }

  /**
   * True when both handles refer to the same underlying object
   */
  equals(other: AutoRef<RefCounted> | RefCounted | null): boolean {
    const target = other instanceof AutoRef ? other.get() : other;
    return this.sameAs(target);
  }

  private sameAs(other: RefCounted | null): boolean {
    if (this.target === null || other === null) {
      return this.target === other;
    }
    return this.target.objectId === other.objectId;
  }
}
