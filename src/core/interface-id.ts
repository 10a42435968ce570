/**
 * interbus - Interface Identity
 *
 * Interfaces are tagged by an id hashed from a human-readable name, so the
 * id is stable across builds and compares in constant time. Each id is
 * wrapped in an InterfaceKey that also carries the static type the
 * interface resolves to.
 */

import { createHash } from 'crypto';
import { BusErrorFactory } from '../errors';
import type { InterfaceId, RefCounted } from '../types';

/**
 * Computes the id of an interface name
 */
export function calcInterfaceId(name: string): InterfaceId {
  const hex = createHash('sha256').update(name, 'utf8').digest('hex').slice(0, 16);
  if (!isInterfaceId(hex)) {
    throw BusErrorFactory.internal(`Unexpected digest for interface "${name}"`);
  }
  return hex;
}

/**
 * Checks the shape of an interface id
 */
export function isInterfaceId(value: unknown): value is InterfaceId {
  return typeof value === 'string' && /^[0-9a-f]{16}$/.test(value);
}

/**
 * Tests if two ids are equal
 */
export function equalIds(a: InterfaceId, b: InterfaceId): boolean {
  return a === b;
}

const definedIds = new Map<InterfaceId, string>();

/**
 * Typed handle of an interface identity.
 *
 * A key also acts as the capability table for its interface: objects bind
 * themselves (or a facet of themselves) to the key, and a query resolves the
 * binding with its static type intact.
 *
 * Bindings belong to the key instance, not to the id. Components of one
 * process must share a single loaded copy of this package and import the
 * key from the module that defined it; a key from another copy of the
 * package never resolves, even when its id is equal.
 */
export class InterfaceKey<T extends RefCounted> {
  private readonly bindings = new WeakMap<RefCounted, T>();

  private constructor(
    readonly name: string,
    readonly id: InterfaceId
  ) {}

  /**
   * Defines a new interface identity. A name (or hash) may only be defined
   * once per process.
   */
  static define<T extends RefCounted>(name: string): InterfaceKey<T> {
    if (typeof name !== 'string' || name.length === 0) {
      throw BusErrorFactory.badRequest('defineInterface', 'Interface name must be a non-empty string', {
        name,
      });
    }

    const id = calcInterfaceId(name);
    const existing = definedIds.get(id);
    if (existing !== undefined) {
      throw BusErrorFactory.duplicateInterface('defineInterface', name, { id, existing });
    }
    definedIds.set(id, name);

    return new InterfaceKey<T>(name, id);
  }

  /**
   * Binds the typed view of `owner` for this interface
   */
  bind(owner: RefCounted, target: T): void {
    this.bindings.set(owner, target);
  }

  /**
   * Resolves the typed view bound by `owner`, if any
   */
  resolve(owner: RefCounted): T | undefined {
    return this.bindings.get(owner);
  }

  matches(id: InterfaceId): boolean {
    return equalIds(this.id, id);
  }

  toString(): string {
    return `${this.name}#${this.id}`;
  }
}

/**
 * Defines a new interface identity
 * @example
 *   interface Greeter extends IInterfaceEx { greet(): string }
 *   const IGreeter = defineInterface<Greeter>('acme.greeter')
 */
export function defineInterface<T extends RefCounted>(name: string): InterfaceKey<T> {
  return InterfaceKey.define<T>(name);
}
