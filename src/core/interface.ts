/**
 * interbus - Interface Implementation
 *
 * An InterfaceObject is a reference-counted object holding a capability
 * table: the ordered list of identities it answers to. Casting is a table
 * lookup; every typed view returned by a query shares the object's count.
 */

import { BusErrorFactory, ErrorMessages } from '../errors';
import { RefObject } from './ref-object';
import { InterfaceKey } from './interface-id';
import {
  IInterface,
  QueryCode,
  QueryResult,
  RefCounted,
  RefObjectOptions,
} from '../types';

export const NOT_RESOLVED: QueryResult<never> = { code: QueryCode.NOT_RESOLVED };

/**
 * Throws when a query is issued without a key
 */
export function requireKey<T extends RefCounted>(
  key: InterfaceKey<T> | null | undefined,
  op: string
): asserts key is InterfaceKey<T> {
  if (!(key instanceof InterfaceKey)) {
    throw BusErrorFactory.badRequest(op, ErrorMessages.MISSING_ARGUMENT, { argument: 'key' });
  }
}

/**
 * Gives back the reference taken by a successful query and returns its
 * target. The object is never destroyed here, even when that was the last
 * reference visible to the caller.
 */
export function balanceQuery<T extends RefCounted>(result: QueryResult<T>): T | null {
  if (result.code !== QueryCode.OK) {
    return null;
  }
  result.target.unrefNoDelete();
  return result.target;
}

/**
 * Typed lookup over any interface, leaving its count unchanged
 */
export function intfCast<T extends RefCounted>(from: IInterface, key: InterfaceKey<T>): T | null {
  return balanceQuery(from.queryInterface(key));
}

/**
 * Implements IInterface.
 *
 * @example
 *   interface Greeter extends IInterface { greet(): string }
 *   const IGreeter = defineInterface<Greeter>('acme.greeter')
 *
 *   class GreeterImpl extends InterfaceObject implements Greeter {
 *     constructor() {
 *       super()
 *       this.provide(IGreeter, this)
 *     }
 *     greet() { return 'hello' }
 *   }
 */
export class InterfaceObject extends RefObject implements IInterface {
  private readonly capabilities: InterfaceKey<RefCounted>[] = [];

  constructor(options: RefObjectOptions = {}) {
    super(options);
    this.provide(IInterface, this);
  }

  queryInterface<T extends RefCounted>(key: InterfaceKey<T>): QueryResult<T> {
    requireKey(key, 'queryInterface');
    this.throwIfDestroyed('queryInterface');
    return this.matchCapability(key);
  }

  supports<T extends RefCounted>(key: InterfaceKey<T>): boolean {
    return balanceQuery(this.queryInterface(key)) !== null;
  }

  cast<T extends RefCounted>(key: InterfaceKey<T>): T | null {
    return balanceQuery(this.queryInterface(key));
  }

  /**
   * Names of the identities this object answers to, in declared order
   */
  interfaces(): string[] {
    return this.capabilities.map(key => key.name);
  }

  /**
   * Registers an identity. Identities are matched in declared order.
   * @param target Typed view returned for the identity, usually `this`
   */
  protected provide<T extends RefCounted>(key: InterfaceKey<T>, target: T): void {
    requireKey(key, 'provide');
    if (this.capabilities.some(existing => existing.matches(key.id))) {
      throw BusErrorFactory.duplicateInterface('provide', key.name, { objectId: this.objectId });
    }

    key.bind(this, target);
    this.capabilities.push(key);
  }

  /**
   * Self-match against the capability table; refs the object on success
   */
  protected matchCapability<T extends RefCounted>(key: InterfaceKey<T>): QueryResult<T> {
    if (!this.capabilities.some(existing => existing.matches(key.id))) {
      return NOT_RESOLVED;
    }

    const target = key.resolve(this);
    if (target === undefined) {
      return NOT_RESOLVED;
    }

    this.ref();
    return { code: QueryCode.OK, target };
  }
}
