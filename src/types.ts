/**
 * interbus - Core Type Definitions
 *
 * Public contracts of the object model. Concrete implementations live in
 * ./core; everything a component needs to talk to another one lives here.
 */

import { defineInterface, InterfaceKey } from './core/interface-id';
import type { QueryState } from './core/query-state';

/**
 * Opaque interface identifier: the first 64 bits of the SHA-256 digest of
 * the interface name, as 16 lowercase hex digits.
 */
export type InterfaceId = string & { readonly __brand: 'InterfaceId' };

/**
 * Result codes of an interface query
 */
export enum QueryCode {
  OK = 0,
  NOT_RESOLVED = 1,
}

export type QueryResult<T> =
  | { code: QueryCode.OK; target: T }
  | { code: QueryCode.NOT_RESOLVED };

/**
 * Reference-count operations reported to a monitor
 */
export enum RefApi {
  REF = 'ref',
  UNREF = 'unref',
  UNREF_NODELETE = 'unrefNoDelete',
}

/**
 * Observer of reference-count operations. `count` is the value before the
 * operation is applied.
 */
export type RefMonitor = (obj: RefCounted, count: number, api: RefApi) => void;

/**
 * Options shared by every reference-counted object
 */
export interface RefObjectOptions {
  /** Observer called on every ref/unref/unrefNoDelete */
  monitor?: RefMonitor;
}

/**
 * Options for bus construction
 */
export interface BusOptions extends RefObjectOptions {
  /** Log connect, disconnect and teardown steps */
  debug?: boolean;
}

/**
 * Configuration for a named bus kept by the registry
 */
export interface BusConfig extends BusOptions {
  /** Unique identifier for the bus instance */
  name: string;
  /** Bus level, 0 being the most trusted (default: 0) */
  level?: number;
}

/**
 * Manual reference counting
 */
export interface RefCounted {
  /** Stable id of the underlying object, shared by all its typed views */
  readonly objectId: number;
  /** Increase reference count */
  ref(): void;
  /** Decrease reference count, destroying the object once it reaches zero */
  unref(): void;
  /** Decrease reference count without ever destroying the object */
  unrefNoDelete(): void;
  count(): number;
}

/**
 * Root of all interfaces
 */
export interface IInterface extends RefCounted {
  /**
   * Interface browsing. On success the object is ref'd and the caller owns
   * the returned reference.
   */
  queryInterface<T extends RefCounted>(key: InterfaceKey<T>): QueryResult<T>;
  /** Tests whether the interface is reachable, leaving the count unchanged */
  supports<T extends RefCounted>(key: InterfaceKey<T>): boolean;
  /** Typed lookup that leaves the count unchanged */
  cast<T extends RefCounted>(key: InterfaceKey<T>): T | null;
}

export const IInterface = defineInterface<IInterface>('interbus.interface');

/**
 * Root of all bus-aware interfaces
 */
export interface IInterfaceEx extends IInterface {
  /** Interface browsing that shares the visited set of an ongoing query */
  queryInterfaceEx<T extends RefCounted>(key: InterfaceKey<T>, state: QueryState): QueryResult<T>;
  /** Sets or clears (null) the hosting bus */
  setBus(bus: IBus | null): void;
  getBus(): IBus | null;
  /**
   * Explicit release. After this call the object's apis are disabled and
   * its internal resources may be released.
   */
  finish(): void;
  finished(): boolean;
}

export const IInterfaceEx = defineInterface<IInterfaceEx>('interbus.interface-ex');

/**
 * Interface integration bus: connects interfaces and other buses on the fly
 */
export interface IBus extends IInterfaceEx {
  /**
   * Connects an interface or a bus of the same or a less secure level.
   * @param order Teardown pass that finishes the interface (plain interfaces only)
   */
  connect(candidate: IInterfaceEx, order?: number): boolean;
  disconnect(candidate: IInterfaceEx): void;
  /** Bus level, 0 is the most secure */
  level(): number;
  /**
   * Finds a bus with the given level, searching depth-first
   * @param state Buses already searched (shared by recursive calls)
   */
  findFirstBusByLevel(level: number, state?: QueryState): IBus | null;
  /** Adds a sibling bus as a weak (uncounted) reference */
  addSiblingBus(bus: IBus): void;
  /** Removes the weak reference to a sibling bus */
  removeSiblingBus(bus: IBus): void;
  totalInterfaces(): number;
  totalBuses(): number;
  totalSiblings(): number;
  getStats(): BusStats;
}

export const IBus = defineInterface<IBus>('interbus.bus');

/**
 * Snapshot of a bus
 */
export interface BusStats {
  objectId: number;
  level: number;
  refCount: number;
  interfaces: number;
  buses: number;
  siblings: number;
  finished: boolean;
}

/**
 * Registry metadata
 */
export interface RegistryInfo {
  totalBuses: number;
  validBuses: number;
  finishedBuses: number;
  names: string[];
}
