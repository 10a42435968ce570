/**
 * interbus - Interface Bus Implementation
 *
 * A bus aggregates interfaces and other buses into a leveled discovery
 * graph. Level 0 is the most secure: interfaces hosted on a low level bus
 * can discover the interfaces hosted on higher level buses, never the
 * other way around.
 *
 * - hosted interfaces and connected (higher level) buses are strong,
 *   counted references;
 * - sibling buses (same level) are weak and mutually registered, and every
 *   bus removes itself from its siblings when it is torn down.
 */

import { BusErrorFactory, ErrorMessages } from '../errors';
import { InterfaceObjectEx } from './interface-ex';
import { NOT_RESOLVED, requireKey } from './interface';
import { InterfaceKey } from './interface-id';
import { QueryState } from './query-state';
import { MAX_FINISH_PASSES, scoped, validateParameters } from './utils';
import {
  BusOptions,
  BusStats,
  IBus,
  IInterfaceEx,
  QueryCode,
  QueryResult,
  RefCounted,
} from '../types';

/**
 * Hosted interface with the teardown pass that finishes it
 */
interface HostedInterface {
  order: number;
  intf: IInterfaceEx;
}

/**
 * Tries resolving an interface through another object of the graph,
 * skipping objects already searched by the current query and objects that
 * have been finished.
 */
export function resolve<T extends RefCounted>(
  target: IInterfaceEx,
  key: InterfaceKey<T>,
  state: QueryState
): QueryResult<T> {
  if (state.isSearched(target) || target.finished()) {
    return NOT_RESOLVED;
  }
  return target.queryInterfaceEx(key, state);
}

export class Bus extends InterfaceObjectEx implements IBus {
  private readonly busLevel: number;
  private readonly debug: boolean;
  private readonly intfs: HostedInterface[] = [];
  /** connected buses with less secure levels, kept sorted by level */
  private readonly buses: IBus[] = [];
  /** same-level buses keyed by object id, not counted */
  private readonly siblings = new Map<number, IBus>();

  constructor(level: number = 0, options: BusOptions = {}) {
    validateParameters(undefined, level);
    super(options);
    this.busLevel = level;
    this.debug = options.debug ?? false;
    this.provide(IBus, this);
  }

  level(): number {
    return this.busLevel;
  }

  totalInterfaces(): number {
    return this.intfs.length;
  }

  totalBuses(): number {
    return this.buses.length;
  }

  totalSiblings(): number {
    return this.siblings.size;
  }

  /**
   * Connects an interface, a less secure bus or a sibling bus.
   *
   * Sibling buses are weak references, so a sibling must be owned by the
   * caller: connecting a bus nobody else references is rejected.
   *
   * @param candidate Interface or bus to connect
   * @param order Teardown pass finishing the interface. Interfaces closed
   *   later (the most basic services) take a higher pass.
   * @returns True if connected
   */
  connect(candidate: IInterfaceEx, order: number = 0): boolean {
    this.throwIfDestroyed('connect');
    this.throwIfFinished('connect');
    if (!candidate) {
      throw BusErrorFactory.badRequest('connect', ErrorMessages.MISSING_ARGUMENT, {
        argument: 'candidate',
      });
    }
    validateParameters(undefined, undefined, order);

    // no loop-back
    if (candidate.objectId === this.objectId) {
      return false;
    }

    // an interface may only be hosted by one bus at a time
    if (candidate.getBus() !== null) {
      this.trace('connect rejected, already hosted', candidate.objectId);
      return false;
    }

    const connected = scoped(defer => {
      const asBus = candidate.queryInterfaceEx(IBus, new QueryState());
      if (asBus.code === QueryCode.OK) {
        const other = asBus.target;
        defer(() => other.unref()); // balance the query
        return this.connectBus(other);
      }
      return this.connectInterface(candidate, order);
    });

    this.trace(connected ? 'connected' : 'connect rejected', candidate.objectId);
    return connected;
  }

  /**
   * Disconnects an interface or a bus. An interface retrieved before the
   * disconnection stays usable until it is released.
   */
  disconnect(candidate: IInterfaceEx): void {
    this.throwIfDestroyed('disconnect');
    this.throwIfFinished('disconnect');
    if (!candidate) {
      throw BusErrorFactory.badRequest('disconnect', ErrorMessages.MISSING_ARGUMENT, {
        argument: 'candidate',
      });
    }

    // interfaces first
    const intfIndex = this.intfs.findIndex(entry => entry.intf.objectId === candidate.objectId);
    if (intfIndex >= 0) {
      const [{ intf }] = this.intfs.splice(intfIndex, 1);
      this.trace('disconnected interface', intf.objectId);
      intf.setBus(null);
      intf.unref();
      return;
    }

    // buses later
    const busIndex = this.buses.findIndex(bus => bus.objectId === candidate.objectId);
    if (busIndex >= 0) {
      const [bus] = this.buses.splice(busIndex, 1);
      this.trace('disconnected bus', bus.objectId);
      bus.unref();
      return;
    }

    const sibling = this.siblings.get(candidate.objectId);
    if (sibling) {
      this.siblings.delete(sibling.objectId);
      sibling.removeSiblingBus(this);
      this.trace('disconnected sibling', sibling.objectId);
    }
  }

  /**
   * Finds a bus with the given level. There may be several buses with the
   * same level in a complex network; the first one found depth-first
   * (connected buses, then siblings) wins.
   */
  findFirstBusByLevel(level: number, state: QueryState = new QueryState()): IBus | null {
    this.throwIfDestroyed('findFirstBusByLevel');
    this.throwIfFinished('findFirstBusByLevel');

    if (level < this.busLevel) {
      return null;
    }
    if (level === this.busLevel) {
      return this;
    }

    state.addSearched(this);

    for (const bus of [...this.buses, ...this.siblings.values()]) {
      if (state.isSearched(bus) || bus.finished()) {
        continue;
      }
      const found = bus.findFirstBusByLevel(level, state);
      if (found) {
        return found;
      }
    }
    return null;
  }

  addSiblingBus(bus: IBus): void {
    this.throwIfFinished('addSiblingBus');
    this.siblings.set(bus.objectId, bus);
  }

  removeSiblingBus(bus: IBus): void {
    this.throwIfFinished('removeSiblingBus');
    this.siblings.delete(bus.objectId);
  }

  override queryInterfaceEx<T extends RefCounted>(
    key: InterfaceKey<T>,
    state: QueryState
  ): QueryResult<T> {
    requireKey(key, 'queryInterfaceEx');
    this.throwIfDestroyed('queryInterfaceEx');

    const own = this.matchCapability(key);
    if (own.code === QueryCode.OK) {
      return own;
    }

    this.throwIfFinished('queryInterfaceEx');
    state.addSearched(this);

    // local interfaces, then siblings, then connected less secure buses
    const candidates: IInterfaceEx[] = [
      ...this.intfs.map(entry => entry.intf),
      ...this.siblings.values(),
      ...this.buses,
    ];
    for (const candidate of candidates) {
      const result = resolve(candidate, key, state);
      if (result.code === QueryCode.OK) {
        return result;
      }
    }
    return NOT_RESOLVED;
  }

  getStats(): BusStats {
    return {
      objectId: this.objectId,
      level: this.busLevel,
      refCount: this.count(),
      interfaces: this.intfs.length,
      buses: this.buses.length,
      siblings: this.siblings.size,
      finished: this.finished(),
    };
  }

  protected override onClear(): void {
    this.reset();
  }

  protected override beforeDestroy(): void {
    this.finish();
  }

  private connectBus(other: IBus): boolean {
    if (other.finished()) {
      throw BusErrorFactory.finished('connect', { candidate: other.objectId });
    }
    const level = other.level();

    if (level > this.busLevel) {
      // do not allow duplicated buses
      if (this.buses.some(bus => bus.objectId === other.objectId)) {
        return false;
      }

      // strong reference only for different level
      other.ref();
      this.buses.push(other);
      this.buses.sort((a, b) => a.level() - b.level());
      return true;
    }

    if (level === this.busLevel) {
      // only the pending query holds it
      if (other.count() === 1) {
        return false;
      }
      if (other.objectId === this.objectId) {
        return false;
      }
      if (this.siblings.has(other.objectId)) {
        return false;
      }

      other.addSiblingBus(this);
      this.siblings.set(other.objectId, other);
      return true;
    }

    // more secure than me
    return false;
  }

  private connectInterface(intf: IInterfaceEx, order: number): boolean {
    if (this.intfs.some(entry => entry.intf.objectId === intf.objectId)) {
      return false;
    }

    intf.ref();
    this.intfs.push({ order, intf });
    intf.setBus(this);
    return true;
  }

  /**
   * Releases everything the bus holds. Runs once, from finish() or from
   * the last unref(). A failing step does not stop the others; the first
   * failure is rethrown once everything has been released.
   */
  private reset(): void {
    this.trace('reset');
    const failures: unknown[] = [];
    const attempt = (step: () => void): void => {
      try {
        step();
      } catch (error) {
        failures.push(error);
      }
    };

    // sibling buses are not affected by my clearance
    for (const sibling of [...this.siblings.values()]) {
      attempt(() => sibling.removeSiblingBus(this));
    }
    this.siblings.clear();

    // explicitly pass-ordered release: within a pass the later installed
    // interface is finished first
    for (let pass = 0; pass < MAX_FINISH_PASSES; pass++) {
      for (const { order, intf } of [...this.intfs].reverse()) {
        if (order === pass) {
          attempt(() => intf.finish());
        }
      }
    }

    for (const { intf } of this.intfs.splice(0)) {
      intf.setBus(null);
      attempt(() => intf.unref());
    }

    for (const bus of this.buses.splice(0).reverse()) {
      attempt(() => bus.finish());
      bus.setBus(null);
      attempt(() => bus.unref());
    }

    if (failures.length > 1) {
      for (const failure of failures.slice(1)) {
        console.warn(`Error in bus#${this.objectId} teardown:`, failure);
      }
    }
    if (failures.length > 0) {
      throw failures[0];
    }
  }

  private trace(message: string, objectId?: number): void {
    if (!this.debug) return;
    const target = objectId === undefined ? '' : ` #${objectId}`;
    console.log(`[interbus] bus#${this.objectId}(L${this.busLevel}) ${message}${target}`);
  }
}
