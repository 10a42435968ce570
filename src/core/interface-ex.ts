/**
 * interbus - Extended Interface Implementation
 *
 * Bus-aware interfaces. Queries the object cannot answer itself are handed
 * to its hosting bus, sharing the visited set of the ongoing query. The
 * object also has an explicit finish() phase, separate from destruction,
 * so managed resources can be released before the last unref().
 */

import { BusErrorFactory } from '../errors';
import { InterfaceObject, NOT_RESOLVED, requireKey } from './interface';
import { InterfaceKey } from './interface-id';
import { QueryState } from './query-state';
import {
  IBus,
  IInterfaceEx,
  QueryCode,
  QueryResult,
  RefCounted,
  RefObjectOptions,
} from '../types';

/**
 * Lifecycle of an extended interface
 */
export enum FinishState {
  ACTIVE = 'active',
  /** onClear() is running */
  FINISHING = 'finishing',
  FINISHED = 'finished',
}

/**
 * Implements IInterfaceEx.
 *
 * @example
 *   interface Greeter extends IInterfaceEx { greet(): string }
 *   const IGreeter = defineInterface<Greeter>('acme.greeter')
 *
 *   class GreeterImpl extends InterfaceObjectEx implements Greeter {
 *     constructor() {
 *       super()
 *       this.provide(IGreeter, this)
 *     }
 *     greet() { return 'hello' }
 *   }
 *
 *   bus.connect(new GreeterImpl())
 *   const greeter = bus.cast(IGreeter)
 */
export class InterfaceObjectEx extends InterfaceObject implements IInterfaceEx {
  private hostBus: IBus | null = null;
  private finishState = FinishState.ACTIVE;

  constructor(options: RefObjectOptions = {}) {
    super(options);
    this.provide(IInterfaceEx, this);
  }

  override queryInterface<T extends RefCounted>(key: InterfaceKey<T>): QueryResult<T> {
    return this.queryInterfaceEx(key, new QueryState());
  }

  queryInterfaceEx<T extends RefCounted>(key: InterfaceKey<T>, state: QueryState): QueryResult<T> {
    requireKey(key, 'queryInterfaceEx');
    this.throwIfDestroyed('queryInterfaceEx');
    this.throwIfFinished('queryInterfaceEx');

    const own = this.matchCapability(key);
    if (own.code === QueryCode.OK) {
      return own;
    }

    state.addSearched(this);

    const bus = this.hostBus;
    if (bus && !state.isSearched(bus)) {
      return bus.queryInterfaceEx(key, state);
    }
    return NOT_RESOLVED;
  }

  setBus(bus: IBus | null): void {
    if (bus === null) {
      this.hostBus = null;
      return;
    }

    this.throwIfFinished('setBus');
    if (this.hostBus !== null) {
      throw BusErrorFactory.hostConflict('setBus', {
        objectId: this.objectId,
        currentBus: this.hostBus.objectId,
        requestedBus: bus.objectId,
      });
    }
    this.hostBus = bus;
  }

  getBus(): IBus | null {
    return this.hostBus;
  }

  finish(): void {
    if (this.finishState !== FinishState.ACTIVE) {
      return;
    }

    this.finishState = FinishState.FINISHING;
    try {
      this.onClear();
    } finally {
      this.finishState = FinishState.FINISHED;
    }
  }

  /**
   * True once finish() has been called; the apis should not be used any more
   */
  finished(): boolean {
    return this.finishState !== FinishState.ACTIVE;
  }

  getFinishState(): FinishState {
    return this.finishState;
  }

  /**
   * Called once, the first time finish() is invoked. Subclasses release
   * managed resources here, before the destructor would.
   */
  protected onClear(): void {}

  protected throwIfFinished(op: string): void {
    if (this.finishState === FinishState.FINISHED) {
      throw BusErrorFactory.finished(op, { objectId: this.objectId });
    }
  }
}
