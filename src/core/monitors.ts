/**
 * interbus - Built-in Ref Monitors
 *
 * Ready-made observers for the monitor hook of reference-counted objects.
 * Monitors are debugging aids and are never needed for correctness.
 */

import { BusErrorFactory } from '../errors';
import { RefApi, RefCounted, RefMonitor } from '../types';
import { safeExecute } from './utils';

/**
 * Per-object tally of reference-count operations
 */
export interface RefTally {
  refs: number;
  unrefs: number;
  unrefNoDeletes: number;
}

/**
 * Monitor that records every operation it observes
 */
export interface RefLedger {
  monitor: RefMonitor;
  /** Tally of one object (all zeros when never observed) */
  tally(obj: RefCounted): RefTally;
  /** refs - unrefs - unrefNoDeletes: equals count() while the object lives */
  balance(obj: RefCounted): number;
  /** Operations in observation order */
  history(): Array<{ objectId: number; count: number; api: RefApi }>;
  reset(): void;
}

export class BuiltinMonitors {
  /**
   * Creates a monitor that logs every operation
   * @param logger Logging function (defaults to console.log)
   * @param options Logging options
   */
  static logger(
    logger: (message: string) => void = console.log,
    options: { prefix?: string; apis?: RefApi[] } = {}
  ): RefMonitor {
    const { prefix = '[interbus]', apis } = options;

    return (obj, count, api) => {
      if (apis && !apis.includes(api)) return;
      logger(`${prefix} #${obj.objectId} ${api} (count: ${count})`);
    };
  }

  /**
   * Creates a monitor that keeps a ledger of every operation
   */
  static ledger(): RefLedger {
    const tallies = new Map<number, RefTally>();
    const entries: Array<{ objectId: number; count: number; api: RefApi }> = [];

    const tallyOf = (objectId: number): RefTally => {
      const existing = tallies.get(objectId);
      if (existing) return existing;
      const created: RefTally = { refs: 0, unrefs: 0, unrefNoDeletes: 0 };
      tallies.set(objectId, created);
      return created;
    };

    return {
      monitor: (obj, count, api) => {
        entries.push({ objectId: obj.objectId, count, api });
        const tally = tallyOf(obj.objectId);
        switch (api) {
          case RefApi.REF:
            tally.refs++;
            break;
          case RefApi.UNREF:
            tally.unrefs++;
            break;
          case RefApi.UNREF_NODELETE:
            tally.unrefNoDeletes++;
            break;
        }
      },
      tally: obj => ({ ...tallyOf(obj.objectId) }),
      balance: obj => {
        const { refs, unrefs, unrefNoDeletes } = tallyOf(obj.objectId);
        return refs - unrefs - unrefNoDeletes;
      },
      history: () => entries.map(entry => ({ ...entry })),
      reset: () => {
        tallies.clear();
        entries.length = 0;
      },
    };
  }

  /**
   * Fans one operation out to several monitors. A failing monitor does not
   * prevent the others from running.
   */
  static combine(...monitors: RefMonitor[]): RefMonitor {
    monitors.forEach((monitor, index) => {
      if (typeof monitor !== 'function') {
        throw BusErrorFactory.badRequest('combine', 'Monitor must be a function', { index });
      }
    });

    return (obj, count, api) => {
      monitors.forEach(monitor => {
        safeExecute(() => monitor(obj, count, api), `ref monitor (${api})`);
      });
    };
  }
}
