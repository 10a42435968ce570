/**
 * interbus - Bus Registry Implementation
 *
 * Named root buses shared by independently-built components living in the
 * same process. A component looks its root bus up by name and connects its
 * own interfaces to it; the registry holds one reference on every bus.
 */

import { BusErrorFactory, ErrorMessages, wrapError } from '../errors';
import { BusConfig, BusStats, IBus, RegistryInfo } from '../types';
import { Bus } from './bus';
import { getGlobalStore, isValidBusName, validateParameters } from './utils';

export class BusRegistry {
  /**
   * Creates a new bus or returns the live one registered under the name
   * @param config Bus configuration
   * @returns Bus instance
   */
  static create(config: BusConfig): IBus {
    try {
      if (!isValidBusName(config.name)) {
        throw BusErrorFactory.badRequest('registry.create', ErrorMessages.INVALID_BUS_NAME, {
          name: config.name,
        });
      }
      validateParameters(undefined, config.level);

      const storage = getGlobalStore();
      const existing = storage.get(config.name);

      if (existing) {
        if (!existing.finished()) {
          console.warn(
            `Bus with name "${config.name}" already exists. Returning existing instance.`
          );
          return existing;
        }
        // finished buses are dropped on sight
        this.release(config.name, existing);
      }

      const bus = new Bus(config.level ?? 0, {
        debug: config.debug,
        monitor: config.monitor,
      });
      bus.ref(); // held by the registry
      storage.set(config.name, bus);
      return bus;
    } catch (error) {
      throw wrapError(error, `registry.create:${config.name}`);
    }
  }

  /**
   * Retrieves a live bus
   * @param name Bus name
   * @returns Bus instance or null if not found
   */
  static get(name: string): IBus | null {
    try {
      if (!isValidBusName(name)) {
        throw BusErrorFactory.badRequest('registry.get', ErrorMessages.INVALID_BUS_NAME, {
          name,
        });
      }

      const storage = getGlobalStore();
      const bus = storage.get(name);
      if (!bus) {
        return null;
      }

      if (bus.finished()) {
        this.release(name, bus);
        return null;
      }
      return bus;
    } catch (error) {
      throw wrapError(error, `registry.get:${name}`);
    }
  }

  /**
   * Checks if a live bus is registered under the name
   */
  static has(name: string): boolean {
    if (!isValidBusName(name)) {
      return false;
    }
    const bus = getGlobalStore().get(name);
    return bus !== undefined && !bus.finished();
  }

  /**
   * Finishes and releases a bus
   * @returns True if a bus was removed
   */
  static remove(name: string): boolean {
    try {
      if (!isValidBusName(name)) {
        throw BusErrorFactory.badRequest('registry.remove', ErrorMessages.INVALID_BUS_NAME, {
          name,
        });
      }

      const bus = getGlobalStore().get(name);
      if (!bus) {
        return false;
      }

      this.release(name, bus);
      return true;
    } catch (error) {
      throw wrapError(error, `registry.remove:${name}`);
    }
  }

  /**
   * Finishes and releases every bus
   */
  static clear(): void {
    const storage = getGlobalStore();
    for (const [name, bus] of [...storage.entries()]) {
      this.release(name, bus);
    }
  }

  /**
   * Names of the live buses
   */
  static getAll(): string[] {
    const names: string[] = [];
    getGlobalStore().forEach((bus, name) => {
      if (!bus.finished()) {
        names.push(name);
      }
    });
    return names;
  }

  /**
   * Stats of every live bus, keyed by name
   */
  static getAllStats(): Record<string, BusStats> {
    const stats: Record<string, BusStats> = {};
    getGlobalStore().forEach((bus, name) => {
      if (!bus.finished()) {
        stats[name] = bus.getStats();
      }
    });
    return stats;
  }

  /**
   * Gets registry metadata
   */
  static getRegistryInfo(): RegistryInfo {
    let validBuses = 0;
    let finishedBuses = 0;
    const storage = getGlobalStore();

    storage.forEach(bus => {
      if (bus.finished()) {
        finishedBuses++;
      } else {
        validBuses++;
      }
    });

    return {
      totalBuses: storage.size,
      validBuses,
      finishedBuses,
      names: [...storage.keys()],
    };
  }

  /**
   * Drops the registry entry, then finishes the bus and gives back the
   * registry's reference. Failures are logged, not rethrown.
   */
  private static release(name: string, bus: IBus): void {
    const storage = getGlobalStore();
    storage.delete(name);

    try {
      bus.finish();
    } catch (error) {
      console.warn(`Error finishing bus "${name}":`, error);
    }
    try {
      bus.unref();
    } catch (error) {
      console.warn(`Error releasing bus "${name}":`, error);
    }
  }
}

/**
 * Convenience factory function for creating named buses
 */
export function createBusInstance(config: BusConfig): IBus {
  return BusRegistry.create(config);
}

/**
 * Convenience function for getting existing buses
 */
export function getBusInstance(name: string): IBus | null {
  return BusRegistry.get(name);
}

/**
 * Convenience function for getting or creating named buses
 */
export function getOrCreateBusInstance(config: BusConfig): IBus {
  return BusRegistry.get(config.name) ?? BusRegistry.create(config);
}

/**
 * Convenience function for removing named buses
 */
export function removeBusInstance(name: string): boolean {
  return BusRegistry.remove(name);
}

/**
 * Convenience function for clearing all named buses
 */
export function clearAllBusInstances(): void {
  BusRegistry.clear();
}

/**
 * Convenience function for listing all bus names
 */
export function listBusInstances(): string[] {
  return BusRegistry.getAll();
}
