/**
 * interbus - Main Entry Point
 *
 * Reference-counted objects exposing typed interfaces, discoverable at
 * runtime through a leveled interconnection graph of buses.
 */

import { BusConfig, BusOptions, BusStats, IBus, RegistryInfo } from './types'
import { BusError, BusErrorCode, BusErrorFactory, wrapError } from './errors'
import { Bus, BusRegistry, BuiltinMonitors } from './core'

// ===== Factory Functions =====

/**
 * Creates an unnamed bus. The caller owns the returned reference.
 * @param level Bus level, 0 being the most secure
 */
export function makeBus(level: number = 0, options: BusOptions = {}): Bus {
  try {
    const bus = new Bus(level, options)
    bus.ref()
    return bus
  } catch (error) {
    throw wrapError(error, 'makeBus')
  }
}

/**
 * Creates a named bus shared through the registry, or returns the live
 * one with the same name
 */
export function createBus(config: BusConfig): IBus {
  return BusRegistry.create(config)
}

/**
 * Gets a named bus
 * @returns Bus instance or null if not found
 */
export function getBus(name: string): IBus | null {
  return BusRegistry.get(name)
}

/**
 * Gets a named bus, creating it when missing
 */
export function getOrCreateBus(config: BusConfig): IBus {
  return BusRegistry.get(config.name) ?? BusRegistry.create(config)
}

/**
 * Finishes and releases a named bus
 * @returns True if the bus existed
 */
export function removeBus(name: string): boolean {
  return BusRegistry.remove(name)
}

/**
 * Finishes and releases every named bus
 */
export function clearAllBuses(): void {
  BusRegistry.clear()
}

/**
 * Lists the names of the live buses
 */
export function listBuses(): string[] {
  return BusRegistry.getAll()
}

/**
 * Gets stats of every live named bus
 */
export function getAllBusStats(): Record<string, BusStats> {
  return BusRegistry.getAllStats()
}

/**
 * Gets registry metadata
 */
export function getRegistryInfo(): RegistryInfo {
  return BusRegistry.getRegistryInfo()
}

// ===== Re-exports =====

export {
  IInterface,
  IInterfaceEx,
  IBus,
  QueryCode,
  RefApi,
} from './types'

export type {
  InterfaceId,
  QueryResult,
  RefMonitor,
  RefCounted,
  RefObjectOptions,
  BusOptions,
  BusConfig,
  BusStats,
  RegistryInfo,
} from './types'

export {
  BusError,
  BusErrorCode,
  BusErrorFactory,
  isBusError,
  hasBusErrorCode,
  wrapError,
  ErrorMessages,
} from './errors'

export {
  RefObject,
  InterfaceKey,
  defineInterface,
  calcInterfaceId,
  equalIds,
  QueryState,
  InterfaceObject,
  InterfaceObjectEx,
  FinishState,
  Bus,
  AutoRef,
  BuiltinMonitors,
  BusRegistry,
  intfCast,
  scoped,
  onExit,
  MAX_FINISH_PASSES,
} from './core'

export type { RefLedger, RefTally, ExitHandle, Defer } from './core'

// Default export for convenience
export default {
  makeBus,
  createBus,
  getBus,
  getOrCreateBus,
  removeBus,
  clearAllBuses,
  listBuses,
  getAllBusStats,
  getRegistryInfo,
  BusError,
  BusErrorCode,
  BusErrorFactory,
  BuiltinMonitors,
}

/**
 * Version information
 */
export const VERSION = '1.0.0'
