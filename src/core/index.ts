/**
 * interbus - Core Module Exports
 */

// Reference counting and identities
export { RefObject, allocateObjectId } from './ref-object';
export {
  InterfaceKey,
  defineInterface,
  calcInterfaceId,
  isInterfaceId,
  equalIds,
} from './interface-id';
export { QueryState } from './query-state';

// Interfaces and buses
export {
  InterfaceObject,
  NOT_RESOLVED,
  balanceQuery,
  intfCast,
  requireKey,
} from './interface';
export { InterfaceObjectEx, FinishState } from './interface-ex';
export { Bus, resolve } from './bus';

// Handles and monitors
export { AutoRef } from './auto-ref';
export type { QuerySource } from './auto-ref';
export { BuiltinMonitors } from './monitors';
export type { RefLedger, RefTally } from './monitors';

// Registry and instance management
export {
  BusRegistry,
  createBusInstance,
  getBusInstance,
  getOrCreateBusInstance,
  removeBusInstance,
  clearAllBusInstances,
  listBusInstances,
} from './registry';

// Utility functions
export * from './utils';
