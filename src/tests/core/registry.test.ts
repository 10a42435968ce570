/**
 * Tests for the named bus registry
 */

import {
  clearAllBuses,
  createBus,
  getAllBusStats,
  getBus,
  getOrCreateBus,
  getRegistryInfo,
  listBuses,
  removeBus,
} from '../../index';
import {
  BusRegistry,
  createBusInstance,
  getBusInstance,
  getOrCreateBusInstance,
  listBusInstances,
  removeBusInstance,
  clearAllBusInstances,
} from '../../core/registry';
import { BusError, BusErrorCode, hasBusErrorCode } from '../../errors';
import { FooImpl, IFoo } from '../fixtures';

describe('BusRegistry', () => {
  beforeEach(() => {
    clearAllBuses();
  });

  afterEach(() => {
    clearAllBuses();
  });

  it('should create a bus holding one reference', () => {
    const bus = createBus({ name: 'app', level: 1 });

    expect(bus.level()).toBe(1);
    expect(bus.count()).toBe(1);
    expect(getBus('app')).toBe(bus);
    expect(BusRegistry.has('app')).toBe(true);
  });

  it('should default to level 0', () => {
    expect(createBus({ name: 'app' }).level()).toBe(0);
  });

  it('should return the live bus registered under the same name', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});

    const first = createBus({ name: 'app' });
    const second = createBus({ name: 'app', level: 2 });

    expect(second).toBe(first);
    expect(second.level()).toBe(0);
    expect(warn).toHaveBeenCalledWith(
      'Bus with name "app" already exists. Returning existing instance.'
    );
    warn.mockRestore();
  });

  it('should replace a bus finished outside the registry', () => {
    const first = createBus({ name: 'app' });
    first.finish();

    expect(BusRegistry.has('app')).toBe(false);
    const second = createBus({ name: 'app' });
    expect(second).not.toBe(first);
    expect(second.finished()).toBe(false);
  });

  it('should drop a finished bus on lookup', () => {
    const bus = createBus({ name: 'app' });
    bus.finish();

    expect(getBus('app')).toBeNull();
    expect(getRegistryInfo().totalBuses).toBe(0);
  });

  it('should return null for an unknown name', () => {
    expect(getBus('missing')).toBeNull();
    expect(BusRegistry.has('missing')).toBe(false);
    expect(BusRegistry.has('')).toBe(false);
  });

  it('should reject invalid names and levels', () => {
    let error: unknown;
    try {
      createBus({ name: '' });
    } catch (caught) {
      error = caught;
    }
    expect(error).toBeInstanceOf(BusError);
    expect(hasBusErrorCode(error, BusErrorCode.BAD_REQUEST)).toBe(true);

    expect(() => createBus({ name: 'app', level: -1 })).toThrow(BusError);
    expect(() => getBus(' app')).toThrow(BusError);
    expect(() => removeBus('')).toThrow(BusError);
    expect(listBuses()).toEqual([]);
  });

  it('should finish and release a removed bus', () => {
    const bus = createBus({ name: 'app' });
    const foo = new FooImpl();
    bus.connect(foo);

    expect(removeBus('app')).toBe(true);

    expect(bus.finished()).toBe(true);
    expect(bus.count()).toBe(0);
    expect(foo.isDestroyed()).toBe(true);
    expect(getBus('app')).toBeNull();
    expect(removeBus('app')).toBe(false);
  });

  it('should keep a removed bus alive while referenced elsewhere', () => {
    const bus = createBus({ name: 'app' });
    bus.ref();

    removeBus('app');

    expect(bus.finished()).toBe(true);
    expect(bus.count()).toBe(1);
    bus.unref();
  });

  it('should get or create', () => {
    const created = getOrCreateBus({ name: 'app' });
    const found = getOrCreateBus({ name: 'app' });

    expect(found).toBe(created);
    expect(listBuses()).toEqual(['app']);
  });

  it('should let components meet through a named bus', () => {
    const provider = createBus({ name: 'shared' });
    provider.connect(new FooImpl());

    const consumer = getBus('shared');
    expect(consumer?.cast(IFoo)?.id()).toBe('foo');
  });

  it('should report stats and metadata', () => {
    const app = createBus({ name: 'app' });
    createBus({ name: 'plugins', level: 1 });
    app.connect(new FooImpl());

    expect(listBuses()).toEqual(['app', 'plugins']);
    expect(getAllBusStats()).toEqual({
      app: expect.objectContaining({ level: 0, refCount: 1, interfaces: 1 }),
      plugins: expect.objectContaining({ level: 1, refCount: 1, interfaces: 0 }),
    });
    expect(getRegistryInfo()).toEqual({
      totalBuses: 2,
      validBuses: 2,
      finishedBuses: 0,
      names: ['app', 'plugins'],
    });

    app.finish();
    expect(getRegistryInfo()).toEqual({
      totalBuses: 2,
      validBuses: 1,
      finishedBuses: 1,
      names: ['app', 'plugins'],
    });
    expect(listBuses()).toEqual(['plugins']);
  });

  it('should clear every bus', () => {
    const a = createBus({ name: 'a' });
    const b = createBus({ name: 'b' });

    clearAllBuses();

    expect(a.finished()).toBe(true);
    expect(b.finished()).toBe(true);
    expect(listBuses()).toEqual([]);
  });

  it('should report teardown failures without stopping', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
    const bus = createBus({ name: 'app' });
    bus.unref();

    expect(() => clearAllBuses()).not.toThrow();
    expect(warn).toHaveBeenCalledWith('Error releasing bus "app":', expect.any(BusError));
    warn.mockRestore();
  });

  describe('convenience functions', () => {
    it('should mirror the registry', () => {
      const bus = createBusInstance({ name: 'app' });

      expect(getBusInstance('app')).toBe(bus);
      expect(getOrCreateBusInstance({ name: 'app' })).toBe(bus);
      expect(listBusInstances()).toEqual(['app']);
      expect(removeBusInstance('app')).toBe(true);

      createBusInstance({ name: 'other' });
      clearAllBusInstances();
      expect(listBusInstances()).toEqual([]);
    });
  });
});
