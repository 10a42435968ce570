/**
 * Tests for interface identities
 */

import {
  calcInterfaceId,
  defineInterface,
  equalIds,
  isInterfaceId,
  InterfaceKey,
} from '../../core/interface-id';
import { BusError, BusErrorCode, hasBusErrorCode } from '../../errors';
import { IBus, IInterface, IInterfaceEx, RefCounted } from '../../types';
import { Foo, FooImpl, IFoo } from '../fixtures';

describe('calcInterfaceId', () => {
  it('should take the first 64 bits of the SHA-256 digest', () => {
    expect(calcInterfaceId('')).toBe('e3b0c44298fc1c14');
    expect(calcInterfaceId('abc')).toBe('ba7816bf8f01cfea');
  });

  it('should be stable for the same name', () => {
    expect(calcInterfaceId('acme.greeter')).toBe(calcInterfaceId('acme.greeter'));
    expect(equalIds(calcInterfaceId('acme.greeter'), calcInterfaceId('acme.greeter'))).toBe(true);
  });

  it('should differ for different names', () => {
    expect(equalIds(calcInterfaceId('acme.a'), calcInterfaceId('acme.b'))).toBe(false);
  });
});

describe('isInterfaceId', () => {
  it('should accept 16 lowercase hex digits', () => {
    expect(isInterfaceId('0123456789abcdef')).toBe(true);
  });

  it('should reject anything else', () => {
    expect(isInterfaceId('0123456789ABCDEF')).toBe(false);
    expect(isInterfaceId('0123')).toBe(false);
    expect(isInterfaceId(42)).toBe(false);
    expect(isInterfaceId(undefined)).toBe(false);
  });
});

describe('defineInterface', () => {
  it('should derive the id from the name', () => {
    const key = defineInterface<RefCounted>('tests.interface-id.first');

    expect(key).toBeInstanceOf(InterfaceKey);
    expect(key.name).toBe('tests.interface-id.first');
    expect(key.id).toBe(calcInterfaceId('tests.interface-id.first'));
    expect(key.matches(calcInterfaceId('tests.interface-id.first'))).toBe(true);
    expect(key.toString()).toBe(`tests.interface-id.first#${key.id}`);
  });

  it('should reject a name defined twice', () => {
    defineInterface<RefCounted>('tests.interface-id.twice');

    let error: unknown;
    try {
      defineInterface<RefCounted>('tests.interface-id.twice');
    } catch (caught) {
      error = caught;
    }
    expect(error).toBeInstanceOf(BusError);
    expect(hasBusErrorCode(error, BusErrorCode.CONFLICT)).toBe(true);
  });

  it('should reject an empty name', () => {
    expect(() => defineInterface<RefCounted>('')).toThrow(
      'Bad request for defineInterface. Interface name must be a non-empty string'
    );
  });

  it('should resolve a binding only through the key that holds it', () => {
    const foo = new FooImpl();
    const other = defineInterface<Foo>('tests.interface-id.other-foo');

    expect(IFoo.resolve(foo)).toBe(foo);
    expect(other.resolve(foo)).toBeUndefined();

    other.bind(foo, foo);
    expect(other.resolve(foo)).toBe(foo);
  });

  it('should expose the built-in identities', () => {
    expect(IInterface.name).toBe('interbus.interface');
    expect(IInterfaceEx.name).toBe('interbus.interface-ex');
    expect(IBus.name).toBe('interbus.bus');
    expect(IInterface.id).toBe(calcInterfaceId('interbus.interface'));
    expect(() => defineInterface<RefCounted>('interbus.bus')).toThrow(BusError);
  });
});
