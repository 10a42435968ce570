/**
 * Shared test interfaces and implementations
 */

import { defineInterface } from '../core/interface-id';
import { InterfaceObject } from '../core/interface';
import { InterfaceObjectEx } from '../core/interface-ex';
import { IInterface, IInterfaceEx, RefObjectOptions } from '../types';

export interface Dummy extends IInterface {
  value(): number;
}
export const IDummy = defineInterface<Dummy>('dummy.2020');

export interface Foo extends IInterfaceEx {
  foo(): number;
  id(): string;
}
export const IFoo = defineInterface<Foo>('23c88882-8edb-4b04-a017-e2be0b68acea');

export interface Bar extends IInterfaceEx {
  bar(): number;
  id(): string;
}
export const IBar = defineInterface<Bar>('e1205e5b-ecb2-436b-91e9-6fcd5a9631d2');

export interface Baz extends IInterfaceEx {
  id(): string;
}
export const IBaz = defineInterface<Baz>('aec95632-777d-4bda-9e14-d93f2a77677e');

/** Live instances per implementation, decremented on destruction */
export const live = { dummy: 0, foo: 0, bar: 0, baz: 0, foobar: 0 };

export class DummyImpl extends InterfaceObject implements Dummy {
  constructor(options?: RefObjectOptions) {
    super(options);
    this.provide(IDummy, this);
    live.dummy++;
  }

  value(): number {
    return 1;
  }

  protected override onDestroy(): void {
    live.dummy--;
  }
}

export class FooImpl extends InterfaceObjectEx implements Foo {
  constructor(options?: RefObjectOptions) {
    super(options);
    this.provide(IFoo, this);
    live.foo++;
  }

  foo(): number {
    return 1;
  }

  id(): string {
    return 'foo';
  }

  protected override onDestroy(): void {
    live.foo--;
  }
}

export class BarImpl extends InterfaceObjectEx implements Bar {
  constructor(options?: RefObjectOptions) {
    super(options);
    this.provide(IBar, this);
    live.bar++;
  }

  bar(): number {
    return 2;
  }

  id(): string {
    return 'bar';
  }

  protected override onDestroy(): void {
    live.bar--;
  }
}

export class BazImpl extends InterfaceObjectEx implements Baz {
  constructor(options?: RefObjectOptions) {
    super(options);
    this.provide(IBaz, this);
    live.baz++;
  }

  id(): string {
    return 'baz';
  }

  protected override onDestroy(): void {
    live.baz--;
  }
}

/**
 * One object answering to both IFoo and IBar
 */
export class FooBarImpl extends InterfaceObjectEx implements Foo, Bar {
  constructor(options?: RefObjectOptions) {
    super(options);
    this.provide(IFoo, this);
    this.provide(IBar, this);
    live.foobar++;
  }

  foo(): number {
    return 3;
  }

  bar(): number {
    return 4;
  }

  id(): string {
    return 'foobar';
  }

  protected override onDestroy(): void {
    live.foobar--;
  }
}

/**
 * Extended interface that records when it is finished
 */
export class Tracked extends InterfaceObjectEx {
  constructor(
    readonly label: string,
    private readonly log: string[]
  ) {
    super();
  }

  protected override onClear(): void {
    this.log.push(this.label);
  }
}
