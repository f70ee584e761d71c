/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Foreign runtime contract.
 *
 * The engine is written once against this interface and instantiated per
 * embedded engine. `V` is the runtime's value representation: plain values
 * for the direct runtime, handles for QuickJS.
 *
 * Handle ownership: values returned by constructors and by `arrayItems` /
 * `property` belong to the caller, who passes them on or calls `release`.
 * `array` and `object` take ownership of the values they are given.
 * Arguments handed to thunks are borrowed and must not be released.
 */

import type { BindingRuntimeError } from '../errors.js';

export type ForeignKind =
  | 'number'
  | 'boolean'
  | 'string'
  | 'array'
  | 'object'
  | 'null'
  | 'undefined'
  | 'function'
  | 'other';

export interface ForeignPropertyThunks<V, W> {
  readonly name: string;
  get(wrapper: W | undefined): V;
  set(wrapper: W | undefined, value: V): void;
}

export interface ForeignMethodThunk<V, W> {
  readonly name: string;
  readonly arity: number;
  invoke(wrapper: W | undefined, args: readonly V[]): V;
}

export interface ForeignStaticThunk<V> {
  readonly name: string;
  readonly arity: number;
  invoke(args: readonly V[]): V;
}

/**
 * Everything a runtime needs to define one foreign class. `W` is the
 * engine's wrapper type; runtimes store it and hand it back untouched.
 */
export interface ForeignClassDefinition<V, W> {
  readonly name: string;
  /**
   * Run constructor resolution for a foreign `new`. `handle` is the token
   * the runtime identifies the new object by.
   */
  construct(args: readonly V[], handle: number): W;
  /** Called exactly once per constructed object, by the collector or at teardown */
  finalize(wrapper: W): void;
  readonly properties: readonly ForeignPropertyThunks<V, W>[];
  readonly methods: readonly ForeignMethodThunk<V, W>[];
  readonly statics: readonly ForeignStaticThunk<V>[];
}

export interface ForeignRuntime<V> {
  /** Runtime name for logs */
  readonly name: string;

  // ── value constructors ──────────────────────────────────────
  number(value: number): V;
  boolean(value: boolean): V;
  string(value: string): V;
  array(items: V[]): V;
  object(entries: ReadonlyArray<readonly [string, V]>): V;
  /** The "no value" result of a call */
  absent(): V;
  null(): V;

  // ── value inspectors ────────────────────────────────────────
  kindOf(value: V): ForeignKind;
  toNumber(value: V): number;
  toBoolean(value: V): boolean;
  toText(value: V): string;
  arrayItems(value: V): V[];
  /** Property value, or undefined when the property is absent or undefined */
  property(value: V, key: string): V | undefined;
  release(value: V): void;

  // ── object system ───────────────────────────────────────────
  /** Define a class; the returned constructor stays owned by the runtime */
  defineClass<W>(definition: ForeignClassDefinition<V, W>): V;
  /** Expose `value` on a module or namespace object */
  setMember(target: V, name: string, value: V): void;
  raiseError(error: BindingRuntimeError): never;
}
