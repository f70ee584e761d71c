/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { ConversionError } from '../errors.js';
import { TextView } from './text-view.js';
import { OwningPointer } from './pointers.js';

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Converted call arguments handed to native implementations.
 *
 * Values have already passed the codec of their declared parameter type;
 * the accessors narrow them for the implementation.
 */
export class NativeArguments {
  constructor(
    private readonly values: readonly unknown[],
    private readonly callee: string,
  ) {}

  get length(): number {
    return this.values.length;
  }

  value(index: number): unknown {
    if (index < 0 || index >= this.values.length) {
      throw new ConversionError(this.label(index), `only ${this.values.length} argument(s) were passed`);
    }
    return this.values[index];
  }

  number(index: number): number {
    const value = this.value(index);
    if (typeof value !== 'number') throw this.mismatch(index, 'number', value);
    return value;
  }

  boolean(index: number): boolean {
    const value = this.value(index);
    if (typeof value !== 'boolean') throw this.mismatch(index, 'boolean', value);
    return value;
  }

  /** Owned text; views are decoded */
  string(index: number): string {
    const value = this.value(index);
    if (typeof value === 'string') return value;
    if (value instanceof TextView) return value.toString();
    throw this.mismatch(index, 'string', value);
  }

  view(index: number): TextView {
    const value = this.value(index);
    if (!(value instanceof TextView)) throw this.mismatch(index, 'TextView', value);
    return value;
  }

  array(index: number): unknown[] {
    const value = this.value(index);
    if (!Array.isArray(value)) throw this.mismatch(index, 'array', value);
    return value;
  }

  numbers(index: number): number[] {
    return this.array(index).map((item, position) => {
      if (typeof item !== 'number') throw this.mismatch(index, `number at [${position}]`, item);
      return item;
    });
  }

  strings(index: number): string[] {
    return this.array(index).map((item, position) => {
      if (typeof item !== 'string') throw this.mismatch(index, `string at [${position}]`, item);
      return item;
    });
  }

  set(index: number): Set<unknown> {
    const value = this.value(index);
    if (!(value instanceof Set)) throw this.mismatch(index, 'Set', value);
    return value;
  }

  pointer(index: number): OwningPointer<unknown> {
    const value = this.value(index);
    if (!(value instanceof OwningPointer)) throw this.mismatch(index, 'pointer', value);
    return value;
  }

  instance<T>(index: number, type: abstract new (...args: never[]) => T): T {
    const value = this.value(index);
    if (!(value instanceof type)) throw this.mismatch(index, type.name, value);
    return value;
  }

  toArray(): unknown[] {
    return [...this.values];
  }

  private label(index: number): string {
    return `${this.callee} argument ${index + 1}`;
  }

  private mismatch(index: number, expected: string, value: unknown): ConversionError {
    return new ConversionError(this.label(index), `expected ${expected}, got ${describe(value)}`);
  }
}
