/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { ConversionError } from '../errors.js';
import type { ForeignRuntime } from '../runtime/contract.js';
import type { NativeType, TypeKind } from '../types.js';

export type Conversion<T = unknown> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly reason: string };

export function converted<T>(value: T): Conversion<T> {
  return { ok: true, value };
}

export function rejected(reason: string): Conversion<never> {
  return { ok: false, reason };
}

/**
 * Bidirectional converter for one classified native type. Compiled once at
 * binding time; thunks only ever call these two methods.
 */
export interface ValueCodec {
  readonly kind: TypeKind;
  readonly type: NativeType;
  toForeign<V>(runtime: ForeignRuntime<V>, value: unknown): V;
  fromForeign<V>(runtime: ForeignRuntime<V>, value: V): Conversion;
}

export function describeNative(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'object') return value.constructor?.name ?? 'object';
  return typeof value;
}

/** A native value that does not match its declared type */
export function nativeMismatch(type: NativeType, value: unknown): ConversionError {
  return new ConversionError(type.name, `native value of type ${describeNative(value)} does not match`);
}
