/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { BuildError } from '../errors.js';
import { TextView } from '../native/text-view.js';
import type { ForeignRuntime } from '../runtime/contract.js';
import type { ArithmeticTraits, NativeType, TextTraits } from '../types.js';
import { converted, nativeMismatch, rejected, type Conversion, type ValueCodec } from './codec.js';

/**
 * Narrow a finite number to an integer of the given width: truncate toward
 * zero, then wrap modulo 2^bits. 64-bit integers are truncated only.
 */
export function narrowInteger(value: number, traits: ArithmeticTraits): number {
  const whole = Math.trunc(value);
  if (traits.bits === 64) return whole + 0;
  const span = 2 ** traits.bits;
  let wrapped = ((whole % span) + span) % span;
  if (traits.signed && wrapped >= span / 2) {
    wrapped -= span;
  }
  return wrapped;
}

export class PrimitiveCodec implements ValueCodec {
  readonly kind = 'primitive' as const;

  constructor(
    readonly type: NativeType,
    private readonly traits: ArithmeticTraits,
  ) {}

  toForeign<V>(runtime: ForeignRuntime<V>, value: unknown): V {
    if (this.traits.boolean) {
      if (typeof value !== 'boolean') throw nativeMismatch(this.type, value);
      return runtime.boolean(value);
    }
    if (typeof value === 'number') return runtime.number(value);
    if (typeof value === 'bigint' && this.traits.bits === 64) return runtime.number(Number(value));
    throw nativeMismatch(this.type, value);
  }

  fromForeign<V>(runtime: ForeignRuntime<V>, value: V): Conversion {
    const kind = runtime.kindOf(value);
    if (this.traits.boolean) {
      return kind === 'boolean' ? converted(runtime.toBoolean(value)) : rejected(`expected boolean, got ${kind}`);
    }
    if (kind !== 'number') {
      return rejected(`expected number, got ${kind}`);
    }
    const number = runtime.toNumber(value);
    if (this.traits.floating) {
      return converted(this.traits.bits === 32 ? Math.fround(number) : number);
    }
    if (!Number.isFinite(number)) {
      return rejected(`expected a finite number for ${this.type.name}, got ${number}`);
    }
    return converted(narrowInteger(number, this.traits));
  }
}

export class TextCodec implements ValueCodec {
  readonly kind = 'text' as const;

  constructor(
    readonly type: NativeType,
    private readonly traits: TextTraits,
  ) {}

  toForeign<V>(runtime: ForeignRuntime<V>, value: unknown): V {
    if (typeof value === 'string') return runtime.string(value);
    if (value instanceof TextView) return runtime.string(value.toString());
    throw nativeMismatch(this.type, value);
  }

  fromForeign<V>(runtime: ForeignRuntime<V>, value: V): Conversion {
    const kind = runtime.kindOf(value);
    if (kind !== 'string') {
      return rejected(`expected string, got ${kind}`);
    }
    const text = runtime.toText(value);
    // Views need storage that outlives the foreign string
    return converted(this.traits.owning ? text : TextView.copyOf(text));
  }
}

export class EnumerationCodec implements ValueCodec {
  readonly kind = 'enumeration' as const;
  private readonly storage: ArithmeticTraits;

  constructor(
    readonly type: NativeType,
    underlying: NativeType,
  ) {
    const storage = underlying.arithmetic;
    if (!storage || storage.floating || storage.boolean) {
      throw new BuildError(`enumeration '${type.name}' must be stored as an integer type, not '${underlying.name}'`);
    }
    this.storage = storage;
  }

  toForeign<V>(runtime: ForeignRuntime<V>, value: unknown): V {
    if (typeof value !== 'number') throw nativeMismatch(this.type, value);
    return runtime.number(value);
  }

  fromForeign<V>(runtime: ForeignRuntime<V>, value: V): Conversion {
    const kind = runtime.kindOf(value);
    if (kind !== 'number') {
      return rejected(`expected integer enumerator, got ${kind}`);
    }
    const number = runtime.toNumber(value);
    if (!Number.isInteger(number)) {
      return rejected(`expected integer enumerator, got ${number}`);
    }
    return converted(narrowInteger(number, this.storage));
  }
}
