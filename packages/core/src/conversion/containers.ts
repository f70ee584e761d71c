/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { OwningPointer, SharedPointer, UniquePointer } from '../native/pointers.js';
import type { ForeignRuntime } from '../runtime/contract.js';
import type { ContainerFlavor, NativeType, PointerSharing } from '../types.js';
import { converted, nativeMismatch, rejected, type Conversion, type ValueCodec } from './codec.js';

/** Homogeneous sequence ↔ foreign array, element order preserved */
export class SequenceCodec implements ValueCodec {
  readonly kind = 'sequence' as const;

  constructor(
    readonly type: NativeType,
    private readonly element: ValueCodec,
    private readonly container: ContainerFlavor,
  ) {}

  toForeign<V>(runtime: ForeignRuntime<V>, value: unknown): V {
    if (!Array.isArray(value) && !(value instanceof Set)) {
      throw nativeMismatch(this.type, value);
    }
    const items: V[] = [];
    try {
      for (const item of value) {
        items.push(this.element.toForeign(runtime, item));
      }
    } catch (error) {
      for (const item of items) runtime.release(item);
      throw error;
    }
    return runtime.array(items);
  }

  fromForeign<V>(runtime: ForeignRuntime<V>, value: V): Conversion {
    const kind = runtime.kindOf(value);
    if (kind !== 'array') {
      return rejected(`expected array, got ${kind}`);
    }

    const items = runtime.arrayItems(value);
    const result: unknown[] = [];
    try {
      for (let i = 0; i < items.length; i++) {
        const element = this.element.fromForeign(runtime, items[i]);
        if (!element.ok) {
          return rejected(`[${i}] ${element.reason}`);
        }
        result.push(element.value);
      }
    } finally {
      for (const item of items) runtime.release(item);
    }

    return converted(this.container === 'set' ? new Set(result) : result);
  }
}

/** Owning pointer ↔ pointee or null */
export class PointerCodec implements ValueCodec {
  readonly kind = 'ownership-pointer' as const;

  constructor(
    readonly type: NativeType,
    private readonly element: ValueCodec,
    private readonly sharing: PointerSharing,
  ) {}

  toForeign<V>(runtime: ForeignRuntime<V>, value: unknown): V {
    if (value === null || value === undefined) return runtime.null();
    if (!(value instanceof OwningPointer)) throw nativeMismatch(this.type, value);

    const target: unknown = value.get();
    return target === null ? runtime.null() : this.element.toForeign(runtime, target);
  }

  fromForeign<V>(runtime: ForeignRuntime<V>, value: V): Conversion {
    const kind = runtime.kindOf(value);
    if (kind === 'null' || kind === 'undefined') {
      return converted(this.empty());
    }
    const element = this.element.fromForeign(runtime, value);
    if (!element.ok) return element;
    return converted(this.sharing === 'shared' ? new SharedPointer(element.value) : new UniquePointer(element.value));
  }

  private empty(): OwningPointer<unknown> {
    return this.sharing === 'shared' ? new SharedPointer<unknown>() : new UniquePointer<unknown>();
  }
}
