/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { ForeignRuntime } from '../runtime/contract.js';
import type { CompositeTraits, FieldDescriptor, NativeType } from '../types.js';
import { converted, nativeMismatch, rejected, type Conversion, type ValueCodec } from './codec.js';

export interface RecordField {
  readonly descriptor: FieldDescriptor;
  readonly codec: ValueCodec;
}

/**
 * Record ↔ plain foreign object keyed by field name. Both directions copy:
 * the foreign object never aliases the native instance.
 *
 * Field codecs are attached after construction so a record can contain
 * itself through a pointer or sequence.
 */
export class RecordCodec implements ValueCodec {
  readonly kind = 'record' as const;
  private fields: readonly RecordField[] = [];

  constructor(
    readonly type: NativeType,
    private readonly composite: CompositeTraits,
    private readonly create: () => unknown,
  ) {}

  attachFields(fields: readonly RecordField[]): void {
    this.fields = fields;
  }

  toForeign<V>(runtime: ForeignRuntime<V>, value: unknown): V {
    if (!this.composite.isInstance(value)) throw nativeMismatch(this.type, value);

    const entries: Array<readonly [string, V]> = [];
    try {
      for (const field of this.fields) {
        entries.push([field.descriptor.name, field.codec.toForeign(runtime, field.descriptor.get(value))]);
      }
    } catch (error) {
      for (const [, item] of entries) runtime.release(item);
      throw error;
    }
    return runtime.object(entries);
  }

  fromForeign<V>(runtime: ForeignRuntime<V>, value: V): Conversion {
    const kind = runtime.kindOf(value);
    if (kind !== 'object') {
      return rejected(`expected object, got ${kind}`);
    }

    const instance = this.create();
    for (const field of this.fields) {
      const property = runtime.property(value, field.descriptor.name);
      if (property === undefined) {
        return rejected(`missing field '${field.descriptor.name}'`);
      }
      let result: Conversion;
      try {
        result = field.codec.fromForeign(runtime, property);
      } finally {
        runtime.release(property);
      }
      if (!result.ok) {
        return rejected(`${field.descriptor.name}: ${result.reason}`);
      }
      field.descriptor.set(instance, result.value);
    }
    return converted(instance);
  }
}
