/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { ValueCodec } from '../conversion/codec.js';
import type { CodecCompiler } from '../conversion/compiler.js';
import { BuildError, ConversionError } from '../errors.js';
import type { ForeignPropertyThunks, ForeignRuntime } from '../runtime/contract.js';
import type { FieldDescriptor } from '../types.js';
import type { Wrapper } from '../wrapper.js';
import { guarded, requireNative } from './thunks.js';

export interface BoundProperty<T> {
  readonly descriptor: FieldDescriptor<T>;
  readonly codec: ValueCodec;
}

export function bindProperties<T>(
  fields: readonly FieldDescriptor<T>[],
  compiler: CodecCompiler,
  className: string,
): BoundProperty<T>[] {
  const seen = new Set<string>();
  return fields.map((descriptor) => {
    if (seen.has(descriptor.name)) {
      throw new BuildError(`field '${descriptor.name}' is declared twice`, className);
    }
    seen.add(descriptor.name);
    return {
      descriptor,
      codec: compiler.compile(descriptor.type, `field '${descriptor.name}'`, className),
    };
  });
}

export function propertyThunks<V, T>(
  runtime: ForeignRuntime<V>,
  className: string,
  property: BoundProperty<T>,
): ForeignPropertyThunks<V, Wrapper<T>> {
  const { descriptor, codec } = property;
  const target = `${className}.${descriptor.name}`;

  return {
    name: descriptor.name,
    get: (wrapper) =>
      guarded(runtime, () => codec.toForeign(runtime, descriptor.get(requireNative(className, wrapper)))),
    set: (wrapper, value) =>
      guarded(runtime, () => {
        const native = requireNative(className, wrapper);
        const result = codec.fromForeign(runtime, value);
        if (!result.ok) {
          throw new ConversionError(target, result.reason);
        }
        descriptor.set(native, result.value);
      }),
  };
}
