/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { ValueCodec } from '../conversion/codec.js';
import { ArityError, BindingRuntimeError, ConversionError, InvalidObjectError } from '../errors.js';
import type { ForeignRuntime } from '../runtime/contract.js';
import type { Wrapper } from '../wrapper.js';

/**
 * Run a thunk body, handing binding errors to the runtime's error channel.
 * Anything else propagates as the runtime sees fit.
 */
export function guarded<V, R>(runtime: ForeignRuntime<V>, body: () => R): R {
  try {
    return body();
  } catch (error) {
    if (error instanceof BindingRuntimeError) {
      return runtime.raiseError(error);
    }
    throw error;
  }
}

export function requireNative<T>(className: string, wrapper: Wrapper<T> | undefined): T {
  const native = wrapper ? wrapper.pointer : null;
  if (native === null) {
    throw new InvalidObjectError(className);
  }
  return native;
}

/**
 * Check arity, then convert arguments left to right. Stops at the first
 * failure; nothing is converted when the count is wrong.
 */
export function convertArguments<V>(
  runtime: ForeignRuntime<V>,
  codecs: readonly ValueCodec[],
  args: readonly V[],
  callee: string,
): unknown[] {
  if (args.length !== codecs.length) {
    throw new ArityError(callee, codecs.length, args.length);
  }
  const values: unknown[] = [];
  for (let i = 0; i < codecs.length; i++) {
    const result = codecs[i].fromForeign(runtime, args[i]);
    if (!result.ok) {
      throw new ConversionError(`${callee} argument ${i + 1}`, result.reason);
    }
    values.push(result.value);
  }
  return values;
}
