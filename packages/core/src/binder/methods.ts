/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { ValueCodec } from '../conversion/codec.js';
import type { CodecCompiler } from '../conversion/compiler.js';
import { NativeArguments } from '../native/arguments.js';
import type { ForeignMethodThunk, ForeignRuntime, ForeignStaticThunk } from '../runtime/contract.js';
import type { MethodDescriptor, NativeType, ParameterDescriptor, StaticMethodDescriptor } from '../types.js';
import type { Wrapper } from '../wrapper.js';
import { assignForeignNames, type OverloadNamingStrategy } from './naming.js';
import { convertArguments, guarded, requireNative } from './thunks.js';

interface Callable {
  readonly name: string;
  readonly params: readonly ParameterDescriptor[];
  readonly returns?: NativeType;
}

export interface BoundCallable<D extends Callable> {
  readonly descriptor: D;
  readonly foreignName: string;
  readonly params: readonly ValueCodec[];
  /** Absent for methods that return no value */
  readonly returns?: ValueCodec;
}

export type BoundMethod<T> = BoundCallable<MethodDescriptor<T>>;
export type BoundStatic = BoundCallable<StaticMethodDescriptor>;

/** Foreign names that would shadow built-in members of a foreign constructor */
const RESERVED_STATIC_NAMES: ReadonlyMap<string, string> = new Map([['prototype', 'the constructor prototype']]);

export function bindMethods<D extends Callable>(
  members: readonly D[],
  compiler: CodecCompiler,
  naming: OverloadNamingStrategy,
  className: string,
  reserved?: ReadonlyMap<string, string>,
): BoundCallable<D>[] {
  return assignForeignNames(members, naming, className, reserved).map(({ member, foreignName }) => ({
    descriptor: member,
    foreignName,
    params: member.params.map((param, index) =>
      compiler.compile(param.type, `${foreignName} parameter ${param.name ?? index + 1}`, className),
    ),
    returns: member.returns ? compiler.compile(member.returns, `${foreignName} return`, className) : undefined,
  }));
}

export function bindStatics(
  members: readonly StaticMethodDescriptor[],
  compiler: CodecCompiler,
  naming: OverloadNamingStrategy,
  className: string,
): BoundStatic[] {
  return bindMethods(members, compiler, naming, className, RESERVED_STATIC_NAMES);
}

export function methodThunk<V, T>(
  runtime: ForeignRuntime<V>,
  className: string,
  method: BoundMethod<T>,
): ForeignMethodThunk<V, Wrapper<T>> {
  const callee = `${className}.${method.foreignName}`;
  const { descriptor, params, returns } = method;

  return {
    name: method.foreignName,
    arity: params.length,
    invoke: (wrapper, args) =>
      guarded(runtime, () => {
        const native = requireNative(className, wrapper);
        const values = convertArguments(runtime, params, args, callee);
        const result = descriptor.invoke(native, new NativeArguments(values, callee));
        return returns ? returns.toForeign(runtime, result) : runtime.absent();
      }),
  };
}

export function staticThunk<V>(runtime: ForeignRuntime<V>, className: string, method: BoundStatic): ForeignStaticThunk<V> {
  const callee = `${className}.${method.foreignName}`;
  const { descriptor, params, returns } = method;

  return {
    name: method.foreignName,
    arity: params.length,
    invoke: (args) =>
      guarded(runtime, () => {
        const values = convertArguments(runtime, params, args, callee);
        const result = descriptor.invoke(new NativeArguments(values, callee));
        return returns ? returns.toForeign(runtime, result) : runtime.absent();
      }),
  };
}
