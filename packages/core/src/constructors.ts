/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Constructor Resolver
 *
 * Zero arguments select the default constructor. Otherwise the first
 * declared constructor with a matching parameter count is used; later
 * constructors of the same arity are never tried.
 */

import type { ValueCodec } from './conversion/codec.js';
import type { CodecCompiler } from './conversion/compiler.js';
import { BuildError, ConstructorResolutionError } from './errors.js';
import { NativeArguments } from './native/arguments.js';
import type { ForeignRuntime } from './runtime/contract.js';
import type { ConstructorDescriptor } from './types.js';
import type { LifetimeManager, Wrapper } from './wrapper.js';

export interface BoundConstructor<T> {
  readonly descriptor: ConstructorDescriptor<T>;
  readonly params: readonly ValueCodec[];
}

export class ConstructorResolver<T> {
  private readonly callee: string;

  private constructor(
    readonly className: string,
    readonly defaultConstructor: ConstructorDescriptor<T> | undefined,
    readonly overloads: readonly BoundConstructor<T>[],
    private readonly lifetime: LifetimeManager<T>,
  ) {
    this.callee = `${className} constructor`;
  }

  static compile<T>(
    className: string,
    constructors: readonly ConstructorDescriptor<T>[],
    compiler: CodecCompiler,
    lifetime: LifetimeManager<T>,
  ): ConstructorResolver<T> {
    if (constructors.length === 0) {
      throw new BuildError('declares no constructor; foreign code could never create it', className);
    }

    let defaultConstructor: ConstructorDescriptor<T> | undefined;
    const overloads: BoundConstructor<T>[] = [];
    constructors.forEach((descriptor, index) => {
      if (descriptor.params.length === 0) {
        if (defaultConstructor) {
          throw new BuildError('declares more than one default constructor', className);
        }
        defaultConstructor = descriptor;
        return;
      }
      overloads.push({
        descriptor,
        params: descriptor.params.map((param, position) =>
          compiler.compile(
            param.type,
            `constructor #${index + 1} parameter ${param.name ?? position + 1}`,
            className,
          ),
        ),
      });
    });

    return new ConstructorResolver(className, defaultConstructor, overloads, lifetime);
  }

  /** Arities foreign code may construct with, ascending */
  get arities(): number[] {
    const arities = new Set(this.overloads.map((overload) => overload.params.length));
    if (this.defaultConstructor) arities.add(0);
    return [...arities].sort((a, b) => a - b);
  }

  /**
   * Allocate a wrapper and construct its native object. On any failure the
   * wrapper is discarded before the error propagates.
   */
  construct<V>(runtime: ForeignRuntime<V>, args: readonly V[], handle: number): Wrapper<T> {
    const wrapper = this.lifetime.allocate(handle);
    try {
      this.lifetime.construct(wrapper, this.resolve(runtime, args), true);
      return wrapper;
    } catch (error) {
      this.lifetime.finalize(wrapper);
      throw error;
    }
  }

  private resolve<V>(runtime: ForeignRuntime<V>, args: readonly V[]): T {
    if (args.length === 0) {
      if (!this.defaultConstructor) {
        throw new ConstructorResolutionError(this.className, 0, 'no default constructor');
      }
      return this.defaultConstructor.create(new NativeArguments([], this.callee));
    }

    const candidate = this.overloads.find((overload) => overload.params.length === args.length);
    if (!candidate) {
      throw new ConstructorResolutionError(
        this.className,
        args.length,
        `accepted argument counts: ${this.arities.join(', ')}`,
      );
    }

    const values: unknown[] = [];
    for (let i = 0; i < candidate.params.length; i++) {
      const result = candidate.params[i].fromForeign(runtime, args[i]);
      if (!result.ok) {
        throw new ConstructorResolutionError(this.className, args.length, `argument ${i + 1}: ${result.reason}`);
      }
      values.push(result.value);
    }
    return candidate.descriptor.create(new NativeArguments(values, this.callee));
  }
}
