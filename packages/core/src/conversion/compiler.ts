/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { classifyAt } from '../classifier.js';
import { BuildError } from '../errors.js';
import type { NativeType } from '../types.js';
import type { ValueCodec } from './codec.js';
import { PointerCodec, SequenceCodec } from './containers.js';
import { EnumerationCodec, PrimitiveCodec, TextCodec } from './primitives.js';
import { RecordCodec } from './records.js';

/**
 * Compiles native types into codecs, classifying each type exactly once.
 * Codecs are cached per type object so recursive records resolve to the
 * codec already under construction.
 */
export class CodecCompiler {
  private readonly cache = new Map<NativeType, ValueCodec>();

  /**
   * @param location - where the type was found, for build errors
   * @param className - class being bound, for build errors
   */
  compile(type: NativeType, location: string, className?: string): ValueCodec {
    const cached = this.cache.get(type);
    if (cached) return cached;

    const kind = classifyAt(type, location, className);
    switch (kind) {
      case 'primitive': {
        const codec = new PrimitiveCodec(type, requireTrait(type.arithmetic, type, 'arithmetic'));
        this.cache.set(type, codec);
        return codec;
      }
      case 'text': {
        const codec = new TextCodec(type, requireTrait(type.characters, type, 'text'));
        this.cache.set(type, codec);
        return codec;
      }
      case 'enumeration': {
        const traits = requireTrait(type.enumeration, type, 'enumeration');
        const codec = new EnumerationCodec(type, traits.underlying);
        this.cache.set(type, codec);
        return codec;
      }
      case 'sequence': {
        const traits = requireTrait(type.iteration, type, 'iteration');
        const element = this.compile(traits.element, `${location} element`, className);
        const codec = new SequenceCodec(type, element, traits.container);
        this.cache.set(type, codec);
        return codec;
      }
      case 'ownership-pointer': {
        const traits = requireTrait(type.ownership, type, 'ownership');
        const element = this.compile(traits.element, `${location} pointee`, className);
        const codec = new PointerCodec(type, element, traits.sharing);
        this.cache.set(type, codec);
        return codec;
      }
      case 'record':
        return this.compileRecord(type, location, className);
    }
  }

  get size(): number {
    return this.cache.size;
  }

  private compileRecord(type: NativeType, location: string, className?: string): ValueCodec {
    const composite = requireTrait(type.composite, type, 'composite');
    const create = composite.create;
    if (!create) {
      throw new BuildError(
        `${location}: record '${type.name}' is used by value but has no default constructor`,
        className,
      );
    }

    const codec = new RecordCodec(type, composite, create);
    this.cache.set(type, codec);
    codec.attachFields(
      composite.fields().map((descriptor) => ({
        descriptor,
        codec: this.compile(descriptor.type, `${type.name}.${descriptor.name}`, className),
      })),
    );
    return codec;
  }
}

function requireTrait<T>(trait: T | undefined, type: NativeType, what: string): T {
  if (trait === undefined) {
    throw new BuildError(`type '${type.name}' is missing its ${what} traits`);
  }
  return trait;
}
