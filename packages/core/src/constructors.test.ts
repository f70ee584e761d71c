/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect, vi } from 'vitest';
import { ConstructorResolver } from './constructors.js';
import { CodecCompiler } from './conversion/compiler.js';
import { BuildError, ConstructorResolutionError } from './errors.js';
import { t } from './native/standard-types.js';
import { DirectRuntime } from './runtime/direct-runtime.js';
import type { ConstructorDescriptor } from './types.js';
import { LifetimeManager } from './wrapper.js';

class Rectangle {
  constructor(
    readonly width = 0,
    readonly height = 0,
    readonly label = '',
  ) {}
}

const runtime = new DirectRuntime();

function resolver(constructors: ConstructorDescriptor<Rectangle>[], lifetime = new LifetimeManager<Rectangle>('Rectangle')) {
  return ConstructorResolver.compile('Rectangle', constructors, new CodecCompiler(), lifetime);
}

const sized: ConstructorDescriptor<Rectangle> = {
  params: [{ type: t.float, name: 'w' }, { type: t.float, name: 'h' }],
  create: (args) => new Rectangle(args.number(0), args.number(1)),
};

describe('ConstructorResolver', () => {
  it('constructs with a matching arity', () => {
    const lifetime = new LifetimeManager<Rectangle>('Rectangle');
    const wrapper = resolver([sized], lifetime).construct(runtime, [2, 5], 1);
    expect(wrapper.state).toBe('constructed');
    expect(wrapper.owns).toBe(true);
    expect(wrapper.pointer?.width).toBe(2);
    expect(wrapper.pointer?.height).toBe(5);
    expect(lifetime.liveCount).toBe(1);
  });

  it('rejects an arity no constructor declares', () => {
    const lifetime = new LifetimeManager<Rectangle>('Rectangle');
    const construct = () => resolver([sized], lifetime).construct(runtime, [2], 1);
    expect(construct).toThrow(ConstructorResolutionError);
    expect(construct).toThrow('No matching constructor for Rectangle with 1 argument (accepted argument counts: 2)');
    expect(lifetime.liveCount).toBe(0);
  });

  it('rejects zero arguments without a default constructor', () => {
    expect(() => resolver([sized]).construct(runtime, [], 1)).toThrow(
      'No matching constructor for Rectangle with 0 arguments (no default constructor)',
    );
  });

  it('uses the default constructor for zero arguments', () => {
    const wrapper = resolver([sized, { params: [], create: () => new Rectangle(1, 1) }]).construct(runtime, [], 1);
    expect(wrapper.pointer?.width).toBe(1);
  });

  it('reports conversion failures and discards the wrapper', () => {
    const create = vi.fn(() => new Rectangle());
    const lifetime = new LifetimeManager<Rectangle>('Rectangle');
    const construct = () =>
      resolver([{ params: sized.params, create }], lifetime).construct(runtime, [2, 'tall'], 1);

    expect(construct).toThrow('No matching constructor for Rectangle with 2 arguments (argument 2: expected number, got string)');
    expect(create).not.toHaveBeenCalled();
    expect(lifetime.liveCount).toBe(0);
  });

  it('picks the first declared constructor of an arity', () => {
    const labelled: ConstructorDescriptor<Rectangle> = {
      params: [{ type: t.string }, { type: t.string }],
      create: (args) => new Rectangle(0, 0, args.string(0) + args.string(1)),
    };
    const wrapper = resolver([sized, labelled]).construct(runtime, [3, 4], 1);
    expect(wrapper.pointer?.width).toBe(3);

    // Later same-arity constructors are never tried
    expect(() => resolver([sized, labelled]).construct(runtime, ['a', 'b'], 2)).toThrow(ConstructorResolutionError);
  });

  it('discards the wrapper when the native constructor throws', () => {
    const lifetime = new LifetimeManager<Rectangle>('Rectangle');
    const failing: ConstructorDescriptor<Rectangle> = {
      params: [{ type: t.int }],
      create: () => {
        throw new RangeError('negative size');
      },
    };
    expect(() => resolver([failing], lifetime).construct(runtime, [-1], 1)).toThrow('negative size');
    expect(lifetime.liveCount).toBe(0);
  });

  it('lists accepted arities', () => {
    expect(resolver([sized, { params: [], create: () => new Rectangle() }]).arities).toEqual([0, 2]);
  });

  it('requires at least one constructor', () => {
    expect(() => resolver([])).toThrow(BuildError);
    expect(() => resolver([])).toThrow('Rectangle: declares no constructor; foreign code could never create it');
  });

  it('rejects two default constructors', () => {
    const fallback = { params: [], create: () => new Rectangle() };
    expect(() => resolver([fallback, fallback])).toThrow('Rectangle: declares more than one default constructor');
  });
});
