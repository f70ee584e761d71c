/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  ArityError,
  BuildError,
  ConstructorResolutionError,
  ConversionError,
  InvalidObjectError,
} from './errors.js';
import { describeClass } from './introspection/builder.js';
import { t } from './native/standard-types.js';
import { BindingGenerator } from './orchestrator.js';
import { SignatureRegistry } from './registry/registry.js';
import { DirectRuntime } from './runtime/direct-runtime.js';
import type { ClassShape } from './types.js';

// ── fixtures ─────────────────────────────────────────────────

class Point {
  x = 0;
  y = 0;

  distanceFromOrigin(): number {
    return Math.sqrt(this.x * this.x + this.y * this.y);
  }
}

const PointShape = describeClass('Point', Point)
  .field('x', t.float)
  .field('y', t.float)
  .defaultConstructor()
  .method('distance_from_origin', { returns: t.float }, (p) => p.distanceFromOrigin())
  .build();

class Printer {
  lastOutput = '';
}

const PrinterShape = describeClass('Printer', Printer)
  .field('last_output', t.string, { get: (p) => p.lastOutput, set: (p, value) => (p.lastOutput = String(value)) })
  .defaultConstructor()
  .method('print', { params: [t.int] }, (p, args) => {
    p.lastOutput = `int: ${args.number(0)}`;
  })
  .method('print', { params: [t.double] }, (p, args) => {
    p.lastOutput = `double: ${args.number(0)}`;
  })
  .method('print', { params: [t.named('const std::string&', t.string)] }, (p, args) => {
    p.lastOutput = `string: ${args.string(0)}`;
  })
  .build();

class Rectangle {
  constructor(
    readonly width: number,
    readonly height: number,
  ) {}
}

const RectangleShape = describeClass('Rectangle', Rectangle)
  .field('width', t.float, { get: (r) => r.width, set: () => {} })
  .field('height', t.float, { get: (r) => r.height, set: () => {} })
  .constructs([{ type: t.float, name: 'w' }, { type: t.float, name: 'h' }], (args) => new Rectangle(args.number(0), args.number(1)))
  .method('area', { returns: t.float }, (r) => r.width * r.height)
  .build();

// ── foreign-side helpers ─────────────────────────────────────

function construct(module: Record<string, unknown>, name: string, ...args: unknown[]): object {
  const ctor = module[name];
  if (typeof ctor !== 'function') throw new Error(`${name} is not bound`);
  const instance: unknown = Reflect.construct(ctor, args);
  if (typeof instance !== 'object' || instance === null) throw new Error(`${name} did not construct an object`);
  return instance;
}

function call(target: object, name: string, ...args: unknown[]): unknown {
  const method: unknown = Reflect.get(target, name);
  if (typeof method !== 'function') throw new Error(`${name} is not a method`);
  return Reflect.apply(method, target, args);
}

function setup(shapes: readonly ClassShape[] = [PointShape, PrinterShape, RectangleShape]) {
  const runtime = new DirectRuntime();
  const generator = new BindingGenerator();
  const module: Record<string, unknown> = {};
  const report = generator.bindModule(runtime, module, shapes);
  return { runtime, generator, module, report };
}

afterEach(() => {
  vi.restoreAllMocks();
});

// ── scenarios ────────────────────────────────────────────────

describe('Point', () => {
  it('computes the distance from the origin', () => {
    const { module } = setup();
    const point = construct(module, 'Point');
    Reflect.set(point, 'x', 3);
    Reflect.set(point, 'y', 4);
    expect(call(point, 'distance_from_origin')).toBe(5);
  });

  it('exposes fields as properties', () => {
    const { module } = setup();
    const point = construct(module, 'Point');
    Reflect.set(point, 'x', 0.1);
    expect(Reflect.get(point, 'x')).toBe(Math.fround(0.1));
    expect(Reflect.get(point, 'y')).toBe(0);
  });

  it('rejects field values of the wrong type', () => {
    const { module } = setup();
    const point = construct(module, 'Point');
    expect(() => Reflect.set(point, 'x', 'three')).toThrow(ConversionError);
    expect(() => Reflect.set(point, 'x', 'three')).toThrow('Point.x: expected number, got string');
    expect(Reflect.get(point, 'x')).toBe(0);
  });
});

describe('Printer', () => {
  it('exposes overloads under distinct names', () => {
    const { module, generator } = setup();
    expect(generator.bind(PrinterShape).methodNames).toEqual(['print_int', 'print_double', 'print_string']);

    const printer = construct(module, 'Printer');
    expect(Reflect.get(printer, 'print')).toBeUndefined();

    call(printer, 'print_int', 42);
    expect(Reflect.get(printer, 'last_output')).toBe('int: 42');
    call(printer, 'print_double', 3.14);
    expect(Reflect.get(printer, 'last_output')).toBe('double: 3.14');
    call(printer, 'print_string', 'hello');
    expect(Reflect.get(printer, 'last_output')).toBe('string: hello');
  });

  it('does not coerce strings into the double overload', () => {
    const { module } = setup();
    const printer = construct(module, 'Printer');
    expect(() => call(printer, 'print_double', 'hello')).toThrow(ConversionError);
    expect(() => call(printer, 'print_double', 'hello')).toThrow(
      'Printer.print_double argument 1: expected number, got string',
    );
    expect(Reflect.get(printer, 'last_output')).toBe('');
  });

  it('returns the absent value from void methods', () => {
    const { module } = setup();
    expect(call(construct(module, 'Printer'), 'print_int', 1)).toBeUndefined();
  });
});

describe('Rectangle', () => {
  it('rejects construction with one argument', () => {
    const { module } = setup();
    expect(() => construct(module, 'Rectangle', 3)).toThrow(ConstructorResolutionError);
    expect(() => construct(module, 'Rectangle', 3)).toThrow(
      'No matching constructor for Rectangle with 1 argument (accepted argument counts: 2)',
    );
  });

  it('constructs with two arguments', () => {
    const { module } = setup();
    const rectangle = construct(module, 'Rectangle', 2, 5);
    expect(call(rectangle, 'area')).toBe(10);
  });

  it('rejects zero-argument construction', () => {
    const { module } = setup();
    expect(() => construct(module, 'Rectangle')).toThrow(
      'No matching constructor for Rectangle with 0 arguments (no default constructor)',
    );
  });

  it('leaves no wrapper behind after a failed construction', () => {
    const { module, generator } = setup();
    expect(() => construct(module, 'Rectangle', 1, 'tall')).toThrow(ConstructorResolutionError);
    expect(generator.bind(RectangleShape).lifetime.liveCount).toBe(0);
  });
});

// ── thunk behaviour ──────────────────────────────────────────

describe('method thunks', () => {
  it('checks arity before converting or invoking', () => {
    const invoke = vi.fn();
    class Counter {}
    const shape = describeClass('Counter', Counter)
      .defaultConstructor()
      .method('add', { params: [t.int, t.int] }, invoke)
      .build();
    const { module, runtime } = setup([shape]);
    const kindOf = vi.spyOn(runtime, 'kindOf');

    const counter = construct(module, 'Counter');
    expect(() => call(counter, 'add', 1)).toThrow(ArityError);
    expect(() => call(counter, 'add', 1, 2, 3)).toThrow('Counter.add expects 2 arguments, got 3');
    expect(kindOf).not.toHaveBeenCalled();
    expect(invoke).not.toHaveBeenCalled();
  });

  it('converts arguments left to right and stops at the first failure', () => {
    const invoke = vi.fn();
    class Mixer {}
    const shape = describeClass('Mixer', Mixer)
      .defaultConstructor()
      .method('mix', { params: [t.int, t.string, t.bool] }, invoke)
      .build();
    const { module, runtime } = setup([shape]);
    const kindOf = vi.spyOn(runtime, 'kindOf');

    expect(() => call(construct(module, 'Mixer'), 'mix', 1, 2, 'not-a-bool')).toThrow(
      'Mixer.mix argument 2: expected string, got number',
    );
    expect(kindOf.mock.calls.map(([value]) => value)).toEqual([1, 2]);
    expect(invoke).not.toHaveBeenCalled();
  });

  it('raises InvalidObjectError on a receiver without a wrapper', () => {
    const { module } = setup();
    const ctor = module.Point;
    if (typeof ctor !== 'function') throw new Error('Point is not bound');
    const prototype: unknown = Reflect.get(ctor, 'prototype');
    if (typeof prototype !== 'object' || prototype === null) throw new Error('no prototype');

    const impostor: object = Object.create(prototype);
    expect(() => call(impostor, 'distance_from_origin')).toThrow(InvalidObjectError);
    expect(() => Reflect.get(impostor, 'x')).toThrow('Invalid Point object: native instance is missing or already finalized');
  });

  it('raises InvalidObjectError after finalization', () => {
    const { module, runtime } = setup();
    const point = construct(module, 'Point');
    runtime.dispose();
    expect(() => call(point, 'distance_from_origin')).toThrow(InvalidObjectError);
  });

  it('binds static methods on the constructor', () => {
    class MathUtil {}
    const shape = describeClass('MathUtil', MathUtil)
      .defaultConstructor()
      .staticMethod('clamp', { params: [t.int, t.int, t.int], returns: t.int }, (args) =>
        Math.min(Math.max(args.number(0), args.number(1)), args.number(2)),
      )
      .staticMethod('scale', { params: [t.int], returns: t.int }, (args) => args.number(0) * 2)
      .staticMethod('scale', { params: [t.double], returns: t.double }, (args) => args.number(0) * 2.5)
      .build();
    const { module } = setup([shape]);
    const ctor = module.MathUtil;
    if (typeof ctor !== 'function') throw new Error('MathUtil is not bound');

    expect(call(ctor, 'clamp', 15, 0, 10)).toBe(10);
    expect(call(ctor, 'scale_int', 3)).toBe(6);
    expect(call(ctor, 'scale_double', 2)).toBe(5);
    expect(() => call(ctor, 'clamp', 1)).toThrow('MathUtil.clamp expects 3 arguments, got 1');
  });
});

describe('nested records', () => {
  class Vec {
    x = 0;
    y = 0;
  }
  const VecShape = describeClass('Vec', Vec).field('x', t.double).field('y', t.double).defaultConstructor().build();

  class Segment {
    start = new Vec();
    end = new Vec();

    length(): number {
      return Math.hypot(this.end.x - this.start.x, this.end.y - this.start.y);
    }
  }
  const SegmentShape = describeClass('Segment', Segment)
    .field('start', VecShape)
    .field('end', VecShape)
    .defaultConstructor()
    .method('length', { returns: t.double }, (s) => s.length())
    .build();

  it('reads nested records as value copies', () => {
    const { module } = setup([SegmentShape]);
    const segment = construct(module, 'Segment');
    const start = Reflect.get(segment, 'start');
    expect(start).toEqual({ x: 0, y: 0 });

    // Mutating the copy leaves the native untouched
    if (typeof start === 'object' && start !== null) Reflect.set(start, 'x', 9);
    expect(Reflect.get(segment, 'start')).toEqual({ x: 0, y: 0 });
  });

  it('writes nested records by value', () => {
    const { module } = setup([SegmentShape]);
    const segment = construct(module, 'Segment');
    Reflect.set(segment, 'end', { x: 3, y: 4 });
    expect(call(segment, 'length')).toBe(5);
    expect(() => Reflect.set(segment, 'end', { x: 3 })).toThrow("Segment.end: missing field 'y'");
  });
});

// ── orchestration ────────────────────────────────────────────

describe('BindingGenerator', () => {
  it('generates one binding per shape', () => {
    const generator = new BindingGenerator();
    expect(generator.bind(PointShape)).toBe(generator.bind(PointShape));
    expect(generator.generated).toHaveLength(1);
  });

  it('registers bound classes and reports additions', () => {
    const { report, generator, module } = setup();
    expect(report).toEqual({ bound: ['Point', 'Printer', 'Rectangle'], added: ['Point', 'Printer', 'Rectangle'], changed: [] });
    expect(generator.registry.get('Point')?.foreignType).toBe(module.Point);
    expect(generator.registry.get('Point')?.signature).toBe(
      'class:Point|fields:float x,float y|methods:distance_from_origin',
    );
    expect(generator.needsRegeneration(PointShape)).toBe(false);
  });

  it('reports classes whose signature changed', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const registry = new SignatureRegistry();
    registry.register('Point', 'class:Point|fields:float x|methods:');

    const generator = new BindingGenerator(registry);
    expect(generator.needsRegeneration(PointShape)).toBe(true);

    const report = generator.bindModule(new DirectRuntime(), {}, [PointShape]);
    expect(report.changed).toEqual(['Point']);
    expect(report.added).toEqual([]);
    expect(warn).toHaveBeenCalledWith(
      '[Orchestrator] bindModule (Point) signature changed since last registration; existing objects are unaffected',
    );
  });

  it('includes content hashes in signatures', () => {
    const generator = new BindingGenerator(undefined, { contentHashes: { Point: 'v2' } });
    expect(generator.bind(PointShape).signature).toBe(
      'hash:v2|class:Point|fields:float x,float y|methods:distance_from_origin',
    );
  });

  it('rejects a module target that cannot hold members', () => {
    const generator = new BindingGenerator();
    expect(() => generator.bindModule(new DirectRuntime(), 42, [PointShape])).toThrow(
      'module target must be an object or function, got number',
    );
    expect(generator.registry.has('Point')).toBe(false);

    const module: Record<string, unknown> = {};
    expect(generator.bindModule(new DirectRuntime(), module, [PointShape]).bound).toEqual(['Point']);
    expect(typeof module.Point).toBe('function');
  });

  it('leaves the binding retryable when exposing a class fails', () => {
    const generator = new BindingGenerator();
    expect(() => generator.bindModule(new DirectRuntime(), Object.freeze({}), [PointShape])).toThrow(TypeError);
    expect(generator.registry.has('Point')).toBe(false);
    expect(generator.bind(PointShape).isDefined).toBe(false);

    expect(generator.bindModule(new DirectRuntime(), {}, [PointShape]).added).toEqual(['Point']);
  });

  it('sets the foreign type once', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const generator = new BindingGenerator();
    generator.bindModule(new DirectRuntime(), {}, [PointShape]);
    expect(() => generator.bindModule(new DirectRuntime(), {}, [PointShape])).toThrow(
      'Point: is already defined in a foreign runtime by this generator',
    );
    expect(error).not.toHaveBeenCalled();
  });

  it('rejects duplicate class names in one module', () => {
    expect(() => new BindingGenerator().bindModule(new DirectRuntime(), {}, [PointShape, PointShape])).toThrow(
      'Point: bound twice in the same module',
    );
  });

  it('fails the build for unclassifiable members', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    class Window {}
    const shape = describeClass('Window', Window)
      .field('handle', { name: 'HWND' })
      .defaultConstructor()
      .build();

    expect(() => new BindingGenerator().bind(shape)).toThrow(BuildError);
    expect(() => new BindingGenerator().bind(shape)).toThrow(
      "Window: field 'handle': type 'HWND' cannot be classified; it has no bindable traits",
    );
    expect(error).toHaveBeenCalled();
  });

  it('rejects a method named like a field', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    class Box {
      size = 0;
    }
    const shape = describeClass('Box', Box)
      .field('size', t.int)
      .defaultConstructor()
      .method('size', { returns: t.int }, (b) => b.size)
      .build();
    expect(() => new BindingGenerator().bind(shape)).toThrow("Box: foreign name 'size' of size() collides with field 'size'");
  });

  it('runs the destructor hook when the runtime is disposed', () => {
    const destroyed: number[] = [];
    class Resource {
      static nextId = 1;
      readonly id = Resource.nextId++;
    }
    const shape = describeClass('Resource', Resource)
      .field('id', t.int, { get: (r) => r.id, set: () => {} })
      .defaultConstructor()
      .destroy((r) => destroyed.push(r.id))
      .build();
    const { module, runtime, generator } = setup([shape]);

    const first = construct(module, 'Resource');
    const second = construct(module, 'Resource');
    expect(generator.bind(shape).lifetime.liveCount).toBe(2);
    expect(runtime.liveObjects).toBe(2);
    const ids = [first, second].map((resource) => Reflect.get(resource, 'id'));

    runtime.dispose();
    expect(destroyed).toEqual(ids);
    expect(generator.bind(shape).lifetime.liveCount).toBe(0);
    expect(runtime.liveObjects).toBe(0);
  });
});
