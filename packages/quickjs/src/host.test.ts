/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { describeClass, t } from '@classbridge/core';
import { BridgeHost, ScriptError, createBridgeHost } from './host.js';

// ── fixtures ─────────────────────────────────────────────────

class Point {
  x = 0;
  y = 0;
}

const PointShape = describeClass('Point', Point)
  .field('x', t.float)
  .field('y', t.float)
  .defaultConstructor()
  .method('distance_from_origin', { returns: t.float }, (p) => Math.sqrt(p.x * p.x + p.y * p.y))
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
  .method('print', { params: [t.string] }, (p, args) => {
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
  .constructs([{ type: t.float }, { type: t.float }], (args) => new Rectangle(args.number(0), args.number(1)))
  .method('area', { returns: t.float }, (r) => r.width * r.height)
  .staticMethod('square', { params: [t.float], returns: t.float }, (args) => args.number(0) * args.number(0))
  .build();

class Polygon {
  vertices: unknown[] = [];
  tags = new Set<string>();
}

const VertexShape = describeClass('Vertex', class Vertex {
  x = 0;
  y = 0;
})
  .field('x', t.double)
  .field('y', t.double)
  .defaultConstructor()
  .build();

const PolygonShape = describeClass('Polygon', Polygon)
  .field('vertices', t.vector(VertexShape))
  .field('tags', t.set(t.string))
  .defaultConstructor()
  .method('vertex_count', { returns: t.int }, (p) => p.vertices.length)
  .build();

// ── tests ────────────────────────────────────────────────────

describe('BridgeHost', () => {
  let host: BridgeHost;

  beforeEach(async () => {
    host = await createBridgeHost();
  });

  afterEach(() => {
    host.dispose();
  });

  it('requires init before use', () => {
    const fresh = new BridgeHost();
    expect(() => fresh.eval('1')).toThrow('BridgeHost not initialized. Call init() first.');
  });

  it('evaluates plain scripts', () => {
    expect(host.eval('1 + 2').value).toBe(3);
  });

  it('captures console output', () => {
    const result = host.eval('console.log("hello", 42); console.warn("careful")');
    expect(result.logs.map(({ level, args }) => ({ level, args }))).toEqual([
      { level: 'log', args: ['hello', 42] },
      { level: 'warn', args: ['careful'] },
    ]);
  });

  describe('Point', () => {
    beforeEach(() => {
      host.expose([PointShape]);
    });

    it('computes the distance from the origin', () => {
      expect(host.eval('const p = new Point(); p.x = 3; p.y = 4; p.distance_from_origin()').value).toBe(5);
    });

    it('stores floats at single precision', () => {
      expect(host.eval('const p = new Point(); p.x = 0.1; p.x').value).toBe(Math.fround(0.1));
    });

    it('rejects field values of the wrong type with a catchable error', () => {
      const result = host.eval(`
        const p = new Point();
        let message;
        try { p.x = 'three'; } catch (e) { message = e.name + ': ' + e.message; }
        [message, p.x]
      `);
      expect(result.value).toEqual(['ConversionError: Point.x: expected number, got string', 0]);
    });

    it('requires new', () => {
      expect(() => host.eval('Point()')).toThrow("Class constructor Point cannot be invoked without 'new'");
    });

    it('supports instanceof and subclassing', () => {
      const result = host.eval(`
        class Labelled extends Point { label() { return 'at ' + this.x; } }
        const p = new Labelled();
        p.x = 2;
        [p instanceof Point, p.label()]
      `);
      expect(result.value).toEqual([true, 'at 2']);
    });

    it('raises InvalidObjectError on an object without a native instance', () => {
      const result = host.eval(`
        const impostor = Object.create(Point.prototype);
        let name;
        try { impostor.distance_from_origin(); } catch (e) { name = e.name; }
        name
      `);
      expect(result.value).toBe('InvalidObjectError');
    });
  });

  describe('Printer', () => {
    beforeEach(() => {
      host.expose([PrinterShape]);
    });

    it('exposes overloads under distinct names', () => {
      const result = host.eval(`
        const p = new Printer();
        const outputs = [];
        p.print_int(42); outputs.push(p.last_output);
        p.print_double(3.14); outputs.push(p.last_output);
        p.print_string('hello'); outputs.push(p.last_output);
        [typeof p.print, outputs]
      `);
      expect(result.value).toEqual(['undefined', ['int: 42', 'double: 3.14', 'string: hello']]);
    });

    it('does not coerce strings into the double overload', () => {
      const result = host.eval(`
        const p = new Printer();
        let message;
        try { p.print_double('hello'); } catch (e) { message = e.name + ': ' + e.message; }
        [message, p.last_output]
      `);
      expect(result.value).toEqual([
        'ConversionError: Printer.print_double argument 1: expected number, got string',
        '',
      ]);
    });

    it('surfaces uncaught binding errors as ScriptError', () => {
      try {
        host.eval('new Printer().print_int()');
        expect.unreachable('script should fail');
      } catch (error) {
        expect(error).toBeInstanceOf(ScriptError);
        if (!(error instanceof ScriptError)) return;
        expect(error.errorName).toBe('ArityError');
        expect(error.message).toBe('Printer.print_int expects 1 argument, got 0');
      }
    });
  });

  describe('Rectangle', () => {
    beforeEach(() => {
      host.expose([RectangleShape], 'shapes');
    });

    it('rejects construction with one argument', () => {
      const result = host.eval(`
        let error;
        try { new shapes.Rectangle(3); } catch (e) { error = [e.name, e.message]; }
        error
      `);
      expect(result.value).toEqual([
        'ConstructorResolutionError',
        'No matching constructor for Rectangle with 1 argument (accepted argument counts: 2)',
      ]);
      expect(host.liveObjects).toBe(0);
    });

    it('constructs with two arguments', () => {
      expect(host.eval('globalThis.r = new shapes.Rectangle(2, 5); r.area()').value).toBe(10);
      expect(host.liveObjects).toBe(1);
    });

    it('binds static methods on the constructor', () => {
      expect(host.eval('shapes.Rectangle.square(3)').value).toBe(9);
    });

    it('keeps the namespace off the global scope', () => {
      expect(host.eval('typeof Rectangle').value).toBe('undefined');
    });
  });

  describe('containers and records', () => {
    beforeEach(() => {
      host.expose([PolygonShape]);
    });

    it('copies arrays of records in and out', () => {
      const result = host.eval(`
        const polygon = new Polygon();
        polygon.vertices = [{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 0, y: 1 }];
        [polygon.vertex_count(), polygon.vertices[1]]
      `);
      expect(result.value).toEqual([3, { x: 1, y: 0 }]);
    });

    it('reports the failing element of a sequence', () => {
      const result = host.eval(`
        const polygon = new Polygon();
        let message;
        try { polygon.vertices = [{ x: 0, y: 0 }, { x: 1 }]; } catch (e) { message = e.message; }
        message
      `);
      expect(result.value).toBe("Polygon.vertices: [1] missing field 'y'");
    });

    it('reads sets as arrays', () => {
      const result = host.eval(`
        const polygon = new Polygon();
        polygon.tags = ['convex', 'convex', 'small'];
        polygon.tags
      `);
      expect(result.value).toEqual(['convex', 'small']);
    });
  });

  it('reports the binding outcome', () => {
    expect(host.expose([PointShape, PrinterShape])).toEqual({
      bound: ['Point', 'Printer'],
      added: ['Point', 'Printer'],
      changed: [],
    });
    expect(host.generator.registry.has('Printer')).toBe(true);
  });

  it('interrupts scripts that run past the timeout', async () => {
    const limited = await createBridgeHost({ limits: { timeoutMs: 50 } });
    try {
      expect(() => limited.eval('while (true) {}')).toThrow(ScriptError);
    } finally {
      limited.dispose();
    }
  });

  it('applies the timeout to jobs queued by a script', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const limited = await createBridgeHost({ limits: { timeoutMs: 50 } });
    try {
      expect(limited.eval("Promise.resolve().then(() => { while (true) {} }); 'queued'").value).toBe('queued');
      expect(warn).toHaveBeenCalledWith(expect.stringMatching(/^\[QuickJS\] eval pending job failed: /));
    } finally {
      limited.dispose();
      warn.mockRestore();
    }
  });
});

describe('BridgeHost lifetime', () => {
  it('finalizes live objects on dispose', async () => {
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

    const host = await createBridgeHost();
    host.expose([shape]);
    host.eval('globalThis.kept = [new Resource(), new Resource()]');
    expect(host.liveObjects).toBe(2);

    host.dispose();
    expect(destroyed.sort()).toEqual([1, 2]);
    expect(host.liveObjects).toBe(0);
  });
});
