/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Ownership pointers for host classes that model exclusive or shared
 * ownership of a single element.
 */

import type { PointerSharing } from '../types.js';

export abstract class OwningPointer<T> {
  abstract readonly sharing: PointerSharing;

  abstract get(): T | null;

  /** Drop the current element and optionally take ownership of a new one */
  abstract reset(value?: T): void;

  isNull(): boolean {
    return this.get() === null;
  }
}

export class UniquePointer<T> extends OwningPointer<T> {
  readonly sharing = 'unique' as const;

  constructor(private target: T | null = null) {
    super();
  }

  get(): T | null {
    return this.target;
  }

  reset(value?: T): void {
    this.target = value ?? null;
  }

  /** Give up ownership without destroying the element */
  release(): T | null {
    const target = this.target;
    this.target = null;
    return target;
  }
}

interface ControlBlock<T> {
  target: T;
  count: number;
}

export class SharedPointer<T> extends OwningPointer<T> {
  readonly sharing = 'shared' as const;
  private block: ControlBlock<T> | null;

  constructor(target: T | null = null, block?: ControlBlock<T>) {
    super();
    if (block) {
      block.count++;
      this.block = block;
    } else {
      this.block = target === null ? null : { target, count: 1 };
    }
  }

  get(): T | null {
    return this.block ? this.block.target : null;
  }

  /** Number of pointers sharing the element (0 when empty) */
  get useCount(): number {
    return this.block ? this.block.count : 0;
  }

  /** Another owner of the same element */
  share(): SharedPointer<T> {
    return this.block ? new SharedPointer<T>(null, this.block) : new SharedPointer<T>();
  }

  reset(value?: T): void {
    if (this.block) {
      this.block.count--;
    }
    this.block = value === undefined ? null : { target: value, count: 1 };
  }
}

export function isOwningPointer(value: unknown): value is OwningPointer<unknown> {
  return value instanceof OwningPointer;
}
