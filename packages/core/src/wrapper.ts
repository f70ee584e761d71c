/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Wrapper & lifetime management
 *
 * A wrapper couples a native object with the foreign handle token the
 * runtime identifies it by. Lifecycle:
 *
 *   allocated ──construct──▶ constructed ──finalize──▶ collected
 *       └────────────────finalize (discarded)──────────────┘
 */

import { createLogger } from './logger.js';

const log = createLogger('Lifetime');

export type WrapperState = 'allocated' | 'constructed' | 'collected';

export class Wrapper<T = unknown> {
  private native: T | null = null;
  private owning = false;
  private current: WrapperState = 'allocated';

  constructor(
    readonly className: string,
    readonly handle: number,
  ) {}

  get state(): WrapperState {
    return this.current;
  }

  /** True when finalization destroys the native object */
  get owns(): boolean {
    return this.owning;
  }

  /** The native object, or null before construction and after finalization */
  get pointer(): T | null {
    return this.native;
  }

  /** @internal */
  attach(native: T, owns: boolean): void {
    this.native = native;
    this.owning = owns;
    this.current = 'constructed';
  }

  /** @internal */
  detach(): void {
    this.native = null;
    this.owning = false;
    this.current = 'collected';
  }
}

/**
 * Tracks the live wrappers of one bound class and runs its destructor hook
 * when an owning wrapper is finalized.
 */
export class LifetimeManager<T> {
  private readonly live = new Set<Wrapper<T>>();

  constructor(
    readonly className: string,
    private readonly destroy?: (native: T) => void,
  ) {}

  allocate(handle: number): Wrapper<T> {
    const wrapper = new Wrapper<T>(this.className, handle);
    this.live.add(wrapper);
    return wrapper;
  }

  construct(wrapper: Wrapper<T>, native: T, owns: boolean): void {
    if (wrapper.state !== 'allocated') {
      throw new Error(`${this.className} wrapper #${wrapper.handle} is already ${wrapper.state}`);
    }
    wrapper.attach(native, owns);
  }

  finalize(wrapper: Wrapper<T>): void {
    if (wrapper.state === 'collected') {
      log.warn(`wrapper #${wrapper.handle} finalized twice; ignoring`, {
        operation: 'finalize',
        className: this.className,
      });
      return;
    }

    const native = wrapper.pointer;
    const owns = wrapper.owns;
    wrapper.detach();
    this.live.delete(wrapper);

    if (owns && native !== null && this.destroy) {
      try {
        this.destroy(native);
      } catch (error) {
        log.error(`destructor failed for wrapper #${wrapper.handle}`, error, {
          operation: 'finalize',
          className: this.className,
        });
      }
    }
  }

  get liveCount(): number {
    return this.live.size;
  }

  /** Finalize every wrapper still alive; returns how many there were */
  finalizeAll(): number {
    const remaining = [...this.live];
    for (const wrapper of remaining) {
      this.finalize(wrapper);
    }
    return remaining.length;
  }
}
