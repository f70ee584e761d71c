/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Signature Registry
 *
 * Catalogue of bound classes and their structural signatures, used to tell
 * whether a class changed since it was last registered. Owned by whoever
 * embeds the engine; persist it with snapshot() / restore().
 */

import { createLogger } from '../logger.js';
import { crc32Hex } from './crc32.js';

const log = createLogger('Registry');

export interface ClassMetadata {
  readonly name: string;
  readonly signature: string;
  /** crc32Hex(signature) */
  readonly hash: string;
  /** Runtime-specific foreign constructor, once registered in a runtime */
  readonly foreignType?: unknown;
}

export type RegistrationOutcome = 'new' | 'changed' | 'unchanged';

export interface RegistrySnapshot {
  readonly version: 1;
  readonly classes: readonly { readonly name: string; readonly signature: string; readonly hash: string }[];
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class SignatureRegistry {
  private readonly classes = new Map<string, ClassMetadata>();

  /** Upsert an entry */
  register(name: string, signature: string, foreignType?: unknown): RegistrationOutcome {
    const previous = this.classes.get(name);
    const outcome: RegistrationOutcome = !previous
      ? 'new'
      : previous.signature === signature
        ? 'unchanged'
        : 'changed';

    this.classes.set(name, {
      name,
      signature,
      hash: crc32Hex(signature),
      foreignType: foreignType ?? previous?.foreignType,
    });
    log.debug(`registered ${name} (${outcome})`, undefined, { operation: 'register', className: name });
    return outcome;
  }

  /** True when the class is unknown or its stored signature differs */
  needsRegeneration(name: string, signature: string): boolean {
    const entry = this.classes.get(name);
    return !entry || entry.signature !== signature;
  }

  get(name: string): ClassMetadata | undefined {
    return this.classes.get(name);
  }

  has(name: string): boolean {
    return this.classes.has(name);
  }

  entries(): ClassMetadata[] {
    return [...this.classes.values()];
  }

  get size(): number {
    return this.classes.size;
  }

  setForeignType(name: string, foreignType: unknown): void {
    const entry = this.classes.get(name);
    if (!entry) {
      throw new Error(`Cannot set foreign type of unregistered class '${name}'`);
    }
    this.classes.set(name, { ...entry, foreignType });
  }

  /** Names, signatures and hashes; foreign types belong to one runtime and are left out */
  snapshot(): RegistrySnapshot {
    return {
      version: 1,
      classes: this.entries().map(({ name, signature, hash }) => ({ name, signature, hash })),
    };
  }

  /** Rebuild a registry from snapshot() output, e.g. after JSON.parse */
  static restore(snapshot: unknown): SignatureRegistry {
    if (!isObject(snapshot) || snapshot.version !== 1 || !Array.isArray(snapshot.classes)) {
      throw new Error('Invalid registry snapshot: expected { version: 1, classes: [...] }');
    }

    const registry = new SignatureRegistry();
    snapshot.classes.forEach((entry: unknown, index: number) => {
      if (!isObject(entry) || typeof entry.name !== 'string' || typeof entry.signature !== 'string') {
        throw new Error(`Invalid registry snapshot: entry ${index} needs a name and a signature`);
      }
      registry.register(entry.name, entry.signature);
      const stored = registry.get(entry.name);
      if (typeof entry.hash === 'string' && stored && stored.hash !== entry.hash) {
        log.warn(`snapshot hash for ${entry.name} does not match its signature; using the recomputed hash`, {
          operation: 'restore',
          className: entry.name,
        });
      }
    });
    return registry;
  }
}
