/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { typeSuffixNaming, type OverloadNamingStrategy } from './binder/naming.js';
import { tableIntrospector, type Introspector } from './introspection/contract.js';

/** Configuration for a BindingGenerator */
export interface BindingOptions {
  /** Foreign names for overload groups (default: typeSuffixNaming) */
  overloadNaming?: OverloadNamingStrategy;
  /** Include parameter types of every overload in signatures (default: false) */
  methodParameterTypes?: boolean;
  /** Externally computed implementation hashes, keyed by class name */
  contentHashes?: Readonly<Record<string, string>>;
  /** Shape queries (default: the builder's member tables) */
  introspector?: Introspector;
}

/** Default binding options */
export const DEFAULT_BINDING_OPTIONS: Required<BindingOptions> = {
  overloadNaming: typeSuffixNaming,
  methodParameterTypes: false,
  contentHashes: {},
  introspector: tableIntrospector,
};
