/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @classbridge/quickjs
 *
 * Host classes bound into a QuickJS-in-WASM context.
 */

export { BridgeHost, ScriptError, createBridgeHost } from './host.js';
export { QuickJSRuntimeAdapter } from './runtime.js';
export type { BridgeHostConfig, RuntimeLimits, ScriptResult, LogEntry } from './types.js';
export { DEFAULT_LIMITS } from './types.js';
