/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Types for @classbridge/quickjs
 */

import type { BindingOptions, SignatureRegistry } from '@classbridge/core';

/** Resource limits for script execution */
export interface RuntimeLimits {
  /** Maximum heap memory in bytes (default: 64MB) */
  memoryBytes?: number;
  /** Maximum execution time per eval in milliseconds (default: 30000) */
  timeoutMs?: number;
  /** Maximum stack size in bytes (default: 512KB) */
  maxStackBytes?: number;
}

/** Configuration for creating a bridge host */
export interface BridgeHostConfig {
  /** Resource limits */
  limits?: RuntimeLimits;
  /** Binding generation options */
  binding?: BindingOptions;
  /** Registry to record bound classes in; a fresh one by default */
  registry?: SignatureRegistry;
}

/** Result of script execution */
export interface ScriptResult {
  /** Completion value, dumped to a host value */
  value: unknown;
  /** Console output captured during execution */
  logs: LogEntry[];
  /** Execution time in milliseconds */
  durationMs: number;
}

/** A captured console log entry */
export interface LogEntry {
  level: 'log' | 'warn' | 'error' | 'info';
  args: unknown[];
  timestamp: number;
}

/** Default resource limits */
export const DEFAULT_LIMITS: Required<RuntimeLimits> = {
  memoryBytes: 64 * 1024 * 1024,     // 64 MB
  timeoutMs: 30_000,                   // 30 seconds
  maxStackBytes: 512 * 1024,           // 512 KB
};
