/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * BridgeHost: bound host classes inside a QuickJS-in-WASM context.
 *
 * Architecture:
 * - One WASM module loaded per process (shared across hosts)
 * - Each host creates a fresh QuickJS runtime and context
 * - Classes are bound once, during setup, via BindingGenerator
 * - Scripts run synchronously inside QuickJS; every member access on a
 *   bound object crosses the WASM boundary to the host
 * - Memory and CPU limits enforced per-runtime
 */

import {
  getQuickJS,
  type QuickJSContext,
  type QuickJSHandle,
  type QuickJSRuntime,
  type QuickJSWASMModule,
} from 'quickjs-emscripten';
import {
  BindingGenerator,
  createLogger,
  emitDeclarations,
  type ClassShape,
  type ModuleBindingReport,
} from '@classbridge/core';
import { QuickJSRuntimeAdapter, describeError } from './runtime.js';
import type { BridgeHostConfig, LogEntry, RuntimeLimits, ScriptResult } from './types.js';
import { DEFAULT_LIMITS } from './types.js';

const log = createLogger('QuickJS');

/** Cached WASM module promise: deduplicates concurrent init calls */
let modulePromise: Promise<QuickJSWASMModule> | null = null;

function getModule(): Promise<QuickJSWASMModule> {
  if (!modulePromise) {
    modulePromise = getQuickJS();
  }
  return modulePromise;
}

export class BridgeHost {
  private runtime: QuickJSRuntime | null = null;
  private vm: QuickJSContext | null = null;
  private adapter: QuickJSRuntimeAdapter | null = null;
  private logs: LogEntry[] = [];
  private readonly limits: Required<RuntimeLimits>;
  /** Mutable start time: updated by eval(), read by interrupt handler */
  private evalStartTime = 0;

  readonly generator: BindingGenerator;

  constructor(config: BridgeHostConfig = {}) {
    this.limits = { ...DEFAULT_LIMITS, ...config.limits };
    this.generator = new BindingGenerator(config.registry, config.binding);
  }

  /** Initialize the host (loads WASM module if not cached) */
  async init(): Promise<void> {
    const module = await getModule();
    this.runtime = module.newRuntime();

    this.runtime.setMemoryLimit(this.limits.memoryBytes);
    this.runtime.setMaxStackSize(this.limits.maxStackBytes);

    // CPU limit via interrupt handler: reads instance field set by eval()
    const timeoutMs = this.limits.timeoutMs;
    this.runtime.setInterruptHandler(() => {
      if (this.evalStartTime > 0 && Date.now() - this.evalStartTime > timeoutMs) {
        return true;
      }
      return false;
    });

    this.vm = this.runtime.newContext();
    this.logs = buildConsole(this.vm);
    this.adapter = new QuickJSRuntimeAdapter(this.vm);
  }

  /**
   * Bind classes and expose them as globals, or as members of the global
   * object `namespace` (created when missing).
   */
  expose(shapes: readonly ClassShape[], namespace?: string): ModuleBindingReport {
    const { vm, adapter } = this.ready();

    if (namespace === undefined) {
      return this.generator.bindModule(adapter, vm.global, shapes);
    }

    const target = adapter.property(vm.global, namespace) ?? vm.newObject();
    if (adapter.kindOf(target) !== 'object') {
      target.dispose();
      throw new Error(`Global '${namespace}' exists and is not an object`);
    }
    try {
      const report = this.generator.bindModule(adapter, target, shapes);
      vm.setProp(vm.global, namespace, target);
      return report;
    } finally {
      target.dispose();
    }
  }

  /** Execute a script and run the jobs it queued (promises, finalizers) */
  eval(code: string, filename = 'script.js'): ScriptResult {
    const { vm } = this.ready();

    // Clear previous logs
    this.logs.length = 0;

    // Queued jobs run inside the same timed window as the script
    this.evalStartTime = Date.now();
    const result = vm.evalCode(code, filename);
    this.executePendingJobs();
    const durationMs = Date.now() - this.evalStartTime;
    this.evalStartTime = 0;

    if (result.error) {
      const errorData = vm.dump(result.error);
      result.error.dispose();
      throw new ScriptError(describeError(errorData), errorNameOf(errorData), [...this.logs], durationMs);
    }

    const value: unknown = vm.dump(result.value);
    result.value.dispose();

    return {
      value,
      logs: [...this.logs],
      durationMs,
    };
  }

  /** TypeScript declarations for every class bound so far */
  declarations(namespace?: string): string {
    return emitDeclarations(this.generator.generated, { namespace });
  }

  /** Bound objects alive in the VM */
  get liveObjects(): number {
    return this.adapter?.liveObjects ?? 0;
  }

  /** Finalize bound objects and free WASM memory */
  dispose(): void {
    if (this.adapter) {
      this.adapter.dispose();
      this.adapter = null;
    }
    if (this.vm) {
      this.vm.dispose();
      this.vm = null;
    }
    if (this.runtime) {
      this.runtime.dispose();
      this.runtime = null;
    }
  }

  private executePendingJobs(): void {
    if (!this.runtime || !this.vm) return;
    const jobs = this.runtime.executePendingJobs();
    if (jobs.error) {
      const errorData = this.vm.dump(jobs.error);
      jobs.error.dispose();
      log.warn(`pending job failed: ${describeError(errorData)}`, { operation: 'eval' });
    }
  }

  private ready(): { vm: QuickJSContext; adapter: QuickJSRuntimeAdapter } {
    if (!this.vm || !this.adapter) {
      throw new Error('BridgeHost not initialized. Call init() first.');
    }
    return { vm: this.vm, adapter: this.adapter };
  }
}

/** Error thrown when a script fails; `errorName` is the name of the VM error */
export class ScriptError extends Error {
  constructor(
    message: string,
    public readonly errorName: string,
    public readonly logs: LogEntry[],
    public readonly durationMs: number,
  ) {
    super(message);
    this.name = 'ScriptError';
  }
}

/**
 * Create and initialize a bridge host.
 *
 * Usage:
 *   const host = await createBridgeHost({ limits: { timeoutMs: 1000 } })
 *   host.expose([PointShape], 'geo')
 *   const result = host.eval('new geo.Point().x')
 *   host.dispose()
 */
export async function createBridgeHost(config?: BridgeHostConfig): Promise<BridgeHost> {
  const host = new BridgeHost(config);
  await host.init();
  return host;
}

function errorNameOf(errorData: unknown): string {
  return typeof errorData === 'object' && errorData !== null && 'name' in errorData
    ? String(errorData.name)
    : 'Error';
}

// ── Console ──────────────────────────────────────────────────

function buildConsole(vm: QuickJSContext): LogEntry[] {
  const logs: LogEntry[] = [];
  const consoleHandle = vm.newObject();

  for (const level of ['log', 'warn', 'error', 'info'] as const) {
    const fn = vm.newFunction(level, (...args: QuickJSHandle[]) => {
      const nativeArgs = args.map((a) => vm.dump(a));
      logs.push({ level, args: nativeArgs, timestamp: Date.now() });
    });
    vm.setProp(consoleHandle, level, fn);
    fn.dispose();
  }

  vm.setProp(vm.global, 'console', consoleHandle);
  consoleHandle.dispose();
  return logs;
}
