/**
 * Code unit loaders
 *
 * Turn a plugin entry point into an executed module bound to its own
 * namespace. The sandbox loader evaluates the file inside a dedicated
 * node:vm context; the native loader defers to Node's module loader.
 * Neither is a security boundary: they isolate bindings and failures,
 * not privileges.
 */

import fs from "node:fs/promises";
import path from "node:path";
import vm from "node:vm";
import { createRequire } from "node:module";

import type { CodeUnit, CodeUnitLoader, HookCallback, PluginLogger, PluginManagerConfig } from "./types.js";
import type { LoaderKind } from "../utils/config.js";
import { createPluginLogger } from "./pluginApi.js";

// ==================== Sandbox (node:vm) ====================

const INVOKE_BINDING = "__scriptorInvoke";
const INVOKE_SCRIPT = new vm.Script(`${INVOKE_BINDING}()`, { filename: "scriptor:invoke" });

// Kept on the first line so stack traces point at the plugin's own line numbers.
const MODULE_WRAPPER_HEAD = "(function (exports, require, module, __filename, __dirname) {";
const MODULE_WRAPPER_TAIL = "\n}).call(module.exports, module.exports, require, module, __filename, __dirname);";

export interface SandboxLoaderOptions {
  /** Bound on top-level execution, in ms (0 disables) */
  timeoutMs: number;
  /** Module ids the plugin may require(); `node:` prefixes are optional */
  allowedModules: string[];
  /** Builds the console a plugin sees; defaults to the host logger */
  createConsole?: (namespace: string) => PluginLogger;
}

type TimerCallback = (...args: unknown[]) => void;

/**
 * Timers scheduled by one sandboxed plugin. Disposing clears every pending
 * handle and refuses new ones, so a released unit runs no more code.
 */
class SandboxTimers {
  private readonly handles = new Set<NodeJS.Timeout>();
  private disposed = false;

  readonly setTimeout = (callback: TimerCallback, delay?: number, ...args: unknown[]): NodeJS.Timeout | undefined => {
    if (this.disposed) return undefined;
    const handle = setTimeout(() => {
      this.handles.delete(handle);
      callback(...args);
    }, delay);
    this.handles.add(handle);
    return handle;
  };

  readonly setInterval = (callback: TimerCallback, delay?: number, ...args: unknown[]): NodeJS.Timeout | undefined => {
    if (this.disposed) return undefined;
    const handle = setInterval(callback, delay, ...args);
    this.handles.add(handle);
    return handle;
  };

  readonly clear = (handle?: NodeJS.Timeout): void => {
    if (!handle) return;
    this.handles.delete(handle);
    clearTimeout(handle);
  };

  dispose(): void {
    this.disposed = true;
    for (const handle of this.handles) {
      clearTimeout(handle);
    }
    this.handles.clear();
  }
}

class SandboxCodeUnit implements CodeUnit {
  private context: vm.Context | null;

  constructor(
    readonly namespace: string,
    readonly entrypoint: string,
    context: vm.Context,
    private readonly moduleRef: { exports: unknown },
    private readonly timers: SandboxTimers
  ) {
    this.context = context;
  }

  get exports(): unknown {
    return this.moduleRef.exports;
  }

  invoke(fn: HookCallback, args: readonly unknown[], timeoutMs: number = 0): unknown {
    const context = this.context;
    if (!context) {
      throw new Error(`Code unit ${this.namespace} has been released`);
    }
    if (timeoutMs <= 0) {
      return fn(...args);
    }

    // Running the call from inside the context puts it under the vm watchdog,
    // which terminates a synchronous callback that overruns the timeout.
    context[INVOKE_BINDING] = () => fn(...args);
    try {
      return INVOKE_SCRIPT.runInContext(context, { timeout: timeoutMs });
    } finally {
      delete context[INVOKE_BINDING];
    }
  }

  release(): void {
    this.timers.dispose();
    this.context = null;
  }
}

export class SandboxCodeUnitLoader implements CodeUnitLoader {
  readonly kind: LoaderKind = "sandbox";
  private readonly options: SandboxLoaderOptions;

  constructor(options: SandboxLoaderOptions) {
    this.options = options;
  }

  async load(entrypoint: string, namespace: string): Promise<CodeUnit> {
    const code = await fs.readFile(entrypoint, "utf-8");
    const moduleRef: { exports: unknown } = { exports: {} };
    const pluginConsole = (this.options.createConsole ?? createPluginLogger)(namespace);
    const timers = new SandboxTimers();

    const context = vm.createContext(
      {
        module: moduleRef,
        exports: moduleRef.exports,
        require: this.createSandboxRequire(entrypoint),
        __filename: entrypoint,
        __dirname: path.dirname(entrypoint),
        console: {
          log: pluginConsole.info,
          info: pluginConsole.info,
          debug: pluginConsole.debug,
          warn: pluginConsole.warn,
          error: pluginConsole.error,
        },
        setTimeout: timers.setTimeout,
        clearTimeout: timers.clear,
        setInterval: timers.setInterval,
        clearInterval: timers.clear,
        queueMicrotask,
      },
      { name: namespace }
    );

    const script = new vm.Script(`${MODULE_WRAPPER_HEAD}${code}${MODULE_WRAPPER_TAIL}`, {
      filename: entrypoint,
    });
    try {
      script.runInContext(context, this.options.timeoutMs > 0 ? { timeout: this.options.timeoutMs } : {});
    } catch (error) {
      timers.dispose();
      throw error;
    }

    return new SandboxCodeUnit(namespace, entrypoint, context, moduleRef, timers);
  }

  private createSandboxRequire(entrypoint: string): (id: string) => unknown {
    const hostRequire = createRequire(entrypoint);
    const allowed = new Set(this.options.allowedModules);

    return (id: string): unknown => {
      const bare = id.startsWith("node:") ? id.slice("node:".length) : id;
      if (!allowed.has(id) && !allowed.has(bare)) {
        throw new Error(`Module not allowed: ${id}`);
      }
      return hostRequire(id);
    };
  }
}

// ==================== Native (require) ====================

class NativeCodeUnit implements CodeUnit {
  private released = false;

  constructor(
    readonly namespace: string,
    readonly entrypoint: string,
    readonly exports: unknown,
    private readonly evict: () => void
  ) {}

  invoke(fn: HookCallback, args: readonly unknown[]): unknown {
    if (this.released) {
      throw new Error(`Code unit ${this.namespace} has been released`);
    }
    // Node's loader offers no watchdog; callbacks run unbounded.
    return fn(...args);
  }

  release(): void {
    this.released = true;
    this.evict();
  }
}

export class NativeCodeUnitLoader implements CodeUnitLoader {
  readonly kind: LoaderKind = "native";

  async load(entrypoint: string, namespace: string): Promise<CodeUnit> {
    const hostRequire = createRequire(entrypoint);
    const resolved = hostRequire.resolve(entrypoint);

    // A reload must execute the file again, not hand back the cached module.
    delete hostRequire.cache[resolved];
    const loaded: unknown = hostRequire(resolved);

    return new NativeCodeUnit(namespace, resolved, loaded, () => {
      delete hostRequire.cache[resolved];
    });
  }
}

// ==================== Factory ====================

export function createCodeUnitLoader(
  config: Pick<PluginManagerConfig, "loader" | "timeouts" | "allowedModules">
): CodeUnitLoader {
  switch (config.loader) {
    case "sandbox":
      return new SandboxCodeUnitLoader({
        timeoutMs: config.timeouts.load,
        allowedModules: config.allowedModules,
      });
    case "native":
      return new NativeCodeUnitLoader();
  }
}
