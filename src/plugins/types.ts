/**
 * Scriptor Plugin Type Definitions
 *
 * A plugin is a directory under the plugins root holding a `plugin-main.js`
 * entry point. The entry point exports `register(api)`, which attaches
 * callbacks to named hooks through the {@link PluginApi} capability object.
 */

import type { LoaderKind } from "../utils/config.js";

// ==================== Constants ====================

/** Registration entry point every plugin directory and package must contain */
export const PLUGIN_ENTRYPOINT = "plugin-main.js";

/** Name of the function the entry point must export */
export const REGISTER_EXPORT = "register";

/** Host identity exposed to plugins as `api.appName` */
export const HOST_APP_NAME = "Scriptor";

/** Extension used by `pack` for distributable plugin packages */
export const PACKAGE_EXTENSION = ".scpl";

/**
 * Namespace a plugin's code unit is bound to; two plugins declaring the
 * same top-level names never see each other's bindings.
 */
export function pluginNamespace(name: string): string {
  return `scriptor_plugin_${name}`;
}

// ==================== Hook Events ====================

/**
 * Hook fired after the editor opens a file
 */
export interface OpenEvent {
  kind: "open";
  path: string;
}

/**
 * Hook fired after the editor saves a file
 */
export interface SaveEvent {
  kind: "save";
  path: string;
}

/**
 * Free-form host event with a keyword payload
 */
export interface GenericEvent {
  kind: "event";
  name: string;
  payload: Record<string, unknown>;
}

/** Hooks the host fires, keyed by hook name */
export interface HostHookEvents {
  on_open: OpenEvent;
  on_save: SaveEvent;
  on_event: GenericEvent;
}

export type HostHookName = keyof HostHookEvents;

export type HostEvent = HostHookEvents[HostHookName];

/**
 * Callback a plugin attaches to a hook. Plugins are plain JavaScript, so the
 * host never trusts this shape: stored values are checked with
 * {@link isHookCallback} when the hook fires.
 */
export type HookCallback = (...args: unknown[]) => unknown;

export function isHookCallback(value: unknown): value is HookCallback {
  return typeof value === "function";
}

// ==================== Code Units ====================

/**
 * Executed plugin module. Owned by exactly one {@link PluginRecord}.
 */
export interface CodeUnit {
  /** Namespace the module was evaluated in */
  readonly namespace: string;
  /** Absolute path of the executed entry point */
  readonly entrypoint: string;
  /** Whatever the module assigned to `module.exports` */
  readonly exports: unknown;
  /**
   * Call a function belonging to this unit. A positive `timeoutMs` bounds
   * synchronous execution where the implementation can enforce it.
   */
  invoke(fn: HookCallback, args: readonly unknown[], timeoutMs?: number): unknown;
  /** Drop the module so it can be collected; later invokes throw. */
  release(): void;
}

/**
 * Turns an entry point file into a {@link CodeUnit}. Implementations decide
 * the isolation mechanism; failures of top-level execution reject.
 */
export interface CodeUnitLoader {
  readonly kind: LoaderKind;
  load(entrypoint: string, namespace: string): Promise<CodeUnit>;
}

// ==================== Plugin Record ====================

/**
 * A loaded plugin. The registry owns the record and its directory.
 */
export interface PluginRecord {
  /** Base name of the install directory; unique among loaded plugins */
  name: string;
  /** Absolute install directory */
  path: string;
  unit: CodeUnit;
  /** Hook name → callbacks in registration order (duplicates allowed) */
  hooks: Map<string, unknown[]>;
  /** ISO timestamp of the successful load */
  loadedAt: string;
}

/**
 * Read-only view of a loaded plugin for hosts
 */
export interface PluginInfo {
  name: string;
  path: string;
  namespace: string;
  /** Hook name → number of registered callbacks */
  hooks: Record<string, number>;
  loadedAt: string;
}

// ==================== Capability Object ====================

/**
 * Scoped logger handed to plugins
 */
export interface PluginLogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, error?: unknown): void;
}

/**
 * The only surface a plugin's `register(api)` receives.
 */
export interface PluginApi {
  /** Fixed host application name */
  readonly appName: string;
  /** Scoped logger, prefixed with the plugin name */
  readonly logger: PluginLogger;
  /**
   * Append `callback` to this plugin's callbacks for hook `name`.
   * Never throws; a non-callable value is reported when the hook fires.
   */
  registerHook(name: string, callback: unknown): void;
}

// ==================== Manager ====================

export interface PluginManagerConfig {
  /** Absolute plugins root */
  pluginsDir: string;
  loader: LoaderKind;
  timeouts: {
    load: number;
    callback: number;
  };
  /** Modules a sandboxed plugin may require() */
  allowedModules: string[];
}

/**
 * Outcome of a full rediscovery. Failures are only counted here; their
 * causes go to the log.
 */
export interface ReloadSummary {
  loaded: string[];
  failed: number;
}

export interface HookFailure {
  plugin: string;
  hook: string;
  error: Error;
}

export interface HookDispatchResult {
  hook: string;
  /** Callbacks that completed without throwing */
  invoked: number;
  failures: HookFailure[];
}
