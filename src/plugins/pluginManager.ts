/**
 * Plugin Manager
 *
 * Owns the table of loaded plugins, keyed by directory name. Discovery,
 * install and uninstall change the table; dispatch fans a hook out to every
 * loaded plugin and isolates each callback's failure.
 */

import fs from "node:fs/promises";
import path from "node:path";

import type {
  CodeUnitLoader,
  HookDispatchResult,
  HookFailure,
  HostHookEvents,
  HostHookName,
  PluginInfo,
  PluginManagerConfig,
  PluginRecord,
  ReloadSummary,
} from "./types.js";
import { isHookCallback } from "./types.js";
import { createCodeUnitLoader } from "./codeUnit.js";
import { PluginLoader, createPluginLoader } from "./pluginLoader.js";
import { extractPackage, openPackage, packDirectory, packageBaseName } from "./pluginPackage.js";
import { FileSystemError, PluginAlreadyLoadedError, PluginNotFoundError, toError } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";

const logger = getLogger();

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch {
    return false;
  }
}

export class PluginManager {
  private readonly config: PluginManagerConfig;
  private readonly loader: PluginLoader;
  private readonly plugins = new Map<string, PluginRecord>();
  private queue: Promise<void> = Promise.resolve();

  constructor(config: PluginManagerConfig, loader: PluginLoader) {
    this.config = config;
    this.loader = loader;
  }

  get pluginsDir(): string {
    return this.config.pluginsDir;
  }

  get size(): number {
    return this.plugins.size;
  }

  // ==================== Lifecycle ====================

  /**
   * Create the plugins root if needed and load everything under it
   */
  async init(): Promise<ReloadSummary> {
    try {
      await fs.mkdir(this.config.pluginsDir, { recursive: true });
    } catch (error) {
      throw FileSystemError.fromNodeError(error as NodeJS.ErrnoException, this.config.pluginsDir, "mkdir");
    }
    return this.loadAll();
  }

  /**
   * Drop every loaded plugin and rediscover the plugins root.
   * A directory that fails to load is logged and skipped.
   */
  loadAll(): Promise<ReloadSummary> {
    return this.exclusive(async () => {
      for (const record of this.plugins.values()) {
        record.unit.release();
      }
      this.plugins.clear();

      const summary: ReloadSummary = { loaded: [], failed: 0 };

      for (const directory of await this.scanPluginsDir()) {
        try {
          const record = await this.loader.load(directory);
          this.plugins.set(record.name, record);
          summary.loaded.push(record.name);
        } catch (error) {
          summary.failed++;
          logger.error(`Failed to load plugin from ${directory}`, error);
        }
      }

      logger.info(`Plugins loaded: ${summary.loaded.length}, failed: ${summary.failed}`);
      return summary;
    });
  }

  /**
   * Load one plugin directory. Reloading a plugin from its own path
   * replaces the previous record.
   *
   * @throws {PluginAlreadyLoadedError} another directory with the same name is loaded
   */
  load(directory: string): Promise<PluginRecord> {
    return this.exclusive(async () => {
      const pluginPath = path.resolve(directory);
      const name = path.basename(pluginPath);

      const existing = this.plugins.get(name);
      if (existing && existing.path !== pluginPath) {
        throw new PluginAlreadyLoadedError(name, pluginPath, existing.path);
      }

      const record = await this.loader.load(pluginPath);
      existing?.unit.release();
      this.plugins.set(record.name, record);
      return record;
    });
  }

  /**
   * Extract a plugin package into a fresh directory under the plugins root
   * and load it.
   *
   * @returns Absolute path of the new plugin directory
   */
  install(packagePath: string): Promise<string> {
    return this.exclusive(async () => {
      const zip = await openPackage(packagePath);

      try {
        await fs.mkdir(this.config.pluginsDir, { recursive: true });
      } catch (error) {
        throw FileSystemError.fromNodeError(error as NodeJS.ErrnoException, this.config.pluginsDir, "mkdir");
      }

      const destination = await this.allocateDirectory(packageBaseName(packagePath));
      await extractPackage(zip, destination);
      logger.info(`Installed package ${path.resolve(packagePath)} to ${destination}`);

      // A load failure leaves the extracted directory in place.
      const record = await this.loader.load(destination);
      this.plugins.set(record.name, record);
      return destination;
    });
  }

  /**
   * Unload a plugin and delete its directory
   *
   * @throws {PluginNotFoundError} no plugin with that name is loaded
   */
  uninstall(name: string): Promise<void> {
    return this.exclusive(async () => {
      const record = this.plugins.get(name);
      if (!record) {
        throw new PluginNotFoundError(name);
      }

      this.plugins.delete(name);
      record.unit.release();

      try {
        await fs.rm(record.path, { recursive: true, force: true });
      } catch (error) {
        throw FileSystemError.fromNodeError(error as NodeJS.ErrnoException, record.path, "delete");
      }
      logger.info(`Uninstalled plugin: ${name}`);
    });
  }

  /**
   * Zip a plugin directory into a distributable package
   */
  pack(directory: string, outFile?: string): Promise<string> {
    return packDirectory(directory, outFile);
  }

  // ==================== Dispatch ====================

  /**
   * Run every callback registered for a hook, in plugin load order and then
   * registration order. A failing callback is logged and counted; the rest
   * still run.
   */
  callHook<K extends HostHookName>(hook: K, event: HostHookEvents[K]): Promise<HookDispatchResult>;
  callHook(hook: string, ...args: unknown[]): Promise<HookDispatchResult>;
  async callHook(hook: string, ...args: unknown[]): Promise<HookDispatchResult> {
    const result: HookDispatchResult = { hook, invoked: 0, failures: [] };

    for (const record of [...this.plugins.values()]) {
      const callbacks = record.hooks.get(hook);
      if (!callbacks) continue;

      for (const callback of [...callbacks]) {
        // Uninstalled or replaced while an earlier callback was awaited
        if (this.plugins.get(record.name) !== record) break;

        try {
          if (!isHookCallback(callback)) {
            throw new TypeError(`Registered value is not callable (${typeof callback})`);
          }
          await record.unit.invoke(callback, args, this.config.timeouts.callback);
          result.invoked++;
        } catch (error) {
          const failure: HookFailure = { plugin: record.name, hook, error: toError(error) };
          result.failures.push(failure);
          logger.error(`Plugin ${record.name} hook ${hook} error`, failure.error);
        }
      }
    }

    return result;
  }

  // ==================== Queries ====================

  get(name: string): PluginRecord | undefined {
    return this.plugins.get(name);
  }

  has(name: string): boolean {
    return this.plugins.has(name);
  }

  /** Loaded plugin names in load order */
  names(): string[] {
    return [...this.plugins.keys()];
  }

  list(): PluginInfo[] {
    return [...this.plugins.values()].map((record) => ({
      name: record.name,
      path: record.path,
      namespace: record.unit.namespace,
      hooks: Object.fromEntries([...record.hooks].map(([hook, callbacks]) => [hook, callbacks.length])),
      loadedAt: record.loadedAt,
    }));
  }

  // ==================== Internals ====================

  /**
   * Run table mutations one at a time, in call order
   */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // The caller observes the rejection through `run`; the queue only needs to move on.
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async scanPluginsDir(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.config.pluginsDir);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return [];
      }
      throw FileSystemError.fromNodeError(error as NodeJS.ErrnoException, this.config.pluginsDir, "read");
    }

    const directories: string[] = [];
    for (const entry of entries.sort()) {
      const fullPath = path.join(this.config.pluginsDir, entry);
      if (await isDirectory(fullPath)) {
        directories.push(fullPath);
      }
    }
    return directories;
  }

  /**
   * First free directory for a package: `name`, then `name_1`, `name_2`, …
   * skipping names that exist on disk or are loaded.
   */
  private async allocateDirectory(baseName: string): Promise<string> {
    let candidate = baseName;
    let suffix = 1;
    while (this.plugins.has(candidate) || (await pathExists(path.join(this.config.pluginsDir, candidate)))) {
      candidate = `${baseName}_${suffix++}`;
    }
    return path.join(this.config.pluginsDir, candidate);
  }
}

export interface PluginManagerOverrides {
  codeUnitLoader?: CodeUnitLoader;
  pluginLoader?: PluginLoader;
}

/**
 * Build a manager with the code unit loader the configuration selects
 */
export function createPluginManager(config: PluginManagerConfig, overrides: PluginManagerOverrides = {}): PluginManager {
  const pluginsDir = path.resolve(config.pluginsDir);
  const resolved: PluginManagerConfig = { ...config, pluginsDir };
  const pluginLoader =
    overrides.pluginLoader ??
    createPluginLoader({
      codeUnitLoader: overrides.codeUnitLoader ?? createCodeUnitLoader(resolved),
      registerTimeoutMs: resolved.timeouts.load,
    });
  return new PluginManager(resolved, pluginLoader);
}
