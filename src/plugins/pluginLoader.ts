/**
 * Plugin Loader
 *
 * Turns one plugin directory into a populated {@link PluginRecord}:
 * locate the entry point, execute it as a code unit bound to the plugin's
 * namespace, check the `register` contract and run it with a fresh
 * capability object. Every failure is fatal to this load only.
 */

import fs from "node:fs/promises";
import path from "node:path";

import type { CodeUnit, CodeUnitLoader, HookCallback, PluginRecord } from "./types.js";
import { PLUGIN_ENTRYPOINT, REGISTER_EXPORT, isHookCallback, pluginNamespace } from "./types.js";
import { createPluginApi } from "./pluginApi.js";
import {
  ContractViolationError,
  InvalidPluginDirectoryError,
  MissingEntrypointError,
  PluginExecutionError,
  RegistrationError,
  toError,
} from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";

const logger = getLogger();

export interface PluginLoaderOptions {
  codeUnitLoader: CodeUnitLoader;
  /** Bound on register(api), in ms (0 disables) */
  registerTimeoutMs: number;
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

/**
 * Read the registration function off whatever the module exported
 */
function readRegister(exported: unknown): HookCallback | null {
  if ((typeof exported !== "object" && typeof exported !== "function") || exported === null) {
    return null;
  }
  const candidate: unknown = Reflect.get(exported, REGISTER_EXPORT);
  return isHookCallback(candidate) ? candidate : null;
}

export class PluginLoader {
  private readonly options: PluginLoaderOptions;

  constructor(options: PluginLoaderOptions) {
    this.options = options;
  }

  /**
   * Load a single plugin from a directory path
   *
   * @throws {InvalidPluginDirectoryError} directory missing or not a directory
   * @throws {MissingEntrypointError} no plugin-main.js inside it
   * @throws {PluginExecutionError} top-level execution failed
   * @throws {ContractViolationError} no callable `register` export
   * @throws {RegistrationError} `register(api)` threw or rejected
   */
  async load(directory: string): Promise<PluginRecord> {
    const pluginPath = path.resolve(directory);
    const name = path.basename(pluginPath);

    await this.assertDirectory(name, pluginPath);

    const entrypoint = path.join(pluginPath, PLUGIN_ENTRYPOINT);
    if (!(await isFile(entrypoint))) {
      throw new MissingEntrypointError(name, pluginPath, PLUGIN_ENTRYPOINT);
    }

    let unit: CodeUnit;
    try {
      unit = await this.options.codeUnitLoader.load(entrypoint, pluginNamespace(name));
    } catch (error) {
      throw new PluginExecutionError(name, pluginPath, PLUGIN_ENTRYPOINT, toError(error));
    }

    const register = readRegister(unit.exports);
    if (!register) {
      unit.release();
      throw new ContractViolationError(name, pluginPath, PLUGIN_ENTRYPOINT);
    }

    const record: PluginRecord = {
      name,
      path: pluginPath,
      unit,
      hooks: new Map(),
      loadedAt: "",
    };

    try {
      await unit.invoke(register, [createPluginApi(record)], this.options.registerTimeoutMs);
    } catch (error) {
      // All-or-nothing: hooks registered before the failure go with the record.
      record.hooks.clear();
      unit.release();
      throw new RegistrationError(name, pluginPath, toError(error));
    }

    record.loadedAt = new Date().toISOString();
    logger.info(`Loaded plugin: ${name}`);
    return record;
  }

  private async assertDirectory(name: string, pluginPath: string): Promise<void> {
    try {
      const stat = await fs.stat(pluginPath);
      if (!stat.isDirectory()) {
        throw new InvalidPluginDirectoryError(name, pluginPath);
      }
    } catch (error) {
      if (error instanceof InvalidPluginDirectoryError) throw error;
      throw new InvalidPluginDirectoryError(name, pluginPath, toError(error));
    }
  }
}

export function createPluginLoader(options: PluginLoaderOptions): PluginLoader {
  return new PluginLoader(options);
}
