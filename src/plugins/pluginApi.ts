import type { PluginApi, PluginLogger, PluginRecord } from "./types.js";
import { HOST_APP_NAME } from "./types.js";
import { getLogger } from "../utils/logger.js";

/**
 * Create a scoped logger for a plugin
 */
export function createPluginLogger(label: string): PluginLogger {
  const logger = getLogger();
  return {
    debug: (message: string, data?: unknown) => {
      logger.debug(`[${label}] ${message}`, data);
    },
    info: (message: string, data?: unknown) => {
      logger.info(`[${label}] ${message}`, data);
    },
    warn: (message: string, data?: unknown) => {
      logger.warn(`[${label}] ${message}`, data);
    },
    error: (message: string, error?: unknown) => {
      logger.error(`[${label}] ${message}`, error);
    },
  };
}

/**
 * Build the capability object handed to `register(api)`.
 *
 * The object closes over one record and writes nowhere else.
 */
export function createPluginApi(record: PluginRecord, logger: PluginLogger = createPluginLogger(record.name)): PluginApi {
  const api: PluginApi = {
    appName: HOST_APP_NAME,
    logger,
    registerHook: (name: string, callback: unknown): void => {
      const hookName = String(name);
      const callbacks = record.hooks.get(hookName);
      if (callbacks) {
        callbacks.push(callback);
      } else {
        record.hooks.set(hookName, [callback]);
      }
      getLogger().debug(`Registered hook: ${record.name} -> ${hookName}`);
    },
  };

  return Object.freeze(api);
}
