/**
 * Scriptor CLI
 *
 * A thin host around the plugin subsystem: manages installed plugins and
 * fires the editor's open/save/event hooks from the command line.
 *
 * Exit codes:
 *   0 - Success
 *   1 - Usage error
 *   2 - Configuration error
 *   3 - Operation failed
 */

import fs from "node:fs/promises";
import path from "node:path";

import { changeLanguage, isSupportedLanguage, t, type SupportedLanguage } from "./i18n/index.js";
import { createPluginManager, type PluginManager } from "./plugins/pluginManager.js";
import { HostEventBridge } from "./plugins/hostBridge.js";
import type { HookDispatchResult, PluginInfo } from "./plugins/types.js";
import { getLogDir, getPluginsDir, loadConfig, type ScriptorConfig } from "./utils/config.js";
import { formatErrorForUser, toError } from "./utils/errors.js";
import { getLogger } from "./utils/logger.js";

// Exit codes
export const EXIT_SUCCESS = 0;
export const EXIT_USAGE = 1;
export const EXIT_CONFIG_ERROR = 2;
export const EXIT_OPERATION_FAILED = 3;

export interface CliOptions {
  /** Positional arguments: command first */
  positionals: string[];
  pluginsDir?: string;
  lang?: SupportedLanguage;
  debug: boolean;
  out?: string;
  data?: string;
  help: boolean;
}

/**
 * Parse command line arguments
 *
 * @returns Parsed options, or an error message for the user
 */
export function parseArgs(args: string[]): CliOptions | string {
  const options: CliOptions = { positionals: [], debug: false, help: false };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === "--plugins-dir" && args[i + 1]) {
      options.pluginsDir = args[++i];
    } else if (arg === "--lang" && args[i + 1]) {
      const lang = args[++i];
      if (!isSupportedLanguage(lang)) {
        return `Invalid language "${lang}". Use: en, ko`;
      }
      options.lang = lang;
    } else if (arg === "--out" && args[i + 1]) {
      options.out = args[++i];
    } else if (arg === "--data" && args[i + 1]) {
      options.data = args[++i];
    } else if (arg === "--debug") {
      options.debug = true;
    } else if (arg === "-h" || arg === "--help") {
      options.help = true;
    } else if (arg.startsWith("-")) {
      return `Unknown option "${arg}"`;
    } else {
      options.positionals.push(arg);
    }

    i++;
  }

  return options;
}

function formatHooks(hooks: PluginInfo["hooks"]): string {
  const entries = Object.entries(hooks);
  if (entries.length === 0) {
    return t("common:plugins.no_hooks");
  }
  return entries.map(([hook, count]) => `${hook}: ${count}`).join(", ");
}

function printDispatch(result: HookDispatchResult): void {
  console.log(
    t("common:events.dispatched", {
      hook: result.hook,
      invoked: result.invoked,
      failed: result.failures.length,
    })
  );
}

function missingArgument(name: string): number {
  console.error(t("common:cli.missing_argument", { name }));
  return EXIT_USAGE;
}

/**
 * Parse `--data` into an event payload; only JSON objects are accepted
 */
function parsePayload(data: string | undefined): Record<string, unknown> | null {
  if (data === undefined) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return null;
  }
  return Object.fromEntries(Object.entries(parsed));
}

// ============================================================================
// Command handlers
// ============================================================================

async function runPluginsCommand(manager: PluginManager, options: CliOptions): Promise<number> {
  const [, action, target] = options.positionals;

  switch (action) {
    case "list": {
      await manager.init();
      const plugins = manager.list();
      if (plugins.length === 0) {
        console.log(t("common:plugins.list_empty"));
        return EXIT_SUCCESS;
      }
      for (const info of plugins) {
        console.log(t("common:plugins.list_item", { name: info.name, hooks: formatHooks(info.hooks) }));
      }
      return EXIT_SUCCESS;
    }

    case "install": {
      if (!target) return missingArgument("<package>");
      try {
        await manager.init();
        const destination = await manager.install(target);
        console.log(t("common:plugins.installed", { path: destination }));
        return EXIT_SUCCESS;
      } catch (error) {
        console.error(t("common:plugins.install_failed", { message: formatErrorForUser(error) }));
        return EXIT_OPERATION_FAILED;
      }
    }

    case "uninstall": {
      if (!target) return missingArgument("<name>");
      try {
        await manager.init();
        await manager.uninstall(target);
        console.log(t("common:plugins.removed", { name: target }));
        return EXIT_SUCCESS;
      } catch (error) {
        console.error(t("common:plugins.uninstall_failed", { message: formatErrorForUser(error) }));
        return EXIT_OPERATION_FAILED;
      }
    }

    case "reload": {
      // Per-plugin failures are logged by the manager
      const summary = await manager.init();
      const names = summary.loaded.length > 0 ? summary.loaded.join(", ") : t("common:plugins.none");
      console.log(t("common:plugins.reloaded", { names }));
      return EXIT_SUCCESS;
    }

    case "pack": {
      if (!target) return missingArgument("<dir>");
      try {
        const archive = await manager.pack(target, options.out);
        console.log(t("common:plugins.packed", { path: archive }));
        return EXIT_SUCCESS;
      } catch (error) {
        console.error(t("common:plugins.pack_failed", { message: formatErrorForUser(error) }));
        return EXIT_OPERATION_FAILED;
      }
    }

    default:
      console.error(t("common:cli.unknown_command", { command: `plugins ${action ?? ""}`.trim() }));
      return EXIT_USAGE;
  }
}

async function runOpen(bridge: HostEventBridge, file: string): Promise<number> {
  const filePath = path.resolve(file);
  try {
    await fs.readFile(filePath, "utf-8");
  } catch (error) {
    console.error(t("common:events.open_failed", { message: toError(error).message }));
    return EXIT_OPERATION_FAILED;
  }
  printDispatch(await bridge.onOpen(filePath));
  return EXIT_SUCCESS;
}

async function runSave(bridge: HostEventBridge, file: string): Promise<number> {
  const filePath = path.resolve(file);
  try {
    await fs.access(filePath);
  } catch (error) {
    console.error(t("common:events.save_failed", { message: toError(error).message }));
    return EXIT_OPERATION_FAILED;
  }
  printDispatch(await bridge.onSave(filePath));
  return EXIT_SUCCESS;
}

/**
 * Resolve configuration, apply command-line overrides and set up logging
 */
async function prepare(options: CliOptions): Promise<ScriptorConfig> {
  const config = await loadConfig();

  await changeLanguage(options.lang ?? config.language);

  const logger = getLogger();
  logger.configure({ logToFile: config.logToFile, logDir: getLogDir() });
  if (options.debug || config.debug) {
    logger.setDebugMode(true);
  }
  await logger.init();

  return options.pluginsDir ? { ...config, pluginsDir: options.pluginsDir } : config;
}

/**
 * Main CLI entry point
 */
export async function runCli(args: string[]): Promise<number> {
  const parsed = parseArgs(args);
  if (typeof parsed === "string") {
    console.error(`Error: ${parsed}`);
    console.error(t("common:cli.usage"));
    return EXIT_USAGE;
  }

  const [command, argument] = parsed.positionals;
  if (parsed.help || !command) {
    console.log(t("common:cli.usage"));
    return parsed.help ? EXIT_SUCCESS : EXIT_USAGE;
  }

  let config: ScriptorConfig;
  try {
    config = await prepare(parsed);
  } catch (error) {
    console.error(t("common:cli.config_error", { message: formatErrorForUser(error) }));
    return EXIT_CONFIG_ERROR;
  }

  const manager = createPluginManager({
    pluginsDir: getPluginsDir(config),
    loader: config.loader,
    timeouts: config.timeouts,
    allowedModules: config.allowedModules,
  });

  try {
    switch (command) {
      case "plugins":
        return await runPluginsCommand(manager, parsed);

      case "open":
      case "save": {
        if (!argument) return missingArgument("<file>");
        await manager.init();
        const bridge = new HostEventBridge(manager);
        return command === "open" ? await runOpen(bridge, argument) : await runSave(bridge, argument);
      }

      case "emit": {
        if (!argument) return missingArgument("<name>");
        const payload = parsePayload(parsed.data);
        if (!payload) {
          console.error(t("common:cli.invalid_data"));
          return EXIT_USAGE;
        }
        await manager.init();
        printDispatch(await new HostEventBridge(manager).onEvent(argument, payload));
        return EXIT_SUCCESS;
      }

      default:
        console.error(t("common:cli.unknown_command", { command }));
        return EXIT_USAGE;
    }
  } catch (error) {
    console.error(formatErrorForUser(error));
    return EXIT_OPERATION_FAILED;
  } finally {
    await getLogger().close();
  }
}
