import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { z } from "zod";
import { ConfigError, ErrorCode, FileSystemError, toError } from "./errors.js";

/**
 * Expand tilde (~) to home directory in a path.
 * Also handles Windows %USERPROFILE% environment variable.
 *
 * @example
 * expandPath("~/plugins"); // "/Users/username/plugins" on macOS
 */
export function expandPath(inputPath: string): string {
  if (!inputPath) return inputPath;

  // Handle Unix-style tilde expansion
  if (inputPath.startsWith("~/")) {
    return path.join(os.homedir(), inputPath.slice(2));
  }
  if (inputPath === "~") {
    return os.homedir();
  }

  // Handle Windows %USERPROFILE% expansion
  if (process.platform === "win32" && inputPath.includes("%USERPROFILE%")) {
    return inputPath.replace(/%USERPROFILE%/gi, os.homedir());
  }

  return path.resolve(inputPath);
}

// ============================================================================
// Schema
// ============================================================================

/**
 * How plugin entry points are turned into code units
 */
export const LoaderKindSchema = z.enum([
  "sandbox", // node:vm context per plugin, timeouts enforced
  "native",  // Node's module loader, no timeouts
]);

export type LoaderKind = z.infer<typeof LoaderKindSchema>;

export const TimeoutsSchema = z.object({
  /** Top-level execution and register(api), in ms (0 disables) */
  load: z.number().int().nonnegative().default(5000),
  /** Each hook callback, in ms (0 disables) */
  callback: z.number().int().nonnegative().default(2000),
});

export const ScriptorConfigSchema = z.object({
  /** Plugins root; each immediate subdirectory is one plugin */
  pluginsDir: z.string().min(1, "pluginsDir must not be empty").default("~/.scriptor/plugins"),
  loader: LoaderKindSchema.default("sandbox"),
  timeouts: TimeoutsSchema.default({}),
  /** Modules a sandboxed plugin may require() */
  allowedModules: z.array(z.string().min(1)).default([]),
  /** UI language setting */
  language: z.enum(["en", "ko"]).default("en"),
  debug: z.boolean().default(false),
  logToFile: z.boolean().default(false),
});

export type ScriptorConfig = z.infer<typeof ScriptorConfigSchema>;

export const DEFAULT_CONFIG: ScriptorConfig = ScriptorConfigSchema.parse({});

// ============================================================================
// Paths
// ============================================================================

/**
 * Get the configuration directory path.
 * SCRIPTOR_CONFIG_DIR overrides ~/.scriptor (tests use it to stay out of
 * the real home directory).
 */
export function getConfigDir(): string {
  if (process.env.SCRIPTOR_CONFIG_DIR) {
    return process.env.SCRIPTOR_CONFIG_DIR;
  }
  return path.join(os.homedir(), ".scriptor");
}

/**
 * Get the path to the configuration file.
 */
export function getConfigPath(): string {
  return path.join(getConfigDir(), "config.yaml");
}

/**
 * Get the default log directory.
 */
export function getLogDir(): string {
  return path.join(getConfigDir(), "logs");
}

/**
 * Resolve the plugins root of a configuration to an absolute path.
 */
export function getPluginsDir(config: ScriptorConfig = DEFAULT_CONFIG): string {
  return expandPath(config.pluginsDir);
}

// ============================================================================
// Load / Save
// ============================================================================

/**
 * Validate a raw (already parsed) configuration object, filling defaults.
 *
 * @throws {ConfigError} CONFIG_INVALID_VALUE naming the first offending key
 */
export function validateConfig(raw: unknown, sourcePath: string = getConfigPath()): ScriptorConfig {
  const result = ScriptorConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new ConfigError(ErrorCode.CONFIG_INVALID_VALUE, undefined, {
      configKey: key,
      params: { key, reason: issue.message, path: sourcePath },
    });
  }
  return result.data;
}

/**
 * Load the Scriptor configuration from disk.
 *
 * A missing file yields the defaults. Partial configurations are merged with
 * defaults for missing values.
 *
 * @throws {ConfigError} If the file is malformed YAML or holds invalid values
 */
export async function loadConfig(): Promise<ScriptorConfig> {
  const configPath = getConfigPath();

  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return ScriptorConfigSchema.parse({});
    }
    throw FileSystemError.fromNodeError(error as NodeJS.ErrnoException, configPath, "read");
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (error) {
    throw new ConfigError(ErrorCode.CONFIG_PARSE_ERROR, undefined, {
      cause: toError(error),
      params: { path: configPath },
    });
  }

  return validateConfig(parsed, configPath);
}

/**
 * Ensure the configuration directory exists.
 */
export async function ensureConfigDir(): Promise<void> {
  await fs.mkdir(getConfigDir(), { recursive: true });
}

/**
 * Save the configuration to disk as YAML.
 */
export async function saveConfig(config: ScriptorConfig): Promise<void> {
  await ensureConfigDir();
  await fs.writeFile(getConfigPath(), stringifyYaml(config), "utf-8");
}

/**
 * Merge a partial configuration into the stored one and save it.
 */
export async function updateConfig(updates: Partial<ScriptorConfig>): Promise<ScriptorConfig> {
  const current = await loadConfig();
  const updated = validateConfig({ ...current, ...updates });
  await saveConfig(updated);
  return updated;
}
