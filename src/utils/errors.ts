/**
 * Scriptor Error Classes
 *
 * Hierarchical errors carrying:
 * - Error codes (enum)
 * - User-friendly messages (i18n supported)
 * - Original cause tracking
 * - Recovery hints
 */

import { types as utilTypes } from "node:util";
import { t } from "../i18n/index.js";

// ============================================================================
// Error Codes
// ============================================================================

export enum ErrorCode {
  // Base errors (1000-1099)
  UNKNOWN = 1000,
  INTERNAL = 1001,

  // File system errors (4000-4099)
  FS_FILE_NOT_FOUND = 4000,
  FS_PERMISSION_DENIED = 4001,
  FS_NO_SPACE = 4002,
  FS_DIRECTORY_NOT_FOUND = 4004,
  FS_FILE_EXISTS = 4005,
  FS_READ_ERROR = 4006,
  FS_WRITE_ERROR = 4007,

  // Config errors (5000-5099)
  CONFIG_PARSE_ERROR = 5001,
  CONFIG_INVALID_VALUE = 5002,

  // Plugin errors (6000-6099)
  PLUGIN_MISSING_ENTRYPOINT = 6000,
  PLUGIN_EXECUTION_FAILED = 6001,
  PLUGIN_CONTRACT_VIOLATION = 6002,
  PLUGIN_REGISTRATION_FAILED = 6003,
  PLUGIN_NOT_FOUND = 6004,
  PLUGIN_ALREADY_LOADED = 6005,
  PLUGIN_INVALID_DIRECTORY = 6006,

  // Package errors (6100-6199)
  PACKAGE_FORMAT_INVALID = 6100,
}

// ============================================================================
// Error Code to i18n Key Mapping
// ============================================================================

const ERROR_CODE_KEYS: Record<ErrorCode, string> = {
  [ErrorCode.UNKNOWN]: "unknown",
  [ErrorCode.INTERNAL]: "internal",
  [ErrorCode.FS_FILE_NOT_FOUND]: "fs_file_not_found",
  [ErrorCode.FS_PERMISSION_DENIED]: "fs_permission_denied",
  [ErrorCode.FS_NO_SPACE]: "fs_no_space",
  [ErrorCode.FS_DIRECTORY_NOT_FOUND]: "fs_directory_not_found",
  [ErrorCode.FS_FILE_EXISTS]: "fs_file_exists",
  [ErrorCode.FS_READ_ERROR]: "fs_read_error",
  [ErrorCode.FS_WRITE_ERROR]: "fs_write_error",
  [ErrorCode.CONFIG_PARSE_ERROR]: "config_parse_error",
  [ErrorCode.CONFIG_INVALID_VALUE]: "config_invalid_value",
  [ErrorCode.PLUGIN_MISSING_ENTRYPOINT]: "plugin_missing_entrypoint",
  [ErrorCode.PLUGIN_EXECUTION_FAILED]: "plugin_execution_failed",
  [ErrorCode.PLUGIN_CONTRACT_VIOLATION]: "plugin_contract_violation",
  [ErrorCode.PLUGIN_REGISTRATION_FAILED]: "plugin_registration_failed",
  [ErrorCode.PLUGIN_NOT_FOUND]: "plugin_not_found",
  [ErrorCode.PLUGIN_ALREADY_LOADED]: "plugin_already_loaded",
  [ErrorCode.PLUGIN_INVALID_DIRECTORY]: "plugin_invalid_directory",
  [ErrorCode.PACKAGE_FORMAT_INVALID]: "package_format_invalid",
};

// ============================================================================
// User-friendly error messages (i18n)
// ============================================================================

export type ErrorLevel = "minimal" | "medium" | "detailed";

/** Interpolation values for the localized message templates */
export type ErrorParams = Record<string, string | number>;

function getErrorMessage(code: ErrorCode, level: ErrorLevel, params: ErrorParams = {}): string {
  return t(`errors:codes.${ERROR_CODE_KEYS[code]}.${level}`, params);
}

function getRecoveryHintForCode(code: ErrorCode): string | undefined {
  const hint = t(`errors:recovery_hints.${ERROR_CODE_KEYS[code]}`, { defaultValue: "" });
  return hint || undefined;
}

// Recovery hint codes that have translations
const RECOVERY_HINT_CODES = new Set<ErrorCode>([
  ErrorCode.FS_PERMISSION_DENIED,
  ErrorCode.FS_NO_SPACE,
  ErrorCode.CONFIG_PARSE_ERROR,
  ErrorCode.PLUGIN_MISSING_ENTRYPOINT,
  ErrorCode.PLUGIN_CONTRACT_VIOLATION,
  ErrorCode.PACKAGE_FORMAT_INVALID,
]);

// Recoverability flags
const RECOVERABLE_ERRORS = new Set<ErrorCode>([
  ErrorCode.FS_NO_SPACE,
]);

/**
 * Normalize any thrown value into a host-realm Error.
 *
 * Values thrown by plugin code running in a vm context are Errors of that
 * context's realm, so `instanceof Error` is false for them even though
 * they carry a name, message and stack.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  if (utilTypes.isNativeError(value)) {
    // Own fields such as `code` and `path` survive the copy
    const error: Error = Object.assign(new Error(value.message), value);
    error.name = value.name;
    error.stack = value.stack;
    return error;
  }
  if (typeof value === "object" && value !== null && typeof (value as { message?: unknown }).message === "string") {
    return new Error((value as { message: string }).message);
  }
  return new Error(String(value));
}

// ============================================================================
// Base Error Class
// ============================================================================

export interface ScriptorErrorOptions {
  cause?: Error;
  recoverable?: boolean;
  recoveryHint?: string;
  params?: ErrorParams;
}

export class ScriptorError extends Error {
  public readonly code: ErrorCode;
  public readonly recoverable: boolean;
  public readonly recoveryHint?: string;
  public readonly cause?: Error;
  public readonly params: ErrorParams;
  public readonly timestamp: Date;

  constructor(code: ErrorCode, message?: string, options?: ScriptorErrorOptions) {
    const params = options?.params ?? {};
    const baseMessage = message || getErrorMessage(code, "medium", params) || t("errors:format.fallback_error");
    super(baseMessage);

    this.name = "ScriptorError";
    this.code = code;
    this.cause = options?.cause;
    this.params = params;
    this.recoverable = options?.recoverable ?? RECOVERABLE_ERRORS.has(code);
    this.recoveryHint = options?.recoveryHint ?? (RECOVERY_HINT_CODES.has(code) ? getRecoveryHintForCode(code) : undefined);
    this.timestamp = new Date();

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get user-friendly message at specified detail level
   */
  getUserMessage(level: ErrorLevel = "medium"): string {
    return getErrorMessage(this.code, level, this.params) || this.message;
  }

  /**
   * Serialize error for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      recoverable: this.recoverable,
      recoveryHint: this.recoveryHint,
      timestamp: this.timestamp.toISOString(),
      cause: this.cause ? {
        name: this.cause.name,
        message: this.cause.message,
      } : undefined,
      stack: this.stack,
    };
  }
}

// ============================================================================
// Specialized Error Classes
// ============================================================================

/**
 * File system errors
 */
export class FileSystemError extends ScriptorError {
  public readonly path?: string;
  public readonly operation?: "read" | "write" | "delete" | "access" | "mkdir" | "extract";

  constructor(
    code: ErrorCode,
    message?: string,
    options?: ScriptorErrorOptions & {
      path?: string;
      operation?: FileSystemError["operation"];
    }
  ) {
    super(code, message, {
      ...options,
      params: { path: options?.path ?? "", ...options?.params },
    });
    this.name = "FileSystemError";
    this.path = options?.path;
    this.operation = options?.operation;
  }

  /**
   * Create FileSystemError from Node.js error
   */
  static fromNodeError(error: NodeJS.ErrnoException, path?: string, operation?: FileSystemError["operation"]): FileSystemError {
    const target = path ?? error.path;

    switch (error.code) {
      case "ENOENT":
        return new FileSystemError(
          operation === "mkdir" ? ErrorCode.FS_DIRECTORY_NOT_FOUND : ErrorCode.FS_FILE_NOT_FOUND,
          undefined,
          { cause: error, path: target, operation }
        );
      case "ENOTDIR":
        return new FileSystemError(ErrorCode.FS_DIRECTORY_NOT_FOUND, undefined, { cause: error, path: target, operation });
      case "EACCES":
      case "EPERM":
        return new FileSystemError(ErrorCode.FS_PERMISSION_DENIED, undefined, { cause: error, path: target, operation });
      case "ENOSPC":
        return new FileSystemError(ErrorCode.FS_NO_SPACE, undefined, { cause: error, path: target, operation });
      case "EEXIST":
        return new FileSystemError(ErrorCode.FS_FILE_EXISTS, undefined, { cause: error, path: target, operation });
      default:
        if (operation === "write" || operation === "extract") {
          return new FileSystemError(ErrorCode.FS_WRITE_ERROR, undefined, { cause: error, path: target, operation });
        }
        return new FileSystemError(ErrorCode.FS_READ_ERROR, undefined, { cause: error, path: target, operation });
    }
  }
}

/**
 * Configuration errors
 */
export class ConfigError extends ScriptorError {
  public readonly configKey?: string;

  constructor(
    code: ErrorCode,
    message?: string,
    options?: ScriptorErrorOptions & { configKey?: string }
  ) {
    super(code, message, options);
    this.name = "ConfigError";
    this.configKey = options?.configKey;
  }
}

/**
 * Errors raised while loading, installing or managing a single plugin.
 * `pluginName` is the directory base name the plugin is (or would be)
 * registered under.
 */
export class PluginError extends ScriptorError {
  public readonly pluginName: string;
  public readonly pluginPath?: string;

  constructor(
    code: ErrorCode,
    pluginName: string,
    options?: ScriptorErrorOptions & { pluginPath?: string }
  ) {
    const params: ErrorParams = {
      name: pluginName,
      path: options?.pluginPath ?? "",
      cause: options?.cause?.message ?? "",
      ...options?.params,
    };
    super(code, undefined, { ...options, params });
    this.name = "PluginError";
    this.pluginName = pluginName;
    this.pluginPath = options?.pluginPath;
  }
}

/** The plugin directory has no registration entry point file. */
export class MissingEntrypointError extends PluginError {
  constructor(pluginName: string, pluginPath: string, entrypoint: string) {
    super(ErrorCode.PLUGIN_MISSING_ENTRYPOINT, pluginName, { pluginPath, params: { entrypoint } });
    this.name = "MissingEntrypointError";
  }
}

/** Top-level execution of the entry point failed (syntax error, throw, timeout). */
export class PluginExecutionError extends PluginError {
  constructor(pluginName: string, pluginPath: string, entrypoint: string, cause: Error) {
    super(ErrorCode.PLUGIN_EXECUTION_FAILED, pluginName, { pluginPath, cause, params: { entrypoint } });
    this.name = "PluginExecutionError";
  }
}

/** The entry point ran but exposes no callable `register`. */
export class ContractViolationError extends PluginError {
  constructor(pluginName: string, pluginPath: string, entrypoint: string) {
    super(ErrorCode.PLUGIN_CONTRACT_VIOLATION, pluginName, { pluginPath, params: { entrypoint } });
    this.name = "ContractViolationError";
  }
}

/** `register(api)` threw or rejected. */
export class RegistrationError extends PluginError {
  constructor(pluginName: string, pluginPath: string, cause: Error) {
    super(ErrorCode.PLUGIN_REGISTRATION_FAILED, pluginName, { pluginPath, cause });
    this.name = "RegistrationError";
  }
}

export class PluginNotFoundError extends PluginError {
  constructor(pluginName: string) {
    super(ErrorCode.PLUGIN_NOT_FOUND, pluginName);
    this.name = "PluginNotFoundError";
  }
}

export class PluginAlreadyLoadedError extends PluginError {
  public readonly existingPath: string;

  constructor(pluginName: string, pluginPath: string, existingPath: string) {
    super(ErrorCode.PLUGIN_ALREADY_LOADED, pluginName, { pluginPath, params: { existing: existingPath } });
    this.name = "PluginAlreadyLoadedError";
    this.existingPath = existingPath;
  }
}

export class InvalidPluginDirectoryError extends PluginError {
  constructor(pluginName: string, pluginPath: string, cause?: Error) {
    super(ErrorCode.PLUGIN_INVALID_DIRECTORY, pluginName, { pluginPath, cause });
    this.name = "InvalidPluginDirectoryError";
  }
}

/**
 * The archive handed to install/pack is unusable.
 */
export class PackageFormatError extends ScriptorError {
  public readonly packagePath: string;

  constructor(packagePath: string, reason: string, cause?: Error) {
    super(ErrorCode.PACKAGE_FORMAT_INVALID, undefined, { cause, params: { path: packagePath, reason } });
    this.name = "PackageFormatError";
    this.packagePath = packagePath;
  }
}

// ============================================================================
// Error Formatter Utilities
// ============================================================================

/**
 * Format error for user display based on detail level
 */
export function formatErrorForUser(error: unknown, level: ErrorLevel = "medium"): string {
  if (error instanceof ScriptorError) {
    let message = error.getUserMessage(level);

    // Add recovery hint for medium/detailed levels
    if (level !== "minimal" && error.recoveryHint) {
      message += `\n\n${t("errors:format.hint")} ${error.recoveryHint}`;
    }

    // Add technical details for detailed level
    if (level === "detailed") {
      message += `\n\n[${t("errors:format.error_code")} ${error.code}]`;
      if (error.cause) {
        message += `\n[${t("errors:format.cause")} ${error.cause.message}]`;
      }
      if (error instanceof PluginError) {
        message += `\n[${t("errors:format.plugin")} ${error.pluginName}]`;
      }
      if (error instanceof FileSystemError && error.path) {
        message += `\n[${t("errors:format.path")} ${error.path}]`;
      }
    }

    return message;
  }

  const normalized = toError(error);
  switch (level) {
    case "minimal":
      return t("errors:format.standard_error_minimal");
    case "medium":
      return t("errors:format.standard_error_medium", { message: normalized.message });
    case "detailed":
      return t("errors:format.standard_error_detailed", { message: normalized.message, stack: normalized.stack || "" });
  }
}

/**
 * Check if an error is recoverable
 */
export function isRecoverableError(error: unknown): boolean {
  if (error instanceof ScriptorError) {
    return error.recoverable;
  }
  return false;
}

function isErrnoException(error: Error): error is NodeJS.ErrnoException {
  return typeof (error as NodeJS.ErrnoException).code === "string";
}

/**
 * Convert any error to a Scriptor error
 */
export function toScriptorError(error: unknown): ScriptorError {
  if (error instanceof ScriptorError) {
    return error;
  }

  const normalized = toError(error);
  if (isErrnoException(normalized) && normalized.code && ["ENOENT", "ENOTDIR", "EACCES", "EPERM", "ENOSPC", "EEXIST"].includes(normalized.code)) {
    return FileSystemError.fromNodeError(normalized);
  }

  return new ScriptorError(ErrorCode.UNKNOWN, normalized.message, { cause: normalized });
}
