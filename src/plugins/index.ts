/**
 * Scriptor Plugin System
 *
 * Discovers, loads and dispatches to editor plugins. A plugin is a directory
 * under the plugins root whose `plugin-main.js` exports `register(api)`.
 *
 * @packageDocumentation
 * @module plugins
 *
 * @example A plugin's entry point (`plugin-main.js`)
 * ```javascript
 * exports.register = function (api) {
 *   api.registerHook("on_save", function (event) {
 *     api.logger.info("Saved " + event.path);
 *   });
 * };
 * ```
 *
 * @example Hosting plugins
 * ```typescript
 * import { createPluginManager, HostEventBridge } from 'scriptor';
 *
 * const manager = createPluginManager({
 *   pluginsDir: '/home/me/.scriptor/plugins',
 *   loader: 'sandbox',
 *   timeouts: { load: 5000, callback: 2000 },
 *   allowedModules: [],
 * });
 *
 * await manager.init();
 * await new HostEventBridge(manager).onSave('/tmp/draft.txt');
 * ```
 */

// ============================================================================
// Types
// ============================================================================

export type {
  CodeUnit,
  CodeUnitLoader,
  GenericEvent,
  HookCallback,
  HookDispatchResult,
  HookFailure,
  HostEvent,
  HostHookEvents,
  HostHookName,
  OpenEvent,
  PluginApi,
  PluginInfo,
  PluginLogger,
  PluginManagerConfig,
  PluginRecord,
  ReloadSummary,
  SaveEvent,
} from "./types.js";

export {
  HOST_APP_NAME,
  PACKAGE_EXTENSION,
  PLUGIN_ENTRYPOINT,
  REGISTER_EXPORT,
  isHookCallback,
  pluginNamespace,
} from "./types.js";

// ============================================================================
// Loading
// ============================================================================

export { SandboxCodeUnitLoader, NativeCodeUnitLoader, createCodeUnitLoader } from "./codeUnit.js";
export type { SandboxLoaderOptions } from "./codeUnit.js";

export { createPluginApi, createPluginLogger } from "./pluginApi.js";

export { PluginLoader, createPluginLoader } from "./pluginLoader.js";
export type { PluginLoaderOptions } from "./pluginLoader.js";

export { openPackage, extractPackage, packDirectory, packageBaseName } from "./pluginPackage.js";

// ============================================================================
// Registry and host events
// ============================================================================

export { PluginManager, createPluginManager } from "./pluginManager.js";
export type { PluginManagerOverrides } from "./pluginManager.js";

export { HostEventBridge } from "./hostBridge.js";

// ============================================================================
// Errors
// ============================================================================

export {
  ContractViolationError,
  InvalidPluginDirectoryError,
  MissingEntrypointError,
  PackageFormatError,
  PluginAlreadyLoadedError,
  PluginError,
  PluginExecutionError,
  PluginNotFoundError,
  RegistrationError,
} from "../utils/errors.js";
