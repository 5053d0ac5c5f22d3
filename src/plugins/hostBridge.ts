import type { GenericEvent, HookDispatchResult, OpenEvent, SaveEvent } from "./types.js";
import type { PluginManager } from "./pluginManager.js";

/**
 * Forwards editor events to plugin hooks. Each callback receives the typed
 * event object as its only argument.
 */
export class HostEventBridge {
  constructor(private readonly manager: PluginManager) {}

  /** Fire `on_open` after a file has been opened */
  onOpen(filePath: string): Promise<HookDispatchResult> {
    const event: OpenEvent = { kind: "open", path: filePath };
    return this.manager.callHook("on_open", event);
  }

  /** Fire `on_save` after a file has been saved */
  onSave(filePath: string): Promise<HookDispatchResult> {
    const event: SaveEvent = { kind: "save", path: filePath };
    return this.manager.callHook("on_save", event);
  }

  /** Fire `on_event` for any other named host event */
  onEvent(name: string, payload: Record<string, unknown> = {}): Promise<HookDispatchResult> {
    const event: GenericEvent = { kind: "event", name, payload };
    return this.manager.callHook("on_event", event);
  }
}
