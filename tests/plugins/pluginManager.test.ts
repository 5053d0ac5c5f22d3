/**
 * Tests for PluginManager: discovery, install, uninstall and dispatch
 */

import { describe, it, expect, jest, beforeEach, afterEach } from "@jest/globals";
import path from "node:path";
import fs from "node:fs/promises";
import { PluginManager, createPluginManager } from "../../src/plugins/pluginManager.js";
import {
  ErrorCode,
  FileSystemError,
  MissingEntrypointError,
  PackageFormatError,
  PluginAlreadyLoadedError,
  PluginNotFoundError,
  RegistrationError,
} from "../../src/utils/errors.js";
import {
  RECORDING_PLUGIN,
  TICKING_PLUGIN,
  exportedArray,
  exportedValue,
  listDir,
  makeTempDir,
  removeDir,
  sleep,
  testConfig,
  writePackage,
  writePlugin,
} from "../helpers/plugins.js";

const THROWING_PLUGIN = `
exports.register = function (api) {
  api.registerHook("on_save", function () {
    throw new Error("callback exploded");
  });
};
`;

function recorded(manager: PluginManager, name: string, key = "saved"): unknown[] {
  const record = manager.get(name);
  if (!record) {
    throw new Error(`${name} is not loaded`);
  }
  return exportedArray(record.unit.exports, key);
}

describe("PluginManager", () => {
  let workDir: string;
  let pluginsDir: string;
  let manager: PluginManager;
  let consoleLogSpy: jest.SpiedFunction<typeof console.log>;
  let consoleErrorSpy: jest.SpiedFunction<typeof console.error>;

  beforeEach(async () => {
    workDir = await makeTempDir();
    pluginsDir = path.join(workDir, "plugins");
    manager = createPluginManager(testConfig(pluginsDir));
    consoleLogSpy = jest.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = jest.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    await removeDir(workDir);
  });

  function errorLines(): string[] {
    return consoleErrorSpy.mock.calls.map((call) => String(call[0]));
  }

  describe("init", () => {
    it("should create a missing plugins root and load nothing", async () => {
      const summary = await manager.init();

      expect(summary).toEqual({ loaded: [], failed: 0 });
      expect((await fs.stat(pluginsDir)).isDirectory()).toBe(true);
      expect(manager.size).toBe(0);
    });
  });

  describe("loadAll", () => {
    it("should load every valid plugin directory in name order", async () => {
      await writePlugin(pluginsDir, "zeta", RECORDING_PLUGIN);
      await writePlugin(pluginsDir, "alpha", RECORDING_PLUGIN);

      const summary = await manager.loadAll();

      expect(summary).toEqual({ loaded: ["alpha", "zeta"], failed: 0 });
      expect(manager.names()).toEqual(["alpha", "zeta"]);
    });

    it("should skip and log directories that fail to load", async () => {
      await writePlugin(pluginsDir, "good", RECORDING_PLUGIN);
      await writePlugin(pluginsDir, "broken", "throw new Error('top level');");
      await fs.mkdir(path.join(pluginsDir, "empty"));
      await fs.writeFile(path.join(pluginsDir, "notes.txt"), "not a plugin", "utf-8");

      const summary = await manager.loadAll();

      expect(summary).toEqual({ loaded: ["good"], failed: 2 });
      expect(manager.names()).toEqual(["good"]);
      expect(errorLines().some((line) => line.includes(`Failed to load plugin from ${path.join(pluginsDir, "broken")}`))).toBe(true);
      expect(errorLines().some((line) => line.includes(`Failed to load plugin from ${path.join(pluginsDir, "empty")}`))).toBe(true);
    });

    it("should treat a missing plugins root as empty", async () => {
      await expect(manager.loadAll()).resolves.toEqual({ loaded: [], failed: 0 });
    });

    it("should forget plugins whose directories were deleted", async () => {
      await writePlugin(pluginsDir, "keep", RECORDING_PLUGIN);
      const dropped = await writePlugin(pluginsDir, "drop", RECORDING_PLUGIN);
      await manager.loadAll();

      await removeDir(dropped);
      const summary = await manager.loadAll();

      expect(summary.loaded).toEqual(["keep"]);
      expect(manager.has("drop")).toBe(false);
    });

    it("should execute plugin code again on reload", async () => {
      const dir = await writePlugin(pluginsDir, "versioned", "exports.version = 1;\nexports.register = function () {};");
      await manager.loadAll();
      await fs.writeFile(
        path.join(dir, "plugin-main.js"),
        "exports.version = 2;\nexports.register = function () {};",
        "utf-8"
      );

      await manager.loadAll();

      expect(exportedValue(manager.get("versioned")?.unit.exports, "version")).toBe(2);
    });

    it("should release the units it replaces", async () => {
      await writePlugin(pluginsDir, "recorder", RECORDING_PLUGIN);
      await manager.loadAll();
      const previous = manager.get("recorder");

      await manager.loadAll();

      expect(previous).toBeDefined();
      expect(() => previous?.unit.invoke(() => undefined, [])).toThrow("has been released");
    });
  });

  describe("load", () => {
    it("should replace a plugin reloaded from the same path", async () => {
      const dir = await writePlugin(pluginsDir, "recorder", RECORDING_PLUGIN);
      const first = await manager.load(dir);

      const second = await manager.load(dir);

      expect(second).not.toBe(first);
      expect(manager.get("recorder")).toBe(second);
      expect(manager.size).toBe(1);
    });

    it("should refuse a second plugin with the same name from another path", async () => {
      const dir = await writePlugin(pluginsDir, "recorder", RECORDING_PLUGIN);
      const elsewhere = await writePlugin(path.join(workDir, "other"), "recorder", RECORDING_PLUGIN);
      await manager.load(dir);

      const error = await manager.load(elsewhere).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PluginAlreadyLoadedError);
      expect(manager.get("recorder")?.path).toBe(dir);
    });

    it("should propagate load errors", async () => {
      const dir = await writePlugin(pluginsDir, "bad", "exports.register = function () { throw new Error('no'); };");

      await expect(manager.load(dir)).rejects.toBeInstanceOf(RegistrationError);
      expect(manager.has("bad")).toBe(false);
    });
  });

  describe("install", () => {
    let packagePath: string;

    beforeEach(async () => {
      await manager.init();
      packagePath = writePackage(path.join(workDir, "word-count.scpl"), {
        "plugin-main.js": RECORDING_PLUGIN,
        "data/words.txt": "alpha beta",
      });
    });

    it("should extract the package under its base name and load it", async () => {
      const destination = await manager.install(packagePath);

      expect(destination).toBe(path.join(pluginsDir, "word-count"));
      expect(manager.has("word-count")).toBe(true);
      await expect(fs.readFile(path.join(destination, "data", "words.txt"), "utf-8")).resolves.toBe("alpha beta");
    });

    it("should add numeric suffixes on name collisions", async () => {
      const first = await manager.install(packagePath);
      const second = await manager.install(packagePath);
      const third = await manager.install(packagePath);

      expect([first, second, third].map((dir) => path.basename(dir))).toEqual([
        "word-count",
        "word-count_1",
        "word-count_2",
      ]);
      expect(manager.names()).toEqual(["word-count", "word-count_1", "word-count_2"]);
    });

    it("should keep the original plugin's hooks firing after a suffixed install", async () => {
      await manager.install(packagePath);
      await manager.install(packagePath);

      const result = await manager.callHook("on_save", { kind: "save", path: "/docs/report.txt" });

      expect(result).toEqual({ hook: "on_save", invoked: 2, failures: [] });
      expect(recorded(manager, "word-count")).toEqual(["/docs/report.txt"]);
      expect(recorded(manager, "word-count_1")).toEqual(["/docs/report.txt"]);
    });

    it("should skip names taken by directories that are not loaded", async () => {
      await fs.mkdir(path.join(pluginsDir, "word-count"));

      const destination = await manager.install(packagePath);

      expect(path.basename(destination)).toBe("word-count_1");
    });

    it("should strip a .zip extension", async () => {
      const zipPath = writePackage(path.join(workDir, "spell.zip"), { "plugin-main.js": RECORDING_PLUGIN });

      const destination = await manager.install(zipPath);

      expect(path.basename(destination)).toBe("spell");
    });

    it("should report a missing package file without touching the plugins root", async () => {
      const error = await manager.install(path.join(workDir, "missing.scpl")).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FileSystemError);
      expect(error).toHaveProperty("code", ErrorCode.FS_FILE_NOT_FOUND);
      expect(await listDir(pluginsDir)).toEqual([]);
    });

    it("should reject a file that is not a zip archive", async () => {
      const bogus = path.join(workDir, "bogus.scpl");
      await fs.writeFile(bogus, "definitely not a zip", "utf-8");

      const error = await manager.install(bogus).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PackageFormatError);
      expect(error).toHaveProperty("message", `Invalid plugin package ${bogus}: not a readable zip archive`);
      expect(await listDir(pluginsDir)).toEqual([]);
    });

    it("should reject an archive without plugin-main.js at its root", async () => {
      const nested = writePackage(path.join(workDir, "nested.scpl"), { "nested/plugin-main.js": RECORDING_PLUGIN });

      const error = await manager.install(nested).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PackageFormatError);
      expect(error).toHaveProperty("message", `Invalid plugin package ${nested}: plugin-main.js must be at the archive root`);
      expect(await listDir(pluginsDir)).toEqual([]);
    });

    it("should keep the extracted directory when the plugin fails to load", async () => {
      const failing = writePackage(path.join(workDir, "fails.scpl"), {
        "plugin-main.js": "exports.register = function () { throw new Error('nope'); };",
      });

      await expect(manager.install(failing)).rejects.toBeInstanceOf(RegistrationError);

      expect(manager.has("fails")).toBe(false);
      expect(await listDir(pluginsDir)).toEqual(["fails"]);
    });
  });

  describe("uninstall", () => {
    it("should unload the plugin and delete its directory", async () => {
      const dir = await writePlugin(pluginsDir, "recorder", RECORDING_PLUGIN);
      await manager.init();

      await manager.uninstall("recorder");

      expect(manager.has("recorder")).toBe(false);
      await expect(fs.access(dir)).rejects.toThrow();
    });

    it("should stop the plugin's timers", async () => {
      await writePlugin(pluginsDir, "ticker", TICKING_PLUGIN);
      await manager.init();
      const tickerExports = manager.get("ticker")?.unit.exports;
      await sleep(30);

      await manager.uninstall("ticker");
      const ticksAtUninstall = exportedValue(tickerExports, "ticks");
      await sleep(60);

      expect(exportedValue(tickerExports, "ticks")).toBe(ticksAtUninstall);
    });

    it("should reject an unknown name and leave the disk alone", async () => {
      await writePlugin(pluginsDir, "recorder", RECORDING_PLUGIN);
      await manager.init();

      const error = await manager.uninstall("ghost").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PluginNotFoundError);
      expect(error).toHaveProperty("message", 'Plugin "ghost" is not installed');
      expect(await listDir(pluginsDir)).toEqual(["recorder"]);
      expect(manager.names()).toEqual(["recorder"]);
    });

    it("should run queued mutations in call order", async () => {
      await manager.init();
      const packagePath = writePackage(path.join(workDir, "queued.scpl"), { "plugin-main.js": RECORDING_PLUGIN });

      const installing = manager.install(packagePath);
      const uninstalling = manager.uninstall("queued");

      await expect(installing).resolves.toBe(path.join(pluginsDir, "queued"));
      await expect(uninstalling).resolves.toBeUndefined();
      expect(manager.has("queued")).toBe(false);
      expect(await listDir(pluginsDir)).toEqual([]);
    });

    it("should keep the queue running after a failed mutation", async () => {
      await writePlugin(pluginsDir, "recorder", RECORDING_PLUGIN);

      const failing = manager.uninstall("ghost");
      const reloading = manager.loadAll();

      await expect(failing).rejects.toBeInstanceOf(PluginNotFoundError);
      await expect(reloading).resolves.toEqual({ loaded: ["recorder"], failed: 0 });
    });
  });

  describe("callHook", () => {
    it("should isolate a failing callback from the others", async () => {
      await writePlugin(pluginsDir, "a-throws", THROWING_PLUGIN);
      await writePlugin(pluginsDir, "b-records", RECORDING_PLUGIN);
      await manager.init();

      const result = await manager.callHook("on_save", { kind: "save", path: "/docs/draft.txt" });

      expect(result.hook).toBe("on_save");
      expect(result.invoked).toBe(1);
      expect(result.failures).toHaveLength(1);
      expect(result.failures[0].plugin).toBe("a-throws");
      expect(result.failures[0].error.message).toBe("callback exploded");
      expect(recorded(manager, "b-records")).toEqual(["/docs/draft.txt"]);
      expect(errorLines().some((line) => line.includes("Plugin a-throws hook on_save error"))).toBe(true);
    });

    it("should run callbacks in load order, then registration order", async () => {
      const source = (label: string) => `
        exports.register = function (api) {
          api.registerHook("on_event", function (event) { event.payload.order.push("${label}-1"); });
          api.registerHook("on_event", function (event) { event.payload.order.push("${label}-2"); });
        };
      `;
      await writePlugin(pluginsDir, "second", source("second"));
      await writePlugin(pluginsDir, "first", source("first"));
      await manager.init();
      const order: string[] = [];

      await manager.callHook("on_event", { kind: "event", name: "ping", payload: { order } });

      expect(order).toEqual(["first-1", "first-2", "second-1", "second-2"]);
    });

    it("should call a callback once per registration", async () => {
      await writePlugin(
        pluginsDir,
        "twice",
        `exports.calls = [];
        exports.register = function (api) {
          function record(event) { exports.calls.push(event.path); }
          api.registerHook("on_open", record);
          api.registerHook("on_open", record);
        };`
      );
      await manager.init();

      const result = await manager.callHook("on_open", { kind: "open", path: "/a.txt" });

      expect(result.invoked).toBe(2);
      expect(recorded(manager, "twice", "calls")).toEqual(["/a.txt", "/a.txt"]);
    });

    it("should report a hook nobody registered as an empty dispatch", async () => {
      await writePlugin(pluginsDir, "recorder", RECORDING_PLUGIN);
      await manager.init();

      await expect(manager.callHook("on_close")).resolves.toEqual({ hook: "on_close", invoked: 0, failures: [] });
    });

    it("should pass extra arguments through to callbacks", async () => {
      await writePlugin(
        pluginsDir,
        "custom",
        `exports.calls = [];
        exports.register = function (api) {
          api.registerHook("on_custom", function (a, b) { exports.calls.push(a + b); });
        };`
      );
      await manager.init();

      await manager.callHook("on_custom", 2, 3);

      expect(recorded(manager, "custom", "calls")).toEqual([5]);
    });

    it("should count a non-callable registration as a failure", async () => {
      await writePlugin(
        pluginsDir,
        "sloppy",
        `exports.calls = [];
        exports.register = function (api) {
          api.registerHook("on_save", "not a function");
          api.registerHook("on_save", function (event) { exports.calls.push(event.path); });
        };`
      );
      await manager.init();

      const result = await manager.callHook("on_save", { kind: "save", path: "/b.txt" });

      expect(result.invoked).toBe(1);
      expect(result.failures).toHaveLength(1);
      expect(recorded(manager, "sloppy", "calls")).toEqual(["/b.txt"]);
    });

    it("should count a rejected async callback as a failure", async () => {
      await writePlugin(
        pluginsDir,
        "async-fail",
        `exports.register = function (api) {
          api.registerHook("on_save", async function () { throw new Error("async boom"); });
        };`
      );
      await writePlugin(pluginsDir, "recorder", RECORDING_PLUGIN);
      await manager.init();

      const result = await manager.callHook("on_save", { kind: "save", path: "/c.txt" });

      expect(result.invoked).toBe(1);
      expect(result.failures.map((failure) => failure.error.message)).toEqual(["async boom"]);
      expect(recorded(manager, "recorder")).toEqual(["/c.txt"]);
    });

    it("should stop a callback that overruns the callback timeout", async () => {
      const impatient = createPluginManager(testConfig(pluginsDir, { timeouts: { load: 1000, callback: 50 } }));
      await writePlugin(
        pluginsDir,
        "a-spins",
        `exports.register = function (api) {
          api.registerHook("on_save", function () { while (true) {} });
        };`
      );
      await writePlugin(pluginsDir, "b-records", RECORDING_PLUGIN);
      await impatient.init();

      const result = await impatient.callHook("on_save", { kind: "save", path: "/d.txt" });

      expect(result.failures).toHaveLength(1);
      expect(result.failures[0].error.message).toMatch(/timed out/);
      expect(recorded(impatient, "b-records")).toEqual(["/d.txt"]);
    });

    it("should let callbacks register further hooks", async () => {
      await writePlugin(
        pluginsDir,
        "late",
        `exports.register = function (api) {
          api.registerHook("on_open", function () {
            api.registerHook("on_save", function () {});
          });
        };`
      );
      await manager.init();

      await manager.callHook("on_open", { kind: "open", path: "/e.txt" });

      expect(manager.get("late")?.hooks.get("on_save")).toHaveLength(1);
    });
  });

  describe("queries", () => {
    it("should describe loaded plugins", async () => {
      await writePlugin(
        pluginsDir,
        "summary",
        `exports.register = function (api) {
          api.registerHook("on_open", function () {});
          api.registerHook("on_save", function () {});
          api.registerHook("on_save", function () {});
        };`
      );
      await manager.init();

      const [info] = manager.list();

      expect(info.name).toBe("summary");
      expect(info.path).toBe(path.join(pluginsDir, "summary"));
      expect(info.namespace).toBe("scriptor_plugin_summary");
      expect(info.hooks).toEqual({ on_open: 1, on_save: 2 });
      expect(manager.has("summary")).toBe(true);
      expect(manager.get("nothing")).toBeUndefined();
    });
  });

  describe("pack", () => {
    it("should pack a plugin directory that installs again", async () => {
      const source = await writePlugin(path.join(workDir, "src"), "packed", RECORDING_PLUGIN);
      await manager.init();

      const archive = await manager.pack(source);
      const destination = await manager.install(archive);

      expect(archive).toBe(path.join(workDir, "src", "packed.scpl"));
      expect(destination).toBe(path.join(pluginsDir, "packed"));
      expect(manager.get("packed")?.hooks.get("on_save")).toHaveLength(1);
    });

    it("should write to an explicit output file", async () => {
      const source = await writePlugin(path.join(workDir, "src"), "custom-out", RECORDING_PLUGIN);
      const outFile = path.join(workDir, "dist", "release.scpl");

      await expect(manager.pack(source, outFile)).resolves.toBe(outFile);
      expect((await fs.stat(outFile)).isFile()).toBe(true);
    });

    it("should refuse a directory without plugin-main.js", async () => {
      const dir = path.join(workDir, "incomplete");
      await fs.mkdir(dir);

      await expect(manager.pack(dir)).rejects.toBeInstanceOf(MissingEntrypointError);
    });
  });
});
