/**
 * Plugin packages
 *
 * A package is a zip archive (conventionally `.scpl`) whose root holds the
 * plugin's entry point. Installing extracts it verbatim into a fresh plugin
 * directory; packing zips a plugin directory back up.
 */

import fs from "node:fs/promises";
import path from "node:path";
import AdmZip from "adm-zip";

import { PACKAGE_EXTENSION, PLUGIN_ENTRYPOINT } from "./types.js";
import { ErrorCode, FileSystemError, MissingEntrypointError, PackageFormatError, toError } from "../utils/errors.js";
import { t } from "../i18n/index.js";

/**
 * Open a package and check it carries the entry point at its root.
 *
 * @throws {FileSystemError} FS_FILE_NOT_FOUND when the file does not exist
 * @throws {PackageFormatError} unreadable archive or missing root entry point
 */
export async function openPackage(packagePath: string): Promise<AdmZip> {
  const absolute = path.resolve(packagePath);

  try {
    const stat = await fs.stat(absolute);
    if (!stat.isFile()) {
      throw new FileSystemError(ErrorCode.FS_FILE_NOT_FOUND, undefined, { path: absolute, operation: "read" });
    }
  } catch (error) {
    if (error instanceof FileSystemError) throw error;
    throw FileSystemError.fromNodeError(error as NodeJS.ErrnoException, absolute, "read");
  }

  let zip: AdmZip;
  try {
    zip = new AdmZip(absolute);
  } catch (error) {
    throw new PackageFormatError(absolute, t("errors:reasons.not_an_archive"), toError(error));
  }

  const hasEntrypoint = zip.getEntries().some((entry) => !entry.isDirectory && entry.entryName === PLUGIN_ENTRYPOINT);
  if (!hasEntrypoint) {
    throw new PackageFormatError(absolute, t("errors:reasons.missing_entrypoint", { entrypoint: PLUGIN_ENTRYPOINT }));
  }

  return zip;
}

/**
 * Base name of a package without its extension: `word-count.scpl` → `word-count`
 */
export function packageBaseName(packagePath: string): string {
  return path.parse(packagePath).name;
}

/**
 * Extract every entry of a package into `destination`.
 */
export async function extractPackage(zip: AdmZip, destination: string): Promise<void> {
  try {
    await fs.mkdir(destination, { recursive: true });
    zip.extractAllTo(destination, false);
  } catch (error) {
    throw FileSystemError.fromNodeError(toError(error), destination, "extract");
  }
}

/**
 * Zip a plugin directory into a package.
 *
 * @param directory - Plugin directory; must contain the entry point
 * @param outFile - Defaults to `<directory>.scpl` beside the directory
 * @returns Absolute path of the written package
 */
export async function packDirectory(directory: string, outFile?: string): Promise<string> {
  const pluginPath = path.resolve(directory);
  const name = path.basename(pluginPath);

  try {
    const stat = await fs.stat(path.join(pluginPath, PLUGIN_ENTRYPOINT));
    if (!stat.isFile()) {
      throw new MissingEntrypointError(name, pluginPath, PLUGIN_ENTRYPOINT);
    }
  } catch (error) {
    if (error instanceof MissingEntrypointError) throw error;
    throw new MissingEntrypointError(name, pluginPath, PLUGIN_ENTRYPOINT);
  }

  const target = path.resolve(outFile ?? path.join(path.dirname(pluginPath), `${name}${PACKAGE_EXTENSION}`));
  const zip = new AdmZip();
  zip.addLocalFolder(pluginPath);

  try {
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, zip.toBuffer());
  } catch (error) {
    throw FileSystemError.fromNodeError(error as NodeJS.ErrnoException, target, "write");
  }

  return target;
}
