/**
 * File System Utilities
 * Module discovery and output directory helpers
 */

import * as fsPromises from "node:fs/promises";
import * as path from "node:path";
import fg from "fast-glob";

export interface ListFilesOptions {
  /** Directory the patterns are matched in */
  cwd: string;
  patterns: string[];
  ignore?: string[];
  /** Maximum directory depth; 1 keeps the search to `cwd` itself */
  deep?: number;
}

/**
 * Absolute paths of the files matching `patterns`, sorted so that every run
 * visits them in the same order.
 */
export async function listFiles(options: ListFilesOptions): Promise<string[]> {
  const files = await fg(options.patterns, {
    cwd: options.cwd,
    absolute: true,
    onlyFiles: true,
    deep: options.deep,
    ignore: ["**/node_modules/**", ...(options.ignore ?? [])],
    dot: false,
  });
  return files.sort();
}

export async function readTextFile(filePath: string): Promise<string> {
  return fsPromises.readFile(filePath, { encoding: "utf-8" });
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fsPromises.access(target);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await fsPromises.stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
}

export async function ensureDirectory(dirPath: string): Promise<void> {
  await fsPromises.mkdir(dirPath, { recursive: true });
}

/**
 * Writes a text file, creating its parent directories first
 */
export async function writeTextFile(filePath: string, content: string): Promise<void> {
  await ensureDirectory(path.dirname(filePath));
  await fsPromises.writeFile(filePath, content, "utf-8");
}

export async function removeDirectory(dirPath: string): Promise<void> {
  await fsPromises.rm(dirPath, { recursive: true, force: true });
}

/**
 * Copies files into a directory under their base names
 */
export async function copyFilesInto(files: string[], targetDir: string): Promise<void> {
  await ensureDirectory(targetDir);
  for (const file of files) {
    await fsPromises.copyFile(file, path.join(targetDir, path.basename(file)));
  }
}
