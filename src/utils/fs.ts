/**
 * Filesystem Utilities
 * Shared filesystem helper functions
 */

import { access, copyFile, mkdir, stat, writeFile } from "fs/promises";
import { constants } from "node:fs";
import { dirname } from "node:path";

/**
 * Check if a file or directory exists
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a path exists and is a directory
 */
export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Write a text file, creating its parent folders
 */
export async function writeOutput(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, "utf-8");
}

/**
 * Copy a file byte for byte, creating the target's parent folders
 */
export async function copyOutput(source: string, target: string): Promise<void> {
  await mkdir(dirname(target), { recursive: true });
  await copyFile(source, target);
}
