/**
 * Filesystem helpers shared by the deploy and write paths
 */

import * as crypto from "crypto";
import * as fs from "fs/promises";
import * as path from "path";

import { describeError } from "@/cli/errors.js";
import { debug } from "@/cli/logger.js";

/**
 * Check if a path exists
 * @param filePath - Path to check
 *
 * @returns True if exists
 */
export const pathExists = async (filePath: string): Promise<boolean> => {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
};

/**
 * Build a hidden temporary path next to a target
 * @param targetPath - Final path of the entry
 *
 * @returns Path of the form `<dir>/.<name>.<random>.tmp`
 */
export const getTempSibling = (targetPath: string): string => {
  const dir = path.dirname(targetPath);
  const base = path.basename(targetPath);
  const rand = crypto.randomBytes(6).toString("hex");
  return path.join(dir, `.${base}.${rand}.tmp`);
};

/**
 * Remove a temporary entry left behind by a failed write
 * @param tmpPath - Temporary path to remove
 */
export const discardTemp = async (tmpPath: string): Promise<void> => {
  await fs.rm(tmpPath, { recursive: true, force: true }).catch((err: unknown) => {
    debug({
      message: `Could not remove temporary ${tmpPath}: ${describeError(err)}`,
    });
  });
};

/**
 * Copy a directory tree
 *
 * @param args - Copy arguments
 * @param args.src - Source directory
 * @param args.dest - Destination directory, created when missing
 *
 * @returns Number of files copied
 */
export const copyDirRecursive = async (args: {
  src: string;
  dest: string;
}): Promise<number> => {
  const { src, dest } = args;
  let count = 0;

  const copyRecursive = async (
    srcDir: string,
    destDir: string,
  ): Promise<void> => {
    await fs.mkdir(destDir, { recursive: true });

    const entries = await fs.readdir(srcDir, { withFileTypes: true });
    for (const entry of entries) {
      const srcPath = path.join(srcDir, entry.name);
      const destPath = path.join(destDir, entry.name);

      if (entry.isDirectory()) {
        await copyRecursive(srcPath, destPath);
      } else if (entry.isFile()) {
        await fs.copyFile(srcPath, destPath);
        const { mode } = await fs.stat(srcPath);
        await fs.chmod(destPath, mode);
        count++;
      }
    }
  };

  await copyRecursive(src, dest);
  return count;
};

/**
 * Write a file through a temporary sibling and a rename
 * @param args - Write arguments
 * @param args.filePath - Target file path
 * @param args.content - File content (text is written as UTF-8, bytes as they are)
 */
export const writeFileAtomic = async (args: {
  filePath: string;
  content: string | Buffer;
}): Promise<void> => {
  const { filePath, content } = args;
  await fs.mkdir(path.dirname(filePath), { recursive: true });

  const tmpPath = getTempSibling(filePath);
  try {
    await fs.writeFile(
      tmpPath,
      content,
      typeof content === "string" ? "utf-8" : null,
    );
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    await discardTemp(tmpPath);
    throw err;
  }
};

/**
 * Write pretty-printed JSON with a trailing newline
 * @param args - Write arguments
 * @param args.filePath - Target file path
 * @param args.data - Value to serialize
 */
export const writeJsonAtomic = async (args: {
  filePath: string;
  data: unknown;
}): Promise<void> => {
  const { filePath, data } = args;
  await writeFileAtomic({
    filePath,
    content: `${JSON.stringify(data, null, 2)}\n`,
  });
};
