import type { FileStore } from "@dubline/core";
import fs from "fs/promises";
import os from "os";
import path from "path";

const ensureParentDir = async (filePath: string) => {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
};

export const writeJSON = async <T>(filePath: string, data: T) => {
  await ensureParentDir(filePath);
  await fs.writeFile(filePath, `${JSON.stringify(data, null, 2)}\n`);
};

export const nodeFileStore: FileStore = {
  readText: (filePath) => fs.readFile(filePath, "utf8"),
  writeText: async (filePath, content) => {
    await ensureParentDir(filePath);
    await fs.writeFile(filePath, content, "utf8");
  },
  writeBytes: async (filePath, data) => {
    await ensureParentDir(filePath);
    await fs.writeFile(filePath, data);
  },
};

export const createTempDir = (prefix: string) =>
  fs.mkdtemp(path.join(os.tmpdir(), prefix));

export const removeDir = (dir: string) =>
  fs.rm(dir, { recursive: true, force: true });

/**
 * Runs `fn` with a fresh temporary directory that is removed afterwards,
 * whether `fn` resolves or throws.
 */
export const withTempDir = async <T>(
  prefix: string,
  fn: (dir: string) => Promise<T>
): Promise<T> => {
  const dir = await createTempDir(prefix);
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
};
