import { mkdir, readFile, readdir, stat, writeFile } from "node:fs/promises";
import { basename, dirname, join, normalize, relative, resolve } from "node:path";
import type { ModuleHost, ModulePathAdapter } from "./types.js";

const nodePathAdapter: ModulePathAdapter = {
  resolve,
  join,
  relative,
  dirname,
  basename,
  normalize,
};

export const createFsModuleHost = (): ModuleHost => {
  const fileCache = new Map<string, boolean>();
  const dirCache = new Map<string, boolean>();

  const isDirectory = async (path: string): Promise<boolean> => {
    const cached = dirCache.get(path);
    if (typeof cached === "boolean") {
      return cached;
    }
    const result = await stat(path)
      .then((info) => info.isDirectory())
      .catch(() => false);
    dirCache.set(path, result);
    return result;
  };

  const fileExists = async (path: string): Promise<boolean> => {
    const cached = fileCache.get(path);
    if (typeof cached === "boolean") {
      return cached;
    }
    const result = await stat(path)
      .then((info) => info.isFile())
      .catch(() => false);
    fileCache.set(path, result);
    return result;
  };

  return {
    path: nodePathAdapter,
    readFile: (path: string) => readFile(path, "utf8"),
    writeFile: async (filePath: string, contents: string) => {
      await mkdir(nodePathAdapter.dirname(filePath), { recursive: true });
      await writeFile(filePath, contents, "utf8");
      fileCache.set(filePath, true);
    },
    readDir: (path: string) =>
      readdir(path).then((entries) =>
        entries.map((entry) => nodePathAdapter.join(path, entry)),
      ),
    fileExists,
    isDirectory,
  };
};
