import { createPosixPathAdapter } from "./posix-path.js";
import type { ModuleHost, ModulePathAdapter } from "./types.js";

/** In-memory project tree; writes land in the same map reads come from. */
export const createMemoryModuleHost = ({
  files,
  pathAdapter = createPosixPathAdapter(),
}: {
  files: Record<string, string>;
  pathAdapter?: ModulePathAdapter;
}): ModuleHost & { files: ReadonlyMap<string, string> } => {
  const contents = new Map<string, string>();
  const directories = new Map<string, Set<string>>();

  const entriesOf = (dir: string): Set<string> => {
    const existing = directories.get(dir);
    if (existing) return existing;
    const created = new Set<string>();
    directories.set(dir, created);
    return created;
  };

  const normalizePath = (path: string) => pathAdapter.resolve(path);

  const registerPath = (path: string) => {
    let child = path;
    let current = pathAdapter.dirname(path);
    while (true) {
      entriesOf(current).add(child);
      const parent = pathAdapter.dirname(current);
      if (parent === current) break;
      child = current;
      current = parent;
    }
  };

  const store = (path: string, text: string) => {
    const full = normalizePath(path);
    contents.set(full, text);
    registerPath(full);
  };

  Object.entries(files).forEach(([path, text]) => store(path, text));

  const isDirectoryPath = (path: string) =>
    directories.has(path) && !contents.has(path);

  return {
    path: pathAdapter,
    files: contents,
    readFile: async (path: string) => {
      const resolved = normalizePath(path);
      const file = contents.get(resolved);
      if (file === undefined) {
        throw new Error(`File not found: ${resolved}`);
      }
      return file;
    },
    writeFile: async (path: string, text: string) => store(path, text),
    readDir: async (path: string) => {
      const resolved = normalizePath(path);
      return Array.from(directories.get(resolved) ?? []);
    },
    fileExists: async (path: string) => contents.has(normalizePath(path)),
    isDirectory: async (path: string) => isDirectoryPath(normalizePath(path)),
  };
};
