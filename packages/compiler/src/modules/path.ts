import type { ModuleId } from "../semantics/ids.js";
import type { ModuleHost, ModuleLocation, ModulePathAdapter } from "./types.js";

const PY_EXTENSION = ".py";
const INIT_STEM = "__init__";

/** The project root itself, reachable through `from . import x` in a top-level module. */
export const ROOT_PACKAGE: ModuleId = "";

const toSlashes = (value: string) => value.replace(/\\/g, "/");

export const relativeModulePath = ({
  root,
  filePath,
  path,
}: {
  root: string;
  filePath: string;
  path: ModulePathAdapter;
}): string => toSlashes(path.relative(root, filePath));

/** `pkg/sub/mod.py` → `pkg.sub.mod`; `pkg/__init__.py` → `pkg`. */
export const moduleIdFromFile = ({
  root,
  filePath,
  path,
}: {
  root: string;
  filePath: string;
  path: ModulePathAdapter;
}): ModuleId | undefined => {
  const relative = relativeModulePath({ root, filePath, path });
  if (!relative || relative.startsWith("../") || relative === "..") {
    return undefined;
  }
  const segments = relative.split("/");
  const file = segments.pop() ?? "";
  const stem = file.endsWith(PY_EXTENSION)
    ? file.slice(0, -PY_EXTENSION.length)
    : file;
  if (stem !== INIT_STEM || segments.length === 0) {
    segments.push(stem);
  }
  return segments.join(".");
};

export const isPackageFile = (filePath: string, path: ModulePathAdapter) =>
  path.basename(filePath, PY_EXTENSION) === INIT_STEM;

/** A package is preferred over a module file of the same name. */
export const locateModule = async ({
  host,
  root,
  moduleId,
}: {
  host: ModuleHost;
  root: string;
  moduleId: ModuleId;
}): Promise<ModuleLocation | undefined> => {
  if (moduleId === ROOT_PACKAGE) {
    return { kind: "namespace", directory: root };
  }

  const base = host.path.join(root, ...moduleId.split("."));
  const init = host.path.join(base, `${INIT_STEM}${PY_EXTENSION}`);
  if (await host.fileExists(init)) {
    return { kind: "file", filePath: init, isPackage: true };
  }
  const file = `${base}${PY_EXTENSION}`;
  if (await host.fileExists(file)) {
    return { kind: "file", filePath: file, isPackage: false };
  }
  if (await host.isDirectory(base)) {
    return { kind: "namespace", directory: base };
  }
  return undefined;
};

/**
 * Absolute name of the module a `from` import names. Relative levels count
 * from the importing module's package; `undefined` when they climb above
 * the project root.
 */
export const absoluteImportName = ({
  importer,
  importerIsPackage,
  module,
  level,
}: {
  importer: ModuleId;
  importerIsPackage: boolean;
  module?: string;
  level: number;
}): ModuleId | undefined => {
  if (level === 0) return module ?? ROOT_PACKAGE;

  const importerSegments = importer ? importer.split(".") : [];
  const packageSegments = importerIsPackage
    ? importerSegments
    : importerSegments.slice(0, -1);
  const hops = level - 1;
  if (hops > packageSegments.length) return undefined;

  return [
    ...packageSegments.slice(0, packageSegments.length - hops),
    ...(module ? module.split(".") : []),
  ].join(".");
};

/** `a.b.c` → `["a", "a.b", "a.b.c"]`. */
export const moduleAncestry = (moduleId: ModuleId): ModuleId[] => {
  const segments = moduleId.split(".");
  return segments.map((_, index) => segments.slice(0, index + 1).join("."));
};

export const topLevelName = (moduleId: ModuleId): string =>
  moduleId.split(".")[0] ?? moduleId;
