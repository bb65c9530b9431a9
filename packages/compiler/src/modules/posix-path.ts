import type { ModulePathAdapter } from "./types.js";

/*
 * Forward-slash paths for hosts that do not touch the disk. Relative inputs
 * are anchored at `/`.
 */

const splitPath = (value: string): { absolute: boolean; segments: string[] } => {
  const slashed = value.replace(/\\/g, "/");
  return {
    absolute: slashed.startsWith("/"),
    segments: slashed.split("/").filter((segment) => segment && segment !== "."),
  };
};

const collapse = (segments: readonly string[], keepLeadingUps: boolean): string[] =>
  segments.reduce<string[]>((out, segment) => {
    if (segment !== "..") {
      out.push(segment);
    } else if (out.length > 0 && out.at(-1) !== "..") {
      out.pop();
    } else if (keepLeadingUps) {
      out.push(segment);
    }
    return out;
  }, []);

const format = (absolute: boolean, segments: readonly string[]): string => {
  const body = segments.join("/");
  if (absolute) return `/${body}`;
  return body || ".";
};

export const normalizePosixPath = (value: string): string => {
  const { absolute, segments } = splitPath(value);
  return format(absolute, collapse(segments, !absolute));
};

export const joinPosixPaths = (...parts: string[]): string => {
  let absolute = false;
  let segments: string[] = [];
  parts.forEach((part) => {
    if (!part) return;
    const parsed = splitPath(part);
    if (parsed.absolute) {
      absolute = true;
      segments = parsed.segments;
      return;
    }
    segments.push(...parsed.segments);
  });
  return format(absolute, collapse(segments, !absolute));
};

export const resolvePosixPath = (value: string): string =>
  joinPosixPaths("/", value);

export const relativePosixPath = (from: string, to: string): string => {
  const fromSegments = splitPath(resolvePosixPath(from)).segments;
  const toSegments = splitPath(resolvePosixPath(to)).segments;
  let shared = 0;
  while (
    shared < fromSegments.length &&
    shared < toSegments.length &&
    fromSegments[shared] === toSegments[shared]
  ) {
    shared += 1;
  }
  return [
    ...fromSegments.slice(shared).map(() => ".."),
    ...toSegments.slice(shared),
  ].join("/");
};

export const posixDirname = (value: string): string => {
  const { absolute, segments } = splitPath(value);
  if (segments.length === 0) return absolute ? "/" : ".";
  return format(absolute, segments.slice(0, -1));
};

export const posixBasename = (value: string, ext = ""): string => {
  const last = splitPath(value).segments.at(-1) ?? "";
  return ext && last.endsWith(ext) ? last.slice(0, -ext.length) : last;
};

export const createPosixPathAdapter = (): ModulePathAdapter => ({
  resolve: resolvePosixPath,
  join: joinPosixPaths,
  relative: relativePosixPath,
  dirname: posixDirname,
  basename: posixBasename,
  normalize: normalizePosixPath,
});
