const normalizeOutput = (value: unknown): unknown => {
  if (value instanceof Map) {
    return Object.fromEntries(
      Array.from(value.entries()).map(([key, entry]): [string, unknown] => [
        String(key),
        normalizeOutput(entry),
      ]),
    );
  }
  if (value instanceof Set) {
    return Array.from(value).map(normalizeOutput);
  }
  if (Array.isArray(value)) {
    return value.map(normalizeOutput);
  }
  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]): [string, unknown] => [
        key,
        normalizeOutput(entry),
      ]),
    );
  }
  return value;
};

export const stringifyOutput = (value: unknown): string =>
  JSON.stringify(normalizeOutput(value), undefined, 2);
