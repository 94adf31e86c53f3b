export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * RFC 6901 lookup. Accepts the slash-less form used in host configuration
 * ("Metadata/Id") as well as the canonical "/Metadata/Id".
 * Returns `undefined` when any segment is missing.
 */
export function resolvePointer(doc: unknown, pointer: string): unknown {
  if (pointer === "") return doc;

  const normalized = pointer.startsWith("/") ? pointer.slice(1) : pointer;
  const segments = normalized
    .split("/")
    .map((segment) => segment.replace(/~1/g, "/").replace(/~0/g, "~"));

  let current: unknown = doc;
  for (const segment of segments) {
    if (Array.isArray(current)) {
      if (!/^(0|[1-9]\d*)$/.test(segment)) return undefined;
      current = current[Number(segment)];
    } else if (isJsonObject(current)) {
      if (!Object.prototype.hasOwnProperty.call(current, segment)) return undefined;
      current = current[segment];
    } else {
      return undefined;
    }
  }
  return current;
}

export function normalizePointer(pointer: string): string {
  return pointer.startsWith("/") ? pointer : `/${pointer}`;
}
