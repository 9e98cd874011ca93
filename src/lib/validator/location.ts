/**
 * Location paths for validation issues
 *
 * A location is a sequence of mapping keys and sequence indices from the
 * document root, rendered JSONPath-style: `$`, `.field`, `[n]`.
 */

import type { DocumentValue } from "../../types/data-model.js";

export type PathSegment = string | number;

export function formatLocation(path: readonly PathSegment[]): string {
  let location = "$";
  for (const segment of path) {
    location += typeof segment === "number" ? `[${segment}]` : `.${segment}`;
  }
  return location;
}

function unescapePointerToken(token: string): string {
  return token.replace(/~1/g, "/").replace(/~0/g, "~");
}

/**
 * Convert an Ajv instancePath (JSON Pointer) into path segments
 *
 * A token becomes an index only where the document holds a sequence at that
 * point, so mapping keys that look numeric stay keys.
 */
export function pointerToPath(document: DocumentValue, pointer: string): PathSegment[] {
  if (pointer === "") {
    return [];
  }

  const path: PathSegment[] = [];
  let current: DocumentValue | undefined = document;

  for (const token of pointer.slice(1).split("/").map(unescapePointerToken)) {
    if (Array.isArray(current)) {
      const index = Number(token);
      path.push(index);
      current = current[index];
    } else {
      path.push(token);
      current =
        typeof current === "object" && current !== null ? current[token] : undefined;
    }
  }

  return path;
}

/**
 * Value held by the document at the given path, if any
 */
export function valueAt(
  document: DocumentValue,
  path: readonly PathSegment[],
): DocumentValue | undefined {
  let current: DocumentValue | undefined = document;
  for (const segment of path) {
    if (typeof segment === "number") {
      current = Array.isArray(current) ? current[segment] : undefined;
    } else if (typeof current === "object" && current !== null && !Array.isArray(current)) {
      current = current[segment];
    } else {
      return undefined;
    }
  }
  return current;
}
