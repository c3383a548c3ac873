/**
 * Dot paths into JSON data: `a.b.0.c`. A `*` segment expands to every element
 * of an array (or every value of an object).
 */

export type PathMatch = {
  path: string;
  value: unknown;
};

export function splitPath(path: string): string[] {
  return path === "" ? [] : path.split(".");
}

/** Resolve a path without wildcards. Missing segments yield undefined. */
export function getPath(value: unknown, path: string): unknown {
  let current = value;
  for (const segment of splitPath(path)) {
    if (Array.isArray(current)) {
      const index = Number(segment);
      current = Number.isInteger(index) ? current[index] : undefined;
    } else if (typeof current === "object" && current !== null) {
      current = Object.hasOwn(current, segment) ? Reflect.get(current, segment) : undefined;
    } else {
      return undefined;
    }
  }
  return current;
}

/** Resolve a path that may contain `*` segments, returning every concrete match. */
export function collectPath(value: unknown, path: string): PathMatch[] {
  let frontier: PathMatch[] = [{ path: "", value }];
  for (const segment of splitPath(path)) {
    const next: PathMatch[] = [];
    for (const { path: at, value: current } of frontier) {
      if (segment === "*") {
        const children = Array.isArray(current)
          ? current.map((v, i) => [String(i), v] as const)
          : typeof current === "object" && current !== null
            ? Object.entries(current)
            : [];
        for (const [key, child] of children) next.push({ path: join(at, key), value: child });
      } else {
        next.push({ path: join(at, segment), value: getPath(current, segment) });
      }
    }
    frontier = next;
  }
  return frontier;
}

/** Every string leaf under `value`, with its path. */
export function stringLeaves(value: unknown, at = ""): PathMatch[] {
  if (typeof value === "string") return [{ path: at, value }];
  if (Array.isArray(value)) return value.flatMap((v, i) => stringLeaves(v, join(at, String(i))));
  if (typeof value === "object" && value !== null) {
    return Object.entries(value).flatMap(([k, v]) => stringLeaves(v, join(at, k)));
  }
  return [];
}

function join(base: string, segment: string): string {
  return base === "" ? segment : `${base}.${segment}`;
}
