export function normalizeCollectionPath(path: string): string {
  if (path === "" || path === "/") {
    return path;
  }
  return path.replace(/\/+$/, "");
}

// "" and "/" never compare equal.
export function sameCollectionPath(a: string, b: string): boolean {
  if (a === b) {
    return true;
  }
  return normalizeCollectionPath(a) === normalizeCollectionPath(b);
}

/** The collection containing `path`, with a trailing slash. */
export function parentCollectionPath(path: string): string {
  const index = path.lastIndexOf("/");
  if (index <= 0) {
    return path;
  }
  return path.slice(0, index + 1);
}
