/**
 * Deep freeze for parsed documents.
 */

/**
 * Recursively freezes an object and everything reachable from it.
 * Freezes in place and returns the same reference. Cycles are handled.
 */
export function deepFreeze<T>(obj: T): T {
  if (obj !== null && typeof obj === "object") {
    freezeRecursive(obj, new WeakSet<object>());
  }
  return obj;
}

function freezeRecursive(obj: object, seen: WeakSet<object>): void {
  if (seen.has(obj) || ArrayBuffer.isView(obj)) {
    return;
  }

  seen.add(obj);
  Object.freeze(obj);

  for (const value of Object.values(obj)) {
    if (value !== null && typeof value === "object") {
      freezeRecursive(value, seen);
    }
  }
}
