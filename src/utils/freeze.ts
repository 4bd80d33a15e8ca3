/**
 * Deep freeze an object and all nested objects.
 * Prevents any mutation of configs, requests and results after creation.
 */
export function deepFreeze<T extends object>(obj: T): T {
  // Freeze nested objects first (depth-first)
  for (const value of Object.values(obj)) {
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }

  Object.freeze(obj);
  return obj;
}
