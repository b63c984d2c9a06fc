export function isKVMap(x: unknown): x is Record<string, unknown> {
  if (typeof x !== "object" || x == null || Array.isArray(x)) {
    return false;
  }

  const prototype = Object.getPrototypeOf(x);
  return (
    (prototype === null || prototype === Object.prototype) &&
    !(Symbol.toStringTag in x) &&
    !(Symbol.iterator in x)
  );
}

export const isOptionalString = (x: unknown): x is string | undefined =>
  x === undefined || typeof x === "string";
