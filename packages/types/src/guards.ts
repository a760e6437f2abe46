/**
 * Runtime type guards for values crossing a package boundary.
 */

/**
 * Check whether `value` is a valid hexadecimal string (even length, [0-9a-fA-F]).
 * The empty string is accepted and encodes zero bytes.
 */
export function isValidHex(value: unknown): boolean {
  return (
    typeof value === 'string' &&
    value.length % 2 === 0 &&
    /^[0-9a-fA-F]*$/.test(value)
  );
}

/** Check whether `value` is a `Uint8Array` (Node `Buffer` included). */
export function isByteArray(value: unknown): value is Uint8Array {
  return value instanceof Uint8Array;
}

/**
 * Check whether `value` is a plain object (not an array, null, or an object
 * with a non-Object prototype).
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Exhaustiveness check for `switch` statements over unions.
 *
 * @example
 * ```ts
 * switch (position) {
 *   case 'left': return hashPair(sibling, current);
 *   case 'right': return hashPair(current, sibling);
 *   default: return assertNever(position);
 * }
 * ```
 */
export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${String(value)}`);
}
