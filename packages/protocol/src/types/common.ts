// Common types used across the protocol

/**
 * Unsigned 64-bit identifier in canonical decimal form (no leading zeros).
 * Guilds, roles and users all share this id space; the everyone role has
 * its guild's id.
 */
export type Id = string;

const MAX_ID = (1n << 64n) - 1n;

/**
 * Raw forms accepted for an id.
 */
export type IdInput = string | number | bigint;

/**
 * Parse an id into canonical form.
 *
 * Returns `undefined` for anything that is not an unsigned 64-bit integer.
 */
export function parseId(value: IdInput): Id | undefined {
  let parsed: bigint;

  if (typeof value === 'string') {
    if (!/^\d+$/.test(value)) return undefined;
    parsed = BigInt(value);
  } else if (typeof value === 'number') {
    if (!Number.isSafeInteger(value) || value < 0) return undefined;
    parsed = BigInt(value);
  } else {
    parsed = value;
  }

  if (parsed < 0n || parsed > MAX_ID) return undefined;
  return parsed.toString();
}

export function isId(value: unknown): value is Id {
  return typeof value === 'string' && parseId(value) === value;
}
