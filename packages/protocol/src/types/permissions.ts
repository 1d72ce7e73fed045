// Permission flags and the bitmask value type
//
// Flags are packed into an unsigned 64-bit integer carried as a bigint.
// Bits that are not a named flag are always zero.

/**
 * Named permission bits.
 */
export const Permissions = {
  CREATE_INVITE: 1n << 0n,
  KICK_MEMBERS: 1n << 1n,
  BAN_MEMBERS: 1n << 2n,
  ADMINISTRATOR: 1n << 3n,
  MANAGE_CHANNELS: 1n << 4n,
  MANAGE_GUILD: 1n << 5n,
  ADD_REACTIONS: 1n << 6n,
  VIEW_AUDIT_LOG: 1n << 7n,
  PRIORITY_SPEAKER: 1n << 8n,
  STREAM: 1n << 9n,
  VIEW_CHANNEL: 1n << 10n,
  SEND_MESSAGES: 1n << 11n,
  SEND_TTS_MESSAGES: 1n << 12n,
  MANAGE_MESSAGES: 1n << 13n,
  EMBED_LINKS: 1n << 14n,
  ATTACH_FILES: 1n << 15n,
  READ_MESSAGE_HISTORY: 1n << 16n,
  MENTION_EVERYONE: 1n << 17n,
  USE_EXTERNAL_EMOJIS: 1n << 18n,
  VIEW_GUILD_INSIGHTS: 1n << 19n,
  CONNECT: 1n << 20n,
  SPEAK: 1n << 21n,
  MUTE_MEMBERS: 1n << 22n,
  DEAFEN_MEMBERS: 1n << 23n,
  MOVE_MEMBERS: 1n << 24n,
  USE_VAD: 1n << 25n,
  CHANGE_NICKNAME: 1n << 26n,
  MANAGE_NICKNAMES: 1n << 27n,
  MANAGE_ROLES: 1n << 28n,
  MANAGE_WEBHOOKS: 1n << 29n,
  MANAGE_EMOJIS: 1n << 30n,
  USE_APPLICATION_COMMANDS: 1n << 31n,
  REQUEST_TO_SPEAK: 1n << 32n,
  MANAGE_EVENTS: 1n << 33n,
  MANAGE_THREADS: 1n << 34n,
  CREATE_PUBLIC_THREADS: 1n << 35n,
  CREATE_PRIVATE_THREADS: 1n << 36n,
  USE_EXTERNAL_STICKERS: 1n << 37n,
  SEND_MESSAGES_IN_THREADS: 1n << 38n,
  USE_EMBEDDED_ACTIVITIES: 1n << 39n,
  MODERATE_MEMBERS: 1n << 40n,
} as const;

export type PermissionFlag = keyof typeof Permissions;

/**
 * Flag names in bit order.
 */
export const PERMISSION_FLAGS: readonly PermissionFlag[] =
  Object.keys(Permissions).filter(isPermissionFlag);

/**
 * Every named bit set.
 */
export const ALL_PERMISSIONS: bigint = PERMISSION_FLAGS.reduce(
  (bits, flag) => bits | Permissions[flag],
  0n
);

const MAX_BITS = (1n << 64n) - 1n;

export function isPermissionFlag(name: string): name is PermissionFlag {
  return Object.prototype.hasOwnProperty.call(Permissions, name);
}

/**
 * An immutable set of permission flags.
 *
 * @example
 * ```typescript
 * const base = PermissionBitmask.fromFlags('VIEW_CHANNEL', 'SEND_MESSAGES');
 * const muted = base.difference(PermissionBitmask.fromFlags('SEND_MESSAGES'));
 *
 * muted.has('VIEW_CHANNEL'); // true
 * muted.toString(); // "1024"
 * ```
 */
export class PermissionBitmask {
  private static readonly EMPTY = new PermissionBitmask(0n);
  private static readonly ALL = new PermissionBitmask(ALL_PERMISSIONS);

  private constructor(readonly bits: bigint) {}

  static empty(): PermissionBitmask {
    return PermissionBitmask.EMPTY;
  }

  static all(): PermissionBitmask {
    return PermissionBitmask.ALL;
  }

  /**
   * Build a bitmask from raw bits, dropping any bit that is not a named flag.
   */
  static fromBits(bits: bigint): PermissionBitmask {
    if (bits < 0n) {
      throw new RangeError(`Permission bits must be unsigned, got ${bits}`);
    }
    const truncated = bits & ALL_PERMISSIONS;
    if (truncated === 0n) return PermissionBitmask.EMPTY;
    if (truncated === ALL_PERMISSIONS) return PermissionBitmask.ALL;
    return new PermissionBitmask(truncated);
  }

  /**
   * Build a bitmask from raw bits, rejecting unknown or out-of-range bits.
   */
  static fromBitsStrict(bits: bigint): PermissionBitmask {
    if (bits < 0n || bits > MAX_BITS) {
      throw new RangeError(`Permission bits out of 64-bit range: ${bits}`);
    }
    const unknown = bits & ~ALL_PERMISSIONS;
    if (unknown !== 0n) {
      throw new RangeError(`Unknown permission bits set: ${unknown}`);
    }
    return PermissionBitmask.fromBits(bits);
  }

  static fromFlags(...flags: PermissionFlag[]): PermissionBitmask {
    let bits = 0n;
    for (const flag of flags) {
      bits |= Permissions[flag];
    }
    return PermissionBitmask.fromBits(bits);
  }

  /**
   * Parse the decimal string form used on the wire.
   */
  static parse(value: string): PermissionBitmask {
    if (!/^\d+$/.test(value)) {
      throw new RangeError(`Invalid permission bitfield: "${value}"`);
    }
    const bits = BigInt(value);
    if (bits > MAX_BITS) {
      throw new RangeError(`Permission bits out of 64-bit range: ${value}`);
    }
    return PermissionBitmask.fromBits(bits);
  }

  has(flag: PermissionFlag): boolean {
    return (this.bits & Permissions[flag]) !== 0n;
  }

  /**
   * Whether every bit of `other` is set here.
   */
  contains(other: PermissionBitmask): boolean {
    return (this.bits & other.bits) === other.bits;
  }

  intersects(other: PermissionBitmask): boolean {
    return (this.bits & other.bits) !== 0n;
  }

  isEmpty(): boolean {
    return this.bits === 0n;
  }

  equals(other: PermissionBitmask): boolean {
    return this.bits === other.bits;
  }

  union(other: PermissionBitmask): PermissionBitmask {
    return PermissionBitmask.fromBits(this.bits | other.bits);
  }

  intersection(other: PermissionBitmask): PermissionBitmask {
    return PermissionBitmask.fromBits(this.bits & other.bits);
  }

  difference(other: PermissionBitmask): PermissionBitmask {
    return PermissionBitmask.fromBits(this.bits & ~other.bits);
  }

  /**
   * Clear the `deny` bits, then set the `allow` bits.
   */
  apply(allow: PermissionBitmask, deny: PermissionBitmask): PermissionBitmask {
    return PermissionBitmask.fromBits((this.bits & ~deny.bits) | allow.bits);
  }

  toFlags(): PermissionFlag[] {
    return PERMISSION_FLAGS.filter((flag) => this.has(flag));
  }

  toString(): string {
    return this.bits.toString();
  }

  toJSON(): string {
    return this.toString();
  }
}
