// Context (channel) types

/**
 * The kind of channel a permission set is resolved for.
 */
export type ContextType =
  | 'text'
  | 'voice'
  | 'category'
  | 'announcement'
  | 'announcement_thread'
  | 'public_thread'
  | 'private_thread'
  | 'stage'
  | 'forum';

export const CONTEXT_TYPES: readonly ContextType[] = [
  'text',
  'voice',
  'category',
  'announcement',
  'announcement_thread',
  'public_thread',
  'private_thread',
  'stage',
  'forum',
];

/**
 * Numeric channel type codes used on the wire.
 */
const CONTEXT_TYPE_CODES: ReadonlyMap<number, ContextType> = new Map([
  [0, 'text'],
  [2, 'voice'],
  [4, 'category'],
  [5, 'announcement'],
  [10, 'announcement_thread'],
  [11, 'public_thread'],
  [12, 'private_thread'],
  [13, 'stage'],
  [15, 'forum'],
]);

export function isContextType(value: string): value is ContextType {
  return CONTEXT_TYPES.some((type) => type === value);
}

/**
 * Map a wire channel type code to a context type.
 * DM and group DM channels have no guild context and map to undefined.
 */
export function contextTypeFromCode(code: number): ContextType | undefined {
  return CONTEXT_TYPE_CODES.get(code);
}

export function isThreadContext(type: ContextType): boolean {
  return (
    type === 'announcement_thread' ||
    type === 'public_thread' ||
    type === 'private_thread'
  );
}
