/**
 * Token Frequency
 *
 * A counted frequency grows with every occurrence; a pinned frequency belongs
 * to a reserved token and ranks above every count.
 *
 * @module vocabulary/frequency
 */

export type Frequency =
  | { readonly kind: 'counted'; readonly count: number }
  | { readonly kind: 'pinned' };

export const PINNED: Frequency = Object.freeze({ kind: 'pinned' });

export function counted(count: number): Frequency {
  return { kind: 'counted', count };
}

export function isPinned(frequency: Frequency): boolean {
  return frequency.kind === 'pinned';
}

/**
 * Record one more occurrence. Pinned stays pinned.
 */
export function increment(frequency: Frequency): Frequency {
  return frequency.kind === 'pinned' ? frequency : counted(frequency.count + 1);
}

/**
 * True when the frequency is below a minimum count. Pinned never is.
 */
export function isBelow(frequency: Frequency, minimum: number): boolean {
  return frequency.kind === 'counted' && frequency.count < minimum;
}

/**
 * Order for "most frequent first": negative when `a` ranks before `b`.
 */
export function compareDescending(a: Frequency, b: Frequency): number {
  if (a.kind === 'pinned') return b.kind === 'pinned' ? 0 : -1;
  if (b.kind === 'pinned') return 1;
  return b.count - a.count;
}
