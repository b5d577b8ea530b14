import { addMinutes } from 'date-fns';
import { uniqBy } from 'lodash';
import { MAX_STAGGERED_SLOTS } from '../constants';
import { findNextAvailableSlot, type SlotSearchOptions } from './slotFinder';
import type { BusyInterval } from './types';

export { DEFAULT_STAGGER_OFFSETS } from '../constants';

/**
 * Alternative suggestion times: one independent slot search per offset from
 * `base`. Offsets that land on the same free slot collapse into one entry.
 */
export function generateStaggeredSlots(
  busy: readonly BusyInterval[],
  base: Date,
  offsetsMinutes: readonly number[],
  options: Omit<SlotSearchOptions, 'after'> = {},
): Date[] {
  const candidates = offsetsMinutes
    .filter(offset => Number.isFinite(offset))
    .map(offset => findNextAvailableSlot(busy, { ...options, after: addMinutes(base, Math.trunc(offset)) }).start);

  return uniqBy(candidates, slot => slot.getTime()).slice(0, MAX_STAGGERED_SLOTS);
}
