import { EntropySnapshot } from '../../shared/schema';
import { ValidationError } from './errors';

export interface EntropySource {
  snapshot(): EntropySnapshot;
}

export interface ClockEntropyOptions {
  clock?: () => number; // epoch milliseconds
  genesis_ms?: number;
  slot_duration_ms?: number;
}

export const DEFAULT_SLOT_DURATION_MS = 400;

// Latest instant a Date can represent, in unix seconds.
export const MAX_TIMESTAMP = 8_640_000_000_000;

export function assertEntropySnapshot(snapshot: EntropySnapshot): EntropySnapshot {
  if (!Number.isSafeInteger(snapshot.slot) || snapshot.slot < 0) {
    throw new ValidationError('entropy slot must be a non-negative integer', { slot: snapshot.slot });
  }
  if (!Number.isSafeInteger(snapshot.timestamp) || snapshot.timestamp < 0) {
    throw new ValidationError('entropy timestamp must be a non-negative integer', {
      timestamp: snapshot.timestamp,
    });
  }
  if (snapshot.timestamp > MAX_TIMESTAMP) {
    throw new ValidationError(`entropy timestamp must be at most ${MAX_TIMESTAMP}`, {
      timestamp: snapshot.timestamp,
    });
  }
  return snapshot;
}

/**
 * Slot counter derived from wall time. Slots never go backwards even if the
 * clock does.
 */
export function createClockEntropySource(options: ClockEntropyOptions = {}): EntropySource {
  const clock = options.clock ?? (() => Date.now());
  const genesis = options.genesis_ms ?? 0;
  const slotDuration = options.slot_duration_ms ?? DEFAULT_SLOT_DURATION_MS;
  if (!Number.isSafeInteger(slotDuration) || slotDuration < 1) {
    throw new ValidationError('slot_duration_ms must be a positive integer');
  }

  let lastSlot = 0;
  return {
    snapshot() {
      const now = clock();
      const slot = Math.max(lastSlot, Math.floor(Math.max(0, now - genesis) / slotDuration));
      lastSlot = slot;
      return assertEntropySnapshot({ slot, timestamp: Math.floor(now / 1000) });
    },
  };
}

export function createFixedEntropySource(snapshot: EntropySnapshot): EntropySource {
  const fixed = assertEntropySnapshot({ ...snapshot });
  return {
    snapshot: () => ({ ...fixed }),
  };
}
