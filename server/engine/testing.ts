import { EntropySnapshot, Identity } from '../../shared/schema';
import { EntropySource } from './entropy';
import { deriveIdentity } from './identity';

/**
 * Helpers shared by the engine test suites.
 */

export function identityFor(label: string): Identity {
  return deriveIdentity({ label });
}

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
}

export async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected promise to reject');
}

export interface ManualEntropySource extends EntropySource {
  set(snapshot: EntropySnapshot): void;
}

export function createManualEntropySource(initial: EntropySnapshot): ManualEntropySource {
  let current = { ...initial };
  return {
    snapshot: () => ({ ...current }),
    set(snapshot) {
      current = { ...snapshot };
    },
  };
}
