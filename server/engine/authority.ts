import { Identity } from '../../shared/schema';
import { ValidationError } from './errors';
import { deriveIdentity } from './identity';

/**
 * Capability to write asset attributes on behalf of the program.
 *
 * Only `derive` mints one, so holding an instance is the authorization; the
 * state machine receives it explicitly instead of looking it up.
 */
export class UpdateAuthority {
  private constructor(readonly identity: Identity) {}

  static derive(programId: string, seed: string): UpdateAuthority {
    if (!programId) {
      throw new ValidationError('program_id is required to derive the update authority');
    }
    if (!seed) {
      throw new ValidationError('authority seed is required');
    }
    return new UpdateAuthority(deriveIdentity({ program_id: programId, seed }));
  }

  matches(identity: Identity): boolean {
    return this.identity === identity;
  }
}
