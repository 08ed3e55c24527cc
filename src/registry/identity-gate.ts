import { Identity } from './registry-types';

export interface OwnerLookup {
  getOwner(id: number): Identity | null;
}

/**
 * Answers "is this caller the administrator / the owner of X?".
 * Never mutates anything; a missing asset is simply "not the owner".
 */
export class IdentityGate {
  constructor(
    private readonly admin: Identity,
    private readonly owners: OwnerLookup
  ) {
    if (!admin) {
      throw new Error('Administrator identity must be a non-empty string');
    }
  }

  getAdmin(): Identity {
    return this.admin;
  }

  isAdmin(caller: Identity): boolean {
    return caller === this.admin;
  }

  isOwner(id: number, caller: Identity): boolean {
    const owner = this.owners.getOwner(id);
    return owner !== null && owner === caller;
  }
}
