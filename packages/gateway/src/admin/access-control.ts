/**
 * Access Control
 *
 * Who may mutate gateway configuration. Checked explicitly at the entry of
 * every admin mutation.
 */

import { EvmAddress, evmAddress, sameAddress } from '../boundaries/index.js';

export interface AdminContext {
  /** Address of the party invoking the operation. */
  caller: string;
}

export interface AccessControl {
  isAdmin(caller: string): boolean;
}

/**
 * Single-owner authority.
 */
export class OwnerAccessControl implements AccessControl {
  readonly owner: EvmAddress;

  constructor(owner: string) {
    this.owner = evmAddress(owner);
  }

  isAdmin(caller: string): boolean {
    return sameAddress(caller, this.owner);
  }
}
