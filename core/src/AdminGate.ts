import { DeferredMintError } from './errors.js'
import type { AdminGate, AdminGateState, Identity } from './types.js'
import { assertIdentity, assertRecipient } from './utils.js'

/**
 * A single administrator identity, transferable by the current admin.
 */
export class SingleAdminGate implements AdminGate {
  private current: Identity

  constructor(admin: Identity) {
    assertRecipient(admin, 'admin')
    this.current = admin
  }

  admin(): Identity {
    return this.current
  }

  /**
   * @throws DeferredMintError Unauthorized
   */
  assertAdmin(caller: Identity): void {
    if (caller !== this.current) {
      throw new DeferredMintError('Unauthorized', 'caller is not the admin', { caller })
    }
  }

  /**
   * @throws DeferredMintError Unauthorized, InvalidRecipient, InvalidIdentity
   */
  transferAdmin(caller: Identity, next: Identity): void {
    this.assertAdmin(caller)
    assertRecipient(next, 'next admin')
    this.current = next
  }

  snapshot(): AdminGateState {
    return { admin: this.current }
  }

  restore(state: AdminGateState): void {
    assertIdentity(state.admin, 'admin')
    this.current = state.admin
  }
}
