import { InMemoryOwnershipLedger } from '../OwnershipLedger.js'
import { NotificationLog } from '../NotificationLog.js'
import { UndoJournal } from '../UndoJournal.js'
import { ZERO_IDENTITY } from '../constants.js'
import type { TokenReceipt } from '../types.js'
import { CREATOR, BUYER, OTHER, clock, errorCodeOf } from './fixtures.js'

describe('InMemoryOwnershipLedger', () => {
  let log: NotificationLog
  let ownership: InMemoryOwnershipLedger

  beforeEach(() => {
    log = new NotificationLog(clock)
    ownership = new InMemoryOwnershipLedger(log)
  })

  describe('mint', () => {
    it('should assign the first owner', () => {
      ownership.mint(CREATOR, 1)
      expect(ownership.exists(1)).toBe(true)
      expect(ownership.ownerOf(1)).toBe(CREATOR)
      expect(ownership.balanceOf(CREATOR)).toBe(1)
    })

    it('should reject a token that already has an owner', () => {
      ownership.mint(CREATOR, 1)
      expect(errorCodeOf(() => ownership.mint(BUYER, 1))).toBe('AlreadyMinted')
    })

    it('should reject the zero identity', () => {
      expect(errorCodeOf(() => ownership.mint(ZERO_IDENTITY, 1))).toBe('InvalidRecipient')
    })
  })

  describe('transfer', () => {
    beforeEach(() => {
      ownership.mint(CREATOR, 1)
    })

    it('should move the token and update balances', () => {
      ownership.transfer(CREATOR, CREATOR, BUYER, 1)
      expect(ownership.ownerOf(1)).toBe(BUYER)
      expect(ownership.balanceOf(CREATOR)).toBe(0)
      expect(ownership.balanceOf(BUYER)).toBe(1)
      expect(log.notifications()[0]).toMatchObject({
        kind: 'Transferred',
        tokenId: 1,
        from: CREATOR,
        to: BUYER,
        operator: CREATOR
      })
    })

    it('should reject a token without an owner', () => {
      expect(errorCodeOf(() => ownership.transfer(CREATOR, CREATOR, BUYER, 2))).toBe('UnknownToken')
    })

    it('should reject the wrong source', () => {
      expect(errorCodeOf(() => ownership.transfer(BUYER, BUYER, OTHER, 1))).toBe('IncorrectOwner')
    })

    it('should reject an unapproved caller', () => {
      expect(errorCodeOf(() => ownership.transfer(OTHER, CREATOR, OTHER, 1))).toBe('NotOwnerNorApproved')
      expect(ownership.ownerOf(1)).toBe(CREATOR)
    })

    it('should reject the zero identity as destination', () => {
      expect(errorCodeOf(() => ownership.transfer(CREATOR, CREATOR, ZERO_IDENTITY, 1))).toBe('InvalidRecipient')
    })

    it('should let an approved identity transfer once', () => {
      ownership.approve(CREATOR, OTHER, 1)
      expect(ownership.getApproved(1)).toBe(OTHER)

      ownership.transfer(OTHER, CREATOR, BUYER, 1)

      expect(ownership.ownerOf(1)).toBe(BUYER)
      expect(ownership.getApproved(1)).toBe(ZERO_IDENTITY)
    })

    it('should let an operator transfer', () => {
      ownership.setApprovalForAll(CREATOR, OTHER, true)
      expect(ownership.isApprovedForAll(CREATOR, OTHER)).toBe(true)

      ownership.transfer(OTHER, CREATOR, OTHER, 1)

      expect(ownership.ownerOf(1)).toBe(OTHER)
    })
  })

  describe('approvals', () => {
    beforeEach(() => {
      ownership.mint(CREATOR, 1)
    })

    it('should only let the owner or an operator approve', () => {
      expect(errorCodeOf(() => ownership.approve(BUYER, BUYER, 1))).toBe('NotOwnerNorApproved')
      ownership.setApprovalForAll(CREATOR, OTHER, true)
      ownership.approve(OTHER, BUYER, 1)
      expect(ownership.getApproved(1)).toBe(BUYER)
    })

    it('should clear an approval with the zero identity', () => {
      ownership.approve(CREATOR, BUYER, 1)
      ownership.approve(CREATOR, ZERO_IDENTITY, 1)
      expect(ownership.getApproved(1)).toBe(ZERO_IDENTITY)
      expect(log.notifications().map((n) => n.kind)).toEqual(['Approved', 'Approved'])
    })

    it('should revoke an operator', () => {
      ownership.setApprovalForAll(CREATOR, OTHER, true)
      ownership.setApprovalForAll(CREATOR, OTHER, false)
      expect(ownership.isApprovedForAll(CREATOR, OTHER)).toBe(false)
      expect(ownership.snapshot().operatorApprovals).toEqual({})
    })

    it('should reject approving oneself as operator', () => {
      expect(errorCodeOf(() => ownership.setApprovalForAll(CREATOR, CREATOR, true))).toBe('InvalidArgument')
    })

    it('should report approvals of unowned tokens as unknown', () => {
      expect(errorCodeOf(() => ownership.getApproved(2))).toBe('UnknownToken')
    })
  })

  describe('onBeforeTransfer', () => {
    it('should run hooks before the ownership check', () => {
      ownership.onBeforeTransfer((request) => {
        if (!ownership.exists(request.tokenId)) ownership.mint(request.from, request.tokenId)
      })

      ownership.transfer(CREATOR, CREATOR, BUYER, 7)

      expect(ownership.ownerOf(7)).toBe(BUYER)
      expect(ownership.balanceOf(CREATOR)).toBe(0)
    })

    it('should pass the transfer request', () => {
      const hook = jest.fn()
      ownership.mint(CREATOR, 1)
      ownership.onBeforeTransfer(hook)

      ownership.transfer(CREATOR, CREATOR, BUYER, 1)

      expect(hook).toHaveBeenCalledWith({ tokenId: 1, from: CREATOR, to: BUYER, operator: CREATOR })
    })

    it('should stop calling a removed hook', () => {
      const hook = jest.fn()
      ownership.mint(CREATOR, 1)
      const remove = ownership.onBeforeTransfer(hook)
      remove()

      ownership.transfer(CREATOR, CREATOR, BUYER, 1)

      expect(hook).not.toHaveBeenCalled()
    })
  })

  describe('receivers', () => {
    beforeEach(() => {
      ownership.mint(CREATOR, 1)
    })

    it('should call the recipient after the ownership change', () => {
      const receipts: TokenReceipt[] = []
      let ownerSeen = ''
      ownership.registerReceiver(BUYER, {
        onTokenReceived: (receipt) => {
          receipts.push(receipt)
          ownerSeen = ownership.ownerOf(receipt.tokenId)
          return true
        }
      })

      ownership.transfer(CREATOR, CREATOR, BUYER, 1, 'hello')

      expect(receipts).toEqual([{ operator: CREATOR, from: CREATOR, tokenId: 1, data: 'hello' }])
      expect(ownerSeen).toBe(BUYER)
    })

    it('should reject when the recipient declines', () => {
      ownership.registerReceiver(BUYER, { onTokenReceived: () => false })
      expect(errorCodeOf(() => ownership.transfer(CREATOR, CREATOR, BUYER, 1))).toBe('ReceiverRejected')
    })

    it('should reject when the recipient throws', () => {
      ownership.registerReceiver(BUYER, {
        onTokenReceived: () => {
          throw new Error('wallet offline')
        }
      })
      expect(errorCodeOf(() => ownership.transfer(CREATOR, CREATOR, BUYER, 1))).toBe('ReceiverRejected')
    })

    it('should not call an unregistered recipient', () => {
      const onTokenReceived = jest.fn(() => false)
      ownership.registerReceiver(BUYER, { onTokenReceived })
      ownership.unregisterReceiver(BUYER)

      ownership.transfer(CREATOR, CREATOR, BUYER, 1)

      expect(onTokenReceived).not.toHaveBeenCalled()
    })
  })

  it('should restore a snapshot', () => {
    ownership.mint(CREATOR, 1)
    ownership.setApprovalForAll(CREATOR, OTHER, true)
    const saved = ownership.snapshot()

    ownership.transfer(CREATOR, CREATOR, BUYER, 1)
    ownership.mint(BUYER, 2)
    ownership.restore(saved)

    expect(ownership.ownerOf(1)).toBe(CREATOR)
    expect(ownership.exists(2)).toBe(false)
    expect(ownership.balanceOf(BUYER)).toBe(0)
    expect(ownership.isApprovedForAll(CREATOR, OTHER)).toBe(true)
    expect(ownership.snapshot()).toEqual(saved)
  })

  it('should undo every write made in a failed journal frame', () => {
    const journal = new UndoJournal()
    const journaled = new InMemoryOwnershipLedger(log, journal)
    journaled.mint(CREATOR, 1)
    journaled.setApprovalForAll(CREATOR, OTHER, true)
    const saved = journaled.snapshot()

    expect(() => journal.run(() => {
      journaled.approve(CREATOR, BUYER, 1)
      journaled.transfer(OTHER, CREATOR, BUYER, 1)
      journaled.mint(BUYER, 2)
      journaled.setApprovalForAll(CREATOR, OTHER, false)
      throw new Error('abort')
    })).toThrow('abort')

    expect(journaled.snapshot()).toEqual(saved)
    expect(journaled.ownerOf(1)).toBe(CREATOR)
    expect(journaled.getApproved(1)).toBe(ZERO_IDENTITY)
    expect(journaled.isApprovedForAll(CREATOR, OTHER)).toBe(true)
  })
})
