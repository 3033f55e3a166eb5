import { NotificationLog } from '../NotificationLog.js'
import { GENESIS_HASH } from '../constants.js'
import { UndoJournal } from '../UndoJournal.js'
import { sha256Hex, stableStringify } from '../utils.js'
import { CREATOR, BUYER, FIXED_TIME, clock, errorCodeOf } from './fixtures.js'

describe('NotificationLog', () => {
  let log: NotificationLog

  beforeEach(() => {
    log = new NotificationLog(clock)
    log.append({ kind: 'Prepared', tokenId: 1, creator: CREATOR, descriptor: 'ipfs://one' })
    log.append({ kind: 'Minted', tokenId: 1, owner: CREATOR })
    log.append({ kind: 'Transferred', tokenId: 1, from: CREATOR, to: BUYER, operator: CREATOR })
  })

  it('should stamp entries with sequence, timestamp and chained hashes', () => {
    const [first, second] = log.notifications()

    expect(first.sequence).toBe(1)
    expect(first.timestamp).toBe(FIXED_TIME)
    expect(first.prevHash).toBe(GENESIS_HASH)
    expect(first.hash).toBe(sha256Hex(stableStringify({
      kind: 'Prepared',
      tokenId: 1,
      creator: CREATOR,
      descriptor: 'ipfs://one',
      sequence: 1,
      timestamp: FIXED_TIME,
      prevHash: GENESIS_HASH
    })))
    expect(second.prevHash).toBe(first.hash)
    expect(log.latestHash()).toBe(log.notifications()[2].hash)
  })

  it('should list notifications after a sequence', () => {
    expect(log.notifications(1).map((n) => n.kind)).toEqual(['Minted', 'Transferred'])
    expect(log.notifications(3)).toEqual([])
    expect(log.latestSequence()).toBe(3)
  })

  it('should verify an untouched log', () => {
    expect(log.verifyIntegrity()).toEqual({ ok: true, errors: [] })
  })

  it('should detect an edited entry', () => {
    const entries = log.notifications().map((entry) =>
      entry.sequence === 2 ? { ...entry, timestamp: '2030-01-01T00:00:00.000Z' } : entry
    )
    const tampered = new NotificationLog(clock, entries)

    expect(tampered.verifyIntegrity()).toEqual({
      ok: false,
      errors: ['notification 2 has invalid hash']
    })
  })

  it('should detect a removed entry', () => {
    const entries = log.notifications().filter((entry) => entry.sequence !== 2)
    const report = new NotificationLog(clock, entries).verifyIntegrity()

    expect(report.ok).toBe(false)
    expect(report.errors).toEqual([
      'notification 2 has sequence 3',
      'notification 3 has invalid prevHash'
    ])
  })

  it('should not expose stored entries to callers', () => {
    const listed = log.notifications()
    listed[0].timestamp = '2030-01-01T00:00:00.000Z'
    const appended = log.append({ kind: 'BaseDescriptorPathSet', path: 'ipfs://' })
    appended.prevHash = GENESIS_HASH

    expect(log.notifications()[0].timestamp).toBe(FIXED_TIME)
    expect(log.notifications()[3].prevHash).toBe(log.notifications()[2].hash)
    expect(log.verifyIntegrity()).toEqual({ ok: true, errors: [] })
  })

  it('should copy initial entries on construction', () => {
    const entries = log.notifications()
    const copy = new NotificationLog(clock, entries)
    entries[1].timestamp = '2030-01-01T00:00:00.000Z'

    expect(copy.verifyIntegrity().ok).toBe(true)
  })

  it('should look up a single entry by sequence', () => {
    expect(log.at(2)?.kind).toBe('Minted')
    expect(log.at(0)).toBeUndefined()
    expect(log.at(4)).toBeUndefined()
  })

  it('should drop appends made in a frame that rolls back', () => {
    const journal = new UndoJournal()
    const journaled = new NotificationLog(clock, log.notifications(), journal)

    expect(() => journal.run(() => {
      journaled.append({ kind: 'BaseDescriptorPathSet', path: 'ipfs://' })
      throw new Error('boom')
    })).toThrow('boom')

    expect(journaled.latestSequence()).toBe(3)
    expect(journaled.latestHash()).toBe(log.latestHash())
  })

  it('should truncate on restore', () => {
    const saved = log.snapshot()
    log.append({ kind: 'BaseDescriptorPathSet', path: 'ipfs://' })
    log.restore(saved)
    expect(log.latestSequence()).toBe(3)
    expect(log.verifyIntegrity().ok).toBe(true)
  })

  it('should reject restoring to a longer log', () => {
    expect(errorCodeOf(() => log.restore(4))).toBe('InvalidArgument')
  })
})
