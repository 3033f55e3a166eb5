import { GENESIS_HASH } from './constants.js'
import { DeferredMintError } from './errors.js'
import type {
  Clock,
  IntegrityReport,
  LedgerNotification,
  NotificationBody,
  NotificationSink,
  NotificationSource,
  Transactional
} from './types.js'
import { UndoJournal } from './UndoJournal.js'
import { sha256Hex, stableStringify } from './utils.js'

function hashEntry(entry: LedgerNotification): string {
  const { hash, ...rest } = entry
  return sha256Hex(stableStringify(rest))
}

/**
 * Append-only, hash-chained log of ledger notifications.
 *
 * Each entry carries the hash of its predecessor, so a persisted log can be
 * checked with `verifyIntegrity()` before it is trusted. Entries are copied
 * in and out, so callers never hold the stored objects. An append made inside
 * a journal frame is removed again if that frame rolls back.
 */
export class NotificationLog implements NotificationSink, NotificationSource, Transactional<number> {
  private entries: LedgerNotification[] = []
  private clock: Clock
  private readonly journal: UndoJournal

  constructor(
    clock: Clock = () => new Date().toISOString(),
    initialEntries: LedgerNotification[] = [],
    journal: UndoJournal = new UndoJournal()
  ) {
    this.clock = clock
    this.entries = initialEntries.map((entry) => ({ ...entry }))
    this.journal = journal
  }

  append(body: NotificationBody): LedgerNotification {
    const base: LedgerNotification = {
      ...body,
      sequence: this.entries.length + 1,
      timestamp: this.clock(),
      prevHash: this.latestHash(),
      hash: ''
    }
    const entry: LedgerNotification = { ...base, hash: hashEntry(base) }
    this.entries.push(entry)
    this.journal.record(() => {
      this.entries.pop()
    })
    return { ...entry }
  }

  /**
   * Notifications with a sequence greater than `sinceSequence`, oldest first.
   */
  notifications(sinceSequence = 0): LedgerNotification[] {
    return this.entries.slice(Math.max(0, sinceSequence)).map((entry) => ({ ...entry }))
  }

  /** The notification with the given sequence, if any */
  at(sequence: number): LedgerNotification | undefined {
    const entry = this.entries[sequence - 1]
    return entry === undefined ? undefined : { ...entry }
  }

  latestSequence(): number {
    return this.entries.length
  }

  latestHash(): string {
    if (this.entries.length === 0) {
      return GENESIS_HASH
    }
    return this.entries[this.entries.length - 1].hash
  }

  verifyIntegrity(): IntegrityReport {
    const errors: string[] = []
    for (let i = 0; i < this.entries.length; i += 1) {
      const entry = this.entries[i]
      if (entry.sequence !== i + 1) {
        errors.push(`notification ${i + 1} has sequence ${entry.sequence}`)
      }
      const expectedPrev = i === 0 ? GENESIS_HASH : this.entries[i - 1].hash
      if (entry.prevHash !== expectedPrev) {
        errors.push(`notification ${entry.sequence} has invalid prevHash`)
      }
      if (entry.hash !== hashEntry(entry)) {
        errors.push(`notification ${entry.sequence} has invalid hash`)
      }
    }
    return { ok: errors.length === 0, errors }
  }

  snapshot(): number {
    return this.entries.length
  }

  restore(length: number): void {
    if (!Number.isInteger(length) || length < 0 || length > this.entries.length) {
      throw new DeferredMintError('InvalidArgument', `cannot restore notification log to length ${length}`)
    }
    this.entries.length = length
  }
}
