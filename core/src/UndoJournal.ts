/**
 * Records how to reverse each mutation made inside an open transaction.
 *
 * Components that share a journal call `record` with the inverse of every
 * write they make. `run` opens a frame, and on failure replays that frame's
 * entries newest first. Frames nest: a committed inner frame folds into its
 * parent, so an outer rollback still reverses it. Outside any frame,
 * `record` is a no-op.
 */
export class UndoJournal {
  private frames: Array<Array<() => void>> = []

  /** True while at least one frame is open */
  active(): boolean {
    return this.frames.length > 0
  }

  /** Entries recorded in the innermost open frame */
  pending(): number {
    return this.frames[this.frames.length - 1]?.length ?? 0
  }

  record(undo: () => void): void {
    this.frames[this.frames.length - 1]?.push(undo)
  }

  /**
   * Run `fn` in a new frame. If it throws, every write it recorded is undone
   * and the error is rethrown.
   */
  run<T>(fn: () => T): T {
    this.frames.push([])
    let result: T
    try {
      result = fn()
    } catch (error) {
      this.rollback()
      throw error
    }
    this.commit()
    return result
  }

  private commit(): void {
    const frame = this.frames.pop() ?? []
    const parent = this.frames[this.frames.length - 1]
    if (parent === undefined) return
    for (const undo of frame) {
      parent.push(undo)
    }
  }

  private rollback(): void {
    const frame = this.frames.pop() ?? []
    for (let i = frame.length - 1; i >= 0; i -= 1) {
      frame[i]()
    }
  }
}
