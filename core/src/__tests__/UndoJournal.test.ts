import { UndoJournal } from '../UndoJournal.js'

describe('UndoJournal', () => {
  let journal: UndoJournal
  let values: string[]

  beforeEach(() => {
    journal = new UndoJournal()
    values = []
  })

  const push = (value: string): void => {
    values.push(value)
    journal.record(() => {
      values.pop()
    })
  }

  it('should ignore records outside a frame', () => {
    push('a')
    expect(journal.active()).toBe(false)
    expect(journal.pending()).toBe(0)
    expect(values).toEqual(['a'])
  })

  it('should keep writes and return the result when the frame succeeds', () => {
    const result = journal.run(() => {
      push('a')
      return 7
    })

    expect(result).toBe(7)
    expect(values).toEqual(['a'])
    expect(journal.active()).toBe(false)
  })

  it('should undo writes newest first when the frame throws', () => {
    const order: string[] = []
    expect(() => journal.run(() => {
      journal.record(() => order.push('first'))
      journal.record(() => order.push('second'))
      throw new Error('boom')
    })).toThrow('boom')

    expect(order).toEqual(['second', 'first'])
    expect(journal.active()).toBe(false)
  })

  it('should undo only the inner frame when a nested failure is caught', () => {
    journal.run(() => {
      push('outer')
      try {
        journal.run(() => {
          push('inner')
          throw new Error('inner failed')
        })
      } catch (error) {
        expect(error).toEqual(new Error('inner failed'))
      }
      expect(journal.pending()).toBe(1)
    })

    expect(values).toEqual(['outer'])
  })

  it('should undo a committed inner frame when the outer frame fails', () => {
    expect(() => journal.run(() => {
      push('outer')
      journal.run(() => push('inner'))
      expect(journal.pending()).toBe(2)
      throw new Error('outer failed')
    })).toThrow('outer failed')

    expect(values).toEqual([])
  })
})
