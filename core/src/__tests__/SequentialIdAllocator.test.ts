import { SequentialIdAllocator } from '../SequentialIdAllocator.js'
import { errorCodeOf } from './fixtures.js'

describe('SequentialIdAllocator', () => {
  it('should start at 1 and increase by one', () => {
    const allocator = new SequentialIdAllocator()
    expect(allocator.current()).toBe(0)
    expect([allocator.next(), allocator.next(), allocator.next()]).toEqual([1, 2, 3])
    expect(allocator.current()).toBe(3)
  })

  it('should keep separate counters per instance', () => {
    const first = new SequentialIdAllocator()
    const second = new SequentialIdAllocator()
    first.next()
    first.next()
    expect(second.next()).toBe(1)
  })

  it('should put the counter back on restore', () => {
    const allocator = new SequentialIdAllocator()
    allocator.next()
    const saved = allocator.snapshot()
    allocator.next()
    allocator.restore(saved)
    expect(allocator.next()).toBe(2)
  })

  it('should resume from a given position', () => {
    expect(new SequentialIdAllocator(41).next()).toBe(42)
  })

  it('should reject invalid positions', () => {
    expect(errorCodeOf(() => new SequentialIdAllocator(-1))).toBe('InvalidArgument')
    expect(errorCodeOf(() => new SequentialIdAllocator().restore(1.5))).toBe('InvalidArgument')
  })
})
