import { describe, expect, it } from 'vitest'
import { MEMORY_CONFIG } from '../config'
import { WordMemory } from '../memory'

describe('WordMemory', () => {
  it('should load the program image at address 0', () => {
    const memory = new WordMemory([1n, 2n, 3n])

    expect(memory.length).toBe(3)
    expect(memory.snapshot()).toEqual([1n, 2n, 3n])
  })

  it('should read zero past the end and grow to cover the address', () => {
    const memory = new WordMemory([7n, 8n])

    expect(memory.read(10)).toBe(0n)
    expect(memory.length).toBe(21)
    expect(memory.read(0)).toBe(7n)
    expect(memory.read(1)).toBe(8n)
  })

  it('should at least double when growing just past the end', () => {
    const memory = new WordMemory(new Array<bigint>(10).fill(1n))

    memory.write(10, 5n)

    expect(memory.length).toBe(21)
    expect(memory.read(10)).toBe(5n)
    expect(memory.read(9)).toBe(1n)
  })

  it('should double an empty memory from the address alone', () => {
    const memory = new WordMemory()

    memory.write(0, 4n)

    expect(memory.length).toBe(1)
    expect(memory.snapshot()).toEqual([4n])
  })

  it('should wrap stored values to signed 64 bits', () => {
    const memory = new WordMemory([0n])

    memory.write(0, 2n ** 63n)

    expect(memory.read(0)).toBe(-(2n ** 63n))
  })

  it('should peek without growing', () => {
    const memory = new WordMemory([42n])

    expect(memory.peek(0)).toBe(42n)
    expect(memory.peek(1000)).toBe(0n)
    expect(memory.length).toBe(1)
  })

  it('should return a copy from snapshot', () => {
    const memory = new WordMemory([1n])
    const copy = memory.snapshot()

    copy[0] = 99n

    expect(memory.read(0)).toBe(1n)
  })

  it('should keep far addresses out of the contiguous buffer', () => {
    const memory = new WordMemory([1n, 2n])

    memory.write(3_000_000_000, -9n)

    expect(memory.read(3_000_000_000)).toBe(-9n)
    expect(memory.peek(3_000_000_000)).toBe(-9n)
    expect(memory.read(3_000_000_001)).toBe(0n)
    expect(memory.length).toBe(2)
  })

  it('should wrap far stored values to signed 64 bits', () => {
    const memory = new WordMemory()

    memory.write(MEMORY_CONFIG.MAX_ADDRESS, 2n ** 64n + 5n)

    expect(memory.read(MEMORY_CONFIG.MAX_ADDRESS)).toBe(5n)
  })

  it('should cap contiguous growth at the dense limit', () => {
    const memory = new WordMemory([1n])

    memory.write(MEMORY_CONFIG.DENSE_LIMIT - 1, 3n)
    memory.write(MEMORY_CONFIG.DENSE_LIMIT, 4n)

    expect(memory.length).toBe(MEMORY_CONFIG.DENSE_LIMIT)
    expect(memory.read(MEMORY_CONFIG.DENSE_LIMIT - 1)).toBe(3n)
    expect(memory.read(MEMORY_CONFIG.DENSE_LIMIT)).toBe(4n)
  })
})
