import type { Memory, ProgramImage, Word } from '@wordvm/types'
import { MEMORY_CONFIG } from './config'

/**
 * Word Memory
 *
 * Zero-initialised signed 64-bit words. Addresses below
 * `MEMORY_CONFIG.DENSE_LIMIT` live in a BigInt64Array that grows on demand;
 * higher addresses live in a sparse map, so a far access never allocates
 * more than the cells it touches. Stored values wrap to 64 bits.
 *
 * `length` and `snapshot()` cover the contiguous buffer only.
 */
export class WordMemory implements Memory {
  private words: BigInt64Array
  private readonly sparse = new Map<number, Word>()

  constructor(image: ProgramImage = []) {
    this.words = new BigInt64Array(image.length)
    image.forEach((word, index) => {
      this.words[index] = word
    })
  }

  get length(): number {
    return this.words.length
  }

  read(address: number): Word {
    if (this.isSparse(address)) {
      return this.sparse.get(address) ?? 0n
    }
    this.ensureAddressable(address)
    return this.words[address]
  }

  write(address: number, value: Word): void {
    if (this.isSparse(address)) {
      this.sparse.set(address, BigInt.asIntN(64, value))
      return
    }
    this.ensureAddressable(address)
    this.words[address] = value
  }

  /**
   * Read without growing; cells never written read as zero
   */
  peek(address: number): Word {
    if (address < this.words.length) {
      return this.words[address]
    }
    return this.sparse.get(address) ?? 0n
  }

  snapshot(): Word[] {
    return Array.from(this.words)
  }

  private isSparse(address: number): boolean {
    return (
      address >= this.words.length && address >= MEMORY_CONFIG.DENSE_LIMIT
    )
  }

  private ensureAddressable(address: number): void {
    if (address < this.words.length) {
      return
    }

    const capacity = Math.min(
      Math.max(
        MEMORY_CONFIG.GROWTH_FACTOR * address + 1,
        MEMORY_CONFIG.GROWTH_FACTOR * this.words.length,
      ),
      MEMORY_CONFIG.DENSE_LIMIT,
    )
    const grown = new BigInt64Array(capacity)
    grown.set(this.words)
    this.words = grown
  }
}
