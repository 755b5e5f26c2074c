import { assertBitCount } from './assert'
import { getLowerBits, numBitsToNumWords } from './bits'
import { BitReaderInterface, ReadBitsResult } from './bitReader'

/**
 * Forward-only reader over 64-bit words laid out the way `BitWriterWord64`
 * writes them. There is no seeking; a reader is consumed once.
 */
export class BitReaderWord64 implements BitReaderInterface {
  private pos = 0

  private constructor(private readonly buffer: BigUint64Array) {}

  /**
   * Reads `words` in place. The reader owns the array from here on and the
   * caller must not touch it again.
   */
  static fromWords(words: BigUint64Array): BitReaderWord64 {
    return new BitReaderWord64(words)
  }

  /**
   * Copies `bytes` into a fresh word buffer in host byte order. The last word
   * is zero-padded; the source is left untouched.
   */
  static fromBytes(bytes: ArrayLike<number>): BitReaderWord64 {
    const words = new BigUint64Array(numBitsToNumWords(bytes.length, 8))
    new Uint8Array(words.buffer).set(bytes)
    return new BitReaderWord64(words)
  }

  readBits(numBits: number): ReadBitsResult {
    assertBitCount(numBits)
    const numRead = Math.min(numBits, this.getCapacity() - this.pos)
    if (numRead <= 0) return { bits: 0n, numRead: 0 }

    const index = Math.floor(this.pos / 64)
    const offset = this.pos % 64
    let bits = this.buffer[index] >> BigInt(offset)
    // the read crosses into the next word, which exists since numRead stays within capacity
    if (offset + numRead > 64) {
      bits |= this.buffer[index + 1] << BigInt(64 - offset)
    }
    this.pos += numRead
    return { bits: getLowerBits(BigInt.asUintN(64, bits), numRead), numRead }
  }

  reachedEnd(): boolean {
    return this.pos >= this.getCapacity()
  }

  // Only looks at the last word: anywhere before it the answer is false.
  onlyZeroesLeft(): boolean {
    if (this.reachedEnd()) return true
    const index = Math.floor(this.pos / 64)
    if (index !== this.buffer.length - 1) return false
    return (this.buffer[index] >> BigInt(this.pos % 64)) === 0n
  }

  getPosition(): number {
    return this.pos
  }

  getCapacity(): number {
    return this.buffer.length * 64
  }
}
