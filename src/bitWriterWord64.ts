import { assertBitCount } from './assert'
import { bufferToStream, getLowerBits, numBitsToNumWords } from './bits'
import { BitWriterInterface } from './bitWriter'
import { env } from './env'
import { createLogger } from './logger'

const log = createLogger('BitWriterWord64')

/**
 * Append-only writer that packs bits into 64-bit words, first bit lowest.
 * Bits above the write position in the last word are always zero.
 */
export class BitWriterWord64 implements BitWriterInterface {
  private buffer: BigUint64Array
  private numWords = 0
  // Total number of bits written so far.
  private end = 0

  constructor(reserveBits: number = env.reserveBits) {
    this.buffer = new BigUint64Array(Math.max(1, numBitsToNumWords(reserveBits, 64)))
  }

  writeBits(bits: bigint, numBits: number): void {
    assertBitCount(numBits)
    if (numBits === 0) return

    const value = getLowerBits(BigInt.asUintN(64, bits), numBits)
    const offset = this.end % 64
    if (offset === 0) {
      this.appendWord(value)
    } else {
      const last = this.numWords - 1
      this.buffer[last] = BigInt.asUintN(64, this.buffer[last] | (value << BigInt(offset)))
      if (offset + numBits > 64) {
        this.appendWord(value >> BigInt(64 - offset))
      }
    }
    this.end += numBits
  }

  getNumBits(): number {
    return this.end
  }

  getDataSizeBytes(): number {
    return numBitsToNumWords(this.end, 8)
  }

  /**
   * Byte view over the written words in host byte order. The view is only
   * valid until the next write, which may move the storage.
   */
  getData(): Uint8Array {
    return new Uint8Array(this.buffer.buffer, 0, this.getDataSizeBytes())
  }

  getDataCopy(): Uint8Array {
    return this.getData().slice()
  }

  /** Copy of the words written so far, the last one possibly partial. */
  getWords(): BigUint64Array {
    return this.buffer.slice(0, this.numWords)
  }

  /** Written bits as a left-to-right stream padded with '0' to a multiple of 64. */
  getStreamPadded64(): string {
    return bufferToStream(this.buffer.subarray(0, this.numWords))
  }

  private appendWord(word: bigint) {
    if (this.numWords === this.buffer.length) {
      const grown = new BigUint64Array(Math.max(1, this.buffer.length * 2))
      grown.set(this.buffer)
      log.debug(`grow ${this.buffer.length} -> ${grown.length} words`)
      this.buffer = grown
    }
    this.buffer[this.numWords++] = word
  }
}
