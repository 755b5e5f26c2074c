import { assertBitCount, assertBlockExponent, assertChunkLength } from './assert'
import { bitsToStream, streamToBitset } from './bits'
import { createLogger } from './logger'
import { decodeZigZag } from './zigzag'

const log = createLogger('bitReader')

export interface ReadBitsResult {
  /** The bits read, first bit lowest; everything above `numRead` is zero. */
  bits: bigint
  numRead: number
}

/** Raw source of bits. Everything else in this module is built on it. */
export interface BitReaderInterface {
  /**
   * Reads up to `numBits` (at most 64). Fewer come back only when the end of
   * the buffer is closer than that.
   */
  readBits(numBits: number): ReadBitsResult

  /** Hard EOF: every bit of the buffer has been consumed. */
  reachedEnd(): boolean

  /**
   * Soft EOF: true at hard EOF, and possibly also when only zero bits are
   * left, for consumers that expect the stream to end in zero padding. May
   * return false even though only zeroes are left; never returns true while
   * a set bit remains.
   */
  onlyZeroesLeft(): boolean
}

export type ReadResult<T> = { ok: true; value: T } | { ok: false }

/**
 * Reads `numBits` and returns them as a left-to-right stream. The stream is
 * shorter than `numBits` if the end was reached.
 */
export function readStream(reader: BitReaderInterface, numBits: number): string {
  const { bits, numRead } = reader.readBits(numBits)
  return bitsToStream(bits, numRead)
}

/** Reads `numBits` into the printed form of a `size`-bit bitset. */
export function readBitset(reader: BitReaderInterface, size: number, numBits = size): ReadResult<string> {
  assertBitCount(numBits, Math.min(size, 64))
  const stream = readStream(reader, numBits)
  if (stream.length === 0) return { ok: false }
  return { ok: true, value: streamToBitset(stream, size) }
}

/**
 * Reads a value written by `writeVariableWidth` with the same `chunkLength`
 * and `maxPayload`. Fails if the stream ends before the value is complete.
 */
export function readVariableWidth(
  reader: BitReaderInterface,
  chunkLength: number,
  maxPayload: number
): ReadResult<bigint> {
  assertChunkLength(chunkLength)
  assertBitCount(maxPayload)
  let value = 0n
  let consumed = 0
  while (consumed < maxPayload) {
    const readLength = Math.min(chunkLength, maxPayload - consumed)
    const chunk = reader.readBits(readLength)
    if (chunk.numRead !== readLength) {
      log.debug(`stream ended inside a chunk: wanted ${readLength} bits, got ${chunk.numRead}`)
      return { ok: false }
    }
    value |= chunk.bits << BigInt(consumed)
    consumed += readLength
    if (consumed >= maxPayload) break

    const signal = reader.readBits(1)
    if (signal.numRead !== 1) {
      log.debug(`stream ended before the signal bit after ${consumed} payload bits`)
      return { ok: false }
    }
    if (signal.bits === 0n) break
  }
  return { ok: true, value }
}

export function readVariableWidthU64(reader: BitReaderInterface, chunkLength: number): ReadResult<bigint> {
  return readVariableWidth(reader, chunkLength, 64)
}

export function readVariableWidthU32(reader: BitReaderInterface, chunkLength: number): ReadResult<number> {
  return readUnsignedNumber(reader, chunkLength, 32)
}

export function readVariableWidthU16(reader: BitReaderInterface, chunkLength: number): ReadResult<number> {
  return readUnsignedNumber(reader, chunkLength, 16)
}

export function readVariableWidthU8(reader: BitReaderInterface, chunkLength: number): ReadResult<number> {
  return readUnsignedNumber(reader, chunkLength, 8)
}

export function readVariableWidthS64(
  reader: BitReaderInterface,
  chunkLength: number,
  zigzagExponent: number
): ReadResult<bigint> {
  assertBlockExponent(zigzagExponent)
  const result = readVariableWidth(reader, chunkLength, 64)
  if (!result.ok) return result
  return { ok: true, value: decodeZigZag(result.value, zigzagExponent) }
}

export function readVariableWidthS32(
  reader: BitReaderInterface,
  chunkLength: number,
  zigzagExponent: number
): ReadResult<number> {
  return readSignedNumber(reader, chunkLength, zigzagExponent, 32)
}

export function readVariableWidthS16(
  reader: BitReaderInterface,
  chunkLength: number,
  zigzagExponent: number
): ReadResult<number> {
  return readSignedNumber(reader, chunkLength, zigzagExponent, 16)
}

export function readVariableWidthS8(
  reader: BitReaderInterface,
  chunkLength: number,
  zigzagExponent: number
): ReadResult<number> {
  return readSignedNumber(reader, chunkLength, zigzagExponent, 8)
}

function readUnsignedNumber(reader: BitReaderInterface, chunkLength: number, width: number): ReadResult<number> {
  const result = readVariableWidth(reader, chunkLength, width)
  if (!result.ok) return result
  return { ok: true, value: Number(result.value) }
}

function readSignedNumber(
  reader: BitReaderInterface,
  chunkLength: number,
  zigzagExponent: number,
  width: number
): ReadResult<number> {
  assertBlockExponent(zigzagExponent, width)
  const result = readVariableWidth(reader, chunkLength, width)
  if (!result.ok) return result
  return { ok: true, value: Number(decodeZigZag(result.value, zigzagExponent)) }
}
