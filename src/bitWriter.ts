import {
  assertBitCount,
  assertBitString,
  assertBlockExponent,
  assertChunkLength,
  assertSignedRange,
  assertUnsignedRange,
} from './assert'
import { bitsetToStream, numBitsToNumWords, streamToBits } from './bits'
import { encodeZigZag } from './zigzag'

/** Raw sink of bits. Everything else in this module is built on these two calls. */
export interface BitWriterInterface {
  /** Writes the lower `numBits` (at most 64) of `bits`. */
  writeBits(bits: bigint, numBits: number): void
  /** Number of bits written so far. */
  getNumBits(): number
}

/**
 * Writes a left-to-right string of at most 64 '0'/'1'. "01" is written as
 * 0b10, not 0b01: the string is the order in which bits leave the encoder.
 */
export function writeStream(writer: BitWriterInterface, stream: string) {
  assertBitString(stream, 64)
  writer.writeBits(streamToBits(stream), stream.length)
}

/** Writes the lower `numBits` of a printed bitset. */
export function writeBitset(writer: BitWriterInterface, bitset: string, numBits = bitset.length) {
  writeStream(writer, bitsetToStream(bitset, numBits))
}

export function getDataSizeBytes(writer: BitWriterInterface): number {
  return numBitsToNumWords(writer.getNumBits(), 8)
}

/**
 * Writes `value`, an unsigned integer of `maxPayload` bits, in chunks of
 * `chunkLength` bits, lowest first. Each chunk is followed by a signal bit:
 * 1 if more chunks follow, 0 if not. The chunk that completes the payload is
 * truncated to fit and carries no signal bit.
 *
 * 255 with chunk length 4 and a 64-bit payload: 1111 1 1111 0
 */
export function writeVariableWidth(
  writer: BitWriterInterface,
  value: bigint,
  chunkLength: number,
  maxPayload: number
) {
  assertChunkLength(chunkLength)
  assertBitCount(maxPayload)
  let remaining = BigInt.asUintN(maxPayload, value)
  let written = 0
  while (written < maxPayload) {
    if (written + chunkLength >= maxPayload) {
      writer.writeBits(remaining, maxPayload - written)
      break
    }
    writer.writeBits(remaining, chunkLength)
    written += chunkLength
    remaining >>= BigInt(chunkLength)
    writer.writeBits(remaining === 0n ? 0n : 1n, 1)
    if (remaining === 0n) break
  }
}

export function writeVariableWidthU64(writer: BitWriterInterface, value: bigint, chunkLength: number) {
  assertUnsignedRange(value, 64)
  writeVariableWidth(writer, value, chunkLength, 64)
}

export function writeVariableWidthU32(writer: BitWriterInterface, value: number, chunkLength: number) {
  assertUnsignedRange(value, 32)
  writeVariableWidth(writer, BigInt(value), chunkLength, 32)
}

export function writeVariableWidthU16(writer: BitWriterInterface, value: number, chunkLength: number) {
  assertUnsignedRange(value, 16)
  writeVariableWidth(writer, BigInt(value), chunkLength, 16)
}

export function writeVariableWidthU8(writer: BitWriterInterface, value: number, chunkLength: number) {
  assertUnsignedRange(value, 8)
  writeVariableWidth(writer, BigInt(value), chunkLength, 8)
}

// Signed variants zigzag the value first. The block exponent has to stay
// below the width, otherwise the encoded value no longer fits in it.

export function writeVariableWidthS64(
  writer: BitWriterInterface,
  value: bigint,
  chunkLength: number,
  zigzagExponent: number
) {
  assertSignedRange(value, 64)
  writeVariableWidth(writer, encodeZigZag(value, zigzagExponent), chunkLength, 64)
}

export function writeVariableWidthS32(
  writer: BitWriterInterface,
  value: number,
  chunkLength: number,
  zigzagExponent: number
) {
  writeSignedNumber(writer, value, chunkLength, zigzagExponent, 32)
}

export function writeVariableWidthS16(
  writer: BitWriterInterface,
  value: number,
  chunkLength: number,
  zigzagExponent: number
) {
  writeSignedNumber(writer, value, chunkLength, zigzagExponent, 16)
}

export function writeVariableWidthS8(
  writer: BitWriterInterface,
  value: number,
  chunkLength: number,
  zigzagExponent: number
) {
  writeSignedNumber(writer, value, chunkLength, zigzagExponent, 8)
}

function writeSignedNumber(
  writer: BitWriterInterface,
  value: number,
  chunkLength: number,
  zigzagExponent: number,
  width: number
) {
  assertSignedRange(value, width)
  assertBlockExponent(zigzagExponent, width)
  writeVariableWidth(writer, encodeZigZag(BigInt(value), zigzagExponent), chunkLength, width)
}
