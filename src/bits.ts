import { assertBitCount, assertBitString, BitStreamContractError } from './assert'

// Terminology:
//   bits    - a bigint holding up to 64 bits, the first bit is the lowest
//   stream  - a string of '0' and '1' read left to right, the first bit at the
//             front (the reverse of how a number is usually printed)
//   bitset  - the usual printed form of a number of fixed width, most
//             significant bit first, i.e. reverse(stream)

export type WordSize = 8 | 16 | 32 | 64
export type WordArray = Uint8Array | Uint16Array | Uint32Array | BigUint64Array

/** How many words of `wordSize` bits are needed to hold `numBits`. */
export function numBitsToNumWords(numBits: number, wordSize: number): number {
  return Math.floor((numBits + wordSize - 1) / wordSize)
}

/**
 * Clears everything above the first `numBits` bits. Asking for the full
 * `width` returns `value` as is.
 */
export function getLowerBits(value: bigint, numBits: number, width = 64): bigint {
  assertBitCount(numBits, width)
  return numBits === width ? value : value & ((1n << BigInt(numBits)) - 1n)
}

/** Converts a left-to-right stream of at most 64 bits to a bigint. */
export function streamToBits(stream: string): bigint {
  assertBitString(stream, 64)
  let bits = 0n
  for (let i = stream.length - 1; i >= 0; i--) {
    bits = (bits << 1n) | (stream[i] === '1' ? 1n : 0n)
  }
  return bits
}

/** Converts the first `numBits` of `bits` to a left-to-right stream. */
export function bitsToStream(bits: bigint, numBits = 64): string {
  assertBitCount(numBits)
  let stream = ''
  for (let i = 0; i < numBits; i++) {
    stream += ((bits >> BigInt(i)) & 1n) === 1n ? '1' : '0'
  }
  return stream
}

/** Appends '0' until the length is a multiple of `wordSize`. */
export function padToWord(stream: string, wordSize: number): string {
  const tail = stream.length % wordSize
  return tail === 0 ? stream : stream + '0'.repeat(wordSize - tail)
}

export function bufferToStream(buffer: WordArray): string {
  const wordSize = buffer.BYTES_PER_ELEMENT * 8
  let stream = ''
  for (let i = 0; i < buffer.length; i++) {
    stream += bitsToStream(BigInt(buffer[i]), wordSize)
  }
  return stream
}

/**
 * Splits a left-to-right stream into words. A trailing partial word keeps
 * its bits at the bottom and zeroes above them.
 */
export function streamToBuffer(stream: string, wordSize: 8): Uint8Array
export function streamToBuffer(stream: string, wordSize: 16): Uint16Array
export function streamToBuffer(stream: string, wordSize: 32): Uint32Array
export function streamToBuffer(stream: string, wordSize: 64): BigUint64Array
export function streamToBuffer(stream: string, wordSize: WordSize): WordArray
export function streamToBuffer(stream: string, wordSize: WordSize): WordArray {
  assertBitString(stream)
  const words: bigint[] = []
  for (let start = 0; start < stream.length; start += wordSize) {
    words.push(streamToBits(stream.slice(start, start + wordSize)))
  }
  switch (wordSize) {
    case 8:
      return Uint8Array.from(words, Number)
    case 16:
      return Uint16Array.from(words, Number)
    case 32:
      return Uint32Array.from(words, Number)
    case 64:
      return BigUint64Array.from(words)
  }
}

/** Converts a left-to-right stream to the printed form of a `size`-bit bitset. */
export function streamToBitset(stream: string, size: number): string {
  assertBitString(stream)
  if (stream.length > size) {
    throw new BitStreamContractError(`Stream of ${stream.length} bits does not fit a bitset of ${size}`)
  }
  return reverse(stream).padStart(size, '0')
}

/** Takes the lowest `numBits` bits of a printed bitset, left to right. */
export function bitsetToStream(bitset: string, numBits = bitset.length): string {
  assertBitString(bitset)
  assertBitCount(numBits, bitset.length)
  return reverse(bitset.slice(bitset.length - numBits))
}

function reverse(str: string): string {
  return str.split('').reverse().join('')
}
