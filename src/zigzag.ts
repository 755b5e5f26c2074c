import { assertBlockExponent } from './assert'
import { getLowerBits } from './bits'

/**
 * Maps a signed 64-bit integer to an unsigned one so that values close to
 * zero get few significant bits:
 *
 *    0 -> 0
 *   -1 -> 1
 *    1 -> 2
 *   -2 -> 3
 *    2 -> 4
 *
 * With `blockExponent` the values are interleaved in blocks of
 * 2^blockExponent instead, keeping the low bits of the magnitude intact.
 * For blockExponent = 2 the output indices run
 * 0, 1, 2, 3, -1, -2, -3, -4, 4, 5, 6, 7, -5, ...
 * A block exponent of 0 is the plain mapping.
 */
export function encodeZigZag(value: bigint, blockExponent?: number): bigint {
  const v = BigInt.asIntN(64, value)
  if (blockExponent === undefined) {
    return BigInt.asUintN(64, (v << 1n) ^ (v >> 63n))
  }

  assertBlockExponent(blockExponent)
  const k = BigInt(blockExponent)
  const negative = v < 0n
  const magnitude = negative ? -v - 1n : v
  const blockNum = ((magnitude >> k) << 1n) + (negative ? 1n : 0n)
  const pos = getLowerBits(magnitude, blockExponent)
  return BigInt.asUintN(64, (blockNum << k) + pos)
}

/** Inverse of {@link encodeZigZag}; `blockExponent` must match the encoder's. */
export function decodeZigZag(encoded: bigint, blockExponent?: number): bigint {
  const e = BigInt.asUintN(64, encoded)
  if (blockExponent === undefined) {
    // odd values are negative
    return (e & 1n) === 1n ? BigInt.asIntN(64, -1n - (e >> 1n)) : e >> 1n
  }

  assertBlockExponent(blockExponent)
  const k = BigInt(blockExponent)
  const blockNum = e >> k
  const pos = getLowerBits(e, blockExponent)
  if ((blockNum & 1n) === 1n) {
    return BigInt.asIntN(64, -1n - ((blockNum >> 1n) << k) - pos)
  }
  return BigInt.asIntN(64, ((blockNum >> 1n) << k) + pos)
}
