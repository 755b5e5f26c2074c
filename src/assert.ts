import { env } from './env'

/**
 * Thrown when a caller breaks the contract of a raw operation: more than 64
 * bits at once, a zero chunk length, a block exponent outside the width, a
 * value that does not fit its declared width, or a malformed bit string.
 *
 * Truncated input is not a contract violation and never throws.
 */
export class BitStreamContractError extends RangeError {
  constructor(message: string) {
    super(message)
    this.name = 'BitStreamContractError'
  }
}

export const MAX_BITS_PER_OP = 64

function fail(message: string): never {
  throw new BitStreamContractError(message)
}

export function assertBitCount(numBits: number, max = MAX_BITS_PER_OP) {
  if (!env.checks) return
  if (!Number.isInteger(numBits) || numBits < 0 || numBits > max) {
    fail(`Bit count must be an integer in [0, ${max}], got ${numBits}`)
  }
}

export function assertChunkLength(chunkLength: number) {
  if (!env.checks) return
  if (!Number.isInteger(chunkLength) || chunkLength < 1 || chunkLength > MAX_BITS_PER_OP) {
    fail(`Chunk length must be an integer in [1, ${MAX_BITS_PER_OP}], got ${chunkLength}`)
  }
}

export function assertBlockExponent(blockExponent: number, width = 64) {
  if (!env.checks) return
  if (!Number.isInteger(blockExponent) || blockExponent < 0 || blockExponent >= width) {
    fail(`Block exponent must be an integer in [0, ${width - 1}], got ${blockExponent}`)
  }
}

export function assertUnsignedRange(value: number | bigint, width: number) {
  if (!env.checks) return
  if (typeof value === 'bigint') {
    if (value < 0n || value >= 1n << BigInt(width)) fail(`Value out of range for u${width}: ${value}`)
    return
  }
  if (!Number.isInteger(value) || value < 0 || value >= 2 ** width) {
    fail(`Value out of range for u${width}: ${value}`)
  }
}

export function assertSignedRange(value: number | bigint, width: number) {
  if (!env.checks) return
  if (typeof value === 'bigint') {
    const half = 1n << BigInt(width - 1)
    if (value < -half || value >= half) fail(`Value out of range for i${width}: ${value}`)
    return
  }
  const min = -(2 ** (width - 1))
  const max = 2 ** (width - 1) - 1
  if (!Number.isInteger(value) || value < min || value > max) {
    fail(`Value out of range for i${width}: ${value}`)
  }
}

export function assertBitString(str: string, maxLength?: number) {
  if (!env.checks) return
  if (!/^[01]*$/.test(str)) {
    fail(`Bit string may only contain '0' and '1': "${str}"`)
  }
  if (maxLength !== undefined && str.length > maxLength) {
    fail(`Bit string longer than ${maxLength} bits: ${str.length}`)
  }
}
