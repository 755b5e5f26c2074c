// Runtime switches, read from the environment once at load time.
// BITPACK_CHECKS=0      skip contract checks (bit counts, exponents, ranges)
// BITPACK_RESERVE_BITS  default reservation of a new writer, in bits
// BITPACK_DEBUG=1       print debug logs

export interface BitpackEnv {
  checks: boolean
  reserveBits: number
  debug: boolean
}

export const DEFAULT_RESERVE_BITS = 64

type EnvSource = Record<string, string | undefined>

function parseHexOrDec(s: string): number {
  if (/^0x[0-9a-f]+$/i.test(s)) return parseInt(s.slice(2), 16)
  if (/^\d+$/.test(s)) return parseInt(s, 10)
  return NaN
}

function parseFlag(value: string | undefined, fallback: boolean): boolean {
  const v = value?.trim().toLowerCase()
  if (v === '1' || v === 'true') return true
  if (v === '0' || v === 'false') return false
  return fallback
}

export function loadEnv(source: EnvSource = process.env): BitpackEnv {
  const reserve = source.BITPACK_RESERVE_BITS ? parseHexOrDec(source.BITPACK_RESERVE_BITS.trim()) : NaN
  return {
    checks: parseFlag(source.BITPACK_CHECKS, true),
    reserveBits: Number.isFinite(reserve) ? reserve : DEFAULT_RESERVE_BITS,
    debug: parseFlag(source.BITPACK_DEBUG, false),
  }
}

export const env: BitpackEnv = loadEnv()
