import { BitStreamContractError } from '../src/assert'
import { decodeZigZag, encodeZigZag } from '../src/zigzag'

const I64_MIN = -(1n << 63n)
const I64_MAX = (1n << 63n) - 1n
const U64_MAX = (1n << 64n) - 1n

const SAMPLES = [
  0n, 1n, -1n, 2n, -2n, 3n, -3n, 7n, -8n, 100n, -100n, 255n, -256n, 65535n, -65536n,
  0x7fffffffn, -0x80000000n, 0x123456789abcdefn, -0x123456789abcdefn,
  I64_MAX, I64_MAX - 1n, I64_MIN, I64_MIN + 1n,
]

describe('encodeZigZag', () => {
  test('interleaves small values', () => {
    expect(encodeZigZag(0n)).toBe(0n)
    expect(encodeZigZag(-1n)).toBe(1n)
    expect(encodeZigZag(1n)).toBe(2n)
    expect(encodeZigZag(-2n)).toBe(3n)
    expect(encodeZigZag(2n)).toBe(4n)
  })

  test('maps the int64 extremes to the top of uint64', () => {
    expect(encodeZigZag(I64_MAX)).toBe(U64_MAX - 1n)
    expect(encodeZigZag(I64_MIN)).toBe(U64_MAX)
  })

  test('block exponent 0 is the plain mapping', () => {
    for (const v of SAMPLES) {
      expect(encodeZigZag(v, 0)).toBe(encodeZigZag(v))
    }
  })

  test('block exponent 1 order', () => {
    const decoded = [0n, 1n, 2n, 3n, 4n, 5n, 6n, 7n].map((e) => decodeZigZag(e, 1))
    expect(decoded).toEqual([0n, 1n, -1n, -2n, 2n, 3n, -3n, -4n])
  })

  test('block exponent 2 order', () => {
    const decoded = Array.from({ length: 16 }, (_, i) => decodeZigZag(BigInt(i), 2))
    expect(decoded).toEqual([0n, 1n, 2n, 3n, -1n, -2n, -3n, -4n, 4n, 5n, 6n, 7n, -5n, -6n, -7n, -8n])
  })

  test('block exponent 63 keeps the whole magnitude', () => {
    expect(encodeZigZag(5n, 63)).toBe(5n)
    expect(encodeZigZag(-1n, 63)).toBe(1n << 63n)
    expect(encodeZigZag(I64_MIN, 63)).toBe(U64_MAX)
  })

  test('rejects block exponents outside [0, 63]', () => {
    expect(() => encodeZigZag(1n, 64)).toThrow(BitStreamContractError)
    expect(() => encodeZigZag(1n, -1)).toThrow(BitStreamContractError)
    expect(() => decodeZigZag(1n, 64)).toThrow(BitStreamContractError)
  })
})

describe('decodeZigZag', () => {
  test('inverts the plain mapping', () => {
    expect([0n, 1n, 2n, 3n, 4n].map((e) => decodeZigZag(e))).toEqual([0n, -1n, 1n, -2n, 2n])
    expect(decodeZigZag(U64_MAX)).toBe(I64_MIN)
    for (const v of SAMPLES) {
      expect(decodeZigZag(encodeZigZag(v))).toBe(v)
    }
  })

  test('inverts the block mapping for every exponent', () => {
    for (let k = 0; k < 64; k++) {
      for (const v of SAMPLES) {
        expect(decodeZigZag(encodeZigZag(v, k), k)).toBe(v)
      }
    }
  })
})
