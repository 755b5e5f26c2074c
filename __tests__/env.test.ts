import { assertBitCount, BitStreamContractError } from '../src/assert'
import { BitWriterWord64 } from '../src/bitWriterWord64'
import { DEFAULT_RESERVE_BITS, env, loadEnv } from '../src/env'
import { createLogger } from '../src/logger'

describe('loadEnv', () => {
  test('defaults', () => {
    expect(loadEnv({})).toEqual({ checks: true, reserveBits: DEFAULT_RESERVE_BITS, debug: false })
  })

  test('reads switches and sizes', () => {
    expect(
      loadEnv({ BITPACK_CHECKS: '0', BITPACK_RESERVE_BITS: '0x100', BITPACK_DEBUG: 'true' })
    ).toEqual({ checks: false, reserveBits: 256, debug: true })
    expect(loadEnv({ BITPACK_CHECKS: 'FALSE', BITPACK_RESERVE_BITS: '1024', BITPACK_DEBUG: '1' })).toEqual({
      checks: false,
      reserveBits: 1024,
      debug: true,
    })
  })

  test('falls back on values it does not understand', () => {
    expect(loadEnv({ BITPACK_CHECKS: 'maybe', BITPACK_RESERVE_BITS: 'lots', BITPACK_DEBUG: 'yes' })).toEqual({
      checks: true,
      reserveBits: DEFAULT_RESERVE_BITS,
      debug: false,
    })
  })
})

describe('env switches', () => {
  const saved = { ...env }

  afterEach(() => {
    Object.assign(env, saved)
    jest.restoreAllMocks()
  })

  test('contract checks can be turned off', () => {
    expect(() => assertBitCount(65)).toThrow(BitStreamContractError)
    env.checks = false
    expect(() => assertBitCount(65)).not.toThrow()
  })

  test('debug logs only print when enabled', () => {
    const spy = jest.spyOn(console, 'debug').mockImplementation(() => {})
    const log = createLogger('test')

    env.debug = false
    log.debug('hidden')
    expect(spy).not.toHaveBeenCalled()

    env.debug = true
    log.debug('shown', 1)
    expect(spy).toHaveBeenCalledWith('[test]', 'shown', 1)
  })

  test('the writer logs when its buffer grows', () => {
    const spy = jest.spyOn(console, 'debug').mockImplementation(() => {})
    env.debug = true
    const writer = new BitWriterWord64(64)
    writer.writeBits(1n, 64)
    writer.writeBits(1n, 1)
    expect(spy).toHaveBeenCalledWith('[BitWriterWord64]', 'grow 1 -> 2 words')
  })
})
