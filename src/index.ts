export { BitStreamContractError, MAX_BITS_PER_OP } from './assert'
export {
  bitsToStream,
  bitsetToStream,
  bufferToStream,
  getLowerBits,
  numBitsToNumWords,
  padToWord,
  streamToBits,
  streamToBitset,
  streamToBuffer,
  type WordArray,
  type WordSize,
} from './bits'
export { decodeZigZag, encodeZigZag } from './zigzag'
export {
  type BitWriterInterface,
  getDataSizeBytes,
  writeBitset,
  writeStream,
  writeVariableWidth,
  writeVariableWidthS16,
  writeVariableWidthS32,
  writeVariableWidthS64,
  writeVariableWidthS8,
  writeVariableWidthU16,
  writeVariableWidthU32,
  writeVariableWidthU64,
  writeVariableWidthU8,
} from './bitWriter'
export {
  type BitReaderInterface,
  type ReadBitsResult,
  type ReadResult,
  readBitset,
  readStream,
  readVariableWidth,
  readVariableWidthS16,
  readVariableWidthS32,
  readVariableWidthS64,
  readVariableWidthS8,
  readVariableWidthU16,
  readVariableWidthU32,
  readVariableWidthU64,
  readVariableWidthU8,
} from './bitReader'
export { BitWriterWord64 } from './bitWriterWord64'
export { BitReaderWord64 } from './bitReaderWord64'
export { type BitpackEnv, env, loadEnv } from './env'
