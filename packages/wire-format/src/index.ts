// Field sizes
export {
  U8_SIZE, U32_SIZE, F64_SIZE, U32_MAX, LITTLE_ENDIAN,
  type ByteSource,
} from './types'

// Writer
export { ByteWriter } from './writer'

// Reader
export { ByteReader, ByteUnderflowError } from './reader'
