/**
 * Main exports for the Base58 / Base58Check library
 */

// Crypto modules
export { Hash } from './crypto/hash.js'

// Utility modules
export { Preconditions } from './util/preconditions.js'
export { BufferUtil } from './util/buffer.js'

// Errors
export {
  Base58Error,
  ConfigError,
  InvalidAlphabet,
  DuplicateSymbol,
  InvalidVersion,
  InvalidInputType,
  InvalidSymbol,
  InvalidAddress,
  type ErrorCode,
  type ConfigErrorCode,
} from './errors.js'

// Encoding modules
export { Alphabet, type AlphabetInput } from './encoding/alphabet.js'
export {
  Base58,
  type Base58Data,
  type Base58Input,
} from './encoding/base58.js'
export {
  Base58Check,
  type VersionedPayload,
} from './encoding/base58check.js'

// Functional API
export {
  b58encode,
  b58decode,
  b58checkEncode,
  b58checkIsValid,
  b58checkDecode,
} from './codec.js'
