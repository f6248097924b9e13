/**
 * Functional entry points over the Base58 and Base58Check classes
 */

import { type AlphabetInput } from './encoding/alphabet.js'
import { Base58, type Base58Input } from './encoding/base58.js'
import { Base58Check } from './encoding/base58check.js'

/**
 * Encode bytes to Base58
 * @param val - The bytes to encode
 * @param alphabet - Alphabet to encode with, the Bitcoin one by default
 * @returns The Base58 symbol bytes
 */
export function b58encode(val: Uint8Array, alphabet?: AlphabetInput): Buffer {
  return Base58.encodeToBuffer(val, alphabet)
}

/**
 * Decode Base58 text or symbol bytes
 * @param val - The encoded value
 * @param alphabet - Alphabet the value was encoded with
 * @returns The decoded bytes, leading zero bytes included
 */
export function b58decode(val: Base58Input, alphabet?: AlphabetInput): Buffer {
  return Base58.decode(val, alphabet)
}

/**
 * Encode bytes to a Base58Check address
 * @param val - The address content
 * @param version - Version byte, 0 to 255
 * @param alphabet - Alphabet to encode with
 * @returns The address symbol bytes
 */
export function b58checkEncode(
  val: Uint8Array,
  version?: number,
  alphabet?: AlphabetInput,
): Buffer {
  return Base58Check.encodeToBuffer(val, version, alphabet)
}

/**
 * Check the checksum of a Base58Check address
 * @param val - The address
 * @param alphabet - Alphabet the address was encoded with
 * @returns `true` if the checksum matches, `false` otherwise
 */
export function b58checkIsValid(
  val: Base58Input,
  alphabet?: AlphabetInput,
): boolean {
  return Base58Check.isValid(val, alphabet)
}

/**
 * Decode a Base58Check address
 * @param val - The address
 * @param alphabet - Alphabet the address was encoded with
 * @returns The address content, without version byte and checksum
 */
export function b58checkDecode(
  val: Base58Input,
  alphabet?: AlphabetInput,
): Buffer {
  return Base58Check.decode(val, alphabet)
}
