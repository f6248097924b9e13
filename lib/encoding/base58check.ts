/**
 * Base58Check encoding/decoding utilities
 *
 * An address is `version || content || checksum`, Base58-encoded, where the
 * checksum is the first four bytes of SHA-256(SHA-256(version || content)).
 */

import { err, ok, type Result } from 'neverthrow'
import { type AlphabetInput } from './alphabet.js'
import { Base58, type Base58Input } from './base58.js'
import { Hash } from '../crypto/hash.js'
import { Base58Error, InvalidAddress, InvalidVersion } from '../errors.js'
import { BufferUtil } from '../util/buffer.js'
import { Preconditions } from '../util/preconditions.js'
import {
  CHECKSUM_LENGTH,
  DEFAULT_VERSION,
  MAX_VERSION,
} from '../../utils/constants.js'

export interface VersionedPayload {
  version: number
  content: Buffer
}

function describe(address: Base58Input): string {
  return typeof address === 'string' ? address : BufferUtil.toLatin1(address)
}

export class Base58Check {
  /**
   * Encode `content` under a single version byte
   */
  static encode(
    content: Uint8Array,
    version: number = DEFAULT_VERSION,
    alphabet?: AlphabetInput,
  ): string {
    return BufferUtil.toLatin1(
      Base58Check.encodeToBuffer(content, version, alphabet),
    )
  }

  /**
   * Same as {@link Base58Check.encode}, returning the symbol bytes instead of
   * text
   */
  static encodeToBuffer(
    content: Uint8Array,
    version: number = DEFAULT_VERSION,
    alphabet?: AlphabetInput,
  ): Buffer {
    Preconditions.checkBytes(content, 'content')
    Preconditions.checkArgument(
      Number.isInteger(version) && version >= 0 && version <= MAX_VERSION,
      () => new InvalidVersion(version),
    )

    const payload = Buffer.concat([Buffer.from([version]), content])
    return Base58.encodeToBuffer(
      Buffer.concat([payload, Base58Check.checksum(payload)]),
      alphabet,
    )
  }

  /**
   * Whether the checksum of `address` matches its body. Input that cannot be
   * Base58-decoded throws instead of returning false.
   */
  static isValid(address: Base58Input, alphabet?: AlphabetInput): boolean {
    return Base58Check.verified(address, alphabet) !== undefined
  }

  /**
   * Decode an address to its content, without the version byte and checksum
   */
  static decode(address: Base58Input, alphabet?: AlphabetInput): Buffer {
    const raw = Base58Check.verified(address, alphabet)
    if (!raw) {
      throw new InvalidAddress(describe(address))
    }
    return raw.subarray(1, -CHECKSUM_LENGTH)
  }

  /**
   * Decode an address to its version byte and content
   */
  static decodeVersioned(
    address: Base58Input,
    alphabet?: AlphabetInput,
  ): VersionedPayload {
    const raw = Base58Check.verified(address, alphabet)
    if (!raw || raw.length <= CHECKSUM_LENGTH) {
      throw new InvalidAddress(describe(address))
    }
    return {
      version: raw[0],
      content: raw.subarray(1, -CHECKSUM_LENGTH),
    }
  }

  /**
   * {@link Base58Check.decode} without throwing. Decoding, configuration and
   * checksum failures are all returned as `Err`.
   */
  static tryDecode(
    address: Base58Input,
    alphabet?: AlphabetInput,
  ): Result<Buffer, Base58Error> {
    try {
      return ok(Base58Check.decode(address, alphabet))
    } catch (e) {
      if (e instanceof Base58Error) {
        return err(e)
      }
      throw e
    }
  }

  /**
   * Calculate checksum for data
   */
  static checksum(data: Uint8Array): Buffer {
    return Hash.sha256sha256(data).subarray(0, CHECKSUM_LENGTH)
  }

  /**
   * Validate checksum
   */
  static validChecksum(data: Uint8Array, checksum: Uint8Array): boolean {
    return BufferUtil.equals(Base58Check.checksum(data), checksum)
  }

  /**
   * Raw decoded address when its checksum holds, undefined otherwise
   */
  private static verified(
    address: Base58Input,
    alphabet?: AlphabetInput,
  ): Buffer | undefined {
    const raw = Base58.decode(address, alphabet)
    if (raw.length < CHECKSUM_LENGTH) {
      return undefined
    }
    const body = raw.subarray(0, -CHECKSUM_LENGTH)
    const checksum = raw.subarray(-CHECKSUM_LENGTH)
    return Base58Check.validChecksum(body, checksum) ? raw : undefined
  }
}
