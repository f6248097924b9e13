/**
 * Cryptographic hash functions
 *
 * Uses @noble/hashes for browser compatibility
 */

import { sha256 } from '@noble/hashes/sha256'
import { Preconditions } from '../util/preconditions.js'

export class Hash {
  static sha256(buf: Uint8Array): Buffer {
    Preconditions.checkBytes(buf, 'buf')
    return Buffer.from(sha256(buf))
  }

  static sha256sha256(buf: Uint8Array): Buffer {
    Preconditions.checkBytes(buf, 'buf')
    return Hash.sha256(Hash.sha256(buf))
  }
}
