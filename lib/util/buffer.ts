/**
 * Buffer utility module
 */

import { Preconditions } from './preconditions.js'

export class BufferUtil {
  /**
   * Views a Uint8Array as a Buffer without copying it
   */
  static toBuffer(bytes: Uint8Array): Buffer {
    Preconditions.checkBytes(bytes, 'bytes')
    if (Buffer.isBuffer(bytes)) {
      return bytes
    }
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  }

  /**
   * Check if two byte arrays are equal
   */
  static equals(a: Uint8Array, b: Uint8Array): boolean {
    if (a.length !== b.length) {
      return false
    }
    const length = a.length
    for (let i = 0; i < length; i++) {
      if (a[i] !== b[i]) {
        return false
      }
    }
    return true
  }

  /**
   * Position of the first character that does not fit in a single byte, or -1
   * when every character of `text` has a code point of at most 0xff.
   */
  static indexOfWideChar(text: string): number {
    for (let i = 0; i < text.length; i++) {
      if (text.charCodeAt(i) > 0xff) {
        return i
      }
    }
    return -1
  }

  /**
   * One byte per character. Callers check {@link BufferUtil.indexOfWideChar}
   * first, since Buffer.from truncates wider code points.
   */
  static fromLatin1(text: string): Buffer {
    return Buffer.from(text, 'latin1')
  }

  static toLatin1(bytes: Uint8Array): string {
    return BufferUtil.toBuffer(bytes).toString('latin1')
  }
}
