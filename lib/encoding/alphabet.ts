/**
 * Base58 alphabet
 *
 * An alphabet maps digit values 0..57 to symbol bytes. It is validated once
 * when built and then shared by every encode/decode call that uses it.
 */

import { DuplicateSymbol, InvalidAlphabet, InvalidInputType } from '../errors.js'
import { BufferUtil } from '../util/buffer.js'
import { ALPHABET_LENGTH, DEFAULT_ALPHABET } from '../../utils/constants.js'

/**
 * Anything an alphabet can be built from: text (one byte per character),
 * raw symbol bytes, or an alphabet that was already validated.
 */
export type AlphabetInput = string | Uint8Array | Alphabet

export class Alphabet {
  /** Symbol byte for each digit value */
  private readonly symbols: Buffer
  /** Digit value for each byte, -1 for bytes outside the alphabet */
  private readonly digits: Int16Array

  private constructor(symbols: Buffer) {
    if (symbols.length !== ALPHABET_LENGTH) {
      throw new InvalidAlphabet(
        `must contain exactly ${ALPHABET_LENGTH} symbols, got ${symbols.length}`,
      )
    }
    const digits = new Int16Array(256).fill(-1)
    for (let i = 0; i < symbols.length; i++) {
      const symbol = symbols[i]
      const seen = digits[symbol]
      if (seen !== -1) {
        throw new DuplicateSymbol(String.fromCharCode(symbol), seen, i)
      }
      digits[symbol] = i
    }
    this.symbols = symbols
    this.digits = digits
    Object.freeze(this)
  }

  static from(input?: AlphabetInput): Alphabet {
    if (input === undefined) {
      return Alphabet.default()
    }
    if (input instanceof Alphabet) {
      return input
    }
    if (typeof input === 'string') {
      const wide = BufferUtil.indexOfWideChar(input)
      if (wide !== -1) {
        throw new InvalidAlphabet(
          `symbol ${JSON.stringify(input[wide])} at position ${wide} does not fit in one byte`,
        )
      }
      return new Alphabet(BufferUtil.fromLatin1(input))
    }
    if (input instanceof Uint8Array) {
      // copied so later writes to the caller's array cannot change the table
      return new Alphabet(Buffer.from(input))
    }
    throw new InvalidInputType(input, 'string, Buffer or Alphabet', 'alphabet')
  }

  private static defaultAlphabet?: Alphabet

  static default(): Alphabet {
    if (!Alphabet.defaultAlphabet) {
      Alphabet.defaultAlphabet = new Alphabet(
        BufferUtil.fromLatin1(DEFAULT_ALPHABET),
      )
    }
    return Alphabet.defaultAlphabet
  }

  /** Symbol for digit 0, also used for every leading zero byte */
  get zero(): number {
    return this.symbols[0]
  }

  symbol(digit: number): number {
    return this.symbols[digit]
  }

  /**
   * Digit value of a symbol byte, or -1 when it is not part of the alphabet.
   */
  digit(symbol: number): number {
    return this.digits[symbol] ?? -1
  }

  has(symbol: number): boolean {
    return this.digit(symbol) !== -1
  }

  equals(other: Alphabet): boolean {
    return BufferUtil.equals(this.symbols, other.symbols)
  }

  /**
   * Copy of the symbol bytes, in digit order. Writing to it leaves the
   * alphabet unchanged.
   */
  toBuffer(): Buffer {
    return Buffer.from(this.symbols)
  }

  toString(): string {
    return BufferUtil.toLatin1(this.symbols)
  }
}
