/**
 * Base58 encoding/decoding module
 *
 * Converts big-endian byte strings to and from base 58 over any 58-symbol
 * alphabet. Each leading zero byte maps to one leading zero symbol
 * (`alphabet[0]`) and back, so zero bytes that carry no numeric value still
 * round-trip.
 */

import { Alphabet, type AlphabetInput } from './alphabet.js'
import { InvalidInputType, InvalidSymbol } from '../errors.js'
import { BufferUtil } from '../util/buffer.js'
import { Preconditions } from '../util/preconditions.js'

/** Encoded input: text, or the symbol bytes themselves */
export type Base58Input = string | Uint8Array

export interface Base58Data {
  buf?: Buffer
}

const BASE = 58n

/**
 * Base-58 digits of `value`, most significant first, as symbol bytes.
 *
 * Zero produces no digits unless `emitZero` is set, in which case it produces
 * the single zero symbol. Byte encoding relies on the empty form: the zero
 * symbols it needs come from the leading zero bytes alone.
 */
function encodeInt(
  value: bigint,
  alphabet: Alphabet,
  emitZero: boolean,
): number[] {
  if (value === 0n && emitZero) {
    return [alphabet.zero]
  }
  const digits: number[] = []
  while (value > 0n) {
    digits.push(alphabet.symbol(Number(value % BASE)))
    value /= BASE
  }
  return digits.reverse()
}

function decodeInt(
  symbols: Buffer,
  start: number,
  alphabet: Alphabet,
): bigint {
  let value = 0n
  for (let i = start; i < symbols.length; i++) {
    const digit = alphabet.digit(symbols[i])
    if (digit === -1) {
      throw new InvalidSymbol(
        String.fromCharCode(symbols[i]),
        i,
        BufferUtil.toLatin1(symbols),
      )
    }
    value = value * BASE + BigInt(digit)
  }
  return value
}

function leadingCount(buf: Uint8Array, byte: number): number {
  let count = 0
  while (count < buf.length && buf[count] === byte) {
    count++
  }
  return count
}

export class Base58 {
  buf?: Buffer
  readonly alphabet: Alphabet

  constructor(obj?: Uint8Array | string | Base58Data, alphabet?: AlphabetInput) {
    this.alphabet = Alphabet.from(alphabet)
    if (obj instanceof Uint8Array) {
      this.fromBuffer(BufferUtil.toBuffer(obj))
    } else if (typeof obj === 'string') {
      this.fromString(obj)
    } else if (obj) {
      this.set(obj)
    }
  }

  /**
   * Normalises encoded input to its symbol bytes. Text is taken one byte per
   * character; a character above U+00FF cannot be a symbol of any alphabet.
   */
  static toSymbols(input: Base58Input): Buffer {
    if (typeof input === 'string') {
      const wide = BufferUtil.indexOfWideChar(input)
      if (wide !== -1) {
        throw new InvalidSymbol(input[wide], wide, input)
      }
      return BufferUtil.fromLatin1(input)
    }
    if (input instanceof Uint8Array) {
      return BufferUtil.toBuffer(input)
    }
    throw new InvalidInputType(input, 'string or Buffer', 'input')
  }

  static validCharacters(
    chars: Base58Input,
    alphabet?: AlphabetInput,
  ): boolean {
    const table = Alphabet.from(alphabet)
    if (typeof chars === 'string' && BufferUtil.indexOfWideChar(chars) !== -1) {
      return false
    }
    return Base58.toSymbols(chars).every(symbol => table.has(symbol))
  }

  static encode(buf: Uint8Array, alphabet?: AlphabetInput): string {
    return BufferUtil.toLatin1(Base58.encodeToBuffer(buf, alphabet))
  }

  /**
   * Same as {@link Base58.encode}, returning the symbol bytes instead of text
   */
  static encodeToBuffer(buf: Uint8Array, alphabet?: AlphabetInput): Buffer {
    Preconditions.checkBytes(buf, 'buf')
    const table = Alphabet.from(alphabet)

    const zeros = leadingCount(buf, 0)
    let value = 0n
    for (let i = zeros; i < buf.length; i++) {
      value = (value << 8n) | BigInt(buf[i])
    }

    return Buffer.concat([
      Buffer.alloc(zeros, table.zero),
      Buffer.from(encodeInt(value, table, false)),
    ])
  }

  static decode(input: Base58Input, alphabet?: AlphabetInput): Buffer {
    const table = Alphabet.from(alphabet)
    const symbols = Base58.toSymbols(input)

    const zeros = leadingCount(symbols, table.zero)
    let value = decodeInt(symbols, zeros, table)

    const bytes: number[] = []
    while (value > 0n) {
      bytes.push(Number(value & 0xffn))
      value >>= 8n
    }
    bytes.reverse()

    return Buffer.concat([Buffer.alloc(zeros), Buffer.from(bytes)])
  }

  /**
   * Encodes a single non-negative integer. Unlike {@link Base58.encode}, zero
   * is written as one zero symbol rather than as nothing.
   */
  static encodeInteger(
    value: bigint | number,
    alphabet?: AlphabetInput,
  ): string {
    const table = Alphabet.from(alphabet)
    if (typeof value === 'number') {
      Preconditions.checkArgument(Number.isSafeInteger(value), () =>
        new InvalidInputType(value, 'safe integer', 'value'),
      )
      value = BigInt(value)
    }
    Preconditions.checkArgumentType(value, 'bigint', 'value')
    const integer = value
    Preconditions.checkArgument(integer >= 0n, () =>
      new InvalidInputType(integer, 'non-negative integer', 'value'),
    )
    return BufferUtil.toLatin1(Buffer.from(encodeInt(integer, table, true)))
  }

  /**
   * Reads every symbol as a digit, zero symbols included. Empty input is 0.
   */
  static decodeInteger(input: Base58Input, alphabet?: AlphabetInput): bigint {
    const table = Alphabet.from(alphabet)
    return decodeInt(Base58.toSymbols(input), 0, table)
  }

  set(obj: Base58Data): Base58 {
    this.buf = obj.buf || this.buf || undefined
    return this
  }

  fromBuffer(buf: Buffer): Base58 {
    this.buf = buf
    return this
  }

  fromString(str: string): Base58 {
    this.buf = Base58.decode(str, this.alphabet)
    return this
  }

  toBuffer(): Buffer {
    return this.buf ?? Buffer.alloc(0)
  }

  toString(): string {
    return Base58.encode(this.toBuffer(), this.alphabet)
  }
}
