import { describe, it } from 'node:test'
import assert from 'node:assert'
import { Alphabet } from '../../lib/encoding/alphabet.js'
import { Base58 } from '../../lib/encoding/base58.js'
import {
  ConfigError,
  DuplicateSymbol,
  InvalidAlphabet,
  InvalidInputType,
} from '../../lib/errors.js'
import { ALPHABETS, DEFAULT_ALPHABET } from '../../utils/constants.js'

describe('Alphabet', () => {
  describe('from', () => {
    it('should default to the bitcoin alphabet', () => {
      const alphabet = Alphabet.from()
      assert.strictEqual(alphabet.toString(), DEFAULT_ALPHABET)
      assert.strictEqual(Alphabet.from(), alphabet)
    })

    it('should return an existing alphabet unchanged', () => {
      const ripple = Alphabet.from(ALPHABETS.ripple)
      assert.strictEqual(Alphabet.from(ripple), ripple)
    })

    it('should build the same table from text and bytes', () => {
      const fromText = Alphabet.from(ALPHABETS.flickr)
      const fromBytes = Alphabet.from(Buffer.from(ALPHABETS.flickr, 'latin1'))
      assert.ok(fromText.equals(fromBytes))
      assert.ok(!fromText.equals(Alphabet.from()))
    })

    it('should copy the symbol bytes it is given', () => {
      const bytes = new Uint8Array(Buffer.from(DEFAULT_ALPHABET, 'latin1'))
      const alphabet = Alphabet.from(bytes)
      bytes[0] = 0x30
      assert.strictEqual(alphabet.toString(), DEFAULT_ALPHABET)
    })

    it('should reject alphabets that are not 58 symbols long', () => {
      for (const input of ['', DEFAULT_ALPHABET.slice(1), DEFAULT_ALPHABET + '0']) {
        assert.throws(() => Alphabet.from(input), InvalidAlphabet)
      }
      assert.throws(() => Alphabet.from(DEFAULT_ALPHABET.slice(1)), {
        message: 'Invalid alphabet: must contain exactly 58 symbols, got 57',
      })
      assert.throws(() => Alphabet.from(new Uint8Array(59)), ConfigError)
    })

    it('should reject repeated symbols', () => {
      assert.throws(
        () => Alphabet.from(DEFAULT_ALPHABET.slice(0, 57) + '1'),
        (error: unknown) => {
          assert.ok(error instanceof DuplicateSymbol)
          assert.ok(error instanceof ConfigError)
          assert.strictEqual(error.symbol, '1')
          assert.strictEqual(error.first, 0)
          assert.strictEqual(error.second, 57)
          assert.strictEqual(
            error.message,
            'Invalid alphabet: symbol "1" appears at positions 0 and 57',
          )
          return true
        },
      )
    })

    it('should reject characters wider than one byte', () => {
      assert.throws(() => Alphabet.from(DEFAULT_ALPHABET.slice(0, 57) + '€'), {
        message:
          'Invalid alphabet: symbol "€" at position 57 does not fit in one byte',
      })
    })

    it('should reject other input types', () => {
      assert.throws(
        () => Reflect.apply(Alphabet.from, Alphabet, [58]),
        InvalidInputType,
      )
    })
  })

  describe('toBuffer', () => {
    it('should return the symbols in digit order', () => {
      assert.deepStrictEqual(
        Alphabet.from(ALPHABETS.ripple).toBuffer(),
        Buffer.from(ALPHABETS.ripple, 'latin1'),
      )
    })

    it('should not let writes reach the shared default alphabet', () => {
      const symbols = Alphabet.from().toBuffer()
      symbols[0] = 0x30
      assert.strictEqual(Alphabet.from().zero, 0x31)
      assert.strictEqual(Alphabet.from().toString(), DEFAULT_ALPHABET)
      assert.strictEqual(Base58.encode(Buffer.from([0, 58])), '121')
      assert.deepStrictEqual(Base58.decode('121'), Buffer.from([0, 58]))
    })
  })

  describe('lookup', () => {
    const alphabet = Alphabet.from()

    it('should map digits to symbols', () => {
      assert.strictEqual(alphabet.zero, 0x31)
      assert.strictEqual(alphabet.symbol(9), 0x41)
      assert.strictEqual(alphabet.symbol(57), 0x7a)
    })

    it('should map symbols to digits', () => {
      assert.strictEqual(alphabet.digit(0x31), 0)
      assert.strictEqual(alphabet.digit(0x7a), 57)
      assert.strictEqual(alphabet.digit(0x30), -1)
      assert.strictEqual(alphabet.has(0x4f), false)
      assert.strictEqual(alphabet.has(0x50), true)
    })
  })

  it('should encode with symbols above 0x7f', () => {
    const high = Buffer.from(Array.from({ length: 58 }, (_, i) => 0x80 + i))
    const sample = Buffer.from([0, 0, 1, 2, 3, 250])
    const encoded = Base58.encodeToBuffer(sample, high)
    assert.strictEqual(encoded[0], 0x80)
    assert.strictEqual(encoded[1], 0x80)
    assert.deepStrictEqual(Base58.decode(encoded, high), sample)
    assert.deepStrictEqual(
      Base58.decode(encoded.toString('latin1'), high),
      sample,
    )
  })
})
