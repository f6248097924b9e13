/**
 * Copyright 2025 The Lotusia Stewardship
 * Github: https://github.com/LotusiaStewardship
 * License: MIT
 */

/** Package version */
export const VERSION = '2.0.0'

/**
 * Alphabets
 */
/** Number of symbols every alphabet must contain */
export const ALPHABET_LENGTH = 58
/** Bitcoin alphabet, used whenever no alphabet is given */
export const DEFAULT_ALPHABET =
  '123456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz'
/** Well-known alphabets by name */
export const ALPHABETS = {
  bitcoin: DEFAULT_ALPHABET,
  ripple: 'rpshnaf39wBUDNEGHJKLM4PQRST7VWXYZ2bcdeCg65jkm8oFqi1tuvAxyz',
  flickr: '123456789abcdefghijkmnopqrstuvwxyzABCDEFGHJKLMNPQRSTUVWXYZ',
} as const

/**
 * Base58Check framing
 */
/** Checksum length, in bytes (first bytes of the double SHA-256) */
export const CHECKSUM_LENGTH = 4
/** Default address version byte */
export const DEFAULT_VERSION = 0x00
/** Largest version that fits in the single version byte */
export const MAX_VERSION = 0xff
