import { readFileSync } from 'node:fs'

export interface Vector {
  /** hex */
  raw: string
  base58: string
  /** Base58Check encoding of `raw` under version 0 */
  base58check: string
}

interface Vectors {
  bitcoin: Vector[]
  ripple: Vector[]
}

export const vectors: Vectors = JSON.parse(
  readFileSync(new URL('./vectors.json', import.meta.url), 'utf8'),
)

/** Moves the last 10 characters to the front */
export function rotate(address: string): string {
  return address.slice(-10) + address.slice(0, -10)
}
