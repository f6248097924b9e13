/**
 * Preconditions utility module
 */

import { Base58Error, InvalidInputType } from '../errors.js'

type TypeName = 'string' | 'number' | 'bigint' | 'boolean' | 'object'

export class Preconditions {
  /**
   * Throws the error built by `error` unless `condition` holds.
   */
  static checkArgument(condition: boolean, error: () => Base58Error): void {
    if (!condition) {
      throw error()
    }
  }

  static checkArgumentType(
    argument: unknown,
    type: TypeName,
    argumentName?: string,
  ): void {
    if (typeof argument !== type) {
      throw new InvalidInputType(argument, type, argumentName)
    }
  }

  /**
   * Node Buffers and plain Uint8Arrays are both accepted wherever bytes are
   * expected.
   */
  static checkBytes(argument: unknown, argumentName?: string): void {
    if (!(argument instanceof Uint8Array)) {
      throw new InvalidInputType(argument, 'Buffer', argumentName)
    }
  }
}
