/**
 * Error handling module
 *
 * Every failure raised by the codec is a subclass of {@link Base58Error}. The
 * message of each error is rendered from the template table below, so the
 * wording of a given failure is the same wherever it is thrown.
 */

type ErrorMessage = string | ((...args: unknown[]) => string)

function argument(args: unknown[], index: number): string {
  const value = args[index]
  return value === undefined ? '' : String(value)
}

function format(message: string, args: unknown[]): string {
  return message
    .replace('{0}', argument(args, 0))
    .replace('{1}', argument(args, 1))
    .replace('{2}', argument(args, 2))
}

function describeType(value: unknown): string {
  if (value === null) {
    return 'null'
  }
  if (typeof value === 'object') {
    return value.constructor?.name ?? 'object'
  }
  return typeof value
}

export type ErrorCode =
  | 'ConfigError.InvalidAlphabet'
  | 'ConfigError.DuplicateSymbol'
  | 'ConfigError.InvalidVersion'
  | 'InvalidInputType'
  | 'InvalidSymbol'
  | 'InvalidAddress'

export type ConfigErrorCode = Extract<ErrorCode, `ConfigError.${string}`>

const errorSpec: Record<ErrorCode, ErrorMessage> = {
  'ConfigError.InvalidAlphabet': 'Invalid alphabet: {0}',
  'ConfigError.DuplicateSymbol':
    'Invalid alphabet: symbol {0} appears at positions {1} and {2}',
  'ConfigError.InvalidVersion':
    'Invalid version: must be an integer between 0 and 255, got {0}',
  InvalidInputType: function (...args: unknown[]) {
    return (
      'Invalid Argument for ' +
      argument(args, 2) +
      ', expected ' +
      argument(args, 1) +
      ' but got ' +
      describeType(args[0])
    )
  },
  InvalidSymbol: 'Invalid Base58 character: {0} in {1}',
  InvalidAddress: 'Invalid Base58 checksum for {0}',
}

function render(code: ErrorCode, args: unknown[]): string {
  const message = errorSpec[code]
  return typeof message === 'string'
    ? format(message, args)
    : message(...args)
}

export class Base58Error extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, ...args: unknown[]) {
    super(render(code, args))
    this.code = code
    this.name = 'base58.' + code
  }
}

/**
 * Malformed alphabet or out-of-range version. The caller has to fix the
 * arguments; retrying cannot succeed.
 */
export abstract class ConfigError extends Base58Error {
  protected constructor(code: ConfigErrorCode, ...args: unknown[]) {
    super(code, ...args)
  }
}

export class InvalidAlphabet extends ConfigError {
  constructor(readonly reason: string) {
    super('ConfigError.InvalidAlphabet', reason)
  }
}

export class DuplicateSymbol extends ConfigError {
  constructor(
    readonly symbol: string,
    readonly first: number,
    readonly second: number,
  ) {
    super('ConfigError.DuplicateSymbol', JSON.stringify(symbol), first, second)
  }
}

export class InvalidVersion extends ConfigError {
  constructor(readonly version: unknown) {
    super('ConfigError.InvalidVersion', version)
  }
}

export class InvalidInputType extends Base58Error {
  constructor(
    readonly argument: unknown,
    readonly expected: string,
    readonly argumentName = '(unknown name)',
  ) {
    super('InvalidInputType', argument, expected, argumentName)
  }
}

export class InvalidSymbol extends Base58Error {
  constructor(
    readonly symbol: string,
    readonly position: number,
    readonly input: string,
  ) {
    super('InvalidSymbol', JSON.stringify(symbol), input)
  }
}

export class InvalidAddress extends Base58Error {
  constructor(readonly address: string) {
    super('InvalidAddress', address)
  }
}
