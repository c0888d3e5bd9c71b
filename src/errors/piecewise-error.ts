/**
 * Piecewise Error Codes
 *
 * Every failure raised by the library is a plain Error carrying a stable `code`.
 *
 * @module errors/piecewise-error
 */

export const ERROR_CODES = {
  /** maxTokens is positive but smaller than the reserved-token count */
  VOCAB_INVALID_CONFIG: 'PIECEWISE_VOCAB_INVALID_CONFIG',
  /** Token lookup missed and no unknown token is configured */
  VOCAB_UNDEFINED_TOKEN: 'PIECEWISE_VOCAB_UNDEFINED_TOKEN',
  /** Segmentation produced more pieces than the character cap allows */
  TOKENIZER_INVARIANT: 'PIECEWISE_TOKENIZER_INVARIANT',
  /** Runtime or CLI configuration failed validation */
  CONFIG_INVALID: 'PIECEWISE_CONFIG_INVALID',
  /** A remote vocabulary source could not be read */
  SOURCE_UNREADABLE: 'PIECEWISE_SOURCE_UNREADABLE',
} as const;

export type PiecewiseErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export type PiecewiseError = Error & {
  code: PiecewiseErrorCode;
  details?: Record<string, unknown>;
};

export function createPiecewiseError(
  code: PiecewiseErrorCode,
  message: string,
  details?: Record<string, unknown>
): PiecewiseError {
  const error = new Error(message);
  error.name = 'PiecewiseError';
  return Object.assign(error, details === undefined ? { code } : { code, details });
}

/**
 * Narrow an unknown thrown value to a PiecewiseError, optionally of a given code.
 */
export function isPiecewiseError(value: unknown, code?: PiecewiseErrorCode): value is PiecewiseError {
  if (!(value instanceof Error)) return false;
  const candidate: unknown = Reflect.get(value, 'code');
  if (typeof candidate !== 'string') return false;
  const known: readonly string[] = Object.values(ERROR_CODES);
  if (!known.includes(candidate)) return false;
  return code === undefined || candidate === code;
}
