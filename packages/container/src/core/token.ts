/**
 * Phantom type brand for compile-time type safety.
 * Associates tokens with their resolved value type without runtime overhead.
 */
declare const TOKEN_BRAND: unique symbol;

/**
 * Type-safe entry key.
 *
 * A token is an entry identifier that also carries, at compile time, the
 * type of the value the entry resolves to.
 *
 * @template T - The type of value this token resolves to
 */
export interface Token<T = unknown> {
  /** Discriminant for runtime type checking */
  readonly kind: 'token';

  /** Entry identifier */
  readonly id: string;

  /** Phantom type brand - associates token with its value type */
  readonly [TOKEN_BRAND]: T;
}

/**
 * Anything accepted where an entry is named: a raw id or a typed token.
 */
export type EntryKey<T = unknown> = string | Token<T>;

/**
 * Create a typed key for an entry.
 *
 * @example
 * ```typescript
 * const MailerT = token<Mailer>('mailer');
 * const mailer = container.get(MailerT); // Mailer
 * ```
 */
export function token<T = unknown>(id: string): Token<T> {
  return Object.freeze({ kind: 'token', id }) as Token<T>;
}

/**
 * Runtime type guard to check if a value is a valid Token.
 */
export function isToken(x: unknown): x is Token<unknown> {
  return (
    typeof x === 'object' &&
    x !== null &&
    'kind' in x &&
    x.kind === 'token' &&
    'id' in x &&
    typeof x.id === 'string'
  );
}

/** Entry id behind a key. */
export const idOf = (key: EntryKey): string => (typeof key === 'string' ? key : key.id);
