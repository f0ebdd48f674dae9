const REDACTED = '[one-time secret]';

/**
 * Plaintext credential material returned by an issuing call. It can be read
 * exactly once through `reveal()`. String coercion, JSON and util.inspect
 * all yield a placeholder.
 */
export class OneTimeSecret {
  #value: string | null;

  constructor(value: string) {
    this.#value = value;
  }

  reveal(): string {
    const value = this.#value;
    if (value === null) {
      throw new Error('One-time secret has already been revealed.');
    }
    this.#value = null;
    return value;
  }

  toString(): string {
    return REDACTED;
  }

  toJSON(): string {
    return REDACTED;
  }

  [Symbol.for('nodejs.util.inspect.custom')](): string {
    return REDACTED;
  }
}
