import { inspect } from 'node:util';

const REDACTED = '[redacted]';

/**
 * Opaque wrapper for a credential (DSN, API key, storage secret).
 * Printing, logging or JSON-encoding it never shows the raw value;
 * only the client library that needs it calls `reveal()`.
 */
export class Secret {
  readonly #value: string;

  constructor(value: string) {
    this.#value = value;
  }

  reveal(): string {
    return this.#value;
  }

  toString(): string {
    return REDACTED;
  }

  toJSON(): string {
    return REDACTED;
  }

  [inspect.custom](): string {
    return `Secret(${REDACTED})`;
  }
}

/** Replace every occurrence of the given secrets' raw values in `message`. */
export const redact = (message: string, secrets: readonly Secret[]): string =>
  secrets.reduce((text, secret) => {
    const raw = secret.reveal();
    if (raw === '') return text;
    return text.split(raw).join(REDACTED);
  }, message);
