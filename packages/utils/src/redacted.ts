/**
 * Holder for secrets (client secrets, API keys, key passwords).
 *
 * The wrapped value is only reachable through `.value`; every implicit conversion
 * (template strings, `JSON.stringify`, pino serialization) prints `[Redacted]`.
 */
export class Redacted<T> {
  public constructor(public readonly value: T) {}

  public toString(): string {
    return '[Redacted]';
  }

  public toJSON(): string {
    return '[Redacted]';
  }
}

export function isRedacted(value: unknown): value is Redacted<unknown> {
  return value instanceof Redacted;
}

export function redactedOrUndefined(value: string | undefined): Redacted<string> | undefined {
  return value ? new Redacted(value) : undefined;
}
