export const LogsDiagnosticDataPolicy = {
  CONCEAL: 'conceal',
  DISCLOSE: 'disclose',
} as const;
export type LogsDiagnosticDataPolicy =
  (typeof LogsDiagnosticDataPolicy)[keyof typeof LogsDiagnosticDataPolicy];

/**
 * Masks all but the last `leaveOver` characters of a value. Word characters become `*`,
 * separators (`-`, `.`, `/`, spaces) stay so the shape of the value remains readable.
 *
 * @example
 * smear('contoso.sharepoint.com'); // "*******.**********.com"
 * smear('abc');                    // "[Smeared]"
 * smear(undefined);                // "__erroneous__"
 */
export function smear(text: string | null | undefined, leaveOver = 4): string {
  if (text === undefined || text === null) return '__erroneous__';
  if (text.length - leaveOver < 3) return '[Smeared]';

  const visible = text.slice(text.length - leaveOver);
  const hidden = text.slice(0, text.length - leaveOver).replaceAll(/[a-zA-Z0-9_]/g, '*');
  return `${hidden}${visible}`;
}

/**
 * Diagnostic value (site name, folder path, file name) that is useful while debugging
 * but should not end up verbatim in production logs. Secrets belong in `Redacted`.
 */
export class Smeared {
  public constructor(
    public readonly value: string,
    public readonly active: boolean,
  ) {}

  public toString(): string {
    return this.active ? smear(this.value) : this.value;
  }

  public toJSON(): string {
    return this.toString();
  }
}

export function isSmearingActive(
  policy: string | undefined = process.env.LOGS_DIAGNOSTICS_DATA_POLICY,
): boolean {
  return policy !== LogsDiagnosticDataPolicy.DISCLOSE;
}

export function createSmeared(value: string, active = isSmearingActive()): Smeared {
  return new Smeared(value, active);
}

/**
 * Smears each segment of a slash separated path on its own, keeping the hierarchy visible.
 * The drive root (empty path) is printed as `/`.
 */
export function smearPath(path: string | undefined, active = isSmearingActive()): string {
  const segments = (path ?? '').split('/').filter(Boolean);
  if (segments.length === 0) return '/';
  if (!active) return `/${segments.join('/')}`;
  return `/${segments.map((segment) => smear(segment)).join('/')}`;
}
