export function elapsedMilliseconds(startTime: Date | number): number {
  return Date.now() - new Date(startTime).getTime();
}

export function elapsedSeconds(startTime: Date | number): number {
  return elapsedMilliseconds(startTime) / 1000;
}

export function getSlowRequestDurationBucket(durationMs: number): string | null {
  if (durationMs > 10_000) return '>10s';
  if (durationMs > 5_000) return '>5s';
  if (durationMs > 2_000) return '>2s';
  if (durationMs > 1_000) return '>1s';
  return null;
}

// 4xx codes are kept as-is, the exact code tells throttling (429) apart from auth problems.
export function getHttpStatusCodeClass(statusCode: number): string {
  if (statusCode >= 200 && statusCode < 300) return '2xx';
  if (statusCode >= 300 && statusCode < 400) return '3xx';
  if (statusCode >= 400 && statusCode < 500) return statusCode.toString();
  if (statusCode >= 500) return '5xx';
  return 'unknown';
}

/**
 * Builds a low-cardinality metric label out of a request path: known segments are kept,
 * everything else (ids, names) is replaced with a `{<previous segment>Id}` placeholder.
 *
 * @example
 * const extract = createApiMethodExtractor(['indexes', 'docs', 'index']);
 * extract('/indexes/chunks/docs/index?api-version=2024-07-01', 'POST');
 * // "POST:/indexes/{indexeId}/docs/index"
 */
export function createApiMethodExtractor(knownSegments: string[]) {
  const known = new Set(knownSegments);

  return (path: string, httpMethod: string): string => {
    const [pathname = ''] = path.split('?');
    const normalized: string[] = [];
    let previous: string | null = null;

    for (const segment of pathname.split('/').filter(Boolean)) {
      if (known.has(segment)) {
        normalized.push(segment);
        previous = segment;
      } else {
        normalized.push(previous ? `{${previous.replace(/s$/, '')}Id}` : '[unknown]');
        previous = null;
      }
    }

    return `${httpMethod.toUpperCase()}:/${normalized.join('/')}`;
  };
}
