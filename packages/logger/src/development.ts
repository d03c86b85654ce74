import pretty from 'pino-pretty';

// Fields the indexer attaches to every line that add nothing when reading a local terminal.
const hiddenFields = ['pid', 'hostname', 'service', 'trace_id', 'span_id', 'trace_flags'];

export function developmentPrettyOptions(options: pretty.PrettyOptions): pretty.PrettyOptions {
  return {
    ...options,
    translateTime: 'SYS:HH:MM:ss.l',
    ignore: hiddenFields.join(','),
    messageFormat: '{if caller}[{caller}] {end}{msg}',
    singleLine: true,
  };
}

/** pino transport entry for local runs; see `developmentTarget`. */
export default function developmentTransport(options: pretty.PrettyOptions) {
  return pretty(developmentPrettyOptions(options));
}
