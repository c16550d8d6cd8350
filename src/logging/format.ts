const COLORS = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  blue: '\x1b[34m',
  red: '\x1b[31m'
};

const EVENT_COLORS: Record<string, string> = {
  command_run: COLORS.cyan,
  command_dispatched: COLORS.blue,
  job_started: COLORS.dim,
  job_completed: COLORS.green,
  job_failed: COLORS.red
};

const DETAIL_KEYS = ['queue', 'jobId', 'attempt', 'args', 'durMs'] as const;

/**
 * One dispatch log line as a terminal line. Lines that are not log entries
 * are returned unchanged.
 */
export function formatDispatchEntry(line: string, color = true): string {
  let entry: unknown;
  try {
    entry = JSON.parse(line);
  } catch {
    return line;
  }
  if (typeof entry !== 'object' || entry === null || Array.isArray(entry)) return line;

  const ts = Reflect.get(entry, 'ts');
  const event = String(Reflect.get(entry, 'event') ?? 'unknown');
  const command = String(Reflect.get(entry, 'command') ?? '?');
  const time = typeof ts === 'string' ? ts.substring(11, 23) : '--:--:--.---';

  let details = '';
  for (const key of DETAIL_KEYS) {
    const value: unknown = Reflect.get(entry, key);
    if (value !== undefined && value !== null) details += ` ${key}=${String(value)}`;
  }
  const error: unknown = Reflect.get(entry, 'error');
  if (typeof error === 'string') details += ` error=${JSON.stringify(error)}`;

  if (!color) return `${time} ${event.padEnd(18)} ${command}${details}`;
  const c = EVENT_COLORS[event] ?? COLORS.reset;
  return `${COLORS.dim}${time}${COLORS.reset} ${c}${COLORS.bold}${event.padEnd(18)}${COLORS.reset} ${command}${details}`;
}
