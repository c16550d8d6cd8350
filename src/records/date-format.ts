// Token date patterns ("Y-m-d", "d/m/Y H:i", "Y-m-d\TH:i:sP"), rendered and parsed in UTC.
// A backslash escapes the next character; characters that are not tokens are literals.

const MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December'
];
const DAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

const COMPOUND: Record<string, string> = {
  c: 'Y-m-d\\TH:i:sP'
};

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

type Piece = { token: string } | { literal: string };

function tokenize(pattern: string): Piece[] {
  const pieces: Piece[] = [];
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];
    if (ch === '\\') {
      i++;
      if (i < pattern.length) pieces.push({ literal: pattern[i] });
      continue;
    }
    const compound = COMPOUND[ch];
    if (compound) {
      pieces.push(...tokenize(compound));
    } else if (ch in FORMATTERS) {
      pieces.push({ token: ch });
    } else {
      pieces.push({ literal: ch });
    }
  }
  return pieces;
}

const FORMATTERS: Record<string, (d: Date) => string> = {
  d: d => pad(d.getUTCDate()),
  j: d => String(d.getUTCDate()),
  D: d => DAYS[d.getUTCDay()].slice(0, 3),
  l: d => DAYS[d.getUTCDay()],
  N: d => String(d.getUTCDay() === 0 ? 7 : d.getUTCDay()),
  m: d => pad(d.getUTCMonth() + 1),
  n: d => String(d.getUTCMonth() + 1),
  M: d => MONTHS[d.getUTCMonth()].slice(0, 3),
  F: d => MONTHS[d.getUTCMonth()],
  Y: d => pad(d.getUTCFullYear(), 4),
  y: d => pad(d.getUTCFullYear() % 100),
  H: d => pad(d.getUTCHours()),
  G: d => String(d.getUTCHours()),
  h: d => pad(d.getUTCHours() % 12 || 12),
  g: d => String(d.getUTCHours() % 12 || 12),
  A: d => (d.getUTCHours() < 12 ? 'AM' : 'PM'),
  a: d => (d.getUTCHours() < 12 ? 'am' : 'pm'),
  i: d => pad(d.getUTCMinutes()),
  s: d => pad(d.getUTCSeconds()),
  v: d => pad(d.getUTCMilliseconds(), 3),
  U: d => String(Math.floor(d.getTime() / 1000)),
  P: () => '+00:00',
  O: () => '+0000',
  e: () => 'UTC',
  T: () => 'UTC'
};

export function formatDate(date: Date, pattern: string): string {
  return tokenize(pattern)
    .map(piece => ('token' in piece ? FORMATTERS[piece.token](date) : piece.literal))
    .join('');
}

interface Parts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  ms: number;
  meridiem?: 'am' | 'pm';
  offsetMinutes: number;
  unix?: number;
}

interface Parser {
  source: string;
  apply(parts: Parts, match: string): boolean;
}

const names = (list: string[]) => list.join('|');
const shortNames = (list: string[]) => list.map(n => n.slice(0, 3)).join('|');
const toInt = (s: string) => parseInt(s, 10);

function numeric(source: string, set: (parts: Parts, n: number) => void): Parser {
  return { source, apply: (parts, match) => { set(parts, toInt(match)); return true; } };
}

function parseOffset(match: string): number | null {
  if (match === 'Z') return 0;
  const m = /^([+-])(\d{2}):?(\d{2})$/.exec(match);
  if (!m) return null;
  const minutes = toInt(m[2]) * 60 + toInt(m[3]);
  return m[1] === '-' ? -minutes : minutes;
}

const offsetParser = (source: string): Parser => ({
  source,
  apply: (parts, match) => {
    const offset = parseOffset(match);
    if (offset === null) return false;
    parts.offsetMinutes = offset;
    return true;
  }
});

const ignored = (source: string): Parser => ({ source, apply: () => true });

const PARSERS: Record<string, Parser> = {
  d: numeric('\\d{2}', (p, n) => { p.day = n; }),
  j: numeric('\\d{1,2}', (p, n) => { p.day = n; }),
  D: ignored(shortNames(DAYS)),
  l: ignored(names(DAYS)),
  N: ignored('[1-7]'),
  m: numeric('\\d{2}', (p, n) => { p.month = n; }),
  n: numeric('\\d{1,2}', (p, n) => { p.month = n; }),
  M: { source: shortNames(MONTHS), apply: (p, s) => { p.month = MONTHS.findIndex(m => m.startsWith(s)) + 1; return true; } },
  F: { source: names(MONTHS), apply: (p, s) => { p.month = MONTHS.indexOf(s) + 1; return true; } },
  Y: numeric('\\d{4}', (p, n) => { p.year = n; }),
  y: numeric('\\d{2}', (p, n) => { p.year = n < 70 ? 2000 + n : 1900 + n; }),
  H: numeric('\\d{2}', (p, n) => { p.hour = n; }),
  G: numeric('\\d{1,2}', (p, n) => { p.hour = n; }),
  h: numeric('\\d{2}', (p, n) => { p.hour = n; }),
  g: numeric('\\d{1,2}', (p, n) => { p.hour = n; }),
  A: { source: 'AM|PM', apply: (p, s) => { p.meridiem = s === 'AM' ? 'am' : 'pm'; return true; } },
  a: { source: 'am|pm', apply: (p, s) => { p.meridiem = s === 'am' ? 'am' : 'pm'; return true; } },
  i: numeric('\\d{2}', (p, n) => { p.minute = n; }),
  s: numeric('\\d{2}', (p, n) => { p.second = n; }),
  v: numeric('\\d{3}', (p, n) => { p.ms = n; }),
  U: numeric('-?\\d+', (p, n) => { p.unix = n; }),
  P: offsetParser('Z|[+-]\\d{2}:\\d{2}'),
  O: offsetParser('[+-]\\d{4}'),
  e: ignored('UTC|GMT|Z'),
  T: ignored('UTC|GMT|Z')
};

const escapeRegex = (s: string) => s.replace(/[.*+?^${}()|[\]\\/-]/g, '\\$&');

/**
 * Parses `text` against `pattern`. Returns null when the text does not match
 * the whole pattern or names a calendar date that does not exist.
 */
export function parseDate(text: string, pattern: string): Date | null {
  const pieces = tokenize(pattern);
  const parsers: Parser[] = [];
  let source = '^';
  for (const piece of pieces) {
    if ('token' in piece) {
      const parser = PARSERS[piece.token];
      parsers.push(parser);
      source += `(${parser.source})`;
    } else {
      source += escapeRegex(piece.literal);
    }
  }
  const match = new RegExp(source + '$').exec(text);
  if (!match) return null;

  const parts: Parts = { year: 1970, month: 1, day: 1, hour: 0, minute: 0, second: 0, ms: 0, offsetMinutes: 0 };
  for (let i = 0; i < parsers.length; i++) {
    if (!parsers[i].apply(parts, match[i + 1])) return null;
  }

  if (parts.unix !== undefined) return new Date(parts.unix * 1000);

  if (parts.meridiem) {
    if (parts.hour < 1 || parts.hour > 12) return null;
    parts.hour = (parts.hour % 12) + (parts.meridiem === 'pm' ? 12 : 0);
  }
  if (parts.month < 1 || parts.month > 12) return null;
  if (parts.day < 1 || parts.day > 31) return null;
  if (parts.hour > 23 || parts.minute > 59 || parts.second > 59) return null;

  const date = new Date(0);
  date.setUTCFullYear(parts.year, parts.month - 1, parts.day);
  date.setUTCHours(parts.hour, parts.minute, parts.second, parts.ms);
  // Rolled over (e.g. February 30th)
  if (date.getUTCMonth() !== parts.month - 1 || date.getUTCDate() !== parts.day) return null;

  return new Date(date.getTime() - parts.offsetMinutes * 60_000);
}
