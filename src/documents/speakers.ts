// Line-anchored, applied in this order; all of them run and matches accumulate.
const SPEAKER_PATTERNS: readonly RegExp[] = [
  // "TH-001  " followed by at least two whitespace characters
  /^([A-Z]{2,}-\d{3})\s{2,}/gm,
  // "Interviewer:"
  /^([A-Za-z0-9_-]+):/gm,
  // "[PA-001]"
  /^\[([A-Za-z0-9_-]+)\]/gm,
];

const SPEAKER_HEADER = /^[ \t]*SPEAKERS\s*\n([^\n]+)/m;
const SPEAKER_TOKEN = /^[A-Za-z0-9_-]+$/;

function headerSpeakers(text: string): string[] {
  const match = SPEAKER_HEADER.exec(text);
  if (!match) return [];

  return match[1]
    .split(/[,\s]+/)
    .map((token) => token.trim())
    .filter((token) => token && SPEAKER_TOKEN.test(token));
}

/**
 * Heuristically extract speaker ids from transcript text.
 *
 * Combines an optional `SPEAKERS` header line with inline speaker labels
 * (`TH-001␣␣`, `Interviewer:`, `[PA-001]`). Undetected speakers are simply
 * missing from the result.
 *
 * @returns Unique speaker ids, sorted ascending.
 */
export function detectSpeakers(text: string): string[] {
  const speakers = new Set<string>(headerSpeakers(text));

  for (const pattern of SPEAKER_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      speakers.add(match[1]);
    }
  }

  return [...speakers].sort();
}
