/**
 * Splits text holding several concatenated PGN games into one span per game
 */

/**
 * Game termination followed by a blank line and the next tag, or end of input
 */
const GAME_BOUNDARY = /(\s+)(1-0|0-1|1\/2-1\/2|\*)\s*?(\n\s*\n\s*\[|$)/g;

/**
 * Normalize CRLF and lone CR line endings to LF
 */
export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n?/g, '\n');
}

/**
 * Split raw PGN text into per-game spans.
 *
 * Each span is a contiguous slice of the normalized input. A boundary that
 * ends on the next game's opening bracket leaves that bracket to the next
 * span, so joining the spans gives back the normalized text. Whitespace-only
 * spans are dropped.
 */
export function splitPgnGames(raw: string): string[] {
  const text = normalizeLineEndings(raw);
  if (!text.trim()) {
    return [];
  }

  const spans: string[] = [];
  let start = 0;

  for (const match of text.matchAll(GAME_BOUNDARY)) {
    const end = (match.index ?? start) + match[0].length;
    const opensNextGame = match[0].endsWith('[');
    const spanEnd = opensNextGame ? end - 1 : end;

    const span = text.slice(start, spanEnd);
    if (span.trim()) {
      spans.push(span);
    }
    start = spanEnd;
  }

  if (start < text.length) {
    const rest = text.slice(start);
    if (rest.trim()) {
      spans.push(rest);
    }
  }

  return spans;
}
