// Location token scanning: finds `[revision:]path[:lineno]` spans in a line

import type { LocationToken } from '../../models/location.js';

/**
 * revision: `[\w.-]+`, path: `/`-joined segments starting with a letter, '.', '_' or '-',
 * then an optional `:lineno` not followed by a word character, and an optional
 * separator colon.
 * A token never starts right after a word character or any of `. / # -`,
 * so the inside of a URL or a `#L` fragment cannot start a match.
 */
export const LOCATION_PATTERN = /(?<![\w.\/#-])(?:([\w.-]+):)?((?:[A-Za-z._-][\w.-]*\/)*[A-Za-z._-][\w.-]*)(?::(\d+)(?!\w))?(:?)/g;

const MARKDOWN_LABEL_END = '](';
const NAME_CHAR = /[\w.-]/;

/**
 * Whether the text after a match makes it part of something larger: a URL
 * scheme (`https:` followed by `/`), a markdown label (followed by `](`), or
 * a path whose next segment the grammar rejects (`crypto/1.c`).
 * A directory mention such as `crypto/ ` is still a token.
 */
function isEmbedded(line: string, end: number, trailingColon: boolean): boolean {
  if (line.startsWith(MARKDOWN_LABEL_END, end)) {
    return true;
  }
  if (line.charAt(end) !== '/') {
    return false;
  }
  return trailingColon || NAME_CHAR.test(line.charAt(end + 1));
}

/**
 * Parse one regex match into a token
 */
function toToken(match: RegExpExecArray): LocationToken {
  const [text, revision, path, lineno, colon] = match;
  return {
    text,
    index: match.index,
    revision: revision || undefined,
    path,
    lineno: lineno !== undefined ? Number(lineno) : undefined,
    trailingColon: colon === ':'
  };
}

/**
 * Find every location token in a line, in order of appearance
 */
export function scanLocations(line: string): LocationToken[] {
  const tokens: LocationToken[] = [];

  LOCATION_PATTERN.lastIndex = 0;
  let match: RegExpExecArray | null;
  while ((match = LOCATION_PATTERN.exec(line)) !== null) {
    const token = toToken(match);
    if (isEmbedded(line, token.index + token.text.length, token.trailingColon)) {
      continue;
    }
    tokens.push(token);
  }

  return tokens;
}

/**
 * Text of a token without its separator colon
 */
export function tokenLabel(token: LocationToken): string {
  return token.trailingColon ? token.text.slice(0, -1) : token.text;
}
