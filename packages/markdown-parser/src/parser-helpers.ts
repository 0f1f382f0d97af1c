import type { Cursor } from "./cursor";

export const ESCAPABLE_CHARACTERS = "!\"#$%&'()*+,-./:;<=>?@[\\]^_`{|}~";

const ESCAPED_CHAR_RE = /\\([!"#$%&'()*+,\-./:;<=>?@[\\\]^_`{|}~])/g;
const ENTITY_RE = /&(?:#[xX][0-9a-fA-F]{1,6}|#[0-9]{1,7}|[A-Za-z][A-Za-z0-9]{1,31});/g;
const LINK_DESTINATION_BRACES_RE = /<(?:[^<>\n\\\x00]|\\.)*>/;
const LINK_TITLE_RE = /"(?:\\[\s\S]|[^\\"\x00])*"|'(?:\\[\s\S]|[^\\'\x00])*'|\((?:\\[\s\S]|[^\\()\x00])*\)/;
const LINK_LABEL_RE = /\[(?:[^\\[\]]|\\[\s\S]){0,999}\]/;
const UNICODE_WHITESPACE_RE = /^[\t\n\f\r\p{Zs}]$/u;
const PUNCTUATION_RE = /^[\p{P}\p{S}]$/u;
const URL_UNSAFE_RE = /%[0-9A-Fa-f]{2}|[^A-Za-z0-9\-._~:/?#[\]@!$&'()*+,;=]/gu;

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: "\"",
  apos: "'",
  nbsp: "\u00a0",
  copy: "©",
  reg: "®",
  trade: "™",
  hellip: "…",
  mdash: "—",
  ndash: "–",
  lsquo: "‘",
  rsquo: "’",
  ldquo: "“",
  rdquo: "”",
  laquo: "«",
  raquo: "»",
  middot: "·",
  bull: "•",
  deg: "°",
  plusmn: "±",
  times: "×",
  divide: "÷",
  euro: "€",
  pound: "£",
  yen: "¥",
  cent: "¢",
  sect: "§",
  para: "¶",
  frac12: "½",
  auml: "ä",
  ouml: "ö",
  uuml: "ü",
};

export function normalizeRefLabel(str: string) {
  return str.trim().replace(/[ \t\r\n]+/g, " ").toLowerCase().toUpperCase();
}

export function isEscapable(char: string | null): boolean {
  return char !== null && char.length === 1 && ESCAPABLE_CHARACTERS.includes(char);
}

export function isUnicodeWhitespace(char: string): boolean {
  return UNICODE_WHITESPACE_RE.test(char);
}

export function isPunctuation(char: string): boolean {
  return PUNCTUATION_RE.test(char);
}

/**
 * Decodes one entity reference such as `&amp;`, `&#35;` or `&#x22;`.
 * Returns null when the name is not a known entity.
 */
export function decodeEntity(text: string): string | null {
  if (!text.startsWith("&") || !text.endsWith(";")) return null;
  const body = text.slice(1, -1);
  if (body.startsWith("#")) {
    const hex = body[1] === "x" || body[1] === "X";
    const codePoint = parseInt(body.slice(hex ? 2 : 1), hex ? 16 : 10);
    if (Number.isNaN(codePoint)) return null;
    if (codePoint === 0 || codePoint > 0x10ffff || (codePoint >= 0xd800 && codePoint <= 0xdfff)) {
      return "\uFFFD";
    }
    return String.fromCodePoint(codePoint);
  }
  return Object.prototype.hasOwnProperty.call(NAMED_ENTITIES, body) ? NAMED_ENTITIES[body] : null;
}

export function decodeEntities(str: string): string {
  return str.replace(ENTITY_RE, (entity) => decodeEntity(entity) ?? entity);
}

/** Removes backslash escapes and decodes entities. */
export function unescapeString(str: string): string {
  if (!str.includes("\\") && !str.includes("&")) return str;
  return decodeEntities(str.replace(ESCAPED_CHAR_RE, "$1"));
}

/** Percent-encodes characters that may not appear in a URL, keeping existing `%XX` escapes. */
export function normalizeUri(uri: string): string {
  return uri.replace(URL_UNSAFE_RE, (match) => {
    if (match.length === 3 && match[0] === "%") return match;
    if (match === "%") return "%25";
    try {
      return encodeURIComponent(match);
    } catch {
      return "%EF%BF%BD";
    }
  });
}

/** Parses `<dest>` or a bare destination with balanced parentheses. */
export function parseLinkDestination(cursor: Cursor): string | null {
  const braced = cursor.match(LINK_DESTINATION_BRACES_RE);
  if (braced !== null) {
    return normalizeUri(unescapeString(braced.slice(1, -1)));
  }
  if (cursor.getCharacter() === "<") return null;

  const raw = manuallyParseLinkDestination(cursor);
  return raw === null ? null : normalizeUri(unescapeString(raw));
}

function manuallyParseLinkDestination(cursor: Cursor): string | null {
  const state = cursor.saveState();
  const start = cursor.position;
  let openParens = 0;
  let c = cursor.getCharacter();
  while (c !== null) {
    if (c === "\\" && isEscapable(cursor.peek())) {
      cursor.advanceBy(2);
    } else if (c === "(") {
      cursor.advance();
      openParens++;
    } else if (c === ")") {
      if (openParens < 1) break;
      cursor.advance();
      openParens--;
    } else if (c === " " || c === "\t" || c === "\n" || c.charCodeAt(0) < 0x20 || c === "\x7f") {
      break;
    } else {
      cursor.advance();
    }
    c = cursor.getCharacter();
  }

  if (openParens !== 0 || (cursor.position === start && c !== ")")) {
    cursor.restoreState(state);
    return null;
  }
  return cursor.getSubstring(start, cursor.position - start);
}

export function parseLinkTitle(cursor: Cursor): string | null {
  const title = cursor.match(LINK_TITLE_RE);
  return title === null ? null : unescapeString(title.slice(1, -1));
}

/** Length of the `[label]` at the cursor (brackets included), or 0 when there is none. */
export function parseLinkLabel(cursor: Cursor): number {
  const label = cursor.match(LINK_LABEL_RE);
  return label === null ? 0 : label.length;
}

/**
 * Flanking classification of a delimiter run given the characters on either
 * side (a newline stands in for the start or end of the text).
 */
export function isLeftFlankingDelimiterRun(previousChar: string, nextChar: string): boolean {
  if (isUnicodeWhitespace(nextChar)) return false;
  return !isPunctuation(nextChar) || isUnicodeWhitespace(previousChar) || isPunctuation(previousChar);
}

export function isRightFlankingDelimiterRun(previousChar: string, nextChar: string): boolean {
  if (isUnicodeWhitespace(previousChar)) return false;
  return !isPunctuation(previousChar) || isUnicodeWhitespace(nextChar) || isPunctuation(nextChar);
}

export function determineCanOpenOrClose(
  previousChar: string,
  nextChar: string,
  runChar: string,
): { canOpen: boolean; canClose: boolean } {
  const leftFlanking = isLeftFlankingDelimiterRun(previousChar, nextChar);
  const rightFlanking = isRightFlankingDelimiterRun(previousChar, nextChar);
  if (runChar === "_") {
    return {
      canOpen: leftFlanking && (!rightFlanking || isPunctuation(previousChar)),
      canClose: rightFlanking && (!leftFlanking || isPunctuation(nextChar)),
    };
  }
  return { canOpen: leftFlanking, canClose: rightFlanking };
}
