import type { DocumentNode, ParagraphNode } from "./ast";
import { Cursor } from "./cursor";
import { isDebugMode, logDebug } from "./debug";
import { normalizeRefLabel, parseLinkDestination, parseLinkLabel, parseLinkTitle } from "./parser-helpers";
import { ReferenceMap } from "./reference-map";

const BLANK_LINE_RE = /^[ \t]*$/;
const SPACE_AT_END_OF_LINE_RE = /[ \t]*(?:\n|$)/;

/**
 * Minimal block stage: blank lines separate paragraphs, and link reference
 * definitions at the start of a paragraph are collected into the document's
 * reference map. Inline content is left raw for the inline phase.
 */
export function blockPhase(markdown: string): DocumentNode {
  const lines = markdown.replace(/\r\n?/g, "\n").split("\n");

  const doc: DocumentNode = {
    type: "document",
    children: [],
    refDefinitions: new ReferenceMap(),
  };

  let pending: string[] = [];
  const flush = () => {
    if (pending.length > 0) {
      closeParagraph(doc, pending);
      pending = [];
    }
  };

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (isDebugMode()) {
      logDebug(`Line ${i}: "${line}"`);
    }
    if (BLANK_LINE_RE.test(line)) {
      flush();
    } else {
      pending.push(line.replace(/^[ \t]+/, ""));
    }
  }
  flush();

  return doc;
}

function closeParagraph(doc: DocumentNode, lines: string[]) {
  const content = lines.join("\n").replace(/[ \t]+$/, "");
  const cursor = new Cursor(content);

  while (cursor.getCharacter() === "[") {
    const consumed = parseReferenceDefinition(cursor, doc.refDefinitions);
    if (consumed === 0) break;
  }

  const raw = cursor.getRemainder();
  if (raw === "") {
    if (isDebugMode()) logDebug("Paragraph held only reference definitions");
    return;
  }

  const paragraph: ParagraphNode = { type: "paragraph", children: [], _raw: raw };
  doc.children.push(paragraph);
}

/**
 * Parses one `[label]: destination "title"` definition at the cursor and
 * records it (the first definition of a label wins). Returns the number of
 * characters consumed, or 0 with the cursor untouched.
 */
export function parseReferenceDefinition(cursor: Cursor, referenceMap: ReferenceMap): number {
  const start = cursor.saveState();
  const fail = () => {
    cursor.restoreState(start);
    return 0;
  };

  const labelLength = parseLinkLabel(cursor);
  if (labelLength === 0) return fail();
  const rawLabel = cursor.getSubstring(start.position + 1, labelLength - 2);

  if (cursor.getCharacter() !== ":") return fail();
  cursor.advance();
  cursor.advanceToNextNonSpaceOrNewline();

  const destination = parseLinkDestination(cursor);
  if (destination === null) return fail();

  const beforeTitle = cursor.saveState();
  cursor.advanceToNextNonSpaceOrNewline();
  let title: string | null = null;
  if (cursor.position !== beforeTitle.position) {
    title = parseLinkTitle(cursor);
  }
  if (title === null) {
    title = "";
    cursor.restoreState(beforeTitle);
  }

  let atLineEnd = true;
  if (cursor.match(SPACE_AT_END_OF_LINE_RE) === null) {
    if (title === "") {
      atLineEnd = false;
    } else {
      // the title did not end its line, so the definition ends before it
      title = "";
      cursor.restoreState(beforeTitle);
      atLineEnd = cursor.match(SPACE_AT_END_OF_LINE_RE) !== null;
    }
  }
  if (!atLineEnd) return fail();

  if (normalizeRefLabel(rawLabel) === "") return fail();

  const added = referenceMap.add(rawLabel, destination, title);
  if (isDebugMode()) {
    logDebug(added ? `Reference definition [${rawLabel}] -> ${destination}` : `Duplicate reference [${rawLabel}] ignored`);
  }
  return cursor.position - start.position;
}
