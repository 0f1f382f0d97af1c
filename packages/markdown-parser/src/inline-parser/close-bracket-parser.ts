import type { Cursor } from "@/cursor"
import { isDebugMode, logDebug } from "@/debug"
import type { Delimiter } from "@/delimiter/delimiter"
import { parseLinkDestination, parseLinkLabel, parseLinkTitle } from "@/parser-helpers"
import type { InlineParser } from "@/plugin-system"
import type { ReferenceLookup } from "@/reference-map"
import type { InlineParserContext } from "./context"

interface ResolvedLink {
  url: string
  title: string
}

/**
 * Handles `]`: finds the nearest `[` or `![` opener and, when an inline
 * destination or a known reference follows, turns the bracketed span into a
 * link or image.
 */
export class CloseBracketParser implements InlineParser {
  readonly characters = ["]"]

  parse(context: InlineParserContext): boolean {
    const { cursor, delimiters, tree } = context

    const opener = delimiters.searchByCharacter(["[", "!"])
    if (opener === null) return false

    if (!opener.active) {
      delimiters.removeDelimiter(opener)
      return false
    }

    const startPos = cursor.position
    const previousState = cursor.saveState()
    cursor.advance()

    const link = tryParseLink(cursor, context.referenceMap, opener, startPos)
    if (link === null) {
      delimiters.removeDelimiter(opener)
      cursor.restoreState(previousState)
      if (isDebugMode()) logDebug(`No link at offset ${startPos}; "]" stays literal`)
      return false
    }

    const isImage = opener.char === "!"
    const inline = tree.create(
      isImage
        ? { kind: "image", url: link.url, title: link.title, label: "" }
        : { kind: "link", url: link.url, title: link.title },
    )
    tree.replaceWith(opener.node, inline)

    let label = tree.next(inline)
    while (label !== null) {
      const data = tree.data(label)
      if (data.kind === "mention") {
        // No links inside links: an autolinked mention falls back to its source text.
        const source = tree.createText(`${data.prefix}${data.identifier}`)
        tree.replaceWith(label, source)
        label = source
      }
      const following = tree.next(label)
      tree.appendChild(inline, label)
      label = following
    }

    const stackBottom = opener.previous
    delimiters.processDelimiters(stackBottom, context.environment)
    delimiters.removeAll(stackBottom)

    if (isImage) {
      // paired runs are gone by now; what remains of the label is the alt text
      tree.setData(inline, { kind: "image", url: link.url, title: link.title, label: tree.textContent(inline) })
      for (const child of tree.children(inline)) tree.detach(child)
    } else {
      tree.mergeChildNodes(inline)
      delimiters.removeEarlierMatches("[")
    }

    if (isDebugMode()) logDebug(`Resolved ${isImage ? "image" : "link"} to "${link.url}"`)
    return true
  }
}

function tryParseLink(
  cursor: Cursor,
  referenceMap: ReferenceLookup,
  opener: Delimiter,
  startPos: number,
): ResolvedLink | null {
  const inline = tryParseInlineLinkAndTitle(cursor)
  if (inline) return inline

  const reference = tryParseReference(cursor, referenceMap, opener, startPos)
  return reference ? { url: reference.url, title: reference.title } : null
}

function tryParseInlineLinkAndTitle(cursor: Cursor): ResolvedLink | null {
  if (cursor.getCharacter() !== "(") return null

  const previousState = cursor.saveState()
  cursor.advance()
  cursor.advanceToNextNonSpaceOrNewline()

  const url = parseLinkDestination(cursor)
  if (url === null) {
    cursor.restoreState(previousState)
    return null
  }

  cursor.advanceToNextNonSpaceOrNewline()

  let title = ""
  const before = cursor.peek(-1)
  // a title must be separated from the destination by whitespace
  if (before !== null && /\s/.test(before)) {
    title = parseLinkTitle(cursor) ?? ""
  }

  cursor.advanceToNextNonSpaceOrNewline()

  if (cursor.getCharacter() !== ")") {
    cursor.restoreState(previousState)
    return null
  }
  cursor.advance()

  return { url, title }
}

function tryParseReference(
  cursor: Cursor,
  referenceMap: ReferenceLookup,
  opener: Delimiter,
  startPos: number,
) {
  if (opener.index === null) return null

  const savedState = cursor.saveState()
  const beforeLabel = cursor.position
  const labelLength = parseLinkLabel(cursor)

  let start: number
  let length: number
  if (labelLength === 0 || labelLength === 2) {
    // shortcut `[foo]` or collapsed `[foo][]`: the bracketed text is the label
    start = opener.index
    length = startPos - opener.index
  } else {
    start = beforeLabel + 1
    length = labelLength - 2
  }

  const referenceLabel = cursor.getSubstring(start, length)

  if (labelLength === 0) {
    cursor.restoreState(savedState)
  }

  return referenceMap.getReference(referenceLabel)
}
