import type { InlineParser } from "@/plugin-system"
import type { InlineParserContext } from "./context"

const TAG_NAME = "[A-Za-z][A-Za-z0-9-]*"
const ATTRIBUTE_NAME = "[a-zA-Z_:][a-zA-Z0-9:._-]*"
const ATTRIBUTE_VALUE = `(?:[^"'=<>\`\\x00-\\x20]+|'[^']*'|"[^"]*")`
const ATTRIBUTE = `(?:\\s+${ATTRIBUTE_NAME}(?:\\s*=\\s*${ATTRIBUTE_VALUE})?)`
const OPEN_TAG = `<${TAG_NAME}${ATTRIBUTE}*\\s*/?>`
const CLOSE_TAG = `</${TAG_NAME}\\s*>`
const COMMENT = "<!-->|<!--->|<!--[\\s\\S]*?-->"
const PROCESSING_INSTRUCTION = "<\\?[\\s\\S]*?\\?>"
const DECLARATION = "<![A-Za-z]+[^>]*>"
const CDATA = "<!\\[CDATA\\[[\\s\\S]*?\\]\\]>"

export const RAW_INLINE_HTML = new RegExp(
  `(?:${OPEN_TAG}|${CLOSE_TAG}|${COMMENT}|${PROCESSING_INSTRUCTION}|${DECLARATION}|${CDATA})`,
)

/** Returns the raw HTML tag starting at `start`, or null. */
export function matchRawInlineHtml(str: string, start: number): string | null {
  const sticky = new RegExp(RAW_INLINE_HTML.source, "y")
  sticky.lastIndex = start
  const match = sticky.exec(str)
  return match ? match[0] : null
}

/** Inline raw HTML: tags, comments, processing instructions, declarations and CDATA. */
export class HtmlInlineParser implements InlineParser {
  readonly characters = ["<"]

  parse(context: InlineParserContext): boolean {
    const html = context.cursor.match(RAW_INLINE_HTML)
    if (html === null) return false
    context.append(context.tree.create({ kind: "raw_html", literal: html }))
    return true
  }
}
