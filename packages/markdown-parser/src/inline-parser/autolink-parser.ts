import { normalizeUri } from "@/parser-helpers"
import type { InlineParser } from "@/plugin-system"
import type { InlineParserContext } from "./context"

const EMAIL_AUTOLINK =
  /<([a-zA-Z0-9.!#$%&'*+/=?^_`{|}~-]+@[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?(?:\.[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)*)>/
const URI_AUTOLINK = /<([A-Za-z][A-Za-z0-9.+-]{1,31}:[^<>\x00-\x20]*)>/

/** `<scheme:...>` and `<user@host>` autolinks. */
export class AutolinkParser implements InlineParser {
  readonly characters = ["<"]

  parse(context: InlineParserContext): boolean {
    const { cursor } = context

    const email = cursor.match(EMAIL_AUTOLINK)
    if (email !== null) {
      const address = email.slice(1, -1)
      this.appendLink(context, `mailto:${normalizeUri(address)}`, address)
      return true
    }

    const uri = cursor.match(URI_AUTOLINK)
    if (uri !== null) {
      const destination = uri.slice(1, -1)
      this.appendLink(context, normalizeUri(destination), destination)
      return true
    }

    return false
  }

  private appendLink(context: InlineParserContext, url: string, label: string) {
    const link = context.tree.create({ kind: "link", url, title: "" })
    context.tree.appendChild(link, context.tree.createText(label))
    context.append(link)
  }
}
