import { smartPunctConfigSchema, type SmartPunctConfig } from "@/config"
import type { NodeId, NodeTree } from "@/node-tree"
import type { ConfigurableMarkdownPlugin, InlineFinalizer } from "@/plugin-system"
import { PunctuationParser } from "./punctuation-parser"
import { DOUBLE_QUOTE, QuoteParser, SINGLE_QUOTE } from "./quote-parser"
import { QuoteProcessor } from "./quote-processor"

/** Unpaired straight quotes: `"` opens, `'` is an apostrophe. */
export function replaceUnpairedQuotes(config: SmartPunctConfig): InlineFinalizer {
  const visit = (tree: NodeTree, parent: NodeId) => {
    for (const node of tree.children(parent)) {
      const data = tree.data(node)
      if (data.kind === "text" && data.quote) {
        if (data.literal === DOUBLE_QUOTE) data.literal = config.double_quote_opener
        else if (data.literal === SINGLE_QUOTE) data.literal = config.single_quote_closer
        data.quote = false
        data.delim = false
      } else if (tree.firstChild(node) !== null) {
        visit(tree, node)
      }
    }
  }
  return visit
}

export const smartPunctPlugin: ConfigurableMarkdownPlugin<SmartPunctConfig> = {
  name: "smartpunct",
  configKey: "smartpunct",
  configSchema: smartPunctConfigSchema,
  register(environment, config) {
    environment
      .addInlineParser(new QuoteParser(), 10)
      .addInlineParser(new PunctuationParser(), 10)
      .addDelimiterProcessor(new QuoteProcessor(DOUBLE_QUOTE, config.double_quote_opener, config.double_quote_closer))
      .addDelimiterProcessor(new QuoteProcessor(SINGLE_QUOTE, config.single_quote_opener, config.single_quote_closer))
      .addInlineFinalizer(replaceUnpairedQuotes(config))
  },
}
