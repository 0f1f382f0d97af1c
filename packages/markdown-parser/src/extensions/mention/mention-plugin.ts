import { mentionsConfigSchema, type MentionsConfig } from "@/config"
import type { ConfigurableMarkdownPlugin } from "@/plugin-system"
import { MentionParser } from "./mention-parser"

/** Registers one inline parser per configured mention type. */
export const mentionPlugin: ConfigurableMarkdownPlugin<MentionsConfig> = {
  name: "mention",
  configKey: "mentions",
  configSchema: mentionsConfigSchema,
  register(environment, mentions) {
    for (const [name, { prefix, pattern, generator }] of Object.entries(mentions)) {
      environment.addInlineParser(new MentionParser(name, prefix, pattern, generator), 20)
    }
  },
}
