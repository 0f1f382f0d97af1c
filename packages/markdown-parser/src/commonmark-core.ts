import { EmphasisDelimiterProcessor } from "./delimiter/emphasis-processor";
import { AutolinkParser } from "./inline-parser/autolink-parser";
import { BacktickParser } from "./inline-parser/backtick-parser";
import { BangParser } from "./inline-parser/bang-parser";
import { CloseBracketParser } from "./inline-parser/close-bracket-parser";
import { EntityParser } from "./inline-parser/entity-parser";
import { EscapableParser } from "./inline-parser/escapable-parser";
import { HtmlInlineParser } from "./inline-parser/html-inline-parser";
import { NewlineParser } from "./inline-parser/newline-parser";
import { OpenBracketParser } from "./inline-parser/open-bracket-parser";
import { Environment, type ConfigInput, type MarkdownPlugin } from "./plugin-system";

/** The inline syntax every CommonMark document understands. */
export const commonMarkCorePlugin: MarkdownPlugin = {
  name: "commonmark-core",
  register(environment) {
    environment
      .addInlineParser(new NewlineParser(), 200)
      .addInlineParser(new BacktickParser(), 150)
      .addInlineParser(new EscapableParser(), 80)
      .addInlineParser(new EntityParser(), 70)
      .addInlineParser(new AutolinkParser(), 50)
      .addInlineParser(new HtmlInlineParser(), 40)
      .addInlineParser(new CloseBracketParser(), 30)
      .addInlineParser(new OpenBracketParser(), 20)
      .addInlineParser(new BangParser(), 10)
      .addDelimiterProcessor(new EmphasisDelimiterProcessor("*"))
      .addDelimiterProcessor(new EmphasisDelimiterProcessor("_"));
  },
};

export function createCommonMarkEnvironment(config: ConfigInput = {}): Environment {
  return new Environment(config).addPlugin(commonMarkCorePlugin);
}
