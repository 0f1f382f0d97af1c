export * from "./ast";
export { blockPhase, parseReferenceDefinition } from "./block-parser";
export { commonMarkCorePlugin, createCommonMarkEnvironment } from "./commonmark-core";
export {
  mentionsConfigSchema,
  smartPunctConfigSchema,
  type MarkdownParserConfig,
  type MentionsConfig,
  type SmartPunctConfig,
} from "./config";
export { Cursor, type CursorState } from "./cursor";
export { getDebugSnapshots, isDebugMode, logDebug, resetDebugState, setDebugMode, type DebugSnapshot } from "./debug";
export { Delimiter } from "./delimiter/delimiter";
export { DelimiterStack } from "./delimiter/delimiter-stack";
export { EmphasisDelimiterProcessor } from "./delimiter/emphasis-processor";
export type { DelimiterProcessor } from "./delimiter/types";
export { EnvironmentFrozenError, InvalidConfigurationError, MarkdownParserError } from "./errors";
export { Mention } from "./extensions/mention/mention";
export type { MentionGeneratorFunction, MentionGeneratorInterface } from "./extensions/mention/mention-generator";
export { mentionPlugin } from "./extensions/mention/mention-plugin";
export { smartPunctPlugin } from "./extensions/smart-punct/smart-punct-plugin";
export { strikethroughPlugin } from "./extensions/strikethrough";
export { parseInlineString, walkBlockTreeAndParseInlines } from "./inline-parser";
export { InlineParserContext } from "./inline-parser/context";
export { NodeTree, type NodeId } from "./node-tree";
export { convertToHtml, MarkdownConverter, parseMarkdownToAst, parseMarkdownWithDebug, type ParseOptions } from "./parse-markdown";
export {
  Environment,
  type ConfigurableMarkdownPlugin,
  type InlineFinalizer,
  type InlineParser,
  type MarkdownPlugin,
} from "./plugin-system";
export { ReferenceMap, type ReferenceLookup } from "./reference-map";
export { renderAstToHtml } from "./renderer";
export { renderAstToXml } from "./xml-renderer";
