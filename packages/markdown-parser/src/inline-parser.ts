import type { DocumentNode, InlineNode } from "./ast";
import { isDebugMode, logDebug } from "./debug";
import { Delimiter } from "./delimiter/delimiter";
import type { DelimiterProcessor } from "./delimiter/types";
import { InlineParserContext } from "./inline-parser/context";
import type { NodeId } from "./node-tree";
import { determineCanOpenOrClose } from "./parser-helpers";
import type { Environment } from "./plugin-system";
import type { ReferenceLookup } from "./reference-map";

/** Parses the raw text of every paragraph in place. */
export function walkBlockTreeAndParseInlines(root: DocumentNode, environment: Environment) {
  for (const paragraph of root.children) {
    if (paragraph._raw === undefined) continue;
    if (isDebugMode()) {
      logDebug(`Inline parsing for node type: ${paragraph.type}`);
    }
    paragraph.children = parseInlineString(paragraph._raw, root.refDefinitions, environment);
    delete paragraph._raw;
  }
}

export function parseInlineString(
  input: string,
  referenceMap: ReferenceLookup,
  environment: Environment,
): InlineNode[] {
  const context = new InlineParserContext(input, referenceMap, environment);
  const root = parseInlines(context);
  return context.tree.materialize(root);
}

/**
 * Consumes the whole span: registered parsers get first refusal on each
 * special character, then delimiter runs, then plain text. Returns the
 * container holding the finished inline tree.
 */
export function parseInlines(context: InlineParserContext): NodeId {
  const { cursor, environment, tree } = context;
  const specialCharacters = environment.getSpecialCharacters();

  let character = cursor.getCharacter();
  while (character !== null) {
    if (!parseCharacter(character, context)) {
      addPlainText(specialCharacters, context);
    }
    character = cursor.getCharacter();
  }

  context.delimiters.processDelimiters(null, environment);

  for (const finalizer of environment.getFinalizers()) {
    finalizer(tree, context.container);
  }

  mergeTextRecursively(context, context.container);
  return context.container;
}

function parseCharacter(character: string, context: InlineParserContext): boolean {
  for (const parser of context.environment.getInlineParsersForCharacter(character)) {
    if (parser.parse(context)) return true;
  }

  const processor = context.environment.getDelimiterProcessor(character);
  return processor !== undefined && parseDelimiters(processor, character, context);
}

function parseDelimiters(processor: DelimiterProcessor, character: string, context: InlineParserContext): boolean {
  const { cursor } = context;
  const before = cursor.peek(-1) ?? "\n";

  let count = 0;
  while (cursor.peek(count) === character) count++;
  if (count < processor.minLength) return false;

  cursor.advanceBy(count);
  const after = cursor.getCharacter() ?? "\n";
  const { canOpen, canClose } = determineCanOpenOrClose(before, after, character);

  const node = context.appendText(character.repeat(count), { delim: true });
  if (canOpen || canClose) {
    context.delimiters.push(new Delimiter({ char: character, length: count, node, canOpen, canClose }));
  }
  return true;
}

/** Takes the current character and everything up to the next special one as text. */
function addPlainText(specialCharacters: ReadonlySet<string>, context: InlineParserContext) {
  const { cursor } = context;
  const start = cursor.position;
  cursor.advance();

  let next = cursor.getCharacter();
  while (next !== null && !specialCharacters.has(next)) {
    cursor.advance();
    next = cursor.getCharacter();
  }
  context.appendText(cursor.getSubstring(start, cursor.position - start));
}

function mergeTextRecursively(context: InlineParserContext, node: NodeId) {
  const { tree } = context;
  tree.mergeChildNodes(node);
  for (const child of tree.children(node)) {
    if (tree.firstChild(child) !== null) mergeTextRecursively(context, child);
  }
}
