import type { DocumentNode } from "./ast";
import { blockPhase } from "./block-parser";
import { createCommonMarkEnvironment } from "./commonmark-core";
import { captureSnapshot, getDebugSnapshots, resetDebugState, setDebugMode } from "./debug";
import { walkBlockTreeAndParseInlines } from "./inline-parser";
import type { Environment } from "./plugin-system";
import { renderAstToHtml } from "./renderer";
import { renderAstToXml } from "./xml-renderer";

export interface ParseOptions {
  debug?: boolean;
  /** Defaults to a fresh CommonMark environment. */
  environment?: Environment;
}

/** Parses and renders documents against one environment. */
export class MarkdownConverter {
  constructor(readonly environment: Environment = createCommonMarkEnvironment()) {}

  parse(markdown: string): DocumentNode {
    const doc = blockPhase(markdown);
    captureSnapshot("afterBlockPhase", doc);

    walkBlockTreeAndParseInlines(doc, this.environment);
    captureSnapshot("afterInlinePhase", doc);

    return doc;
  }

  convertToHtml(markdown: string): string {
    const doc = this.parse(markdown);
    const html = renderAstToHtml(doc);
    captureSnapshot("afterRender", doc);
    return html;
  }

  convertToXml(markdown: string): string {
    return renderAstToXml(this.parse(markdown));
  }
}

export function convertToHtml(markdown: string, options: ParseOptions = {}): string {
  resetDebugState();
  setDebugMode(!!options.debug);
  return new MarkdownConverter(options.environment).convertToHtml(markdown);
}

export function parseMarkdownToAst(markdown: string, options: ParseOptions = {}): DocumentNode {
  resetDebugState();
  setDebugMode(!!options.debug);
  const doc = new MarkdownConverter(options.environment).parse(markdown);
  captureSnapshot("finalAST", doc);
  return doc;
}

export function parseMarkdownWithDebug(
  markdown: string,
  environment?: Environment,
): {
  html: string;
  snapshots: ReturnType<typeof getDebugSnapshots>;
} {
  const html = convertToHtml(markdown, { debug: true, environment });
  const snapshots = getDebugSnapshots();
  return { html, snapshots };
}
