import { describe, expect, test } from "vitest";
import { createCommonMarkEnvironment } from "@/commonmark-core";
import { Delimiter } from "@/delimiter/delimiter";
import { CloseBracketParser } from "@/inline-parser/close-bracket-parser";
import { InlineParserContext } from "@/inline-parser/context";
import { OpenBracketParser } from "@/inline-parser/open-bracket-parser";
import { parseInlineString } from "@/inline-parser";
import { convertToHtml } from "@/parse-markdown";
import { ReferenceMap } from "@/reference-map";

function withReferences(...definitions: [string, string, string?][]): ReferenceMap {
    const map = new ReferenceMap();
    for (const [label, url, title] of definitions) map.add(label, url, title);
    return map;
}

/** Runs `[` then consumes the label text, leaving the cursor on `]`. */
function contextAtCloseBracket(text: string, referenceMap = new ReferenceMap()) {
    const context = new InlineParserContext(text, referenceMap, createCommonMarkEnvironment());
    new OpenBracketParser().parse(context);
    const close = text.indexOf("]");
    context.appendText(text.slice(1, close));
    context.cursor.advanceBy(close - 1);
    return context;
}

describe("CloseBracketParser", () => {
    test("declines without an opener and leaves the cursor alone", () => {
        const context = new InlineParserContext("]", new ReferenceMap(), createCommonMarkEnvironment());
        expect(new CloseBracketParser().parse(context)).toBe(false);
        expect(context.cursor.position).toBe(0);
    });

    test("a failed resolution restores the cursor and drops the opener", () => {
        const context = contextAtCloseBracket("[foo](bar");
        expect(context.cursor.position).toBe(4);

        expect(new CloseBracketParser().parse(context)).toBe(false);
        expect(context.cursor.position).toBe(4);
        expect(context.delimiters.size()).toBe(0);
    });

    test("an inactive opener is removed and the bracket declined", () => {
        const context = contextAtCloseBracket("[foo](/u)");
        context.delimiters.getTop()?.deactivate();

        expect(new CloseBracketParser().parse(context)).toBe(false);
        expect(context.cursor.position).toBe(4);
        expect(context.delimiters.size()).toBe(0);
    });

    test("an inline link consumes the destination and replaces the opener", () => {
        const context = contextAtCloseBracket("[foo](/u)");

        expect(new CloseBracketParser().parse(context)).toBe(true);
        expect(context.cursor.position).toBe(9);
        expect(context.tree.materialize(context.container)).toEqual([
            { type: "link", url: "/u", title: "", children: [{ type: "text", value: "foo" }] },
        ]);
    });

    test("a shortcut reference rewinds to just after the bracket", () => {
        const context = contextAtCloseBracket("[foo] tail", withReferences(["foo", "/url"]));

        expect(new CloseBracketParser().parse(context)).toBe(true);
        expect(context.cursor.position).toBe(5);
    });

    test("an unknown opener pushed by another parser is ignored", () => {
        const context = new InlineParserContext("x]", new ReferenceMap(), createCommonMarkEnvironment());
        const node = context.appendText("x");
        context.delimiters.push(new Delimiter({ char: "*", length: 1, node, canOpen: true, canClose: false }));
        context.cursor.advance();
        expect(new CloseBracketParser().parse(context)).toBe(false);
        expect(context.delimiters.size()).toBe(1);
    });
});

describe("link resolution", () => {
    const environment = () => createCommonMarkEnvironment();

    test("inline link with title", () => {
        expect(parseInlineString('[link](/uri "title")', new ReferenceMap(), environment())).toEqual([
            { type: "link", url: "/uri", title: "title", children: [{ type: "text", value: "link" }] },
        ]);
    });

    test("without whitespace a quoted title is part of the destination", () => {
        expect(parseInlineString('[link](/uri"title")', new ReferenceMap(), environment())).toEqual([
            { type: "link", url: "/uri%22title%22", title: "", children: [{ type: "text", value: "link" }] },
        ]);
    });

    test("inline form wins over a reference with the same label", () => {
        const refs = withReferences(["foo", "/ref"]);
        expect(parseInlineString("[foo](/inline)", refs, environment())).toEqual([
            { type: "link", url: "/inline", title: "", children: [{ type: "text", value: "foo" }] },
        ]);
    });

    test("shortcut reference is used once the inline form fails", () => {
        const refs = withReferences(["foo", "/url"]);
        expect(parseInlineString("[foo](not a link", refs, environment())).toEqual([
            { type: "link", url: "/url", title: "", children: [{ type: "text", value: "foo" }] },
            { type: "text", value: "(not a link" },
        ]);
    });

    test("full and collapsed references", () => {
        const refs = withReferences(["bar", "/b", "B"], ["Foo", "/f"]);
        expect(parseInlineString("[foo][bar]", refs, environment())).toEqual([
            { type: "link", url: "/b", title: "B", children: [{ type: "text", value: "foo" }] },
        ]);
        expect(parseInlineString("[FOO][]", refs, environment())).toEqual([
            { type: "link", url: "/f", title: "", children: [{ type: "text", value: "FOO" }] },
        ]);
    });

    test("an unknown reference stays literal", () => {
        expect(parseInlineString("[bar]", new ReferenceMap(), environment())).toEqual([
            { type: "text", value: "[bar]" },
        ]);
    });

    test("no links inside links", () => {
        expect(convertToHtml("[a [b](/inner) c](/outer)")).toBe('<p>[a <a href="/inner">b</a> c](/outer)</p>\n');
    });

    test("emphasis inside the label is resolved within the link", () => {
        expect(convertToHtml("[*foo* bar](/u)")).toBe('<p><a href="/u"><em>foo</em> bar</a></p>\n');
    });

    test("image alt text flattens nested emphasis", () => {
        expect(parseInlineString("![foo *bar*](/url)", new ReferenceMap(), environment())).toEqual([
            { type: "image", url: "/url", title: "", alt: "foo bar" },
        ]);
    });

    test("image alt text flattens nested links and keeps unmatched brackets", () => {
        expect(convertToHtml("![[[foo](uri1)](uri2)](uri3)")).toBe('<p><img src="uri3" alt="[foo](uri2)" /></p>\n');
    });

    test("image alt text keeps delimiter runs that never paired", () => {
        expect(convertToHtml("![foo_bar](/u)")).toBe('<p><img src="/u" alt="foo_bar" /></p>\n');
        expect(convertToHtml("![a * b](/u)")).toBe('<p><img src="/u" alt="a * b" /></p>\n');
        expect(convertToHtml("![a*b](/u)")).toBe('<p><img src="/u" alt="a*b" /></p>\n');
        expect(convertToHtml("![*a* b*](/u)")).toBe('<p><img src="/u" alt="a b*" /></p>\n');
    });

    test("a link may contain an image", () => {
        expect(convertToHtml("[![moon](moon.jpg)](/uri)")).toBe(
            '<p><a href="/uri"><img src="moon.jpg" alt="moon" /></a></p>\n',
        );
    });

    test("destinations are unescaped and percent-encoded", () => {
        expect(parseInlineString("[a](<my url> 'T')", new ReferenceMap(), environment())).toEqual([
            { type: "link", url: "my%20url", title: "T", children: [{ type: "text", value: "a" }] },
        ]);
    });
});
