import { beforeEach, describe, expect, test } from "vitest";
import { createCommonMarkEnvironment } from "@/commonmark-core";
import { getDebugSnapshots, isDebugMode, resetDebugState } from "@/debug";
import { strikethroughPlugin } from "@/extensions/strikethrough";
import { convertToHtml, MarkdownConverter, parseMarkdownToAst, parseMarkdownWithDebug } from "@/parse-markdown";

beforeEach(() => {
    resetDebugState();
});

describe("convertToHtml", () => {
    test("renders paragraphs", () => {
        expect(convertToHtml("*one*\n\n**two**")).toBe("<p><em>one</em></p>\n<p><strong>two</strong></p>\n");
    });

    test("empty input renders nothing", () => {
        expect(convertToHtml("")).toBe("");
        expect(convertToHtml("\n\n  \n")).toBe("");
    });

    test("resolves reference links from the same document", () => {
        expect(convertToHtml('[foo]: /url "title"\n\n[foo]')).toBe('<p><a href="/url" title="title">foo</a></p>\n');
    });

    test("uses the given environment", () => {
        const environment = createCommonMarkEnvironment().addPlugin(strikethroughPlugin);
        expect(convertToHtml("~~gone~~", { environment })).toBe("<p><del>gone</del></p>\n");
        expect(convertToHtml("~~gone~~")).toBe("<p>~~gone~~</p>\n");
    });

    test("takes no snapshots outside debug mode", () => {
        convertToHtml("*a*");
        expect(isDebugMode()).toBe(false);
        expect(getDebugSnapshots()).toEqual([]);
    });
});

describe("parseMarkdownToAst", () => {
    test("returns the parsed document", () => {
        const doc = parseMarkdownToAst("a `b`");
        expect(doc.children).toEqual([
            {
                type: "paragraph",
                children: [
                    { type: "text", value: "a " },
                    { type: "code_span", code: "b" },
                ],
            },
        ]);
    });

    test("records a final snapshot in debug mode", () => {
        parseMarkdownToAst("x", { debug: true });
        expect(getDebugSnapshots().map((s) => s.stage)).toEqual(["afterBlockPhase", "afterInlinePhase", "finalAST"]);
    });
});

describe("parseMarkdownWithDebug", () => {
    test("captures a snapshot per stage", () => {
        const { html, snapshots } = parseMarkdownWithDebug("*a*");

        expect(html).toBe("<p><em>a</em></p>\n");
        expect(snapshots.map((s) => s.stage)).toEqual(["afterBlockPhase", "afterInlinePhase", "afterRender"]);
        expect(snapshots.map((s) => s.changed)).toEqual([true, true, false]);

        expect(snapshots[0].logs).toEqual(['Line 0: "*a*"']);
        expect(snapshots[0].ast.children).toEqual([{ type: "paragraph", children: [], _raw: "*a*" }]);

        expect(snapshots[1].logs).toEqual([
            "Inline parsing for node type: paragraph",
            'Pairing "*" x1 (opener 1, closer 1)',
        ]);
        expect(snapshots[1].ast.children).toEqual([
            { type: "paragraph", children: [{ type: "emphasis", children: [{ type: "text", value: "a" }] }] },
        ]);

        expect(snapshots[2].logs).toEqual([]);
    });

    test("snapshots are copies", () => {
        const { snapshots } = parseMarkdownWithDebug("[a]: /b\n\n[a]");
        expect(snapshots[0].ast.refDefinitions).toEqual([{ label: "a", url: "/b", title: "" }]);
        expect(snapshots[0].ast.children[0].children).toEqual([]);
        expect(snapshots[1].ast.children[0].children).toHaveLength(1);
    });
});

describe("MarkdownConverter", () => {
    test("can be reused across documents", () => {
        const converter = new MarkdownConverter(createCommonMarkEnvironment().addPlugin(strikethroughPlugin));
        expect(converter.convertToHtml("~a~")).toBe("<p><del>a</del></p>\n");
        expect(converter.convertToHtml("_b_")).toBe("<p><em>b</em></p>\n");
    });
});
