import { describe, expect, test } from "vitest";
import { createCommonMarkEnvironment } from "@/commonmark-core";
import { InvalidConfigurationError } from "@/errors";
import { dashesFor } from "@/extensions/smart-punct/punctuation-parser";
import { smartPunctPlugin } from "@/extensions/smart-punct/smart-punct-plugin";
import { MarkdownConverter } from "@/parse-markdown";
import type { ConfigInput } from "@/plugin-system";

const html = (markdown: string, config: ConfigInput = {}) =>
    new MarkdownConverter(createCommonMarkEnvironment(config).addPlugin(smartPunctPlugin)).convertToHtml(markdown);

describe("smart punctuation extension", () => {
    test("paired double quotes curl", () => {
        expect(html('"Hello"')).toBe("<p>“Hello”</p>\n");
    });

    test("paired single quotes curl", () => {
        expect(html("'Hello'")).toBe("<p>‘Hello’</p>\n");
    });

    test("an apostrophe becomes a closing single quote", () => {
        expect(html("it's")).toBe("<p>it’s</p>\n");
    });

    test("an unpaired double quote opens", () => {
        expect(html('say "hi')).toBe("<p>say “hi</p>\n");
    });

    test("ellipses", () => {
        expect(html("Wait...")).toBe("<p>Wait…</p>\n");
        expect(html("Wait. . .")).toBe("<p>Wait…</p>\n");
        expect(html("End.")).toBe("<p>End.</p>\n");
    });

    test("hyphen runs become dashes", () => {
        expect(html("a-b")).toBe("<p>a-b</p>\n");
        expect(html("a--b")).toBe("<p>a–b</p>\n");
        expect(html("a---b")).toBe("<p>a—b</p>\n");
    });

    test("dash counts follow the em-first rule", () => {
        expect(dashesFor(4)).toBe("––");
        expect(dashesFor(5)).toBe("—–");
        expect(dashesFor(6)).toBe("——");
        expect(dashesFor(7)).toBe("—––");
    });

    test("quote characters are configurable", () => {
        expect(html('"x"', { smartpunct: { double_quote_opener: "«", double_quote_closer: "»" } })).toBe("<p>«x»</p>\n");
    });

    test("quote characters must be single characters", () => {
        expect(() => html("x", { smartpunct: { double_quote_opener: "<<" } })).toThrow(InvalidConfigurationError);
    });

    test("quotes inside code spans are untouched", () => {
        expect(html('`"a"`')).toBe("<p><code>&quot;a&quot;</code></p>\n");
    });
});
