import { describe, expect, test } from "vitest";
import { Cursor } from "@/cursor";
import {
    decodeEntity,
    determineCanOpenOrClose,
    isLeftFlankingDelimiterRun,
    isRightFlankingDelimiterRun,
    normalizeRefLabel,
    normalizeUri,
    parseLinkDestination,
    parseLinkLabel,
    parseLinkTitle,
    unescapeString,
} from "@/parser-helpers";

describe("normalizeRefLabel", () => {
    test("trims, collapses whitespace and case-folds", () => {
        expect(normalizeRefLabel("  Foo\n  bar ")).toBe("FOO BAR");
    });
});

describe("entities and escapes", () => {
    test("decodeEntity handles named and numeric references", () => {
        expect(decodeEntity("&amp;")).toBe("&");
        expect(decodeEntity("&#35;")).toBe("#");
        expect(decodeEntity("&#X22;")).toBe('"');
        expect(decodeEntity("&#0;")).toBe("\uFFFD");
        expect(decodeEntity("&nosuch;")).toBeNull();
    });

    test("unescapeString removes escapes then decodes entities", () => {
        expect(unescapeString("\\*a\\* &amp; \\q")).toBe("*a* & \\q");
    });
});

describe("normalizeUri", () => {
    test("percent-encodes unsafe characters and keeps existing escapes", () => {
        expect(normalizeUri("/a b%20c%")).toBe("/a%20b%20c%25");
        expect(normalizeUri("/ä")).toBe("/%C3%A4");
        expect(normalizeUri("https://x.test/?q=1&r=[2]")).toBe("https://x.test/?q=1&r=[2]");
    });
});

describe("link helpers", () => {
    test("parses a pointy-bracket destination", () => {
        const cursor = new Cursor("<a b> rest");
        expect(parseLinkDestination(cursor)).toBe("a%20b");
        expect(cursor.position).toBe(5);
    });

    test("balances parentheses in a bare destination", () => {
        const cursor = new Cursor("(foo)bar) x");
        expect(parseLinkDestination(cursor)).toBe("(foo)bar");
        expect(cursor.position).toBe(8);
    });

    test("rejects unbalanced parentheses and restores the cursor", () => {
        const cursor = new Cursor("a(b");
        expect(parseLinkDestination(cursor)).toBeNull();
        expect(cursor.position).toBe(0);
    });

    test("an empty destination is only allowed before a closing parenthesis", () => {
        expect(parseLinkDestination(new Cursor(")"))).toBe("");
        expect(parseLinkDestination(new Cursor(" x"))).toBeNull();
    });

    test("parses titles in all three delimiters", () => {
        expect(parseLinkTitle(new Cursor('"a \\" b"'))).toBe('a " b');
        expect(parseLinkTitle(new Cursor("'single'"))).toBe("single");
        expect(parseLinkTitle(new Cursor("(paren)"))).toBe("paren");
        expect(parseLinkTitle(new Cursor('"open'))).toBeNull();
    });

    test("parseLinkLabel returns the bracketed length", () => {
        expect(parseLinkLabel(new Cursor("[foo] x"))).toBe(5);
        expect(parseLinkLabel(new Cursor("[a\\]b]"))).toBe(6);
        expect(parseLinkLabel(new Cursor("[a[b]"))).toBe(0);
    });
});

describe("flanking", () => {
    test("left-flanking", () => {
        expect(isLeftFlankingDelimiterRun("\n", "w")).toBe(true);
        expect(isLeftFlankingDelimiterRun("a", " ")).toBe(false);
        expect(isLeftFlankingDelimiterRun("a", "!")).toBe(false);
        expect(isLeftFlankingDelimiterRun(" ", "!")).toBe(true);
    });

    test("right-flanking", () => {
        expect(isRightFlankingDelimiterRun(" ", "a")).toBe(false);
        expect(isRightFlankingDelimiterRun("a", "\n")).toBe(true);
        expect(isRightFlankingDelimiterRun("!", "a")).toBe(false);
    });

    test("underscores need a word boundary", () => {
        expect(determineCanOpenOrClose("a", "b", "_")).toEqual({ canOpen: false, canClose: false });
        expect(determineCanOpenOrClose("a", "b", "*")).toEqual({ canOpen: true, canClose: true });
        expect(determineCanOpenOrClose(" ", "a", "*")).toEqual({ canOpen: true, canClose: false });
        expect(determineCanOpenOrClose("(", "a", "_")).toEqual({ canOpen: true, canClose: false });
    });
});
