import { describe, expect, test } from "vitest";
import { NodeTree } from "@/node-tree";

function setup(...literals: string[]) {
    const tree = new NodeTree();
    const root = tree.create({ kind: "container" });
    const ids = literals.map((literal) => {
        const id = tree.createText(literal);
        tree.appendChild(root, id);
        return id;
    });
    return { tree, root, ids };
}

describe("NodeTree", () => {
    test("appendChild keeps insertion order", () => {
        const { tree, root, ids } = setup("a", "b", "c");
        expect(tree.children(root)).toEqual(ids);
        expect(tree.parent(ids[1])).toBe(root);
        expect(tree.firstChild(root)).toBe(ids[0]);
        expect(tree.lastChild(root)).toBe(ids[2]);
    });

    test("detach unlinks both directions", () => {
        const { tree, root, ids } = setup("a", "b", "c");
        tree.detach(ids[1]);
        expect(tree.children(root)).toEqual([ids[0], ids[2]]);
        expect(tree.previous(ids[2])).toBe(ids[0]);
        expect(tree.next(ids[0])).toBe(ids[2]);
        expect(tree.parent(ids[1])).toBeNull();
        expect(tree.next(ids[1])).toBeNull();
    });

    test("replaceWith puts the replacement in the same slot", () => {
        const { tree, root, ids } = setup("a", "b");
        const replacement = tree.createText("z");
        tree.replaceWith(ids[0], replacement);
        expect(tree.children(root)).toEqual([replacement, ids[1]]);
        expect(tree.parent(ids[0])).toBeNull();
    });

    test("insertBefore the first child updates the parent", () => {
        const { tree, root, ids } = setup("a", "b");
        const first = tree.createText("0");
        tree.insertBefore(ids[0], first);
        expect(tree.firstChild(root)).toBe(first);
        expect(tree.children(root)).toEqual([first, ids[0], ids[1]]);
    });

    test("wrapBetween moves the nodes strictly between into the wrapper", () => {
        const { tree, root, ids } = setup("x", "y", "z", "w");
        const emphasis = tree.create({ kind: "emphasis" });
        tree.wrapBetween(ids[0], ids[3], emphasis);
        expect(tree.children(root)).toEqual([ids[0], emphasis, ids[3]]);
        expect(tree.children(emphasis)).toEqual([ids[1], ids[2]]);
        expect(tree.parent(ids[1])).toBe(emphasis);
    });

    test("mergeChildNodes joins adjacent text but never a quote", () => {
        const tree = new NodeTree();
        const root = tree.create({ kind: "container" });
        tree.appendChild(root, tree.createText("a"));
        tree.appendChild(root, tree.createText("b", { delim: true }));
        tree.appendChild(root, tree.createText("'", { quote: true }));
        tree.appendChild(root, tree.createText("c"));
        tree.mergeChildNodes(root);
        expect(tree.children(root).map((id) => tree.literal(id))).toEqual(["ab", "'", "c"]);
    });

    test("materialize drops empty text and nests containers", () => {
        const tree = new NodeTree();
        const root = tree.create({ kind: "container" });
        const strong = tree.create({ kind: "strong" });
        tree.appendChild(strong, tree.createText("bold"));
        tree.appendChild(root, tree.createText(""));
        tree.appendChild(root, strong);
        expect(tree.materialize(root)).toEqual([{ type: "strong", children: [{ type: "text", value: "bold" }] }]);
        expect(tree.textContent(root)).toBe("bold");
    });

    test("setLiteral rejects nodes without literal content", () => {
        const tree = new NodeTree();
        const emphasis = tree.create({ kind: "emphasis" });
        expect(() => tree.setLiteral(emphasis, "x")).toThrow('has no literal content');
        expect(() => tree.data(42)).toThrow(RangeError);
    });
});
