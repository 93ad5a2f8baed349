import * as assert from "assert";

import { Node, NodeId } from "../src/compiler/node";
import { binarySearch, findForEachAtOffset, flattenTree, getTerminals } from "../src/compiler/utils";
import { inMethod, loadCursorTestFromSource, parseAndBind } from "./TestLoader";

function find(ns: number[], target: number) {
    return binarySearch(ns, (v) => v < target ? -1 : v === target ? 0 : 1);
}

function forEachAtCursor(body: string) {
    const {index, sourceText} = loadCursorTestFromSource(inMethod(body));
    const sourceFile = parseAndBind(sourceText);
    const nodeMap = new Map<NodeId, Node>();
    for (const terminal of getTerminals(sourceFile)) {
        nodeMap.set(terminal.nodeId, terminal);
    }
    const forEach = findForEachAtOffset(flattenTree(sourceFile), nodeMap, index);
    return forEach?.identifier?.token.text;
}

const nestedLoops = (header: string, innerHeader: string, body: string) => [
    header,
    "{",
    "    " + innerHeader,
    "        " + body,
    "}",
].join("\n");

describe("Binary search works", () => {
    it("Should find the thing", () => {
        const things = [1,3,5];
        assert.strictEqual(find(things, 1), 0);
        assert.strictEqual(find(things, 3), 1);
        assert.strictEqual(find(things, 5), 2);
        assert.strictEqual(find(things, 0), ~0);
        assert.strictEqual(find(things, 4), ~2);
        assert.strictEqual(find(things, 7), ~3);
    });
    it("Should find the thing in an even length list", () => {
        const things = [1,3,5,7];
        assert.strictEqual(find(things, 1), 0);
        assert.strictEqual(find(things, 3), 1);
        assert.strictEqual(find(things, 5), 2);
        assert.strictEqual(find(things, 7), 3);
        assert.strictEqual(find(things, 0), ~0);
        assert.strictEqual(find(things, 9), ~4);
    });
    it("Should not find the thing in an empty list", () => {
        const things : number[] = [];
        assert.strictEqual(find(things, 1), ~0);
        assert.strictEqual(find(things, 7), ~0);
    });
});

describe("finding the foreach at a cursor", () => {
    it("Should find the loop whose keyword the cursor touches", () => {
        assert.strictEqual(forEachAtCursor(nestedLoops("foreach|<<<< (var x in xs)", "foreach (var y in ys)", "Use(x, y);")), "x");
        assert.strictEqual(forEachAtCursor(nestedLoops("|<<<<foreach (var x in xs)", "foreach (var y in ys)", "Use(x, y);")), "x");
    });

    it("Should find the innermost loop whose header holds the cursor", () => {
        assert.strictEqual(forEachAtCursor(nestedLoops("foreach (var x in xs)", "foreach (var y in y|<<<<s)", "Use(x, y);")), "y");
    });

    it("Should still be in the header right after its closing paren", () => {
        assert.strictEqual(forEachAtCursor(nestedLoops("foreach (var x in xs)|<<<<", "foreach (var y in ys)", "Use(x, y);")), "x");
    });

    it("Should find nothing from inside a loop body", () => {
        assert.strictEqual(forEachAtCursor(nestedLoops("foreach (var x in xs)", "foreach (var y in ys)", "Us|<<<<e(x, y);")), undefined);
    });
});
