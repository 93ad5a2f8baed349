import * as fs from "fs";

import { Parser } from "../src/compiler/parser";
import { Binder } from "../src/compiler/binder";
import { ForEachStatement, Node, NodeKind, SourceFile } from "../src/compiler/node";
import { visit } from "../src/compiler/utils";

const cursorMarker = "|<<<<";

export function loadCursorTest(absPath: string) {
    return loadCursorTestFromSource(fs.readFileSync(absPath).toString());
}

/**
 * "foreach|<<<< (var x in xs)" gives the text without the marker and the offset the marker was at
 */
export function loadCursorTestFromSource(sourceText: string) {
    let matchIndex : number | null = null;
    let match : RegExpExecArray | null;
    const cursorMarkerPattern = /\|<<<</g;

    while ((match = cursorMarkerPattern.exec(sourceText)) !== null) {
        if (matchIndex !== null) {
            throw "expected only one cursor marker";
        }
        matchIndex = match.index;
    }

    if (matchIndex === null) {
        throw "expected a cursor marker";
    }

    return {
        index: matchIndex,
        sourceText: sourceText.slice(0, matchIndex) + sourceText.slice(matchIndex + cursorMarker.length),
    }
}

export function parseAndBind(sourceText: string, absPath = "/test/Test.cs") : SourceFile {
    const sourceFile = Parser({debug: true}).parse(SourceFile(absPath, sourceText));
    Binder().bind(sourceFile);
    return sourceFile;
}

/**
 * loops in source order, outermost first
 */
export function getForEachStatements(root: Node) : ForEachStatement[] {
    return findNodes(root, (node) : node is ForEachStatement => node.kind === NodeKind.forEachStatement);
}

export function firstForEach(sourceFile: SourceFile) : ForEachStatement {
    const forEach = getForEachStatements(sourceFile)[0];
    if (!forEach) {
        throw "expected a foreach statement";
    }
    return forEach;
}

/**
 * `body` placed in a method of a class, indented the way an editor would
 */
export function inMethod(body: string, usings = "using System.Collections.Generic;\n\n", signature = "void M(List<int> xs, List<int> ys)") {
    const indented = body.split("\n").map((line) => line === "" ? line : "        " + line).join("\n");
    return `${usings}class C\n{\n    ${signature}\n    {\n${indented}\n    }\n}\n`;
}

export function findNodes<T extends Node>(root: Node, predicate: (node: Node) => node is T) : T[] {
    const result : T[] = [];
    function visitor(node: Node | null) {
        if (!node) return;
        if (predicate(node)) {
            result.push(node);
        }
        visit(node, visitor);
    }
    visitor(root);
    return result;
}
