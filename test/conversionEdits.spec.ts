import * as assert from "assert";

import { ExpressionStatement, Node, NodeKind } from "../src/compiler/node";
import { SourceRange } from "../src/compiler/scanner";
import { applyTextEdits, getAddUsingDirectiveEdit, getRemoveStatementEdit, TextEdit } from "../src/services/conversionEdits";
import { findNodes, inMethod, parseAndBind } from "./TestLoader";

const isExpressionStatement = (node: Node) : node is ExpressionStatement => node.kind === NodeKind.expressionStatement;

function removeStatement(text: string, index: number) {
    const sourceFile = parseAndBind(text);
    const statement = findNodes(sourceFile, isExpressionStatement)[index];
    return applyTextEdits(text, [getRemoveStatementEdit(sourceFile.sourceText, statement)]);
}

function addUsing(text: string, namespaceName: string) {
    const sourceFile = parseAndBind(text);
    return applyTextEdits(text, [getAddUsingDirectiveEdit(sourceFile, namespaceName)]);
}

describe("conversion edits", () => {
    it("Should apply edits given in any order against the original text", () => {
        const edits = [
            TextEdit(new SourceRange(4, 5), "X"),
            TextEdit(new SourceRange(1, 2), ""),
            TextEdit(new SourceRange(6, 6), "!"),
        ];
        assert.strictEqual(applyTextEdits("abcdef", edits), "acdXf!");
    });

    it("Should refuse overlapping edits", () => {
        const edits = [TextEdit(new SourceRange(0, 3), "x"), TextEdit(new SourceRange(2, 4), "y")];
        assert.throws(() => applyTextEdits("abcdef", edits), /Overlapping text edits at offset 2/);
    });

    it("Should remove the whole line of a statement that has a line to itself", () => {
        assert.strictEqual(removeStatement(inMethod("a();\nb();"), 0), inMethod("b();"));
    });

    it("Should remove only the tokens of a statement that shares its line", () => {
        assert.strictEqual(removeStatement(inMethod("a(); b();"), 1), inMethod("a(); "));
    });

    it("Should keep a trailing comment when removing a statement", () => {
        assert.strictEqual(removeStatement(inMethod("a(); // why\nb();"), 0), inMethod(" // why\nb();"));
    });

    it("Should add a using at the top of a file that has none", () => {
        assert.strictEqual(addUsing("class C\n{\n}\n", "System.Linq"), "using System.Linq;\n\nclass C\n{\n}\n");
    });

    it("Should add a using in order among the existing ones", () => {
        assert.strictEqual(
            addUsing("using System;\nusing System.Text;\n\nclass C { }\n", "System.Linq"),
            "using System;\nusing System.Linq;\nusing System.Text;\n\nclass C { }\n");
    });

    it("Should add a using after the last one when it sorts last", () => {
        assert.strictEqual(
            addUsing("using System.Collections.Generic;\n\nclass C { }\n", "System.Linq"),
            "using System.Collections.Generic;\nusing System.Linq;\n\nclass C { }\n");
    });

    it("Should keep the file's line endings in an added using", () => {
        assert.strictEqual(addUsing("class C\r\n{\r\n}\r\n", "System.Linq"), "using System.Linq;\r\n\r\nclass C\r\n{\r\n}\r\n");
    });
});
