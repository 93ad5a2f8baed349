import * as assert from "assert";

import { EndOfLine, Space, Trivia, TriviaKind, Whitespace } from "../src/compiler/node";
import { Scanner } from "../src/compiler/scanner";
import { Tokenizer } from "../src/compiler/tokenizer";
import {
    getLineIndentation, getRetainedTrivia, printNode, reindent, renderCommentLines, renderGap, renderTail, TriviaLayout
} from "../src/services/printer";
import { parseAndBind } from "./TestLoader";

const layout : TriviaLayout = {indent: "    ", endOfLine: "\n"};
const lineComment = (text: string) => Trivia(TriviaKind.singleLineComment, text);
const blockComment = (text: string) => Trivia(TriviaKind.multiLineComment, text);

function tokensOf(text: string) {
    return Tokenizer(Scanner(text)).getTokens();
}

describe("printer", () => {
    it("Should print a parsed file back to its exact text", () => {
        const text = "using System;\r\n\r\n#region r\r\nclass C // c\r\n{\r\n    /* m */ void M() { }\r\n}\r\n#endregion\r\n";
        const sourceFile = parseAndBind(text);
        assert.strictEqual(sourceFile.diagnostics.length, 0);
        assert.strictEqual(printNode(sourceFile), text);
    });

    it("Should separate pieces with a single space when no comment survives", () => {
        assert.strictEqual(renderGap([], layout), " ");
        assert.strictEqual(renderGap([Space(), EndOfLine(), Whitespace("        ")], layout), " ");
    });

    it("Should keep a comment on the current line between spaces", () => {
        assert.strictEqual(renderGap([Space(), blockComment("/* a */"), Space()], layout), " /* a */ ");
    });

    it("Should put a comment on its own line at the continuation indent", () => {
        const gap = renderGap([EndOfLine(), Whitespace("            "), lineComment("// c"), EndOfLine(), Whitespace("            ")], layout);
        assert.strictEqual(gap, "\n    // c\n    ");
    });

    it("Should break the line after a single line comment that had no line break of its own", () => {
        assert.strictEqual(renderGap([Space(), lineComment("// t")], layout), " // t\n    ");
    });

    it("Should keep a blank line only where the source had one", () => {
        const blank = tokensOf("a\n\n    b");
        assert.strictEqual(renderGap([...blank[0].trailingTrivia, ...blank[1].leadingTrivia], layout), "\n\n    ");

        // the line breaks around a dropped `{` are not a blank line
        const braced = tokensOf("a\n{\n    b");
        const trivia = [...braced[0].trailingTrivia, ...braced[1].leadingTrivia, ...braced[1].trailingTrivia, ...braced[2].leadingTrivia];
        assert.strictEqual(getRetainedTrivia(trivia).length, 0);
        assert.strictEqual(renderGap(trivia, layout), " ");
    });

    it("Should not turn the line breaks of two comment lines around a dropped token into a blank line", () => {
        const tokens = tokensOf("a // outer\n{\n    // inner\n    b");
        const trivia = [...tokens[0].trailingTrivia, ...tokens[1].leadingTrivia, ...tokens[1].trailingTrivia, ...tokens[2].leadingTrivia];
        assert.deepStrictEqual(getRetainedTrivia(trivia).map((v) => v.text), ["// outer", "\n", "// inner", "\n"]);
        assert.strictEqual(renderGap(trivia, layout), " // outer\n    // inner\n    ");
    });

    it("Should keep a blank line between two comment lines", () => {
        const tokens = tokensOf("a // one\n\n    // two\n    b");
        const trivia = [...tokens[0].trailingTrivia, ...tokens[1].leadingTrivia];
        assert.strictEqual(renderGap(trivia, layout), " // one\n\n    // two\n    ");
    });

    it("Should render nothing after generated code when only whitespace follows", () => {
        assert.strictEqual(renderTail([Space(), EndOfLine(), Whitespace("    ")], layout, true), "");
    });

    it("Should end a trailing line comment with a line break only if the following text lacks one", () => {
        const trivia = [Space(), lineComment("// end"), EndOfLine()];
        assert.strictEqual(renderTail(trivia, layout, true), " // end");
        assert.strictEqual(renderTail(trivia, layout, false), " // end\n    ");
    });

    it("Should lay comments out as whole indented lines", () => {
        const trivia = [EndOfLine(), Whitespace("  "), lineComment("// a"), EndOfLine(), Whitespace("  "), blockComment("/* b */"), Space()];
        assert.strictEqual(renderCommentLines(trivia, layout), "    // a\n    /* b */\n");
        assert.strictEqual(renderCommentLines([EndOfLine(), Space()], layout), "");
    });

    it("Should reindent every line but the first", () => {
        assert.strictEqual(reindent("a\n        b\n\n        c", "        ", "    "), "a\n    b\n\n    c");
    });

    it("Should move directive lines to column 0 while reindenting", () => {
        assert.strictEqual(reindent("a\n        #else\n        b", "        ", "    "), "a\n#else\n    b");
        assert.strictEqual(reindent("a\n#endif\n        b", "        ", "    "), "a\n#endif\n    b");
    });

    it("Should write a directive at column 0 and a comment after it at the indentation", () => {
        const directive = Trivia(TriviaKind.directive, "#if DEBUG");
        assert.strictEqual(
            renderCommentLines([EndOfLine(), Whitespace("        "), directive, EndOfLine(), Whitespace("        "), lineComment("// a")], layout),
            "#if DEBUG\n    // a\n");
    });

    it("Should find the indentation of the line containing an offset", () => {
        assert.strictEqual(getLineIndentation("x\n\t  y", 5), "\t  ");
        assert.strictEqual(getLineIndentation("    x", 4), "    ");
    });
});
