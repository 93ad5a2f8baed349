import * as assert from "assert";

import { Parser, Binder, SourceFile, flattenTree } from "../src/compiler";
import { printNode } from "../src/services/printer";
import * as TestLoader from "./TestLoader";

const parser = Parser({debug: true});
const binder = Binder();

function assertDiagnosticsCount(text: string, count: number) {
    const sourceFile = SourceFile("/test/Smoke.cs", text);
    parser.parse(sourceFile);
    binder.bind(sourceFile);
    flattenTree(sourceFile); // just checking that it doesn't throw
    assert.strictEqual(sourceFile.diagnostics.length, count, `${count} diagnostics emitted`);
    assert.strictEqual(printNode(sourceFile), text, "tree prints back to its source");
    return sourceFile;
}

function assertParsesInMethod(...lines: string[]) {
    return assertDiagnosticsCount(TestLoader.inMethod(lines.join("\n")), 0);
}

describe("parser smoke tests", () => {
    it("Should parse type members", () => {
        assertDiagnosticsCount([
            "using System;",
            "using Alias = System.Collections.Generic.List<int>;",
            "",
            "namespace Shapes.Core",
            "{",
            "    [Serializable]",
            "    public sealed class Box<T> where T : class",
            "    {",
            "        private readonly int size = 4, depth;",
            "        public string Name { get; private set; } = \"box\";",
            "        public int Volume => size * depth;",
            "        public Box(int size) { this.size = size; }",
            "        public static T Pick<U>(U[] items, int index = 0) where U : T => items[index];",
            "        protected internal virtual void Clear() { }",
            "    }",
            "",
            "    interface IShape { double Area(); }",
            "}",
            "",
        ].join("\n"), 0);
    });

    it("Should parse file scoped namespaces and records", () => {
        assertDiagnosticsCount("namespace Shapes;\n\npublic record Point(int X, int Y);\n", 0);
    });

    it("Should parse statements", () => {
        assertParsesInMethod(
            "int total = 0, count;",
            "const int limit = 10;",
            "for (var i = 0; i < limit; i++) total += i;",
            "while (total > 0) { total--; }",
            "do { count = total; } while (false);",
            "switch (total)",
            "{",
            "    case 0:",
            "    case 1:",
            "        break;",
            "    default:",
            "        return;",
            "}",
            "try { Run(); }",
            "catch (InvalidOperationException e) { throw; }",
            "finally { Done(); }",
            "using (var reader = Open()) { }",
            "using var writer = Open();",
            "lock (this) { total++; }",
            "int Twice(int n) => n * 2;",
            "foreach (var (a, b) in Pairs()) { }",
        );
    });

    it("Should parse expressions", () => {
        assertParsesInMethod(
            "var point = new Point { X = 1, Y = 2 };",
            "var numbers = new List<int> { 1, 2, 3 };",
            "var grid = new int[2, 3];",
            "var names = new[] { \"a\", \"b\" };",
            "List<int> empty = new();",
            "Func<int, int, int> add = (a, b) => a + b;",
            "Action<int> log = x => { Console.WriteLine($\"{x}\"); };",
            "var label = point?.Name ?? \"none\";",
            "var isText = label is string s && s.Length > 0;",
            "var half = (double)total / 2;",
            "var sign = total < 0 ? -1 : 1;",
            "var pair = (first: 1, second: 2);",
            "var kind = typeof(Point);",
            "var zero = default(int);",
        );
    });

    it("Should parse query expressions", () => {
        const sourceFile = assertParsesInMethod(
            "var query = from x in xs",
            "            join y in ys on x equals y",
            "            let z = x * y",
            "            where z > 0",
            "            orderby z descending, x",
            "            select new { x, z } into r",
            "            group r by r.x;",
        );
        assert.strictEqual(TestLoader.getForEachStatements(sourceFile).length, 0);
    });

    it("Should report a missing semicolon", () => {
        const sourceFile = assertDiagnosticsCount("class C { void M() { int x = 1 } }", 1);
        assert.strictEqual(sourceFile.diagnostics[0].msg, "Expected ';'.");
    });

    it("Should report a foreach with nothing to iterate", () => {
        const sourceFile = assertDiagnosticsCount("class C { void M() { foreach (var x in ) { } } }", 1);
        assert.strictEqual(sourceFile.diagnostics[0].msg, "Expression expected.");
        assert.strictEqual(TestLoader.getForEachStatements(sourceFile).length, 1);
    });
});
