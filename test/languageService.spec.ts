import * as assert from "assert";

import { CancellationTokenConsumer } from "../src/compiler/cancellationToken";
import { applyTextEdits } from "../src/services/conversionEdits";
import { QueryRefactorConfig } from "../src/services/config";
import { CANCELLED, convertToQueryTitle, LanguageService, Logger, NO_DATA } from "../src/services/languageService";
import { inMethod, loadCursorTestFromSource } from "./TestLoader";

const fsPath = "/test/Test.cs";

function RecordingLogger() {
    const messages : string[] = [];
    const logger : Logger = {
        info: (msg) => messages.push("info: " + msg),
        warn: (msg) => messages.push("warn: " + msg),
        error: (msg) => messages.push("error: " + msg),
    };
    return {logger, messages};
}

function withCursor(body: string) {
    return loadCursorTestFromSource(inMethod(body));
}

const addToList = withCursor("foreach|<<<< (var x in xs)\n    if (x > 0)\n        ys.Add(x);");

describe("language service", () => {
    it("Should have nothing to say about a document it was not given", () => {
        const service = LanguageService();
        assert.strictEqual(service.getDiagnostics(fsPath), NO_DATA);
        assert.strictEqual(service.getRefactorings(fsPath, 0), NO_DATA);
    });

    it("Should offer the conversion at a foreach header", () => {
        const service = LanguageService();
        service.setDocument(fsPath, addToList.sourceText);

        const result = service.getRefactorings(fsPath, addToList.index);
        assert.ok(result);
        assert.strictEqual(result.refactorings.length, 1);

        const [refactoring] = result.refactorings;
        assert.strictEqual(refactoring.title, convertToQueryTitle);
        assert.strictEqual(refactoring.kind, "refactor.rewrite");
        assert.strictEqual(
            applyTextEdits(addToList.sourceText, refactoring.edits),
            inMethod("ys.AddRange(from x in xs where x > 0 select x);", "using System.Collections.Generic;\nusing System.Linq;\n\n"));
    });

    it("Should offer nothing away from a foreach header", () => {
        const service = LanguageService();
        const {index, sourceText} = withCursor("foreach (var x in xs)\n    if (x > 0)\n        ys.A|<<<<dd(x);");
        service.setDocument(fsPath, sourceText);

        assert.deepStrictEqual(service.getRefactorings(fsPath, index)?.refactorings, []);
    });

    it("Should leave out the using when configured not to add it", () => {
        const service = LanguageService();
        service.reset({...QueryRefactorConfig(), addMissingUsing: false});
        service.setDocument(fsPath, addToList.sourceText);

        const result = service.getRefactorings(fsPath, addToList.index);
        assert.strictEqual(result?.refactorings[0].edits.length, 1);
    });

    it("Should answer from the latest text of a document", () => {
        const service = LanguageService();
        service.setDocument(fsPath, addToList.sourceText);
        assert.strictEqual(service.getRefactorings(fsPath, addToList.index)?.refactorings.length, 1);

        const {index, sourceText} = withCursor("foreach|<<<< (var x in xs)\n    Use(x);");
        service.setDocument(fsPath, sourceText);
        assert.strictEqual(service.getRefactorings(fsPath, index)?.refactorings.length, 0);

        service.removeDocument(fsPath);
        assert.strictEqual(service.getRefactorings(fsPath, index), NO_DATA);
    });

    it("Should report cancellation as such", () => {
        const service = LanguageService();
        service.setDocument(fsPath, addToList.sourceText);
        assert.strictEqual(service.getRefactorings(fsPath, addToList.index, CancellationTokenConsumer(() => true)), CANCELLED);
    });

    it("Should log why the conversion was not offered when debugging", () => {
        const {logger, messages} = RecordingLogger();
        const service = LanguageService(logger);
        service.reset({...QueryRefactorConfig(), debug: true});

        const {index, sourceText} = withCursor("foreach|<<<< (var x in xs)\n    Use(x);");
        service.setDocument(fsPath, sourceText);
        service.getRefactorings(fsPath, index);

        assert.strictEqual(
            messages[messages.length - 1],
            `info: 'Convert to query' not offered at ${fsPath}:${index}: NotConvertible, nothing in the loop becomes a query clause`);
    });

    it("Should report syntax errors", () => {
        const service = LanguageService();
        service.setDocument(fsPath, inMethod("foreach (var x in xs)\n{\n    Use(x)\n}"));

        const result = service.getDiagnostics(fsPath);
        assert.ok(result);
        assert.strictEqual(result.diagnostics[0]?.msg, "Expected ';'.");
    });

    it("Should fall back to the bundled type library when the configured one cannot be read", () => {
        const {logger, messages} = RecordingLogger();
        const service = LanguageService(logger);
        service.reset({...QueryRefactorConfig(), typeLibraryAbsPath: "/nonexistent/types.json"});
        service.setDocument(fsPath, addToList.sourceText);

        assert.strictEqual(service.getRefactorings(fsPath, addToList.index)?.refactorings.length, 1);
        assert.strictEqual(messages.filter((msg) => msg.startsWith("error: Couldn't load type library '/nonexistent/types.json'")).length, 1);
    });
});
