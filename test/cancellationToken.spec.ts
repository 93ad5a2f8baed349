import * as assert from "assert";

import { CancellationException, CancellationToken } from "../src/compiler/cancellationToken";
import { CANCELLED, LanguageService } from "../src/services/languageService";
import { inMethod, loadCursorTestFromSource } from "./TestLoader";

describe("cancellation token", () => {
    it("Should let a consumer see the host's request until it is reset", () => {
        const token = CancellationToken();
        assert.strictEqual(token.consumer.cancellationRequested(), false);
        assert.doesNotThrow(() => token.consumer.throwIfCancellationRequested());

        token.requestCancellation();
        assert.strictEqual(token.consumer.cancellationRequested(), true);
        assert.throws(() => token.consumer.throwIfCancellationRequested(), CancellationException);

        token.reset();
        assert.strictEqual(token.consumer.cancellationRequested(), false);
    });

    it("Should cancel a refactoring request through the host's token", () => {
        const {index, sourceText} = loadCursorTestFromSource(inMethod("foreach|<<<< (var x in xs)\n    if (x > 0)\n        ys.Add(x);"));
        const service = LanguageService();
        service.setDocument("/test/Test.cs", sourceText);

        const token = CancellationToken();
        assert.strictEqual(service.getRefactorings("/test/Test.cs", index, token.consumer)?.refactorings.length, 1);

        token.requestCancellation();
        assert.strictEqual(service.getRefactorings("/test/Test.cs", index, token.consumer), CANCELLED);
    });
});
