import * as assert from "assert";

import { isSameConfig, mungeConfig, QueryRefactorConfig } from "../src/services/config";

describe("config", () => {
    it("Should use the defaults for a missing or malformed config", () => {
        assert.deepStrictEqual(mungeConfig(undefined), QueryRefactorConfig());
        assert.deepStrictEqual(mungeConfig("System.Linq"), QueryRefactorConfig());
        assert.deepStrictEqual(mungeConfig([true]), QueryRefactorConfig());
    });

    it("Should take each well formed setting and default the rest", () => {
        assert.deepStrictEqual(mungeConfig({queryNamespace: "My.Linq", debug: true, addMissingUsing: "no"}), {
            queryNamespace: "My.Linq",
            addMissingUsing: true,
            typeLibraryAbsPath: null,
            debug: true,
        });
    });

    it("Should reject a namespace that is not a dotted name", () => {
        assert.strictEqual(mungeConfig({queryNamespace: "System..Linq"}).queryNamespace, "System.Linq");
        assert.strictEqual(mungeConfig({queryNamespace: "System.Linq;"}).queryNamespace, "System.Linq");
        assert.strictEqual(mungeConfig({queryNamespace: "_Internal.Query2"}).queryNamespace, "_Internal.Query2");
    });

    it("Should treat an empty type library path as none", () => {
        assert.strictEqual(mungeConfig({typeLibraryAbsPath: ""}).typeLibraryAbsPath, null);
        assert.strictEqual(mungeConfig({typeLibraryAbsPath: "/lib/extra.json"}).typeLibraryAbsPath, "/lib/extra.json");
    });

    it("Should compare configs by value", () => {
        assert.strictEqual(isSameConfig(QueryRefactorConfig(), mungeConfig({})), true);
        assert.strictEqual(isSameConfig(QueryRefactorConfig(), mungeConfig({debug: true})), false);
    });
});
