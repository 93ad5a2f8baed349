import * as esbuild from "esbuild";

import { tscCheckOrFail, esBuildOrFail } from "./utils";

export function getBuildOptions(debug: boolean) : esbuild.BuildOptions {
    return {
        bundle: true,
        platform: "node",
        target: "node20",
        format: "cjs",
        minify: !debug,
        sourcemap: debug,
    }
}

export function getDefaultTscCmd() {
    return process.platform === "win32" ? "tsc.cmd" : "tsc";
}

/**
 * type check the whole tree; esbuild does not
 */
export function doTsc(tscCmd: string) {
    tscCheckOrFail(tscCmd, ".");
}

/**
 * link
 */
export function doEsBuild(options: esbuild.BuildOptions, outfiles: {server: string}) {
    // the LSP server, with the language service and the bundled type library linked in
    esBuildOrFail({
        ...options,
        entryPoints: ["./src/lang-server/server/src/server.ts"],
        outfile: outfiles.server,
    });
}
