import * as child_process from "child_process";
import * as esbuild from "esbuild";

interface TighterBuildOptions extends esbuild.BuildOptions {
    entryPoints: [string],
    outfile: string
}

export function esBuildOrFail(options: TighterBuildOptions) : void {
    console.log(`[esbuild] bundling entrypoint ${options.entryPoints[0]}`);
    try {
        esbuild.buildSync(options);
    }
    catch (e) {
        console.error(e);
        process.exit(1);
    }
}

export function tscCheckOrFail(tscCmd: string, project: string) : void {
    console.log(`[tsc] checking ${project}`);
    const tscOutputLines = fixupTscOutput(child_process.spawnSync(tscCmd, ["--noEmit", "-p", project], {shell: process.platform === "win32"}));
    if (tscOutputLines.length > 0) {
        for (const msg of tscOutputLines) {
            console.log(msg);
        }
        process.exit(1);
    }
}

// child_process.spawnSync().output is (null | Buffer)[], we want the non-empty strings
function fixupTscOutput(childProcessResult: child_process.SpawnSyncReturns<Buffer>) : string[] {
    const result : string[] = [];
    for (const chunk of childProcessResult.output) {
        const text = chunk?.toString() ?? "";
        if (text !== "") {
            result.push(text);
        }
    }
    return result;
}
