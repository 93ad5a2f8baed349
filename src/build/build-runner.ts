import * as build from "./build"

const debug = process.argv.indexOf("--debug") !== -1;
const skipTypeCheck = process.argv.indexOf("--no-check") !== -1;

if (!skipTypeCheck) {
    build.doTsc(build.getDefaultTscCmd());
}
build.doEsBuild(build.getBuildOptions(debug), {
    server: "./out/server.js",
});
