export { Scanner, SourceRange } from "./scanner";
export { Parser } from "./parser";
export { Binder } from "./binder";
export { Checker } from "./checker";
export type { SemanticModel } from "./checker";
export { loadTypeLibrary, TypeLibrary } from "./typeLibrary";
export { CancellationToken, CancellationTokenConsumer, CancellationException, NeverCancelled } from "./cancellationToken";
export { flattenTree, binarySearch, findForEachAtOffset, getTerminals } from "./utils";
export { SourceFile, NodeKind } from "./node";
export type { Node, Diagnostic, ForEachStatement, NodeId } from "./node";
