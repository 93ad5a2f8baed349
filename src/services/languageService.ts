/**
 * The languageService answers requests from something that speaks LSP (or a test), against the documents it has been
 * given: parse diagnostics for a document, and the refactorings available at an offset in it.
 * Documents are parsed, bound and checked lazily, on the first request after their text changes.
 */
import { Diagnostic, DiagnosticKind, Node, NodeId, SourceFile } from "../compiler/node";
import { Parser } from "../compiler/parser";
import { Binder } from "../compiler/binder";
import { Checker, CheckerSemanticModel } from "../compiler/checker";
import { loadTypeLibrary } from "../compiler/typeLibrary";
import { CancellationTokenConsumer, NeverCancelled } from "../compiler/cancellationToken";
import { exhaustiveCaseGuard, findForEachAtOffset, flattenTree, getTerminals, NodeSourceMap } from "../compiler/utils";
import { convertForEachToQuery, NotApplicableReason } from "./convertForEachToQuery";
import { isSameConfig, QueryRefactorConfig } from "./config";
import type { TextEdit } from "./conversionEdits";

export const NO_DATA = undefined;
export const CANCELLED = null;

export type Result<T> = typeof NO_DATA | typeof CANCELLED | T;

type AbsPath = string;

export interface Logger {
    info: (msg: string) => void,
    warn: (msg: string) => void,
    error: (msg: string) => void,
}

export const SilentLogger : Logger = {
    info: () => {},
    warn: () => {},
    error: () => {},
};

export const convertToQueryTitle = "Convert to query";

export interface Refactoring {
    title: string,
    kind: "refactor.rewrite",
    edits: readonly TextEdit[],
}

interface ParsedDocument {
    sourceFile: SourceFile,
    semanticModel: CheckerSemanticModel,
    flatSourceMap: readonly NodeSourceMap[],
    nodeMap: ReadonlyMap<NodeId, Node>,
}

interface TrackedDocument {
    text: string,
    // null until first requested after the text changed
    parsed: ParsedDocument | null,
}

function describeReason(reason: NotApplicableReason) : string {
    switch (reason) {
        case NotApplicableReason.notConvertible: return "NotConvertible";
        case NotApplicableReason.malformedInput: return "MalformedInput";
        case NotApplicableReason.analysisCanceled: return "AnalysisCanceled";
        default: exhaustiveCaseGuard(reason);
    }
}

export function LanguageService(logger: Logger = SilentLogger) {
    let config = QueryRefactorConfig();
    let checker : Checker | null = null;
    const documents = new Map<AbsPath, TrackedDocument>();

    function getChecker() : Checker {
        if (checker) {
            return checker;
        }
        try {
            checker = Checker(loadTypeLibrary(config.typeLibraryAbsPath));
        }
        catch (err) {
            logger.error(`Couldn't load type library '${config.typeLibraryAbsPath}', using the bundled one: ${err instanceof Error ? err.message : String(err)}`);
            checker = Checker(loadTypeLibrary());
        }
        return checker;
    }

    function debug(msg: string) {
        if (config.debug) {
            logger.info(msg);
        }
    }

    function setDocument(fsPath: AbsPath, text: string) : void {
        documents.set(fsPath, {text, parsed: null});
    }

    function removeDocument(fsPath: AbsPath) : void {
        documents.delete(fsPath);
    }

    function getParsedDocument(fsPath: AbsPath) : ParsedDocument | undefined {
        const document = documents.get(fsPath);
        if (!document) {
            return undefined;
        }
        if (document.parsed) {
            return document.parsed;
        }

        const sourceFile = Parser().parse(SourceFile(fsPath, document.text));
        Binder().bind(sourceFile);

        const nodeMap = new Map<NodeId, Node>();
        for (const terminal of getTerminals(sourceFile)) {
            nodeMap.set(terminal.nodeId, terminal);
        }

        document.parsed = {
            sourceFile,
            semanticModel: getChecker().getSemanticModel(sourceFile),
            flatSourceMap: flattenTree(sourceFile),
            nodeMap,
        };
        debug(`parsed ${fsPath}, ${sourceFile.diagnostics.length} diagnostic(s)`);
        return document.parsed;
    }

    function getDiagnostics(fsPath: AbsPath) : Result<{sourceFile: SourceFile, diagnostics: readonly Diagnostic[]}> {
        const document = getParsedDocument(fsPath);
        if (!document) {
            return NO_DATA;
        }
        return {
            sourceFile: document.sourceFile,
            diagnostics: document.sourceFile.diagnostics.filter((diagnostic) => diagnostic.kind === DiagnosticKind.error),
        };
    }

    function getRefactorings(fsPath: AbsPath, offset: number, cancellationToken: CancellationTokenConsumer = NeverCancelled) : Result<{sourceFile: SourceFile, refactorings: Refactoring[]}> {
        const document = getParsedDocument(fsPath);
        if (!document) {
            return NO_DATA;
        }

        const forEach = findForEachAtOffset(document.flatSourceMap, document.nodeMap, offset);
        if (!forEach) {
            return {sourceFile: document.sourceFile, refactorings: []};
        }

        const result = convertForEachToQuery(document.sourceFile, forEach, document.semanticModel, config, cancellationToken);
        if (!result.applicable) {
            debug(`'${convertToQueryTitle}' not offered at ${fsPath}:${offset}: ${describeReason(result.reason)}, ${result.detail}`);
            return result.reason === NotApplicableReason.analysisCanceled
                ? CANCELLED
                : {sourceFile: document.sourceFile, refactorings: []};
        }

        return {
            sourceFile: document.sourceFile,
            refactorings: [{title: convertToQueryTitle, kind: "refactor.rewrite", edits: result.edits}],
        };
    }

    function reset(freshConfig: QueryRefactorConfig) : void {
        if (isSameConfig(config, freshConfig)) {
            return;
        }
        const libraryChanged = config.typeLibraryAbsPath !== freshConfig.typeLibraryAbsPath;
        config = freshConfig;
        if (libraryChanged) {
            checker = null;
            for (const document of documents.values()) {
                document.parsed = null;
            }
        }
        debug(`config reset: ${JSON.stringify(config)}`);
    }

    return {
        setDocument,
        removeDocument,
        getDiagnostics,
        getRefactorings,
        reset,
        getConfig: () : Readonly<QueryRefactorConfig> => config,
    }
}

export type LanguageService = ReturnType<typeof LanguageService>;
