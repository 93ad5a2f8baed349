/* --------------------------------------------------------------------------------------------
 * Copyright (c) Microsoft Corporation. All rights reserved.
 * Licensed under the MIT License. See License.txt in the project root for license information.
 * ------------------------------------------------------------------------------------------ */
import {
	createConnection,
	ProposedFeatures,
	InitializeParams,
	DidChangeConfigurationNotification,
	TextDocumentSyncKind,
	InitializeResult,
	CodeAction,
	CodeActionKind,
	CodeActionParams,
	CancellationToken as vsCancellationToken,
} from 'vscode-languageserver/node';

import {
	TextDocument
} from 'vscode-languageserver-textdocument';

import { URI } from "vscode-uri";

import { LanguageService, Logger } from "../../../services/languageService"
import { mungeConfig } from "../../../services/config"
import { CancellationTokenConsumer } from '../../../compiler/cancellationToken';

import { adapter as resultsAdapter } from "./vscode-direct-adapter"

const configSection = "queryRefactor";
const languageId = "csharp";

// Create a connection for the server, using Node's IPC as a transport.
// Also include all preview / proposed LSP features.
const connection = createConnection(ProposedFeatures.all);

const logger : Logger = {
	info: (msg) => connection.console.info(msg),
	warn: (msg) => connection.console.warn(msg),
	error: (msg) => connection.console.error(msg),
};

const languageService = LanguageService(logger);
const knownDocs = new Map</*URI*/string, TextDocument>();

let hasConfigurationCapability = false;

function getProperty(value: unknown, key: string) : unknown {
	return typeof value === "object" && value !== null && key in value
		? Object.getOwnPropertyDescriptor(value, key)?.value
		: undefined;
}

connection.onInitialize((params: InitializeParams) => {
	const capabilities = params.capabilities;

	// Does the client support the `workspace/configuration` request?
	// If not, we only use what came with initializationOptions.
	hasConfigurationCapability = !!capabilities.workspace?.configuration;

	if (params.workspaceFolders) {
		connection.console.info("query-refactor/initialize, workspaces:");
		connection.console.info(params.workspaceFolders.map(e => e.uri).join(","));
	}

	const result: InitializeResult = {
		capabilities: {
			textDocumentSync: TextDocumentSyncKind.Incremental,
			codeActionProvider: {codeActionKinds: [CodeActionKind.RefactorRewrite]},
		}
	};

	languageService.reset(mungeConfig(getProperty(params.initializationOptions, "config")));

	return result;
});

connection.onInitialized(async () => {
	if (!hasConfigurationCapability) {
		return;
	}
	try {
		await connection.client.register(DidChangeConfigurationNotification.type, {section: configSection});
		const config : unknown = await connection.workspace.getConfiguration(configSection);
		languageService.reset(mungeConfig(config));
	}
	catch (err) {
		console.error("onInitialized --", err);
	}
});

connection.onDidChangeConfiguration(change => {
	languageService.reset(mungeConfig(getProperty(change.settings, configSection)));
	for (const uri of knownDocs.keys()) {
		runDiagnostics(uri);
	}
});

function runDiagnostics(uri: string) {
	const doc = knownDocs.get(uri);
	if (!doc) {
		// shouldn't happen
		return;
	}

	const diagnostics = languageService.getDiagnostics(URI.parse(uri).fsPath);
	if (diagnostics) {
		const posMapper = resultsAdapter.sourcePositionToVsPosition(doc);
		connection.sendDiagnostics({
			uri,
			diagnostics: diagnostics.diagnostics.map(diagnostic => resultsAdapter.diagnostic(posMapper, diagnostic))
		});
	}
}

connection.onDidOpenTextDocument(v => {
	if (v.textDocument.languageId !== languageId) {
		return;
	}
	const doc = TextDocument.create(v.textDocument.uri, v.textDocument.languageId, v.textDocument.version, v.textDocument.text);
	knownDocs.set(v.textDocument.uri, doc);
	languageService.setDocument(URI.parse(doc.uri).fsPath, doc.getText());
	try {
		runDiagnostics(v.textDocument.uri);
	}
	catch (err) {
		console.error("onDidOpen --", err);
	}
});

connection.onDidChangeTextDocument(changes => {
	const doc = knownDocs.get(changes.textDocument.uri);
	if (!doc) {
		return;
	}

	// works in-place on `doc`
	TextDocument.update(doc, changes.contentChanges, changes.textDocument.version);
	languageService.setDocument(URI.parse(doc.uri).fsPath, doc.getText());

	try {
		runDiagnostics(changes.textDocument.uri);
	}
	catch (err) {
		console.error("onDidChange --", err);
	}
});

connection.onDidCloseTextDocument(v => {
	knownDocs.delete(v.textDocument.uri);
	languageService.removeDocument(URI.parse(v.textDocument.uri).fsPath);
	connection.sendDiagnostics({ uri: v.textDocument.uri, diagnostics: [] });
});

function wantsRefactorRewrite(only: readonly string[] | undefined) : boolean {
	return !only || only.some(kind => kind === CodeActionKind.RefactorRewrite || CodeActionKind.RefactorRewrite.startsWith(kind + "."));
}

connection.onCodeAction((params: CodeActionParams, token: vsCancellationToken) : CodeAction[] => {
	const doc = knownDocs.get(params.textDocument.uri);
	if (!doc || !wantsRefactorRewrite(params.context.only)) {
		return [];
	}

	const fsPath = URI.parse(doc.uri).fsPath;
	const targetIndex = doc.offsetAt(params.range.start);
	const cancellationToken = CancellationTokenConsumer(() => token.isCancellationRequested);

	try {
		const result = languageService.getRefactorings(fsPath, targetIndex, cancellationToken);
		if (!result) {
			return [];
		}

		const posMapper = resultsAdapter.sourcePositionToVsPosition(doc);
		return result.refactorings.map(refactoring => ({
			title: refactoring.title,
			kind: CodeActionKind.RefactorRewrite,
			edit: {
				changes: {
					[doc.uri]: refactoring.edits.map(edit => resultsAdapter.textEdit(posMapper, edit))
				}
			}
		}));
	}
	catch (err) {
		console.error("onCodeAction --", err);
		return [];
	}
});

connection.listen();
