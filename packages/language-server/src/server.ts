import {
  createConnection,
  ProposedFeatures,
  RequestType,
  TextDocuments,
  TextDocumentSyncKind,
  type DidChangeWatchedFilesParams,
  type InitializeParams,
  type InitializeResult,
  type Position,
  type TextDocumentIdentifier,
} from "vscode-languageserver/lib/node/main.js";
import { TextDocument } from "vscode-languageserver-textdocument";
import type { QueryKey } from "@tessera/compiler";
import {
  AnalysisCoordinator,
  openDocumentUris,
  type CoordinatorOptions,
  type ViewKind,
} from "./server/analysis-coordinator.js";
import { DiagnosticsScheduler, type DiagnosticsRun } from "./server/diagnostics-scheduler.js";

export type StartServerOptions = {
  connection?: ReturnType<typeof createConnection>;
};

export type ViewParams = {
  textDocument: TextDocumentIdentifier;
  position?: Position;
};

const viewRequest = (kind: ViewKind, method: string) => ({
  kind,
  type: new RequestType<ViewParams, string, void>(method),
});

export const VIEW_REQUESTS = [
  viewRequest("cst", "tessera/viewCst"),
  viewRequest("ast", "tessera/viewAst"),
  viewRequest("hir", "tessera/viewHir"),
  viewRequest("scope", "tessera/viewScope"),
  viewRequest("prettyPrint", "tessera/viewPrettyPrint"),
] as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

/** Reads `includeDirs` and `prelude` from the client's initialization options */
export const coordinatorOptions = (initializationOptions: unknown): CoordinatorOptions => {
  if (!isRecord(initializationOptions)) return {};
  const { includeDirs, prelude } = initializationOptions;
  return {
    ...(Array.isArray(includeDirs)
      ? {
          includeDirs: includeDirs.filter(
            (dir): dir is string => typeof dir === "string",
          ),
        }
      : {}),
    ...(typeof prelude === "boolean" ? { prelude } : {}),
  };
};

export const startServer = ({
  connection = createConnection(ProposedFeatures.all),
}: StartServerOptions = {}): void => {
  const documents = new TextDocuments(TextDocument);
  const scheduler = new DiagnosticsScheduler({
    onError: (error) => connection.console.error(`diagnostics failed: ${String(error)}`),
  });
  let coordinator = new AnalysisCoordinator();

  const publishDiagnostics = async ({ isCurrent, uris }: DiagnosticsRun): Promise<void> => {
    for (const uri of uris) {
      if (!isCurrent()) return;
      if (!documents.get(uri)) continue;
      const diagnostics = await coordinator.diagnosticsForUri(uri);
      if (!isCurrent()) return;
      await connection.sendDiagnostics({ uri, diagnostics });
    }
  };

  const scheduleDiagnostics = (delayMs: number, uris: Iterable<string>): void => {
    scheduler.schedule({ delayMs, uris, publish: publishDiagnostics });
  };

  const track = (delayMs: number, work: Promise<readonly QueryKey[]>) =>
    work
      .then((keys) => {
        scheduleDiagnostics(delayMs, openDocumentUris({ keys, openUris: documents.keys() }));
      })
      .catch((error: unknown) => {
        connection.console.error(`update failed: ${String(error)}`);
      });

  connection.onInitialize((params: InitializeParams): InitializeResult => {
    const options = coordinatorOptions(params.initializationOptions);
    coordinator = new AnalysisCoordinator(options);
    const prelude = options.prelude === false ? "off" : "on";
    const includeDirs = (options.includeDirs ?? []).join(", ");
    connection.console.info(`tessera: include dirs [${includeDirs}], prelude ${prelude}`);
    return {
      capabilities: {
        textDocumentSync: TextDocumentSyncKind.Incremental,
      },
    };
  });

  documents.onDidOpen(({ document }: { document: TextDocument }) =>
    track(25, coordinator.updateDocument(document)),
  );

  documents.onDidChangeContent(({ document }: { document: TextDocument }) =>
    track(140, coordinator.updateDocument(document)),
  );

  documents.onDidClose(async ({ document }: { document: TextDocument }) => {
    await connection.sendDiagnostics({ uri: document.uri, diagnostics: [] });
    await track(25, coordinator.removeDocument(document));
  });

  connection.onDidChangeWatchedFiles(({ changes }: DidChangeWatchedFilesParams) =>
    track(80, coordinator.handleWatchedFileChanges(changes)),
  );

  VIEW_REQUESTS.forEach(({ kind, type }) => {
    connection.onRequest(type, (params: ViewParams) =>
      coordinator.view({ uri: params.textDocument.uri, kind, position: params.position }),
    );
  });

  connection.onShutdown(() => scheduler.dispose());

  documents.listen(connection);
  connection.listen();
};

startServer();
