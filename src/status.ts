import { APP_VERSION } from "./config";

/**
 * Corpus loading progress. Counters only grow during startup.
 */
export interface CorpusStatus {
  /** Documents read from the summary manifest (content file found). */
  documentsLoaded: number;
  /** Documents whose summary embedding has been computed. */
  documentsEmbedded: number;
}

/** Model identifiers in use, for operators checking a deployment. */
export interface ModelStatus {
  embedding: string;
  rerank: string;
  summarization: string;
}

/**
 * Snapshot of server lifecycle + corpus progress, served by `GET /health`.
 *
 * ready = true ONLY after every document has an embedding and the
 * {@link CorpusIndex} has been built.
 */
export interface ServerStatus {
  version: string;
  /** Directory holding the `<docId>.md` content files. */
  corpusDir: string;
  models: ModelStatus;
  /** Active transport: 'stdio' | 'http' | 'unknown'. */
  transport: string;
  ready: boolean;
  /** ISO timestamp when the process (or StatusManager) started. */
  startedAt: string;
  corpus: CorpusStatus;
}

/**
 * Class wrapper around mutable server status state. Avoids ad-hoc mutation and
 * centralizes any future validation or side-effects.
 */
export class StatusManager {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      corpusDir: initial?.corpusDir ?? "",
      models: initial?.models ?? { embedding: "", rerank: "", summarization: "" },
      transport: initial?.transport ?? "unknown",
      ready: initial?.ready ?? false,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      corpus: initial?.corpus ?? { documentsLoaded: 0, documentsEmbedded: 0 },
    };
  }

  public markTransport(t: string) {
    this.data.transport = t;
  }

  public setCorpusDir(dir: string) {
    this.data.corpusDir = dir;
  }

  public setModels(models: ModelStatus) {
    this.data.models = { ...models };
  }

  public setDocumentsLoaded(count: number) {
    this.data.corpus.documentsLoaded = count;
  }

  public incEmbedded(count = 1) {
    this.data.corpus.documentsEmbedded += count;
  }

  /** Transition ready=false -> true once the corpus index is built. */
  public markReady() {
    this.data.ready = true;
  }

  /** Access a live reference to current status (treat as read-only). */
  public getStatus(): ServerStatus {
    return this.data;
  }

  public toJSON() {
    return this.data;
  }
}

// Singleton instance used across modules (corpus loader, transports, health checks).
export const statusManager = new StatusManager();
