import fs from "node:fs/promises";
import path from "node:path";
import type { EmbeddingClient } from "./embeddings";
import { CorpusLoadError, errorMessage } from "./errors";
import { statusManager, StatusManager } from "./status";
import type { CorpusDocument, EmbeddingVector } from "./types";

/**
 * Immutable, position-aligned store of corpus documents and their summary
 * embeddings. `embeddings[i]` is the embedding of `documents[i].summary`.
 *
 * Built once at startup and then shared read-only by every request, so
 * concurrent readers need no locking.
 */
export class CorpusIndex {
  private readonly docs: readonly CorpusDocument[];
  private readonly vectors: readonly EmbeddingVector[];
  private readonly positions: ReadonlyMap<number, number>;

  /**
   * @throws {CorpusLoadError} When documents and embeddings are not aligned
   *   or a DocId repeats.
   */
  public constructor(documents: readonly CorpusDocument[], embeddings: readonly EmbeddingVector[]) {
    if (documents.length !== embeddings.length) {
      throw new CorpusLoadError(
        `Corpus misaligned: ${documents.length} documents but ${embeddings.length} embeddings`,
      );
    }
    embeddings.forEach((e, i) => {
      if (e.position !== i) {
        throw new CorpusLoadError(`Embedding at index ${i} is labelled position ${e.position}`);
      }
    });
    const positions = new Map<number, number>();
    documents.forEach((d, i) => {
      if (positions.has(d.docId)) throw new CorpusLoadError(`Duplicate document id ${d.docId}`);
      positions.set(d.docId, i);
    });

    this.docs = Object.freeze(documents.map((d) => Object.freeze({ ...d })));
    this.vectors = Object.freeze(
      embeddings.map((e) => Object.freeze({ position: e.position, values: Object.freeze([...e.values]) })),
    );
    this.positions = positions;
  }

  public get size(): number {
    return this.docs.length;
  }

  public get documents(): readonly CorpusDocument[] {
    return this.docs;
  }

  public get embeddings(): readonly EmbeddingVector[] {
    return this.vectors;
  }

  /** @throws {RangeError} If `position` is outside the corpus. */
  public documentAt(position: number): CorpusDocument {
    const doc = this.docs[position];
    if (!doc) throw new RangeError(`No document at position ${position}`);
    return doc;
  }

  public positionOf(docId: number): number | undefined {
    return this.positions.get(docId);
  }

  public documentById(docId: number): CorpusDocument | undefined {
    const position = this.positions.get(docId);
    return position === undefined ? undefined : this.docs[position];
  }
}

// Suffixes of the original upload formats, stripped in this order (once each).
const DOCUMENT_SUFFIXES = [".pdf", ".doc", ".docx", ".xls", ".xlsx", ".ppt", ".pptx"];

/** Derive a display title from an uploaded file name. */
export function stripDocumentSuffix(filename: string): string {
  let title = filename;
  for (const suffix of DOCUMENT_SUFFIXES) {
    if (title.endsWith(suffix)) title = title.slice(0, -suffix.length);
  }
  return title;
}

// Strict integer id: optional sign then digits, nothing else (no spaces).
function parseDocId(raw: string): number | undefined {
  if (!/^[+-]?\d+$/.test(raw)) return undefined;
  const n = Number(raw);
  return Number.isSafeInteger(n) ? n : undefined;
}

// "<id>:<rest>" split on the first colon; null when there is none.
function splitEntry(line: string): [string, string] | null {
  const idx = line.indexOf(":");
  if (idx < 0) return null;
  return [line.slice(0, idx), line.slice(idx + 1)];
}

function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

/**
 * Parse the title manifest (`<docId>:<filename>` per line). Lines without a
 * colon or with an unparsable id are skipped.
 */
export function parseTitleManifest(text: string): Map<number, string> {
  const titles = new Map<number, string>();
  for (const line of splitLines(text)) {
    const entry = splitEntry(line);
    if (!entry) continue;
    const docId = parseDocId(entry[0]);
    if (docId === undefined) continue;
    titles.set(docId, stripDocumentSuffix(entry[1]));
  }
  return titles;
}

/**
 * Read the optional title manifest. A missing file means "no titles"; any
 * other read failure aborts startup.
 */
export async function readTitleManifest(file: string): Promise<Map<number, string>> {
  let text: string;
  try {
    text = await fs.readFile(file, "utf8");
  } catch (e) {
    if (isNotFound(e)) return new Map();
    throw new CorpusLoadError(`Failed to read title manifest ${file}: ${errorMessage(e)}`, {
      cause: e,
    });
  }
  return parseTitleManifest(text);
}

export interface SummaryEntry {
  docId: number;
  summary: string;
}

/**
 * Parse the summary manifest (`<docId>:<summary>` per line). Lines without a
 * colon are skipped, but an id that is not an integer aborts the whole load.
 *
 * @throws {CorpusLoadError} On an unparsable id.
 */
export function parseSummaryManifest(text: string): SummaryEntry[] {
  const entries: SummaryEntry[] = [];
  splitLines(text).forEach((line, i) => {
    const entry = splitEntry(line);
    if (!entry) return;
    const docId = parseDocId(entry[0]);
    if (docId === undefined) {
      throw new CorpusLoadError(`Summary manifest line ${i + 1}: invalid document id "${entry[0]}"`);
    }
    entries.push({ docId, summary: entry[1] });
  });
  return entries;
}

export interface LoadCorpusOptions {
  summaryFile: string;
  /** Directory holding one `<docId>.md` content file per document. */
  markdownDir: string;
  /** Optional title manifest; defaults to `<markdownDir>/files.txt`. */
  titleFile?: string;
  embeddings: EmbeddingClient;
  /** Summaries per embedding request (default 32). */
  batchSize?: number;
  verbose?: boolean;
  status?: StatusManager;
}

/**
 * Build the {@link CorpusIndex}: read both manifests and every content file,
 * then embed all summaries in order-preserving batches. Any failure aborts
 * startup; there is no partial corpus.
 */
export async function loadCorpus(opts: LoadCorpusOptions): Promise<CorpusIndex> {
  const status = opts.status ?? statusManager;
  const batchSize = Math.max(1, opts.batchSize ?? 32);
  const titles = await readTitleManifest(opts.titleFile ?? path.join(opts.markdownDir, "files.txt"));

  let manifest: string;
  try {
    manifest = await fs.readFile(opts.summaryFile, "utf8");
  } catch (e) {
    throw new CorpusLoadError(
      `Failed to read summary manifest ${opts.summaryFile}: ${errorMessage(e)}`,
      { cause: e },
    );
  }

  const documents: CorpusDocument[] = [];
  const seen = new Set<number>();
  for (const { docId, summary } of parseSummaryManifest(manifest)) {
    if (seen.has(docId)) throw new CorpusLoadError(`Duplicate document id ${docId} in summary manifest`);
    seen.add(docId);

    const file = path.join(opts.markdownDir, `${docId}.md`);
    let content: string;
    try {
      content = await fs.readFile(file, "utf8");
    } catch (e) {
      throw new CorpusLoadError(`Failed to read document ${file}: ${errorMessage(e)}`, { cause: e });
    }
    const doc: CorpusDocument = { docId, title: titles.get(docId) ?? "", content, summary };
    documents.push(doc);
    if (opts.verbose) console.error(`[RAG][verbose] doc ${doc.docId}: ${doc.title}`);
  }
  status.setDocumentsLoaded(documents.length);

  if (documents.length === 0) {
    throw new CorpusLoadError(`Summary manifest ${opts.summaryFile} lists no documents`);
  }

  console.error(`[RAG] Embedding ${documents.length} document summaries...`);
  const embeddings: EmbeddingVector[] = [];
  for (let start = 0; start < documents.length; start += batchSize) {
    const batch = documents.slice(start, start + batchSize).map((d) => d.summary);
    const vectors = await opts.embeddings.embed(batch);
    vectors.forEach((values, i) => embeddings.push({ position: start + i, values }));
    status.incEmbedded(vectors.length);
    if (opts.verbose) {
      console.error(`[RAG][verbose] Embedded ${embeddings.length}/${documents.length}`);
    }
  }

  const index = new CorpusIndex(documents, embeddings);
  console.error(`[RAG] Corpus ready: ${index.size} documents`);
  status.markReady();
  return index;
}

// fs errors can come from another realm (e.g. under Jest), so no instanceof.
function isNotFound(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";
}
