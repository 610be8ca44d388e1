import type { CorpusIndex } from "./corpus";
import type { EmbeddingClient } from "./embeddings";
import { UpstreamError } from "./errors";
import { formatContext } from "./prompts";
import type { RerankClient } from "./rerank";
import { topSimilar } from "./similarity";
import type { CorpusDocument } from "./types";

/** Question → formatted context. The seam the chat orchestrator and the tool depend on. */
export interface Retriever {
  retrieve(question: string): Promise<string>;
}

export interface RetrievedDocument {
  document: CorpusDocument;
  /** Score assigned by the reranker. */
  relevanceScore: number;
}

export interface RetrievalOptions {
  corpus: CorpusIndex;
  embeddings: EmbeddingClient;
  reranker: RerankClient;
  /** Candidates kept by the cosine pass. */
  topEmb: number;
  /** Documents kept by the rerank pass. */
  topRerank: number;
  verbose?: boolean;
}

/**
 * Two-pass retrieval over the corpus: a cheap cosine filter on summary
 * embeddings, then the remote reranker on the survivors' summaries.
 * Each stage waits for the previous one; any failure propagates and no
 * partial context is returned.
 */
export class RetrievalOrchestrator implements Retriever {
  private readonly corpus: CorpusIndex;
  private readonly embeddings: EmbeddingClient;
  private readonly reranker: RerankClient;
  private readonly topEmb: number;
  private readonly topRerank: number;
  private readonly verbose: boolean;

  public constructor(opts: RetrievalOptions) {
    this.corpus = opts.corpus;
    this.embeddings = opts.embeddings;
    this.reranker = opts.reranker;
    this.topEmb = opts.topEmb;
    this.topRerank = opts.topRerank;
    this.verbose = !!opts.verbose;
  }

  /** Reranked documents for `question`, most relevant first. */
  public async retrieveDocuments(question: string): Promise<RetrievedDocument[]> {
    console.error(`[RAG] question: ${question}`);

    const [queryVector] = await this.embeddings.embed([question]);
    const candidates = topSimilar(queryVector, this.corpus.embeddings, this.topEmb).map((p) =>
      this.corpus.documentAt(p),
    );
    console.error(`[RAG] similar docs (embedding): ${JSON.stringify(candidates.map((d) => d.docId))}`);
    if (candidates.length === 0) return [];

    const reranked = await this.reranker.rerank(
      question,
      candidates.map((d) => d.summary),
      this.topRerank,
    );
    // Rerank positions index the candidate list, not the corpus. The server
    // may ignore top_n or repeat a position: keep the first hit of each, capped.
    const results: RetrievedDocument[] = [];
    const seen = new Set<number>();
    for (const r of reranked) {
      if (results.length >= this.topRerank) break;
      const document = candidates[r.position];
      if (!document) {
        throw new UpstreamError("rerank", `result position ${r.position} is not a candidate`);
      }
      if (seen.has(r.position)) continue;
      seen.add(r.position);
      results.push({ document, relevanceScore: r.relevanceScore });
    }
    console.error(`[RAG] similar docs (rerank): ${JSON.stringify(results.map((r) => r.document.docId))}`);
    if (this.verbose) {
      for (const { document: d } of results) {
        console.error(`[RAG][verbose] doc ${d.docId}|${d.title}:\n${d.summary}`);
      }
    }
    return results;
  }

  public async retrieve(question: string): Promise<string> {
    const results = await this.retrieveDocuments(question);
    return formatContext(results.map((r) => r.document));
  }
}
