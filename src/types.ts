/**
 * Shared document / vector / chat types used throughout the corpus, retrieval
 * and chat layers.
 */
export interface CorpusDocument {
  /** Integer id from the summary manifest; also names the content file (`<docId>.md`). */
  readonly docId: number;
  /** Title derived from the title manifest's filename; empty when unknown. */
  readonly title: string;
  /** Full document text, injected into the answer prompt. */
  readonly content: string;
  /** Short text used for embedding and reranking. */
  readonly summary: string;
}

/** Embedding of the corpus entry (or query) at `position`. */
export interface EmbeddingVector {
  readonly position: number;
  readonly values: readonly number[];
}

/** Per-query cosine score of one corpus position. */
export interface ScoredCandidate {
  position: number;
  score: number;
}

/** Reranker output; `position` indexes the documents passed to that rerank call. */
export interface RerankResult {
  position: number;
  relevanceScore: number;
}

export type ChatRole = "system" | "user" | "assistant";

export interface ChatTurn {
  role: ChatRole;
  content: string;
}

/** Optional sampling knobs carried from the inbound request to upstream chat calls. */
export interface SamplingOptions {
  temperature?: number;
  top_p?: number;
  max_tokens?: number;
  presence_penalty?: number;
  frequency_penalty?: number;
  stop?: string | string[];
  seed?: number;
}
