/**
 * Domain ports for the schema Q&A pipeline.
 *
 * The pipeline only depends on these contracts; concrete adapters live under
 * infrastructure/ and tests substitute in-process fakes.
 */

/** Fixed-length vector produced by an embedding model. */
export type EmbeddingVector = number[];

/** Unit-length (or all-zero) vector used as a similarity-search key. */
export type NormalizedVector = number[];

/** One nearest-neighbour hit. Position in the returned array is its rank. */
export interface RetrievedRow {
  id: number;
  content: string;
  score: number;
}

export interface NewRow {
  content: string;
  embedding: readonly number[];
}

export type PromptRole = "system" | "user";

export interface PromptMessage {
  role: PromptRole;
  content: string;
}

/** Exactly two messages: the system instruction, then the user turn. */
export type SchemaPrompt = [PromptMessage, PromptMessage];

export interface GenerationOptions {
  maxTokens?: number;
  temperature?: number;
}

/** Backend that turns a batch of strings into vectors, one per input. */
export interface EmbeddingModel {
  readonly name: string;
  /** Loads model weights ahead of the first request. */
  init?(): Promise<void>;
  embed(texts: string[]): Promise<EmbeddingVector[]>;
}

export interface Embedder {
  embed(texts: string[]): Promise<EmbeddingVector[]>;
}

/** Storage engine for one named, dimension-typed collection. */
export interface VectorCollection {
  readonly name: string;
  readonly dimension: number;
  findNearest(query: readonly number[], limit: number): RetrievedRow[];
  add(rows: readonly NewRow[]): number;
  count(): number;
  close(): void;
}

export interface VectorIndex {
  findSimilar(query: NormalizedVector, k: number): Promise<RetrievedRow[]>;
}

export interface LLMPort {
  send(messages: readonly PromptMessage[], options?: GenerationOptions): Promise<string>;
}
