/**
 * Embedding providers: the external `embed(text)` capability.
 *
 * - OpenAIEmbeddingProvider: OpenAI embeddings API (text-embedding-3-small by default)
 * - HashingEmbeddingProvider: local TF-IDF hashed into 256 dims, plus taxonomy concept blocks
 *
 * Providers only produce vectors. Caching, validation and error mapping live
 * in EmbeddingService.
 */

import * as crypto from 'crypto';
import OpenAI from 'openai';
import { DEFAULT_HASHING_MODEL, DEFAULT_OPENAI_EMBEDDING_MODEL } from '../../shared/constants';
import { PhraseRecognizer, type AliasEntry } from './taxonomy';

export interface EmbeddingProvider {
  /** Model/version identifier stored beside every cached vector */
  readonly model: string;
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
  embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

// ─── OpenAI ───

/** Max inputs per embeddings request */
const OPENAI_BATCH_SIZE = 2048;
/** Character cap per input, keeps requests under the token limit */
const OPENAI_MAX_CHARS = 8000;

export interface OpenAIEmbeddingOptions {
  apiKey: string;
  model?: string;
  /** Pre-built client, mainly for tests */
  client?: OpenAI;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  private readonly client: OpenAI;

  constructor(options: OpenAIEmbeddingOptions) {
    this.model = options.model ?? DEFAULT_OPENAI_EMBEDDING_MODEL;
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey });
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const [embedding] = await this.request([text], signal);
    if (!embedding) throw new Error('Embeddings API returned no data');
    return embedding;
  }

  async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const results: number[][] = [];
    for (let start = 0; start < texts.length; start += OPENAI_BATCH_SIZE) {
      results.push(...(await this.request(texts.slice(start, start + OPENAI_BATCH_SIZE), signal)));
    }
    return results;
  }

  private async request(input: string[], signal?: AbortSignal): Promise<number[][]> {
    const response = await this.client.embeddings.create(
      { model: this.model, input: input.map((t) => t.slice(0, OPENAI_MAX_CHARS)) },
      { signal },
    );
    // The API reports each vector's input position
    return [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
  }
}

// ─── Local TF-IDF (feature hashing) + concept blocks ───

const HASHING_DIMS = 256;

/** Share of the vector given to each block before the final normalization */
const BLOCK_WEIGHTS = { lexical: 1 / 3, vehicle: 1 / 3, context: 1 / 3 } as const;

/** Normalized aliases of the vehicle and context concepts, from the taxonomy */
export interface ConceptLexicon {
  vehicles: AliasEntry[];
  contexts: AliasEntry[];
}

export interface HashingEmbeddingOptions {
  concepts?: ConceptLexicon;
}

interface ConceptBlock {
  recognizer: PhraseRecognizer;
  /** Canonical id → offset inside the block */
  slots: Map<string, number>;
}

function conceptBlock(aliases: AliasEntry[]): ConceptBlock {
  const canonicals = [...new Set(aliases.map((a) => a.canonical))].sort();
  return {
    recognizer: new PhraseRecognizer(aliases),
    slots: new Map(canonicals.map((canonical, i) => [canonical, i])),
  };
}

function normalizeInPlace(vector: number[], scale = 1): void {
  const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  if (norm === 0) return;
  for (let i = 0; i < vector.length; i++) vector[i] = (vector[i] / norm) * scale;
}

/**
 * Vector = [hashed TF-IDF | vehicle concepts | context concepts].
 *
 * Each block is unit-normalized and weighted, then the whole vector is
 * normalized again. Concepts are taxonomy aliases found in the text; the
 * n-th distinct concept of a block by first mention weighs 1/n, so the
 * violation a question leads with outweighs the ones it adds later.
 * Once fitted, tokens outside the corpus vocabulary carry no weight.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  private idfMap = new Map<string, number>();
  private modelName = DEFAULT_HASHING_MODEL;
  private readonly vehicleBlock: ConceptBlock | null;
  private readonly contextBlock: ConceptBlock | null;

  constructor(private readonly options: HashingEmbeddingOptions = {}) {
    this.vehicleBlock = options.concepts ? conceptBlock(options.concepts.vehicles) : null;
    this.contextBlock = options.concepts ? conceptBlock(options.concepts.contexts) : null;
    if (options.concepts) this.modelName = this.fingerprintedName([]);
  }

  get model(): string {
    return this.modelName;
  }

  get dimensions(): number {
    return HASHING_DIMS + (this.vehicleBlock?.slots.size ?? 0) + (this.contextBlock?.slots.size ?? 0);
  }

  isFitted(): boolean {
    return this.idfMap.size > 0;
  }

  /**
   * Fit IDF weights on the corpus. The model name then carries a fingerprint
   * of the fitted vocabulary and the concept lexicon, so cached vectors from
   * another fit are not reused.
   */
  fit(documents: string[]): void {
    const docCount = documents.length;
    const docFreq = new Map<string, number>();

    for (const doc of documents) {
      for (const token of new Set(this.tokenize(doc))) {
        docFreq.set(token, (docFreq.get(token) ?? 0) + 1);
      }
    }

    this.idfMap.clear();
    for (const [token, df] of docFreq) {
      this.idfMap.set(token, Math.log((docCount + 1) / (df + 1)) + 1);
    }

    this.modelName = this.fingerprintedName([...docFreq.entries()].map(([token, df]) => `${token},${df}`));
  }

  async embed(text: string): Promise<number[]> {
    return this.vectorize(text);
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.vectorize(text));
  }

  private vectorize(text: string): number[] {
    const lexical = this.lexicalBlock(text);
    if (!this.vehicleBlock || !this.contextBlock) {
      normalizeInPlace(lexical);
      return lexical;
    }

    normalizeInPlace(lexical, Math.sqrt(BLOCK_WEIGHTS.lexical));
    const vehicles = this.conceptVector(this.vehicleBlock, text, BLOCK_WEIGHTS.vehicle);
    const contexts = this.conceptVector(this.contextBlock, text, BLOCK_WEIGHTS.context);
    const vector = [...lexical, ...vehicles, ...contexts];
    normalizeInPlace(vector);
    return vector;
  }

  private fingerprintedName(vocabulary: string[]): string {
    const concepts = this.options.concepts;
    const lexicon = concepts ? [...concepts.vehicles, ...concepts.contexts].map((a) => `${a.canonical}=${a.alias}`) : [];
    const fingerprint = crypto
      .createHash('md5')
      .update(vocabulary.sort().join(';'))
      .update('|')
      .update(lexicon.sort().join(';'))
      .digest('hex')
      .slice(0, 8);
    return `${DEFAULT_HASHING_MODEL}@${fingerprint}`;
  }

  private lexicalBlock(text: string): number[] {
    const vector = new Array<number>(HASHING_DIMS).fill(0);
    const fitted = this.isFitted();
    const tokens = this.tokenize(text).filter((token) => !fitted || this.idfMap.has(token));
    const tf = new Map<string, number>();
    for (const token of tokens) {
      tf.set(token, (tf.get(token) ?? 0) + 1);
    }

    for (const [token, count] of tf) {
      const hash = this.simpleHash(token);
      const dim = Math.abs(hash) % HASHING_DIMS;
      const sign = hash > 0 ? 1 : -1;
      const idf = this.idfMap.get(token) ?? Math.log(10);
      vector[dim] += sign * (count / tokens.length) * idf;
    }
    return vector;
  }

  private conceptVector(block: ConceptBlock, text: string, weight: number): number[] {
    const vector = new Array<number>(block.slots.size).fill(0);
    const seen: string[] = [];
    for (const hit of block.recognizer.recognize(text)) {
      if (!seen.includes(hit.canonical)) seen.push(hit.canonical);
    }
    seen.forEach((canonical, rank) => {
      const slot = block.slots.get(canonical);
      if (slot !== undefined) vector[slot] = 1 / (rank + 1);
    });
    normalizeInPlace(vector, Math.sqrt(weight));
    return vector;
  }

  private tokenize(text: string): string[] {
    return text
      .toLowerCase()
      .replace(/[^\p{L}\p{N}\s]/gu, ' ')
      .split(/\s+/)
      .filter((t) => t.length > 1);
  }

  private simpleHash(str: string): number {
    let hash = 0;
    for (let i = 0; i < str.length; i++) {
      hash = ((hash << 5) - hash + str.charCodeAt(i)) | 0;
    }
    return hash;
  }
}
