import { Pinecone, RecordMetadata, ScoredPineconeRecord } from '@pinecone-database/pinecone';
import { Embedder } from './openai.service';
import { RETRIEVAL } from '../config/studio';
import { logger, errorMessage } from '../utils/logger';

export type RetrievalIndex = 'conversations' | 'pricing';

export interface RetrievedExample {
  query: string;
  response: string;
  similarity: number;
  intent: string;
}

export interface RetrievalOptions {
  index?: RetrievalIndex;
  /** Restricts the first query to examples tagged with this intent. */
  intent?: string;
  topK?: number;
}

function toExample(match: ScoredPineconeRecord<RecordMetadata>): RetrievedExample | null {
  const metadata = match.metadata;
  if (!metadata || typeof metadata.query !== 'string' || typeof metadata.response !== 'string') {
    return null;
  }
  return {
    query: metadata.query,
    response: metadata.response,
    similarity: match.score ?? 0,
    intent: typeof metadata.intent === 'string' ? metadata.intent : 'unknown',
  };
}

/**
 * Few-shot examples from past studio conversations. Retrieval only enriches
 * the prompt, so an outage degrades to no examples rather than failing the
 * turn.
 */
export class RetrievalService {
  constructor(
    private pinecone: Pinecone | null,
    private embedder: Embedder,
    private indexNames: Record<RetrievalIndex, string>
  ) {}

  async retrieveSimilar(text: string, options: RetrievalOptions = {}): Promise<RetrievedExample[]> {
    if (!this.pinecone || !text.trim()) {
      return [];
    }

    const { index = 'conversations', intent, topK = RETRIEVAL.topK } = options;

    try {
      const vector = await this.embedder.embed(text);
      const pineconeIndex = this.pinecone.index(this.indexNames[index]);
      const query = (filter?: object) =>
        pineconeIndex.query({ vector, topK, includeMetadata: true, filter });

      const passing = (matches: ScoredPineconeRecord<RecordMetadata>[]): RetrievedExample[] =>
        matches
          .filter((m) => (m.score ?? 0) > RETRIEVAL.minScore)
          .map(toExample)
          .filter((e): e is RetrievedExample => e !== null);

      const first = await query(intent ? { intent: { $eq: intent } } : undefined);
      const examples = passing(first.matches ?? []);

      if (intent && examples.length < RETRIEVAL.minFilteredMatches) {
        const broad = await query();
        for (const example of passing(broad.matches ?? [])) {
          if (examples.length >= topK) break;
          if (!examples.some((e) => e.query === example.query)) {
            examples.push(example);
          }
        }
      }

      logger.debug('Retrieved similar conversations', { index, intent, count: examples.length });
      return examples;
    } catch (error: unknown) {
      logger.warn('Retrieval failed, continuing without examples', { index, error: errorMessage(error) });
      return [];
    }
  }
}
