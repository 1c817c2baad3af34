import { Evidence, EvidenceInventory } from '../types';
import { EmbeddingsProvider, OracleMessage } from '../llm/Oracle';
import { ReasoningClient } from '../llm/ReasoningClient';
import { replyValidator } from '../llm/jsonReply';
import { Redactor } from './Redactor';
import { EvidenceStore } from './EvidenceStore';
import { Logger, silentLogger } from '../logging/Logger';
import { InvestigationError, describeError } from '../errors';

export const RAW_EXCERPT_LIMIT = 5000;

const RERANK_POOL = 20;
const SEMANTIC_WEIGHT = 0.7;
const KEYWORD_WEIGHT = 0.3;
const KEYWORD_SATURATION = 10;

const STOPWORDS = new Set([
  'the', 'is', 'are', 'was', 'were', 'what', 'when', 'where', 'how', 'why',
  'can', 'you', 'show', 'me', 'a', 'an', 'this', 'that', 'there', 'does', 'with'
]);

export function extractKeywords(question: string): string[] {
  return question
    .toLowerCase()
    .split(/\s+/)
    .map(word => word.replace(/^[^\w!]+|[^\w]+$/g, ''))
    .filter(word => word.length > 3 && !STOPWORDS.has(word));
}

function countOccurrences(haystack: string, needle: string): number {
  let count = 0;
  let from = haystack.indexOf(needle);
  while (from !== -1) {
    count++;
    from = haystack.indexOf(needle, from + needle.length);
  }
  return count;
}

export function keywordScore(keywords: string[], evidence: Evidence & { summary: string }): number {
  const text = `${evidence.command} ${evidence.summary}`.toLowerCase();
  return keywords.reduce((sum, kw) => sum + countOccurrences(text, kw), 0);
}

/** 70% semantic similarity, 30% keyword hits saturating at ten. */
export function hybridScore(similarity: number, keywordHits: number): number {
  return SEMANTIC_WEIGHT * similarity + KEYWORD_WEIGHT * Math.min(keywordHits / KEYWORD_SATURATION, 1);
}

export function cosineSimilarity(a: number[], b: number[]): number {
  const n = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < n; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** Head of a raw output with a marker saying how much was cut. */
export function excerpt(output: string, limit: number = RAW_EXCERPT_LIMIT): string {
  if (output.length <= limit) return output;
  return `${output.slice(0, limit)}\n\n[... truncated ${output.length - limit} chars ...]`;
}

function hasSummary(e: Evidence): e is Evidence & { summary: string } {
  return typeof e.summary === 'string' && e.summary.trim().length > 0;
}

export function embeddingText(e: Evidence & { summary: string }): string {
  return `Command: ${e.command}\nSummary: ${e.summary}`;
}

interface RerankReply {
  indices: number[];
}

const rerankReply = replyValidator<RerankReply>('Rerank', {
  type: 'object',
  properties: {
    indices: { type: 'array', items: { type: 'integer' } }
  },
  required: ['indices']
});

function rerankMessages(question: string, pool: Array<Evidence & { summary: string }>, topK: number): OracleMessage[] {
  const listing = pool.map((e, i) => `[${i}] ${e.command}: ${e.summary}`).join('\n');
  return [
    { role: 'system', content: 'You rank debugger evidence by relevance. Reply with a single JSON object.' },
    {
      role: 'user',
      content: `QUESTION: ${question}

EVIDENCE:
${listing}

Pick the ${topK} entries that best help answer the question, most relevant first.

Reply with JSON:
{"indices": [0, 1]}`
    }
  ];
}

export interface RetrieverOptions {
  redactor?: Redactor;
  store?: EvidenceStore;
  reranker?: ReasoningClient;
  logger?: Logger;
}

interface Scored {
  evidence: Evidence & { summary: string };
  order: number;
  score: number;
}

/**
 * Ranks a session's evidence against a natural-language question.
 * Entries without a usable summary are never ranked, but prompts still show
 * an excerpt of their raw output.
 */
export class EvidenceRetriever {
  private logger: Logger;
  private vectors = new WeakMap<Evidence, number[]>();

  constructor(private embeddings: EmbeddingsProvider | null, private options: RetrieverOptions = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  async findRelevant(
    question: string,
    inventory: EvidenceInventory,
    topK: number,
    useEmbeddings: boolean
  ): Promise<Evidence[]> {
    const candidates = Object.values(inventory).flat().filter(hasSummary);
    if (candidates.length === 0 || topK <= 0) {
      return [];
    }

    const keywords = extractKeywords(question);
    const hits = candidates.map(e => keywordScore(keywords, e));

    let scored: Scored[] | null = null;
    if (useEmbeddings && this.embeddings) {
      const similarity = await this.embeddingScores(question, candidates);
      if (similarity) {
        scored = candidates.map((evidence, order) => ({ evidence, order, score: hybridScore(similarity[order], hits[order]) }));
      }
    }
    if (scored === null) {
      scored = candidates
        .map((evidence, order) => ({ evidence, order, score: hits[order] }))
        .filter(s => s.score > 0);
    }

    const pool = scored
      .sort((a, b) => b.score - a.score || a.order - b.order)
      .slice(0, RERANK_POOL)
      .map(s => s.evidence);

    return pool.length > topK ? this.rerank(question, pool, topK) : pool;
  }

  /** Renders evidence for an oracle prompt, one block per entry. */
  async formatForPrompt(evidence: Evidence[]): Promise<string> {
    if (evidence.length === 0) return '(no evidence collected yet)';
    const blocks = await Promise.all(evidence.map(async (e, i) => {
      const lines = [`[${i + 1}] ${e.command} (confidence: ${e.confidence})`, `    Finding: ${e.finding}`];
      if (e.summary) {
        lines.push(`    Summary: ${e.summary}`);
      } else {
        lines.push('    Output:', ...(await this.rawExcerpt(e)).split('\n').map(l => (l ? `      ${l}` : l)));
      }
      if (e.significance) lines.push(`    Significance: ${e.significance}`);
      return lines.join('\n');
    }));
    return blocks.join('\n');
  }

  // Output was redacted before it was stored
  private async rawExcerpt(e: Evidence): Promise<string> {
    const ref = e.outputRef;
    if (ref.kind === 'inline') return excerpt(ref.text);
    if (!this.options.store) return `(${ref.size} chars stored as ${ref.evidenceId})`;
    try {
      return excerpt(await this.options.store.resolve(ref));
    } catch (error) {
      this.logger.warn(`Could not load output of ${e.command}: ${describeError(error)}`);
      return `(output unavailable: ${describeError(error)})`;
    }
  }

  private async rerank(question: string, pool: Array<Evidence & { summary: string }>, topK: number): Promise<Evidence[]> {
    const reranker = this.options.reranker;
    if (!reranker) return pool.slice(0, topK);

    try {
      const reply = await reranker.askJson(rerankMessages(question, pool, topK), rerankReply, { temperature: 0 });
      const picked = [...new Set(reply.indices)]
        .filter(i => i >= 0 && i < pool.length)
        .map(i => pool[i]);
      return picked.length > 0 ? picked.slice(0, topK) : pool.slice(0, topK);
    } catch (error) {
      if (error instanceof InvestigationError && !error.fatal) {
        this.logger.debug(`Rerank unavailable, keeping score order: ${error.message}`);
        return pool.slice(0, topK);
      }
      throw error;
    }
  }

  private async embeddingScores(question: string, candidates: Array<Evidence & { summary: string }>): Promise<number[] | null> {
    const provider = this.embeddings;
    if (!provider) return null;

    const redactor = this.options.redactor;
    const clean = (text: string) => (redactor ? redactor.redact(text).redacted : text);
    const missing = candidates.filter(e => !e.embedding && !this.vectors.has(e));

    try {
      const [questionVector, ...computed] = await provider.embed([
        clean(question),
        ...missing.map(e => clean(embeddingText(e)))
      ]);
      if (!questionVector || computed.length !== missing.length) {
        throw new Error(`embeddings provider returned ${computed.length + (questionVector ? 1 : 0)} vectors for ${missing.length + 1} inputs`);
      }
      missing.forEach((e, i) => this.vectors.set(e, computed[i]));
      return candidates.map(e => cosineSimilarity(questionVector, e.embedding ?? this.vectors.get(e) ?? []));
    } catch (error) {
      this.logger.warn(`Embedding ranking unavailable, using keyword ranking: ${describeError(error)}`);
      return null;
    }
  }
}
