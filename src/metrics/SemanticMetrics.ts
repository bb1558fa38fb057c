import lexicon from './data/text-metrics-lexicon.json';
import { TfidfVectorizer, EmptyVocabularyError, cosineSimilarity } from './tfidf.js';
import { Logger, silentLogger } from '../core/logger.js';
import { describeError } from '../core/errors.js';
import { jaccard, splitSentences } from '../utils/text-utils.js';

export type SimilarityMethod = 'tfidf' | 'jaccard';

export interface SimilarityResult {
  /** In [0, 1]. */
  score: number;
  method: SimilarityMethod;
}

export interface SemanticAnalysis {
  semanticDensity: number;
  coherenceScore: number;
  complexityScore: number;
  keyConcepts: string[];
}

const CONNECTIVES: ReadonlySet<string> = new Set(lexicon.connectives);
const MAX_KEY_CONCEPTS = 5;

function clamp01(value: number): number {
  return Math.max(0, Math.min(value, 1));
}

function whitespaceWords(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}

function lowerWordSet(text: string): Set<string> {
  return new Set(whitespaceWords(text.toLowerCase()));
}

/**
 * Meaning-preservation measures between and within texts.
 *
 * Similarity is TF-IDF cosine over the pair; texts made only of stop words
 * have no vocabulary, and those pairs fall back to word-set Jaccard.
 */
export class SemanticMetrics {
  private readonly vectorizer: TfidfVectorizer;
  private readonly logger: Logger;

  constructor(options: { vectorizer?: TfidfVectorizer; logger?: Logger } = {}) {
    this.vectorizer = options.vectorizer ?? new TfidfVectorizer();
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Score in [0, 1]. Text without words, whitespace-only included, scores 0
   * even against itself.
   */
  calculateSimilarity(a: string, b: string): number {
    return this.compareTexts(a, b).score;
  }

  /**
   * Similarity plus the method that produced it.
   */
  compareTexts(a: string, b: string): SimilarityResult {
    if (a.length === 0 || b.length === 0) {
      return { score: 0, method: 'tfidf' };
    }

    try {
      const { vectors } = this.vectorizer.fitTransform([a, b]);
      return { score: clamp01(cosineSimilarity(vectors[0], vectors[1])), method: 'tfidf' };
    } catch (error) {
      if (!(error instanceof EmptyVocabularyError)) {
        this.logger.warn('TF-IDF similarity failed, using word overlap', {
          error: describeError(error),
        });
      }
      return { score: jaccard(lowerWordSet(a), lowerWordSet(b)), method: 'jaccard' };
    }
  }

  analyzeSemanticContent(text: string): SemanticAnalysis {
    return {
      semanticDensity: this.calculateSemanticDensity(text),
      coherenceScore: this.calculateCoherence(text),
      complexityScore: this.calculateComplexity(text),
      keyConcepts: this.extractKeyConcepts(text),
    };
  }

  /**
   * `min(2 * lexicalDiversity, 1)`.
   */
  calculateSemanticDensity(text: string): number {
    const words = whitespaceWords(text);
    if (words.length === 0) {
      return 0;
    }
    return Math.min((new Set(words).size / words.length) * 2, 1);
  }

  /**
   * Connective words per sentence, capped at 1. A single sentence is
   * trivially coherent.
   */
  calculateCoherence(text: string): number {
    const sentences = splitSentences(text);
    if (sentences.length < 2) {
      return 1;
    }
    const connectives = whitespaceWords(text.toLowerCase()).filter((word) =>
      CONNECTIVES.has(word.replace(/[^\p{L}]/gu, ''))
    ).length;
    return Math.min(connectives / sentences.length, 1);
  }

  calculateComplexity(text: string): number {
    const words = whitespaceWords(text);
    if (words.length === 0) {
      return 0;
    }
    const sentenceCount = Math.max(splitSentences(text).length, 1);
    const averageSentenceLength = words.length / sentenceCount;
    const averageWordLength =
      words.reduce((sum, word) => sum + word.length, 0) / words.length;

    const sentenceComplexity = Math.min(averageSentenceLength / 20, 1);
    const lexicalComplexity = Math.min((averageWordLength - 3) / 5, 1);
    return (sentenceComplexity + lexicalComplexity) / 2;
  }

  /**
   * Highest-weighted TF-IDF terms; without a vocabulary, the rarest and
   * then longest words.
   */
  extractKeyConcepts(text: string, maxConcepts = MAX_KEY_CONCEPTS): string[] {
    if (text.trim().length === 0) {
      return [];
    }

    try {
      const { vocabulary, vectors } = this.vectorizer.fitTransform([text]);
      const scores = vectors[0];
      return vocabulary
        .map((term, i) => ({ term, score: scores[i] }))
        .filter(({ score }) => score > 0)
        .sort((a, b) => b.score - a.score || a.term.localeCompare(b.term))
        .slice(0, maxConcepts)
        .map(({ term }) => term);
    } catch (error) {
      if (!(error instanceof EmptyVocabularyError)) {
        throw error;
      }
      return this.frequencyRanking(text, maxConcepts);
    }
  }

  private frequencyRanking(text: string, maxConcepts: number): string[] {
    const frequency = new Map<string, number>();
    for (const word of whitespaceWords(text.toLowerCase())) {
      frequency.set(word, (frequency.get(word) ?? 0) + 1);
    }
    return [...frequency.keys()]
      .sort(
        (a, b) =>
          (frequency.get(a) ?? 0) - (frequency.get(b) ?? 0) || b.length - a.length
      )
      .slice(0, maxConcepts);
  }
}
