import englishStopWords from './data/english-stop-words.json';

export const ENGLISH_STOP_WORDS: ReadonlySet<string> = new Set(englishStopWords);

export interface TfidfOptions {
  stopWords?: ReadonlySet<string>;
  /** Largest n-gram length; 1 means unigrams only. */
  maxNgram?: number;
  maxFeatures?: number;
}

export interface TfidfMatrix {
  /** Feature terms, alphabetical. */
  vocabulary: string[];
  /** One L2-normalized row per input document, aligned with `vocabulary`. */
  vectors: number[][];
}

/**
 * Raised when no document yields a single term after stop-word removal.
 */
export class EmptyVocabularyError extends Error {
  constructor() {
    super('Empty vocabulary: documents contain only stop words');
    this.name = 'EmptyVocabularyError';
  }
}

const TOKEN = /[\p{L}\p{N}_]{2,}/gu;

function increment(map: Map<string, number>, key: string, by = 1): void {
  map.set(key, (map.get(key) ?? 0) + by);
}

/**
 * Term-frequency / inverse-document-frequency vectorizer fitted per call.
 *
 * Documents are lower-cased and split into runs of two or more word
 * characters; stop words are removed before n-grams are formed. IDF is
 * smoothed, `ln((1 + n) / (1 + df)) + 1`, and rows are L2-normalized.
 */
export class TfidfVectorizer {
  private readonly stopWords: ReadonlySet<string>;
  private readonly maxNgram: number;
  private readonly maxFeatures: number;

  constructor(options: TfidfOptions = {}) {
    this.stopWords = options.stopWords ?? ENGLISH_STOP_WORDS;
    this.maxNgram = options.maxNgram ?? 2;
    this.maxFeatures = options.maxFeatures ?? 1000;
  }

  /**
   * Words that survive stop-word removal, in order.
   */
  tokenize(document: string): string[] {
    const words = document.toLowerCase().match(TOKEN) ?? [];
    return words.filter((word) => !this.stopWords.has(word));
  }

  /**
   * Unigrams through `maxNgram`-grams of a document.
   */
  terms(document: string): string[] {
    const words = this.tokenize(document);
    const terms: string[] = [...words];
    for (let n = 2; n <= this.maxNgram; n++) {
      for (let i = 0; i + n <= words.length; i++) {
        terms.push(words.slice(i, i + n).join(' '));
      }
    }
    return terms;
  }

  /**
   * @throws {EmptyVocabularyError} When no document has any term
   */
  fitTransform(documents: readonly string[]): TfidfMatrix {
    const counts = documents.map((document) => {
      const termCounts = new Map<string, number>();
      for (const term of this.terms(document)) {
        increment(termCounts, term);
      }
      return termCounts;
    });

    const corpusFrequency = new Map<string, number>();
    const documentFrequency = new Map<string, number>();
    for (const termCounts of counts) {
      for (const [term, count] of termCounts) {
        increment(corpusFrequency, term, count);
        increment(documentFrequency, term);
      }
    }

    if (corpusFrequency.size === 0) {
      throw new EmptyVocabularyError();
    }

    const vocabulary = this.limitFeatures(corpusFrequency);
    const n = documents.length;
    const idf = vocabulary.map(
      (term) => Math.log((1 + n) / (1 + (documentFrequency.get(term) ?? 0))) + 1
    );

    const vectors = counts.map((termCounts) =>
      l2Normalize(vocabulary.map((term, i) => (termCounts.get(term) ?? 0) * idf[i]))
    );

    return { vocabulary, vectors };
  }

  private limitFeatures(corpusFrequency: Map<string, number>): string[] {
    let terms = [...corpusFrequency.keys()];
    if (terms.length > this.maxFeatures) {
      terms = terms
        .sort(
          (a, b) =>
            (corpusFrequency.get(b) ?? 0) - (corpusFrequency.get(a) ?? 0) ||
            a.localeCompare(b)
        )
        .slice(0, this.maxFeatures);
    }
    return terms.sort();
  }
}

export function l2Normalize(vector: number[]): number[] {
  const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
  return norm === 0 ? vector : vector.map((value) => value / norm);
}

/**
 * Cosine similarity of two equal-length vectors; 0 when either is all zeros.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
