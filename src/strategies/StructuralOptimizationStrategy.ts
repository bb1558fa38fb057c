import lexicon from './lexicon/structural.json';
import { BaseStrategy } from './BaseStrategy.js';
import { OptimizationConfigInput, structuralParamsSchema } from '../validation/schemas.js';
import {
  isListItem,
  splitSentences,
  textJaccard,
  wholeWordPattern,
} from '../utils/text-utils.js';

export type SectionKind =
  | 'context'
  | 'instructions'
  | 'constraints'
  | 'examples'
  | 'output_format'
  | 'other';

/** Canonical output order. */
export const SECTION_ORDER: readonly SectionKind[] = [
  'context',
  'instructions',
  'constraints',
  'examples',
  'output_format',
  'other',
];

type ClassifiedKind = Exclude<SectionKind, 'other'>;

const CLASSIFICATION_ORDER: readonly ClassifiedKind[] = [
  'context',
  'instructions',
  'constraints',
  'examples',
  'output_format',
];

const SECTION_PATTERNS: Record<ClassifiedKind, RegExp[]> = {
  context: lexicon.sectionKeywords.context.map(wholeWordPattern),
  instructions: lexicon.sectionKeywords.instructions.map(wholeWordPattern),
  constraints: lexicon.sectionKeywords.constraints.map(wholeWordPattern),
  examples: lexicon.sectionKeywords.examples.map(wholeWordPattern),
  output_format: lexicon.sectionKeywords.output_format.map(wholeWordPattern),
};

const HEADERS: Record<SectionKind, string> = lexicon.headers;
const OUTPUT_FORMAT_MARKERS = lexicon.outputFormatMarkers.map(wholeWordPattern);

const MIN_LENGTH = 50;
const LIST_MARKER = /^(?:\d+[.)]|[-•*])[ \t]+/;
const BUCKET_DUPLICATE_THRESHOLD = 0.8;
const INSTRUCTION_DUPLICATE_THRESHOLD = 0.7;

function matchesAny(patterns: readonly RegExp[], text: string): boolean {
  return patterns.some((pattern) => {
    pattern.lastIndex = 0;
    return pattern.test(text);
  });
}

function dedupe(items: readonly string[], threshold: number): string[] {
  const unique: string[] = [];
  for (const item of items) {
    if (!unique.some((existing) => textJaccard(item, existing) > threshold)) {
      unique.push(item);
    }
  }
  return unique;
}

/**
 * Reorders a prompt into labelled sections: context, instructions,
 * constraints, examples, output format, then anything unclassified.
 *
 * Clarity comes first here; the result can be longer than the input.
 *
 * Custom params: `sectionHeaders` (default true) allows the section
 * headers added when more than two sections survive.
 */
export class StructuralOptimizationStrategy extends BaseStrategy {
  readonly name = 'structural-optimization';
  protected readonly description =
    'Groups prompt parts into ordered sections and merges repeated instructions';

  private readonly sectionHeaders: boolean;

  constructor(config: OptimizationConfigInput = {}) {
    super(config);
    this.sectionHeaders = this.params(structuralParamsSchema).sectionHeaders;
  }

  protected transform(text: string): string {
    const sections = this.buildSections(text);
    const withHeaders = this.sectionHeaders && sections.size > 2;

    return [...sections.entries()]
      .map(([kind, content]) => (withHeaders ? `${HEADERS[kind]}\n${content}` : content))
      .join('\n\n')
      .trim();
  }

  /**
   * May be negative: adding headers costs tokens.
   */
  estimateReduction(text: string): number {
    if (!this.canApply(text)) {
      return 0;
    }

    const estimate =
      (1 - this.structureScore(text)) * 0.05 +
      this.duplicationScore(text) * 0.15 +
      (1 - this.formattingScore(text)) * 0.02;
    const headerCost = this.sectionHeaders && this.buildSections(text).size > 2 ? 0.05 : 0;
    return this.capEstimate(estimate - headerCost, Infinity);
  }

  canApply(text: string): boolean {
    if (typeof text !== 'string' || text.trim().length < MIN_LENGTH) {
      return false;
    }
    return (
      this.structureScore(text) < 0.8 ||
      this.duplicationScore(text) > 0.1 ||
      this.formattingScore(text) < 0.7
    );
  }

  /**
   * Paragraphs; without blank lines, lines; on a single line, sentences.
   * A list stays in one part with the line that introduces it.
   */
  splitParts(text: string): string[] {
    const paragraphs = text
      .split(/\n[ \t]*\n/)
      .map((part) => part.trim())
      .filter((part) => part.length > 0);
    if (paragraphs.length > 1) {
      return paragraphs;
    }

    const lines = text
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
    if (lines.length < 2) {
      return splitSentences(text);
    }

    const parts: string[] = [];
    lines.forEach((line, i) => {
      const previous = i > 0 ? lines[i - 1] : undefined;
      const continuesList =
        previous !== undefined &&
        isListItem(line) &&
        (isListItem(previous) || previous.endsWith(':'));
      if (continuesList && parts.length > 0) {
        parts[parts.length - 1] += `\n${line}`;
      } else {
        parts.push(line);
      }
    });
    return parts;
  }

  classify(part: string): SectionKind {
    return (
      CLASSIFICATION_ORDER.find((kind) => matchesAny(SECTION_PATTERNS[kind], part)) ??
      'other'
    );
  }

  /**
   * Formatted, non-empty sections in canonical order.
   */
  private buildSections(text: string): Map<SectionKind, string> {
    const buckets = new Map<SectionKind, string[]>();
    for (const part of this.splitParts(text)) {
      const kind = this.classify(part);
      buckets.set(kind, [...(buckets.get(kind) ?? []), part]);
    }

    const sections = new Map<SectionKind, string>();
    for (const kind of SECTION_ORDER) {
      let items = dedupe(buckets.get(kind) ?? [], BUCKET_DUPLICATE_THRESHOLD);
      if (kind === 'instructions') {
        items = this.mergeInstructions(items);
      }
      if (items.length > 0) {
        sections.set(kind, this.format(kind, items));
      }
    }
    return sections;
  }

  /**
   * Drop instruction sentences that repeat an earlier instruction sentence.
   * Line breaks inside an item are kept.
   */
  private mergeInstructions(items: readonly string[]): string[] {
    const kept: string[] = [];
    const isNew = (sentence: string): boolean => {
      const repeated = kept.some(
        (earlier) => textJaccard(sentence, earlier) > INSTRUCTION_DUPLICATE_THRESHOLD
      );
      if (!repeated) {
        kept.push(sentence);
      }
      return !repeated;
    };

    return items
      .map((item) =>
        item
          .split('\n')
          .map((line) => splitSentences(line).filter(isNew).join(' '))
          .filter((line) => line.length > 0)
          .join('\n')
      )
      .filter((item) => item.length > 0);
  }

  private format(kind: SectionKind, items: readonly string[]): string {
    switch (kind) {
      case 'instructions':
        return items.length > 2
          ? items
              .map((item, i) => `${i + 1}. ${item.replace(LIST_MARKER, '').replace(/\.+$/, '')}`)
              .join('\n')
          : items.join(' ');
      case 'constraints':
        return items.length > 1
          ? items.map((item) => (/^[-•*]/.test(item) ? item : `- ${item}`)).join('\n')
          : items[0];
      case 'examples':
        return items.length > 1
          ? items.map((item, i) => `Example ${i + 1}: ${item}`).join('\n')
          : items[0];
      case 'output_format': {
        const content = items.join(' ');
        return matchesAny(OUTPUT_FORMAT_MARKERS, content)
          ? content
          : `Output format: ${content}`;
      }
      default:
        return items.join(' ');
    }
  }

  /**
   * Share of structure signals present: headers, paragraphs, lists.
   */
  structureScore(text: string): number {
    const hasHeaders = /^\p{Lu}[^:\n]*:/mu.test(text);
    const hasParagraphs = /\n[ \t]*\n/.test(text);
    const hasLists = /^[ \t]*(?:[-•*]|\d+[.)])[ \t]/m.test(text);
    return [hasHeaders, hasParagraphs, hasLists].filter(Boolean).length / 3;
  }

  /**
   * Share of sentence pairs with Jaccard similarity above 0.7.
   */
  duplicationScore(text: string): number {
    const sentences = splitSentences(text);
    if (sentences.length < 2) {
      return 0;
    }

    let duplicates = 0;
    let pairs = 0;
    for (let i = 0; i < sentences.length; i++) {
      for (let j = i + 1; j < sentences.length; j++) {
        if (textJaccard(sentences[i], sentences[j]) > INSTRUCTION_DUPLICATE_THRESHOLD) {
          duplicates++;
        }
        pairs++;
      }
    }
    return duplicates / pairs;
  }

  /**
   * Share of formatting signals present: even spacing, separated sentences,
   * no doubled punctuation.
   */
  formattingScore(text: string): number {
    const evenSpacing = !/[ \t]{3,}/.test(text);
    const separatedSentences = /[.!?]\s+\p{Lu}/u.test(text);
    const cleanPunctuation = !/[,.!?]{2,}/.test(text);
    return [evenSpacing, separatedSentences, cleanPunctuation].filter(Boolean).length / 3;
  }
}
