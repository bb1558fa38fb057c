/**
 * Unit Tests for StructuralOptimizationStrategy
 *
 * Tests cover:
 * - Part classification and splitting
 * - Section ordering and headers
 * - Instruction numbering and merging
 * - Constraint bullets, example labels and output format prefix
 * - Structure, duplication and formatting scores
 */

import { describe, it, expect } from '@jest/globals';
import { StructuralOptimizationStrategy } from '../../../src/strategies/StructuralOptimizationStrategy.js';

const FOUR_PART_PROMPT =
  'Background: we run a small shop.\n\n' +
  'Write a summary of last month.\n\n' +
  'Do not mention prices.\n\n' +
  'Format the answer as a table.';

describe('StructuralOptimizationStrategy', () => {
  const strategy = new StructuralOptimizationStrategy();

  describe('classify', () => {
    it('should recognise each section kind', () => {
      expect(strategy.classify('Background: we run a small shop.')).toBe('context');
      expect(strategy.classify('Write a summary of last month.')).toBe('instructions');
      expect(strategy.classify('Do not mention prices.')).toBe('constraints');
      expect(strategy.classify('For example, cat.')).toBe('examples');
      expect(strategy.classify('Format the answer as a table.')).toBe('output_format');
      expect(strategy.classify('Hello there.')).toBe('other');
    });
  });

  describe('splitParts', () => {
    it('should prefer paragraphs and fall back to sentences', () => {
      expect(strategy.splitParts('A b.\n\nC d.')).toEqual(['A b.', 'C d.']);
      expect(strategy.splitParts('A b. C d.')).toEqual(['A b.', 'C d.']);
    });

    it('should split lines when there are no blank lines', () => {
      expect(strategy.splitParts('A b.\nC d.')).toEqual(['A b.', 'C d.']);
    });

    it('should keep a list together with its lead-in line', () => {
      const prompt = 'Follow these steps:\n1. Read the file.\n2. Summarize the file.';

      expect(strategy.splitParts(prompt)).toEqual([prompt]);
    });
  });

  describe('Sections', () => {
    it('should add headers when more than two sections survive', () => {
      expect(strategy.apply(FOUR_PART_PROMPT)).toBe(
        'Context:\nBackground: we run a small shop.\n\n' +
          'Instructions:\nWrite a summary of last month.\n\n' +
          'Constraints:\nDo not mention prices.\n\n' +
          'Output Format:\nFormat the answer as a table.'
      );
    });

    it('should omit headers when disabled', () => {
      const plain = new StructuralOptimizationStrategy({
        customParams: { sectionHeaders: false },
      });

      expect(plain.apply(FOUR_PART_PROMPT)).toBe(FOUR_PART_PROMPT);
    });

    it('should reorder sections into canonical order', () => {
      expect(
        strategy.apply('Format the answer as a table.\n\nBackground: we run a small shop.')
      ).toBe('Background: we run a small shop.\n\nFormat the answer as a table.');
    });
  });

  describe('Section Formatting', () => {
    it('should number three or more instructions', () => {
      expect(
        strategy.apply('Write a haiku about rain. Translate it to French. Summarize the mood.')
      ).toBe('1. Write a haiku about rain\n2. Translate it to French\n3. Summarize the mood');
    });

    it('should leave a numbered list intact', () => {
      const prompt =
        '1. Read the file.\n2. Summarize the file.\n3. List the three most important points.';

      expect(strategy.splitParts(prompt)).toEqual([prompt]);
      expect(strategy.apply(prompt)).toBe(prompt);
    });

    it('should merge repeated instructions', () => {
      expect(strategy.apply('Summarize the report. Summarize the report please.')).toBe(
        'Summarize the report.'
      );
    });

    it('should bullet several constraints', () => {
      expect(strategy.apply('Never use slang.\n\nAvoid jargon.')).toBe(
        '- Never use slang.\n- Avoid jargon.'
      );
    });

    it('should label several examples', () => {
      expect(
        strategy.apply('Translate these words.\n\nFor example, cat.\n\nFor instance, dog.')
      ).toBe('Translate these words.\n\nExample 1: For example, cat.\nExample 2: For instance, dog.');
    });

    it('should prefix output requirements without a format marker', () => {
      expect(strategy.apply('Reply with the result in JSON.')).toBe(
        'Output format: Reply with the result in JSON.'
      );
    });
  });

  describe('Scores', () => {
    it('should score structure signals', () => {
      expect(strategy.structureScore('Title: x\n\n- item')).toBe(1);
      expect(strategy.structureScore('plain text')).toBe(0);
    });

    it('should score duplicated sentences', () => {
      expect(strategy.duplicationScore('Same words here. Same words here.')).toBe(1);
      expect(strategy.duplicationScore('Only one.')).toBe(0);
    });

    it('should score formatting signals', () => {
      expect(strategy.formattingScore('Hello.  World')).toBe(1);
      expect(strategy.formattingScore('bad,,  text')).toBeCloseTo(1 / 3, 10);
    });
  });

  describe('canApply and estimateReduction', () => {
    it('should skip short text', () => {
      expect(strategy.canApply('Too short to restructure.')).toBe(false);
      expect(strategy.estimateReduction('Too short to restructure.')).toBe(0);
    });

    it('should charge for added headers', () => {
      // (1 - 2/3) * 0.05 + 0 + 0 - 0.05
      expect(strategy.canApply(FOUR_PART_PROMPT)).toBe(true);
      expect(strategy.estimateReduction(FOUR_PART_PROMPT)).toBeCloseTo(0.05 / 3 - 0.05, 10);
    });
  });
});
