import { describe, expect, it } from '@jest/globals';
import { createPendingQuestion } from './answer-orchestrator.service.js';
import { assembleResponseDocument } from './response-assembler.js';
import { IncompleteResponseError } from './rfp.errors.js';
import type { AnsweredQuestion } from './rfp.types.js';

const GENERATED_AT = new Date(Date.UTC(2026, 9, 5, 14, 30, 0));

const answered = (
  index: number,
  overrides: Partial<AnsweredQuestion> = {},
): AnsweredQuestion => ({
  ...createPendingQuestion(`Question number ${index}?`, index),
  generatedAnswer: `Generated ${index}`,
  editedAnswer: `Edited ${index}`,
  confidenceScore: 0.85,
  status: 'completed',
  ...overrides,
});

describe('assembleResponseDocument', () => {
  it('should order questions by index', () => {
    const document = assembleResponseDocument(
      [answered(2), answered(1)],
      'Summary text',
      { generatedAt: GENERATED_AT },
    );

    expect(document.title).toBe('RFP Response');
    expect(document.generatedAt).toBe(GENERATED_AT);
    expect(document.summary).toBe('Summary text');
    expect(document.questions.map((q) => q.index)).toEqual([1, 2]);
  });

  it('should use the custom title when given', () => {
    const document = assembleResponseDocument([answered(1)], '', {
      title: 'Acme Proposal',
      generatedAt: GENERATED_AT,
    });

    expect(document.title).toBe('Acme Proposal');
  });

  it('should choose the edited answer, then the generated one, then nothing', () => {
    const document = assembleResponseDocument(
      [
        answered(1),
        answered(2, { editedAnswer: '' }),
        answered(3, { editedAnswer: '', generatedAnswer: '' }),
      ],
      '',
      { generatedAt: GENERATED_AT },
    );

    expect(document.questions.map((q) => q.answer)).toEqual([
      'Edited 1',
      'Generated 2',
      '',
    ]);
  });

  it('should carry the status and confidence of each question', () => {
    const document = assembleResponseDocument(
      [
        answered(1),
        answered(2, { confidenceScore: 0.5 }),
        answered(3, { confidenceScore: 0.2, status: 'failed' }),
      ],
      '',
      { generatedAt: GENERATED_AT },
    );

    expect(
      document.questions.map((q) => [q.status, q.confidenceLevel]),
    ).toEqual([
      ['completed', 'high'],
      ['completed', 'medium'],
      ['failed', 'low'],
    ]);
  });

  it('should accept an empty question list', () => {
    expect(
      assembleResponseDocument([], 'Summary', { generatedAt: GENERATED_AT })
        .questions,
    ).toEqual([]);
  });

  it('should reject a gap in the numbering', () => {
    expect(() =>
      assembleResponseDocument([answered(1), answered(3)], ''),
    ).toThrow(new IncompleteResponseError('Question 2 is missing'));
  });

  it('should reject a duplicated index', () => {
    expect(() =>
      assembleResponseDocument([answered(1), answered(1)], ''),
    ).toThrow(new IncompleteResponseError('Question 1 appears more than once'));
  });

  it('should reject questions that were never processed', () => {
    expect(() =>
      assembleResponseDocument(
        [answered(1), answered(2, { status: 'pending' })],
        '',
      ),
    ).toThrow(IncompleteResponseError);
    expect(() =>
      assembleResponseDocument([answered(1, { status: 'in-progress' })], ''),
    ).toThrow('Question 1 has not been processed (status: in-progress)');
  });
});
