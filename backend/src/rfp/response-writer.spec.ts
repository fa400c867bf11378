import { describe, expect, it } from '@jest/globals';
import {
  RULE_LINE,
  defaultStylePolicy,
  exportFileName,
  formatLongDate,
  formatTimestamp,
  renderMarkdown,
  renderParagraphs,
} from './response-writer.js';
import type { ResponseDocument } from './rfp.types.js';

const DOCUMENT: ResponseDocument = {
  title: 'RFP Response',
  generatedAt: new Date(Date.UTC(2026, 9, 5, 14, 30, 0)),
  summary: 'We are ready to deliver.',
  questions: [
    {
      index: 1,
      questionText: 'What is your uptime?',
      answer: 'We guarantee 99.9% monthly uptime.',
      status: 'completed',
      confidenceScore: 0.9,
      confidenceLevel: 'high',
    },
  ],
};

describe('renderParagraphs', () => {
  it('should lay out the response document', () => {
    const paragraphs = renderParagraphs(DOCUMENT);

    expect(paragraphs.map((p) => [p.role, p.text])).toEqual([
      ['title', 'RFP Response'],
      ['subtitle', 'Generated: October 05, 2026'],
      ['spacer', ''],
      ['rule', RULE_LINE],
      ['spacer', ''],
      ['heading', 'Executive Summary'],
      ['body', 'We are ready to deliver.'],
      ['spacer', ''],
      ['heading', 'Questions and Responses'],
      ['question', 'Q1: What is your uptime?'],
      ['answer', 'We guarantee 99.9% monthly uptime.'],
      ['spacer', ''],
      ['footer', 'Document generated on October 05, 2026 14:30 UTC'],
    ]);
  });

  it('should style each paragraph from the policy', () => {
    const question = renderParagraphs(DOCUMENT).find(
      (p) => p.role === 'question',
    );

    expect(question).toEqual({
      text: 'Q1: What is your uptime?',
      role: 'question',
      fontSize: 12,
      bold: true,
      italic: false,
      color: '0000FF',
      alignment: 'left',
      spacingAfter: 5,
    });
  });

  it('should take a custom policy', () => {
    const [title] = renderParagraphs(DOCUMENT, {
      ...defaultStylePolicy,
      title: { ...defaultStylePolicy.title, fontSize: 30 },
    });

    expect(title.fontSize).toBe(30);
  });
});

describe('renderMarkdown', () => {
  it('should render the same layout as Markdown', () => {
    expect(renderMarkdown(DOCUMENT)).toBe(
      [
        '# RFP Response',
        '_Generated: October 05, 2026_',
        '---',
        '## Executive Summary',
        'We are ready to deliver.',
        '## Questions and Responses',
        '### Q1: What is your uptime?',
        'We guarantee 99.9% monthly uptime.',
        '_Document generated on October 05, 2026 14:30 UTC_',
      ].join('\n\n') + '\n',
    );
  });
});

describe('formatTimestamp', () => {
  it('should keep the UTC calendar day at the end of a year', () => {
    const lastMinute = new Date(Date.UTC(2026, 11, 31, 23, 59, 30));

    expect(formatLongDate(lastMinute)).toBe('December 31, 2026');
    expect(formatTimestamp(lastMinute)).toBe('December 31, 2026 23:59 UTC');
  });
});

describe('exportFileName', () => {
  it('should stamp the file name with the UTC date and time', () => {
    expect(exportFileName(new Date(Date.UTC(2026, 0, 2, 3, 4, 5)))).toBe(
      'RFP_Response_20260102_030405.md',
    );
  });
});
