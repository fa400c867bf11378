import { UTCDate } from '@date-fns/utc';
import { format } from 'date-fns';
import type { ResponseDocument } from './rfp.types.js';

export type ParagraphRole =
  | 'title'
  | 'subtitle'
  | 'rule'
  | 'heading'
  | 'body'
  | 'question'
  | 'answer'
  | 'spacer'
  | 'footer';

export type ParagraphAlignment = 'left' | 'center' | 'right';

export interface ParagraphStyle {
  /** Points. */
  fontSize: number;
  bold: boolean;
  italic: boolean;
  /** RGB hex without the leading `#`. */
  color?: string;
  alignment: ParagraphAlignment;
  /** Points after the paragraph. */
  spacingAfter: number;
}

export type StylePolicy = Record<ParagraphRole, ParagraphStyle>;

export interface StyledParagraph extends ParagraphStyle {
  text: string;
  role: ParagraphRole;
}

const DARK_BLUE = '00008B';
const BLUE = '0000FF';
const GRAY = '808080';

export const defaultStylePolicy: StylePolicy = {
  title: { fontSize: 24, bold: true, italic: false, color: DARK_BLUE, alignment: 'center', spacingAfter: 10 },
  subtitle: { fontSize: 12, bold: false, italic: true, color: GRAY, alignment: 'center', spacingAfter: 0 },
  rule: { fontSize: 8, bold: false, italic: false, color: GRAY, alignment: 'center', spacingAfter: 0 },
  heading: { fontSize: 16, bold: true, italic: false, color: DARK_BLUE, alignment: 'left', spacingAfter: 10 },
  body: { fontSize: 11, bold: false, italic: false, alignment: 'left', spacingAfter: 15 },
  question: { fontSize: 12, bold: true, italic: false, color: BLUE, alignment: 'left', spacingAfter: 5 },
  answer: { fontSize: 11, bold: false, italic: false, alignment: 'left', spacingAfter: 20 },
  spacer: { fontSize: 11, bold: false, italic: false, alignment: 'left', spacingAfter: 0 },
  footer: { fontSize: 9, bold: false, italic: true, color: GRAY, alignment: 'right', spacingAfter: 0 },
};

export const RULE_LINE = '─'.repeat(60);

const LONG_DATE = 'MMMM dd, yyyy';

// formatted from the UTC fields regardless of the host time zone
const inUtc = (date: Date) => new UTCDate(date.getTime());

/** `October 05, 2026` */
export function formatLongDate(date: Date): string {
  return format(inUtc(date), LONG_DATE);
}

/** `October 05, 2026 14:30 UTC` */
export function formatTimestamp(date: Date): string {
  return format(inUtc(date), `${LONG_DATE} HH:mm 'UTC'`);
}

/** `RFP_Response_20261005_143000.md` */
export function exportFileName(date: Date): string {
  return format(inUtc(date), "'RFP_Response_'yyyyMMdd_HHmmss'.md'");
}

export function renderParagraphs(
  document: ResponseDocument,
  policy: StylePolicy = defaultStylePolicy,
): StyledParagraph[] {
  const paragraphs: StyledParagraph[] = [];
  const add = (role: ParagraphRole, text = '') => {
    paragraphs.push({ ...policy[role], role, text });
  };

  add('title', document.title);
  add('subtitle', `Generated: ${formatLongDate(document.generatedAt)}`);
  add('spacer');
  add('rule', RULE_LINE);
  add('spacer');

  add('heading', 'Executive Summary');
  add('body', document.summary);
  add('spacer');

  add('heading', 'Questions and Responses');
  for (const question of document.questions) {
    add('question', `Q${question.index}: ${question.questionText}`);
    add('answer', question.answer);
  }

  add('spacer');
  add('footer', `Document generated on ${formatTimestamp(document.generatedAt)}`);
  return paragraphs;
}

const MARKDOWN_BY_ROLE: Record<ParagraphRole, (text: string) => string | null> = {
  title: (text) => `# ${text}`,
  subtitle: (text) => `_${text}_`,
  rule: () => '---',
  heading: (text) => `## ${text}`,
  body: (text) => text,
  question: (text) => `### ${text}`,
  answer: (text) => text,
  spacer: () => null,
  footer: (text) => `_${text}_`,
};

/** Same layout as {@link renderParagraphs}, one Markdown block per paragraph. */
export function renderMarkdown(document: ResponseDocument): string {
  const blocks = renderParagraphs(document)
    .map((paragraph) => MARKDOWN_BY_ROLE[paragraph.role](paragraph.text))
    .filter((block): block is string => block !== null && block.length > 0);
  return `${blocks.join('\n\n')}\n`;
}
