import type { RetrievedMatch } from '../knowledge/index.js';
import type { AnsweredQuestion } from './rfp.types.js';

export const NO_CONTEXT_TEXT =
  'No relevant context available in the knowledgebase.';

export function buildAnswerPrompt(
  questionText: string,
  matches: readonly RetrievedMatch[],
): string {
  const context =
    matches.length > 0
      ? matches.map((match) => match.chunkText).join('\n\n')
      : NO_CONTEXT_TEXT;

  return [
    'You are an expert RFP response writer. Based on the following context from our knowledge base, provide a professional, accurate, and comprehensive answer to the question.',
    '',
    'CONTEXT:',
    context,
    '',
    'QUESTION:',
    questionText,
    '',
    "Provide a clear, professional response suitable for an RFP submission. If the context doesn't contain enough information, indicate what additional details might be needed.",
  ].join('\n');
}

/** Edited answer when the reviewer has written one, else the generated one. */
export function currentAnswer(question: AnsweredQuestion): string {
  return question.editedAnswer.length > 0
    ? question.editedAnswer
    : question.generatedAnswer;
}

export function buildSummaryPrompt(
  questions: readonly AnsweredQuestion[],
): string {
  const pairs = questions
    .map((question) => `Q: ${question.questionText}\nA: ${currentAnswer(question)}`)
    .join('\n\n');

  return [
    'You are an expert RFP response writer. Based on the following questions and answers from an RFP response, write a professional executive summary paragraph that:',
    "1. Introduces the responding organization's capabilities",
    '2. Highlights key strengths demonstrated in the responses',
    '3. Expresses enthusiasm for the opportunity',
    '4. Is concise (2-3 paragraphs maximum)',
    '',
    'QUESTIONS AND ANSWERS:',
    pairs,
    '',
    'Write the executive summary now:',
  ].join('\n');
}

export function fallbackSummary(questionCount: number): string {
  return `Thank you for the opportunity to respond to this Request for Proposal. We have carefully reviewed all ${questionCount} questions and have provided comprehensive responses that demonstrate our capabilities and commitment to delivering exceptional results. We look forward to discussing our proposal in further detail.`;
}

export function failureNotice(reason: string): string {
  return `Unable to generate answer: ${reason}`;
}
