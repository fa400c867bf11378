export const DEFAULT_MIN_QUESTION_LENGTH = 10;

export const DEFAULT_STARTER_WORDS: readonly string[] = [
  'what',
  'how',
  'why',
  'when',
  'where',
  'who',
  'which',
  'can',
  'could',
  'would',
  'will',
  'do',
  'does',
  'is',
  'are',
  'describe',
  'explain',
  'provide',
];

/** How many tokens after the first one may hold a starter word. */
export const DEFAULT_STARTER_WINDOW = 2;

// symbol-font bullets come out of PDF extraction as stray letters
export const DEFAULT_BULLET_GLYPHS = 'GlnoO•●○◦▪▸►';

export const DEFAULT_QUESTION_PATTERNS: readonly RegExp[] = [
  /^\d+[.)]\s+.+\?$/im,
  /^[A-Z][^.!]*\?$/im,
  /(?:please|kindly)\s+(?:describe|explain|provide|list|detail|outline)/i,
];

const SENTENCE_BOUNDARY = /(?<=[.!?\n])\s+/;
const LINE_TERMINATORS = new Set(['.', '!', '?', ':']);

export interface QuestionCandidate {
  text: string;
  /** Whitespace-separated tokens of `text`, lower-cased. */
  words: string[];
}

export interface QuestionRule {
  name: string;
  matches(candidate: QuestionCandidate): boolean;
}

export interface QuestionDetectorOptions {
  minLength?: number;
  starterWords?: readonly string[];
  starterWindow?: number;
  patterns?: readonly RegExp[];
  bulletGlyphs?: string;
  /** Appended after the built-in rules. */
  rules?: readonly QuestionRule[];
}

export function createDefaultRules(
  options: Pick<
    QuestionDetectorOptions,
    'starterWords' | 'starterWindow' | 'patterns'
  > = {},
): QuestionRule[] {
  const starters = new Set(options.starterWords ?? DEFAULT_STARTER_WORDS);
  const window = options.starterWindow ?? DEFAULT_STARTER_WINDOW;
  const patterns = options.patterns ?? DEFAULT_QUESTION_PATTERNS;

  return [
    {
      name: 'question-mark',
      matches: ({ text }) => text.trimEnd().endsWith('?'),
    },
    {
      name: 'pattern',
      matches: ({ text }) => patterns.some((pattern) => pattern.test(text)),
    },
    {
      name: 'leading-starter',
      matches: ({ words }) => words.length > 0 && starters.has(words[0] ?? ''),
    },
    {
      name: 'nearby-starter',
      matches: ({ words }) =>
        words.slice(1, 1 + window).some((word) => starters.has(word)),
    },
  ];
}

/**
 * Heuristic question finder for RFP text. Results are unique and keep the
 * order in which they first appear.
 */
export class QuestionDetector {
  private readonly minLength: number;
  private readonly bulletGlyphs: string;
  private readonly rules: readonly QuestionRule[];

  constructor(options: QuestionDetectorOptions = {}) {
    this.minLength = options.minLength ?? DEFAULT_MIN_QUESTION_LENGTH;
    this.bulletGlyphs = options.bulletGlyphs ?? DEFAULT_BULLET_GLYPHS;
    this.rules = [...createDefaultRules(options), ...(options.rules ?? [])];
  }

  detect(rawText: string): string[] {
    const questions = new Set<string>();
    for (const sentence of this.splitSentences(this.normalize(rawText))) {
      if (sentence.length >= this.minLength && this.isQuestion(sentence)) {
        questions.add(sentence);
      }
    }
    return [...questions];
  }

  /**
   * Drops blank lines and stray bullet glyphs, then rejoins lines that were
   * wrapped mid-sentence. A line ending in `. ! ? :` closes a logical line.
   */
  normalize(rawText: string): string {
    const logicalLines: string[] = [];
    let current = '';

    for (const line of rawText.split('\n')) {
      const trimmed = line.trim();
      if (trimmed.length === 0 || this.isBulletGlyph(trimmed)) {
        continue;
      }

      if (current.length === 0) {
        current = trimmed;
      } else if (LINE_TERMINATORS.has(current.charAt(current.length - 1))) {
        logicalLines.push(current);
        current = trimmed;
      } else {
        current = `${current} ${trimmed}`;
      }
    }

    if (current.length > 0) {
      logicalLines.push(current);
    }
    return logicalLines.join('\n');
  }

  splitSentences(text: string): string[] {
    return text
      .split(SENTENCE_BOUNDARY)
      .map((sentence) => sentence.trim())
      .filter((sentence) => sentence.length > 0);
  }

  isQuestion(sentence: string): boolean {
    const candidate: QuestionCandidate = {
      text: sentence,
      words: sentence
        .split(' ')
        .filter((word) => word.length > 0)
        .map((word) => word.toLowerCase()),
    };
    return this.rules.some((rule) => rule.matches(candidate));
  }

  private isBulletGlyph(line: string): boolean {
    return [...line].length === 1 && this.bulletGlyphs.includes(line);
  }
}

export const defaultQuestionDetector = new QuestionDetector();

export function detectQuestions(rawText: string): string[] {
  return defaultQuestionDetector.detect(rawText);
}
