export const DEFAULT_MAX_CHUNK_CHARS = 250;

// whitespace that follows sentence-ending punctuation
const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/g;

export interface TextSpan {
  text: string;
  startPosition: number;
  endPosition: number;
}

/**
 * Splits text into trimmed, non-empty sentences together with their
 * character offsets in the source.
 */
export function splitSentences(text: string): TextSpan[] {
  const spans: TextSpan[] = [];
  const boundary = new RegExp(SENTENCE_BOUNDARY.source, 'g');
  let start = 0;
  let match: RegExpExecArray | null;

  while ((match = boundary.exec(text)) !== null) {
    pushSpan(text, start, match.index, spans);
    start = match.index + match[0].length;
  }
  pushSpan(text, start, text.length, spans);

  return spans;
}

/**
 * Packs whole sentences into chunks of at most `maxChunkChars`. A sentence is
 * never cut: one that is longer than the limit becomes a chunk of its own.
 */
export function chunkTextWithOffsets(
  text: string,
  maxChunkChars = DEFAULT_MAX_CHUNK_CHARS,
): TextSpan[] {
  if (!Number.isInteger(maxChunkChars) || maxChunkChars <= 0) {
    throw new RangeError(
      `maxChunkChars must be a positive integer, received ${maxChunkChars}`,
    );
  }

  const chunks: TextSpan[] = [];
  let buffer = '';
  let bufferStart = 0;
  let bufferEnd = 0;

  for (const sentence of splitSentences(text)) {
    if (
      buffer.length > 0 &&
      buffer.length + sentence.text.length > maxChunkChars
    ) {
      chunks.push({
        text: buffer.trim(),
        startPosition: bufferStart,
        endPosition: bufferEnd,
      });
      buffer = '';
    }

    if (buffer.length === 0) {
      bufferStart = sentence.startPosition;
    }
    buffer += `${sentence.text} `;
    bufferEnd = sentence.endPosition;
  }

  if (buffer.length > 0) {
    chunks.push({
      text: buffer.trim(),
      startPosition: bufferStart,
      endPosition: bufferEnd,
    });
  }

  return chunks;
}

export function chunkText(
  text: string,
  maxChunkChars = DEFAULT_MAX_CHUNK_CHARS,
): string[] {
  return chunkTextWithOffsets(text, maxChunkChars).map((chunk) => chunk.text);
}

function pushSpan(
  text: string,
  start: number,
  end: number,
  spans: TextSpan[],
): void {
  const raw = text.slice(start, end);
  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    return;
  }

  const leading = raw.length - raw.trimStart().length;
  const startPosition = start + leading;
  spans.push({
    text: trimmed,
    startPosition,
    endPosition: startPosition + trimmed.length,
  });
}
