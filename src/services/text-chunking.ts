/**
 * Text Chunking
 * Splits long text into chunks that respect paragraph and sentence boundaries.
 * Used for narration requests over the speech provider's limit and for
 * embedding reference articles.
 */

const ABBREVIATIONS = new Set([
  'mr',
  'mrs',
  'ms',
  'dr',
  'prof',
  'sr',
  'jr',
  'st',
  'vs',
  'etc',
  'inc',
  'ltd',
  'co',
  'no',
  'vol',
  'approx',
  'e.g',
  'i.e',
  'a.m',
  'p.m',
]);

function isAbbreviation(word: string): boolean {
  return ABBREVIATIONS.has(word.replace(/\.$/, '').toLowerCase());
}

/**
 * Split text into paragraphs on blank lines
 */
export function splitByParagraphs(text: string): string[] {
  return text
    .split(/\n\s*\n/)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

/**
 * Split text into sentences. A terminator ends a sentence when it is followed by
 * whitespace and an uppercase letter or quote, or by the end of the text.
 */
export function splitBySentences(text: string): string[] {
  const sentences: string[] = [];
  let current = '';

  for (let i = 0; i < text.length; i++) {
    const char = text.charAt(i);
    current += char;

    if (char !== '.' && char !== '!' && char !== '?') continue;

    // Keep ellipses and closing quotes with the sentence
    while (i + 1 < text.length && /[.!?"'”’)]/.test(text.charAt(i + 1))) {
      i++;
      current += text.charAt(i);
    }

    const words = current.trim().split(/\s+/);
    const lastWord = words[words.length - 1] ?? '';
    if (char === '.' && isAbbreviation(lastWord)) continue;

    // Decimal numbers
    if (char === '.' && /\d/.test(text.charAt(i + 1)) && /\d/.test(text.charAt(i - 1))) continue;

    const lookAhead = text.slice(i + 1).trimStart();
    if (lookAhead.length === 0 || /^[A-ZÀ-Ü"'“‘([]/.test(lookAhead)) {
      sentences.push(current.trim());
      current = '';
    }
  }

  if (current.trim()) {
    sentences.push(current.trim());
  }

  return sentences.filter((s) => s.length > 0);
}

/**
 * Break a single oversized segment at commas/semicolons, then hard-split what remains.
 */
function splitLongSegment(segment: string, maxSize: number): string[] {
  if (segment.length <= maxSize) return [segment];

  const pieces: string[] = [];
  let current = '';
  for (const part of segment.split(/(?<=[,;:—])\s+/)) {
    const candidate = current ? `${current} ${part}` : part;
    if (candidate.length <= maxSize) {
      current = candidate;
      continue;
    }
    if (current) pieces.push(current);
    current = part;
  }
  if (current) pieces.push(current);

  return pieces.flatMap((piece) => {
    if (piece.length <= maxSize) return [piece];
    const hard: string[] = [];
    for (let i = 0; i < piece.length; i += maxSize) {
      hard.push(piece.slice(i, i + maxSize));
    }
    return hard;
  });
}

/**
 * Split text into chunks of at most `maxSize` characters, preferring paragraph
 * breaks, then sentence breaks, then clause breaks.
 */
export function splitTextIntoChunks(text: string, maxSize: number): string[] {
  const trimmed = text.trim();
  if (trimmed.length === 0) return [];
  if (trimmed.length <= maxSize) return [trimmed];

  const segments = splitByParagraphs(trimmed).flatMap((paragraph) =>
    paragraph.length <= maxSize
      ? [paragraph]
      : splitBySentences(paragraph).flatMap((sentence) => splitLongSegment(sentence, maxSize)),
  );

  const chunks: string[] = [];
  let current = '';
  for (const segment of segments) {
    const candidate = current ? `${current}\n\n${segment}` : segment;
    if (candidate.length <= maxSize) {
      current = candidate;
    } else {
      if (current) chunks.push(current);
      current = segment;
    }
  }
  if (current) chunks.push(current);

  return chunks;
}
