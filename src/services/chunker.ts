import type { Chunk } from '../types/index';
import { ConfigurationError } from '../utils/errors';
import { estimateTokens } from '../utils/text';

export interface ChunkOptions {
  /**
   * How far (in characters) before the target size to look for a natural
   * break. Defaults to a quarter of the chunk size, at least 1.
   */
  boundaryTolerance?: number;
}

// Higher rank wins; ties go to the break nearest the target size
const BreakRank = {
  None: 0,
  Word: 1,
  Sentence: 2,
  Paragraph: 3,
} as const;

type BreakRank = (typeof BreakRank)[keyof typeof BreakRank];

const SENTENCE_END = /[.!?]/;
const WHITESPACE = /\s/;

function isWhitespace(char: string | undefined): boolean {
  return char !== undefined && WHITESPACE.test(char);
}

/**
 * Rank a cut at position `at`, i.e. a chunk ending just before text[at].
 */
function rankBreak(text: string, at: number): BreakRank {
  const before = text[at - 1];
  const after = text[at];

  if (before === '\n' && text[at - 2] === '\n') {
    return BreakRank.Paragraph;
  }

  // "end. |Next" or "end.| Next"
  if (
    (before !== undefined && SENTENCE_END.test(before) && (after === undefined || isWhitespace(after))) ||
    (isWhitespace(before) && text[at - 2] !== undefined && SENTENCE_END.test(text[at - 2]))
  ) {
    return BreakRank.Sentence;
  }

  if (isWhitespace(before) !== isWhitespace(after)) {
    return BreakRank.Word;
  }

  return BreakRank.None;
}

/**
 * Find the end of the chunk that starts at `start`, searching backwards from
 * the target size down to `minEnd`.
 */
function findChunkEnd(text: string, start: number, chunkSize: number, minEnd: number): number {
  const target = start + chunkSize;
  let bestEnd = target;
  let bestRank: BreakRank = BreakRank.None;

  for (let at = target; at >= minEnd; at--) {
    const rank = rankBreak(text, at);
    if (rank > bestRank) {
      bestRank = rank;
      bestEnd = at;
      if (rank === BreakRank.Paragraph) break;
    }
  }

  return bestEnd;
}

export function validateChunkParameters(chunkSize: number, overlap: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new ConfigurationError(`chunkSize must be a positive integer (got ${chunkSize})`);
  }
  if (!Number.isInteger(overlap) || overlap < 1) {
    throw new ConfigurationError(`overlap must be a positive integer (got ${overlap})`);
  }
  if (overlap >= chunkSize) {
    throw new ConfigurationError(
      `overlap must be smaller than chunkSize (got overlap ${overlap}, chunkSize ${chunkSize})`
    );
  }
}

/**
 * Split text into overlapping chunks of at most `chunkSize` characters.
 *
 * Cuts are placed at the best natural break (paragraph, then sentence, then
 * word) inside the tolerance window that ends at the target size; without
 * one, the text is cut hard at the target. Each chunk after the first starts
 * `overlap` characters before the previous chunk's end, so consecutive
 * ranges overlap and together cover the whole text. The output depends only
 * on the arguments.
 */
export function splitText(
  text: string,
  chunkSize: number,
  overlap: number,
  options: ChunkOptions = {}
): Chunk[] {
  validateChunkParameters(chunkSize, overlap);

  const tolerance = options.boundaryTolerance ?? Math.max(1, Math.floor(chunkSize / 4));
  if (!Number.isInteger(tolerance) || tolerance < 0) {
    throw new ConfigurationError(`boundaryTolerance must be a non-negative integer (got ${tolerance})`);
  }

  const chunks: Chunk[] = [];
  if (text.length === 0) return chunks;

  let start = 0;
  for (;;) {
    let end: number;
    const isLast = text.length - start <= chunkSize;

    if (isLast) {
      end = text.length;
    } else {
      // The next chunk starts at end - overlap, which must move past start
      const minEnd = Math.max(start + overlap + 1, start + chunkSize - tolerance);
      end = findChunkEnd(text, start, chunkSize, minEnd);
    }

    const slice = text.slice(start, end);
    chunks.push({
      index: chunks.length,
      text: slice,
      startOffset: start,
      endOffset: end,
      length: slice.length,
      tokenEstimate: estimateTokens(slice),
    });

    if (isLast) break;
    start = end - overlap;
  }

  return chunks;
}
