// ============================================
// Chunker: recursive character splitting for policy documents
// ============================================

export const CHUNK_SIZE = 1000;
export const CHUNK_OVERLAP = 200;

/**
 * Tried in order: paragraphs, lines, words, then single characters.
 */
export const SEPARATORS = ["\n\n", "\n", " ", ""] as const;

export interface ChunkOptions {
  chunkSize?: number;
  chunkOverlap?: number;
  separators?: readonly string[];
}

export interface TextChunk {
  id: string;
  index: number;
  content: string;
}

/**
 * Split text into pieces of at most `chunkSize` characters, preferring the
 * coarsest separator that keeps pieces small. Adjacent chunks share up to
 * `chunkOverlap` characters.
 */
export function splitText(text: string, options: ChunkOptions = {}): string[] {
  const chunkSize = options.chunkSize ?? CHUNK_SIZE;
  const chunkOverlap = options.chunkOverlap ?? CHUNK_OVERLAP;
  const separators = options.separators ?? SEPARATORS;

  if (chunkOverlap >= chunkSize) {
    throw new RangeError(`chunkOverlap (${chunkOverlap}) must be smaller than chunkSize (${chunkSize})`);
  }

  return splitRecursive(text, separators, chunkSize, chunkOverlap);
}

function splitRecursive(
  text: string,
  separators: readonly string[],
  chunkSize: number,
  chunkOverlap: number
): string[] {
  let separator = separators[separators.length - 1] ?? "";
  let remaining: readonly string[] = [];

  for (let i = 0; i < separators.length; i++) {
    const candidate = separators[i];
    if (candidate === undefined) continue;
    if (candidate === "" || text.includes(candidate)) {
      separator = candidate;
      remaining = separators.slice(i + 1);
      break;
    }
  }

  const pieces = (separator ? text.split(separator) : [...text]).filter((p) => p.length > 0);

  const chunks: string[] = [];
  let small: string[] = [];

  for (const piece of pieces) {
    if (piece.length < chunkSize) {
      small.push(piece);
      continue;
    }

    if (small.length > 0) {
      chunks.push(...mergePieces(small, separator, chunkSize, chunkOverlap));
      small = [];
    }

    if (remaining.length === 0) {
      chunks.push(piece);
    } else {
      chunks.push(...splitRecursive(piece, remaining, chunkSize, chunkOverlap));
    }
  }

  if (small.length > 0) {
    chunks.push(...mergePieces(small, separator, chunkSize, chunkOverlap));
  }

  return chunks;
}

/**
 * Greedily pack pieces into chunks, carrying a tail of at most
 * `chunkOverlap` characters into the next one.
 */
function mergePieces(
  pieces: string[],
  separator: string,
  chunkSize: number,
  chunkOverlap: number
): string[] {
  const chunks: string[] = [];
  const current: string[] = [];
  let total = 0;

  const joinedLength = (extra: number) =>
    total + extra + (current.length > 0 ? separator.length : 0);

  for (const piece of pieces) {
    if (joinedLength(piece.length) > chunkSize && current.length > 0) {
      pushJoined(chunks, current, separator);

      while (total > chunkOverlap || (total > 0 && joinedLength(piece.length) > chunkSize)) {
        const dropped = current.shift();
        if (dropped === undefined) break;
        total -= dropped.length + (current.length > 0 ? separator.length : 0);
      }
    }

    total += piece.length + (current.length > 0 ? separator.length : 0);
    current.push(piece);
  }

  pushJoined(chunks, current, separator);
  return chunks;
}

function pushJoined(chunks: string[], pieces: string[], separator: string): void {
  const text = pieces.join(separator).trim();
  if (text) chunks.push(text);
}

/**
 * Chunk one document. Ids are `<docId>_chunk_<i>`.
 */
export function chunkDocument(docId: string, content: string, options?: ChunkOptions): TextChunk[] {
  return splitText(content, options).map((chunk, index) => ({
    id: `${docId}_chunk_${index}`,
    index,
    content: chunk,
  }));
}
