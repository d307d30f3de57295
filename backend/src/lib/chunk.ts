export interface ChunkOptions {
  chunkSize: number;
  chunkOverlap: number;
  separators?: string[];
}

const DEFAULT_SEPARATORS = ["\n\n", "\n", " ", ""];

function mergeSplits(splits: string[], separator: string, options: ChunkOptions): string[] {
  const chunks: string[] = [];
  const current: string[] = [];
  let total = 0;

  const push = () => {
    const chunk = current.join(separator).trim();
    if (chunk) {
      chunks.push(chunk);
    }
  };

  for (const split of splits) {
    const joinCost = current.length > 0 ? separator.length : 0;
    if (total + split.length + joinCost > options.chunkSize && current.length > 0) {
      push();
      // Drop from the front until what is left fits as overlap and leaves room for the next split.
      while (
        total > options.chunkOverlap ||
        (total > 0 && total + split.length + (current.length > 0 ? separator.length : 0) > options.chunkSize)
      ) {
        const removed = current.shift();
        if (removed === undefined) {
          break;
        }
        total -= removed.length + (current.length > 0 ? separator.length : 0);
      }
    }
    current.push(split);
    total += split.length + (current.length > 1 ? separator.length : 0);
  }

  push();
  return chunks;
}

function splitRecursive(text: string, separators: string[], options: ChunkOptions): string[] {
  let separator = separators[separators.length - 1] ?? "";
  let remaining: string[] = [];
  for (let index = 0; index < separators.length; index += 1) {
    const candidate = separators[index] ?? "";
    if (candidate === "" || text.includes(candidate)) {
      separator = candidate;
      remaining = separators.slice(index + 1);
      break;
    }
  }

  const splits = (separator === "" ? [...text] : text.split(separator)).filter((split) => split.length > 0);
  const chunks: string[] = [];
  let fitting: string[] = [];

  for (const split of splits) {
    if (split.length < options.chunkSize) {
      fitting.push(split);
      continue;
    }
    if (fitting.length > 0) {
      chunks.push(...mergeSplits(fitting, separator, options));
      fitting = [];
    }
    if (remaining.length === 0) {
      chunks.push(split);
    } else {
      chunks.push(...splitRecursive(split, remaining, options));
    }
  }

  if (fitting.length > 0) {
    chunks.push(...mergeSplits(fitting, separator, options));
  }
  return chunks;
}

/** Paragraphs first, then lines, then words, then characters. */
export function chunkText(text: string, options: ChunkOptions): string[] {
  if (!text.trim()) {
    return [];
  }
  if (options.chunkOverlap >= options.chunkSize) {
    throw new Error(`chunkOverlap (${options.chunkOverlap}) must be smaller than chunkSize (${options.chunkSize})`);
  }
  return splitRecursive(text, options.separators ?? DEFAULT_SEPARATORS, options);
}
