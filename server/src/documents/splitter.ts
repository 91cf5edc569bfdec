/**
 * Text Splitter
 *
 * Recursive character splitter: tries paragraph breaks first, then line
 * breaks, then spaces, then single characters, and merges the pieces back
 * into chunks of at most `chunkSize` characters with up to `chunkOverlap`
 * characters carried over between neighbours.
 */

export const DEFAULT_SEPARATORS = ["\n\n", "\n", " ", ""] as const;

export interface TextSplitterOptions {
  chunkSize: number;
  chunkOverlap: number;
  separators?: readonly string[];
}

export class TextSplitter {
  readonly chunkSize: number;
  readonly chunkOverlap: number;
  private separators: readonly string[];

  constructor(options: TextSplitterOptions) {
    if (options.chunkSize <= 0) {
      throw new Error(`chunkSize must be positive, got ${options.chunkSize}`);
    }
    if (options.chunkOverlap < 0 || options.chunkOverlap >= options.chunkSize) {
      throw new Error(`chunkOverlap (${options.chunkOverlap}) must be between 0 and chunkSize (${options.chunkSize})`);
    }
    this.chunkSize = options.chunkSize;
    this.chunkOverlap = options.chunkOverlap;
    this.separators = options.separators ?? DEFAULT_SEPARATORS;
  }

  splitText(text: string): string[] {
    return this.split(text, this.separators);
  }

  private split(text: string, separators: readonly string[]): string[] {
    // First separator present in the text; "" always matches
    let index = separators.findIndex(sep => sep === "" || text.includes(sep));
    if (index === -1) index = separators.length - 1;
    const separator = separators[index] ?? "";
    const remaining = separators.slice(index + 1);

    const pieces = (separator ? text.split(separator) : Array.from(text)).filter(p => p !== "");

    const chunks: string[] = [];
    let pending: string[] = [];
    for (const piece of pieces) {
      if (piece.length < this.chunkSize) {
        pending.push(piece);
        continue;
      }
      if (pending.length > 0) {
        chunks.push(...this.merge(pending, separator));
        pending = [];
      }
      if (remaining.length === 0) {
        chunks.push(piece);
      } else {
        chunks.push(...this.split(piece, remaining));
      }
    }
    if (pending.length > 0) {
      chunks.push(...this.merge(pending, separator));
    }
    return chunks;
  }

  /** Greedily join small pieces up to chunkSize, keeping a tail for overlap. */
  private merge(pieces: string[], separator: string): string[] {
    const chunks: string[] = [];
    let current: string[] = [];
    let total = 0;

    const sepLen = separator.length;
    const push = () => {
      const chunk = current.join(separator).trim();
      if (chunk) chunks.push(chunk);
    };

    for (const piece of pieces) {
      const joinCost = current.length > 0 ? sepLen : 0;
      if (total + piece.length + joinCost > this.chunkSize && current.length > 0) {
        push();
        while (
          total > this.chunkOverlap ||
          (total > 0 && total + piece.length + (current.length > 0 ? sepLen : 0) > this.chunkSize)
        ) {
          const dropped = current.shift();
          if (dropped === undefined) break;
          total -= dropped.length + (current.length > 0 ? sepLen : 0);
        }
      }
      current.push(piece);
      total += piece.length + (current.length > 1 ? sepLen : 0);
    }

    push();
    return chunks;
  }
}
