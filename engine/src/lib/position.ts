import type { LinkKind, RawLink } from "./types.js";

/** A link found by an extractor variant, before it is numbered. */
export interface LinkCandidate {
  text: string;
  kind: LinkKind;
  offset: number;
}

/**
 * Maps character offsets to 1-based line/column pairs.
 */
export class LineIndex {
  private readonly starts: number[] = [0];

  constructor(content: string) {
    for (let i = 0; i < content.length; i++) {
      if (content.charCodeAt(i) === 10) this.starts.push(i + 1);
    }
  }

  locate(offset: number): { line: number; column: number } {
    let low = 0;
    let high = this.starts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (this.starts[mid] <= offset) low = mid;
      else high = mid - 1;
    }
    return { line: low + 1, column: offset - this.starts[low] + 1 };
  }
}

/**
 * Sort candidates by offset (stable) and number them.
 */
export function toRawLinks(content: string, candidates: LinkCandidate[]): RawLink[] {
  const lines = new LineIndex(content);
  return candidates
    .map((candidate, order) => ({ candidate, order }))
    .sort((a, b) => a.candidate.offset - b.candidate.offset || a.order - b.order)
    .map(({ candidate }, index) => ({
      text: candidate.text,
      kind: candidate.kind,
      offset: candidate.offset,
      ...lines.locate(candidate.offset),
      index,
    }));
}
