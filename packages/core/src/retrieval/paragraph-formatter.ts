export interface Formatter {
  format(text: string): string[];
}

export interface ParagraphFormatterOptions {
  /** Longest chunk in characters; longer paragraphs are split at whitespace */
  maxLength?: number;
}

/** Splits text on blank lines into trimmed, non-empty paragraphs. */
export class ParagraphFormatter implements Formatter {
  readonly maxLength: number;

  constructor(options: ParagraphFormatterOptions = {}) {
    this.maxLength = options.maxLength ?? 1000;
  }

  format(text: string): string[] {
    return text
      .split(/\r?\n\s*\r?\n/)
      .map(paragraph => paragraph.trim())
      .filter(paragraph => paragraph.length > 0)
      .flatMap(paragraph => this.wrap(paragraph));
  }

  private wrap(paragraph: string): string[] {
    if (paragraph.length <= this.maxLength) return [paragraph];

    const chunks: string[] = [];
    let current = '';
    for (const word of paragraph.split(/\s+/)) {
      const next = current ? `${current} ${word}` : word;
      if (next.length > this.maxLength && current) {
        chunks.push(current);
        current = word;
      } else {
        current = next;
      }
    }
    if (current) chunks.push(current);
    return chunks;
  }
}
