import { getEncoding, type Tiktoken } from 'js-tiktoken';

export interface Tokenizer {
  count(text: string): number;
}

/** BPE token counts, matching the OpenAI chat models. */
export class TiktokenTokenizer implements Tokenizer {
  private encoding?: Tiktoken;

  constructor(private encodingName: 'cl100k_base' | 'o200k_base' = 'cl100k_base') {}

  count(text: string): number {
    // Loading the rank table is slow; defer it to first use
    this.encoding ??= getEncoding(this.encodingName);
    return this.encoding.encode(text).length;
  }
}

/** One token per whitespace-delimited unit. */
export class WhitespaceTokenizer implements Tokenizer {
  count(text: string): number {
    return text.split(/\s+/).filter(unit => unit.length > 0).length;
  }
}
