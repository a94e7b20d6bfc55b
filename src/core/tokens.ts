import { getEncoding, type Tiktoken, type TiktokenEncoding } from 'js-tiktoken';
import type { TokenizerKind } from '../types/index.js';
import { Defaults } from '../constants/defaults.js';

export interface TokenCounter {
  readonly name: TokenizerKind;
  count(text: string): number;
}

export class TiktokenCounter implements TokenCounter {
  readonly name = 'tiktoken' as const;
  private readonly encoder: Tiktoken;

  constructor(encoding: TiktokenEncoding = Defaults.TIKTOKEN_ENCODING) {
    this.encoder = getEncoding(encoding);
  }

  count(text: string): number {
    // Special-token markers inside source files are counted as plain text.
    return this.encoder.encode(text, [], []).length;
  }
}

export class WhitespaceCounter implements TokenCounter {
  readonly name = 'whitespace' as const;

  count(text: string): number {
    const trimmed = text.trim();
    return trimmed === '' ? 0 : trimmed.split(/\s+/).length;
  }
}

/** Falls back to whitespace counting when the encoder cannot be built. */
export function createTokenCounter(kind: TokenizerKind = Defaults.TOKENIZER): TokenCounter {
  if (kind === 'whitespace') {
    return new WhitespaceCounter();
  }
  try {
    return new TiktokenCounter();
  } catch {
    return new WhitespaceCounter();
  }
}
