/**
 * TextPreprocessor: Vietnamese-aware normalization shared by intent
 * detection, entity extraction, graph construction and embedding preparation.
 *
 * Pure and stateless: every method is a function of its input string.
 */

import stopwordsJson from '../data/stopwords.vi.json';

/** New-style tone placement → old style ("hoà" → "hòa", "thuỷ" → "thủy") */
const TONE_CLUSTER_MAP: Record<string, string> = {
  oà: 'òa',
  oá: 'óa',
  oả: 'ỏa',
  oã: 'õa',
  oạ: 'ọa',
  oè: 'òe',
  oé: 'óe',
  oẻ: 'ỏe',
  oẽ: 'õe',
  oẹ: 'ọe',
  uỳ: 'ùy',
  uý: 'úy',
  uỷ: 'ủy',
  uỹ: 'ũy',
  uỵ: 'ụy',
};

// Only at the end of a syllable; "qu" is a consonant cluster, so "quý" stays
const TONE_CLUSTER_RE = /(?<!q)(o[àáảãạèéẻẽẹ]|u[ỳýỷỹỵ])(?![\p{L}\p{M}])/gu;
const DECIMAL_COMMA_RE = /(\d),(\d)/g;
const THOUSANDS_RE = /\b[1-9]\d{0,2}(?:\.\d{3})+\b/g;
const NON_TEXT_RE = /[^\p{L}\p{M}\p{N}\s./]/gu;
const DANGLING_SEPARATOR_RE = /(?<![\p{L}\p{N}])[./]+|[./]+(?![\p{L}\p{N}])/gu;

const DEFAULT_STOP_WORDS: ReadonlySet<string> = new Set(stopwordsJson);

export class TextPreprocessor {
  private readonly stopWords: ReadonlySet<string>;

  constructor(stopWords: Iterable<string> = DEFAULT_STOP_WORDS) {
    this.stopWords = new Set(stopWords);
  }

  /**
   * Canonical form used for matching: NFC, lowercase, canonical tone
   * placement, Vietnamese number separators resolved, punctuation dropped
   * except `.` and `/` inside tokens (`km/h`, `0.25`), whitespace collapsed.
   */
  normalize(text: string): string {
    return text
      .normalize('NFC')
      .toLowerCase()
      .replace(TONE_CLUSTER_RE, (cluster) => TONE_CLUSTER_MAP[cluster] ?? cluster)
      .replace(DECIMAL_COMMA_RE, '$1.$2')
      .replace(THOUSANDS_RE, (num) => num.replace(/\./g, ''))
      .replace(NON_TEXT_RE, ' ')
      .replace(DANGLING_SEPARATOR_RE, ' ')
      .replace(/\s+/g, ' ')
      .trim();
  }

  /** Normalized text with all diacritics removed ("đèn đỏ" → "den do"). */
  fold(text: string): string {
    return this.normalize(text).normalize('NFD').replace(/\p{M}/gu, '').replace(/đ/g, 'd');
  }

  /** True when the text carries no Vietnamese diacritics at all. */
  isUnaccented(text: string): boolean {
    const normalized = this.normalize(text);
    return normalized === this.fold(normalized);
  }

  tokenize(text: string): string[] {
    const normalized = this.normalize(text);
    return normalized.length === 0 ? [] : normalized.split(' ');
  }

  removeStopWords(tokens: string[]): string[] {
    return tokens.filter((token) => !this.stopWords.has(token));
  }

  /** Unique content tokens longer than two characters, in first-occurrence order. */
  extractKeywords(text: string): string[] {
    const seen = new Set<string>();
    for (const token of this.removeStopWords(this.tokenize(text))) {
      if (token.length > 2) seen.add(token);
    }
    return [...seen];
  }

  /** Text handed to the embedding model: normalized tokens without stop words. */
  prepareForEmbedding(text: string): string {
    return this.removeStopWords(this.tokenize(text)).join(' ');
  }
}
