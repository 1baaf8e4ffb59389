/**
 * Vehicle / context taxonomy shared by graph construction, entity extraction
 * and the local embedding model.
 *
 * Corpus categories ("Xe mô tô, xe gắn máy", "Nồng độ cồn", …) resolve to
 * canonical vehicle ids and an optional violation context. Lookup goes through
 * the text preprocessor so spelling variants of a category resolve alike.
 */

import { z } from 'zod';
import taxonomyJson from '../data/taxonomy.vi.json';
import type { TextPreprocessor } from './text-preprocessor';

const LabelledEntrySchema = z.object({
  label: z.string(),
  aliases: z.array(z.string()).min(1),
});

export const TaxonomySchema = z.object({
  version: z.number(),
  vehicles: z.record(z.string(), LabelledEntrySchema),
  contexts: z.record(z.string(), LabelledEntrySchema),
  categories: z.record(
    z.string(),
    z.object({
      vehicles: z.array(z.string()),
      context: z.string().optional(),
    }),
  ),
});

export type TaxonomyData = z.infer<typeof TaxonomySchema>;

export interface CategoryResolution {
  vehicles: string[];
  context: string | null;
}

export interface AliasEntry {
  alias: string;
  canonical: string;
}

export interface Span {
  start: number;
  end: number;
}

export interface PhraseHit extends Span {
  text: string;
  canonical: string;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

export function overlaps(span: Span, claimed: Span[]): boolean {
  return claimed.some((c) => span.start < c.end && c.start < span.end);
}

/** Longest alias first so "xe máy chuyên dùng" beats "xe máy". */
export class PhraseRecognizer {
  private readonly entries: Array<AliasEntry & { regex: RegExp }>;

  constructor(aliases: AliasEntry[]) {
    this.entries = [...aliases]
      .sort((a, b) => b.alias.length - a.alias.length || a.alias.localeCompare(b.alias))
      .map((entry) => ({
        ...entry,
        regex: new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(entry.alias)}(?![\\p{L}\\p{N}])`, 'gu'),
      }));
  }

  /** Non-overlapping hits in text order. */
  recognize(text: string): PhraseHit[] {
    const hits: PhraseHit[] = [];
    for (const entry of this.entries) {
      for (const match of text.matchAll(entry.regex)) {
        const start = match.index ?? 0;
        const hit = { start, end: start + match[0].length, text: match[0], canonical: entry.canonical };
        if (!overlaps(hit, hits)) hits.push(hit);
      }
    }
    return hits.sort((a, b) => a.start - b.start);
  }
}

export class Taxonomy {
  private readonly data: TaxonomyData;
  private readonly categoryIndex = new Map<string, CategoryResolution>();

  constructor(private readonly preprocessor: TextPreprocessor, data: TaxonomyData = TaxonomySchema.parse(taxonomyJson)) {
    this.data = data;

    for (const [category, entry] of Object.entries(data.categories)) {
      for (const vehicle of entry.vehicles) {
        if (!(vehicle in data.vehicles)) {
          throw new Error(`Taxonomy category "${category}" references unknown vehicle "${vehicle}"`);
        }
      }
      if (entry.context !== undefined && !(entry.context in data.contexts)) {
        throw new Error(`Taxonomy category "${category}" references unknown context "${entry.context}"`);
      }
      this.categoryIndex.set(preprocessor.normalize(category), {
        vehicles: [...entry.vehicles],
        context: entry.context ?? null,
      });
    }
  }

  /** Returns null when the category is not part of the taxonomy. */
  resolveCategory(category: string): CategoryResolution | null {
    return this.categoryIndex.get(this.preprocessor.normalize(category)) ?? null;
  }

  hasContext(id: string): boolean {
    return id in this.data.contexts;
  }

  vehicleLabel(id: string): string {
    return this.data.vehicles[id]?.label ?? id;
  }

  contextLabel(id: string): string {
    return this.data.contexts[id]?.label ?? id;
  }

  /** Vehicle aliases, normalized, for the entity recognizers */
  vehicleAliases(): AliasEntry[] {
    return this.aliasesOf(this.data.vehicles);
  }

  /** Context aliases, normalized, for the keyword recognizer */
  contextAliases(): AliasEntry[] {
    return this.aliasesOf(this.data.contexts);
  }

  private aliasesOf(entries: TaxonomyData['vehicles']): AliasEntry[] {
    const out: AliasEntry[] = [];
    for (const [canonical, entry] of Object.entries(entries)) {
      for (const alias of entry.aliases) {
        out.push({ alias: this.preprocessor.normalize(alias), canonical });
      }
    }
    return out;
  }
}
