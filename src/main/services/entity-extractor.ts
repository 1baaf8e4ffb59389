/**
 * EntityExtractor: pulls VEHICLE, SPEED, ALCOHOL and KEYWORD entities out of
 * a question. Each kind has its own recognizer; none of them ever throws, an
 * unrecognized kind simply yields an empty list.
 */

import type {
  AlcoholEntity,
  Entity,
  ExtractedEntities,
  KeywordEntity,
  SpeedEntity,
  VehicleEntity,
} from '../../shared/types/query';
import { overlaps, PhraseRecognizer, type Span, type Taxonomy } from './taxonomy';
import type { TextPreprocessor } from './text-preprocessor';

const SPEED_PATTERNS: RegExp[] = [
  /(?<![\p{L}\p{N}.])(\d+(?:\.\d+)?)\s*(?:km\/h|kmh|km\/giờ|km)(?![\p{L}\p{N}])/gu,
  /(?<![\p{L}\p{N}])(?:tốc độ|vượt quá|chạy quá|chạy)\s+(\d+(?:\.\d+)?)(?![\p{L}\p{N}.])/gu,
];

const ALCOHOL_LEVEL_PATTERNS: RegExp[] = [
  /(?<![\p{L}\p{N}.])(\d+(?:\.\d+)?)\s*(mg\/l|mg\/100ml|mg)(?![\p{L}\p{N}])/gu,
  /(?<![\p{L}\p{N}])nồng độ cồn\s+(\d+(?:\.\d+)?)(?![\p{L}\p{N}.])/gu,
];

const ALCOHOL_MENTION_RE =
  /(?<![\p{L}\p{N}])(?:nồng độ cồn|rượu bia|say rượu|uống rượu|uống bia|có cồn)(?![\p{L}\p{N}])/u;

export class EntityExtractor {
  private readonly vehicles: PhraseRecognizer;
  private readonly keywords: PhraseRecognizer;

  constructor(
    private readonly preprocessor: TextPreprocessor,
    taxonomy: Taxonomy,
  ) {
    this.vehicles = new PhraseRecognizer(taxonomy.vehicleAliases());
    this.keywords = new PhraseRecognizer(taxonomy.contextAliases());
  }

  extract(text: string): ExtractedEntities {
    const normalized = this.preprocessor.normalize(text);
    return {
      VEHICLE: this.extractVehicles(normalized),
      SPEED: this.extractSpeeds(normalized),
      ALCOHOL: this.extractAlcohol(normalized),
      KEYWORD: this.extractKeywords(normalized),
    };
  }

  /** All entities in one list, ordered by position in the text. */
  flatten(entities: ExtractedEntities): Entity[] {
    const all: Entity[] = [...entities.VEHICLE, ...entities.SPEED, ...entities.ALCOHOL, ...entities.KEYWORD];
    return all.sort((a, b) => a.start - b.start || a.end - b.end);
  }

  private extractVehicles(text: string): VehicleEntity[] {
    const seen = new Set<string>();
    const out: VehicleEntity[] = [];
    for (const hit of this.vehicles.recognize(text)) {
      if (seen.has(hit.canonical)) continue;
      seen.add(hit.canonical);
      out.push({ kind: 'VEHICLE', value: hit.canonical, text: hit.text, start: hit.start, end: hit.end });
    }
    return out;
  }

  private extractKeywords(text: string): KeywordEntity[] {
    const seen = new Set<string>();
    const out: KeywordEntity[] = [];
    for (const hit of this.keywords.recognize(text)) {
      if (seen.has(hit.canonical)) continue;
      seen.add(hit.canonical);
      out.push({ kind: 'KEYWORD', value: hit.canonical, text: hit.text, start: hit.start, end: hit.end });
    }
    return out;
  }

  private extractSpeeds(text: string): SpeedEntity[] {
    const claimed: Span[] = [];
    const out: SpeedEntity[] = [];
    for (const pattern of SPEED_PATTERNS) {
      for (const match of text.matchAll(pattern)) {
        const start = match.index ?? 0;
        const span = { start, end: start + match[0].length };
        const value = Number(match[1]);
        if (overlaps(span, claimed) || !Number.isFinite(value)) continue;
        claimed.push(span);
        out.push({ kind: 'SPEED', value, text: match[0], ...span });
      }
    }
    return out.sort((a, b) => a.start - b.start);
  }

  private extractAlcohol(text: string): AlcoholEntity[] {
    const claimed: Span[] = [];
    const out: AlcoholEntity[] = [];
    for (const pattern of ALCOHOL_LEVEL_PATTERNS) {
      for (const match of text.matchAll(pattern)) {
        const start = match.index ?? 0;
        const span = { start, end: start + match[0].length };
        const value = Number(match[1]);
        if (overlaps(span, claimed) || !Number.isFinite(value)) continue;
        claimed.push(span);
        out.push({ kind: 'ALCOHOL', value, unit: match[2] ?? null, text: match[0], ...span });
      }
    }

    // A bare mention only counts when no level was given
    if (out.length === 0) {
      const mention = ALCOHOL_MENTION_RE.exec(text);
      if (mention) {
        out.push({
          kind: 'ALCOHOL',
          value: null,
          unit: null,
          text: mention[0],
          start: mention.index,
          end: mention.index + mention[0].length,
        });
      }
    }
    return out.sort((a, b) => a.start - b.start);
  }
}
