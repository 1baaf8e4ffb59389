/**
 * IntentDetector: classifies a traffic-law question into one intent.
 *
 * Ordered rule evaluation: INTENT_RULES is walked top to bottom and the first
 * rule with a matching pattern wins. The order is part of the contract, so the
 * table carries a version that is reported with every detection.
 *
 * Intents:
 * - penalty_inquiry: how much is the fine for a behavior
 * - additional_measures: licence suspension, vehicle impoundment, …
 * - law_reference: which article / decree applies
 * - behavior_check: is this behavior a violation at all
 * - similar_cases: behaviors similar to a described one
 * - general_info: fallback when no rule matches
 */

import type { DetectedIntent, IntentType } from '../../shared/types/query';
import { createLogger } from './logger';
import { TextPreprocessor } from './text-preprocessor';

const log = createLogger('IntentDetector');

export interface IntentRule {
  label: string;
  intent: IntentType;
  confidence: number;
  patterns: RegExp[];
}

/** Bump whenever INTENT_RULES changes order, patterns or confidences. */
export const INTENT_RULES_VERSION = '1.0.0';

const DEFAULT_RULE = 'default';
const DEFAULT_CONFIDENCE = 0.5;

/** Whole-phrase alternation, bounded by non-word characters */
function phrase(...alternatives: string[]): RegExp {
  return new RegExp(`(?<![\\p{L}\\p{N}])(?:${alternatives.join('|')})(?![\\p{L}\\p{N}])`, 'u');
}

/**
 * Rule table, highest priority first. Patterns are written against
 * TextPreprocessor.normalize output (lowercase, no punctuation).
 */
export const INTENT_RULES: readonly IntentRule[] = [
  // ─── How much is the fine ───
  {
    label: 'penalty-amount',
    intent: 'penalty_inquiry',
    confidence: 0.9,
    patterns: [
      phrase('mức phạt', 'tiền phạt', 'phạt tiền', 'nộp phạt', 'xử phạt', 'bị phạt'),
      phrase('phạt bao nhiêu', 'phạt như thế nào', 'phạt thế nào', 'phạt ra sao', 'bao nhiêu tiền'),
    ],
  },
  // ─── Licence suspension, impoundment, remedial measures ───
  {
    label: 'additional-measure',
    intent: 'additional_measures',
    confidence: 0.85,
    patterns: [
      phrase('tước bằng', 'tước giấy phép', 'tước quyền sử dụng', 'tạm giữ', 'giữ xe', 'tịch thu'),
      phrase('hình phạt bổ sung', 'biện pháp bổ sung', 'biện pháp khắc phục', 'xử lý bổ sung'),
    ],
  },
  // ─── Which article / decree ───
  {
    label: 'law-citation',
    intent: 'law_reference',
    confidence: 0.8,
    patterns: [
      phrase('điều \\d+', 'điều khoản', 'khoản \\d+', 'nghị định', 'thông tư', 'luật nào', 'theo luật'),
      phrase('căn cứ pháp lý', 'cơ sở pháp lý', 'văn bản nào', 'quy định ở đâu', 'quy định tại đâu', 'quy định nào'),
    ],
  },
  // ─── Is it a violation at all ───
  {
    label: 'legality-check',
    intent: 'behavior_check',
    confidence: 0.8,
    patterns: [
      phrase('có vi phạm', 'có bị vi phạm', 'có phạm luật', 'có sai luật', 'có trái luật'),
      phrase('vi phạm không', 'phạm luật không', 'sai luật không', 'được phép không', 'có được phép'),
    ],
  },
  // ─── Similar behaviors ───
  {
    label: 'similar-cases',
    intent: 'similar_cases',
    confidence: 0.7,
    patterns: [
      phrase('tương tự', 'giống như', 'giống với', 'na ná'),
      phrase('trường hợp khác', 'hành vi khác', 'vi phạm khác', 'vi phạm liên quan', 'hành vi liên quan'),
    ],
  },
  // ─── A described offence without explicit question words ───
  {
    label: 'violation-description',
    intent: 'penalty_inquiry',
    confidence: 0.7,
    patterns: [
      phrase('vượt đèn', 'đèn đỏ', 'đèn vàng', 'không đội mũ', 'mũ bảo hiểm', 'dây an toàn'),
      phrase('quá tốc độ', 'chạy quá', 'vượt quá tốc độ', 'nồng độ cồn', 'rượu bia', 'say rượu'),
      phrase('ngược chiều', 'lấn làn', 'sai làn', 'đua xe', 'quá tải', 'chở quá'),
      phrase('không có giấy phép', 'không có bằng lái', 'đỗ xe', 'dừng xe', 'vượt xe', 'điện thoại'),
    ],
  },
];

interface CompiledRule {
  rule: IntentRule;
  folded: RegExp[];
}

export class IntentDetector {
  private readonly compiled: CompiledRule[];

  constructor(
    private readonly preprocessor: TextPreprocessor = new TextPreprocessor(),
    rules: readonly IntentRule[] = INTENT_RULES,
  ) {
    this.compiled = rules.map((rule) => ({
      rule,
      folded: rule.patterns.map((regex) => new RegExp(this.foldSource(regex.source), regex.flags)),
    }));
  }

  /**
   * Detect the intent of a question. Unaccented queries ("muc phat vuot den do")
   * are matched against the diacritic-free form of every pattern.
   */
  detect(text: string): DetectedIntent {
    const normalized = this.preprocessor.normalize(text);
    const folded = this.preprocessor.fold(normalized);
    const unaccented = normalized === folded;

    for (const { rule, folded: foldedPatterns } of this.compiled) {
      const patterns = unaccented ? foldedPatterns : rule.patterns;
      const target = unaccented ? folded : normalized;
      if (patterns.some((regex) => regex.test(target))) {
        log.debug(`"${normalized}" → ${rule.intent} (${rule.label})`);
        return {
          type: rule.intent,
          confidence: rule.confidence,
          rule: rule.label,
          rulesVersion: INTENT_RULES_VERSION,
        };
      }
    }

    return {
      type: 'general_info',
      confidence: DEFAULT_CONFIDENCE,
      rule: DEFAULT_RULE,
      rulesVersion: INTENT_RULES_VERSION,
    };
  }

  private foldSource(source: string): string {
    return source.normalize('NFD').replace(/\p{M}/gu, '').replace(/đ/g, 'd');
  }
}
