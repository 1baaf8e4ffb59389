import { describe, it, expect, vi } from 'vitest';

vi.mock('../src/main/services/logger', () => ({
  createLogger: vi.fn(() => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  })),
}));

import { AnswerSynthesizer, type ConfidenceSignals } from '../src/main/services/answer-synthesizer';
import { KnowledgeReasoner } from '../src/main/services/knowledge-reasoner';
import {
  LOW_CONFIDENCE_NOTICE,
  LOW_CONFIDENCE_SUGGESTIONS,
  NO_DATA_MESSAGE,
  NO_DATA_SUGGESTIONS,
} from '../src/shared/constants';
import type { ConfidenceLevel, DetectedIntent, IntentType, MatchCandidate } from '../src/shared/types/query';
import { TEST_RECORDS, createGraph } from './helpers/fixtures';

const synthesizer = new AnswerSynthesizer({ high: 0.8, medium: 0.6 });
const { graph } = createGraph();
const reasoner = new KnowledgeReasoner(graph, {
  maxDepth: 2,
  rankingScoreDecimals: 2,
  dropVehicleMismatches: false,
  similarLimit: 5,
});

function intent(type: IntentType): DetectedIntent {
  return { type, confidence: 0.9, rule: 'test', rulesVersion: '1.0.0' };
}

function answerFor(candidates: MatchCandidate[], type: IntentType = 'penalty_inquiry') {
  const empty = { VEHICLE: [], SPEED: [], ALCOHOL: [], KEYWORD: [] };
  return synthesizer.synthesize({
    question: 'Câu hỏi?',
    normalizedQuestion: 'câu hỏi',
    intent: intent(type),
    entities: [],
    paths: reasoner.reason(candidates, type, empty),
  });
}

const RED_LIGHT = TEST_RECORDS[0].description;

describe('AnswerSynthesizer', () => {
  // ─── Confidence ───

  describe('confidenceOf', () => {
    it.each<[ConfidenceSignals, ConfidenceLevel]>([
      [{ topScore: null, agreement: 'not_applicable', pathComplete: false }, 'NONE'],
      [{ topScore: 0.85, agreement: 'full', pathComplete: true }, 'HIGH'],
      [{ topScore: 0.8, agreement: 'not_applicable', pathComplete: true }, 'HIGH'],
      [{ topScore: 0.85, agreement: 'none', pathComplete: true }, 'HIGH'],
      [{ topScore: 0.85, agreement: 'full', pathComplete: false }, 'MEDIUM'],
      [{ topScore: 0.85, agreement: 'none', pathComplete: false }, 'MEDIUM'],
      [{ topScore: 0.7, agreement: 'not_applicable', pathComplete: true }, 'MEDIUM'],
      [{ topScore: 0.6, agreement: 'full', pathComplete: true }, 'MEDIUM'],
      [{ topScore: 0.7, agreement: 'partial', pathComplete: true }, 'LOW'],
      [{ topScore: 0.7, agreement: 'none', pathComplete: true }, 'LOW'],
      [{ topScore: 0.7, agreement: 'full', pathComplete: false }, 'LOW'],
      [{ topScore: 0.59, agreement: 'full', pathComplete: true }, 'LOW'],
    ])('%j → %s', (signals, expected) => {
      expect(synthesizer.confidenceOf(signals)).toBe(expected);
    });
  });

  // ─── Answers ───

  describe('synthesize', () => {
    it('assembles penalty, measures and citations from the top path', () => {
      const answer = answerFor([{ behaviorId: 'behavior:mc-red-light', score: 0.9 }]);
      expect(answer.confidence).toBe('HIGH');
      expect(answer.behavior).toEqual({
        id: 'behavior:mc-red-light',
        description: RED_LIGHT,
        category: 'Xe mô tô, xe gắn máy',
        severity: 'Nghiêm trọng',
      });
      expect(answer.penalty).toEqual({
        fineMin: 800000,
        fineMax: 1000000,
        currency: 'VNĐ',
        text: 'Phạt tiền từ 800.000 đến 1.000.000 VNĐ',
      });
      expect(answer.additionalMeasures).toEqual(['Tước quyền sử dụng giấy phép lái xe từ 01 tháng đến 03 tháng']);
      expect(answer.citations).toEqual([
        {
          article: 'Điều 6 khoản 4 điểm e',
          documentSource: 'Nghị định 100/2019/NĐ-CP',
          documentType: 'Nghị định',
          fullReference: 'Điều 6 khoản 4 điểm e Nghị định 100/2019/NĐ-CP',
        },
      ]);
      expect(answer.message).toBe(
        [
          `Hành vi: ${RED_LIGHT}`,
          'Mức phạt: Phạt tiền từ 800.000 đến 1.000.000 VNĐ',
          'Biện pháp bổ sung: Tước quyền sử dụng giấy phép lái xe từ 01 tháng đến 03 tháng',
          'Căn cứ pháp lý: Điều 6 khoản 4 điểm e Nghị định 100/2019/NĐ-CP',
        ].join('\n'),
      );
      expect(answer.suggestions).toEqual([]);
    });

    it('lists the other candidates as related', () => {
      const answer = answerFor([
        { behaviorId: 'behavior:mc-red-light', score: 0.9 },
        { behaviorId: 'behavior:car-red-light', score: 0.65 },
      ]);
      expect(answer.relatedCandidates).toEqual([
        {
          behaviorId: 'behavior:car-red-light',
          description: TEST_RECORDS[2].description,
          score: 0.65,
          agreement: 'not_applicable',
        },
      ]);
    });

    it('prefixes low-confidence answers with a notice', () => {
      const answer = answerFor([{ behaviorId: 'behavior:mc-no-helmet', score: 0.65 }], 'additional_measures');
      expect(answer.confidence).toBe('LOW');
      expect(answer.pathComplete).toBe(false);
      expect(answer.missingTypes).toEqual(['ADDITIONAL_MEASURE']);
      expect(answer.message.startsWith(`${LOW_CONFIDENCE_NOTICE}\nHành vi: `)).toBe(true);
      expect(answer.suggestions).toEqual([...LOW_CONFIDENCE_SUGGESTIONS]);
    });

    it('describes similar behaviors for similar_cases', () => {
      const answer = answerFor([{ behaviorId: 'behavior:car-red-light', score: 0.7 }], 'similar_cases');
      expect(answer.similarCases.map((c) => [c.behaviorId, c.weight])).toEqual([
        ['behavior:pedestrian-red-light', 11 / 13],
        ['behavior:mc-red-light', 13 / 17],
      ]);
      expect(answer.message).toBe(
        [
          `Các hành vi tương tự với: ${TEST_RECORDS[2].description}`,
          TEST_RECORDS[3].description,
          RED_LIGHT,
        ].join('\n'),
      );
      expect(answer.penalty).toBeNull();
    });

    it('says so when a behavior has no similar ones', () => {
      const answer = answerFor([{ behaviorId: 'behavior:alcohol', score: 0.9 }], 'similar_cases');
      expect(answer.message).toBe(`Không tìm thấy hành vi tương tự với: ${TEST_RECORDS[6].description}`);
      expect(answer.confidence).toBe('MEDIUM');
    });

    it('returns the canonical refusal without paths', () => {
      const answer = answerFor([]);
      expect(answer).toMatchObject({
        confidence: 'NONE',
        score: null,
        behavior: null,
        penalty: null,
        additionalMeasures: [],
        citations: [],
        similarCases: [],
        relatedCandidates: [],
        message: NO_DATA_MESSAGE,
        suggestions: [...NO_DATA_SUGGESTIONS],
      });
    });
  });
});
