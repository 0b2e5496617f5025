/**
 * Tests for the workflow classifier.
 */

import { describe, it, expect } from 'vitest';
import { classifyRequest, detectIntents } from './classifier.js';

describe('classifyRequest', () => {
  describe('clear intents', () => {
    it('should classify pure collection as DATA_ONLY', () => {
      const result = classifyRequest({ instruction: "collect today's market data" });

      expect(result.pattern).toBe('DATA_ONLY');
      expect(result.ambiguous).toBe(false);
      expect(result.reason).toBe('data collection requested');
    });

    it('should classify collection plus analysis as DATA_ANALYSIS', () => {
      const result = classifyRequest({ instruction: 'collect and analyze market trends' });

      expect(result.pattern).toBe('DATA_ANALYSIS');
      expect(result.ambiguous).toBe(false);
    });

    it('should classify analysis plus trading as FULL_WORKFLOW', () => {
      const result = classifyRequest({ instruction: 'collect data, analyze, then execute trade' });

      expect(result.pattern).toBe('FULL_WORKFLOW');
      expect(result.signals).toEqual({ collection: true, analysis: true, trading: true });
    });

    it('should understand Korean instructions', () => {
      expect(classifyRequest({ instruction: '삼성전자 데이터 수집 후 분석하고 매수해줘' }).pattern).toBe(
        'FULL_WORKFLOW'
      );
      expect(classifyRequest({ instruction: '시장 데이터를 수집하고 분석해줘' }).pattern).toBe(
        'DATA_ANALYSIS'
      );
    });
  });

  describe('topic words', () => {
    it('should keep trading out of analysis requests about buying and selling', () => {
      expect(classifyRequest({ instruction: 'collect and analyze consumer buying trends' }).pattern).toBe('DATA_ANALYSIS');
      expect(classifyRequest({ instruction: 'analyze the best-selling products' }).pattern).toBe('DATA_ANALYSIS');
      expect(classifyRequest({ instruction: 'analyze trade volume data' }).pattern).toBe('DATA_ANALYSIS');
    });
  });

  describe('negation', () => {
    it('should ignore a negated trading intent', () => {
      const result = classifyRequest({ instruction: "collect data and analyze it but don't place an order" });

      expect(result.pattern).toBe('DATA_ANALYSIS');
      expect(result.signals.trading).toBe(false);
    });

    it('should ignore a negated analysis intent', () => {
      const result = classifyRequest({ instruction: 'gather prices without analysis' });

      expect(result.pattern).toBe('DATA_ONLY');
      expect(result.ambiguous).toBe(false);
    });

    it('should ignore a Korean trailing negation', () => {
      expect(classifyRequest({ instruction: '분석 없이 데이터만 수집' }).pattern).toBe('DATA_ONLY');
    });
  });

  describe('ambiguous requests', () => {
    it('should default to DATA_ONLY without any intent', () => {
      const result = classifyRequest({ instruction: 'hello there' });

      expect(result).toEqual({
        pattern: 'DATA_ONLY',
        ambiguous: true,
        reason: 'no recognised intent',
        signals: { collection: false, analysis: false, trading: false },
      });
    });

    it('should not infer trading without analysis', () => {
      const result = classifyRequest({ instruction: 'buy 10 AAPL' });

      expect(result.pattern).toBe('DATA_ONLY');
      expect(result.ambiguous).toBe(true);
      expect(result.reason).toBe('trading requested without analysis');
    });
  });

  it('should let an explicit pattern override the heuristics', () => {
    const result = classifyRequest({ instruction: 'hello there', pattern: 'FULL_WORKFLOW' });

    expect(result.pattern).toBe('FULL_WORKFLOW');
    expect(result.ambiguous).toBe(false);
    expect(result.reason).toBe('pattern requested explicitly');
  });
});

describe('detectIntents', () => {
  it('should match word forms', () => {
    expect(detectIntents('Place an order after forecasting scraped prices')).toEqual({
      collection: true,
      analysis: true,
      trading: true,
    });
  });

  it('should treat order commands as trading', () => {
    expect(detectIntents('place a buy order').trading).toBe(true);
    expect(detectIntents('make a trade').trading).toBe(true);
    expect(detectIntents('sell 5 shares of TSLA').trading).toBe(true);
    expect(detectIntents('삼성전자 매수 주문 넣어줘').trading).toBe(true);
  });

  it('should not treat buying or trade as a topic as trading', () => {
    expect(detectIntents('collect and analyze consumer buying trends')).toEqual({
      collection: true,
      analysis: true,
      trading: false,
    });
    expect(detectIntents('analyze the best-selling products').trading).toBe(false);
    expect(detectIntents('analyze trade volume data').trading).toBe(false);
    expect(detectIntents('buy some shares').trading).toBe(false);
    expect(detectIntents('거래량 데이터를 분석해줘').trading).toBe(false);
  });

  it('should not match inside unrelated words', () => {
    expect(detectIntents('a tradesman evaluation-free database')).toEqual({
      collection: false,
      analysis: true,
      trading: false,
    });
  });
});
