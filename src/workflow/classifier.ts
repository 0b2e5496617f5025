/**
 * Workflow classifier.
 *
 * Maps an instruction to a workflow pattern from keyword intents in English
 * and Korean. When intent is unclear the least-privileged pattern
 * (`DATA_ONLY`) is chosen; trading is never inferred without analysis.
 * Trading needs an order command such as "place a buy order", "buy 10 AAPL"
 * or "매수 주문".
 *
 * @module workflow/classifier
 */

import type { ClassificationResult, WorkflowPattern, WorkflowRequest } from './types.js';

type Intent = 'collection' | 'analysis' | 'trading';

const INTENT_PATTERNS: Record<Intent, RegExp[]> = {
  collection: [
    /\b(?:collect\w*|gather\w*|fetch\w*|retriev\w*|scrap\w*|crawl\w*|data)\b/gi,
    /수집|조회|데이터/g,
  ],
  analysis: [
    /\b(?:analy[sz]\w*|trends?|forecast\w*|evaluat\w*|assess\w*|insights?)\b/gi,
    /분석|예측|평가/g,
  ],
  // Trading counts only as a command, never as a topic ("buying trends", "trade volume")
  trading: [
    /\b(?:execute|place|make|submit)\s+(?:(?:a|an|the|my)\s+)?(?:(?:buy|sell|market|limit)\s+)?(?:trades?|orders?)\b/gi,
    /\b(?:buy|sell)\s+\d[\d,.]*\s+(?:shares?\s+(?:of\s+)?)?[a-z][\w.]*/gi,
    /(?:매수|매도)\s*(?:주문|해|하)|주문\s*(?:을\s*)?(?:넣|내|실행)/g,
  ],
};

const NEGATIONS = new Set(['no', 'not', "don't", 'dont', 'never', 'without', 'skip', "won't", 'avoid']);

/** How many words before a keyword are searched for a negation */
const NEGATION_WINDOW = 3;

/** Korean negation follows the keyword ("분석 없이", "매매 하지 마") */
const TRAILING_NEGATION = /^\S*\s*(?:없이|하지\s*마|제외|말고)/;

function isNegated(text: string, index: number, length: number): boolean {
  const preceding = text
    .slice(0, index)
    .toLowerCase()
    .replace(/’/g, "'")
    .trim()
    .split(/\s+/)
    .slice(-NEGATION_WINDOW)
    .map((word) => word.replace(/[^\w']/g, ''));

  if (preceding.some((word) => NEGATIONS.has(word))) {
    return true;
  }

  return TRAILING_NEGATION.test(text.slice(index + length, index + length + 16));
}

function hasIntent(text: string, intent: Intent): boolean {
  for (const pattern of INTENT_PATTERNS[intent]) {
    for (const match of text.matchAll(pattern)) {
      if (!isNegated(text, match.index ?? 0, match[0].length)) {
        return true;
      }
    }
  }
  return false;
}

/**
 * Detect which intents an instruction expresses, ignoring negated ones.
 */
export function detectIntents(instruction: string): ClassificationResult['signals'] {
  return {
    collection: hasIntent(instruction, 'collection'),
    analysis: hasIntent(instruction, 'analysis'),
    trading: hasIntent(instruction, 'trading'),
  };
}

/**
 * Classify a request into a workflow pattern.
 *
 * - analysis + trading: `FULL_WORKFLOW`
 * - analysis only: `DATA_ANALYSIS`
 * - collection only: `DATA_ONLY`
 * - anything else: `DATA_ONLY`, flagged ambiguous
 *
 * An explicit `request.pattern` wins over the heuristics.
 */
export function classifyRequest(request: Pick<WorkflowRequest, 'instruction' | 'pattern'>): ClassificationResult {
  const signals = detectIntents(request.instruction);

  if (request.pattern) {
    return { pattern: request.pattern, ambiguous: false, reason: 'pattern requested explicitly', signals };
  }

  const decide = (pattern: WorkflowPattern, ambiguous: boolean, reason: string): ClassificationResult => ({
    pattern,
    ambiguous,
    reason,
    signals,
  });

  if (signals.analysis && signals.trading) {
    return decide('FULL_WORKFLOW', false, 'analysis and trading requested');
  }
  if (signals.analysis) {
    return decide('DATA_ANALYSIS', false, 'analysis requested');
  }
  if (signals.trading) {
    return decide('DATA_ONLY', true, 'trading requested without analysis');
  }
  if (signals.collection) {
    return decide('DATA_ONLY', false, 'data collection requested');
  }
  return decide('DATA_ONLY', true, 'no recognised intent');
}
