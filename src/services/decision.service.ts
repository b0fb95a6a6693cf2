import { ConfidenceThresholds } from '../config/agent';
import { ConversationTurn, DECISION_KINDS, DecisionKind, DecisionOutput } from '../types/agent';
import { TextGenerator } from '../types/llm';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { buildDecisionPrompt, DECISION_SYSTEM_PROMPT, LeadSummary } from '../utils/prompts';

export interface ConfidenceFactors {
  sourcesQuality: number;
  queryComplexity: number;
  contextCompleteness: number;
  toolSuccessRate: number;
  conflictDetected: boolean;
}

export interface EscalationCheck {
  escalate: boolean;
  reason: string | null;
}

export const clamp01 = (value: number): number => Math.max(0, Math.min(1, value));

function isDecisionKind(value: string): value is DecisionKind {
  return DECISION_KINDS.some((kind) => kind === value);
}

function parseConfidence(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') return 0.5;
  const value = Number(raw.trim());
  return Number.isNaN(value) ? 0.5 : clamp01(value);
}

/**
 * Total parser for the line-oriented decision format. Anything that does not
 * name one of the five decisions comes back as ESCALATE.
 */
export function parseDecision(response: string): DecisionOutput {
  const fields = new Map<string, string>();
  for (const line of response.trim().split('\n')) {
    const separator = line.indexOf(':');
    if (separator === -1) continue;
    fields.set(line.slice(0, separator).trim().toUpperCase(), line.slice(separator + 1).trim());
  }

  const rawDecision = (fields.get('DECISION') ?? '').toUpperCase();
  const recognized = isDecisionKind(rawDecision);

  const toolsText = fields.get('TOOLS_NEEDED') ?? 'none';
  const requiredTools =
    toolsText.toLowerCase() === 'none'
      ? []
      : toolsText
          .split(',')
          .map((tool) => tool.trim())
          .filter((tool) => tool.length > 0);

  return {
    decision: recognized ? rawDecision : 'ESCALATE',
    confidence: parseConfidence(fields.get('CONFIDENCE')),
    reasoning: fields.get('REASONING') || 'No reasoning provided',
    requiredTools,
    retrievalNeeded: (fields.get('RETRIEVAL_NEEDED') ?? 'no').toLowerCase() === 'yes',
    ...(recognized ? {} : { escalationReason: 'unrecognized_decision' }),
  };
}

export class DecisionService {
  constructor(private generator: TextGenerator, private thresholds: ConfidenceThresholds) {}

  /** Never rejects; a generation failure produces an ESCALATE decision. */
  async decide(
    query: string,
    conversationHistory: ConversationTurn[],
    leadContext: LeadSummary,
    previousEvidence: readonly unknown[] = []
  ): Promise<DecisionOutput> {
    const prompt = buildDecisionPrompt(query, conversationHistory, leadContext, previousEvidence.length);

    try {
      const response = await this.generator.generate({
        prompt,
        systemPrompt: DECISION_SYSTEM_PROMPT,
        temperature: 0.3,
        maxTokens: 500,
      });

      const output = parseDecision(response);

      logger.info('decision_made', {
        decision: output.decision,
        confidence: output.confidence,
        reasoning: output.reasoning,
        requiredTools: output.requiredTools,
        retrievalNeeded: output.retrievalNeeded,
      });

      return output;
    } catch (error) {
      const message = errorMessage(error);
      logger.error('Decision engine failed', { errorType: 'decision_engine_error', error: message });

      return {
        decision: 'ESCALATE',
        confidence: 0,
        reasoning: `Decision engine error: ${message}`,
        requiredTools: [],
        retrievalNeeded: false,
        escalationReason: 'internal_error',
      };
    }
  }

  calculateConfidence(factors: ConfidenceFactors): number {
    const base =
      0.3 * factors.sourcesQuality +
      0.2 * (1 - factors.queryComplexity) +
      0.3 * factors.contextCompleteness +
      0.2 * factors.toolSuccessRate;

    const confidence = clamp01(factors.conflictDetected ? base * 0.5 : base);

    logger.info('confidence_calculated', {
      confidence,
      factors,
      thresholdMet: confidence >= this.thresholds.high,
    });

    return confidence;
  }

  shouldEscalate(confidence: number, errorOccurred: boolean = false, sensitiveTopic: boolean = false): EscalationCheck {
    if (errorOccurred) return { escalate: true, reason: 'error_in_processing' };
    if (sensitiveTopic) return { escalate: true, reason: 'sensitive_topic_detected' };
    if (confidence < this.thresholds.low) return { escalate: true, reason: 'confidence_below_threshold' };
    return { escalate: false, reason: null };
  }
}
