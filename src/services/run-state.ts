import { AgentResponse, InboundLead, NextAction, RunStage, RunState } from '../types/agent';

/** Allowed successors per stage. `finalize` is terminal. */
export const STAGE_TRANSITIONS: Record<RunStage, readonly RunStage[]> = {
  intake: ['loadContext'],
  loadContext: ['decide'],
  decide: ['retrieve', 'compose'],
  retrieve: ['compose'],
  compose: ['escalate', 'tools', 'memory'],
  tools: ['memory'],
  escalate: ['memory'],
  memory: ['finalize'],
  finalize: [],
};

export class InvalidTransitionError extends Error {
  constructor(public from: RunStage, public to: RunStage) {
    super(`Invalid stage transition: ${from} -> ${to}`);
    Object.setPrototypeOf(this, InvalidTransitionError.prototype);
  }
}

export function assertTransition(from: RunStage, to: RunStage): void {
  if (!STAGE_TRANSITIONS[from].includes(to)) {
    throw new InvalidTransitionError(from, to);
  }
}

export function createRunState(traceId: string, inbound: InboundLead, startedAt: number): RunState {
  return {
    traceId,
    leadEmail: inbound.email,
    leadName: inbound.name ?? null,
    query: inbound.message,
    source: inbound.source,
    inboundMetadata: inbound.metadata ?? {},
    startedAt,

    leadId: null,
    leadContext: null,
    conversationHistory: [],

    decision: null,
    decisionReasoning: '',
    confidence: 0,
    retrievalNeeded: false,

    retrievedSources: [],
    rerankedSources: [],
    conflictDetected: false,

    responseText: '',
    grounded: false,
    sourcesUsed: [],

    toolsToUse: [],
    toolResults: [],
    toolErrors: [],

    escalated: false,
    escalationReason: null,
    escalationHandled: false,
    errors: [],
    nextAction: null,
    trail: [],
  };
}

/** The only way a run becomes escalated; keeps flag and reason together. */
export function markEscalated(state: RunState, reason: string): void {
  state.escalated = true;
  state.escalationReason = reason;
}

export function resolveNextAction(state: RunState): NextAction {
  if (state.escalated) return 'human_followup';
  if (state.toolsToUse.length > 0) return 'await_tool_outcome';
  if (state.decision === 'CLARIFY') return 'await_clarification';
  return 'none';
}

export function toAgentResponse(state: RunState): AgentResponse {
  return {
    trace_id: state.traceId,
    lead_id: state.leadId,
    response_text: state.responseText,
    confidence: state.confidence,
    decision_type: (state.decision ?? 'ESCALATE').toLowerCase(),
    sources_used: [...state.sourcesUsed],
    tools_called: [...state.toolsToUse],
    escalated: state.escalated,
    escalation_reason: state.escalationReason,
    next_action: state.nextAction ?? resolveNextAction(state),
  };
}
