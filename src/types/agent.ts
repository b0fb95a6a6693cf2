import { Evidence } from './evidence';
import { Lead, LeadSource } from './lead';
import { ToolKind, ToolResult } from './tool';

export const DECISION_KINDS = ['RETRIEVE', 'REASON_ONLY', 'USE_TOOL', 'CLARIFY', 'ESCALATE'] as const;

export type DecisionKind = (typeof DECISION_KINDS)[number];

export interface DecisionOutput {
  readonly decision: DecisionKind;
  readonly confidence: number;
  readonly reasoning: string;
  readonly requiredTools: readonly string[];
  readonly retrievalNeeded: boolean;
  readonly escalationReason?: string;
}

export interface ConversationTurn {
  role: 'lead' | 'agent';
  content: string;
}

export type NextAction = 'human_followup' | 'await_tool_outcome' | 'await_clarification' | 'none';

export const RUN_STAGES = [
  'intake',
  'loadContext',
  'decide',
  'retrieve',
  'compose',
  'tools',
  'escalate',
  'memory',
  'finalize',
] as const;

export type RunStage = (typeof RUN_STAGES)[number];

export interface ToolCallRecord {
  tool: string;
  kind: ToolKind | null;
  action: string;
  result: ToolResult;
}

export interface InboundLead {
  email: string;
  name?: string;
  message: string;
  source: LeadSource;
  metadata?: Record<string, unknown>;
}

/**
 * Mutable state threaded through one run. Only the orchestrator writes it;
 * escalation goes through `markEscalated` so the reason is never missing.
 */
export interface RunState {
  readonly traceId: string;
  readonly leadEmail: string;
  readonly leadName: string | null;
  readonly query: string;
  readonly source: LeadSource;
  readonly inboundMetadata: Record<string, unknown>;
  readonly startedAt: number;

  leadId: string | null;
  leadContext: Lead | null;
  conversationHistory: ConversationTurn[];

  decision: DecisionKind | null;
  decisionReasoning: string;
  confidence: number;
  retrievalNeeded: boolean;

  retrievedSources: Evidence[];
  rerankedSources: Evidence[];
  conflictDetected: boolean;

  responseText: string;
  grounded: boolean;
  sourcesUsed: string[];

  toolsToUse: string[];
  toolResults: ToolCallRecord[];
  toolErrors: string[];

  escalated: boolean;
  escalationReason: string | null;
  escalationHandled: boolean;
  errors: string[];
  nextAction: NextAction | null;
  trail: RunStage[];
}

export interface AgentResponse {
  trace_id: string;
  lead_id: string | null;
  response_text: string;
  confidence: number;
  decision_type: string;
  sources_used: string[];
  tools_called: string[];
  escalated: boolean;
  escalation_reason: string | null;
  next_action: NextAction;
}
