import * as chrono from 'chrono-node';
import { v4 as uuidv4 } from 'uuid';
import { RetrievalOptions } from '../config/agent';
import {
  AgentResponse,
  ConversationTurn,
  InboundLead,
  RunStage,
  RunState,
  ToolCallRecord,
} from '../types/agent';
import { Interaction, LeadStore } from '../types/lead';
import { TextGenerator } from '../types/llm';
import { ToolKind, ToolResult, ToolSet } from '../types/tool';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { safeAsync } from '../utils/result';
import {
  buildComposePrompt,
  COMPOSE_FAILURE_MESSAGE,
  ESCALATION_MESSAGE,
  LeadSummary,
  ORCHESTRATION_FAILURE_MESSAGE,
  RESPONSE_SYSTEM_PROMPT,
} from '../utils/prompts';
import { ConversationMemoryService } from './conversation-memory.service';
import { DecisionService, clamp01 } from './decision.service';
import { formatCitation } from './retrieval/evidence';
import { RerankerService } from './retrieval/reranker.service';
import { RetrieverService } from './retrieval/retriever.service';
import {
  assertTransition,
  createRunState,
  markEscalated,
  resolveNextAction,
  toAgentResponse,
} from './run-state';
import { ToolExecutor } from './tools/tool.executor';
import { resolveToolKind } from './tools/tool.registry';

const HISTORY_WINDOW = 10;
const COMPOSE_EVIDENCE_LIMIT = 3;
const CONFLICT_CONFIDENCE_PENALTY = 0.7;
const BOOKING_INTENT = /call|meeting|schedule/i;
const COMPOSE_FAILURE_REASON = 'response_generation_error';

/** Everything a run talks to. Built once at startup and passed in. */
export interface AgentDependencies {
  leads: LeadStore;
  decisionEngine: DecisionService;
  retriever: RetrieverService;
  reranker: RerankerService;
  generator: TextGenerator;
  toolExecutor: ToolExecutor;
  tools: ToolSet;
  conversationMemory: ConversationMemoryService;
  retrieval: RetrievalOptions;
  clock?: () => number;
  newTraceId?: () => string;
}

type StageHandler = (state: RunState) => Promise<RunStage | null>;

type ToolHandler = (state: RunState) => Promise<ToolCallRecord[]>;

function runMeta(state: RunState): Record<string, unknown> {
  return { traceId: state.traceId, leadId: state.leadId };
}

function leadSummary(state: RunState): LeadSummary {
  return {
    email: state.leadEmail,
    name: state.leadContext?.name ?? state.leadName,
    status: state.leadContext?.status,
    company: state.leadContext?.company,
  };
}

function toTurns(interactions: Interaction[]): ConversationTurn[] {
  return [...interactions].reverse().map((interaction) => ({
    role: interaction.message_from,
    content: interaction.message_text,
  }));
}

/**
 * Runs one inbound lead message through
 * intake → loadContext → decide → [retrieve] → compose → [escalate | tools] → memory → finalize.
 *
 * A run always reaches finalize or the top-level fallback; nothing below
 * `handleLead` rejects.
 */
export class AgentService {
  private stages: Record<RunStage, StageHandler>;
  private toolHandlers: Record<ToolKind, ToolHandler>;
  private clock: () => number;
  private newTraceId: () => string;

  constructor(private deps: AgentDependencies) {
    this.clock = deps.clock ?? Date.now;
    this.newTraceId = deps.newTraceId ?? (() => uuidv4());

    this.stages = {
      intake: (state) => this.intake(state),
      loadContext: (state) => this.loadContext(state),
      decide: (state) => this.decide(state),
      retrieve: (state) => this.retrieve(state),
      compose: (state) => this.compose(state),
      tools: (state) => this.executeTools(state),
      escalate: (state) => this.escalate(state),
      memory: (state) => this.updateMemory(state),
      finalize: (state) => this.finalize(state),
    };

    this.toolHandlers = {
      crm: (state) => this.runCrm(state),
      calendar: (state) => this.runCalendar(state),
      email: (state) => this.runEmail(state),
    };
  }

  async handleLead(inbound: InboundLead): Promise<AgentResponse> {
    const state = await this.run(inbound);
    return toAgentResponse(state);
  }

  async run(inbound: InboundLead): Promise<RunState> {
    const state = createRunState(this.newTraceId(), inbound, this.clock());

    try {
      let stage: RunStage | null = 'intake';
      while (stage) {
        state.trail.push(stage);
        const next: RunStage | null = await this.stages[stage](state);
        if (next) assertTransition(stage, next);
        stage = next;
      }
    } catch (error) {
      const message = errorMessage(error);
      logger.error('Agent run failed', { ...runMeta(state), errorType: 'orchestration_error', error: message });

      state.errors.push(`Orchestration error: ${message}`);
      markEscalated(state, 'orchestration_error');
      state.responseText = ORCHESTRATION_FAILURE_MESSAGE;
      state.nextAction = 'human_followup';
    }

    return state;
  }

  private async intake(state: RunState): Promise<RunStage> {
    logger.info('agent_run_started', {
      ...runMeta(state),
      leadEmail: state.leadEmail,
      source: state.source,
      query: state.query.substring(0, 200),
    });
    return 'loadContext';
  }

  private async loadContext(state: RunState): Promise<RunStage> {
    const { lead, isNew } = await this.deps.leads.findOrCreateLead({
      email: state.leadEmail,
      name: state.leadName,
      source: state.source,
      metadata: state.inboundMetadata,
    });
    state.leadId = lead.id;
    state.leadContext = lead;

    if (!isNew) {
      const history = await safeAsync(() => this.deps.leads.getLeadInteractions(lead.id, HISTORY_WINDOW));
      if (history.ok) {
        state.conversationHistory = toTurns(history.value);
      } else {
        state.errors.push(`History load failed: ${history.error.message}`);
        logger.warn('Conversation history unavailable', { ...runMeta(state), error: history.error.message });
      }
    }

    logger.debug('Lead context loaded', { ...runMeta(state), isNew, turns: state.conversationHistory.length });
    return 'decide';
  }

  private async decide(state: RunState): Promise<RunStage> {
    const output = await this.deps.decisionEngine.decide(
      state.query,
      state.conversationHistory,
      leadSummary(state),
      state.retrievedSources
    );

    state.decision = output.decision;
    state.confidence = output.confidence;
    state.decisionReasoning = output.reasoning;
    state.retrievalNeeded = output.retrievalNeeded;
    state.toolsToUse = [...output.requiredTools];

    if (output.decision === 'ESCALATE') {
      this.escalateRun(state, output.escalationReason ?? 'decision_escalate');
    }

    return state.retrievalNeeded ? 'retrieve' : 'compose';
  }

  private async retrieve(state: RunState): Promise<RunStage> {
    const { retriever, reranker, retrieval } = this.deps;

    const raw = await retriever.retrieve(state.query, retrieval.topK);
    reranker.rerank(raw);
    const reranked = reranker.filterLowQuality(raw, retrieval.confidenceThreshold);
    const conflict = reranker.detectConflicts(reranked);

    state.retrievedSources = raw;
    state.rerankedSources = reranked;
    state.conflictDetected = conflict;

    if (conflict) {
      state.confidence = clamp01(state.confidence * CONFLICT_CONFIDENCE_PENALTY);
      logger.warn('Conflicting sources lowered confidence', { ...runMeta(state), confidence: state.confidence });
    }

    logger.info('Evidence prepared', {
      ...runMeta(state),
      retrieved: raw.length,
      kept: reranked.length,
      citations: reranked.map(formatCitation),
      conflict,
    });
    return 'compose';
  }

  private async compose(state: RunState): Promise<RunStage> {
    const evidence = state.rerankedSources.slice(0, COMPOSE_EVIDENCE_LIMIT);
    const prompt = buildComposePrompt(state.query, state.conversationHistory, evidence, leadSummary(state));

    const generated = await safeAsync(async () => {
      const text = await this.deps.generator.generate({
        prompt,
        systemPrompt: RESPONSE_SYSTEM_PROMPT,
        temperature: 0.7,
        maxTokens: 500,
      });
      if (!text.trim()) {
        throw new Error('Empty response from text generator');
      }
      return text;
    });

    if (generated.ok) {
      state.responseText = generated.value;
      state.grounded = evidence.length > 0;
      state.sourcesUsed = evidence.map((item) => item.docTitle);

      logger.info('response_composed', {
        ...runMeta(state),
        length: generated.value.length,
        grounded: state.grounded,
        sourcesUsed: state.sourcesUsed,
      });

      const check = this.deps.decisionEngine.shouldEscalate(state.confidence);
      if (check.escalate && check.reason && !state.escalated) {
        this.escalateRun(state, check.reason);
      }
    } else {
      logger.error('Response composition failed', {
        ...runMeta(state),
        errorType: 'response_composition_error',
        error: generated.error.message,
      });
      state.errors.push(`Response composition failed: ${generated.error.message}`);
      state.responseText = COMPOSE_FAILURE_MESSAGE;
      this.escalateRun(state, COMPOSE_FAILURE_REASON);
    }

    if (state.escalated) return 'escalate';
    if (state.toolsToUse.length > 0) return 'tools';
    return 'memory';
  }

  private async executeTools(state: RunState): Promise<RunStage> {
    for (const toolName of state.toolsToUse) {
      const kind = resolveToolKind(toolName);

      if (!kind) {
        this.recordTool(state, {
          tool: toolName,
          kind: null,
          action: 'none',
          result: { success: false, error: `Unknown tool: ${toolName}`, retryAllowed: false },
        });
        continue;
      }

      const outcome = await safeAsync(() => this.toolHandlers[kind](state));
      if (outcome.ok) {
        outcome.value.forEach((record) => this.recordTool(state, { ...record, tool: toolName }));
      } else {
        const message = `Tool execution failed: ${outcome.error.message}`;
        logger.error('Tool handler failed', { ...runMeta(state), errorType: 'tool_execution_error', tool: toolName, error: message });
        this.recordTool(state, {
          tool: toolName,
          kind,
          action: 'unknown',
          result: { success: false, error: message, retryAllowed: false },
        });
      }
    }

    const calendarFailed = state.toolResults.some((record) => record.kind === 'calendar' && !record.result.success);
    if (calendarFailed && !state.escalated) {
      this.escalateRun(state, 'tool_failure');
    }
    if (state.escalated) {
      await this.handleEscalation(state);
    }

    return 'memory';
  }

  private async escalate(state: RunState): Promise<RunStage> {
    await this.handleEscalation(state);
    return 'memory';
  }

  private async updateMemory(state: RunState): Promise<RunStage> {
    const leadId = state.leadId;
    if (!leadId) {
      throw new Error('Lead id missing at memory stage');
    }

    const decisionType = state.decision ? state.decision.toLowerCase() : null;

    const stored = await safeAsync(async () => {
      await this.deps.leads.addInteraction({
        leadId,
        messageFrom: 'lead',
        messageText: state.query,
        decisionType,
        confidenceScore: state.confidence,
        toolsUsed: state.toolsToUse,
        sourcesRetrieved: state.sourcesUsed,
      });
      await this.deps.leads.addInteraction({
        leadId,
        messageFrom: 'agent',
        messageText: state.responseText,
        decisionType,
        confidenceScore: state.confidence,
      });
    });
    if (!stored.ok) {
      state.errors.push(`Interaction log failed: ${stored.error.message}`);
      logger.error('Interaction log failed', { ...runMeta(state), errorType: 'memory_error', error: stored.error.message });
    }

    const remembered = await safeAsync(async () => {
      await this.deps.conversationMemory.addTurn(leadId, 'lead', state.query);
      await this.deps.conversationMemory.addTurn(leadId, 'agent', state.responseText);
    });
    if (!remembered.ok) {
      state.errors.push(`Conversation memory update failed: ${remembered.error.message}`);
      logger.error('Conversation memory update failed', {
        ...runMeta(state),
        errorType: 'memory_error',
        error: remembered.error.message,
      });
    }

    logger.info('memory_updated', { ...runMeta(state), interactions: stored.ok, conversation: remembered.ok });
    return 'finalize';
  }

  private async finalize(state: RunState): Promise<null> {
    state.nextAction = resolveNextAction(state);

    logger.info('agent_run_completed', {
      ...runMeta(state),
      decision: state.decision,
      confidence: state.confidence,
      escalated: state.escalated,
      escalationReason: state.escalationReason,
      nextAction: state.nextAction,
      errors: state.errors.length,
      durationMs: this.clock() - state.startedAt,
    });
    return null;
  }

  private escalateRun(state: RunState, reason: string): void {
    markEscalated(state, reason);
    logger.warn('escalation_triggered', { ...runMeta(state), reason, confidence: state.confidence });
  }

  /**
   * Hand-off text, escalation event and lead status. Runs at most once per run.
   * The hand-off text replaces the reply for every reason except
   * `response_generation_error`: there the reply is the apology written by
   * the failed compose stage, which already tells the lead a person will
   * follow up.
   */
  private async handleEscalation(state: RunState): Promise<void> {
    if (state.escalationHandled) return;
    state.escalationHandled = true;
    if (state.escalationReason !== COMPOSE_FAILURE_REASON) {
      state.responseText = ESCALATION_MESSAGE;
    }

    const leadId = state.leadId;
    if (!leadId) return;

    const reason = state.escalationReason ?? 'unknown';
    const recorded = await safeAsync(() =>
      this.deps.leads.createEscalation(leadId, reason, state.confidence, {
        query: state.query,
        decision: state.decision,
        errors: [...state.errors],
      })
    );
    if (!recorded.ok) {
      state.errors.push(`Escalation record failed: ${recorded.error.message}`);
      logger.error('Escalation record failed', { ...runMeta(state), errorType: 'escalation_error', error: recorded.error.message });
    }

    const statusUpdate = await safeAsync(() =>
      this.deps.tools.crm.execute('update_status', { lead_id: leadId, status: 'escalated' })
    );
    if (!statusUpdate.ok || !statusUpdate.value.success) {
      const message = statusUpdate.ok ? statusUpdate.value.error ?? 'unknown error' : statusUpdate.error.message;
      state.errors.push(`Escalation status update failed: ${message}`);
      logger.warn('Escalation status update failed', { ...runMeta(state), error: message });
    }

    logger.info('Escalation handled', { ...runMeta(state), reason });
  }

  private recordTool(state: RunState, record: ToolCallRecord): void {
    state.toolResults.push(record);
    if (!record.result.success) {
      state.toolErrors.push(`${record.tool}: ${record.result.error ?? 'unknown error'}`);
    }
  }

  private async runCrm(state: RunState): Promise<ToolCallRecord[]> {
    const { toolExecutor, tools } = this.deps;

    const upsert = await toolExecutor.executeWithRetry(tools.crm, 'upsert', {
      email: state.leadEmail,
      name: state.leadContext?.name ?? state.leadName,
      source: state.source,
    });
    const records: ToolCallRecord[] = [{ tool: 'crm', kind: 'crm', action: 'upsert', result: upsert }];

    if (upsert.success && state.leadId) {
      const contacted = await tools.crm.execute('update_status', { lead_id: state.leadId, status: 'contacted' });
      records.push({ tool: 'crm', kind: 'crm', action: 'update_status', result: contacted });
    }

    return records;
  }

  private async runCalendar(state: RunState): Promise<ToolCallRecord[]> {
    if (!BOOKING_INTENT.test(state.query)) {
      const skipped: ToolResult = {
        success: true,
        data: { message: 'No meeting booking needed' },
        retryAllowed: false,
      };
      return [{ tool: 'calendar', kind: 'calendar', action: 'none', result: skipped }];
    }

    const preferred = chrono.parseDate(state.query, new Date(this.clock()), { forwardDate: true });
    const result = await this.deps.toolExecutor.executeWithRetry(this.deps.tools.calendar, 'book_meeting', {
      lead_email: state.leadEmail,
      lead_name: state.leadContext?.name ?? state.leadName,
      meeting_type: 'discovery_call',
      ...(preferred ? { preferred_date: preferred.toISOString() } : {}),
    });

    return [{ tool: 'calendar', kind: 'calendar', action: 'book_meeting', result }];
  }

  private async runEmail(state: RunState): Promise<ToolCallRecord[]> {
    const result = await this.deps.toolExecutor.executeWithRetry(this.deps.tools.email, 'send', {
      to_email: state.leadEmail,
      subject: 'Re: Your inquiry',
      body: state.responseText,
    });

    return [{ tool: 'email', kind: 'email', action: 'send', result }];
  }
}
