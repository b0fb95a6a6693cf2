import { AgentService } from '../../src/services/agent.service';
import { ConversationMemoryService } from '../../src/services/conversation-memory.service';
import { DecisionService } from '../../src/services/decision.service';
import { RerankerService } from '../../src/services/retrieval/reranker.service';
import { RetrieverService } from '../../src/services/retrieval/retriever.service';
import { ToolExecutor } from '../../src/services/tools/tool.executor';
import { InMemoryVectorStore } from '../../src/services/vector/memory.store';
import { InboundLead } from '../../src/types/agent';
import { Lead } from '../../src/types/lead';
import { ToolResult } from '../../src/types/tool';
import { VectorMetadata } from '../../src/types/vector';
import { logger } from '../../src/utils/logger';
import {
  COMPOSE_FAILURE_MESSAGE,
  ESCALATION_MESSAGE,
  ORCHESTRATION_FAILURE_MESSAGE,
  RESPONSE_SYSTEM_PROMPT,
} from '../../src/utils/prompts';
import {
  ScriptedGenerator,
  ScriptedTool,
  StubEmbedder,
  createLeadStoreMock,
  decisionText,
  makeInteraction,
  makeLead,
} from '../helpers/fakes';

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const NOW = new Date('2024-06-03T09:00:00.000Z');
const ok: ToolResult = { success: true, data: { ok: true }, retryAllowed: false };

interface KnowledgeDoc {
  id: string;
  text: string;
  vector: number[];
  metadata: VectorMetadata;
}

const PRICING_DOC: KnowledgeDoc = {
  id: 'pricing_0',
  text: 'Starter plan costs 49 per month',
  vector: [1, 0, 0],
  metadata: { doc_title: 'Pricing Guide', doc_type: 'pricing' },
};
const OVERVIEW_DOC: KnowledgeDoc = {
  id: 'overview_0',
  text: 'We help small teams automate follow-ups',
  vector: [0.8, 0.6, 0],
  metadata: { doc_title: 'Company Overview', doc_type: 'general' },
};
const REFUND_DOC: KnowledgeDoc = {
  id: 'refunds_0',
  text: 'Refunds are issued within 30 days',
  vector: [0, 1, 0],
  metadata: { doc_title: 'Refund Policy', doc_type: 'policy' },
};

interface HarnessOptions {
  decision: string | Error;
  compose?: string | Error;
  query?: string;
  lead?: Lead;
  docs?: KnowledgeDoc[];
  crm?: ScriptedTool;
  calendar?: ScriptedTool;
  email?: ScriptedTool;
}

async function buildHarness(options: HarnessOptions) {
  const query = options.query ?? 'What are your prices?';
  const docs = options.docs ?? [PRICING_DOC, OVERVIEW_DOC, REFUND_DOC];

  const vectors: Record<string, number[]> = { [query]: [1, 0, 0] };
  docs.forEach((doc) => {
    vectors[doc.text] = doc.vector;
  });
  const embedder = new StubEmbedder(vectors);

  const knowledge = new InMemoryVectorStore('knowledge_base', embedder);
  if (docs.length > 0) {
    await knowledge.add(
      docs.map((doc) => doc.text),
      docs.map((doc) => doc.metadata),
      docs.map((doc) => doc.id)
    );
  }

  const conversations = new InMemoryVectorStore('conversation_history', embedder);
  const generator = new ScriptedGenerator(options.decision, options.compose);
  const leads = createLeadStoreMock(options.lead);
  const tools = {
    crm: options.crm ?? new ScriptedTool('crm_tool', [ok]),
    calendar: options.calendar ?? new ScriptedTool('calendar_tool', [ok]),
    email: options.email ?? new ScriptedTool('email_tool', [ok]),
  };
  const sleep = jest.fn().mockResolvedValue(undefined);

  const agent = new AgentService({
    leads,
    decisionEngine: new DecisionService(generator, { high: 0.75, low: 0.5 }),
    retriever: new RetrieverService(embedder, knowledge, { topK: 5 }, () => NOW),
    reranker: new RerankerService({}, () => NOW),
    generator,
    toolExecutor: new ToolExecutor({ maxRetries: 3, baseDelayMs: 10 }, sleep),
    tools,
    conversationMemory: new ConversationMemoryService(conversations, () => NOW),
    retrieval: { topK: 5, confidenceThreshold: 0.6 },
    clock: () => NOW.getTime(),
    newTraceId: () => 'trace-1',
  });

  const inbound: InboundLead = { email: 'prospect@example.com', message: query, source: 'website_form' };

  return { agent, inbound, leads, generator, tools, conversations, sleep };
}

describe('AgentService', () => {
  it('answers a pricing question from ranked evidence', async () => {
    const { agent, inbound, leads, generator, conversations } = await buildHarness({
      decision: decisionText('RETRIEVE', 0.85, { retrieval: 'yes', reasoning: 'Pricing question' }),
      compose: 'Our Starter plan is 49 per month.',
    });

    const response = await agent.handleLead(inbound);

    expect(response).toEqual({
      trace_id: 'trace-1',
      lead_id: '11111111-1111-4111-8111-111111111111',
      response_text: 'Our Starter plan is 49 per month.',
      confidence: 0.85,
      decision_type: 'retrieve',
      sources_used: ['Pricing Guide', 'Company Overview'],
      tools_called: [],
      escalated: false,
      escalation_reason: null,
      next_action: 'none',
    });

    const compose = generator.requests[1];
    expect(compose.systemPrompt).toBe(RESPONSE_SYSTEM_PROMPT);
    expect(compose.temperature).toBe(0.7);
    expect(compose.prompt).toContain(
      '[Source: Pricing Guide]\nStarter plan costs 49 per month\n\n[Source: Company Overview]\nWe help small teams automate follow-ups'
    );
    expect(compose.prompt).not.toContain('Refund Policy');
    expect(logger.info).toHaveBeenCalledWith(
      'Evidence prepared',
      expect.objectContaining({ citations: ['[Pricing Guide - pricing]', '[Company Overview - general]'] })
    );

    expect(leads.addInteraction).toHaveBeenCalledTimes(2);
    expect(leads.addInteraction).toHaveBeenNthCalledWith(1, {
      leadId: '11111111-1111-4111-8111-111111111111',
      messageFrom: 'lead',
      messageText: 'What are your prices?',
      decisionType: 'retrieve',
      confidenceScore: 0.85,
      toolsUsed: [],
      sourcesRetrieved: ['Pricing Guide', 'Company Overview'],
    });
    expect(await conversations.count()).toBe(2);
    expect(leads.createEscalation).not.toHaveBeenCalled();
  });

  it('walks the expected stages and keeps reranked evidence sorted and filtered', async () => {
    const { agent, inbound } = await buildHarness({
      decision: decisionText('RETRIEVE', 0.85, { retrieval: 'yes' }),
    });

    const state = await agent.run(inbound);

    expect(state.trail).toEqual(['intake', 'loadContext', 'decide', 'retrieve', 'compose', 'memory', 'finalize']);
    expect(state.retrievedSources).toHaveLength(3);
    expect(state.rerankedSources.map((item) => item.sourceId)).toEqual(['pricing_0', 'overview_0']);
    expect(state.rerankedSources[0].score).toBeCloseTo(0.94, 10);
    expect(state.rerankedSources[1].score).toBeCloseTo(0.76, 10);
    expect(state.grounded).toBe(true);
    expect(state.conflictDetected).toBe(false);
  });

  it('skips retrieval when the decision does not need it', async () => {
    const { agent, inbound, generator } = await buildHarness({
      decision: decisionText('REASON_ONLY', 0.9),
      compose: 'You are welcome!',
    });

    const state = await agent.run(inbound);

    expect(state.trail).toEqual(['intake', 'loadContext', 'decide', 'compose', 'memory', 'finalize']);
    expect(state.grounded).toBe(false);
    expect(state.sourcesUsed).toEqual([]);
    expect(generator.requests[1].prompt).toContain(
      'No specific sources retrieved - use general knowledge about the sales process.'
    );
  });

  it('lowers confidence when pricing sources conflict', async () => {
    const { agent, inbound } = await buildHarness({
      decision: decisionText('RETRIEVE', 0.8, { retrieval: 'yes' }),
      docs: [
        PRICING_DOC,
        {
          id: 'pricing_old_0',
          text: 'Starter plan used to cost 39 per month',
          vector: [0.45, 0.893, 0],
          metadata: { doc_title: 'Old Pricing', doc_type: 'pricing' },
        },
      ],
    });

    const state = await agent.run(inbound);

    expect(state.rerankedSources).toHaveLength(2);
    expect(state.conflictDetected).toBe(true);
    expect(state.confidence).toBeCloseTo(0.56, 10);
    expect(state.escalated).toBe(false);
  });

  it('returns the apology and escalates when composition fails', async () => {
    const { agent, inbound, leads, tools } = await buildHarness({
      decision: decisionText('REASON_ONLY', 0.9),
      compose: new Error('model overloaded'),
    });

    const state = await agent.run(inbound);

    expect(state.responseText).toBe(COMPOSE_FAILURE_MESSAGE);
    expect(state.escalated).toBe(true);
    expect(state.escalationReason).toBe('response_generation_error');
    expect(state.errors).toEqual(['Response composition failed: model overloaded']);
    expect(state.trail).toEqual(['intake', 'loadContext', 'decide', 'compose', 'escalate', 'memory', 'finalize']);
    expect(state.nextAction).toBe('human_followup');
    expect(leads.createEscalation).toHaveBeenCalledWith(
      '11111111-1111-4111-8111-111111111111',
      'response_generation_error',
      0.9,
      { query: 'What are your prices?', decision: 'REASON_ONLY', errors: ['Response composition failed: model overloaded'] }
    );
    expect(tools.crm.calls).toEqual([
      { action: 'update_status', params: { lead_id: '11111111-1111-4111-8111-111111111111', status: 'escalated' } },
    ]);
  });

  it('treats an empty reply as a composition failure', async () => {
    const { agent, inbound } = await buildHarness({ decision: decisionText('REASON_ONLY', 0.9), compose: '   ' });

    const response = await agent.handleLead(inbound);

    expect(response.response_text).toBe(COMPOSE_FAILURE_MESSAGE);
    expect(response.escalation_reason).toBe('response_generation_error');
  });

  it('escalates after composing when confidence is below the low threshold', async () => {
    const { agent, inbound } = await buildHarness({ decision: decisionText('REASON_ONLY', 0.3) });

    const response = await agent.handleLead(inbound);

    expect(response).toMatchObject({
      response_text: ESCALATION_MESSAGE,
      confidence: 0.3,
      decision_type: 'reason_only',
      escalated: true,
      escalation_reason: 'confidence_below_threshold',
      next_action: 'human_followup',
    });
  });

  it('keeps the decision escalation reason', async () => {
    const { agent, inbound, leads } = await buildHarness({ decision: decisionText('ESCALATE', 0.2) });

    const response = await agent.handleLead(inbound);

    expect(response.escalation_reason).toBe('decision_escalate');
    expect(response.response_text).toBe(ESCALATION_MESSAGE);
    expect(leads.createEscalation).toHaveBeenCalledTimes(1);
  });

  it('fails closed when the decision step errors', async () => {
    const { agent, inbound } = await buildHarness({ decision: new Error('rate limited') });

    const response = await agent.handleLead(inbound);

    expect(response).toMatchObject({
      confidence: 0,
      decision_type: 'escalate',
      escalated: true,
      escalation_reason: 'internal_error',
    });
  });

  it('escalates unrecognized decisions', async () => {
    const { agent, inbound } = await buildHarness({ decision: 'I am not sure what to do.' });

    const response = await agent.handleLead(inbound);

    expect(response.escalation_reason).toBe('unrecognized_decision');
  });

  it('runs CRM and email actions', async () => {
    const { agent, inbound, tools } = await buildHarness({
      decision: decisionText('USE_TOOL', 0.9, { tools: 'crm, email' }),
      compose: 'Thanks, we will be in touch.',
    });

    const state = await agent.run(inbound);

    expect(state.trail).toEqual(['intake', 'loadContext', 'decide', 'compose', 'tools', 'memory', 'finalize']);
    expect(tools.crm.calls).toEqual([
      { action: 'upsert', params: { email: 'prospect@example.com', name: 'Pat Prospect', source: 'website_form' } },
      { action: 'update_status', params: { lead_id: '11111111-1111-4111-8111-111111111111', status: 'contacted' } },
    ]);
    expect(tools.email.calls).toEqual([
      {
        action: 'send',
        params: { to_email: 'prospect@example.com', subject: 'Re: Your inquiry', body: 'Thanks, we will be in touch.' },
      },
    ]);
    expect(state.toolResults.map((record) => [record.tool, record.action, record.result.success])).toEqual([
      ['crm', 'upsert', true],
      ['crm', 'update_status', true],
      ['email', 'send', true],
    ]);
    expect(state.escalated).toBe(false);
    expect(state.nextAction).toBe('await_tool_outcome');
  });

  it('records unknown tools as terminal failures', async () => {
    const { agent, inbound } = await buildHarness({ decision: decisionText('USE_TOOL', 0.9, { tools: 'sms' }) });

    const state = await agent.run(inbound);

    expect(state.toolResults).toEqual([
      {
        tool: 'sms',
        kind: null,
        action: 'none',
        result: { success: false, error: 'Unknown tool: sms', retryAllowed: false },
      },
    ]);
    expect(state.toolErrors).toEqual(['sms: Unknown tool: sms']);
    expect(state.escalated).toBe(false);
  });

  it('skips booking when the message has no meeting intent', async () => {
    const { agent, inbound, tools } = await buildHarness({
      decision: decisionText('USE_TOOL', 0.9, { tools: 'calendar' }),
      query: 'Do you have availability?',
    });

    const state = await agent.run(inbound);

    expect(tools.calendar.calls).toEqual([]);
    expect(state.toolResults).toEqual([
      {
        tool: 'calendar',
        kind: 'calendar',
        action: 'none',
        result: { success: true, data: { message: 'No meeting booking needed' }, retryAllowed: false },
      },
    ]);
  });

  it('books when the intent word is part of a longer word', async () => {
    const { agent, inbound, tools } = await buildHarness({
      decision: decisionText('USE_TOOL', 0.9, { tools: 'calendar' }),
      query: 'Could we reschedule our demo?',
    });

    const state = await agent.run(inbound);

    expect(tools.calendar.calls.map((call) => call.action)).toEqual(['book_meeting']);
    expect(state.toolResults.map((record) => record.action)).toEqual(['book_meeting']);
  });

  it('retries a failing booking and then hands the lead to a human', async () => {
    const calendar = new ScriptedTool('calendar_tool', [
      { success: false, error: 'Calendar API unavailable', retryAllowed: true },
    ]);
    const { agent, inbound, tools, leads, sleep } = await buildHarness({
      decision: decisionText('USE_TOOL', 0.9, { tools: 'book_meeting' }),
      query: 'Can we schedule a call?',
      calendar,
    });

    const state = await agent.run(inbound);

    expect(calendar.calls).toHaveLength(4);
    expect(calendar.calls[0].action).toBe('book_meeting');
    expect(sleep.mock.calls).toEqual([[10], [20], [40]]);
    expect(state.escalated).toBe(true);
    expect(state.escalationReason).toBe('tool_failure');
    expect(state.responseText).toBe(ESCALATION_MESSAGE);
    expect(state.trail).toEqual(['intake', 'loadContext', 'decide', 'compose', 'tools', 'memory', 'finalize']);
    expect(leads.createEscalation).toHaveBeenCalledTimes(1);
    expect(tools.crm.calls).toEqual([
      { action: 'update_status', params: { lead_id: '11111111-1111-4111-8111-111111111111', status: 'escalated' } },
    ]);
    expect(state.nextAction).toBe('human_followup');
  });

  it('loads prior turns for a returning lead in chronological order', async () => {
    const { agent, inbound, leads, generator } = await buildHarness({ decision: decisionText('REASON_ONLY', 0.9) });
    leads.findOrCreateLead.mockResolvedValue({ lead: makeLead({ status: 'contacted' }), isNew: false });
    leads.getLeadInteractions.mockResolvedValue([
      makeInteraction({ id: 2, message_from: 'agent', message_text: 'Happy to help with that.' }),
      makeInteraction({ id: 1, message_from: 'lead', message_text: 'I run a small agency.' }),
    ]);

    const state = await agent.run(inbound);

    expect(leads.getLeadInteractions).toHaveBeenCalledWith('11111111-1111-4111-8111-111111111111', 10);
    expect(state.conversationHistory).toEqual([
      { role: 'lead', content: 'I run a small agency.' },
      { role: 'agent', content: 'Happy to help with that.' },
    ]);
    expect(generator.requests[0].prompt).toContain('lead: I run a small agency.\nagent: Happy to help with that.');
    expect(generator.requests[0].prompt).toContain('- Status: contacted');
  });

  it('finishes the run when memory writes fail', async () => {
    const { agent, inbound, leads } = await buildHarness({ decision: decisionText('REASON_ONLY', 0.9) });
    leads.addInteraction.mockRejectedValue(new Error('disk full'));

    const state = await agent.run(inbound);

    expect(state.errors).toEqual(['Interaction log failed: disk full']);
    expect(state.trail[state.trail.length - 1]).toBe('finalize');
    expect(state.escalated).toBe(false);
  });

  it('falls back to a generic apology when the run itself fails', async () => {
    const { agent, inbound, leads } = await buildHarness({ decision: decisionText('REASON_ONLY', 0.9) });
    leads.findOrCreateLead.mockRejectedValue(new Error('pool exhausted'));

    const state = await agent.run(inbound);
    const response = await agent.handleLead(inbound);

    expect(state.errors).toEqual(['Orchestration error: pool exhausted']);
    expect(response).toEqual({
      trace_id: 'trace-1',
      lead_id: null,
      response_text: ORCHESTRATION_FAILURE_MESSAGE,
      confidence: 0,
      decision_type: 'escalate',
      sources_used: [],
      tools_called: [],
      escalated: true,
      escalation_reason: 'orchestration_error',
      next_action: 'human_followup',
    });
    expect(leads.createEscalation).not.toHaveBeenCalled();
  });
});
