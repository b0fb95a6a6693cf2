import { z } from 'zod';
import { LEAD_SOURCES, LEAD_STATUSES, Lead, LeadStatus, LeadStore, LeadUpdate } from '../../types/lead';
import { ToolParams, ToolResult } from '../../types/tool';
import { logger } from '../../utils/logger';
import { ActionHandler, BaseTool, toolFailure, toolSuccess } from './base.tool';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const upsertSchema = z.object({
  email: z.string().email(),
  name: z.string().nullish(),
  company: z.string().nullish(),
  phone: z.string().nullish(),
  source: z.enum(LEAD_SOURCES).default('website_form'),
  metadata: z.record(z.unknown()).optional(),
});

const qualifySchema = z.object({
  lead_id: z.string().min(1),
  budget_range: z.string().optional(),
  timeline: z.string().optional(),
  decision_maker: z.string().optional(),
  qualification_score: z.number().min(0).max(1).optional(),
});

const updateStatusSchema = z.object({
  lead_id: z.string().min(1),
  status: z.string(),
});

const leadIdSchema = z.object({
  lead_id: z.string().min(1),
});

const scheduleFollowupSchema = z.object({
  lead_id: z.string().min(1),
  days_from_now: z.number().int().nonnegative().default(3),
});

const addNoteSchema = z.object({
  lead_id: z.string().min(1),
  content: z.string().min(1),
  note_type: z.string().default('general'),
});

function isLeadStatus(value: string): value is LeadStatus {
  return LEAD_STATUSES.some((status) => status === value);
}

const iso = (value: Date | null): string | null => (value ? value.toISOString() : null);

export function serializeLead(lead: Lead): Record<string, unknown> {
  return {
    id: lead.id,
    email: lead.email,
    name: lead.name,
    company: lead.company,
    phone: lead.phone,
    status: lead.status,
    source: lead.source,
    qualification_score: lead.qualification_score,
    budget_range: lead.budget_range,
    timeline: lead.timeline,
    decision_maker: lead.decision_maker,
    metadata: lead.metadata,
    created_at: iso(lead.created_at),
    last_contacted_at: iso(lead.last_contacted_at),
    next_followup_at: iso(lead.next_followup_at),
  };
}

export class CRMTool extends BaseTool {
  protected readonly actions: Record<string, ActionHandler> = {
    upsert: (params) => this.upsertLead(params),
    qualify: (params) => this.qualifyLead(params),
    update_status: (params) => this.updateStatus(params),
    get_lead: (params) => this.getLead(params),
    schedule_followup: (params) => this.scheduleFollowup(params),
    add_note: (params) => this.addNote(params),
  };

  constructor(private store: LeadStore, private now: () => Date = () => new Date()) {
    super('crm_tool', 'CRM');
  }

  private async upsertLead(params: ToolParams): Promise<ToolResult> {
    const input = upsertSchema.parse(params);
    const existing = await this.store.getLeadByEmail(input.email);

    const updates: LeadUpdate = {};
    if (input.name) updates.name = input.name;
    if (input.company) updates.company = input.company;
    if (input.phone) updates.phone = input.phone;

    let lead: Lead | null;
    let actionType: 'created' | 'updated';

    if (existing) {
      if (input.metadata) {
        updates.metadata = { ...existing.metadata, ...input.metadata };
      }
      lead = Object.keys(updates).length > 0 ? await this.store.updateLead(existing.id, updates) : existing;
      actionType = 'updated';
    } else {
      const created = await this.store.createLead({
        email: input.email,
        name: input.name,
        source: input.source,
        metadata: input.metadata ?? {},
      });
      delete updates.name;
      lead = Object.keys(updates).length > 0 ? await this.store.updateLead(created.id, updates) : created;
      actionType = 'created';
    }

    if (!lead) {
      return toolFailure(`Lead not found: ${input.email}`, false);
    }

    logger.debug('CRM lead upserted', { leadId: lead.id, action: actionType });
    return toolSuccess({ action: actionType, lead_id: lead.id, email: lead.email, status: lead.status });
  }

  private async qualifyLead(params: ToolParams): Promise<ToolResult> {
    const input = qualifySchema.parse(params);
    const updates: LeadUpdate = {};

    if (input.budget_range) updates.budget_range = input.budget_range;
    if (input.timeline) updates.timeline = input.timeline;
    if (input.decision_maker) updates.decision_maker = input.decision_maker;
    if (input.qualification_score !== undefined) {
      updates.qualification_score = input.qualification_score;
      if (input.qualification_score >= 0.7) {
        updates.status = 'qualified';
      } else if (input.qualification_score < 0.4) {
        updates.status = 'unqualified';
      }
    }

    const lead = await this.store.updateLead(input.lead_id, updates);
    if (!lead) {
      return toolFailure(`Lead not found: ${input.lead_id}`, false);
    }

    return toolSuccess({
      lead_id: lead.id,
      qualification_score: lead.qualification_score,
      status: lead.status,
    });
  }

  private async updateStatus(params: ToolParams): Promise<ToolResult> {
    const input = updateStatusSchema.parse(params);
    if (!isLeadStatus(input.status)) {
      return toolFailure(`Invalid status: ${input.status}`, false);
    }

    const lead = await this.store.updateLead(input.lead_id, {
      status: input.status,
      last_contacted_at: this.now(),
    });
    if (!lead) {
      return toolFailure(`Lead not found: ${input.lead_id}`, false);
    }

    return toolSuccess({ lead_id: lead.id, status: lead.status });
  }

  private async getLead(params: ToolParams): Promise<ToolResult> {
    const input = leadIdSchema.parse(params);
    const lead = await this.store.getLeadById(input.lead_id);
    if (!lead) {
      return toolFailure(`Lead not found: ${input.lead_id}`, false);
    }

    return toolSuccess(serializeLead(lead));
  }

  private async scheduleFollowup(params: ToolParams): Promise<ToolResult> {
    const input = scheduleFollowupSchema.parse(params);
    const followupAt = new Date(this.now().getTime() + input.days_from_now * MS_PER_DAY);

    const lead = await this.store.updateLead(input.lead_id, { next_followup_at: followupAt });
    if (!lead) {
      return toolFailure(`Lead not found: ${input.lead_id}`, false);
    }

    return toolSuccess({ lead_id: lead.id, followup_scheduled_at: followupAt.toISOString() });
  }

  private async addNote(params: ToolParams): Promise<ToolResult> {
    const input = addNoteSchema.parse(params);
    const lead = await this.store.getLeadById(input.lead_id);
    if (!lead) {
      return toolFailure(`Lead not found: ${input.lead_id}`, false);
    }

    const note = await this.store.addNote(lead.id, input.content, input.note_type);
    return toolSuccess({ lead_id: lead.id, note_id: note.id, note_type: note.note_type });
  }
}
