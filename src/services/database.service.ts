import { v4 as uuidv4 } from 'uuid';
import { query } from '../config/database';
import {
  EscalationEvent,
  Interaction,
  Lead,
  LeadStore,
  LeadUpdate,
  NewInteraction,
  NewLead,
  Note,
} from '../types/lead';
import { logger } from '../utils/logger';

const UPDATABLE_COLUMNS = [
  'name',
  'company',
  'phone',
  'status',
  'qualification_score',
  'budget_range',
  'timeline',
  'decision_maker',
  'metadata',
  'last_contacted_at',
  'next_followup_at',
] as const satisfies ReadonlyArray<keyof LeadUpdate>;

const FOLLOWUP_STATUSES = ['contacted', 'qualified'];

export class DatabaseService implements LeadStore {
  async createLead(lead: NewLead): Promise<Lead> {
    const id = uuidv4();
    const result = await query<Lead>(
      `INSERT INTO leads (id, email, name, source, metadata)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING *`,
      [id, lead.email, lead.name ?? null, lead.source, JSON.stringify(lead.metadata ?? {})]
    );

    logger.info('New lead created', { leadId: id, source: lead.source });
    return result.rows[0];
  }

  async getLeadByEmail(email: string): Promise<Lead | null> {
    const result = await query<Lead>('SELECT * FROM leads WHERE email = $1', [email]);
    return result.rows[0] || null;
  }

  async getLeadById(leadId: string): Promise<Lead | null> {
    const result = await query<Lead>('SELECT * FROM leads WHERE id = $1', [leadId]);
    return result.rows[0] || null;
  }

  async findOrCreateLead(lead: NewLead): Promise<{ lead: Lead; isNew: boolean }> {
    const existing = await this.getLeadByEmail(lead.email);
    if (existing) {
      return { lead: existing, isNew: false };
    }

    // ON CONFLICT covers two concurrent first messages from the same address.
    const result = await query<Lead & { inserted: boolean }>(
      `INSERT INTO leads (id, email, name, source, metadata)
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT (email) DO UPDATE SET email = EXCLUDED.email
       RETURNING *, (xmax = 0) AS inserted`,
      [uuidv4(), lead.email, lead.name ?? null, lead.source, JSON.stringify(lead.metadata ?? {})]
    );

    const { inserted, ...row } = result.rows[0];
    if (inserted) {
      logger.info('New lead created', { leadId: row.id, source: lead.source });
    }
    return { lead: row, isNew: inserted };
  }

  async updateLead(leadId: string, updates: LeadUpdate): Promise<Lead | null> {
    const assignments: string[] = [];
    const values: unknown[] = [];

    for (const column of UPDATABLE_COLUMNS) {
      const value = updates[column];
      if (value === undefined) continue;
      values.push(column === 'metadata' ? JSON.stringify(value) : value);
      assignments.push(`${column} = $${values.length}`);
    }

    if (assignments.length === 0) {
      return this.getLeadById(leadId);
    }

    values.push(leadId);
    const result = await query<Lead>(
      `UPDATE leads SET ${assignments.join(', ')} WHERE id = $${values.length} RETURNING *`,
      values
    );
    return result.rows[0] || null;
  }

  async addNote(leadId: string, content: string, noteType: string = 'general', createdBy: string = 'agent'): Promise<Note> {
    const result = await query<Note>(
      `INSERT INTO notes (lead_id, content, note_type, created_by)
       VALUES ($1, $2, $3, $4)
       RETURNING *`,
      [leadId, content, noteType, createdBy]
    );
    return result.rows[0];
  }

  async addInteraction(interaction: NewInteraction): Promise<Interaction> {
    const result = await query<Interaction>(
      `INSERT INTO interactions
         (lead_id, message_from, message_text, decision_type, confidence_score, tools_used, sources_retrieved)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       RETURNING *`,
      [
        interaction.leadId,
        interaction.messageFrom,
        interaction.messageText,
        interaction.decisionType ?? null,
        interaction.confidenceScore ?? null,
        JSON.stringify(interaction.toolsUsed ?? []),
        JSON.stringify(interaction.sourcesRetrieved ?? []),
      ]
    );
    return result.rows[0];
  }

  /** Most recent first. */
  async getLeadInteractions(leadId: string, limit: number = 10): Promise<Interaction[]> {
    const result = await query<Interaction>(
      `SELECT * FROM interactions
       WHERE lead_id = $1
       ORDER BY created_at DESC, id DESC
       LIMIT $2`,
      [leadId, limit]
    );
    return result.rows;
  }

  async createEscalation(
    leadId: string,
    reason: string,
    confidenceScore: number,
    context: Record<string, unknown> = {}
  ): Promise<EscalationEvent> {
    const result = await query<EscalationEvent>(
      `INSERT INTO escalation_events (lead_id, reason, confidence_score, context)
       VALUES ($1, $2, $3, $4)
       RETURNING *`,
      [leadId, reason, confidenceScore, JSON.stringify(context)]
    );

    logger.warn('Escalation recorded', { leadId, reason, confidenceScore });
    return result.rows[0];
  }

  async getLeadsForFollowup(now: Date = new Date()): Promise<Lead[]> {
    const result = await query<Lead>(
      `SELECT * FROM leads
       WHERE next_followup_at IS NOT NULL
         AND next_followup_at <= $1
         AND status = ANY($2::text[])
       ORDER BY next_followup_at ASC`,
      [now, FOLLOWUP_STATUSES]
    );
    return result.rows;
  }
}
