export const LEAD_STATUSES = [
  'new',
  'contacted',
  'qualified',
  'unqualified',
  'meeting_scheduled',
  'proposal_sent',
  'won',
  'lost',
  'escalated',
] as const;

export type LeadStatus = (typeof LEAD_STATUSES)[number];

export const LEAD_SOURCES = ['website_form', 'email', 'phone', 'referral', 'social_media', 'other'] as const;

export type LeadSource = (typeof LEAD_SOURCES)[number];

export interface Lead {
  id: string;
  email: string;
  name: string | null;
  company: string | null;
  phone: string | null;
  status: LeadStatus;
  source: LeadSource;
  qualification_score: number;
  budget_range: string | null;
  timeline: string | null;
  decision_maker: string | null;
  metadata: Record<string, unknown>;
  created_at: Date;
  last_contacted_at: Date | null;
  next_followup_at: Date | null;
}

export type LeadUpdate = Partial<
  Pick<
    Lead,
    | 'name'
    | 'company'
    | 'phone'
    | 'status'
    | 'qualification_score'
    | 'budget_range'
    | 'timeline'
    | 'decision_maker'
    | 'metadata'
    | 'last_contacted_at'
    | 'next_followup_at'
  >
>;

export interface NewLead {
  email: string;
  name?: string | null;
  source: LeadSource;
  metadata?: Record<string, unknown>;
}

export interface Interaction {
  id: number;
  lead_id: string;
  message_from: 'lead' | 'agent';
  message_text: string;
  decision_type: string | null;
  confidence_score: number | null;
  tools_used: string[];
  sources_retrieved: string[];
  created_at: Date;
}

export interface NewInteraction {
  leadId: string;
  messageFrom: Interaction['message_from'];
  messageText: string;
  decisionType?: string | null;
  confidenceScore?: number | null;
  toolsUsed?: string[];
  sourcesRetrieved?: string[];
}

export interface EscalationEvent {
  id: number;
  lead_id: string;
  reason: string;
  confidence_score: number | null;
  context: Record<string, unknown>;
  resolved: 'pending' | 'resolved' | 'ignored';
  resolved_at: Date | null;
  resolved_by: string | null;
  created_at: Date;
}

export interface Note {
  id: number;
  lead_id: string;
  content: string;
  note_type: string;
  created_by: string;
  created_at: Date;
}

/**
 * Structured store for leads and their history. `DatabaseService` is the
 * Postgres implementation; the agent only ever sees this interface.
 */
export interface LeadStore {
  createLead(lead: NewLead): Promise<Lead>;
  getLeadByEmail(email: string): Promise<Lead | null>;
  getLeadById(leadId: string): Promise<Lead | null>;
  findOrCreateLead(lead: NewLead): Promise<{ lead: Lead; isNew: boolean }>;
  updateLead(leadId: string, updates: LeadUpdate): Promise<Lead | null>;
  addNote(leadId: string, content: string, noteType?: string, createdBy?: string): Promise<Note>;
  addInteraction(interaction: NewInteraction): Promise<Interaction>;
  getLeadInteractions(leadId: string, limit?: number): Promise<Interaction[]>;
  createEscalation(
    leadId: string,
    reason: string,
    confidenceScore: number,
    context?: Record<string, unknown>
  ): Promise<EscalationEvent>;
  getLeadsForFollowup(now?: Date): Promise<Lead[]>;
}
