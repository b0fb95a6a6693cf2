import { ConversationTurn } from '../types/agent';
import { Evidence } from '../types/evidence';

export const DECISION_SYSTEM_PROMPT =
  'You are an autonomous agent decision engine. Analyze the situation and decide the best action.';

export const RESPONSE_SYSTEM_PROMPT = `You are a professional sales and operations assistant for a service business.
Your goal is to help prospects by providing accurate information and moving them toward a clear next step.

RULES:
- Be professional but friendly
- Ground your answers in the provided sources
- If sources are insufficient, ask a clarifying question
- Suggest a concrete next step (book a call, request a demo, etc.)
- Keep responses to 2-3 short paragraphs`;

export const ESCALATION_MESSAGE =
  "Thank you for your inquiry. I want to ensure you get the best possible assistance, so I'm connecting you with one of our team members who will follow up with you shortly.";

export const COMPOSE_FAILURE_MESSAGE =
  "I apologize, but I'm having trouble formulating a response. A team member will reach out to you shortly.";

export const ORCHESTRATION_FAILURE_MESSAGE =
  "I apologize, but I'm experiencing technical difficulties. A team member will assist you shortly.";

export const FOLLOWUP_SUBJECT = 'Following up on your inquiry';

export interface LeadSummary {
  email?: string | null;
  name?: string | null;
  status?: string | null;
  company?: string | null;
}

function formatHistory(history: ConversationTurn[], window: number): string {
  return history
    .slice(-window)
    .map((turn) => `${turn.role}: ${turn.content}`)
    .join('\n');
}

export function buildDecisionPrompt(
  query: string,
  history: ConversationTurn[],
  lead: LeadSummary,
  previousEvidenceCount: number
): string {
  const sourcesText = previousEvidenceCount > 0 ? `${previousEvidenceCount} sources available` : 'None';

  return `You are an autonomous assistant for a service business. Analyze this situation and decide the best action.

CURRENT QUERY:
${query}

RECENT CONVERSATION:
${formatHistory(history, 5)}

LEAD CONTEXT:
- Email: ${lead.email || 'unknown'}
- Name: ${lead.name || 'unknown'}
- Status: ${lead.status || 'new'}
- Company: ${lead.company || 'unknown'}

PREVIOUSLY RETRIEVED SOURCES:
${sourcesText}

AVAILABLE ACTIONS:
1. RETRIEVE - Query knowledge base for factual information (pricing, policies, SOPs, FAQs)
2. REASON_ONLY - Answer using existing context (no retrieval needed)
3. USE_TOOL - Execute tools (crm, calendar, email)
4. CLARIFY - Ask the lead for more information
5. ESCALATE - Pass to a human (complex, sensitive, or low confidence)

DECISION CRITERIA:
- RETRIEVE if the query asks about pricing, policies, procedures or technical details
- REASON_ONLY for simple acknowledgments or when the answer is already known
- USE_TOOL to update the CRM, book a meeting or send an email
- CLARIFY if the query is ambiguous or missing key information
- ESCALATE for sensitive issues, legal questions, complaints, or anything beyond your capability

Respond in this EXACT format:
DECISION: [one of: RETRIEVE, REASON_ONLY, USE_TOOL, CLARIFY, ESCALATE]
CONFIDENCE: [0.0 to 1.0]
REASONING: [one sentence explaining why]
TOOLS_NEEDED: [comma-separated list or "none"]
RETRIEVAL_NEEDED: [yes or no]
`;
}

export function formatEvidenceBlock(evidence: Evidence[]): string {
  return evidence.map((item) => `[Source: ${item.docTitle}]\n${item.chunkText}`).join('\n\n');
}

export function buildComposePrompt(
  query: string,
  history: ConversationTurn[],
  evidence: Evidence[],
  lead: LeadSummary
): string {
  const sourcesText = formatEvidenceBlock(evidence);

  return `CONVERSATION HISTORY:
${formatHistory(history, 3)}

CURRENT QUERY:
${query}

RETRIEVED INFORMATION:
${sourcesText || 'No specific sources retrieved - use general knowledge about the sales process.'}

LEAD CONTEXT:
- Status: ${lead.status || 'new'}
- Company: ${lead.company || 'unknown'}

Compose a helpful response to the current query.`;
}

export function buildFollowupBody(leadName: string | null | undefined, context?: string): string {
  const greeting = `Hi ${leadName || 'there'},`;
  const contextLine = context ? `\n\n${context}` : '';

  return `${greeting}

I wanted to follow up on your recent inquiry and see if you had any questions I can help with.${contextLine}

If it helps, I'm happy to set up a quick call to walk through your needs and how we can help.

Best regards`;
}
