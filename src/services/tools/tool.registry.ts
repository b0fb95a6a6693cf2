import { TOOL_KINDS, ToolKind } from '../../types/tool';

// Consulted only when no kind name appears in the requested tool name.
const FALLBACK_ALIASES: Record<ToolKind, readonly string[]> = {
  crm: ['lead'],
  calendar: ['meeting', 'booking'],
  email: ['mail'],
};

/**
 * Maps a free-text tool name from the decision step ("crm_update",
 * "send_emails", "book meeting") onto a known kind. A name containing a
 * kind wins, tried in crm, calendar, email order; fallback aliases are
 * matched the same way afterwards.
 */
export function resolveToolKind(name: string): ToolKind | null {
  const normalized = name.toLowerCase();

  const direct = TOOL_KINDS.find((kind) => normalized.includes(kind));
  if (direct) return direct;

  const aliased = TOOL_KINDS.find((kind) => FALLBACK_ALIASES[kind].some((alias) => normalized.includes(alias)));
  return aliased ?? null;
}
