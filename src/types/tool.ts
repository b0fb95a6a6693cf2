export interface ToolResult {
  success: boolean;
  data?: Record<string, unknown>;
  error?: string;
  retryAllowed: boolean;
}

export type ToolParams = Record<string, unknown>;

export interface ToolAdapter {
  readonly name: string;
  execute(action: string, params: ToolParams): Promise<ToolResult>;
}

export const TOOL_KINDS = ['crm', 'calendar', 'email'] as const;

export type ToolKind = (typeof TOOL_KINDS)[number];

export type ToolSet = Record<ToolKind, ToolAdapter>;
