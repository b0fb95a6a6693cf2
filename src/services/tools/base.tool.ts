import { ZodError } from 'zod';
import { ToolAdapter, ToolParams, ToolResult } from '../../types/tool';
import { ServiceError, errorMessage } from '../../utils/errors';

export type ActionHandler = (params: ToolParams) => Promise<ToolResult>;

export function toolSuccess(data: Record<string, unknown>): ToolResult {
  return { success: true, data, retryAllowed: false };
}

export function toolFailure(error: string, retryAllowed: boolean): ToolResult {
  return { success: false, error, retryAllowed };
}

function describeZodError(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'params'}: ${issue.message}`).join('; ');
}

/**
 * Action-table adapter. Unknown actions and bad parameters are terminal;
 * anything a handler throws is reported as retryable unless it is a
 * ServiceError marked otherwise.
 */
export abstract class BaseTool implements ToolAdapter {
  protected abstract readonly actions: Record<string, ActionHandler>;

  constructor(readonly name: string, private label: string) {}

  listActions(): string[] {
    return Object.keys(this.actions);
  }

  async execute(action: string, params: ToolParams): Promise<ToolResult> {
    const handler = Object.prototype.hasOwnProperty.call(this.actions, action) ? this.actions[action] : undefined;
    if (!handler) {
      return toolFailure(`Unknown ${this.label} action: ${action}`, false);
    }

    try {
      return await handler(params);
    } catch (error) {
      if (error instanceof ZodError) {
        return toolFailure(`Invalid parameters for ${action}: ${describeZodError(error)}`, false);
      }
      const retryable = error instanceof ServiceError ? error.retryable : true;
      return toolFailure(`${this.label} operation failed: ${errorMessage(error)}`, retryable);
    }
  }
}
