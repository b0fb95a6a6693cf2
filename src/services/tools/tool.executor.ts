import { RetryOptions } from '../../config/agent';
import { ToolAdapter, ToolParams, ToolResult } from '../../types/tool';
import { logger } from '../../utils/logger';
import { errorMessage } from '../../utils/errors';

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Retry harness around a ToolAdapter. Only results explicitly marked
 * `retryAllowed` are retried; a thrown error ends the call immediately.
 */
export class ToolExecutor {
  constructor(private options: RetryOptions, private sleep: Sleep = defaultSleep) {}

  async executeWithRetry(tool: ToolAdapter, action: string, params: ToolParams = {}): Promise<ToolResult> {
    let attempt = 0;

    for (;;) {
      logger.info('tool_called', { tool: tool.name, action, params, retryCount: attempt });

      let result: ToolResult;
      try {
        result = await tool.execute(action, params);
      } catch (error) {
        const message = `Tool execution exception: ${errorMessage(error)}`;
        logger.error('Tool execution exception', {
          errorType: 'tool_execution_exception',
          tool: tool.name,
          action,
          error: message,
        });
        const failed: ToolResult = { success: false, error: message, retryAllowed: false };
        logger.info('tool_result', { tool: tool.name, action, success: false, error: message, retryCount: attempt });
        return failed;
      }

      logger.info('tool_result', {
        tool: tool.name,
        action,
        success: result.success,
        error: result.error,
        retryCount: attempt,
      });

      if (result.success || !result.retryAllowed || attempt >= this.options.maxRetries) {
        return result;
      }

      attempt += 1;
      const delay = this.options.baseDelayMs * Math.pow(2, attempt - 1);
      logger.warn('Retrying tool call', {
        tool: tool.name,
        action,
        attempt,
        maxRetries: this.options.maxRetries,
        delay,
        error: result.error,
      });
      await this.sleep(delay);
    }
  }
}
