import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { ToolParams, ToolResult } from '../../types/tool';
import { logger } from '../../utils/logger';
import { buildFollowupBody, FOLLOWUP_SUBJECT } from '../../utils/prompts';
import { EmailSender } from '../email/sendgrid.adapter';
import { ActionHandler, BaseTool, toolFailure, toolSuccess } from './base.tool';

const sendSchema = z.object({
  to_email: z.string().email(),
  subject: z.string().min(1),
  body: z.string().min(1),
  from_email: z.string().email().optional(),
  cc: z.array(z.string().email()).optional(),
});

const followupSchema = z.object({
  to_email: z.string().email(),
  lead_name: z.string().nullish(),
  context: z.string().optional(),
});

type SendInput = z.infer<typeof sendSchema>;

export class EmailTool extends BaseTool {
  protected readonly actions: Record<string, ActionHandler> = {
    send: (params) => this.send(sendSchema.parse(params)),
    send_followup: (params) => this.sendFollowup(params),
  };

  constructor(private sender: EmailSender, private now: () => Date = () => new Date()) {
    super('email_tool', 'Email');
  }

  private async send(input: SendInput): Promise<ToolResult> {
    if (!this.sender.isConfigured()) {
      return toolFailure('Email provider not configured', false);
    }

    const providerId = await this.sender.sendEmail({
      to: input.to_email,
      subject: input.subject,
      text: input.body,
      from: input.from_email,
      cc: input.cc,
    });

    const emailId = providerId ?? uuidv4();
    const sentAt = this.now().toISOString();
    logger.info('Email delivered', { emailId, to: input.to_email, subject: input.subject });

    return toolSuccess({ email_id: emailId, status: 'sent', sent_at: sentAt });
  }

  private async sendFollowup(params: ToolParams): Promise<ToolResult> {
    const input = followupSchema.parse(params);
    return this.send({
      to_email: input.to_email,
      subject: FOLLOWUP_SUBJECT,
      body: buildFollowupBody(input.lead_name, input.context),
    });
  }
}
