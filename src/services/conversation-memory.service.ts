import { ConversationTurn } from '../types/agent';
import { VectorMetadata, VectorStore } from '../types/vector';

export const CONVERSATION_COLLECTION = 'conversation_history';

/** Stores every conversation turn in its own vector collection for later semantic lookup. */
export class ConversationMemoryService {
  constructor(private store: VectorStore, private now: () => Date = () => new Date()) {}

  async addTurn(leadId: string, role: ConversationTurn['role'], message: string, metadata: VectorMetadata = {}): Promise<string> {
    const timestamp = this.now();
    const id = `${leadId}_${timestamp.getTime()}_${role}`;

    await this.store.add(
      [message],
      [{ ...metadata, lead_id: leadId, role, type: 'conversation_turn', timestamp: timestamp.toISOString() }],
      [id]
    );
    return id;
  }
}
