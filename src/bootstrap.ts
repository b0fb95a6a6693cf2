import { AgentConfig, buildAgentConfig } from './config/agent';
import { Env } from './config/env';
import { AgentService } from './services/agent.service';
import { EmbeddingCache } from './services/cache.service';
import { CalendarFactory } from './services/calendar/calendar.factory';
import { ConversationMemoryService, CONVERSATION_COLLECTION } from './services/conversation-memory.service';
import { DatabaseService } from './services/database.service';
import { DecisionService } from './services/decision.service';
import { SendGridAdapter } from './services/email/sendgrid.adapter';
import { CachedEmbeddingProvider } from './services/embedding.service';
import { FollowupService } from './services/followup.service';
import { LLMFactory, LLMSettings } from './services/llm/llm.factory';
import { RerankerService } from './services/retrieval/reranker.service';
import { RetrieverService } from './services/retrieval/retriever.service';
import { CalendarTool } from './services/tools/calendar.tool';
import { CRMTool } from './services/tools/crm.tool';
import { EmailTool } from './services/tools/email.tool';
import { ToolExecutor } from './services/tools/tool.executor';
import { VectorStoreFactory } from './services/vector/vector.factory';
import { EmbeddingProvider } from './types/llm';
import { LeadStore } from './types/lead';
import { ToolSet } from './types/tool';
import { VectorStore } from './types/vector';

export interface AppContext {
  config: AgentConfig;
  leads: LeadStore;
  agent: AgentService;
  followups: FollowupService;
  knowledgeBase: VectorStore;
}

export function llmSettings(env: Env): LLMSettings {
  return {
    provider: env.LLM_PROVIDER,
    model: env.LLM_MODEL,
    anthropicApiKey: env.ANTHROPIC_API_KEY,
    openaiApiKey: env.OPENAI_API_KEY,
    embeddingModel: env.EMBEDDING_MODEL,
  };
}

export function createEmbedder(env: Env): EmbeddingProvider {
  return new CachedEmbeddingProvider(
    LLMFactory.createEmbeddingProvider(llmSettings(env)),
    new EmbeddingCache(env.EMBEDDING_MODEL)
  );
}

export function createKnowledgeBase(env: Env, embedder: EmbeddingProvider = createEmbedder(env)): VectorStore {
  return VectorStoreFactory.create(env.VECTOR_STORE, env.VECTOR_COLLECTION, embedder);
}

/** Builds every collaborator once. Nothing here is a module-level singleton. */
export function createAppContext(env: Env): AppContext {
  const config = buildAgentConfig(env);
  const leads = new DatabaseService();
  const generator = LLMFactory.createTextGenerator(llmSettings(env));
  const embedder = createEmbedder(env);
  const knowledgeBase = createKnowledgeBase(env, embedder);
  const conversations = VectorStoreFactory.create(env.VECTOR_STORE, CONVERSATION_COLLECTION, embedder);

  const tools: ToolSet = {
    crm: new CRMTool(leads),
    calendar: new CalendarTool(CalendarFactory.create(env.GOOGLE_CALENDAR_CREDENTIALS, env.GOOGLE_CALENDAR_ID)),
    email: new EmailTool(new SendGridAdapter({ apiKey: env.SENDGRID_API_KEY, fromEmail: env.SENDGRID_FROM_EMAIL })),
  };
  const toolExecutor = new ToolExecutor(config.retry);
  const reranker = new RerankerService(config.reranker);

  const agent = new AgentService({
    leads,
    decisionEngine: new DecisionService(generator, config.confidence),
    retriever: new RetrieverService(embedder, knowledgeBase, { topK: config.retrieval.topK }),
    reranker,
    generator,
    toolExecutor,
    tools,
    conversationMemory: new ConversationMemoryService(conversations),
    retrieval: config.retrieval,
  });

  return {
    config,
    leads,
    agent,
    followups: new FollowupService(leads, tools.email, toolExecutor),
    knowledgeBase,
  };
}
