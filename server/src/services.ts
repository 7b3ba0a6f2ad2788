import { AppConfig } from './config';
import { OpenAIEmbedder } from './embeddings';
import { Grounder } from './grounder';
import { KnowledgeService } from './knowledge';
import { createOpenAIClient, OpenAILanguageModel } from './llm';
import { VectorStore } from './store';
import { singleFlight } from './util';

export type Services = {
  config: AppConfig;
  grounder: Grounder;
  knowledge: KnowledgeService;
};

/**
 * Wires the long-lived handles once per process. The OpenAI client is built on
 * first use and shared by generation and embeddings.
 */
export function createServices(config: AppConfig): Services {
  const openai = singleFlight(() => createOpenAIClient(config.llm));
  const llm = new OpenAILanguageModel(openai, {
    model: config.llm.model,
    api: config.llm.api,
    maxTokens: config.llm.maxTokens,
  });
  return {
    config,
    grounder: new Grounder(llm, config.llm.family),
    knowledge: new KnowledgeService(new VectorStore(), new OpenAIEmbedder(openai, config.embeddingModel)),
  };
}
