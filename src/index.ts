export { AdvisoryOrchestrator, AdvisoryOrchestratorOptions } from './application/orchestrators/AdvisoryOrchestrator';
export { ConversationStore, createMessage } from './domain/services/ConversationStore';
export { ProposalExtractor, ExtractionResult, TradeProposalSchema, findJsonBlocks } from './domain/services/ProposalExtractor';
export { buildSystemPrompt, buildUserTurn } from './domain/services/PromptBuilder';
export { createAdvisorClient, getSupportedProviders } from './core/factories/advisor-client.factory';
export { BaseAdvisorAdapter } from './infrastructure/adapters/BaseAdvisorAdapter';
export { ClaudeAdvisorAdapter, ClaudeMessagesApi } from './infrastructure/adapters/ClaudeAdvisorAdapter';
export { OpenAIAdvisorAdapter, ChatCompletionsApi, GROK_BASE_URL } from './infrastructure/adapters/OpenAIAdvisorAdapter';
export { GeminiAdvisorAdapter, GEMINI_BASE_URL } from './infrastructure/adapters/GeminiAdvisorAdapter';
export { ConsoleLogger } from './infrastructure/logging/ConsoleLogger';
export { loadConfig, loadEnvironment, validateConfig, envCredentialResolver } from './config';
export * from './core/interfaces';
export * from './types';
