export { createApp, type VibesApp } from './app';
export { createAppContext, type AppContext } from './lib/context';
export { getVibesConfig, type VibesConfig } from './lib/config';
export { getLlmConfig, createLlmClient } from './lib/llm/client';
export { getGeminiConfig, createGeminiClient } from './lib/llm/gemini';
export { createChatService, openAiTransport, geminiTransport } from './lib/llm/services';
export { createConsoleObserver } from './lib/observability';
export { maskPii, maskPiiDetailed } from './lib/privacy/redact';
export { moderateText, openAiModerationCheck, type ModerationResult } from './lib/safety/moderation';
export { getPlatformTips } from './lib/platform/tips';
export { createFileGroundingStore, type FileGroundingStore } from './lib/rag/store';
export { createApiApp, createRoutes, type RouteDeps, type RouteHandler } from './routes';
