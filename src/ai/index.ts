/**
 * AI completion module
 */

export { AIService, createAIService } from "./service.js";

export {
  AI_PROVIDERS,
  type AIProvider,
  type AIConfig,
  type AIResponse,
  type CompletionRequest,
  type Message,
  type TokenUsage,
} from "./types.js";
