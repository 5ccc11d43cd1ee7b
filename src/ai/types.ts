/**
 * AI Service Types
 */

export type AIProvider = "anthropic" | "openai" | "mock";

export const AI_PROVIDERS: readonly AIProvider[] = ["anthropic", "openai", "mock"];

export interface AIConfig {
  /** AI provider to use */
  provider: AIProvider;
  /** API key (reads from env if not provided) */
  apiKey?: string;
  /** Model to use (provider-specific) */
  model?: string;
  /** Maximum tokens in response */
  maxTokens?: number;
  /** Temperature (0-1) */
  temperature?: number;
  /** Timeout in milliseconds */
  timeoutMs?: number;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

/**
 * Outcome of one completion call. Failures carry a reason instead of data.
 */
export type AIResponse<T = string> =
  | {
      success: true;
      data: T;
      usage?: TokenUsage;
      /** Response time in ms */
      durationMs: number;
    }
  | {
      success: false;
      error: string;
      durationMs: number;
    };

export interface Message {
  role: "user" | "assistant";
  content: string;
}

export interface CompletionRequest {
  messages: Message[];
  maxTokens?: number;
  temperature?: number;
  systemPrompt?: string;
}
