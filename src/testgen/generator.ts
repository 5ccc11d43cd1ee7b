/**
 * AI-backed Apex test generator
 *
 * Turns one uncovered class into the text of its test class. The response is
 * treated as opaque: non-empty text is a success, anything else a failure.
 */

import type { AIService } from "../ai/service.js";
import type { SourceUnit } from "../core/scanner/types.js";

// =============================================================================
// TYPES
// =============================================================================

export interface GenerationRequest {
  unit: SourceUnit;
  /** Source of the class under test */
  source: string;
  /** Name the generated test class must declare */
  testClassName: string;
  apiVersion: string;
}

export type GenerationOutcome =
  | { kind: "success"; content: string }
  | { kind: "failure"; reason: string };

/**
 * The collaborator dispatch calls once per uncovered class
 */
export type TestGenerator = (
  request: GenerationRequest,
  signal: AbortSignal
) => Promise<GenerationOutcome>;

// =============================================================================
// PROMPTS
// =============================================================================

const SYSTEM_PROMPT = [
  "You are a senior Salesforce developer writing Apex unit tests.",
  "Output ONLY the complete Apex test class. No markdown fences. No explanations.",
].join(" ");

export function buildTestPrompt(request: GenerationRequest): string {
  const parts: string[] = [];

  parts.push(`Write an Apex test class for the class below.`);
  parts.push("");
  parts.push(`Class under test: ${request.unit.name}`);
  parts.push(`Test class name: ${request.testClassName}`);
  parts.push(`API version: ${request.apiVersion}`);
  parts.push("");
  parts.push("## Source");
  parts.push("```apex");
  parts.push(request.source.trimEnd());
  parts.push("```");
  parts.push("");
  parts.push("## Requirements");
  parts.push(`1. Declare exactly one class named ${request.testClassName} annotated with @isTest.`);
  parts.push("2. Create all test data inside the test; do not rely on org data.");
  parts.push("3. Wrap the code under test in Test.startTest() / Test.stopTest().");
  parts.push("4. Cover bulk inputs (200 records) and at least one negative path.");
  parts.push("5. Every test method asserts on results with System.assertEquals or Assert methods.");

  return parts.join("\n");
}

// =============================================================================
// AI GENERATION
// =============================================================================

/**
 * Adapt an AI service into a TestGenerator
 */
export function createAITestGenerator(service: AIService): TestGenerator {
  return async (request, signal) => {
    const response = await service.complete(
      {
        systemPrompt: SYSTEM_PROMPT,
        messages: [{ role: "user", content: buildTestPrompt(request) }],
      },
      signal
    );

    if (!response.success) {
      return { kind: "failure", reason: response.error };
    }

    const content = stripMarkdownFences(response.data);
    if (content.length === 0) {
      return { kind: "failure", reason: "AI returned an empty response" };
    }

    return { kind: "success", content };
  };
}

// =============================================================================
// HELPERS
// =============================================================================

export function stripMarkdownFences(content: string): string {
  let result = content.trim();

  // Remove opening fence (```apex, ```java, etc.)
  if (result.startsWith("```")) {
    const firstNewline = result.indexOf("\n");
    result = firstNewline === -1 ? "" : result.slice(firstNewline + 1);
  }

  if (result.endsWith("```")) {
    result = result.slice(0, -3);
  }

  return result.trim();
}
