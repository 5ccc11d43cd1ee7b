/**
 * Test generation module
 *
 * Generates Apex test classes for classes the coverage scanner found without
 * a co-located test, and writes them into the source tree.
 */

export {
  buildTestPrompt,
  createAITestGenerator,
  stripMarkdownFences,
  type GenerationRequest,
  type GenerationOutcome,
  type TestGenerator,
} from "./generator.js";

export {
  dispatchTestGeneration,
  testClassName,
  type DispatchOptions,
  type DispatchSummary,
  type UnitOutcome,
} from "./dispatch.js";

export {
  renderClassMetadata,
  sidecarPath,
  DEFAULT_API_VERSION,
  CLASS_STATUS,
  METADATA_SUFFIX,
} from "./metadata.js";
