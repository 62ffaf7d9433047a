/**
 * @exitready/llm - text-generation backend and structured-response coercion
 */

export {
  OllamaModels,
  OLLAMA_BASE_URL,
  DEFAULT_GENERATION_TIMEOUT_MS,
  type OllamaModelType,
  type ModelConfig,
  defaultModelConfigs,
} from './models.js';

export type { ChatMessage, GenerationRequest, TextGenerator } from './types.js';

export {
  OllamaClient,
  createOllamaGenerator,
  createTimeoutSignal,
  defaultClient,
  type OllamaChatMessage,
  type OllamaChatRequest,
  type OllamaChatResponse,
} from './client.js';

export { buildPrompt, truncateForPrompt, withJsonInstruction } from './prompts.js';

export {
  defaultRepairers,
  extractLargestBalancedObject,
  isJsonObject,
  jsonRepairers,
  repairJson,
  stripCodeFences,
  type JsonObject,
  type JsonRepairer,
  type RepairContext,
  type RepairOutcome,
} from './parse.js';

export {
  DEFAULT_MAX_RETRIES,
  StructuredOutputError,
  correctionMessage,
  jsonObjectSchema,
  requestStructured,
  type StructuredAttempt,
  type StructuredCallResult,
  type StructuredRequestOptions,
} from './structured.js';
