/**
 * Ollama model configuration loaded from environment variables.
 */

export const OllamaModels = {
  /** Every pipeline call: research extraction, report sections, QA checks, repairs */
  WRITER: process.env.OLLAMA_MODEL_WRITER ?? 'qwen2.5:32b-instruct-q4_K_M',
} as const;

export type OllamaModelType = keyof typeof OllamaModels;

export const OLLAMA_BASE_URL = process.env.OLLAMA_BASE_URL ?? 'http://localhost:11434';

/** Per-call generation timeout; every backend call carries its own. */
export const DEFAULT_GENERATION_TIMEOUT_MS = Number(process.env.GENERATION_TIMEOUT_MS) || 60000;

export interface ModelConfig {
  model: string;
  temperature?: number;
  topP?: number;
  maxTokens?: number;
  timeout?: number;
}

export const defaultModelConfigs: Record<OllamaModelType, ModelConfig> = {
  WRITER: {
    model: OllamaModels.WRITER,
    temperature: 0.4,
    maxTokens: 4096,
    timeout: DEFAULT_GENERATION_TIMEOUT_MS,
  },
};
