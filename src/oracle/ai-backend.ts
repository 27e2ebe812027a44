/**
 * Oracle backend over the AI SDK
 *
 * Structured generation with `generateObject` against any OpenAI-compatible
 * endpoint. Retries are left to the OracleClient, so the SDK's own retry loop
 * is switched off.
 */

import { createOpenAI } from '@ai-sdk/openai';
import { generateObject, type LanguageModel } from 'ai';
import type { OracleBackend, OracleRequest } from './schemas.js';

export interface AiOracleBackendConfig {
  apiKey: string;
  /** OpenAI-compatible base URL; the provider default when unset */
  baseURL?: string;
  model: string;
  /** Per-call timeout */
  timeoutMs: number;
}

export class AiOracleBackend implements OracleBackend {
  private readonly model: LanguageModel;
  private readonly timeoutMs: number;

  constructor(config: AiOracleBackendConfig);
  constructor(model: LanguageModel, timeoutMs?: number);
  constructor(configOrModel: AiOracleBackendConfig | LanguageModel, timeoutMs = 60_000) {
    if (isBackendConfig(configOrModel)) {
      const provider = createOpenAI({
        apiKey: configOrModel.apiKey,
        ...(configOrModel.baseURL ? { baseURL: configOrModel.baseURL } : {})
      });
      this.model = provider.chat(configOrModel.model);
      this.timeoutMs = configOrModel.timeoutMs;
    } else {
      this.model = configOrModel;
      this.timeoutMs = timeoutMs;
    }
  }

  async generate<T>(request: OracleRequest<T>): Promise<unknown> {
    const { object } = await generateObject({
      model: this.model,
      schema: request.schema,
      schemaName: request.task.replace(/-/g, '_'),
      system: request.system,
      prompt: request.prompt,
      temperature: 0,
      maxRetries: 0,
      abortSignal: AbortSignal.timeout(this.timeoutMs)
    });
    return object;
  }
}

function isBackendConfig(value: AiOracleBackendConfig | LanguageModel): value is AiOracleBackendConfig {
  return typeof value === 'object' && 'apiKey' in value && 'timeoutMs' in value;
}
