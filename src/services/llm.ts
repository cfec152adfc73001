import { generateText, type LanguageModel } from 'ai';
import { createOpenAI } from '@ai-sdk/openai';
import { LLM_MODEL, AI_BASE_URL, AI_API_KEY } from '../constants/providers';
import {
  GENERATION_TEMPERATURE,
  RETRY_INITIAL_DELAY_MS,
  RETRY_MAX_ATTEMPTS,
  RETRY_MAX_DELAY_MS,
} from '../constants/rag';
import { DEFAULT_SYSTEM_PROMPT, EMPTY_ANSWER } from '../constants/prompts';
import type { GenerationRequest } from '../types/index';
import { log, error } from '../utils/logger';
import {
  withRetry,
  isTransientError,
  GenerationServiceError,
  RetryExhaustedError,
  errorMessage,
  type RetryConfig,
} from '../utils/errors';
import type { ProviderSettings } from './embeddings';

/** The generative completion service, treated as opaque text-in, text-out */
export interface Generator {
  generate(request: GenerationRequest): Promise<string>;
}

export interface GeneratorOptions {
  modelId?: string;
  /** Model to call instead of the provider's chat model for `modelId` */
  model?: LanguageModel;
  temperature?: number;
  retry?: Partial<Omit<RetryConfig, 'shouldRetry'>>;
}

export function buildUserPrompt(context: string, query: string): string {
  return context ? `Context:\n${context}\n\nQuestion: ${query}` : query;
}

/**
 * Clean up model output: strip a leading "Answer:" style label and
 * surrounding whitespace.
 */
export function cleanAnswer(text: string): string {
  return text
    .trim()
    .replace(/^(?:Answer:|Response:)\s*/i, '')
    .trim();
}

export class AiSdkGenerator implements Generator {
  private aiProvider: ReturnType<typeof createOpenAI> | null = null;
  private readonly modelId: string;
  private readonly model?: LanguageModel;
  private readonly temperature: number;
  private readonly retry: Partial<RetryConfig>;

  constructor(
    options: GeneratorOptions = {},
    private readonly settings: ProviderSettings = {}
  ) {
    this.modelId = options.modelId ?? LLM_MODEL;
    this.model = options.model;
    this.temperature = options.temperature ?? GENERATION_TEMPERATURE;
    this.retry = {
      maxAttempts: RETRY_MAX_ATTEMPTS,
      initialDelayMs: RETRY_INITIAL_DELAY_MS,
      maxDelayMs: RETRY_MAX_DELAY_MS,
      ...options.retry,
    };
  }

  async generate(request: GenerationRequest): Promise<string> {
    const model = this.model ?? this.provider().chat(this.modelId);

    try {
      const { text } = await withRetry(
        () =>
          generateText({
            model,
            system: request.systemPrompt ?? DEFAULT_SYSTEM_PROMPT,
            messages: [
              ...request.history,
              { role: 'user', content: buildUserPrompt(request.context, request.query) },
            ],
            temperature: this.temperature,
            maxRetries: 0,
          }),
        { ...this.retry, shouldRetry: isTransientError, label: 'generate' }
      );

      return cleanAnswer(text) || EMPTY_ANSWER;
    } catch (err) {
      error('Error generating answer:', errorMessage(err));
      if (err instanceof RetryExhaustedError) {
        throw new GenerationServiceError(
          `Generation service failed after ${err.attempts} attempts: ${err.lastError.message}`,
          err.lastError
        );
      }
      throw new GenerationServiceError(`Failed to generate answer: ${errorMessage(err)}`, err);
    }
  }

  private provider(): ReturnType<typeof createOpenAI> {
    if (!this.aiProvider) {
      const baseURL = this.settings.baseURL ?? AI_BASE_URL;
      log('Using AI SDK with LLM model:', this.modelId);
      log('Base URL:', baseURL);
      this.aiProvider = createOpenAI({ baseURL, apiKey: this.settings.apiKey ?? AI_API_KEY });
    }
    return this.aiProvider;
  }
}
