import OpenAI from 'openai';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from 'openai/resources/chat/completions';
import { DateTime } from 'luxon';
import { Intent, intentsPayloadSchema } from '../types/agent';
import { ToolCallRecord } from '../types/conversation';
import { RETRY_POLICY } from '../config/studio';
import { CLASSIFICATION_PROMPT, IMAGE_ANALYSIS_PROMPT, IMAGE_ANALYSIS_REQUEST } from '../utils/prompts';
import { ServiceError, toError } from '../utils/errors';
import { logger, errorMessage } from '../utils/logger';
import { isTransientError, withRetry } from '../utils/retry';

export type CompletionResult =
  | { kind: 'text'; text: string }
  | { kind: 'tool_calls'; content: string; toolCalls: ToolCallRecord[] }
  | { kind: 'malformed'; reason: string };

export interface ChatRequest {
  messages: ChatCompletionMessageParam[];
  model?: string;
  temperature?: number;
  tools?: ChatCompletionTool[];
  json?: boolean;
}

export interface OpenAIServiceOptions {
  apiKey: string;
  models: {
    chat: string;
    classify: string;
    vision: string;
    embedding: string;
  };
  timeoutMs: number;
  backoffMs?: readonly number[];
}

export interface Embedder {
  embed(text: string): Promise<number[]>;
}

/** Never throws; every response shape maps to one of the three variants. */
export function extractCompletion(response: ChatCompletion | null | undefined): CompletionResult {
  const message = response?.choices?.[0]?.message;
  if (!message) {
    return { kind: 'malformed', reason: 'response has no choices' };
  }

  if (message.tool_calls && message.tool_calls.length > 0) {
    return {
      kind: 'tool_calls',
      content: message.content ?? '',
      toolCalls: message.tool_calls.map((call) => ({
        id: call.id,
        type: 'function',
        function: { name: call.function.name, arguments: call.function.arguments },
      })),
    };
  }

  const text = message.content?.trim();
  if (!text) {
    return { kind: 'malformed', reason: 'empty message content' };
  }
  return { kind: 'text', text };
}

export function replyText(result: CompletionResult, fallback: string): string {
  return result.kind === 'text' ? result.text : fallback;
}

export class OpenAIService implements Embedder {
  private client: OpenAI;

  constructor(private options: OpenAIServiceOptions) {
    // Retries are ours (withRetry); the SDK's own would multiply them.
    this.client = new OpenAI({ apiKey: options.apiKey, maxRetries: 0, timeout: options.timeoutMs });
  }

  async createChatCompletion(request: ChatRequest): Promise<ChatCompletion> {
    const model = request.model ?? this.options.models.chat;
    const params: ChatCompletionCreateParamsNonStreaming = {
      model,
      messages: request.messages,
      temperature: request.temperature ?? 1.0,
    };
    if (request.tools && request.tools.length > 0) {
      params.tools = request.tools;
      params.tool_choice = 'auto';
    }
    if (request.json) {
      params.response_format = { type: 'json_object' };
    }

    const response = await this.run('createChatCompletion', () => this.client.chat.completions.create(params));
    logger.debug('OpenAI completion', {
      model,
      messages: request.messages.length,
      finishReason: response.choices[0]?.finish_reason,
    });
    return response;
  }

  /** Returns the model's description plus the `h= | w= | ink= | D=` line. */
  async analyzeImage(base64: string, mimeType: string): Promise<string> {
    const response = await this.createChatCompletion({
      model: this.options.models.vision,
      temperature: 0.3,
      messages: [
        { role: 'system', content: IMAGE_ANALYSIS_PROMPT },
        {
          role: 'user',
          content: [
            { type: 'text', text: IMAGE_ANALYSIS_REQUEST },
            { type: 'image_url', image_url: { url: `data:${mimeType};base64,${base64}` } },
          ],
        },
      ],
    });

    const result = extractCompletion(response);
    if (result.kind !== 'text') {
      throw new ServiceError('OpenAI', 'analyzeImage', new Error('Vision model returned no text'), false);
    }
    return result.text;
  }

  async embed(text: string): Promise<number[]> {
    const response = await this.run('embed', () =>
      this.client.embeddings.create({ model: this.options.models.embedding, input: text })
    );
    const vector = response.data[0]?.embedding;
    if (!vector) {
      throw new ServiceError('OpenAI', 'embed', new Error('Embedding response was empty'), false);
    }
    return vector;
  }

  /**
   * Multi-intent classification in JSON mode. Classification is advisory, so
   * any failure yields an empty list and the turn falls back to the default
   * prompt.
   */
  async classifyIntent(message: string, previousAssistantMessage: string | null, today: DateTime): Promise<Intent[]> {
    const header = `[CURRENT_DATE: ${today.toFormat('dd/MM/yyyy')}]`;
    const content = previousAssistantMessage
      ? `[PREVIOUS_ASSISTANT]: ${previousAssistantMessage}\n${header}\n${message}`
      : `${header}\n${message}`;

    try {
      const response = await this.createChatCompletion({
        model: this.options.models.classify,
        temperature: 0,
        json: true,
        messages: [
          { role: 'system', content: CLASSIFICATION_PROMPT },
          { role: 'user', content },
        ],
      });

      const result = extractCompletion(response);
      if (result.kind !== 'text') {
        logger.warn('Intent classification returned no text', { kind: result.kind });
        return [];
      }

      const parsed = intentsPayloadSchema.safeParse(JSON.parse(result.text));
      if (!parsed.success) {
        logger.warn('Intent classification did not match schema', { issues: parsed.error.issues.length });
        return [];
      }
      return parsed.data.intents;
    } catch (error: unknown) {
      logger.warn('Intent classification failed', { error: errorMessage(error) });
      return [];
    }
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withRetry(fn, {
        maxAttempts: RETRY_POLICY.maxAttempts,
        backoffMs: this.options.backoffMs ?? RETRY_POLICY.backoffMs,
        isRetryable: isTransientError,
        label: `OpenAI.${operation}`,
      });
    } catch (error: unknown) {
      logger.error('OpenAI call failed', { operation, error: errorMessage(error) });
      throw new ServiceError('OpenAI', operation, toError(error), isTransientError(error));
    }
  }
}
