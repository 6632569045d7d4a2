import { DateTime } from 'luxon';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { OpenAIService, CompletionResult, extractCompletion, replyText } from './openai.service';
import { RetrievalService } from './retrieval.service';
import { ToolExecutor } from './tools/executor';
import { CALENDAR_TOOLS } from './tools/definitions';
import { ConversationStore } from './conversation.service';
import { ChatEntry } from '../types/conversation';
import { MAX_TOOL_ROUNDS } from '../config/studio';
import { prioritizeIntents } from '../utils/intents';
import { quoteFromAnalyses } from '../utils/pricing';
import { FALLBACK_REPLY, TOOL_FOLLOW_UP_PROMPT, TURN_FAILED_REPLY, buildSystemPrompt } from '../utils/prompts';
import { extractPhoneNumber } from '../utils/validation';
import { logger, errorMessage } from '../utils/logger';

export interface TurnResult {
  reply: string;
  /** Entries produced this turn, in order: tool rounds, then the reply. */
  entries: ChatEntry[];
}

export function toMessageParam(entry: ChatEntry): ChatCompletionMessageParam {
  switch (entry.role) {
    case 'user':
      return { role: 'user', content: entry.content };
    case 'assistant':
      return entry.tool_calls && entry.tool_calls.length > 0
        ? { role: 'assistant', content: entry.content, tool_calls: entry.tool_calls }
        : { role: 'assistant', content: entry.content };
    case 'tool':
      return { role: 'tool', tool_call_id: entry.tool_call_id, content: entry.content };
  }
}

function lastAssistantMessage(messages: ChatEntry[]): string | null {
  for (let i = messages.length - 1; i >= 0; i--) {
    const entry = messages[i];
    if (entry.role === 'assistant' && entry.content) return entry.content;
  }
  return null;
}

export class AssistantService {
  constructor(
    private openai: OpenAIService,
    private retrieval: RetrievalService,
    private tools: ToolExecutor,
    private conversations: ConversationStore,
    private clock: () => DateTime = () => DateTime.now()
  ) {}

  /**
   * Answers the customer's latest message, which must already be the last
   * entry of the stored conversation.
   */
  async reply(userId: string, message: string, imageAnalyses: string[] = []): Promise<TurnResult> {
    try {
      return await this.runTurn(userId, message, imageAnalyses);
    } catch (error: unknown) {
      logger.error('Assistant turn failed', { userId, error: errorMessage(error) });
      return { reply: TURN_FAILED_REPLY, entries: [{ role: 'assistant', content: TURN_FAILED_REPLY }] };
    }
  }

  private async runTurn(userId: string, message: string, imageAnalyses: string[]): Promise<TurnResult> {
    const context = await this.conversations.getContext(userId);
    const today = this.clock();

    const intents = await this.openai.classifyIntent(message, lastAssistantMessage(context.messages), today);
    const prioritized = prioritizeIntents(intents);
    const { primary } = prioritized;
    logger.info('Intents classified', { userId, primary: primary.primary, subcategory: primary.subcategory, count: intents.length });

    const examples = await this.retrieval.retrieveSimilar(message, {
      index: 'conversations',
      intent: primary.primary === 'other' ? undefined : primary.primary,
    });
    const quote = primary.primary === 'pricing' ? quoteFromAnalyses(imageAnalyses) : null;

    const systemPrompt = buildSystemPrompt({
      intents: prioritized,
      examples,
      imageAnalyses,
      quote,
      knownPhone: extractPhoneNumber(context.messages.map((m) => m.content)),
      today,
    });

    const history = context.messages.map(toMessageParam);
    const offersTools = primary.primary === 'booking_request';
    const response = await this.openai.createChatCompletion({
      messages: [{ role: 'system', content: systemPrompt }, ...history],
      temperature: quote ? 0.3 : 1.0,
      tools: offersTools ? CALENDAR_TOOLS : undefined,
    });

    const entries: ChatEntry[] = [];
    let result: CompletionResult = extractCompletion(response);

    for (let round = 1; result.kind === 'tool_calls' && round <= MAX_TOOL_ROUNDS; round++) {
      entries.push({ role: 'assistant', content: result.content, tool_calls: result.toolCalls });
      for (const call of result.toolCalls) {
        const outcome = await this.tools.execute(call, userId);
        entries.push({ role: 'tool', tool_call_id: call.id, content: JSON.stringify(outcome) });
      }
      logger.debug('Tool round complete', { userId, round, calls: result.toolCalls.length });

      const followUp = await this.openai.createChatCompletion({
        messages: [{ role: 'system', content: TOOL_FOLLOW_UP_PROMPT }, ...history, ...entries.map(toMessageParam)],
        tools: CALENDAR_TOOLS,
      });
      result = extractCompletion(followUp);
    }

    if (result.kind === 'malformed') {
      logger.warn('Model reply unusable, sending fallback', { userId, reason: result.reason });
    } else if (result.kind === 'tool_calls') {
      logger.warn('Tool round limit reached, sending fallback', { userId, rounds: MAX_TOOL_ROUNDS });
    }

    const reply = replyText(result, FALLBACK_REPLY);
    entries.push({ role: 'assistant', content: reply });
    return { reply, entries };
  }
}
