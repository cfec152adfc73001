import type { Generator } from './llm';
import type { ChatMessage, ConversationTurn } from '../types/index';
import { QUERY_REWRITE_PROMPT } from '../constants/prompts';
import { MAX_HISTORY_TURNS, MAX_QUERY_LENGTH } from '../constants/rag';
import { debug, warn } from '../utils/logger';
import { errorMessage } from '../utils/errors';

/**
 * Turns a follow-up message into a query that can be retrieved on its own,
 * using the session's earlier turns. Returns the message unchanged when it
 * needs no rewriting.
 */
export interface QueryRewriter {
  rewrite(message: string, history: readonly ConversationTurn[]): Promise<string>;
}

const FOLLOW_UP_PATTERNS: RegExp[] = [
  /^\s*(what|how)\s+about\b/i,
  /^\s*(and|also|then|so)\b/i,
  /\b(it|its|that|this|those|these|they|them|their|he|she|him|her)\b/i,
  /\bthe\s+(first|second|third|fourth|last|other|previous|next|former|latter|same)\b/i,
  /\b(more|else|again|instead)\b/i,
];

const SHORT_MESSAGE_WORDS = 4;

export function isFollowUp(message: string): boolean {
  const words = message.trim().split(/\s+/).filter(Boolean);
  if (words.length <= SHORT_MESSAGE_WORDS) return true;
  return FOLLOW_UP_PATTERNS.some(pattern => pattern.test(message));
}

const CONTEXT_SUFFIX = /\s\(in the context of: (.+)\)$/s;

function anchorToTopic(message: string, topic: string): string {
  return `${message} (in the context of: ${topic})`;
}

/**
 * The topic a turn was retrieved with, without trailing punctuation. A turn
 * that was itself anchored by the heuristic carries its anchor forward, so a
 * chain of follow-ups keeps pointing at the same topic.
 */
export function turnTopic(turn: ConversationTurn): string {
  const query = (turn.standaloneQuery ?? turn.userQuery).trim();
  const anchored = CONTEXT_SUFFIX.exec(query);
  return (anchored ? anchored[1] : query).trim().replace(/[?.!\s]+$/, '');
}

/** True when a rewrite can still be retrieved with */
export function fitsQueryLimit(query: string): boolean {
  return query.length > 0 && query.length <= MAX_QUERY_LENGTH;
}

/**
 * Rule-based rewriting: a message that reads like a follow-up is anchored to
 * the topic of the previous turn. Deterministic and free, used on its own or
 * as the fallback when model-based rewriting fails.
 */
export class HeuristicQueryRewriter implements QueryRewriter {
  async rewrite(message: string, history: readonly ConversationTurn[]): Promise<string> {
    return this.rewriteSync(message, history);
  }

  rewriteSync(message: string, history: readonly ConversationTurn[]): string {
    const previous = history.at(-1);
    const trimmed = message.trim();
    if (!previous || !isFollowUp(trimmed)) return trimmed;

    const topic = turnTopic(previous);
    if (!topic || trimmed.toLowerCase().includes(topic.toLowerCase())) return trimmed;

    const rewritten = anchorToTopic(trimmed, topic);
    return fitsQueryLimit(rewritten) ? rewritten : trimmed;
  }
}

export function historyToMessages(
  history: readonly ConversationTurn[],
  maxTurns: number = MAX_HISTORY_TURNS
): ChatMessage[] {
  return history.slice(-maxTurns).flatMap<ChatMessage>(turn => [
    { role: 'user', content: turn.userQuery },
    { role: 'assistant', content: turn.answer },
  ]);
}

/**
 * Parse the model's reply down to a single question: first non-empty line,
 * without a "Standalone question:" label or wrapping quotes.
 */
export function parseRewrite(text: string): string {
  const line = text
    .split('\n')
    .map(l => l.trim())
    .find(l => l.length > 0);
  if (!line) return '';

  return line
    .replace(/^(standalone\s+)?(question|query)\s*:\s*/i, '')
    .replace(/^["'“”]+|["'“”]+$/g, '')
    .trim();
}

/**
 * Asks the generation service to rewrite the follow-up, falling back to the
 * heuristic rewriter when the call fails or returns nothing usable.
 */
export class LlmQueryRewriter implements QueryRewriter {
  private readonly fallback = new HeuristicQueryRewriter();

  constructor(
    private readonly generator: Generator,
    private readonly maxTurns: number = MAX_HISTORY_TURNS
  ) {}

  async rewrite(message: string, history: readonly ConversationTurn[]): Promise<string> {
    if (history.length === 0) return message.trim();

    try {
      const reply = await this.generator.generate({
        systemPrompt: QUERY_REWRITE_PROMPT,
        context: '',
        history: historyToMessages(history, this.maxTurns),
        query: `Latest message: ${message.trim()}\n\nStandalone question:`,
      });

      const rewritten = parseRewrite(reply);
      if (fitsQueryLimit(rewritten)) {
        debug(`[rewrite] "${message}" -> "${rewritten}"`);
        return rewritten;
      }
      warn(
        rewritten
          ? `[rewrite] Model rewrite is ${rewritten.length} characters (max: ${MAX_QUERY_LENGTH}), using heuristic`
          : '[rewrite] Model returned an empty rewrite, using heuristic'
      );
    } catch (err) {
      warn(`[rewrite] Model rewrite failed, using heuristic: ${errorMessage(err)}`);
    }

    return this.fallback.rewriteSync(message, history);
  }
}
