import type { Retriever } from './retriever';
import type { Generator } from './llm';
import {
  HeuristicQueryRewriter,
  fitsQueryLimit,
  historyToMessages,
  type QueryRewriter,
} from './query-rewriter';
import type {
  AskResult,
  ConversationTurn,
  SearchResult,
  Session,
  SessionState,
} from '../types/index';
import { DEFAULT_TOP_K, MAX_CONTEXT_LENGTH, MAX_HISTORY_TURNS, MAX_SESSIONS } from '../constants/rag';
import { NO_CONTEXT_ANSWER } from '../constants/prompts';
import { log, debug, warn } from '../utils/logger';
import {
  ConfigurationError,
  errorMessage,
  validateOwnerId,
  validateQueryInput,
  validateTopK,
} from '../utils/errors';

const CONTEXT_SEPARATOR = '\n\n---\n\n';
const TRUNCATION_MARKER = '\n\n[... truncated for length ...]';

/**
 * Where sessions live between asks. Sessions are keyed by owner and id, so
 * two owners using the same session id never see each other's history.
 */
export interface SessionStore {
  get(ownerId: string, sessionId: string): Session | undefined;
  save(session: Session): void;
  delete(ownerId: string, sessionId: string): boolean;
}

function sessionKey(ownerId: string, sessionId: string): string {
  return JSON.stringify([ownerId, sessionId]);
}

/**
 * Keeps at most `maxSessions` sessions; saving beyond that evicts the
 * session that was saved least recently.
 */
export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, Session>();

  constructor(private readonly maxSessions: number = MAX_SESSIONS) {
    if (!Number.isInteger(maxSessions) || maxSessions < 1) {
      throw new ConfigurationError(`maxSessions must be a positive integer (got ${maxSessions})`);
    }
  }

  get size(): number {
    return this.sessions.size;
  }

  get(ownerId: string, sessionId: string): Session | undefined {
    return this.sessions.get(sessionKey(ownerId, sessionId));
  }

  save(session: Session): void {
    const key = sessionKey(session.ownerId, session.id);
    // Re-insert so iteration order is least recently saved first
    this.sessions.delete(key);
    this.sessions.set(key, session);

    for (const [oldest, evicted] of this.sessions) {
      if (this.sessions.size <= this.maxSessions) break;
      this.sessions.delete(oldest);
      debug(`[sessions] Evicted session ${evicted.id} of ${evicted.ownerId}`);
    }
  }

  delete(ownerId: string, sessionId: string): boolean {
    return this.sessions.delete(sessionKey(ownerId, sessionId));
  }
}

/**
 * Build context from search results with source citations, in rank order.
 * Lower-ranked results are dropped once the next one would push the context
 * past `maxLength`; the top result is truncated instead of dropped.
 */
export function assembleContext(
  results: SearchResult[],
  maxLength: number = MAX_CONTEXT_LENGTH
): { context: string; used: SearchResult[] } {
  const parts: string[] = [];
  let totalLength = 0;

  for (let i = 0; i < results.length; i++) {
    const { chunk } = results[i];
    const citation = `[Source ${i + 1}: ${chunk.source}, chunk ${chunk.index + 1}]`;
    let part = `${citation}\n${chunk.text}`;

    if (i === 0) {
      if (part.length > maxLength) {
        const room = Math.max(0, maxLength - citation.length - 1 - TRUNCATION_MARKER.length);
        part = `${citation}\n${chunk.text.slice(0, room)}${TRUNCATION_MARKER}`;
        // No room for the marker: cut the cited text itself
        if (part.length > maxLength) part = `${citation}\n${chunk.text}`.slice(0, maxLength);
        log(`[assembleContext] Truncated top chunk from ${chunk.text.length} to ${room} chars`);
      }
      parts.push(part);
      totalLength = part.length;
      continue;
    }

    const nextLength = totalLength + CONTEXT_SEPARATOR.length + part.length;
    if (nextLength > maxLength) {
      log(`[assembleContext] Reached max context length at source ${i + 1} (${totalLength} chars)`);
      break;
    }

    parts.push(part);
    totalLength = nextLength;
  }

  return {
    context: parts.join(CONTEXT_SEPARATOR),
    used: results.slice(0, parts.length),
  };
}

export interface ConversationOptions {
  topK?: number;
  maxContextLength?: number;
  /** Turns of history given to the generator and the rewriter */
  maxHistoryTurns?: number;
  systemPrompt?: string;
}

export interface ConversationDependencies {
  retriever: Retriever;
  generator: Generator;
  rewriter?: QueryRewriter;
  sessions?: SessionStore;
}

export interface AskOptions {
  /** Restrict retrieval to these documents of the owner */
  documentIds?: string[];
}

/**
 * Runs chat turns: rewrite the message against history, retrieve, assemble
 * context, generate, and only then record the turn. Each session moves
 * awaiting_query → retrieving → awaiting_generation → idle.
 */
export class ConversationManager {
  private readonly retriever: Retriever;
  private readonly generator: Generator;
  private readonly rewriter: QueryRewriter;
  private readonly sessions: SessionStore;
  private readonly topK: number;
  private readonly maxContextLength: number;
  private readonly maxHistoryTurns: number;
  private readonly systemPrompt?: string;
  private readonly inFlight = new Map<string, Promise<void>>();

  constructor(deps: ConversationDependencies, options: ConversationOptions = {}) {
    this.retriever = deps.retriever;
    this.generator = deps.generator;
    this.rewriter = deps.rewriter ?? new HeuristicQueryRewriter();
    this.sessions = deps.sessions ?? new InMemorySessionStore();
    this.topK = options.topK ?? DEFAULT_TOP_K;
    this.maxContextLength = options.maxContextLength ?? MAX_CONTEXT_LENGTH;
    this.maxHistoryTurns = options.maxHistoryTurns ?? MAX_HISTORY_TURNS;
    this.systemPrompt = options.systemPrompt;
    validateTopK(this.topK);
  }

  /**
   * Answer a message within a session. Asks on the same session run one at a
   * time; a failed ask leaves the session's history as it was.
   */
  async ask(
    sessionId: string,
    message: string,
    ownerId: string,
    options: AskOptions = {}
  ): Promise<AskResult> {
    validateOwnerId(ownerId);
    validateQueryInput(message);
    return this.serialize(sessionKey(ownerId, sessionId), () =>
      this.runTurn(sessionId, message, ownerId, options)
    );
  }

  getSession(ownerId: string, sessionId: string): Session | undefined {
    return this.sessions.get(ownerId, sessionId);
  }

  resetSession(ownerId: string, sessionId: string): boolean {
    return this.sessions.delete(ownerId, sessionId);
  }

  private async runTurn(
    sessionId: string,
    message: string,
    ownerId: string,
    options: AskOptions
  ): Promise<AskResult> {
    const startTime = performance.now();
    const existing = this.sessions.get(ownerId, sessionId);
    const history: readonly ConversationTurn[] = existing?.turns ?? [];
    const session: Session = existing ?? { id: sessionId, ownerId, state: 'awaiting_query', turns: history };

    this.transition(session, 'awaiting_query');

    try {
      const userQuery = message.trim();
      const rewritten = history.length > 0 ? await this.rewriter.rewrite(userQuery, history) : userQuery;
      const standalone = fitsQueryLimit(rewritten) ? rewritten : userQuery;
      if (standalone !== rewritten) {
        warn(`[ask] Rewrite of ${rewritten.length} characters is unusable, retrieving with the message`);
      } else if (standalone !== userQuery) {
        log(`[ask] Rewrote "${userQuery}" as "${standalone}"`);
      }

      this.transition(session, 'retrieving');
      const results = await this.retriever.retrieve(standalone, this.topK, {
        ownerId,
        ...(options.documentIds ? { documentIds: options.documentIds } : {}),
      });

      let answer: string;
      let used: SearchResult[] = [];

      if (results.length === 0) {
        log('[ask] No relevant context found');
        answer = NO_CONTEXT_ANSWER;
      } else {
        const assembled = assembleContext(results, this.maxContextLength);
        used = assembled.used;

        this.transition(session, 'awaiting_generation');
        answer = await this.generator.generate({
          ...(this.systemPrompt ? { systemPrompt: this.systemPrompt } : {}),
          context: assembled.context,
          history: historyToMessages(history, this.maxHistoryTurns),
          query: userQuery,
        });
      }

      const turn: ConversationTurn = {
        sequence: history.length,
        userQuery,
        ...(standalone !== userQuery ? { standaloneQuery: standalone } : {}),
        chunkIds: used.map(result => result.chunk.id),
        answer,
        createdAt: Date.now(),
      };
      this.sessions.save({ ...session, state: 'idle', turns: Object.freeze([...history, turn]) });

      const tookMs = Math.round((performance.now() - startTime) * 100) / 100;
      log(`[ask] Session ${sessionId} turn ${turn.sequence} completed in ${tookMs}ms`);

      return {
        answer,
        chunkIds: turn.chunkIds,
        ...(turn.standaloneQuery ? { standaloneQuery: turn.standaloneQuery } : {}),
        sources: used.map(result => ({
          chunkId: result.chunk.id,
          documentId: result.chunk.documentId,
          source: result.chunk.source,
          chunkIndex: result.chunk.index,
          text: result.chunk.text,
          score: result.score,
        })),
        took_ms: tookMs,
      };
    } catch (err) {
      // No turn is recorded; the caller may retry the same message
      warn(`[ask] Session ${sessionId} turn failed: ${errorMessage(err)}`);
      this.transition(session, 'awaiting_query');
      throw err;
    }
  }

  private transition(session: Session, state: SessionState): void {
    debug(`[ask] Session ${session.id}: ${state}`);
    this.sessions.save({ ...session, state });
  }

  private serialize<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.inFlight.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    const settled = run.then(
      () => undefined,
      () => undefined
    );
    this.inFlight.set(key, settled);
    void settled.then(() => {
      if (this.inFlight.get(key) === settled) this.inFlight.delete(key);
    });
    return run;
  }
}
