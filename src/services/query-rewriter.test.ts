import { describe, it, expect } from 'vitest';
import {
  HeuristicQueryRewriter,
  LlmQueryRewriter,
  historyToMessages,
  isFollowUp,
  parseRewrite,
} from './query-rewriter';
import { FakeGenerator, FlakyGenerator } from '../test-utils/fakes';
import type { ConversationTurn } from '../types/index';
import { QUERY_REWRITE_PROMPT } from '../constants/prompts';

function turn(sequence: number, userQuery: string, answer: string, standaloneQuery?: string): ConversationTurn {
  return {
    sequence,
    userQuery,
    ...(standaloneQuery ? { standaloneQuery } : {}),
    chunkIds: [],
    answer,
    createdAt: 0,
  };
}

const resultsTurn = turn(0, 'What were the 2024 results?', 'Revenue grew 10%.');

describe('isFollowUp', () => {
  it('treats short or referential messages as follow-ups', () => {
    expect(isFollowUp('What about question 2?')).toBe(true);
    expect(isFollowUp('Can you explain how that number was calculated?')).toBe(true);
    expect(isFollowUp('And how did the previous quarter compare overall?')).toBe(true);
  });

  it('leaves self-contained questions alone', () => {
    expect(isFollowUp('Describe the revenue growth across all regions')).toBe(false);
  });
});

describe('HeuristicQueryRewriter', () => {
  const rewriter = new HeuristicQueryRewriter();

  it('anchors a follow-up to the previous turn\'s topic', async () => {
    const rewritten = await rewriter.rewrite('What about question 2?', [resultsTurn]);

    expect(rewritten).toBe('What about question 2? (in the context of: What were the 2024 results)');
  });

  it('uses the previous standalone query as the topic', () => {
    const history = [
      resultsTurn,
      turn(1, 'And Europe?', 'Flat.', 'What were the 2024 results in Europe?'),
    ];

    expect(rewriter.rewriteSync('What about Asia?', history)).toBe(
      'What about Asia? (in the context of: What were the 2024 results in Europe)'
    );
  });

  it('keeps a chain of follow-ups anchored to the first topic', () => {
    const history: ConversationTurn[] = [resultsTurn];
    for (const message of ['And revenue?', 'What about that?', 'More on it?']) {
      history.push(turn(history.length, message, 'Noted.', rewriter.rewriteSync(message, history)));
    }

    expect(history.map(t => t.standaloneQuery)).toEqual([
      undefined,
      'And revenue? (in the context of: What were the 2024 results)',
      'What about that? (in the context of: What were the 2024 results)',
      'More on it? (in the context of: What were the 2024 results)',
    ]);
  });

  it('returns the message unchanged when the anchored query would be too long', () => {
    const message = 'Tell me about it ' + 'x'.repeat(1980);

    expect(message).toHaveLength(1997);
    expect(rewriter.rewriteSync(message, [resultsTurn])).toBe(message);
  });

  it('returns self-contained questions unchanged', () => {
    const message = 'Describe the revenue growth across all regions';

    expect(rewriter.rewriteSync(message, [resultsTurn])).toBe(message);
  });

  it('returns the trimmed message when there is no history', () => {
    expect(rewriter.rewriteSync('  What about it?  ', [])).toBe('What about it?');
  });
});

describe('parseRewrite', () => {
  it('keeps the first line without label or quotes', () => {
    expect(parseRewrite('\nStandalone question: "What were the 2024 results for question 2?"\nThanks')).toBe(
      'What were the 2024 results for question 2?'
    );
  });

  it('returns an empty string for blank output', () => {
    expect(parseRewrite('  \n \n')).toBe('');
  });
});

describe('historyToMessages', () => {
  it('keeps only the most recent turns as user/assistant pairs', () => {
    const history = [resultsTurn, turn(1, 'And 2023?', 'Revenue fell 2%.')];

    expect(historyToMessages(history, 1)).toEqual([
      { role: 'user', content: 'And 2023?' },
      { role: 'assistant', content: 'Revenue fell 2%.' },
    ]);
  });
});

describe('LlmQueryRewriter', () => {
  it('asks the generator for a standalone question', async () => {
    const generator = new FakeGenerator(() => 'What were the 2024 results for question 2?');
    const rewriter = new LlmQueryRewriter(generator);

    const rewritten = await rewriter.rewrite('What about question 2?', [resultsTurn]);

    expect(rewritten).toBe('What were the 2024 results for question 2?');
    expect(generator.requests).toHaveLength(1);
    expect(generator.requests[0].systemPrompt).toBe(QUERY_REWRITE_PROMPT);
    expect(generator.requests[0].query).toBe('Latest message: What about question 2?\n\nStandalone question:');
  });

  it('falls back to the heuristic when the generator fails', async () => {
    const rewriter = new LlmQueryRewriter(new FlakyGenerator(1));

    expect(await rewriter.rewrite('What about question 2?', [resultsTurn])).toBe(
      'What about question 2? (in the context of: What were the 2024 results)'
    );
  });

  it('falls back to the heuristic on an empty rewrite', async () => {
    const rewriter = new LlmQueryRewriter(new FakeGenerator(() => '   '));

    expect(await rewriter.rewrite('What about question 2?', [resultsTurn])).toBe(
      'What about question 2? (in the context of: What were the 2024 results)'
    );
  });

  it('falls back to the heuristic when the rewrite is too long to retrieve with', async () => {
    const rewriter = new LlmQueryRewriter(new FakeGenerator(() => 'q'.repeat(2001)));

    expect(await rewriter.rewrite('What about question 2?', [resultsTurn])).toBe(
      'What about question 2? (in the context of: What were the 2024 results)'
    );
  });

  it('does not call the generator without history', async () => {
    const generator = new FakeGenerator();
    const rewriter = new LlmQueryRewriter(generator);

    expect(await rewriter.rewrite('What is revenue?', [])).toBe('What is revenue?');
    expect(generator.requests).toEqual([]);
  });
});
