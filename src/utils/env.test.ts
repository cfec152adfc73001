import { describe, it, expect, afterEach, vi } from 'vitest';
import { envChoice, envNumber } from './env';
import { ConfigurationError } from './errors';

describe('env readers', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('falls back to the default for an unset or blank variable', () => {
    vi.stubEnv('RAG_TEST_NUMBER', '  ');

    expect(envNumber('RAG_TEST_NUMBER', 7)).toBe(7);
    expect(envNumber('RAG_TEST_UNSET_NUMBER', 3)).toBe(3);
  });

  it('reports a malformed number as a configuration error', () => {
    vi.stubEnv('RAG_TEST_NUMBER', 'abc');

    expect(() => envNumber('RAG_TEST_NUMBER', 7)).toThrow(ConfigurationError);
    expect(() => envNumber('RAG_TEST_NUMBER', 7)).toThrow(
      'Environment variable RAG_TEST_NUMBER must be a number (got "abc")'
    );
  });

  it('reports an unknown choice as a configuration error', () => {
    vi.stubEnv('RAG_TEST_CHOICE', 'dot');

    expect(() => envChoice('RAG_TEST_CHOICE', ['cosine', 'l2'], 'cosine')).toThrow(
      new ConfigurationError('Environment variable RAG_TEST_CHOICE must be one of cosine, l2 (got "dot")')
    );
  });
});
