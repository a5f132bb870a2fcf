import { describe, it, expect, vi } from 'vitest';
import { ConfigError, SummarizerConfigSchema } from '@repowarden/shared';
import { createSummarizer, DiffStatSummarizer, OpenAISummarizer } from './index';
import { fakeLogger } from '../__fixtures__/logger';

vi.mock('openai', () => {
  return {
    default: class MockOpenAI {
      chat = { completions: { create: vi.fn() } };
    },
  };
});

describe('createSummarizer', () => {
  it('creates the diff stat summarizer by default', () => {
    const config = SummarizerConfigSchema.parse({ type: 'diffstat' });
    expect(createSummarizer(config, fakeLogger())).toBeInstanceOf(DiffStatSummarizer);
  });

  it('creates the OpenAI summarizer when a key is configured', () => {
    const config = SummarizerConfigSchema.parse({ type: 'openai', api_key: 'test-secret' });
    const logger = fakeLogger();

    expect(createSummarizer(config, logger)).toBeInstanceOf(OpenAISummarizer);
    expect(logger.child).toHaveBeenCalledWith({ component: 'summarizer' });
  });

  it('rejects the OpenAI summarizer without a key', () => {
    const config = SummarizerConfigSchema.parse({ type: 'openai', api_key_env: 'WARDEN_KEY' });

    expect(() => createSummarizer(config, fakeLogger())).toThrow(ConfigError);
    expect(() => createSummarizer(config, fakeLogger())).toThrow(
      'Missing API key for the openai summarizer. Checked summarizer.api_key and env var WARDEN_KEY',
    );
  });
});
