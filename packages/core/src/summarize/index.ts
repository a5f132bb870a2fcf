import { ConfigError, Logger, SummarizerConfig } from '@repowarden/shared';
import type { Summarizer } from './types';
import { DiffStatSummarizer } from './diffstat';
import { OpenAISummarizer } from './openai';

export type { Summarizer } from './types';
export { DiffStatSummarizer, FALLBACK_COMMIT_MESSAGE, parseDiffStat } from './diffstat';
export type { DiffStat } from './diffstat';
export { OpenAISummarizer, SYSTEM_PROMPT } from './openai';
export type { OpenAISummarizerOptions } from './openai';

/**
 * Picks the summarizer named by config. `api_key_env` has already been
 * resolved by the config loader, so only `api_key` is consulted here.
 */
export function createSummarizer(config: SummarizerConfig, logger: Logger): Summarizer {
  switch (config.type) {
    case 'diffstat':
      return new DiffStatSummarizer();
    case 'openai': {
      if (!config.api_key) {
        const checked = config.api_key_env
          ? `summarizer.api_key and env var ${config.api_key_env}`
          : 'summarizer.api_key';
        throw new ConfigError(`Missing API key for the openai summarizer. Checked ${checked}`);
      }
      return new OpenAISummarizer({
        apiKey: config.api_key,
        model: config.model,
        maxDiffChars: config.maxDiffChars,
        logger: logger.child({ component: 'summarizer' }),
      });
    }
  }
}
