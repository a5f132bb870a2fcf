import OpenAI from 'openai';
import { Logger } from '@repowarden/shared';
import type { Summarizer } from './types';
import { DiffStatSummarizer } from './diffstat';

export const SYSTEM_PROMPT = [
  'You write git commit messages.',
  'Reply with a single imperative line of at most 72 characters describing the diff.',
  'Do not add quotes, a body or any explanation.',
].join(' ');

const TRUNCATION_MARKER = '\n[diff truncated]';

export interface OpenAISummarizerOptions {
  apiKey: string;
  model: string;
  /** Diffs longer than this are cut before they are sent */
  maxDiffChars: number;
  logger: Logger;
  /** Used when the model fails or replies with nothing; defaults to the diff stat */
  fallback?: Summarizer;
}

export class OpenAISummarizer implements Summarizer {
  private client: OpenAI;
  private fallback: Summarizer;

  constructor(private readonly options: OpenAISummarizerOptions) {
    this.client = new OpenAI({ apiKey: options.apiKey });
    this.fallback = options.fallback ?? new DiffStatSummarizer();
  }

  async summarize(diffText: string): Promise<string> {
    if (diffText.trim().length === 0) {
      return this.fallback.summarize(diffText);
    }

    try {
      const completion = await this.client.chat.completions.create({
        model: this.options.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: this.truncate(diffText) },
        ],
        temperature: 0.2,
        max_tokens: 100,
      });

      const message = firstLine(completion.choices[0]?.message.content ?? '');
      if (!message) {
        await this.options.logger.warn('Summarizer returned an empty message; using the diff stat');
        return this.fallback.summarize(diffText);
      }
      return message;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      await this.options.logger.warn(`OpenAI request failed: ${reason}; using the diff stat`);
      return this.fallback.summarize(diffText);
    }
  }

  private truncate(diffText: string): string {
    if (diffText.length <= this.options.maxDiffChars) {
      return diffText;
    }
    return diffText.slice(0, this.options.maxDiffChars) + TRUNCATION_MARKER;
  }
}

function firstLine(text: string): string {
  const line = text.trim().split(/\r?\n/)[0] ?? '';
  return line.replace(/^["'`]+|["'`]+$/g, '').trim();
}
