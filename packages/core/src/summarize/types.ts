import type { MaybePromise } from '@repowarden/shared';

/**
 * Turns the text of a diff into a one-line commit message.
 * Implementations never reject: when they cannot produce a message they
 * fall back to a generic one.
 */
export interface Summarizer {
  summarize(diffText: string): MaybePromise<string>;
}
