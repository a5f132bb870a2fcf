import { z } from 'zod';

export const DEFAULT_SCAN_EXCLUDES = ['node_modules', '.git', '.venv'];
export const DEFAULT_CHECK_INTERVAL_MS = 30 * 60 * 1000;
/** Longest delay a Node timer honours; larger values fire after 1 ms */
export const MAX_CHECK_INTERVAL_MS = 2_147_483_647;
export const DEFAULT_CACHE_FILE = '.repowarden_cache.txt';
export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';

const substring = z.string().min(1, 'exclude substrings must not be empty');

export const SummarizerConfigSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('diffstat'),
  }),
  z.object({
    type: z.literal('openai'),
    model: z.string().default(DEFAULT_OPENAI_MODEL),
    api_key: z.string().optional(),
    api_key_env: z.string().optional(),
    /** Diffs longer than this are truncated before they are sent */
    maxDiffChars: z.number().int().positive().default(12000),
  }),
]);

export const ManagerConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  rootDir: z.string().min(1, 'rootDir is required'),
  /** Directory base names containing any of these are pruned from the scan */
  scanExcludes: z.array(substring).default(DEFAULT_SCAN_EXCLUDES),
  /** Repository base names containing any of these are tracked but never committed */
  checkExcludes: z.array(substring).default([]),
  checkIntervalMs: z
    .number()
    .int()
    .positive('checkIntervalMs must be greater than zero')
    .max(MAX_CHECK_INTERVAL_MS, `checkIntervalMs must be at most ${MAX_CHECK_INTERVAL_MS} (about 24.8 days)`)
    .default(DEFAULT_CHECK_INTERVAL_MS),
  cacheFile: z.string().min(1).default(DEFAULT_CACHE_FILE),
  /** Push remote per repository, keyed by absolute path or base name */
  remotes: z.record(z.string().min(1)).default({}),
  summarizer: SummarizerConfigSchema.default({ type: 'diffstat' }),
  /** JSONL file receiving every structured event */
  eventLog: z.string().optional(),
});

export type SummarizerConfig = z.infer<typeof SummarizerConfigSchema>;
export type ManagerConfig = z.infer<typeof ManagerConfigSchema>;
export type ManagerConfigInput = z.input<typeof ManagerConfigSchema>;
