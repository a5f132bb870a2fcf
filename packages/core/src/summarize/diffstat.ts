import type { Summarizer } from './types';

export const FALLBACK_COMMIT_MESSAGE = 'Automated update: summarized changes';

const FILE_HEADER = /^diff --git a\/(.+?) b\/(.+)$/;
const LISTED_PATHS = 3;

export interface DiffStat {
  files: string[];
  added: number;
  removed: number;
}

export function parseDiffStat(diffText: string): DiffStat {
  const stat: DiffStat = { files: [], added: 0, removed: 0 };
  let inFile = false;
  // Between `diff --git` and the first hunk; `---`/`+++` there name the file.
  let inHeader = false;

  for (const line of diffText.split(/\r?\n/)) {
    const header = FILE_HEADER.exec(line);
    if (header) {
      stat.files.push(header[2]);
      inFile = true;
      inHeader = true;
      continue;
    }
    if (inHeader) {
      inHeader = !line.startsWith('@@');
      continue;
    }
    if (!inFile) {
      continue;
    }
    if (line.startsWith('+')) {
      stat.added++;
    } else if (line.startsWith('-')) {
      stat.removed++;
    }
  }

  return stat;
}

/**
 * Builds a message from the files and line counts of a diff, e.g.
 * `Update 4 files: a.ts, b.ts, c.ts, and 1 more (+12 -3)`.
 */
export class DiffStatSummarizer implements Summarizer {
  summarize(diffText: string): string {
    const { files, added, removed } = parseDiffStat(diffText);
    if (files.length === 0) {
      return FALLBACK_COMMIT_MESSAGE;
    }

    const listed = files.slice(0, LISTED_PATHS).join(', ');
    const more = files.length > LISTED_PATHS ? `, and ${files.length - LISTED_PATHS} more` : '';
    const noun = files.length === 1 ? 'file' : 'files';

    return `Update ${files.length} ${noun}: ${listed}${more} (+${added} -${removed})`;
  }
}
