/**
 * Daily operator journal: one markdown file per day in the memory workspace,
 * each event appended as a bullet under a fixed heading.
 */

import fs from 'node:fs';
import path from 'node:path';
import type { Logger } from './logger.js';
import { sanitize } from '../utils/sanitize.js';
import { formatClock, formatDate } from '../utils/time.js';
import { errorMessage } from '../utils/errors.js';

export const JOURNAL_HEADING = '## Watchdog Events';

export class Journal {
  private readonly dir: string;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(options: { dir: string; now: () => number; logger: Logger }) {
    this.dir = options.dir;
    this.now = options.now;
    this.logger = options.logger;
  }

  fileFor(ms: number): string {
    return path.join(this.dir, `${formatDate(ms)}.md`);
  }

  append(message: string): void {
    const at = this.now();
    const file = this.fileFor(at);
    try {
      fs.mkdirSync(this.dir, { recursive: true });
      if (!fs.existsSync(file)) {
        fs.writeFileSync(file, `# ${formatDate(at)}\n\n${JOURNAL_HEADING}\n`, 'utf-8');
      } else if (!fs.readFileSync(file, 'utf-8').includes(JOURNAL_HEADING)) {
        fs.appendFileSync(file, `\n${JOURNAL_HEADING}\n`, 'utf-8');
      }
      fs.appendFileSync(file, `- [${formatClock(at)}] ${sanitize(message)}\n`, 'utf-8');
    } catch (err) {
      this.logger.error('Failed to write journal entry', { file, error: errorMessage(err) });
    }
  }
}
