import { mkdir, open, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { RoundEvent, RoundRecord } from '../../types/index.js';
import logger from '../../utils/logger.js';
import type { RoundObserver } from '../state/RoundEngine.js';

const pad = (n: number) => String(n).padStart(2, '0');

const INDENT = '    ';

/** session_YYYY-MM-DD_HHMMSS.json, local time */
export function sessionFileName(now: Date): string {
  const date = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `session_${date}_${time}.json`;
}

/**
 * RoundLogWriter
 * --------------
 * Keeps one JSON array per session on disk and appends every finished round to it.
 * Only the new record and the closing bracket are written on each append; the file
 * always reads as `JSON.stringify(records, null, 4)`.
 */
export class RoundLogWriter implements RoundObserver {
  private written = 0;
  private size = 0;

  private constructor(public readonly file: string) {}

  static async create(dir: string, now = new Date()): Promise<RoundLogWriter> {
    await mkdir(dir, { recursive: true });
    const file = path.join(dir, sessionFileName(now));
    await writeFile(file, '[]', 'utf8');
    logger.info(`[LOG] Writing round log to ${file}`);
    const writer = new RoundLogWriter(file);
    writer.size = 2;
    return writer;
  }

  async onEvent(event: RoundEvent) {
    if (event.type === 'roundEnd') {
      await this.append(event.record);
    }
  }

  get count(): number {
    return this.written;
  }

  async append(record: RoundRecord) {
    const body = JSON.stringify(record, null, 4)
      .split('\n')
      .map((line) => INDENT + line)
      .join('\n');

    // overwrite "]" of "[]", or "\n]" after the last record
    const position = this.written === 0 ? this.size - 1 : this.size - 2;
    const chunk = `${this.written === 0 ? '\n' : ',\n'}${body}\n]`;

    const handle = await open(this.file, 'r+');
    try {
      await handle.write(chunk, position, 'utf8');
    } finally {
      await handle.close();
    }

    this.size = position + Buffer.byteLength(chunk, 'utf8');
    this.written++;
    logger.debug(`[LOG] Round ${record.gameNumber} written`, { file: this.file });
  }
}
