import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdir, readdir, unlink, writeFile } from 'fs/promises';
import { join, resolve } from 'path';
import { isIsoDate } from '../utils/dates';
import { isNotFoundError } from '../utils/errors';

const ARCHIVE_PREFIX = 'isr_cities_';
const ARCHIVE_SUFFIX = '.xml';
const DAY_MS = 24 * 60 * 60 * 1000;

export interface ArchiveEntry {
  date: string;
  path: string;
}

@Injectable()
export class ForecastArchiveService {
  private readonly logger = new Logger(ForecastArchiveService.name);
  readonly archiveDir: string;
  private readonly retentionDays: number;

  constructor(private readonly configService: ConfigService) {
    this.archiveDir = resolve(
      this.configService.get<string>('ARCHIVE_DIR', 'archive'),
    );
    this.retentionDays = this.configService.get<number>(
      'ARCHIVE_RETENTION_DAYS',
      14,
    );
  }

  static fileNameFor(date: string): string {
    return `${ARCHIVE_PREFIX}${date}${ARCHIVE_SUFFIX}`;
  }

  pathFor(date: string): string {
    return join(this.archiveDir, ForecastArchiveService.fileNameFor(date));
  }

  async save(date: string, content: string, dryRun = false): Promise<string> {
    const path = this.pathFor(date);
    if (dryRun) {
      this.logger.log(`[DRY RUN] Would archive XML to ${path}`);
      return path;
    }

    await mkdir(this.archiveDir, { recursive: true });
    await writeFile(path, content, 'utf8');
    this.logger.log(`Archived XML to ${path}`);
    return path;
  }

  /**
   * Archived files ordered oldest first. Files whose names do not carry a valid
   * date are ignored.
   */
  async list(): Promise<ArchiveEntry[]> {
    let names: string[];
    try {
      names = await readdir(this.archiveDir);
    } catch (error) {
      if (isNotFoundError(error)) return [];
      throw error;
    }

    const entries: ArchiveEntry[] = [];
    for (const name of names) {
      const date = this.dateFromFileName(name);
      if (date) {
        entries.push({ date, path: join(this.archiveDir, name) });
      }
    }
    return entries.sort((a, b) => a.date.localeCompare(b.date));
  }

  async findLatest(): Promise<ArchiveEntry | null> {
    const entries = await this.list();
    const latest = entries.length > 0 ? entries[entries.length - 1] : null;

    if (latest) {
      this.logger.log(`Found latest archive: ${latest.path}`);
    } else {
      this.logger.warn('No archive files found');
    }
    return latest;
  }

  /**
   * Delete archives older than the retention window.
   * @returns number of files deleted (or that would be, in a dry run)
   */
  async cleanup(now: Date = new Date(), dryRun = false): Promise<number> {
    const cutoff = now.getTime() - this.retentionDays * DAY_MS;
    let names: string[];
    try {
      names = await readdir(this.archiveDir);
    } catch (error) {
      if (isNotFoundError(error)) return 0;
      throw error;
    }

    let deleted = 0;
    for (const name of names) {
      if (!name.startsWith(ARCHIVE_PREFIX) || !name.endsWith(ARCHIVE_SUFFIX)) {
        continue;
      }

      const date = this.dateFromFileName(name);
      if (!date) {
        this.logger.warn(`Skipping archive with invalid date format: ${name}`);
        continue;
      }

      if (Date.parse(`${date}T00:00:00Z`) >= cutoff) continue;

      if (dryRun) {
        this.logger.log(`[DRY RUN] Would delete old archive: ${name}`);
      } else {
        await unlink(join(this.archiveDir, name));
        this.logger.log(`Deleted old archive: ${name}`);
      }
      deleted++;
    }

    if (deleted === 0) {
      this.logger.log(
        `No archive files older than ${this.retentionDays} days found`,
      );
    }
    return deleted;
  }

  private dateFromFileName(name: string): string | null {
    if (!name.startsWith(ARCHIVE_PREFIX) || !name.endsWith(ARCHIVE_SUFFIX)) {
      return null;
    }
    const date = name.slice(ARCHIVE_PREFIX.length, -ARCHIVE_SUFFIX.length);
    return isIsoDate(date) ? date : null;
  }
}
