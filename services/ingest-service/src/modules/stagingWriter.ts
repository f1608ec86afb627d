import { promises as fsp } from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { Dataset } from '../interfaces/records';
import { logger } from '../logger';
import { Row, TableSchema } from '../schemas/staging.schema';
import { slugify } from '../utils/strings';
import { calendarDate, toZonedIso } from '../utils/time';
import { RecordSerializer } from './serializers';

export interface StagingKey {
  readonly provider: string;
  readonly dataset: Dataset;
  readonly location: string;
  readonly runTimestamp: Date;
}

export interface StagedFile {
  readonly path: string;
  readonly status: 'written' | 'skipped' | 'replaced';
  readonly rows: number;
}

export interface StagingWriterOptions {
  root: string;
  serializer: RecordSerializer;
  /** Zone the run timestamp is rendered in for file names and partitions. */
  runTimeZone?: string;
}

/**
 * File-name safe run timestamp. Colons become underscores, the offset sign
 * becomes a literal token and the date keeps its hyphens:
 * 2025-11-03T22:26:40-06:00 -> 2025-11-03T22_26_40_minus_06_00
 */
export function encodeRunTimestamp(iso: string): string {
  const match = /^(\d{4}-\d{2}-\d{2})T(.*?)([+-]\d{2}:\d{2}|Z)?$/.exec(iso);
  if (!match) {
    return iso.replace(/:/g, '_').replace(/\+/g, '_plus_');
  }

  const [, date, time, offset] = match;
  const clock = time.replace(/:/g, '_');

  let zone = '';
  if (offset === 'Z') {
    zone = '_plus_00_00';
  } else if (offset) {
    const token = offset.startsWith('-') ? '_minus_' : '_plus_';
    zone = `${token}${offset.slice(1).replace(':', '_')}`;
  }
  return `${date}T${clock}${zone}`;
}

// fs errors may come from another realm, so `instanceof Error` is not reliable
function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return typeof err === 'object' && err !== null && 'code' in err;
}

/**
 * Append-only staging. Event files are written once per
 * (provider, dataset, location, run timestamp) and never replaced; dimension
 * tables are rewritten in full on every call.
 */
export class StagingWriter {
  private readonly root: string;
  private readonly serializer: RecordSerializer;
  private readonly runTimeZone: string;

  constructor(options: StagingWriterOptions) {
    this.root = options.root;
    this.serializer = options.serializer;
    this.runTimeZone = options.runTimeZone ?? 'UTC';
  }

  fileNameFor(key: StagingKey): string {
    const stamp = encodeRunTimestamp(this.renderRunTimestamp(key.runTimestamp));
    return `${key.provider}_${key.dataset}_${slugify(key.location)}_${stamp}.${this.serializer.extension}`;
  }

  pathFor(key: StagingKey): string {
    return path.join(
      this.root,
      `${key.provider}_${key.dataset}`,
      `run_date=${calendarDate(key.runTimestamp, this.runTimeZone)}`,
      this.fileNameFor(key)
    );
  }

  dimensionPath(table: TableSchema): string {
    return path.join(this.root, `${table.name}.${this.serializer.extension}`);
  }

  renderRunTimestamp(runTimestamp: Date): string {
    // Whole seconds keep names stable across serializers and platforms
    const truncated = new Date(Math.floor(runTimestamp.getTime() / 1000) * 1000);
    return toZonedIso(truncated, this.runTimeZone);
  }

  async stage(key: StagingKey, table: TableSchema, rows: ReadonlyArray<Row>): Promise<StagedFile> {
    const target = this.pathFor(key);
    await fsp.mkdir(path.dirname(target), { recursive: true });

    if (await this.exists(target)) {
      logger.info({ path: target }, 'Staged file already exists, skipping write');
      return { path: target, status: 'skipped', rows: 0 };
    }

    const temp = this.tempPathFor(target);
    try {
      await this.serializer.write(temp, table, rows);

      const published = await this.publishExclusive(temp, target);
      if (!published) {
        logger.info({ path: target }, 'Staged file appeared concurrently, skipping write');
        return { path: target, status: 'skipped', rows: 0 };
      }
    } finally {
      await fsp.rm(temp, { force: true });
    }

    logger.debug({ path: target, rows: rows.length }, 'Staged file written');
    return { path: target, status: 'written', rows: rows.length };
  }

  async replaceDimension(table: TableSchema, rows: ReadonlyArray<Row>): Promise<StagedFile> {
    const target = this.dimensionPath(table);
    await fsp.mkdir(path.dirname(target), { recursive: true });

    const temp = this.tempPathFor(target);
    try {
      await this.serializer.write(temp, table, rows);
      await fsp.rename(temp, target);
    } finally {
      await fsp.rm(temp, { force: true });
    }

    logger.info({ path: target, rows: rows.length }, 'Dimension table replaced');
    return { path: target, status: 'replaced', rows: rows.length };
  }

  private tempPathFor(target: string): string {
    return path.join(path.dirname(target), `.${path.basename(target)}.${uuidv4()}.tmp`);
  }

  private async exists(target: string): Promise<boolean> {
    try {
      await fsp.access(target);
      return true;
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return false;
      throw err;
    }
  }

  /** Returns false when the target already exists. */
  private async publishExclusive(temp: string, target: string): Promise<boolean> {
    try {
      await fsp.link(temp, target);
      return true;
    } catch (err) {
      if (!isErrnoException(err)) throw err;
      if (err.code === 'EEXIST') return false;
      if (err.code !== 'EPERM' && err.code !== 'ENOTSUP' && err.code !== 'EXDEV') throw err;
    }

    // Filesystems without hard links
    try {
      await fsp.copyFile(temp, target, fsp.constants.COPYFILE_EXCL);
      return true;
    } catch (err) {
      if (isErrnoException(err) && err.code === 'EEXIST') return false;
      throw err;
    }
  }
}
