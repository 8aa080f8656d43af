import fs from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import path from 'node:path';
import { deleteRecordingByPath } from '../db.js';
import loggerModule from '../logger.js';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import { MEDIA_EXTENSION, METADATA_EXTENSION, isMissing } from '../recording/storage.js';
import { systemClock, type Clock } from '../types.js';

const SECONDS_PER_DAY = 24 * 60 * 60;

type RetentionLogger = Pick<typeof loggerModule, 'info' | 'warn' | 'error'>;

export interface RetentionTaskOptions {
  enabled?: boolean;
  baseDir: string;
  maxAgeDays: number;
  intervalMs: number;
  dryRun?: boolean;
  clock?: Clock;
  deleteCatalogEntry?: (filePath: string) => boolean;
  logger?: RetentionLogger;
  metrics?: MetricsRegistry;
}

export type RemovedRecording = {
  filePath: string;
  metadataPath: string;
  cameraId: string | null;
  end: number;
  bytes: number;
};

export type RetentionWarning = {
  path: string;
  reason: string;
};

export type RetentionRunResult = {
  skipped: boolean;
  reason?: 'disabled' | 'missing-directory';
  dryRun: boolean;
  removed: RemovedRecording[];
  kept: number;
  freedBytes: number;
  removedDirectories: string[];
  warnings: RetentionWarning[];
};

type SidecarFields = {
  type: string;
  keep: boolean;
  end: number | null;
  file: string | null;
  cameraId: string | null;
};

/** Continuous recordings past the age limit go; anything kept or event-typed stays. */
export function shouldDeleteRecording(metadata: SidecarFields, maxAgeDays: number, now: number): boolean {
  if (metadata.keep) {
    return false;
  }
  if (metadata.type.startsWith('event')) {
    return false;
  }
  if (metadata.end === null) {
    return false;
  }
  return (now - metadata.end) / SECONDS_PER_DAY > maxAgeDays;
}

export class RetentionTask {
  private options: RetentionTaskOptions;
  private readonly logger: RetentionLogger;
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private stopped = false;
  private lastResult: RetentionRunResult | null = null;

  constructor(options: RetentionTaskOptions) {
    this.options = options;
    this.logger = options.logger ?? loggerModule;
  }

  start() {
    if (this.timer) {
      return;
    }
    this.stopped = false;
    this.scheduleNext(0);
  }

  stop() {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  configure(options: RetentionTaskOptions) {
    this.options = options;
    if (this.stopped) {
      return;
    }
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (!this.running) {
      this.scheduleNext(0);
    }
  }

  getLastResult(): RetentionRunResult | null {
    return this.lastResult;
  }

  isRunning() {
    return this.running;
  }

  private scheduleNext(delayMs: number) {
    if (this.stopped) {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.runOnce();
    }, delayMs);
    this.timer.unref?.();
  }

  private async runOnce() {
    if (this.running) {
      return;
    }
    this.running = true;
    try {
      this.lastResult = await runRetentionOnce(this.options);
    } catch (error) {
      this.logger.error({ err: error }, 'Retention task failed');
    } finally {
      this.running = false;
      if (!this.stopped && this.options.enabled !== false && !this.timer) {
        this.scheduleNext(this.options.intervalMs);
      }
    }
  }
}

export function startRetentionTask(options: RetentionTaskOptions): RetentionTask {
  const task = new RetentionTask(options);
  task.start();
  return task;
}

export async function runRetentionOnce(options: RetentionTaskOptions): Promise<RetentionRunResult> {
  const logger = options.logger ?? loggerModule;
  const metrics = options.metrics ?? metricsModule;
  const dryRun = options.dryRun ?? false;
  const result: RetentionRunResult = {
    skipped: false,
    dryRun,
    removed: [],
    kept: 0,
    freedBytes: 0,
    removedDirectories: [],
    warnings: []
  };

  if (options.enabled === false) {
    logger.info({ enabled: false }, 'Retention task skipped');
    return { ...result, skipped: true, reason: 'disabled' };
  }

  const baseDir = path.resolve(options.baseDir);
  let sidecars: string[];
  try {
    sidecars = await collectSidecars(baseDir);
  } catch (error) {
    if (isMissing(error)) {
      logger.warn({ baseDir }, 'Recordings directory does not exist');
      return { ...result, skipped: true, reason: 'missing-directory' };
    }
    throw error;
  }

  const now = (options.clock ?? systemClock)();
  const deleteCatalogEntry = options.deleteCatalogEntry ?? deleteRecordingByPath;
  const warn = (location: string, error: unknown) => {
    const reason = error instanceof Error ? error.message : String(error);
    result.warnings.push({ path: location, reason });
    metrics.recordRetentionWarning();
    logger.warn({ path: location, err: reason }, 'Retention skipped a recording');
  };

  for (const metadataPath of sidecars) {
    let fields: SidecarFields;
    try {
      fields = readSidecarFields(JSON.parse(await fs.readFile(metadataPath, 'utf-8')));
    } catch (error) {
      warn(metadataPath, error);
      continue;
    }

    if (!shouldDeleteRecording(fields, options.maxAgeDays, now) || fields.end === null) {
      result.kept += 1;
      continue;
    }

    const directory = path.dirname(metadataPath);
    const filePath = fields.file
      ? path.join(directory, path.basename(fields.file))
      : `${metadataPath.slice(0, -METADATA_EXTENSION.length)}${MEDIA_EXTENSION}`;
    const bytes = await fileSize(filePath);

    if (!dryRun) {
      try {
        await fs.rm(filePath, { force: true });
        await fs.rm(metadataPath, { force: true });
      } catch (error) {
        warn(filePath, error);
        continue;
      }
      try {
        deleteCatalogEntry(filePath);
      } catch (error) {
        warn(filePath, error);
      }
    }

    result.removed.push({ filePath, metadataPath, cameraId: fields.cameraId, end: fields.end, bytes });
    result.freedBytes += bytes;
  }

  if (!dryRun && result.removed.length > 0) {
    result.removedDirectories = await removeEmptyDirectories(baseDir, baseDir);
  }

  metrics.recordRetentionRun({
    removed: result.removed.length,
    kept: result.kept,
    freedBytes: result.freedBytes,
    dryRun
  });
  logger.info(
    {
      baseDir,
      maxAgeDays: options.maxAgeDays,
      dryRun,
      removed: result.removed.length,
      kept: result.kept,
      freedBytes: result.freedBytes,
      warnings: result.warnings.length
    },
    dryRun ? 'Retention dry run completed' : 'Retention task completed'
  );
  return result;
}

async function collectSidecars(directory: string): Promise<string[]> {
  const entries: Dirent[] = await fs.readdir(directory, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await collectSidecars(fullPath)));
    } else if (entry.isFile() && entry.name.endsWith(METADATA_EXTENSION)) {
      files.push(fullPath);
    }
  }
  return files.sort();
}

function readSidecarFields(value: unknown): SidecarFields {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    throw new Error('Sidecar is not a JSON object');
  }
  const type: unknown = Reflect.get(value, 'type');
  const end: unknown = Reflect.get(value, 'end');
  const file: unknown = Reflect.get(value, 'file');
  const cameraId: unknown = Reflect.get(value, 'camera_id');
  return {
    type: typeof type === 'string' ? type : '',
    keep: Reflect.get(value, 'keep') === true,
    end: typeof end === 'number' && Number.isFinite(end) ? end : null,
    file: typeof file === 'string' && file.length > 0 ? file : null,
    cameraId: typeof cameraId === 'string' ? cameraId : null
  };
}

async function fileSize(filePath: string): Promise<number> {
  try {
    return (await fs.stat(filePath)).size;
  } catch (error) {
    if (isMissing(error)) {
      return 0;
    }
    throw error;
  }
}

async function removeEmptyDirectories(directory: string, root: string): Promise<string[]> {
  const removed: string[] = [];
  const entries = await fs.readdir(directory, { withFileTypes: true });
  for (const entry of entries) {
    if (entry.isDirectory()) {
      removed.push(...(await removeEmptyDirectories(path.join(directory, entry.name), root)));
    }
  }
  if (directory !== root && (await fs.readdir(directory)).length === 0) {
    await fs.rmdir(directory);
    removed.push(directory);
  }
  return removed;
}
