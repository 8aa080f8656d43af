import type { Dirent } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';

export const MEDIA_EXTENSION = '.mjpeg';
export const METADATA_EXTENSION = '.json';
const PARTIAL_SUFFIX = '.partial';
const TEMP_SUFFIX = '.tmp';

function pad(value: number) {
  return value.toString().padStart(2, '0');
}

/** `<baseDir>/<camera>/<YYYY-MM-DD>/<HH>` for the UTC hour containing `timestamp`. */
export function recordingDirectory(baseDir: string, cameraId: string, timestamp: number): string {
  const date = new Date(timestamp * 1000);
  const day = `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
  return path.join(baseDir, cameraId, day, pad(date.getUTCHours()));
}

export function formatTimeOfDay(timestamp: number): string {
  const date = new Date(timestamp * 1000);
  return `${pad(date.getUTCHours())}-${pad(date.getUTCMinutes())}-${pad(date.getUTCSeconds())}`;
}

export function roundSeconds(value: number): number {
  return Math.round(value * 1000) / 1000;
}

async function exists(filePath: string) {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function isNameTaken(directory: string, baseName: string) {
  const media = path.join(directory, `${baseName}${MEDIA_EXTENSION}`);
  const checks = await Promise.all([
    exists(media),
    exists(`${media}${PARTIAL_SUFFIX}`),
    exists(path.join(directory, `${baseName}${METADATA_EXTENSION}`))
  ]);
  return checks.some(Boolean);
}

/**
 * Media file being written. It lives under a `.partial` name until
 * `finalize` publishes the media and then its sidecar; a recording counts
 * as finalized once its sidecar exists.
 */
export class PartialRecording {
  private bytesWritten = 0;
  private closed = false;

  private constructor(
    readonly directory: string,
    readonly baseName: string,
    private readonly handle: fs.FileHandle
  ) {}

  static async open(directory: string, baseName: string): Promise<PartialRecording> {
    await fs.mkdir(directory, { recursive: true });
    let candidate = baseName;
    let suffix = 1;
    while (await isNameTaken(directory, candidate)) {
      candidate = `${baseName}-${suffix}`;
      suffix += 1;
    }
    const media = path.join(directory, `${candidate}${MEDIA_EXTENSION}`);
    const handle = await fs.open(`${media}${PARTIAL_SUFFIX}`, 'wx');
    return new PartialRecording(directory, candidate, handle);
  }

  get fileName() {
    return `${this.baseName}${MEDIA_EXTENSION}`;
  }

  get filePath() {
    return path.join(this.directory, this.fileName);
  }

  get partialPath() {
    return `${this.filePath}${PARTIAL_SUFFIX}`;
  }

  get metadataPath() {
    return path.join(this.directory, `${this.baseName}${METADATA_EXTENSION}`);
  }

  get bytes() {
    return this.bytesWritten;
  }

  async write(data: Buffer) {
    await this.handle.write(data);
    this.bytesWritten += data.length;
  }

  async finalize(metadata: object): Promise<{ filePath: string; metadataPath: string }> {
    await this.handle.sync();
    await this.close();
    const tempMetadata = `${this.metadataPath}${TEMP_SUFFIX}`;
    await fs.writeFile(tempMetadata, `${JSON.stringify(metadata, null, 2)}\n`, 'utf-8');
    await fs.rename(this.partialPath, this.filePath);
    await fs.rename(tempMetadata, this.metadataPath);
    return { filePath: this.filePath, metadataPath: this.metadataPath };
  }

  /** Closes and deletes the partial file. */
  async discard() {
    await this.close();
    await fs.rm(this.partialPath, { force: true });
  }

  async close() {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.handle.close();
  }
}

export type OrphanRecoveryResult = {
  removed: string[];
  completed: string[];
};

/**
 * Cleans up after an interrupted finalization under `directory`.
 * Leftover `.partial` media is deleted. A `.json.tmp` sidecar whose media
 * was already published is completed; otherwise it is deleted.
 */
export async function recoverOrphans(directory: string): Promise<OrphanRecoveryResult> {
  const result: OrphanRecoveryResult = { removed: [], completed: [] };
  let entries: Dirent[];
  try {
    entries = await fs.readdir(directory, { withFileTypes: true });
  } catch (error) {
    if (isMissing(error)) {
      return result;
    }
    throw error;
  }

  for (const entry of entries) {
    const fullPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      const nested = await recoverOrphans(fullPath);
      result.removed.push(...nested.removed);
      result.completed.push(...nested.completed);
      continue;
    }

    if (entry.name.endsWith(`${MEDIA_EXTENSION}${PARTIAL_SUFFIX}`)) {
      await fs.rm(fullPath, { force: true });
      result.removed.push(fullPath);
      continue;
    }

    if (entry.name.endsWith(`${METADATA_EXTENSION}${TEMP_SUFFIX}`)) {
      const metadataPath = fullPath.slice(0, -TEMP_SUFFIX.length);
      const baseName = metadataPath.slice(0, -METADATA_EXTENSION.length);
      const mediaPublished = await exists(`${baseName}${MEDIA_EXTENSION}`);
      if (mediaPublished && !(await exists(metadataPath))) {
        await fs.rename(fullPath, metadataPath);
        result.completed.push(metadataPath);
      } else {
        await fs.rm(fullPath, { force: true });
        result.removed.push(fullPath);
      }
    }
  }

  return result;
}

export function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
