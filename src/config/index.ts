import fs from 'node:fs';
import path from 'node:path';
import { EventEmitter } from 'node:events';
import { ConfigurationError, toError } from '../errors.js';
import { normalizeCameraId } from '../utils/camera.js';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type DatabaseConfig = {
  path: string;
};

export type RecordingConfig = {
  baseDir: string;
  segmentDurationSec: number;
  preEventBufferSec: number;
  postEventDurationSec: number;
  bufferMaxPackets: number;
  bufferMaxBytes: number;
  consumerQueueSize: number;
};

export type FfmpegConfig = {
  path?: string;
  startTimeoutMs?: number;
  watchdogTimeoutMs?: number;
  idleTimeoutMs?: number;
  restartDelayMs?: number;
  restartMaxDelayMs?: number;
  restartJitterFactor?: number;
  forceKillTimeoutMs?: number;
};

export type CameraFfmpegConfig = FfmpegConfig & {
  inputArgs?: string[];
  rtspTransport?: string;
  transportFallbacks?: string[];
};

export type CameraConfig = {
  id: string;
  name?: string;
  input: string;
  framesPerSecond?: number;
  ffmpeg?: CameraFfmpegConfig;
};

export type EventsConfig = {
  dedupeWindowSec: number;
};

export type CatalogConfig = {
  enabled: boolean;
  baseUrl: string;
  apiKey: string;
  groupKey: string;
  timeoutMs?: number;
};

export type RetentionConfig = {
  enabled: boolean;
  maxAgeDays: number;
  intervalMinutes: number;
};

export type HttpConfig = {
  host: string;
  port: number;
};

export type RecorderConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  database: DatabaseConfig;
  recording: RecordingConfig;
  ffmpeg?: FfmpegConfig;
  cameras: CameraConfig[];
  events: EventsConfig;
  catalog?: CatalogConfig;
  retention?: RetentionConfig;
  http?: HttpConfig;
};

type JsonType = 'object' | 'number' | 'string' | 'boolean' | 'array';

type JsonSchema = {
  type: JsonType | JsonType[];
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean | JsonSchema;
  items?: JsonSchema;
  enum?: (string | number | boolean)[];
  minimum?: number;
  maximum?: number;
};

const positiveNumber: JsonSchema = { type: 'number', minimum: 0 };

const ffmpegProperties: Record<string, JsonSchema> = {
  path: { type: 'string' },
  startTimeoutMs: positiveNumber,
  watchdogTimeoutMs: positiveNumber,
  idleTimeoutMs: positiveNumber,
  restartDelayMs: positiveNumber,
  restartMaxDelayMs: positiveNumber,
  restartJitterFactor: { type: 'number', minimum: 0, maximum: 1 },
  forceKillTimeoutMs: positiveNumber
};

const rtspTransportSchema: JsonSchema = { type: 'string', enum: ['tcp', 'udp', 'http', 'udp_multicast'] };

const cameraSchema: JsonSchema = {
  type: 'object',
  required: ['id', 'input'],
  additionalProperties: false,
  properties: {
    id: { type: 'string' },
    name: { type: 'string' },
    input: { type: 'string' },
    framesPerSecond: { type: 'number', minimum: 1 },
    ffmpeg: {
      type: 'object',
      additionalProperties: false,
      properties: {
        ...ffmpegProperties,
        inputArgs: { type: 'array', items: { type: 'string' } },
        rtspTransport: rtspTransportSchema,
        transportFallbacks: { type: 'array', items: rtspTransportSchema }
      }
    }
  }
};

const recorderConfigSchema: JsonSchema = {
  type: 'object',
  required: ['app', 'logging', 'database', 'recording', 'cameras', 'events'],
  properties: {
    app: {
      type: 'object',
      required: ['name'],
      properties: { name: { type: 'string' } }
    },
    logging: {
      type: 'object',
      required: ['level'],
      properties: { level: { type: 'string' } }
    },
    database: {
      type: 'object',
      required: ['path'],
      properties: { path: { type: 'string' } }
    },
    recording: {
      type: 'object',
      required: [
        'baseDir',
        'segmentDurationSec',
        'preEventBufferSec',
        'postEventDurationSec',
        'bufferMaxPackets',
        'bufferMaxBytes',
        'consumerQueueSize'
      ],
      additionalProperties: false,
      properties: {
        baseDir: { type: 'string' },
        segmentDurationSec: { type: 'number', minimum: 1 },
        preEventBufferSec: positiveNumber,
        postEventDurationSec: { type: 'number', minimum: 1 },
        bufferMaxPackets: { type: 'number', minimum: 1 },
        bufferMaxBytes: { type: 'number', minimum: 1 },
        consumerQueueSize: { type: 'number', minimum: 1 }
      }
    },
    ffmpeg: {
      type: 'object',
      additionalProperties: false,
      properties: ffmpegProperties
    },
    cameras: {
      type: 'array',
      items: cameraSchema
    },
    events: {
      type: 'object',
      required: ['dedupeWindowSec'],
      properties: { dedupeWindowSec: positiveNumber }
    },
    catalog: {
      type: 'object',
      required: ['enabled', 'baseUrl', 'apiKey', 'groupKey'],
      properties: {
        enabled: { type: 'boolean' },
        baseUrl: { type: 'string' },
        apiKey: { type: 'string' },
        groupKey: { type: 'string' },
        timeoutMs: positiveNumber
      }
    },
    retention: {
      type: 'object',
      required: ['enabled', 'maxAgeDays', 'intervalMinutes'],
      properties: {
        enabled: { type: 'boolean' },
        maxAgeDays: positiveNumber,
        intervalMinutes: { type: 'number', minimum: 1 }
      }
    },
    http: {
      type: 'object',
      required: ['host', 'port'],
      properties: {
        host: { type: 'string' },
        port: { type: 'number', minimum: 0, maximum: 65535 }
      }
    }
  }
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const types = Array.isArray(schema.type) ? schema.type : [schema.type];
  const results = types.map(type => validateAgainstSchemaForType(type, schema, value, pathLabel));

  if (results.some(errors => errors.length === 0)) {
    return [];
  }

  return results[0] ?? [];
}

function validateAgainstSchemaForType(
  type: JsonType,
  schema: JsonSchema,
  value: unknown,
  pathLabel: string
): string[] {
  const errors: string[] = [];

  if (type === 'object') {
    if (!isRecord(value)) {
      errors.push(`${pathLabel} must be an object`);
      return errors;
    }

    for (const key of schema.required ?? []) {
      if (!(key in value)) {
        errors.push(`${pathLabel}.${key} is required`);
      }
    }

    const definedProperties = new Set(Object.keys(schema.properties ?? {}));
    const additional = schema.additionalProperties;
    if (additional === false) {
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(`${pathLabel}.${key} is not allowed`);
        }
      }
    } else if (additional && typeof additional === 'object') {
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(...validateAgainstSchema(additional, value[key], `${pathLabel}.${key}`));
        }
      }
    }

    for (const [key, childSchema] of Object.entries(schema.properties ?? {})) {
      if (key in value) {
        errors.push(...validateAgainstSchema(childSchema, value[key], `${pathLabel}.${key}`));
      }
    }

    return errors;
  }

  if (type === 'array') {
    if (!Array.isArray(value)) {
      errors.push(`${pathLabel} must be an array`);
      return errors;
    }

    const items = schema.items;
    if (items) {
      value.forEach((item, index) => {
        errors.push(...validateAgainstSchema(items, item, `${pathLabel}[${index}]`));
      });
    }

    return errors;
  }

  if (type === 'number') {
    if (typeof value !== 'number' || Number.isNaN(value)) {
      errors.push(`${pathLabel} must be a number`);
      return errors;
    }

    if (typeof schema.minimum === 'number' && value < schema.minimum) {
      errors.push(`${pathLabel} must be >= ${schema.minimum}`);
    }

    if (typeof schema.maximum === 'number' && value > schema.maximum) {
      errors.push(`${pathLabel} must be <= ${schema.maximum}`);
    }

    return errors;
  }

  if (type === 'string') {
    if (typeof value !== 'string') {
      errors.push(`${pathLabel} must be a string`);
      return errors;
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
    }

    return errors;
  }

  if (typeof value !== 'boolean') {
    errors.push(`${pathLabel} must be a boolean`);
  }
  return errors;
}

function hasRecorderShape(config: unknown): config is RecorderConfig {
  return validateAgainstSchema(recorderConfigSchema, config, 'config').length === 0;
}

export function validateConfig(config: unknown): asserts config is RecorderConfig {
  const errors = validateAgainstSchema(recorderConfigSchema, config, 'config');
  if (errors.length > 0 || !hasRecorderShape(config)) {
    throw new ConfigurationError(errors.join('; '), errors);
  }
  validateLogicalConfig(config);
}

export function parseConfig(contents: string): RecorderConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to parse configuration: ${message}`);
  }

  validateConfig(parsed);
  return parsed;
}

export function loadConfigFromFile(filePath: string): RecorderConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

/**
 * Checks a single camera definition. Used for configuration files and for
 * cameras added at run time.
 */
export function validateCameraConfig(camera: unknown, pathLabel = 'camera'): CameraConfig {
  const errors = validateAgainstSchema(cameraSchema, camera, pathLabel);
  if (errors.length > 0 || !isCameraConfig(camera)) {
    throw new ConfigurationError(errors.join('; ') || `${pathLabel} is invalid`, errors);
  }

  const messages: string[] = [];
  if (!normalizeCameraId(camera.id)) {
    messages.push(`${pathLabel}.id must contain only letters, digits, ".", "_" or "-"`);
  }
  if (camera.input.trim().length === 0) {
    messages.push(`${pathLabel}.input must not be empty`);
  }
  const ffmpeg = camera.ffmpeg;
  if (
    ffmpeg?.restartDelayMs !== undefined &&
    ffmpeg.restartMaxDelayMs !== undefined &&
    ffmpeg.restartMaxDelayMs < ffmpeg.restartDelayMs
  ) {
    messages.push(`${pathLabel}.ffmpeg.restartMaxDelayMs must be >= restartDelayMs`);
  }
  if (messages.length > 0) {
    throw new ConfigurationError(messages.join('; '), messages);
  }
  return { ...camera, id: normalizeCameraId(camera.id) };
}

function isCameraConfig(value: unknown): value is CameraConfig {
  return validateAgainstSchema(cameraSchema, value, 'camera').length === 0;
}

function validateLogicalConfig(config: RecorderConfig) {
  const messages: string[] = [];

  const seen = new Set<string>();
  config.cameras.forEach((camera, index) => {
    try {
      validateCameraConfig(camera, `config.cameras[${index}]`);
    } catch (error) {
      messages.push(error instanceof Error ? error.message : String(error));
    }
    const id = normalizeCameraId(camera.id);
    if (id && seen.has(id)) {
      messages.push(`config.cameras[${index}].id "${id}" is duplicated`);
    }
    seen.add(id);
  });

  const recording = config.recording;
  if (recording.preEventBufferSec <= 0) {
    messages.push('config.recording.preEventBufferSec must be greater than 0');
  }
  if (!Number.isInteger(recording.bufferMaxPackets)) {
    messages.push('config.recording.bufferMaxPackets must be an integer');
  }

  const ffmpeg = config.ffmpeg;
  if (
    ffmpeg?.restartDelayMs !== undefined &&
    ffmpeg.restartMaxDelayMs !== undefined &&
    ffmpeg.restartMaxDelayMs < ffmpeg.restartDelayMs
  ) {
    messages.push('config.ffmpeg.restartMaxDelayMs must be >= restartDelayMs');
  }

  if (config.catalog?.enabled && config.catalog.baseUrl.trim().length === 0) {
    messages.push('config.catalog.baseUrl must not be empty when the catalog is enabled');
  }

  if (messages.length > 0) {
    throw new ConfigurationError(messages.join('; '), messages);
  }
}

export type ConfigReloadEvent = {
  previous: RecorderConfig;
  next: RecorderConfig;
};

export class ConfigManager extends EventEmitter {
  private currentConfig: RecorderConfig;
  private readonly filePath: string;
  private watcher: fs.FSWatcher | null = null;
  private watchRefs = 0;
  private reloadTimer: NodeJS.Timeout | null = null;
  private lastGoodRaw: string;
  private restoring = false;
  private restoreTimer: NodeJS.Timeout | null = null;

  constructor(filePath = path.resolve(process.cwd(), 'config/default.json')) {
    super();
    this.filePath = path.resolve(filePath);
    const { config, raw } = this.loadFromDisk();
    this.currentConfig = config;
    this.lastGoodRaw = raw;
  }

  getConfig(): RecorderConfig {
    return this.currentConfig;
  }

  getPath(): string {
    return this.filePath;
  }

  reload(): RecorderConfig {
    const { config: next, raw } = this.loadFromDisk();
    const previous = this.currentConfig;
    this.currentConfig = next;
    this.lastGoodRaw = raw;
    this.emit('reload', { previous, next } satisfies ConfigReloadEvent);
    return next;
  }

  watch(): () => void {
    if (!this.watcher) {
      this.watcher = this.createWatcher();
    }

    this.watchRefs += 1;

    return () => {
      this.watchRefs = Math.max(0, this.watchRefs - 1);
      if (this.watchRefs === 0) {
        if (this.reloadTimer) {
          clearTimeout(this.reloadTimer);
          this.reloadTimer = null;
        }
        this.closeWatcher();
      }
    };
  }

  private scheduleReload() {
    if (this.reloadTimer) {
      clearTimeout(this.reloadTimer);
    }

    this.reloadTimer = setTimeout(() => {
      this.reloadTimer = null;
      try {
        this.reload();
      } catch (error) {
        const err = toError(error);
        if (this.listenerCount('error') > 0) {
          this.emit('error', err);
        }
        this.restorePreviousConfig();
      }
    }, 100);
  }

  private closeWatcher() {
    if (this.watcher) {
      this.watcher.close();
      this.watcher = null;
    }
    if (this.restoreTimer) {
      clearTimeout(this.restoreTimer);
      this.restoreTimer = null;
    }
    this.restoring = false;
  }

  private createWatcher() {
    return fs.watch(this.filePath, { persistent: false }, eventType => {
      if (this.restoring) {
        return;
      }

      if (eventType === 'rename') {
        this.closeWatcher();
        this.watcher = this.createWatcher();
      }
      this.scheduleReload();
    });
  }

  private loadFromDisk(): { config: RecorderConfig; raw: string } {
    const contents = fs.readFileSync(this.filePath, 'utf-8');
    return { config: parseConfig(contents), raw: contents };
  }

  private restorePreviousConfig() {
    this.restoring = true;
    try {
      fs.writeFileSync(this.filePath, this.lastGoodRaw, 'utf-8');
    } catch (error) {
      if (this.listenerCount('error') > 0) {
        this.emit('error', toError(error));
      }
    } finally {
      if (this.restoreTimer) {
        clearTimeout(this.restoreTimer);
      }
      this.restoreTimer = setTimeout(() => {
        this.restoring = false;
        this.restoreTimer = null;
      }, 200);
    }
  }
}

export { recorderConfigSchema };
