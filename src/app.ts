import type ffmpeg from 'fluent-ffmpeg';
import { CatalogClient } from './catalog/client.js';
import type { CameraConfig, ConfigManager, ConfigReloadEvent, RecorderConfig } from './config/index.js';
import { toError } from './errors.js';
import { EventDispatcher } from './events/dispatcher.js';
import loggerModule, { setLogLevel, type ComponentLogger } from './logger.js';
import { CameraSupervisor } from './pipeline/supervisor.js';
import { startHttpServer, type HttpServerRuntime } from './server/http.js';
import { startRetentionTask, type RetentionTask, type RetentionTaskOptions } from './tasks/retention.js';
import type { Clock } from './types.js';
import type { CommandFactoryOptions } from './video/ingestor.js';

export type ShutdownHookContext = {
  reason: string;
  signal?: NodeJS.Signals;
};

export type ShutdownHook = (context: ShutdownHookContext) => void | Promise<void>;

type RegisteredHook = {
  name: string;
  hook: ShutdownHook;
};

const shutdownHooks: RegisteredHook[] = [];

export function registerShutdownHook(name: string, hook: ShutdownHook) {
  const existingIndex = shutdownHooks.findIndex(entry => entry.name === name);
  const entry: RegisteredHook = { name, hook };
  if (existingIndex >= 0) {
    shutdownHooks[existingIndex] = entry;
  } else {
    shutdownHooks.push(entry);
  }

  return () => {
    const index = shutdownHooks.findIndex(item => item.name === name);
    if (index >= 0) {
      shutdownHooks.splice(index, 1);
    }
  };
}

/** Runs hooks newest first; a failing hook does not stop the rest. */
export async function runShutdownHooks(context: ShutdownHookContext) {
  const results: Array<{ name: string; status: 'ok' | 'error'; error?: Error }> = [];
  const hooks = [...shutdownHooks].reverse();
  for (const entry of hooks) {
    try {
      await entry.hook(context);
      results.push({ name: entry.name, status: 'ok' });
    } catch (error) {
      results.push({
        name: entry.name,
        status: 'error',
        error: toError(error)
      });
    }
  }
  return results;
}

export function resetAppLifecycle() {
  shutdownHooks.splice(0, shutdownHooks.length);
}

export function buildRetentionOptions(
  config: RecorderConfig,
  overrides: Partial<RetentionTaskOptions> = {}
): RetentionTaskOptions {
  const retention = config.retention ?? { enabled: false, maxAgeDays: 7, intervalMinutes: 60 };
  return {
    enabled: retention.enabled,
    baseDir: config.recording.baseDir,
    maxAgeDays: retention.maxAgeDays,
    intervalMs: retention.intervalMinutes * 60 * 1000,
    ...overrides
  };
}

export function createCatalogClient(config: RecorderConfig, logger?: ComponentLogger): CatalogClient | null {
  const catalog = config.catalog;
  if (!catalog?.enabled) {
    return null;
  }
  return new CatalogClient({
    baseUrl: catalog.baseUrl,
    apiKey: catalog.apiKey,
    groupKey: catalog.groupKey,
    timeoutMs: catalog.timeoutMs,
    recordingsDir: config.recording.baseDir,
    logger
  });
}

type CameraRegistry = {
  addCamera(input: unknown): Promise<unknown>;
  removeCamera(cameraId: string): Promise<void>;
};

/**
 * Applies a camera list change: removed or changed cameras stop first, then
 * new or changed ones start. Unchanged cameras keep recording.
 */
export async function reconcileCameras(
  supervisor: CameraRegistry,
  previous: CameraConfig[],
  next: CameraConfig[],
  logger: ComponentLogger = loggerModule
) {
  const before = new Map(previous.map(camera => [camera.id, JSON.stringify(camera)]));
  const after = new Map(next.map(camera => [camera.id, JSON.stringify(camera)]));

  for (const [id, serialized] of before) {
    if (after.get(id) === serialized) {
      continue;
    }
    try {
      await supervisor.removeCamera(id);
    } catch (error) {
      logger.warn({ err: error, camera: id }, 'Failed to remove camera during reload');
    }
  }

  for (const camera of next) {
    if (before.get(camera.id) === after.get(camera.id)) {
      continue;
    }
    try {
      await supervisor.addCamera(camera);
    } catch (error) {
      logger.error({ err: error, camera: camera.id }, 'Failed to add camera during reload');
    }
  }
}

export type RecorderRuntimeOptions = {
  config: RecorderConfig;
  configManager?: Pick<ConfigManager, 'on' | 'off' | 'watch'>;
  startHttp?: boolean;
  commandFactory?: (options: CommandFactoryOptions) => ffmpeg.FfmpegCommand;
  clock?: Clock;
  random?: () => number;
  logger?: ComponentLogger;
};

export type RecorderRuntime = {
  supervisor: CameraSupervisor;
  dispatcher: EventDispatcher;
  catalog: CatalogClient | null;
  http: HttpServerRuntime | null;
  retention: RetentionTask | null;
  stop: (context?: ShutdownHookContext) => Promise<void>;
};

/** Starts every camera, the event dispatcher, the HTTP API and retention. */
export async function startRecorder(options: RecorderRuntimeOptions): Promise<RecorderRuntime> {
  const logger = options.logger ?? loggerModule;
  let config = options.config;
  logger.info({ cameras: config.cameras.length }, 'Recorder starting');

  const catalog = createCatalogClient(config, logger);
  const supervisor = new CameraSupervisor({
    recording: config.recording,
    ffmpeg: config.ffmpeg,
    catalog,
    commandFactory: options.commandFactory,
    random: options.random,
    clock: options.clock,
    logger
  });
  const dispatcher = new EventDispatcher({
    target: supervisor,
    catalog,
    dedupeWindowSec: config.events.dedupeWindowSec,
    clock: options.clock,
    log: logger
  });

  await supervisor.start(config.cameras);

  let http: HttpServerRuntime | null = null;
  if (options.startHttp !== false && config.http) {
    http = await startHttpServer({
      host: config.http.host,
      port: config.http.port,
      supervisor,
      dispatcher,
      catalog,
      logger
    });
  }

  const retention = config.retention?.enabled ? startRetentionTask({ ...buildRetentionOptions(config), logger }) : null;

  let stopWatching: (() => void) | null = null;
  const manager = options.configManager;
  const handleReload = ({ next }: ConfigReloadEvent) => {
    const previous = config;
    config = next;
    if (next.logging.level !== previous.logging.level) {
      setLogLevel(next.logging.level);
    }
    retention?.configure({ ...buildRetentionOptions(next), logger });
    reconcileCameras(supervisor, previous.cameras, next.cameras, logger).catch(error => {
      logger.error({ err: error }, 'Failed to apply camera configuration');
    });
  };
  if (manager) {
    manager.on('reload', handleReload);
    stopWatching = manager.watch();
  }

  let stopping: Promise<void> | null = null;
  const stop = (context: ShutdownHookContext = { reason: 'stop' }) => {
    stopping ??= (async () => {
      logger.info({ reason: context.reason, signal: context.signal }, 'Recorder stopping');
      if (manager) {
        manager.off('reload', handleReload);
        stopWatching?.();
      }
      retention?.stop();
      if (http) {
        await http.close();
      }
      await supervisor.stop();
      await dispatcher.flush();
      const hooks = await runShutdownHooks(context);
      for (const hook of hooks) {
        if (hook.status === 'error') {
          logger.error({ err: hook.error, hook: hook.name }, 'Shutdown hook failed');
        }
      }
      logger.info({ reason: context.reason }, 'Recorder stopped');
    })();
    return stopping;
  };

  logger.info({ cameras: supervisor.status().camera_ids, port: http?.port ?? null }, 'Recorder started');
  return { supervisor, dispatcher, catalog, http, retention, stop };
}
