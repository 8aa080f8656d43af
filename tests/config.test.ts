import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  ConfigManager,
  loadConfigFromFile,
  parseConfig,
  validateCameraConfig,
  validateConfig,
  type ConfigReloadEvent,
  type RecorderConfig
} from '../src/config/index.js';
import { ConfigurationError } from '../src/errors.js';
import { makeTempDir, removeDir } from './helpers/fs.js';

function baseConfig(): RecorderConfig {
  return {
    app: { name: 'camera-recorder' },
    logging: { level: 'info' },
    database: { path: ':memory:' },
    recording: {
      baseDir: 'recordings',
      segmentDurationSec: 60,
      preEventBufferSec: 60,
      postEventDurationSec: 60,
      bufferMaxPackets: 5400,
      bufferMaxBytes: 268435456,
      consumerQueueSize: 256
    },
    cameras: [{ id: 'cam-1', input: 'rtsp://camera.local/one' }],
    events: { dedupeWindowSec: 300 }
  };
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return null;
}

async function waitFor(predicate: () => boolean, timeoutMs = 3000) {
  const started = Date.now();
  while (!predicate()) {
    if (Date.now() - started > timeoutMs) {
      throw new Error('Timed out waiting for predicate');
    }
    await new Promise(resolve => setTimeout(resolve, 20));
  }
}

describe('RecorderConfig', () => {
  it('ConfigDefaultFileIsValid', () => {
    const config = loadConfigFromFile(path.resolve('config/default.json'));

    expect(config.cameras.map(camera => camera.id)).toEqual(['front-door']);
    expect(config.http).toEqual({ host: '0.0.0.0', port: 8555 });
  });

  it('ConfigRejectsDuplicateCameraIds', () => {
    const config = baseConfig();
    config.cameras.push({ id: 'cam-1', input: 'rtsp://camera.local/two' });

    const error = captureError(() => validateConfig(config));

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ message: 'config.cameras[1].id "cam-1" is duplicated' });
  });

  it('ConfigRejectsNonPositiveBufferWindow', () => {
    const config = baseConfig();
    config.recording.preEventBufferSec = 0;

    expect(() => validateConfig(config)).toThrow('config.recording.preEventBufferSec must be greater than 0');
  });

  it('ConfigRejectsMalformedJson', () => {
    expect(() => parseConfig('{')).toThrow(ConfigurationError);
  });

  it('CameraConfigTrimsIdAndChecksBackoff', () => {
    expect(validateCameraConfig({ id: '  cam-2 ', input: '/dev/video0' })).toEqual({
      id: 'cam-2',
      input: '/dev/video0'
    });
    expect(() =>
      validateCameraConfig({ id: 'cam-3', input: 'rtsp://x', ffmpeg: { restartDelayMs: 500, restartMaxDelayMs: 100 } })
    ).toThrow('camera.ffmpeg.restartMaxDelayMs must be >= restartDelayMs');
    expect(() => validateCameraConfig({ id: '../etc', input: 'rtsp://x' })).toThrow(ConfigurationError);
  });
});

describe('ConfigManager', () => {
  let directory: string;
  let filePath: string;
  let manager: ConfigManager | null = null;
  let stopWatching: (() => void) | null = null;

  beforeEach(async () => {
    directory = await makeTempDir();
    filePath = path.join(directory, 'config.json');
    fs.writeFileSync(filePath, JSON.stringify(baseConfig()));
  });

  afterEach(async () => {
    stopWatching?.();
    stopWatching = null;
    manager = null;
    await removeDir(directory);
  });

  it('ConfigReloadEmitsPreviousAndNext', () => {
    manager = new ConfigManager(filePath);
    const events: ConfigReloadEvent[] = [];
    manager.on('reload', (event: ConfigReloadEvent) => events.push(event));

    const next = baseConfig();
    next.cameras.push({ id: 'cam-2', input: 'rtsp://camera.local/two' });
    fs.writeFileSync(filePath, JSON.stringify(next));
    manager.reload();

    expect(events).toHaveLength(1);
    expect(events[0]?.previous.cameras).toHaveLength(1);
    expect(events[0]?.next.cameras.map(camera => camera.id)).toEqual(['cam-1', 'cam-2']);
    expect(manager.getConfig().cameras).toHaveLength(2);
    expect(manager.getPath()).toBe(filePath);
  });

  it('ConfigReloadKeepsCurrentOnInvalidFile', () => {
    manager = new ConfigManager(filePath);
    fs.writeFileSync(filePath, JSON.stringify({ ...baseConfig(), cameras: 'none' }));

    expect(() => manager?.reload()).toThrow(ConfigurationError);
    expect(manager.getConfig().cameras).toHaveLength(1);
  });

  it('ConfigWatchRestoresLastGoodFile', async () => {
    manager = new ConfigManager(filePath);
    const errors: Error[] = [];
    manager.on('error', (error: Error) => errors.push(error));
    stopWatching = manager.watch();
    const original = fs.readFileSync(filePath, 'utf-8');

    fs.writeFileSync(filePath, '{ broken');

    await waitFor(() => errors.length > 0 && fs.readFileSync(filePath, 'utf-8') === original);
    expect(errors[0]).toBeInstanceOf(ConfigurationError);
    expect(manager.getConfig().cameras).toHaveLength(1);
  });
});
