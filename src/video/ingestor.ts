import ffmpeg from 'fluent-ffmpeg';
import { EventEmitter } from 'node:events';
import { Readable } from 'node:stream';
import loggerModule, { type ComponentLogger } from '../logger.js';
import metrics from '../metrics/index.js';
import { PacketFanout, type PacketSubscription } from '../pipeline/fanout.js';
import { systemClock, type Clock, type IngestorState, type Packet } from '../types.js';
import { isRtspInput, redactInput } from '../utils/camera.js';

const JPEG_START = Buffer.from([0xff, 0xd8]);
const JPEG_END = Buffer.from([0xff, 0xd9]);
const DEFAULT_START_TIMEOUT_MS = 10_000;
const DEFAULT_WATCHDOG_TIMEOUT_MS = 15_000;
const DEFAULT_IDLE_TIMEOUT_MS = 10_000;
const DEFAULT_RESTART_DELAY_MS = 500;
const DEFAULT_RESTART_MAX_DELAY_MS = 5000;
const DEFAULT_RESTART_JITTER_FACTOR = 0.2;
const DEFAULT_FORCE_KILL_TIMEOUT_MS = 3000;
const DEFAULT_MAX_BUFFER_BYTES = 5 * 1024 * 1024;
const DEFAULT_RTSP_TRANSPORT = 'tcp';
const DEFAULT_RTSP_SEQUENCE = ['tcp', 'udp', 'tcp'];

export type CommandFactoryOptions = {
  input: string;
  framesPerSecond: number;
  inputArgs?: string[];
  rtspTransport?: string;
};

export type FrameIngestorOptions = {
  cameraId: string;
  input: string;
  framesPerSecond: number;
  ffmpegPath?: string;
  inputArgs?: string[];
  rtspTransport?: string;
  rtspTransportSequence?: string[];
  startTimeoutMs?: number;
  watchdogTimeoutMs?: number;
  idleTimeoutMs?: number;
  restartDelayMs?: number;
  restartMaxDelayMs?: number;
  restartJitterFactor?: number;
  forceKillTimeoutMs?: number;
  maxBufferBytes?: number;
  commandFactory?: (options: CommandFactoryOptions) => ffmpeg.FfmpegCommand;
  random?: () => number;
  clock?: Clock;
  fanout?: PacketFanout;
  logger?: ComponentLogger;
};

export type RecoverEventMeta = {
  minDelayMs: number;
  maxDelayMs: number;
  baseDelayMs: number;
  appliedJitterMs: number;
  minJitterMs: number;
  maxJitterMs: number;
};

export type RecoverEvent = {
  reason: string;
  attempt: number;
  delayMs: number;
  meta: RecoverEventMeta;
  cameraId: string;
  errorCode: string | number | null;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
};

export type StatusEvent = {
  cameraId: string;
  state: IngestorState;
  previous: IngestorState;
  reason: string | null;
};

export type TransportFallbackEvent = {
  cameraId: string;
  from: string;
  to: string;
  reason: string;
  attempt: number;
};

type RecoveryContext = {
  errorCode?: string | number | null;
  exitCode?: number | null;
  signal?: NodeJS.Signals | null;
};

type RestartDelayResult = {
  delayMs: number;
  meta: RecoverEventMeta;
};

type ActiveCommand = {
  command: ffmpeg.FfmpegCommand;
  generation: number;
  exited: Promise<void>;
  markExited: () => void;
  hasExited: boolean;
  cleanup: () => void;
  classified: boolean;
};

export type RtspErrorClass = 'timeout' | 'auth' | 'notFound' | 'network' | 'other';

/**
 * Connects to one camera through ffmpeg and turns its output into a
 * non-decreasing sequence of timestamped JPEG packets. Failures never
 * escape: the ingestor reconnects with capped exponential backoff until
 * it is stopped.
 */
export class FrameIngestor extends EventEmitter {
  private active: ActiveCommand | null = null;
  private stream: Readable | null = null;
  private streamCleanup: (() => void) | null = null;
  private buffer: Buffer = Buffer.alloc(0);
  private startTimer: NodeJS.Timeout | null = null;
  private watchdogTimer: NodeJS.Timeout | null = null;
  private streamIdleTimer: NodeJS.Timeout | null = null;
  private restartTimer: NodeJS.Timeout | null = null;
  private readonly terminations = new Set<Promise<void>>();
  private stopPromise: Promise<void> | null = null;
  private running = false;
  private shouldStop = false;
  private restartCount = 0;
  private hasReceivedPacket = false;
  private generation = 0;
  private lastTimestamp = Number.NEGATIVE_INFINITY;
  private state: IngestorState = 'idle';
  private readonly rtspSequence: string[] | null;
  private rtspIndex = 0;
  private iteratorCount = 0;
  private readonly clock: Clock;
  private readonly logger: ComponentLogger;
  readonly fanout: PacketFanout;

  constructor(private readonly options: FrameIngestorOptions) {
    super();
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? loggerModule;
    this.fanout = options.fanout ?? new PacketFanout({ cameraId: options.cameraId, logger: this.logger });
    this.rtspSequence = isRtspInput(options.input)
      ? buildRtspFallbackSequence(options.rtspTransport, options.rtspTransportSequence)
      : null;
  }

  get cameraId() {
    return this.options.cameraId;
  }

  getState(): IngestorState {
    return this.state;
  }

  isConnected() {
    return this.state === 'connected';
  }

  getRestartCount() {
    return this.restartCount;
  }

  getCurrentRtspTransport(): string | null {
    return this.rtspSequence ? this.rtspSequence[this.rtspIndex] ?? null : null;
  }

  start() {
    if (this.running) {
      return;
    }

    this.running = true;
    this.shouldStop = false;
    this.restartCount = 0;
    this.setState('connecting', null);
    this.startCommand();
  }

  /** Lazy, infinite packet sequence backed by its own bounded queue. */
  packets(options: { capacity?: number } = {}): PacketSubscription {
    this.iteratorCount += 1;
    return this.fanout.subscribe(`iterator-${this.iteratorCount}`, options);
  }

  async stop(): Promise<void> {
    if (this.stopPromise) {
      await this.stopPromise;
      return;
    }

    this.stopPromise = this.performStop().finally(() => {
      this.stopPromise = null;
    });

    await this.stopPromise;
  }

  private async performStop(): Promise<void> {
    this.shouldStop = true;
    this.running = false;
    this.clearAllTimers();
    this.cleanupStream();

    const current = this.active;
    this.active = null;
    if (current) {
      this.terminate(current);
    }

    await Promise.all(Array.from(this.terminations));
    this.setState('stopped', 'stop');
  }

  private startCommand() {
    if (this.shouldStop) {
      return;
    }

    this.hasReceivedPacket = false;
    this.generation += 1;
    const generation = this.generation;

    let command: ffmpeg.FfmpegCommand;
    try {
      command = this.createCommand();
    } catch (error) {
      const err = toErrno(error);
      this.reportError(err);
      this.scheduleRecovery(err.code === 'ENOENT' ? 'ffmpeg-missing' : 'start-error', normalizeErrno(err));
      return;
    }

    let markExited: () => void = () => {};
    const exited = new Promise<void>(resolve => {
      markExited = resolve;
    });

    const active: ActiveCommand = {
      command,
      generation,
      exited,
      markExited: () => {
        active.hasExited = true;
        markExited();
      },
      hasExited: false,
      cleanup: () => {},
      classified: false
    };

    const isCurrent = () => this.active === active && !this.shouldStop;

    const onError = (err: Error) => {
      active.markExited();
      if (!isCurrent()) {
        return;
      }
      const details = normalizeErrno(toErrno(err));
      this.reportError(err);
      this.scheduleRecovery(details.errorCode === 'ENOENT' ? 'ffmpeg-missing' : 'ffmpeg-error', details);
    };

    const onEnd = () => {
      active.markExited();
      if (!isCurrent()) {
        return;
      }
      this.scheduleRecovery('ffmpeg-ended');
    };

    const onClose = (code: number | null, signal: NodeJS.Signals | null) => {
      active.markExited();
      if (!isCurrent()) {
        return;
      }
      const exitCode = typeof code === 'number' ? code : null;
      this.scheduleRecovery(exitCode === 0 ? 'ffmpeg-ended' : 'ffmpeg-exit', {
        exitCode,
        signal: signal ?? null
      });
    };

    const onStderr = (line: string) => {
      if (isCurrent()) {
        this.handleStderr(active, line);
      }
    };

    const onStart = () => {
      this.logger.debug({ camera: this.options.cameraId, generation }, 'ffmpeg started');
    };

    command.on('error', onError);
    command.once('end', onEnd);
    command.once('close', onClose);
    command.once('start', onStart);
    command.on('stderr', onStderr);

    active.cleanup = () => {
      command.off('start', onStart);
      command.off('stderr', onStderr);
    };

    this.active = active;
    this.resetStartTimer();
    this.resetWatchdogTimer();

    try {
      const output = command.pipe();
      if (!(output instanceof Readable)) {
        throw new Error('ffmpeg did not provide a readable output stream');
      }
      this.consume(output);
    } catch (error) {
      const err = toErrno(error);
      this.reportError(err);
      this.scheduleRecovery(err.code === 'ENOENT' ? 'ffmpeg-missing' : 'start-error', normalizeErrno(err));
    }
  }

  private createCommand(): ffmpeg.FfmpegCommand {
    const rtspTransport = this.getCurrentRtspTransport() ?? undefined;
    if (this.options.commandFactory) {
      return this.options.commandFactory({
        input: this.options.input,
        framesPerSecond: this.options.framesPerSecond,
        inputArgs: this.options.inputArgs,
        rtspTransport
      });
    }

    const command = ffmpeg(this.options.input);
    if (this.options.ffmpegPath) {
      command.setFfmpegPath(this.options.ffmpegPath);
    }

    const inputOptions: string[] = [];
    if (rtspTransport) {
      inputOptions.push('-rtsp_transport', rtspTransport);
    }
    if (this.options.inputArgs?.length) {
      inputOptions.push(...this.options.inputArgs);
    }
    if (inputOptions.length > 0) {
      command.inputOptions(inputOptions);
    }

    return command
      .outputOptions('-vf', `fps=${this.options.framesPerSecond}`)
      .outputOptions('-f', 'image2pipe')
      .outputOptions('-vcodec', 'mjpeg');
  }

  private consume(stream: Readable) {
    this.cleanupStream();
    this.stream = stream;
    this.buffer = Buffer.alloc(0);

    const onData = (chunk: Buffer) => {
      this.resetWatchdogTimer();
      this.buffer = this.buffer.length > 0 ? Buffer.concat([this.buffer, chunk]) : chunk;
      const { frames, remainder } = sliceJpegFrames(this.buffer);
      this.buffer = remainder;

      for (const frame of frames) {
        this.publishFrame(frame);
      }

      const maxBuffer = this.options.maxBufferBytes ?? DEFAULT_MAX_BUFFER_BYTES;
      if (this.buffer.length > maxBuffer) {
        this.buffer = Buffer.alloc(0);
        this.reportError(new Error('Corrupted frame data exceeded buffer limit'));
        this.scheduleRecovery('corrupted-frame');
      }
    };

    const onError = (err: Error) => {
      this.reportError(err);
      this.scheduleRecovery('stream-error', normalizeErrno(toErrno(err)));
    };

    const onClose = () => {
      if (this.shouldStop) {
        return;
      }
      this.scheduleRecovery('stream-closed');
    };

    stream.on('data', onData);
    stream.once('error', onError);
    stream.once('end', onClose);
    stream.once('close', onClose);

    this.streamCleanup = () => {
      stream.off('data', onData);
      stream.off('error', onError);
      stream.off('end', onClose);
      stream.off('close', onClose);
    };
  }

  private publishFrame(frame: Buffer) {
    if (this.shouldStop) {
      return;
    }

    const timestamp = Math.max(this.clock(), this.lastTimestamp);
    this.lastTimestamp = timestamp;
    const packet: Packet = Object.freeze({
      cameraId: this.options.cameraId,
      timestamp,
      data: frame,
      byteLength: frame.length
    });

    if (!this.hasReceivedPacket) {
      this.hasReceivedPacket = true;
      this.clearStartTimer();
      if (this.restartCount > 0) {
        this.logger.info(
          { camera: this.options.cameraId, attempts: this.restartCount },
          'Camera stream recovered'
        );
      }
      this.restartCount = 0;
      this.setState('connected', null);
    }

    this.resetStreamIdleTimer();
    metrics.recordPacket(this.options.cameraId, packet.byteLength);
    this.emit('packet', packet);
    this.fanout.publish(packet);
  }

  private scheduleRecovery(reason: string, context: RecoveryContext = {}) {
    if (this.shouldStop || this.restartTimer) {
      return;
    }

    this.restartCount += 1;
    const attempt = this.restartCount;
    this.maybeApplyRtspFallback(reason, attempt);

    this.clearStartTimer();
    this.clearWatchdogTimer();
    this.clearStreamIdleTimer();
    this.cleanupStream();

    const current = this.active;
    this.active = null;
    if (current) {
      this.terminate(current);
    }

    this.setState('unavailable', reason);

    const timing = this.computeRestartDelay(attempt);
    const exitCode = typeof context.exitCode === 'number' ? context.exitCode : null;
    const errorCode = context.errorCode ?? exitCode;
    const event: RecoverEvent = {
      reason,
      attempt,
      delayMs: timing.delayMs,
      meta: timing.meta,
      cameraId: this.options.cameraId,
      errorCode: errorCode ?? null,
      exitCode,
      signal: context.signal ?? null
    };

    metrics.recordPipelineRestart(this.options.cameraId, reason, {
      attempt,
      delayMs: timing.delayMs,
      errorCode: event.errorCode,
      exitCode,
      signal: event.signal
    });
    this.logger.warn(
      {
        camera: this.options.cameraId,
        input: redactInput(this.options.input),
        reason,
        attempt,
        delayMs: timing.delayMs,
        errorCode: event.errorCode
      },
      'Camera stream unavailable, scheduling reconnect'
    );
    this.emit('recover', event);

    this.restartTimer = setTimeout(() => {
      this.restartTimer = null;
      this.startCommand();
    }, timing.delayMs);
    this.restartTimer.unref?.();
  }

  private terminate(current: ActiveCommand) {
    current.cleanup();
    if (current.hasExited) {
      return;
    }

    try {
      current.command.kill('SIGTERM');
    } catch (error) {
      this.logger.debug({ err: error, camera: this.options.cameraId }, 'SIGTERM failed');
    }

    const graceMs = this.options.forceKillTimeoutMs ?? DEFAULT_FORCE_KILL_TIMEOUT_MS;
    const termination = new Promise<void>(resolve => {
      const killTimer = setTimeout(() => {
        if (!current.hasExited) {
          try {
            current.command.kill('SIGKILL');
          } catch (error) {
            this.logger.debug({ err: error, camera: this.options.cameraId }, 'SIGKILL failed');
          }
        }
        resolve();
      }, Math.max(0, graceMs));
      killTimer.unref?.();
      void current.exited.then(() => {
        clearTimeout(killTimer);
        resolve();
      });
    });

    this.terminations.add(termination);
    void termination.then(() => {
      this.terminations.delete(termination);
    });
  }

  private handleStderr(active: ActiveCommand, message: string) {
    if (!message || active.classified) {
      return;
    }

    const lines = String(message)
      .split(/\r?\n/)
      .map(line => line.trim())
      .filter(Boolean);

    for (const line of lines) {
      const reason = classifyFfmpegStderr(line);
      if (!reason) {
        continue;
      }
      active.classified = true;
      this.scheduleRecovery(reason, { errorCode: reason });
      return;
    }
  }

  private maybeApplyRtspFallback(reason: string, attempt: number) {
    const sequence = this.rtspSequence;
    if (!sequence || sequence.length < 2 || !isRtspFallbackReason(reason)) {
      return;
    }

    const from = sequence[this.rtspIndex] ?? DEFAULT_RTSP_TRANSPORT;
    this.rtspIndex = (this.rtspIndex + 1) % sequence.length;
    const to = sequence[this.rtspIndex] ?? DEFAULT_RTSP_TRANSPORT;
    if (from === to) {
      return;
    }

    metrics.recordTransportFallback(this.options.cameraId, to);
    this.logger.warn({ camera: this.options.cameraId, from, to, reason }, 'Switching RTSP transport');
    this.emit('transport', { cameraId: this.options.cameraId, from, to, reason, attempt });
  }

  private setState(next: IngestorState, reason: string | null) {
    const previous = this.state;
    if (previous === next) {
      return;
    }
    this.state = next;
    this.emit('status', { cameraId: this.options.cameraId, state: next, previous, reason });
  }

  private reportError(error: Error) {
    if (this.listenerCount('error') > 0) {
      this.emit('error', error);
    }
  }

  private cleanupStream() {
    if (!this.stream) {
      return;
    }

    this.streamCleanup?.();
    this.streamCleanup = null;

    if (!this.stream.destroyed) {
      this.stream.destroy();
    }

    this.stream = null;
    this.buffer = Buffer.alloc(0);
  }

  private clearAllTimers() {
    this.clearRestartTimer();
    this.clearStartTimer();
    this.clearWatchdogTimer();
    this.clearStreamIdleTimer();
  }

  private clearStartTimer() {
    if (this.startTimer) {
      clearTimeout(this.startTimer);
      this.startTimer = null;
    }
  }

  private clearRestartTimer() {
    if (this.restartTimer) {
      clearTimeout(this.restartTimer);
      this.restartTimer = null;
    }
  }

  private clearWatchdogTimer() {
    if (this.watchdogTimer) {
      clearTimeout(this.watchdogTimer);
      this.watchdogTimer = null;
    }
  }

  private clearStreamIdleTimer() {
    if (this.streamIdleTimer) {
      clearTimeout(this.streamIdleTimer);
      this.streamIdleTimer = null;
    }
  }

  private resetStartTimer() {
    this.clearStartTimer();
    const timeoutMs = this.options.startTimeoutMs ?? DEFAULT_START_TIMEOUT_MS;
    if (timeoutMs <= 0) {
      return;
    }

    this.startTimer = setTimeout(() => {
      this.startTimer = null;
      if (this.shouldStop || this.hasReceivedPacket) {
        return;
      }
      this.reportError(new Error('Camera stream start timeout'));
      this.scheduleRecovery('start-timeout');
    }, timeoutMs);
    this.startTimer.unref?.();
  }

  private resetWatchdogTimer() {
    this.clearWatchdogTimer();
    const timeoutMs = this.options.watchdogTimeoutMs ?? DEFAULT_WATCHDOG_TIMEOUT_MS;
    if (this.shouldStop || timeoutMs <= 0) {
      return;
    }

    this.watchdogTimer = setTimeout(() => {
      this.watchdogTimer = null;
      if (this.shouldStop) {
        return;
      }
      this.reportError(new Error('Camera stream watchdog timeout'));
      this.scheduleRecovery('watchdog-timeout');
    }, timeoutMs);
    this.watchdogTimer.unref?.();
  }

  private resetStreamIdleTimer() {
    this.clearStreamIdleTimer();
    const timeoutMs = this.options.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS;
    if (this.shouldStop || !this.hasReceivedPacket || timeoutMs <= 0) {
      return;
    }

    this.streamIdleTimer = setTimeout(() => {
      this.streamIdleTimer = null;
      if (this.shouldStop) {
        return;
      }
      this.reportError(new Error('Camera stream idle timeout'));
      this.scheduleRecovery('stream-idle');
    }, timeoutMs);
    this.streamIdleTimer.unref?.();
  }

  private computeRestartDelay(attempt: number): RestartDelayResult {
    return computeRestartDelay(attempt, {
      restartDelayMs: this.options.restartDelayMs,
      restartMaxDelayMs: this.options.restartMaxDelayMs,
      restartJitterFactor: this.options.restartJitterFactor,
      random: this.options.random
    });
  }
}

export function computeRestartDelay(
  attempt: number,
  options: {
    restartDelayMs?: number;
    restartMaxDelayMs?: number;
    restartJitterFactor?: number;
    random?: () => number;
  } = {}
): RestartDelayResult {
  const minDelayMs = Math.max(0, options.restartDelayMs ?? DEFAULT_RESTART_DELAY_MS);
  const maxDelayMs = Math.max(minDelayMs, options.restartMaxDelayMs ?? DEFAULT_RESTART_MAX_DELAY_MS);

  let baseDelayMs = minDelayMs;
  if (attempt > 1) {
    const exponential = minDelayMs * 2 ** (attempt - 1);
    baseDelayMs = Math.min(maxDelayMs, Math.max(minDelayMs, Math.round(exponential)));
  }

  const factor = Math.max(0, options.restartJitterFactor ?? DEFAULT_RESTART_JITTER_FACTOR);
  const random = options.random?.() ?? Math.random();
  const jitterRange = Math.round(baseDelayMs * factor);
  let appliedJitterMs = 0;

  if (jitterRange > 0) {
    appliedJitterMs = Math.round((random * 2 - 1) * jitterRange);
  }

  const minJitterMs = Math.max(minDelayMs, baseDelayMs - jitterRange) - baseDelayMs;
  const maxJitterMs = Math.min(maxDelayMs, baseDelayMs + jitterRange) - baseDelayMs;

  const delayMs = Math.min(maxDelayMs, Math.max(minDelayMs, baseDelayMs + appliedJitterMs));
  appliedJitterMs = delayMs - baseDelayMs;

  return {
    delayMs,
    meta: { minDelayMs, maxDelayMs, baseDelayMs, appliedJitterMs, minJitterMs, maxJitterMs }
  };
}

export type JpegSliceResult = {
  frames: Buffer[];
  remainder: Buffer;
};

/** Splits a byte stream on JPEG start/end markers. Bytes before a start marker are discarded. */
export function sliceJpegFrames(buffer: Buffer): JpegSliceResult {
  const frames: Buffer[] = [];
  let working = buffer;

  while (working.length > 0) {
    const start = working.indexOf(JPEG_START);
    if (start === -1) {
      const keep = working[working.length - 1] === 0xff ? 1 : 0;
      return { frames, remainder: working.subarray(working.length - keep) };
    }

    const end = working.indexOf(JPEG_END, start + JPEG_START.length);
    if (end === -1) {
      return { frames, remainder: working.subarray(start) };
    }

    frames.push(Buffer.from(working.subarray(start, end + JPEG_END.length)));
    working = working.subarray(end + JPEG_END.length);
  }

  return { frames, remainder: Buffer.alloc(0) };
}

function buildRtspFallbackSequence(initial?: string, override?: string[]): string[] {
  const normalizedInitial = normalizeRtspTransport(initial) ?? DEFAULT_RTSP_TRANSPORT;
  const candidates = override?.length ? override : DEFAULT_RTSP_SEQUENCE;
  const sequence = [normalizedInitial];
  for (const candidate of candidates) {
    const normalized = normalizeRtspTransport(candidate);
    if (normalized && normalized !== sequence[sequence.length - 1]) {
      sequence.push(normalized);
    }
  }
  if (sequence.length > 1 && sequence[sequence.length - 1] === sequence[0]) {
    sequence.pop();
  }
  return sequence;
}

function normalizeRtspTransport(value?: string | null): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim().toLowerCase();
  return trimmed.length > 0 ? trimmed : null;
}

function isRtspFallbackReason(reason: string) {
  return (
    reason === 'rtsp-timeout' ||
    reason === 'rtsp-connection-failure' ||
    reason === 'start-timeout' ||
    reason === 'watchdog-timeout'
  );
}

function toErrno(error: unknown): NodeJS.ErrnoException {
  return error instanceof Error ? error : new Error(String(error));
}

function normalizeErrno(error: NodeJS.ErrnoException): RecoveryContext {
  return {
    errorCode: error.code ?? (typeof error.errno === 'number' ? error.errno : null),
    exitCode: null,
    signal: null
  };
}

const RTSP_TIMEOUT_PATTERNS = [
  /method\s+DESCRIBE\s+failed:.*timed out/i,
  /RTSP\s+response\s+timeout/i,
  /Connection\s+timed\s*out/i,
  /Read\s+timeout\s+after\s+[0-9]+\s+ms/i
];

const RTSP_AUTH_PATTERNS = [
  /method\s+DESCRIBE\s+failed:.*(401|403)/i,
  /RTSP\/1\.0\s+401\s+unauthorized/i,
  /RTSP\/1\.0\s+403/i,
  /(401|403)\s+(unauthorized|forbidden)/i,
  /authorization\s+failed/i,
  /authentication\s+failed/i
];

const RTSP_NOT_FOUND_PATTERNS = [
  /method\s+DESCRIBE\s+failed:.*(404|454|5\d\d)/i,
  /RTSP\/1\.0\s+404/i,
  /RTSP\/1\.0\s+454/i,
  /(404|454)\s+(not\s+found|session\s+not\s+found)/i,
  /server\s+returned\s+5\d\d/i,
  /session\s+not\s+found/i
];

const RTSP_CONNECTION_PATTERNS = [
  /connection\s+refused/i,
  /connection\s+reset/i,
  /no\s+route\s+to\s+host/i,
  /network\s+is\s+unreachable/i,
  /unable\s+to\s+connect/i
];

const CLASSIFICATION_REASONS: Record<Exclude<RtspErrorClass, 'other'>, string> = {
  timeout: 'rtsp-timeout',
  auth: 'rtsp-auth-failure',
  notFound: 'rtsp-not-found',
  network: 'rtsp-connection-failure'
};

export function classifyRtspError(stderrLine: string): RtspErrorClass {
  const line = stderrLine.trim();
  if (!line) {
    return 'other';
  }
  if (RTSP_TIMEOUT_PATTERNS.some(pattern => pattern.test(line))) {
    return 'timeout';
  }
  if (RTSP_AUTH_PATTERNS.some(pattern => pattern.test(line))) {
    return 'auth';
  }
  if (RTSP_NOT_FOUND_PATTERNS.some(pattern => pattern.test(line))) {
    return 'notFound';
  }
  if (RTSP_CONNECTION_PATTERNS.some(pattern => pattern.test(line))) {
    return 'network';
  }
  return 'other';
}

function classifyFfmpegStderr(line: string): string | null {
  const classification = classifyRtspError(line);
  return classification === 'other' ? null : CLASSIFICATION_REASONS[classification];
}
