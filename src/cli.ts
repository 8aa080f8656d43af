#!/usr/bin/env node
import axios, { type AxiosResponse } from 'axios';
import path from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';
import { buildRetentionOptions, startRecorder, type RecorderRuntime } from './app.js';
import { ConfigManager, loadConfigFromFile, type RecorderConfig } from './config/index.js';
import logger, { getAvailableLogLevels, getLogLevel, setLogLevel } from './logger.js';
import metrics from './metrics/index.js';
import type { SupervisorStatus } from './pipeline/supervisor.js';
import { runRetentionOnce } from './tasks/retention.js';

export type CliIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
};

const DEFAULT_IO: CliIo = { stdout: process.stdout, stderr: process.stderr };
const DEFAULT_SERVER = 'http://127.0.0.1:8555';
const DEFAULT_CONFIG_PATH = 'config/default.json';
const REQUEST_TIMEOUT_MS = 5000;

const USAGE = [
  'Usage: camera-recorder <command> [options]',
  '',
  'Commands:',
  '  start [--config path]                 Start recording every configured camera',
  '  status [--json] [--server url]        Show the status of a running recorder',
  '  trigger --camera id [--event motion|alarm] [--alarm-type type] [--server url]',
  '                                        Send a manual event to a running recorder',
  '  retention run [--dry-run] [--max-age days] [--config path]',
  '                                        Delete expired continuous recordings',
  '  log-level [get|set <level>]           Show or change the log level',
  '  help                                  Show this message'
].join('\n');

const LOG_LEVEL_USAGE = 'Usage: camera-recorder log-level [get|set <level>]';

type ParsedArgs = {
  flags: Map<string, string | true>;
  positionals: string[];
  errors: string[];
};

/** Splits argv into positionals and --flags; `valueFlags` take the next token. */
function parseArgs(args: string[], valueFlags: string[], booleanFlags: string[]): ParsedArgs {
  const result: ParsedArgs = { flags: new Map(), positionals: [], errors: [] };
  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (token === undefined) {
      continue;
    }
    if (!token.startsWith('-')) {
      result.positionals.push(token);
      continue;
    }
    const [name, inline] = token.split('=', 2);
    if (name === undefined) {
      continue;
    }
    if (booleanFlags.includes(name)) {
      result.flags.set(name, true);
      continue;
    }
    if (valueFlags.includes(name)) {
      const value = inline ?? args[index + 1];
      if (value === undefined || (inline === undefined && value.startsWith('-'))) {
        result.errors.push(`Missing value for ${name}`);
        continue;
      }
      result.flags.set(name, value);
      if (inline === undefined) {
        index += 1;
      }
      continue;
    }
    result.errors.push(`Unknown option: ${name}`);
  }
  return result;
}

function flagValue(parsed: ParsedArgs, name: string): string | undefined {
  const value = parsed.flags.get(name);
  return typeof value === 'string' ? value : undefined;
}

function reportErrors(errors: string[], usage: string, io: CliIo): number {
  for (const message of errors) {
    io.stderr.write(`${message}\n`);
  }
  io.stderr.write(`${usage}\n`);
  return 1;
}

function describeError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    return error.code ? `${error.code} ${error.message}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

function readErrorMessage(response: AxiosResponse<unknown>): string {
  const body = response.data;
  if (body && typeof body === 'object') {
    const message: unknown = Reflect.get(body, 'error');
    if (typeof message === 'string') {
      return message;
    }
  }
  return `HTTP ${response.status}`;
}

export async function runCli(argv = process.argv.slice(2), io: CliIo = DEFAULT_IO): Promise<number> {
  const [command, ...rest] = argv;

  switch (command) {
    case undefined:
    case 'help':
    case '--help':
    case '-h':
      io.stdout.write(`${USAGE}\n`);
      return command === undefined ? 1 : 0;
    case 'start':
      return runStartCommand(rest, io);
    case 'status':
      return runStatusCommand(rest, io);
    case 'trigger':
      return runTriggerCommand(rest, io);
    case 'retention':
      return runRetentionCommand(rest, io);
    case 'log-level':
      return runLogLevelCommand(rest, io);
    default:
      io.stderr.write(`Unknown command: ${command}\n`);
      io.stderr.write(`${USAGE}\n`);
      return 1;
  }
}

function loadConfig(configPath: string | undefined): RecorderConfig {
  return loadConfigFromFile(path.resolve(configPath ?? process.env.RECORDER_CONFIG ?? DEFAULT_CONFIG_PATH));
}

async function runStartCommand(args: string[], io: CliIo): Promise<number> {
  const parsed = parseArgs(args, ['--config', '-c'], []);
  if (parsed.errors.length > 0 || parsed.positionals.length > 0) {
    return reportErrors([...parsed.errors, ...parsed.positionals.map(value => `Unexpected argument: ${value}`)], USAGE, io);
  }

  let manager: ConfigManager;
  try {
    const configPath = flagValue(parsed, '--config') ?? flagValue(parsed, '-c');
    manager = new ConfigManager(path.resolve(configPath ?? process.env.RECORDER_CONFIG ?? DEFAULT_CONFIG_PATH));
  } catch (error) {
    io.stderr.write(`Failed to load configuration: ${describeError(error)}\n`);
    return 1;
  }

  let runtime: RecorderRuntime;
  try {
    runtime = await metrics.time('recorder.startup.ms', () =>
      startRecorder({ config: manager.getConfig(), configManager: manager })
    );
  } catch (error) {
    logger.error({ err: error }, 'Recorder failed to start');
    io.stderr.write(`Recorder failed to start: ${describeError(error)}\n`);
    return 1;
  }

  io.stdout.write(`Recorder started (${runtime.supervisor.status().cameras} cameras)\n`);

  await new Promise<void>(resolve => {
    const handleSignal = (signal: NodeJS.Signals) => {
      runtime
        .stop({ reason: 'signal', signal })
        .catch(error => {
          logger.error({ err: error }, 'Error during shutdown');
        })
        .finally(resolve);
    };
    const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT', 'SIGQUIT'];
    for (const signal of signals) {
      process.once(signal, handleSignal);
    }
  });

  io.stdout.write('Recorder stopped\n');
  return 0;
}

async function runStatusCommand(args: string[], io: CliIo): Promise<number> {
  const parsed = parseArgs(args, ['--server'], ['--json']);
  if (parsed.errors.length > 0) {
    return reportErrors(parsed.errors, USAGE, io);
  }
  const server = flagValue(parsed, '--server') ?? DEFAULT_SERVER;

  let response: AxiosResponse<SupervisorStatus>;
  try {
    response = await axios.get<SupervisorStatus>(`${server.replace(/\/+$/, '')}/api/status`, {
      timeout: REQUEST_TIMEOUT_MS
    });
  } catch (error) {
    io.stderr.write(`Recorder is not reachable at ${server}: ${describeError(error)}\n`);
    return 1;
  }

  const status = response.data;
  if (parsed.flags.has('--json')) {
    io.stdout.write(`${JSON.stringify(status)}\n`);
    return 0;
  }

  const lines = [`Recorder: ${status.running ? 'running' : 'stopping'}`, `Cameras: ${status.cameras}`];
  for (const id of status.camera_ids) {
    const camera = status.details[id];
    if (!camera) {
      continue;
    }
    const session = camera.event_session_open ? ' event-recording' : '';
    const reason = camera.health_reason ? ` (${camera.health_reason})` : '';
    lines.push(`  ${id}: ${camera.state} ${camera.health}${reason}${session}`);
  }
  io.stdout.write(`${lines.join('\n')}\n`);
  return 0;
}

type TriggerResponse = {
  status: 'dispatched' | 'duplicate';
  camera_id: string;
  event_type: string;
  session?: string;
  deadline?: number;
};

async function runTriggerCommand(args: string[], io: CliIo): Promise<number> {
  const parsed = parseArgs(args, ['--camera', '--event', '--alarm-type', '--server'], []);
  const camera = flagValue(parsed, '--camera');
  const event = flagValue(parsed, '--event') ?? 'motion';
  const alarmType = flagValue(parsed, '--alarm-type');
  const errors = [...parsed.errors];
  if (!camera) {
    errors.push('Missing required option --camera');
  }
  if (event !== 'motion' && event !== 'alarm') {
    errors.push(`Unknown event "${event}" (expected motion or alarm)`);
  }
  if (errors.length > 0 || !camera) {
    return reportErrors(errors, USAGE, io);
  }

  const server = (flagValue(parsed, '--server') ?? DEFAULT_SERVER).replace(/\/+$/, '');
  const body: Record<string, string> = { camera_id: camera };
  if (alarmType) {
    body.alarm_type = alarmType;
  }

  let response: AxiosResponse<unknown>;
  try {
    response = await axios.post(`${server}/api/events/${event}`, body, {
      timeout: REQUEST_TIMEOUT_MS,
      validateStatus: () => true
    });
  } catch (error) {
    io.stderr.write(`Recorder is not reachable at ${server}: ${describeError(error)}\n`);
    return 1;
  }

  if (response.status >= 300) {
    io.stderr.write(`Trigger failed: ${readErrorMessage(response)}\n`);
    return 1;
  }

  const result = readTriggerResponse(response.data);
  if (!result) {
    io.stderr.write('Trigger failed: unexpected response\n');
    return 1;
  }
  if (result.status === 'duplicate') {
    io.stdout.write(`Duplicate ${result.event_type} event for ${result.camera_id} ignored\n`);
    return 0;
  }
  io.stdout.write(
    `Triggered ${result.event_type} on ${result.camera_id} (session ${result.session ?? 'unknown'}, ` +
      `until ${result.deadline ?? 'unknown'})\n`
  );
  return 0;
}

function readTriggerResponse(value: unknown): TriggerResponse | null {
  if (!value || typeof value !== 'object') {
    return null;
  }
  const status: unknown = Reflect.get(value, 'status');
  const cameraId: unknown = Reflect.get(value, 'camera_id');
  const eventType: unknown = Reflect.get(value, 'event_type');
  const session: unknown = Reflect.get(value, 'session');
  const deadline: unknown = Reflect.get(value, 'deadline');
  if ((status !== 'dispatched' && status !== 'duplicate') || typeof cameraId !== 'string' || typeof eventType !== 'string') {
    return null;
  }
  return {
    status,
    camera_id: cameraId,
    event_type: eventType,
    session: typeof session === 'string' ? session : undefined,
    deadline: typeof deadline === 'number' ? deadline : undefined
  };
}

const RETENTION_USAGE = 'Usage: camera-recorder retention run [--dry-run] [--max-age days] [--config path]';

async function runRetentionCommand(args: string[], io: CliIo): Promise<number> {
  const [subcommand, ...rest] = args;
  if (subcommand === 'help' || subcommand === '--help' || subcommand === '-h') {
    io.stdout.write(`${RETENTION_USAGE}\n`);
    return 0;
  }
  if (subcommand !== 'run') {
    return reportErrors([subcommand ? `Unknown retention command: ${subcommand}` : 'Missing retention command'], RETENTION_USAGE, io);
  }

  const parsed = parseArgs(rest, ['--max-age', '--config', '-c'], ['--dry-run']);
  const errors = [...parsed.errors];
  const maxAgeRaw = flagValue(parsed, '--max-age');
  const maxAge = maxAgeRaw === undefined ? undefined : Number(maxAgeRaw);
  if (maxAge !== undefined && (!Number.isFinite(maxAge) || maxAge < 0)) {
    errors.push(`Invalid value for --max-age: ${maxAgeRaw}`);
  }
  if (errors.length > 0) {
    return reportErrors(errors, RETENTION_USAGE, io);
  }

  let config: RecorderConfig;
  try {
    config = loadConfig(flagValue(parsed, '--config') ?? flagValue(parsed, '-c'));
  } catch (error) {
    logger.error({ err: error }, 'Retention CLI failed to load configuration');
    io.stderr.write(`Failed to load configuration: ${describeError(error)}\n`);
    return 1;
  }

  const options = buildRetentionOptions(config, { dryRun: parsed.flags.has('--dry-run'), metrics });
  if (maxAge !== undefined) {
    options.maxAgeDays = maxAge;
  }

  try {
    const result = await runRetentionOnce(options);
    if (result.skipped) {
      const reason = result.reason === 'missing-directory' ? 'recordings directory not found' : 'retention disabled';
      io.stdout.write(`Retention task skipped (${reason})\n`);
      return 0;
    }
    const label = result.dryRun ? 'Retention dry run' : 'Retention task completed';
    io.stdout.write(
      `${label}: removed=${result.removed.length}, kept=${result.kept}, freedBytes=${result.freedBytes}, ` +
        `warnings=${result.warnings.length}\n`
    );
    for (const item of result.dryRun ? result.removed : []) {
      io.stdout.write(`  would remove ${item.filePath}\n`);
    }
    return 0;
  } catch (error) {
    logger.error({ err: error }, 'Retention CLI execution failed');
    io.stderr.write(`Retention task failed: ${describeError(error)}\n`);
    return 1;
  }
}

async function runLogLevelCommand(args: string[], io: CliIo): Promise<number> {
  const [first, second] = args;
  const available = getAvailableLogLevels();

  if (!first || first === 'get') {
    io.stdout.write(`${getLogLevel()}\n`);
    return 0;
  }

  if (first === 'help' || first === '--help' || first === '-h') {
    io.stdout.write(`${LOG_LEVEL_USAGE}\n`);
    return 0;
  }

  if (first === 'set') {
    if (!second) {
      return reportErrors(['Missing value for log level'], LOG_LEVEL_USAGE, io);
    }
    return applyLogLevel(second, io);
  }

  if (!available.includes(first.toLowerCase())) {
    io.stderr.write(`Unknown log level "${first}" (available: ${available.join(', ')})\n`);
    return 1;
  }

  return applyLogLevel(first, io);
}

function applyLogLevel(level: string, io: CliIo): number {
  try {
    const normalized = setLogLevel(level);
    io.stdout.write(`Log level set to ${normalized}\n`);
    return 0;
  } catch (error) {
    io.stderr.write(`${describeError(error)}\n`);
    return 1;
  }
}

const resolvedPath = path.resolve(process.argv[1] ?? '');
const modulePath = fileURLToPath(import.meta.url);

if (resolvedPath === modulePath) {
  runCli().then(
    code => {
      process.exit(code);
    },
    error => {
      logger.error({ err: error }, 'Recorder CLI failed');
      process.exit(1);
    }
  );
}
