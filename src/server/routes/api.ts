import type { IncomingMessage, ServerResponse } from 'node:http';
import type { CatalogClient } from '../../catalog/client.js';
import {
  listEvents,
  listRecordings,
  type CatalogEvent,
  type CatalogRecording,
  type ListEventsOptions,
  type ListRecordingsOptions,
  type Paginated
} from '../../db.js';
import { EventValidationError, RecorderError, isRecorderError } from '../../errors.js';
import type { DispatchOptions, DispatchResult, EventDispatcher } from '../../events/dispatcher.js';
import loggerModule, { getLogLevel, type ComponentLogger } from '../../logger.js';
import metricsModule, { type MetricsRegistry } from '../../metrics/index.js';
import type { CameraSupervisor, SupervisorStatus } from '../../pipeline/supervisor.js';
import type { PipelineHealth, RecordingKind } from '../../types.js';

const MAX_BODY_BYTES = 1024 * 1024;

export type HealthStatus = 'ok' | 'degraded' | 'failed' | 'stopping';

export type HealthPayload = {
  status: HealthStatus;
  timestamp: string;
  startedAt: string;
  uptimeSeconds: number;
  logLevel: string;
  cameras: Record<string, { health: PipelineHealth; reason: string | null; connected: boolean }>;
  events: { dispatched: number; duplicates: number; rejected: number };
  retention: { runs: number; lastRunAt: string | null };
};

export interface ApiRouterOptions {
  supervisor: Pick<CameraSupervisor, 'status' | 'cameraStatus' | 'addCamera' | 'removeCamera'>;
  dispatcher: Pick<EventDispatcher, 'dispatch'>;
  catalog?: Pick<CatalogClient, 'getMonitorStatus' | 'listVideos'> | null;
  recordings?: (options: ListRecordingsOptions) => Paginated<CatalogRecording>;
  events?: (options: ListEventsOptions) => Paginated<CatalogEvent>;
  metrics?: MetricsRegistry;
  startedAt?: number;
  now?: () => number;
  logger?: ComponentLogger;
}

type RouteContext = {
  req: IncomingMessage;
  res: ServerResponse;
  url: URL;
  params: Record<string, string>;
};

type Route = {
  method: string;
  pattern: RegExp;
  keys: string[];
  handler: (context: RouteContext) => Promise<void> | void;
};

/** Folds per-camera health into one service status. */
export function buildHealthPayload(
  status: SupervisorStatus,
  metrics: MetricsRegistry,
  context: { startedAt: number; now: number }
): HealthPayload {
  const cameras: HealthPayload['cameras'] = {};
  let overall: HealthStatus = status.running ? 'ok' : 'stopping';
  for (const [id, camera] of Object.entries(status.details)) {
    cameras[id] = { health: camera.health, reason: camera.health_reason, connected: camera.connected };
    if (overall === 'stopping') {
      continue;
    }
    if (camera.health === 'failed') {
      overall = 'failed';
    } else if (camera.health === 'degraded' && overall === 'ok') {
      overall = 'degraded';
    }
  }

  const snapshot = metrics.snapshot();
  return {
    status: overall,
    timestamp: new Date(context.now).toISOString(),
    startedAt: new Date(context.startedAt).toISOString(),
    uptimeSeconds: Math.max(0, Math.round((context.now - context.startedAt) / 1000)),
    logLevel: getLogLevel(),
    cameras,
    events: {
      dispatched: snapshot.events.dispatched,
      duplicates: snapshot.events.duplicates,
      rejected: snapshot.events.rejected
    },
    retention: { runs: snapshot.retention.runs, lastRunAt: snapshot.retention.lastRunAt }
  };
}

export class ApiRouter {
  private readonly routes: Route[] = [];
  private readonly supervisor: ApiRouterOptions['supervisor'];
  private readonly dispatcher: ApiRouterOptions['dispatcher'];
  private readonly catalog: ApiRouterOptions['catalog'];
  private readonly recordings: (options: ListRecordingsOptions) => Paginated<CatalogRecording>;
  private readonly events: (options: ListEventsOptions) => Paginated<CatalogEvent>;
  private readonly metrics: MetricsRegistry;
  private readonly startedAt: number;
  private readonly now: () => number;
  private readonly logger: ComponentLogger;

  constructor(options: ApiRouterOptions) {
    this.supervisor = options.supervisor;
    this.dispatcher = options.dispatcher;
    this.catalog = options.catalog ?? null;
    this.recordings = options.recordings ?? listRecordings;
    this.events = options.events ?? listEvents;
    this.metrics = options.metrics ?? metricsModule;
    this.now = options.now ?? Date.now;
    this.startedAt = options.startedAt ?? this.now();
    this.logger = options.logger ?? loggerModule;

    this.route('POST', '/api/events/motion', context =>
      this.handleTrigger(context, { origin: 'manual', defaultEventType: 'motion' })
    );
    this.route('POST', '/api/events/alarm', context =>
      this.handleTrigger(context, { origin: 'manual', defaultEventType: 'alarm' })
    );
    this.route('POST', '/api/events/monitor', context => this.handleTrigger(context, { origin: 'monitor' }));
    this.route('POST', '/api/events', context => this.handleTrigger(context, { origin: 'manual' }));
    this.route('GET', '/api/events', context => this.handleEventList(context));
    this.route('GET', '/api/status', ({ res }) => sendJson(res, 200, this.supervisor.status()));
    this.route('GET', '/api/cameras', ({ res }) => {
      sendJson(res, 200, { cameras: Object.values(this.supervisor.status().details) });
    });
    this.route('POST', '/api/cameras', context => this.handleAddCamera(context));
    this.route('GET', '/api/cameras/:id', ({ res, params }) => {
      sendJson(res, 200, { camera: this.supervisor.cameraStatus(params.id ?? '') });
    });
    this.route('GET', '/api/cameras/:id/catalog', context => this.handleCameraCatalog(context));
    this.route('DELETE', '/api/cameras/:id', async ({ res, params }) => {
      const id = params.id ?? '';
      await this.supervisor.removeCamera(id);
      sendJson(res, 200, { removed: id });
    });
    this.route('GET', '/api/recordings', context => this.handleRecordingList(context));
    this.route('GET', '/api/metrics', ({ res, url }) => {
      if (url.searchParams.get('format') === 'prometheus') {
        res.writeHead(200, { 'Content-Type': 'text/plain; version=0.0.4' });
        res.end(this.metrics.exportForPrometheus());
        return;
      }
      sendJson(res, 200, this.metrics.snapshot());
    });
    this.route('GET', '/api/health', ({ res }) => {
      const payload = buildHealthPayload(this.supervisor.status(), this.metrics, {
        startedAt: this.startedAt,
        now: this.now()
      });
      sendJson(res, payload.status === 'stopping' ? 503 : 200, payload);
    });
  }

  handle(req: IncomingMessage, res: ServerResponse): boolean {
    if (!req.url) {
      return false;
    }

    const url = new URL(req.url, 'http://localhost');
    let pathMatched = false;
    for (const route of this.routes) {
      const match = route.pattern.exec(url.pathname);
      if (!match) {
        continue;
      }
      pathMatched = true;
      if (route.method !== req.method) {
        continue;
      }
      const params: Record<string, string> = {};
      route.keys.forEach((key, index) => {
        params[key] = decodeURIComponent(match[index + 1] ?? '');
      });
      Promise.resolve()
        .then(() => route.handler({ req, res, url, params }))
        .catch(error => this.sendError(res, error));
      return true;
    }

    if (pathMatched) {
      sendJson(res, 405, { error: 'Method not allowed' });
      return true;
    }
    return false;
  }

  private route(method: string, template: string, handler: Route['handler']) {
    const keys: string[] = [];
    const source = template.replace(/:([a-zA-Z]+)/g, (_match, key: string) => {
      keys.push(key);
      return '([^/]+)';
    });
    this.routes.push({ method, pattern: new RegExp(`^${source}/?$`), keys, handler });
  }

  private async handleTrigger({ req, res }: RouteContext, options: DispatchOptions) {
    const body = await readJsonBody(req);
    const result = await this.dispatcher.dispatch(body, options);
    sendJson(res, result.status === 'dispatched' ? 202 : 200, formatDispatchResult(result));
  }

  private async handleAddCamera({ req, res }: RouteContext) {
    const body = await readJsonBody(req);
    const camera = await this.supervisor.addCamera(body);
    sendJson(res, 201, { camera });
  }

  /** Monitor state and video list the registration service holds for one camera. */
  private async handleCameraCatalog({ res, url, params }: RouteContext) {
    const camera = this.supervisor.cameraStatus(params.id ?? '');
    const catalog = this.catalog;
    if (!catalog) {
      throw new RecorderError('configuration', 'CATALOG_DISABLED', 'Catalog registration is not enabled', 404);
    }
    const query = {
      start: url.searchParams.get('start') ?? undefined,
      end: url.searchParams.get('end') ?? undefined
    };
    const [monitor, videos] = await Promise.all([
      catalog.getMonitorStatus(camera.camera_id),
      catalog.listVideos(camera.camera_id, query)
    ]);
    if (monitor === null && videos === null) {
      throw new RecorderError('transient', 'CATALOG_UNAVAILABLE', 'Catalog service did not respond', 502, {
        camera: camera.camera_id
      });
    }
    sendJson(res, 200, { camera_id: camera.camera_id, registered: camera.registered, monitor, videos });
  }

  private handleRecordingList({ res, url }: RouteContext) {
    const params = url.searchParams;
    const kind = params.get('kind');
    if (kind !== null && !isRecordingKind(kind)) {
      throw new EventValidationError('Invalid recordings query', [`kind: "${kind}" is not continuous or event`]);
    }
    const result = this.recordings({
      cameraId: params.get('camera') ?? undefined,
      kind: kind ?? undefined,
      since: resolveTimeParam(params.get('since')),
      until: resolveTimeParam(params.get('until')),
      limit: resolveNumberParam(params.get('limit')),
      offset: resolveNumberParam(params.get('offset'))
    });
    sendJson(res, 200, { items: result.items, total: result.total });
  }

  private handleEventList({ res, url }: RouteContext) {
    const params = url.searchParams;
    const result = this.events({
      cameraId: params.get('camera') ?? undefined,
      eventType: params.get('type') ?? undefined,
      since: resolveTimeParam(params.get('since')),
      until: resolveTimeParam(params.get('until')),
      limit: resolveNumberParam(params.get('limit')),
      offset: resolveNumberParam(params.get('offset'))
    });
    sendJson(res, 200, { items: result.items, total: result.total });
  }

  private sendError(res: ServerResponse, error: unknown) {
    if (isRecorderError(error)) {
      if (error.statusCode >= 500) {
        this.logger.error({ err: error }, 'HTTP request failed');
      }
      sendJson(res, error.statusCode, { error: error.message, code: error.code, details: error.details });
      return;
    }
    this.logger.error({ err: error }, 'HTTP request failed');
    sendJson(res, 500, { error: 'Internal server error' });
  }
}

export function createApiRouter(options: ApiRouterOptions) {
  return new ApiRouter(options);
}

function formatDispatchResult(result: DispatchResult) {
  const base = {
    status: result.status,
    camera_id: result.event.cameraId,
    event_type: result.event.eventType,
    timestamp: result.event.timestamp,
    origin: result.event.origin
  };
  if (result.status === 'duplicate') {
    return base;
  }
  return { ...base, session: result.recording.status, deadline: result.recording.deadline };
}

function isRecordingKind(value: string): value is RecordingKind {
  return value === 'continuous' || value === 'event';
}

/** Accepts epoch seconds or an ISO date; returns epoch seconds. */
function resolveTimeParam(value: string | null): number | undefined {
  if (!value) {
    return undefined;
  }
  const numeric = Number(value);
  if (Number.isFinite(numeric)) {
    return numeric;
  }
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? undefined : parsed / 1000;
}

function resolveNumberParam(value: string | null): number | undefined {
  if (!value) {
    return undefined;
  }
  const numeric = Number(value);
  return Number.isFinite(numeric) ? numeric : undefined;
}

function readJsonBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;

    req.on('data', (chunk: Buffer | string) => {
      const buffer = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
      size += buffer.length;
      if (size > MAX_BODY_BYTES) {
        reject(new RecorderError('capacity', 'BODY_TOO_LARGE', 'Request body is too large', 413));
        req.destroy();
        return;
      }
      chunks.push(buffer);
    });

    req.on('end', () => {
      const raw = Buffer.concat(chunks).toString('utf8').trim();
      if (!raw) {
        resolve({});
        return;
      }

      try {
        resolve(JSON.parse(raw));
      } catch {
        reject(new EventValidationError('Request body is not valid JSON'));
      }
    });

    req.on('error', reject);
  });
}

function sendJson(res: ServerResponse, status: number, payload: object) {
  if (!res.headersSent) {
    res.writeHead(status, { 'Content-Type': 'application/json' });
  }
  res.end(JSON.stringify(payload));
}
