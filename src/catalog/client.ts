import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import loggerModule, { type ComponentLogger } from '../logger.js';
import { redactInput } from '../utils/camera.js';

const DEFAULT_TIMEOUT_MS = 5000;
const DEFAULT_PORTS: Record<string, number> = { rtsp: 554, rtsps: 322, http: 80, https: 443 };

export type CatalogClientOptions = {
  baseUrl: string;
  apiKey: string;
  groupKey: string;
  timeoutMs?: number;
  recordingsDir?: string;
  adapter?: AxiosAdapter;
  logger?: ComponentLogger;
};

export type MonitorRegistration = {
  name?: string;
  input: string;
  mode?: 'record' | 'start' | 'stop';
  rtspTransport?: 'tcp' | 'udp';
};

export type MonitorConfiguration = {
  name: string;
  mode: string;
  type: string;
  host: string;
  port: number;
  path: string;
  details: Record<string, string | number | boolean>;
};

export type VideoQuery = {
  start?: string;
  end?: string;
};

type CatalogResponse = Record<string, unknown> & { ok?: unknown };

function isCatalogResponse(value: unknown): value is CatalogResponse {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Builds the monitor body the catalog service expects from a camera input URL. */
export function buildMonitorConfiguration(
  cameraId: string,
  registration: MonitorRegistration,
  recordingsDir = 'recordings'
): MonitorConfiguration {
  const url = URL.canParse(registration.input) ? new URL(registration.input) : null;
  const type = url ? url.protocol.replace(/:$/, '') : 'local';
  const port = url?.port ? Number(url.port) : DEFAULT_PORTS[type] ?? 0;

  return {
    name: registration.name ?? cameraId,
    mode: registration.mode ?? 'record',
    type,
    host: url?.hostname ?? '',
    port,
    path: url ? `${url.pathname}${url.search}` || '/stream' : registration.input,
    details: {
      rtsp_transport: registration.rtspTransport ?? 'tcp',
      skip_ping: true,
      fatal_max: 10,
      detector: '1',
      detector_record_method: 'sip',
      detector_trigger: '1',
      detector_timeout: 10,
      record_method: 'all',
      recording_dir: `${recordingsDir}/${cameraId}`
    }
  };
}

/**
 * Registers cameras and forwards events to an external recording catalog.
 * Every call resolves; failures are logged and reported as false or null.
 */
export class CatalogClient {
  private readonly http: AxiosInstance;
  private readonly logger: ComponentLogger;

  constructor(private readonly options: CatalogClientOptions) {
    this.logger = options.logger ?? loggerModule;
    this.http = axios.create({
      baseURL: options.baseUrl.replace(/\/+$/, ''),
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      headers: { 'Content-Type': 'application/json' },
      adapter: options.adapter
    });
  }

  async addMonitor(cameraId: string, registration: MonitorRegistration): Promise<boolean> {
    const body = buildMonitorConfiguration(cameraId, registration, this.options.recordingsDir);
    const result = await this.request('post', `/configureMonitor/${encodeURIComponent(cameraId)}`, body);
    if (result) {
      this.logger.info({ camera: cameraId, input: redactInput(registration.input) }, 'Registered camera with catalog');
      return true;
    }
    this.logger.error({ camera: cameraId }, 'Failed to register camera with catalog');
    return false;
  }

  async deleteMonitor(cameraId: string): Promise<boolean> {
    const result = await this.request('delete', `/configureMonitor/${encodeURIComponent(cameraId)}`);
    if (result) {
      this.logger.info({ camera: cameraId }, 'Removed camera from catalog');
      return true;
    }
    this.logger.error({ camera: cameraId }, 'Failed to remove camera from catalog');
    return false;
  }

  async getMonitorStatus(cameraId: string): Promise<Record<string, unknown> | null> {
    const result = await this.request('get', `/monitor/${encodeURIComponent(cameraId)}`);
    if (!result) {
      this.logger.error({ camera: cameraId }, 'Failed to read catalog monitor status');
    }
    return result;
  }

  async triggerEvent(cameraId: string, reason: string): Promise<boolean> {
    const result = await this.request('post', `/motion/${encodeURIComponent(cameraId)}`, {
      name: 'External Event',
      reason,
      confidence: 100
    });
    if (!result) {
      this.logger.error({ camera: cameraId, reason }, 'Failed to forward event to catalog');
      return false;
    }
    return true;
  }

  async listVideos(cameraId: string, query: VideoQuery = {}): Promise<unknown[] | null> {
    const result = await this.request('get', `/videos/${encodeURIComponent(cameraId)}`, undefined, query);
    if (!result) {
      this.logger.error({ camera: cameraId }, 'Failed to list catalog videos');
      return null;
    }
    return Array.isArray(result.videos) ? result.videos : [];
  }

  private async request(
    method: 'get' | 'post' | 'delete',
    endpoint: string,
    data?: unknown,
    query: VideoQuery = {}
  ): Promise<CatalogResponse | null> {
    const url = `/api/${encodeURIComponent(this.options.groupKey)}${endpoint}`;
    try {
      const response = await this.http.request<unknown>({
        method,
        url,
        data,
        params: { key: this.options.apiKey, group: this.options.groupKey, ...query }
      });
      if (response.status < 200 || response.status >= 300) {
        this.logger.warn({ url, status: response.status }, 'Catalog request returned an error status');
        return null;
      }
      const body = response.data;
      if (!isCatalogResponse(body) || body.ok !== true) {
        this.logger.warn({ url, status: response.status }, 'Catalog request was not acknowledged');
        return null;
      }
      return body;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error({ url, err: message }, 'Catalog request failed');
      return null;
    }
  }
}
