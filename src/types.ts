export type EventOrigin = 'monitor' | 'manual';

export type KnownEventType = 'motion' | 'alarm';

export type EventType = KnownEventType | (string & {});

export interface Packet {
  readonly cameraId: string;
  readonly timestamp: number;
  readonly data: Buffer;
  readonly byteLength: number;
}

export interface RecorderEvent {
  cameraId: string;
  eventType: EventType;
  timestamp: number;
  metadata: Record<string, unknown>;
  origin: EventOrigin;
}

export interface RecorderEventPayload {
  camera_id?: unknown;
  event_type?: unknown;
  timestamp?: unknown;
  metadata?: unknown;
  alarm_type?: unknown;
  topic?: unknown;
}

export type IngestorState = 'idle' | 'connecting' | 'connected' | 'unavailable' | 'stopped';

export type PipelineHealth = 'ok' | 'degraded' | 'failed';

export type RecordingKind = 'continuous' | 'event';

export interface SegmentMetadata {
  camera_id: string;
  type: 'continuous';
  start: number;
  end: number;
  duration: number;
  frame_count: number;
  bytes: number;
  file: string;
}

export interface TriggeringEventRecord {
  event_type: string;
  timestamp: number;
  origin: EventOrigin;
  metadata: Record<string, unknown>;
}

export interface EventRecordingMetadata {
  camera_id: string;
  type: 'event';
  event_type: string;
  trigger_timestamp: number;
  pre_event_start: number | null;
  pre_event_duration: number;
  post_event_start: number;
  post_event_end: number;
  post_event_duration: number;
  frame_count: number;
  bytes: number;
  keep: true;
  file: string;
  triggering_events: TriggeringEventRecord[];
}

export interface FinalizedRecording<T extends SegmentMetadata | EventRecordingMetadata> {
  cameraId: string;
  filePath: string;
  metadataPath: string;
  metadata: T;
}

export type Clock = () => number;

export const systemClock: Clock = () => Date.now() / 1000;
