export type RecorderErrorKind = 'transient' | 'capacity' | 'configuration' | 'fatal';

export class RecorderError extends Error {
  public readonly kind: RecorderErrorKind;
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details: Record<string, unknown>;

  constructor(
    kind: RecorderErrorKind,
    code: string,
    message: string,
    statusCode = 500,
    details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'RecorderError';
    this.kind = kind;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }

  toJSON() {
    return {
      code: this.code,
      kind: this.kind,
      message: this.message,
      details: this.details
    };
  }
}

export class CameraNotFoundError extends RecorderError {
  constructor(cameraId: string) {
    super('configuration', 'CAMERA_NOT_FOUND', `Camera "${cameraId}" is not registered`, 404, {
      cameraId
    });
    this.name = 'CameraNotFoundError';
  }
}

export class CameraConflictError extends RecorderError {
  constructor(cameraId: string) {
    super('configuration', 'CAMERA_CONFLICT', `Camera "${cameraId}" already exists`, 409, {
      cameraId
    });
    this.name = 'CameraConflictError';
  }
}

export class EventValidationError extends RecorderError {
  constructor(message: string, issues: string[] = []) {
    super('configuration', 'INVALID_EVENT', message, 400, { issues });
    this.name = 'EventValidationError';
  }
}

export class ConfigurationError extends RecorderError {
  constructor(message: string, issues: string[] = []) {
    super('configuration', 'INVALID_CONFIGURATION', message, 400, { issues });
    this.name = 'ConfigurationError';
  }
}

export class StorageFatalError extends RecorderError {
  constructor(cameraId: string, path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('fatal', 'STORAGE_FAILURE', `Recording storage failed for camera "${cameraId}": ${reason}`, 500, {
      cameraId,
      path
    });
    this.name = 'StorageFatalError';
  }
}

export function isRecorderError(error: unknown): error is RecorderError {
  return error instanceof RecorderError;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
