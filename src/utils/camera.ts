const CAMERA_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/**
 * Trims a camera id and returns it when it is safe to use as a directory
 * name, or an empty string otherwise.
 */
export function normalizeCameraId(value: string | null | undefined): string {
  const trimmed = typeof value === 'string' ? value.trim() : '';
  if (!trimmed || !CAMERA_ID_PATTERN.test(trimmed)) {
    return '';
  }
  return trimmed;
}

export function isRtspInput(input: string): boolean {
  return /^rtsps?:\/\//i.test(input.trim());
}

/** Hides credentials embedded in a source URL before it is logged. */
export function redactInput(input: string): string {
  return input.replace(/(\w+:\/\/)([^:@/]+):([^@/]+)@/, '$1$2:***@');
}
