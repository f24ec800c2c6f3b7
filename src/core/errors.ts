/**
 * Raised when the backing table cannot be read or does not have the expected shape.
 * Fatal: the caller must not fall back to an empty store.
 */
export class StorageCorruptError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`Observation store at ${path} is unreadable: ${message}`, options);
    this.name = 'StorageCorruptError';
    this.path = path;
  }
}

export class UnknownZoneError extends Error {
  readonly zone: string;

  constructor(zone: string) {
    super(`Unknown zone '${zone}'`);
    this.name = 'UnknownZoneError';
    this.zone = zone;
  }
}

export class InvalidRangeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRangeError';
  }
}
