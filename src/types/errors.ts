export class ConfigError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class IpDetectionError extends Error {
  constructor(message: string, readonly servicesAttempted: string[] = []) {
    super(message);
    this.name = 'IpDetectionError';
  }
}

export class NotificationError extends Error {
  constructor(message: string, readonly statusCode?: number) {
    super(message);
    this.name = 'NotificationError';
  }
}

export class StorageError extends Error {
  constructor(message: string, readonly filePath: string) {
    super(message);
    this.name = 'StorageError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
