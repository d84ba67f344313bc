export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class NotConfiguredError extends Error {
  constructor(message = 'Counting session is not configured: call configure() before process()') {
    super(message);
    this.name = 'NotConfiguredError';
  }
}

export class DetectionLogError extends Error {
  constructor(
    readonly filePath: string,
    readonly location: string,
    message: string
  ) {
    super(`${filePath} (${location}): ${message}`);
    this.name = 'DetectionLogError';
  }
}
