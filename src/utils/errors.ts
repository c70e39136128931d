export class InvalidNumberError extends Error {
  constructor(raw: string, reason: string) {
    super(`Invalid phone number "${raw}": ${reason}`);
    this.name = 'InvalidNumberError';
  }
}

export class ExportFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExportFormatError';
  }
}

export class ConfigError extends Error {
  constructor(source: string, message: string) {
    super(`[${source}] ${message}`);
    this.name = 'ConfigError';
  }
}
