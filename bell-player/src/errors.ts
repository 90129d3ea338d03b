/**
 * Error types raised by bell-player modules
 */

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export class LinkSheetError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LinkSheetError';
  }
}

export class MediaError extends Error {
  constructor(
    message: string,
    public readonly tool: string,
    public readonly exitCode: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'MediaError';
  }
}
