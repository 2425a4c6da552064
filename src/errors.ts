/**
 * Error hierarchy for psmanifest.
 */

export interface ErrorOptions {
  cause?: Error;
  suggestion?: string | null;
}

export class ToolError extends Error {
  readonly code: string;
  readonly details: Record<string, unknown>;
  override readonly cause?: Error;
  readonly timestamp: string;
  readonly suggestion: string | null;

  constructor(
    code: string,
    message: string,
    details?: Record<string, unknown>,
    cause?: Error,
    suggestion?: string | null,
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'ToolError';
    this.code = code;
    this.details = details ?? {};
    this.cause = cause;
    this.timestamp = new Date().toISOString();
    this.suggestion = suggestion ?? null;
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }

  toJSON(): Record<string, unknown> {
    const obj: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    };
    if (Object.keys(this.details).length > 0) {
      obj.details = this.details;
    }
    if (this.cause !== undefined) {
      obj.cause = String(this.cause);
    }
    obj.timestamp = this.timestamp;
    if (this.suggestion !== null) {
      obj.suggestion = this.suggestion;
    }
    return obj;
  }
}

export class ConfigNotFoundError extends ToolError {
  constructor(configPath: string, options?: ErrorOptions) {
    super(
      'CONFIG_NOT_FOUND',
      `Configuration file not found: ${configPath}`,
      { configPath },
      options?.cause,
      options?.suggestion,
    );
    this.name = 'ConfigNotFoundError';
  }
}

export class ConfigError extends ToolError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super('CONFIG_INVALID', message, details, options?.cause, options?.suggestion);
    this.name = 'ConfigError';
  }
}

export class ModuleDirNotFoundError extends ToolError {
  constructor(path: string, options?: ErrorOptions) {
    super('MODULE_DIR_NOT_FOUND', `Module directory not found: ${path}`, { path }, options?.cause, options?.suggestion);
    this.name = 'ModuleDirNotFoundError';
  }

  get path(): string {
    return String(this.details['path']);
  }
}

export class PublicDirNotFoundError extends ToolError {
  constructor(path: string, options?: ErrorOptions) {
    super(
      'PUBLIC_DIR_NOT_FOUND',
      `Public function directory not found: ${path}`,
      { path },
      options?.cause,
      options?.suggestion ?? 'Create the directory or check the configured root and publicDir',
    );
    this.name = 'PublicDirNotFoundError';
  }

  get path(): string {
    return String(this.details['path']);
  }
}

export class ManifestNotFoundError extends ToolError {
  constructor(path: string, options?: ErrorOptions) {
    super('MANIFEST_NOT_FOUND', `Module manifest not found: ${path}`, { path }, options?.cause, options?.suggestion);
    this.name = 'ManifestNotFoundError';
  }

  get path(): string {
    return String(this.details['path']);
  }
}

export class ManifestFieldNotFoundError extends ToolError {
  constructor(field: string, path: string, options?: ErrorOptions) {
    super(
      'MANIFEST_FIELD_NOT_FOUND',
      `Field '${field}' not found in manifest: ${path}`,
      { field, path },
      options?.cause,
      options?.suggestion,
    );
    this.name = 'ManifestFieldNotFoundError';
  }

  get field(): string {
    return String(this.details['field']);
  }
}

export class SourceReadError extends ToolError {
  constructor(path: string, options?: ErrorOptions) {
    super(
      'SOURCE_READ_FAILED',
      `Cannot read function file: ${path}${options?.cause ? ` (${options.cause.message})` : ''}`,
      { path },
      options?.cause,
      options?.suggestion,
    );
    this.name = 'SourceReadError';
  }
}

export class TemplateError extends ToolError {
  constructor(placeholder: string, options?: ErrorOptions) {
    super('TEMPLATE_INVALID', `No value for template placeholder: ${placeholder}`, { placeholder }, options?.cause, options?.suggestion);
    this.name = 'TemplateError';
  }
}

export class InvalidVersionError extends ToolError {
  constructor(version: string, options?: ErrorOptions) {
    super(
      'VERSION_INVALID',
      `Not a semantic version: '${version}'`,
      { version },
      options?.cause,
      options?.suggestion ?? 'Use MAJOR.MINOR.PATCH, e.g. 1.0.0',
    );
    this.name = 'InvalidVersionError';
  }
}

export const ErrorCodes = Object.freeze({
  CONFIG_NOT_FOUND: 'CONFIG_NOT_FOUND',
  CONFIG_INVALID: 'CONFIG_INVALID',
  MODULE_DIR_NOT_FOUND: 'MODULE_DIR_NOT_FOUND',
  PUBLIC_DIR_NOT_FOUND: 'PUBLIC_DIR_NOT_FOUND',
  MANIFEST_NOT_FOUND: 'MANIFEST_NOT_FOUND',
  MANIFEST_FIELD_NOT_FOUND: 'MANIFEST_FIELD_NOT_FOUND',
  SOURCE_READ_FAILED: 'SOURCE_READ_FAILED',
  TEMPLATE_INVALID: 'TEMPLATE_INVALID',
  VERSION_INVALID: 'VERSION_INVALID',
} as const);

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
