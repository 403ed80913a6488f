import { ErrorCodes } from '../types.js';

export class AffectedError extends Error {
  public code: ErrorCodes;
  public details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCodes, details?: Record<string, unknown>) {
    super(message);
    this.name = 'AffectedError';
    this.code = code;
    this.details = details;
  }
}

export class WorkspaceError extends AffectedError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.WORKSPACE_ERROR, details);
    this.name = 'WorkspaceError';
  }
}

export class ConfigError extends AffectedError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

export class TemplateError extends AffectedError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.TEMPLATE_ERROR, details);
    this.name = 'TemplateError';
  }
}

export class UnsupportedVariableError extends TemplateError {
  constructor(public readonly variable: string) {
    super(`Unsupported variable \`${variable}\``, { variable });
    this.name = 'UnsupportedVariableError';
  }
}

export class EmptyCommandError extends TemplateError {
  constructor() {
    super('No program name in rendered command');
    this.name = 'EmptyCommandError';
  }
}

export class SpawnError extends AffectedError {
  constructor(
    public readonly program: string,
    reason: string,
    details?: Record<string, unknown>,
  ) {
    super(`Failed to start \`${program}\`: ${reason}`, ErrorCodes.SPAWN_ERROR, { program, ...details });
    this.name = 'SpawnError';
  }
}

export function formatError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
