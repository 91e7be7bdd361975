import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';

export type ScrapeStage = 'fetch' | 'render' | 'interaction' | 'parse';

/**
 * Base for the pipeline's error taxonomy. `detail` keeps the message without the
 * `MCP error <code>:` prefix that McpError adds, for use in result error records.
 */
export abstract class ScrapeStageError extends McpError {
  readonly stage: ScrapeStage;
  readonly detail: string;

  protected constructor(stage: ScrapeStage, detail: string) {
    super(ErrorCode.InternalError, detail);
    this.stage = stage;
    this.detail = detail;
  }
}

export class FetchError extends ScrapeStageError {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    const statusInfo = statusCode ? ` (status: ${statusCode})` : '';
    super('fetch', `${message}${statusInfo}`);
    this.name = 'FetchError';
    this.statusCode = statusCode;
  }
}

export class RenderError extends ScrapeStageError {
  constructor(message: string, url?: string) {
    const urlInfo = url ? ` for URL: ${url}` : '';
    super('render', `${message}${urlInfo}`);
    this.name = 'RenderError';
  }
}

export class InteractionError extends ScrapeStageError {
  constructor(message: string) {
    super('interaction', message);
    this.name = 'InteractionError';
  }
}

export class ParseError extends ScrapeStageError {
  constructor(message: string) {
    super('parse', message);
    this.name = 'ParseError';
  }
}

export function timeoutMessage(message: string, timeoutMs: number): string {
  return `${message} (timeout: ${timeoutMs}ms)`;
}

export class ValidationError extends McpError {
  constructor(message: string) {
    super(ErrorCode.InvalidParams, `Validation error: ${message}`);
  }
}

export function handleMcpError(error: unknown, context?: string): McpError {
  if (error instanceof McpError) {
    return error;
  }

  const prefix = context ? `${context}: ` : '';

  if (error instanceof Error) {
    return new McpError(ErrorCode.InternalError, `${prefix}${error.message}`);
  }

  return new McpError(ErrorCode.InternalError, `${prefix}Unknown error occurred`);
}
