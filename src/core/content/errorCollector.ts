import { ScrapeStageError, type ScrapeStage } from '../../mcp/errors';
import type { ErrorKind, ErrorRecord } from './types/scrape';

const STAGE_KINDS: Record<ScrapeStage, ErrorKind> = {
  fetch: 'FetchError',
  render: 'RenderError',
  interaction: 'InteractionError',
  parse: 'ParseError',
};

function isErrorKind(name: string): name is ErrorKind {
  return Object.values(STAGE_KINDS).some(kind => kind === name);
}

/**
 * Converts anything thrown into a record. Taxonomy errors keep their own stage;
 * everything else is attributed to `fallbackStage`.
 */
export function toErrorRecord(error: unknown, fallbackStage: ScrapeStage): ErrorRecord {
  if (error instanceof ScrapeStageError) {
    return {
      stage: error.stage,
      kind: isErrorKind(error.name) ? error.name : STAGE_KINDS[error.stage],
      message: error.detail,
    };
  }

  const message =
    error instanceof Error ? error.message : typeof error === 'string' ? error : 'Unknown error';
  return { stage: fallbackStage, kind: STAGE_KINDS[fallbackStage], message };
}

/** Per-request accumulator of non-fatal failures, in the order they were raised. */
export class ErrorCollector {
  private readonly entries: ErrorRecord[] = [];

  add(record: ErrorRecord): void {
    this.entries.push({ ...record });
  }

  addAll(records: readonly ErrorRecord[]): void {
    records.forEach(record => this.add(record));
  }

  capture(error: unknown, fallbackStage: ScrapeStage): ErrorRecord {
    const record = toErrorRecord(error, fallbackStage);
    this.add(record);
    return record;
  }

  get size(): number {
    return this.entries.length;
  }

  hasErrors(): boolean {
    return this.entries.length > 0;
  }

  records(): ErrorRecord[] {
    return this.entries.map(entry => ({ ...entry }));
  }
}
