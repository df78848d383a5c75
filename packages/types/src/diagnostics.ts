/**
 * Structured diagnostic events recorded while a statement is parsed.
 * A sink is injected per document; nothing here is process-wide.
 */

export type DiagnosticLevel = 'debug' | 'info' | 'warn';

export type DiagnosticEvent =
  | { type: 'variant-detected'; variant: string }
  | { type: 'metadata-resolved'; field: string; value: number }
  | { type: 'page-started'; page: number }
  | { type: 'table-started'; page: number; line: number }
  | { type: 'table-not-found'; page: number }
  | { type: 'line-ignored'; page: number; line: number; reason: string }
  | { type: 'line-skipped'; page: number; line: number; reason: string; text: string }
  | { type: 'transaction-parsed'; page: number; line: number; payee: string; amount: number }
  | { type: 'page-stopped'; page: number; line: number }
  | { type: 'document-stopped'; page: number; line: number }
  | { type: 'reconciled'; check: string; expected: number; actual: number };

export interface DiagnosticSink {
  record(event: DiagnosticEvent): void;
}

export function levelOf(event: DiagnosticEvent): DiagnosticLevel {
  switch (event.type) {
    case 'table-not-found':
    case 'line-skipped':
      return 'warn';
    case 'variant-detected':
    case 'metadata-resolved':
    case 'page-started':
    case 'page-stopped':
    case 'document-stopped':
    case 'reconciled':
      return 'info';
    case 'table-started':
    case 'line-ignored':
    case 'transaction-parsed':
      return 'debug';
  }
}

export function describeEvent(event: DiagnosticEvent): string {
  switch (event.type) {
    case 'variant-detected':
      return `Detected statement layout: ${event.variant}`;
    case 'metadata-resolved':
      return `Resolved ${event.field}: ${event.value}`;
    case 'page-started':
      return `Processing page ${event.page}`;
    case 'table-started':
      return `Transaction table starts on page ${event.page}, line ${event.line}`;
    case 'table-not-found':
      return `No transaction table found on page ${event.page}`;
    case 'line-ignored':
      return `Page ${event.page} line ${event.line}: ${event.reason}`;
    case 'line-skipped':
      return `Skipped page ${event.page} line ${event.line}: ${event.reason} [${event.text.trim()}]`;
    case 'transaction-parsed':
      return `Page ${event.page} line ${event.line}: ${event.payee} (${event.amount})`;
    case 'page-stopped':
      return `Page ${event.page} processing stopped at line ${event.line}`;
    case 'document-stopped':
      return `Document processing stopped on page ${event.page}, line ${event.line}`;
    case 'reconciled':
      return `Reconciled ${event.check}: ${event.actual} == ${event.expected}`;
  }
}

/**
 * Default sink: keeps every event in order, optionally forwarding each one.
 */
export class EventLog implements DiagnosticSink {
  readonly events: DiagnosticEvent[] = [];
  private readonly forward: ((event: DiagnosticEvent) => void) | undefined;

  constructor(forward?: (event: DiagnosticEvent) => void) {
    this.forward = forward;
  }

  record(event: DiagnosticEvent): void {
    this.events.push(event);
    this.forward?.(event);
  }

  warnings(): string[] {
    return this.events.filter((e) => levelOf(e) === 'warn').map(describeEvent);
  }

  ofType<T extends DiagnosticEvent['type']>(type: T): Array<Extract<DiagnosticEvent, { type: T }>> {
    return this.events.filter((e): e is Extract<DiagnosticEvent, { type: T }> => e.type === type);
  }
}
