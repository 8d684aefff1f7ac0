/**
 * Non-fatal diagnostics
 *
 * Diagnostics report conditions that do not fail the operation, such as
 * use of a deprecated addressing form. They are delivered to subscribers;
 * with nobody listening they are logged.
 */

export type DiagnosticCode = 'spa.naming.underscore-deprecated';

export interface Diagnostic {
  code: DiagnosticCode;
  message: string;
  /** Name as the caller wrote it */
  subject: string;
  timestamp: number;
}

export type DiagnosticHandler = (diagnostic: Diagnostic) => void;

export interface Subscription {
  unsubscribe(): void;
  readonly active: boolean;
}

export interface DiagnosticChannelOptions {
  /** Log diagnostics that reach no subscriber */
  logUnhandled?: boolean;
}

export class DiagnosticChannel {
  private readonly handlers = new Set<DiagnosticHandler>();
  private readonly logUnhandled: boolean;

  constructor(options: DiagnosticChannelOptions = {}) {
    this.logUnhandled = options.logUnhandled ?? true;
  }

  subscribe(handler: DiagnosticHandler): Subscription {
    const handlers = this.handlers;
    handlers.add(handler);
    let active = true;
    return {
      unsubscribe() {
        handlers.delete(handler);
        active = false;
      },
      get active() { return active; },
    };
  }

  emit(diagnostic: Diagnostic): void {
    if (this.handlers.size === 0) {
      if (this.logUnhandled) {
        console.warn(`[Diagnostics] ${diagnostic.code}: ${diagnostic.message}`);
      }
      return;
    }
    for (const handler of this.handlers) {
      handler(diagnostic);
    }
  }
}

export function underscoreDeprecation(subject: string): Diagnostic {
  return {
    code: 'spa.naming.underscore-deprecated',
    message:
      'Underscore notation for inputs and outputs is deprecated. ' +
      'Use dot notation <module>.<name> instead.',
    subject,
    timestamp: Date.now(),
  };
}
