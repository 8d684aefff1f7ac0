/**
 * Error taxonomy for module composition
 *
 * Every error carries a stable `code` so callers can branch on the kind
 * without matching messages.
 */

export type ModuleErrorCode =
  | 'spa.module.reassignment'
  | 'spa.module.not-found'
  | 'spa.port.not-found'
  | 'spa.module.unregistered'
  | 'spa.vocab.invalid-dimension'
  | 'spa.vocab.not-found'
  | 'spa.param.invalid'
  | 'spa.recording.not-found'
  | 'spa.config.invalid';

export class ModuleError extends Error {
  readonly code: ModuleErrorCode;

  constructor(code: ModuleErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// =============================================================================
// Registration
// =============================================================================

export class ReassignmentError extends ModuleError {
  constructor(
    readonly attribute: string,
    valueLabel: string,
    reason = 'Module-attributes can only be assigned once.'
  ) {
    super(
      'spa.module.reassignment',
      `Cannot re-assign module-attribute ${attribute} to ${valueLabel}. ${reason}`
    );
  }
}

export class StructuralIntegrityError extends ModuleError {
  constructor(readonly network: string) {
    super(
      'spa.module.unregistered',
      `${network} must be set as an attribute of a module`
    );
  }
}

// =============================================================================
// Resolution
// =============================================================================

export class ModuleNotFoundError extends ModuleError {
  constructor(readonly path: string) {
    super('spa.module.not-found', `Could not find module '${path}'.`);
  }
}

export class PortNotFoundError extends ModuleError {
  constructor(
    readonly path: string,
    readonly direction: 'input' | 'output'
  ) {
    super('spa.port.not-found', `Could not find module ${direction} '${path}'.`);
  }
}

// =============================================================================
// Vocabularies
// =============================================================================

export class InvalidDimensionError extends ModuleError {
  constructor(readonly dimension: unknown) {
    super(
      'spa.vocab.invalid-dimension',
      `Vocabulary dimension must be a positive integer, got ${String(dimension)}`
    );
  }
}

export class VocabularyNotFoundError extends ModuleError {
  constructor(readonly dimension: number) {
    super('spa.vocab.not-found', `No vocabulary with dimension ${dimension}`);
  }
}

export class RecordingNotFoundError extends ModuleError {
  constructor(readonly recording: string) {
    super('spa.recording.not-found', `No data recorded for ${recording}`);
  }
}

// =============================================================================
// Field Validation
// =============================================================================

export class ValidationError extends ModuleError {
  constructor(
    readonly field: string,
    readonly constraint: string,
    options?: ErrorOptions
  ) {
    super('spa.param.invalid', `Invalid value for '${field}': ${constraint}`, options);
  }
}

// =============================================================================
// Configuration
// =============================================================================

export class ConfigurationError extends ModuleError {
  constructor(readonly variable: string, readonly value: string, options?: ErrorOptions) {
    super('spa.config.invalid', `Invalid value for ${variable}: '${value}'`, options);
  }
}
