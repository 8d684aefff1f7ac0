/**
 * Runtime configuration
 *
 * Carries the process-wide switches that shape how construction errors
 * and diagnostics are reported.
 */

import { z } from 'zod';
import { ConfigurationError, ValidationError } from './errors';

export const RuntimeConfigSchema = z.object({
  /** Re-raise field validation errors without their underlying cause */
  simplifiedExceptions: z.boolean().default(true),
  /** Log diagnostics nobody subscribed to */
  logDiagnostics: z.boolean().default(true),
});

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;

export function createRuntimeConfig(
  overrides: Partial<RuntimeConfig> = {}
): RuntimeConfig {
  return RuntimeConfigSchema.parse(overrides);
}

const EnvFlagSchema = z
  .enum(['1', '0', 'true', 'false', 'yes', 'no', 'on', 'off'])
  .transform(v => v === '1' || v === 'true' || v === 'yes' || v === 'on');

const RuntimeEnvSchema = z.object({
  SPA_SIMPLIFIED_EXCEPTIONS: EnvFlagSchema.optional(),
  SPA_LOG_DIAGNOSTICS: EnvFlagSchema.optional(),
});

/** Read configuration from environment variables */
export function loadRuntimeConfig(
  env: Record<string, string | undefined> = process.env
): RuntimeConfig {
  const raw = {
    SPA_SIMPLIFIED_EXCEPTIONS: env.SPA_SIMPLIFIED_EXCEPTIONS?.toLowerCase(),
    SPA_LOG_DIAGNOSTICS: env.SPA_LOG_DIAGNOSTICS?.toLowerCase(),
  };
  const parsed = RuntimeEnvSchema.safeParse(raw);
  if (!parsed.success) {
    const variable = String(parsed.error.issues[0]?.path[0] ?? 'environment');
    throw new ConfigurationError(variable, env[variable] ?? '', { cause: parsed.error });
  }
  return createRuntimeConfig({
    simplifiedExceptions: parsed.data.SPA_SIMPLIFIED_EXCEPTIONS,
    logDiagnostics: parsed.data.SPA_LOG_DIAGNOSTICS,
  });
}

let processConfig: RuntimeConfig | undefined;

/** Environment configuration, read once per process */
export function defaultRuntimeConfig(): RuntimeConfig {
  processConfig ??= loadRuntimeConfig();
  return processConfig;
}

// =============================================================================
// Error Reporting Policy
// =============================================================================

export interface ErrorReportingPolicy {
  name: string;
  /** Turn a validation failure into the error the caller sees */
  report(error: ValidationError): ValidationError;
}

export const fullErrorReporting: ErrorReportingPolicy = {
  name: 'full',
  report: error => error,
};

export const simplifiedErrorReporting: ErrorReportingPolicy = {
  name: 'simplified',
  report: error => new ValidationError(error.field, error.constraint),
};

export function errorPolicyFor(config: RuntimeConfig): ErrorReportingPolicy {
  return config.simplifiedExceptions ? simplifiedErrorReporting : fullErrorReporting;
}
