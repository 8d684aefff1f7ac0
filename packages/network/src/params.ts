/**
 * Validated module parameters
 */

import { z } from 'zod';
import { ValidationError } from '@spa/core';

/** Write this to a parameter to use the configured default */
export const Default = Symbol('Default');

export type DefaultSentinel = typeof Default;

export interface ParamSpec<T> {
  name: string;
  schema: z.ZodType<T>;
  default: T;
}

export function param<T>(name: string, schema: z.ZodType<T>, defaultValue: T): ParamSpec<T> {
  return { name, schema, default: defaultValue };
}

/**
 * Check a value against a parameter's schema. Failures raise a
 * ValidationError with the schema error attached as its cause.
 */
export function validateParam<T>(spec: ParamSpec<T>, value: unknown): T {
  const parsed = spec.schema.safeParse(value);
  if (!parsed.success) {
    const constraint = parsed.error.issues.map(issue => issue.message).join('; ');
    throw new ValidationError(spec.name, constraint, { cause: parsed.error });
  }
  return parsed.data;
}

// =============================================================================
// Module Parameters
// =============================================================================

export const MODULE_PARAM_NAMES = [
  'dimPerEnsemble',
  'productNeurons',
  'cconvNeurons',
  'synapse',
] as const;

export type ModuleParamName = (typeof MODULE_PARAM_NAMES)[number];

export type ModuleParams = Record<ModuleParamName, number>;

const Count = z.number().int().min(1);

export const MODULE_PARAMS: Record<ModuleParamName, ParamSpec<number>> = {
  dimPerEnsemble: param('dimPerEnsemble', Count, 16),
  productNeurons: param('productNeurons', Count, 100),
  cconvNeurons: param('cconvNeurons', Count, 200),
  // Synaptic time constant in seconds
  synapse: param('synapse', z.number().nonnegative(), 0.01),
};

export function defaultModuleParams(): ModuleParams {
  return {
    dimPerEnsemble: MODULE_PARAMS.dimPerEnsemble.default,
    productNeurons: MODULE_PARAMS.productNeurons.default,
    cconvNeurons: MODULE_PARAMS.cconvNeurons.default,
    synapse: MODULE_PARAMS.synapse.default,
  };
}
