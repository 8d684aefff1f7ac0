/**
 * Core types for module composition
 *
 * Ports pair a target object with a vocabulary binding. A binding starts
 * out either as a raw dimension (resolved later against a VocabularyMap)
 * or as a concrete Vocabulary handle.
 */

import { z } from 'zod';
import { InvalidDimensionError } from './errors';
import type { Vocabulary } from './vocab';

// =============================================================================
// Dimensions
// =============================================================================

export const DimensionSchema = z.number().int().positive();

export type Dimension = z.infer<typeof DimensionSchema>;

export function checkDimension(dimension: number): Dimension {
  const parsed = DimensionSchema.safeParse(dimension);
  if (!parsed.success) {
    throw new InvalidDimensionError(dimension);
  }
  return parsed.data;
}

// =============================================================================
// Vocabulary Bindings
// =============================================================================

export type VocabularyBinding =
  | { kind: 'raw'; dimension: number }
  | { kind: 'resolved'; vocab: Vocabulary };

export function rawBinding(dimension: number): VocabularyBinding {
  return { kind: 'raw', dimension: checkDimension(dimension) };
}

export function resolvedBinding(vocab: Vocabulary): VocabularyBinding {
  return { kind: 'resolved', vocab };
}

export function isResolved(
  binding: VocabularyBinding
): binding is { kind: 'resolved'; vocab: Vocabulary } {
  return binding.kind === 'resolved';
}

/** Dimension carried by a binding, whichever form it is in */
export function bindingDimension(binding: VocabularyBinding): number {
  return binding.kind === 'raw' ? binding.dimension : binding.vocab.dimension;
}

// =============================================================================
// Ports
// =============================================================================

export interface Port<T = unknown> {
  /** Object to connect into (inputs) or out of (outputs) */
  target: T;
  binding: VocabularyBinding;
}

export type PortMap = Map<string, Port>;

/**
 * Declare a port. A number declares the port's dimensionality and is
 * upgraded to a shared Vocabulary when the owning module is registered.
 */
export function port<T>(target: T, vocab: Vocabulary | number): Port<T> {
  return {
    target,
    binding: typeof vocab === 'number' ? rawBinding(vocab) : resolvedBinding(vocab),
  };
}

export type PortDirection = 'input' | 'output';

// =============================================================================
// Recorded Data
// =============================================================================

/** Opaque key identifying a recorded signal */
export interface Recording {
  label?: string;
}

/** Rows of recorded samples, keyed by recording */
export type RecordedData = Map<Recording, number[][]>;
