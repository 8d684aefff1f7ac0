/**
 * Submodule registration
 *
 * Binding a module to a name inside a parent labels it, records it as a
 * child, upgrades its raw port dimensions to the parent's shared
 * vocabularies and finally lets the module finish its own wiring.
 */

import {
  ReassignmentError,
  checkDimension,
  resolvedBinding,
  type PortMap,
  type VocabularyBinding,
  type VocabularyMap,
} from '@spa/core';
import type { Module } from './module';

/** Resolve a raw dimension against `vocabs`; resolved bindings pass through */
export function resolveBinding(
  binding: VocabularyBinding,
  vocabs: VocabularyMap
): VocabularyBinding {
  return binding.kind === 'raw'
    ? resolvedBinding(vocabs.getOrCreate(binding.dimension))
    : binding;
}

export function resolvePorts(ports: PortMap, vocabs: VocabularyMap): void {
  for (const [name, port] of ports) {
    if (port.binding.kind === 'raw') {
      ports.set(name, { target: port.target, binding: resolveBinding(port.binding, vocabs) });
    }
  }
}

/** Reject any raw binding whose dimension no vocabulary could have */
function checkRawPorts(ports: PortMap): void {
  for (const { binding } of ports.values()) {
    if (binding.kind === 'raw') {
      checkDimension(binding.dimension);
    }
  }
}

function isAncestor(candidate: Module, of: Module): boolean {
  for (let current: Module | undefined = of; current; current = current.parent) {
    if (current === candidate) {
      return true;
    }
  }
  return false;
}

export function registerSubmodule(parent: Module, name: string, value: Module): void {
  if (parent.children.has(name)) {
    throw new ReassignmentError(name, String(value));
  }
  if (value.parent) {
    throw new ReassignmentError(
      name,
      String(value),
      `${value} is already registered in ${value.parent}.`
    );
  }
  if (isAncestor(value, parent)) {
    throw new ReassignmentError(name, String(value), 'A module cannot contain itself.');
  }
  // All checks run before the first mutation
  checkRawPorts(value.inputs);
  checkRawPorts(value.outputs);

  value.labelIfUnset(name);
  parent.children.set(name, value);
  value.parent = parent;

  // Parent's map, so siblings declaring the same dimension share a vocabulary
  resolvePorts(value.inputs, parent.vocabs);
  resolvePorts(value.outputs, parent.vocabs);

  value.onAdd(parent);
}
