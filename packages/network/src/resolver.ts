/**
 * Hierarchical name resolution
 *
 * Dotted paths ("a.b.c") address nested modules and their ports. Every
 * segment but the last must name a registered child; the last segment is
 * resolved against the module reached that way.
 *
 * The legacy "<module>_<port>" form is still understood for ports. It
 * splits on the last underscore only, so "my_module_x" means port "x" of
 * module "my_module".
 */

import {
  ModuleNotFoundError,
  PortNotFoundError,
  underscoreDeprecation,
  type DiagnosticChannel,
  type Port,
  type PortDirection,
  type PortMap,
} from '@spa/core';

/** Anything shaped like a module: named children plus port maps */
export interface Resolvable<M extends Resolvable<M>> {
  readonly children: ReadonlyMap<string, M>;
  readonly inputs: PortMap;
  readonly outputs: PortMap;
  readonly diagnostics: DiagnosticChannel;
}

// =============================================================================
// Path Cursor
// =============================================================================

export interface PathCursor {
  head: string;
  /** Remaining path after the first dot, undefined for a single segment */
  rest: string | undefined;
}

export function splitPath(path: string): PathCursor {
  const dot = path.indexOf('.');
  return dot < 0
    ? { head: path, rest: undefined }
    : { head: path.slice(0, dot), rest: path.slice(dot + 1) };
}

export function* pathSegments(path: string): Generator<PathCursor> {
  let cursor = splitPath(path);
  yield cursor;
  while (cursor.rest !== undefined) {
    cursor = splitPath(cursor.rest);
    yield cursor;
  }
}

/** Split "<module>_<port>" on its last underscore */
export function splitLegacyName(name: string): { module: string; port: string } | undefined {
  const underscore = name.lastIndexOf('_');
  if (underscore < 0) {
    return undefined;
  }
  return { module: name.slice(0, underscore), port: name.slice(underscore + 1) };
}

/**
 * Walk every segment but the last. Returns the module reached and the
 * final segment, or undefined when an intermediate child is missing.
 */
function descend<M extends Resolvable<M>>(
  root: M,
  path: string
): { module: M; leaf: string } | undefined {
  let module = root;
  for (const { head, rest } of pathSegments(path)) {
    if (rest === undefined) {
      return { module, leaf: head };
    }
    const child = module.children.get(head);
    if (!child) {
      return undefined;
    }
    module = child;
  }
  return undefined;
}

// =============================================================================
// Modules
// =============================================================================

/**
 * Resolve a dotted path to a module. With `stripOutput`, a final segment
 * naming one of the reached module's own ports resolves to that module.
 */
export function resolveModule<M extends Resolvable<M>>(
  root: M,
  path: string,
  stripOutput = false
): M {
  const target = descend(root, path);
  if (target) {
    const { module, leaf } = target;
    const child = module.children.get(leaf);
    if (child) {
      return child;
    }
    if (stripOutput && (module.inputs.has(leaf) || module.outputs.has(leaf))) {
      return module;
    }
  }
  throw new ModuleNotFoundError(path);
}

// =============================================================================
// Ports
// =============================================================================

function portsOf<M extends Resolvable<M>>(module: M, direction: PortDirection): PortMap {
  return direction === 'input' ? module.inputs : module.outputs;
}

/**
 * Resolve a single segment against `module`. Deprecation notices go to
 * `diagnostics`, the channel of the module the caller queried.
 */
function findLocalPort<M extends Resolvable<M>>(
  module: M,
  name: string,
  direction: PortDirection,
  diagnostics: DiagnosticChannel
): Port | undefined {
  const own = portsOf(module, direction).get(name);
  if (own) {
    return own;
  }

  const child = module.children.get(name);
  if (child) {
    return findLocalPort(child, 'default', direction, diagnostics);
  }

  const legacy = splitLegacyName(name);
  if (!legacy) {
    return undefined;
  }
  const owner = module.children.get(legacy.module);
  if (!owner) {
    return undefined;
  }
  const found = findLocalPort(owner, legacy.port, direction, diagnostics);
  if (found) {
    diagnostics.emit(underscoreDeprecation(name));
  }
  return found;
}

export function resolvePort<M extends Resolvable<M>>(
  root: M,
  path: string,
  direction: PortDirection
): Port {
  const target = descend(root, path);
  const found = target
    ? findLocalPort(target.module, target.leaf, direction, root.diagnostics)
    : undefined;
  if (!found) {
    throw new PortNotFoundError(path, direction);
  }
  return found;
}

/**
 * Legacy names of every child port: the child's name for its "default"
 * port, "<child>_<port>" otherwise. The iterable can be walked repeatedly.
 */
export function portNames<M extends Resolvable<M>>(
  module: M,
  direction: PortDirection
): Iterable<string> {
  return {
    *[Symbol.iterator]() {
      for (const [name, child] of module.children) {
        for (const portName of portsOf(child, direction).keys()) {
          yield portName === 'default' ? name : `${name}_${portName}`;
        }
      }
    },
  };
}
