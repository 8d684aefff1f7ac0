/**
 * Module - a network with named ports and named submodules
 *
 * Inputs and outputs map a port name to a target object and its
 * vocabulary (or, until registration, the dimensionality it needs).
 * Submodules are bound to names with add(); the name becomes the handle
 * every other part of the composition uses to reach them.
 */

import {
  DiagnosticChannel,
  RecordingNotFoundError,
  StructuralIntegrityError,
  ValidationError,
  VocabularyMap,
  VocabularyNotFoundError,
  errorPolicyFor,
  defaultRuntimeConfig,
  mulberry32,
  similarity,
  type ErrorReportingPolicy,
  type Port,
  type PortMap,
  type Recording,
  type RecordedData,
  type RuntimeConfig,
  type Vocabulary,
  type VocabularyBinding,
} from '@spa/core';

import { Network, lookupDefault, type NetworkOptions, type ScopeFailure } from './network';
import {
  Default,
  MODULE_PARAMS,
  MODULE_PARAM_NAMES,
  defaultModuleParams,
  validateParam,
  type DefaultSentinel,
  type ModuleParamName,
  type ModuleParams,
} from './params';
import { registerSubmodule } from './registration';
import { portNames, resolveModule, resolvePort, type Resolvable } from './resolver';

// =============================================================================
// Options
// =============================================================================

export interface ModuleOptions extends NetworkOptions {
  /** Shared vocabularies; inherited from the enclosing module when omitted */
  vocabs?: VocabularyMap | Iterable<Vocabulary>;
  /** Receives deprecation notices; inherited like `vocabs` */
  diagnostics?: DiagnosticChannel;
  /** How field validation errors surface; derived from `runtime` when omitted */
  errorPolicy?: ErrorReportingPolicy;
  runtime?: RuntimeConfig;
}

// =============================================================================
// Module
// =============================================================================

export class Module extends Network implements Resolvable<Module> {
  readonly vocabs: VocabularyMap;
  readonly diagnostics: DiagnosticChannel;
  readonly errorPolicy: ErrorReportingPolicy;

  readonly children = new Map<string, Module>();
  readonly inputs: PortMap = new Map();
  readonly outputs: PortMap = new Map();

  /** Module this one is registered in; set by registration */
  parent: Module | undefined = undefined;

  private readonly params: ModuleParams = defaultModuleParams();

  constructor(options: ModuleOptions = {}) {
    super(options);
    const runtime = options.runtime ?? defaultRuntimeConfig();

    this.vocabs = initialVocabs(options.vocabs, this.seed);
    this.diagnostics = options.diagnostics ?? inheritedDiagnostics()
      ?? new DiagnosticChannel({ logUnhandled: runtime.logDiagnostics });
    this.errorPolicy = options.errorPolicy ?? errorPolicyFor(runtime);

    // Modules built inside this one's scope share its vocabularies
    this.config.configures(Module);
    this.config.set(Module, 'vocabs', this.vocabs);
    this.config.set(Module, 'diagnostics', this.diagnostics);

    for (const key of MODULE_PARAM_NAMES) {
      this.set(key, Default);
    }
  }

  /**
   * Called once this module has been registered in `parent`, after its
   * ports are resolved. Override to defer wiring that needs the owning
   * composition, such as connections to sibling modules.
   */
  onAdd(_parent: Module): void {}

  // ===========================================================================
  // Registration & Fields
  // ===========================================================================

  /** Register `module` under `name`. A name can be bound only once. */
  add<M extends Module>(name: string, module: M): M {
    registerSubmodule(this, name, module);
    return module;
  }

  get(key: ModuleParamName): number {
    return this.params[key];
  }

  set(key: ModuleParamName, value: number | DefaultSentinel): void {
    const spec = MODULE_PARAMS[key];
    const raw = value === Default
      ? (lookupDefault(this.constructor, key) ?? { value: spec.default }).value
      : value;

    try {
      this.params[key] = validateParam(spec, raw);
    } catch (error) {
      if (error instanceof ValidationError) {
        throw this.errorPolicy.report(error);
      }
      throw error;
    }
  }

  // ===========================================================================
  // Scope
  // ===========================================================================

  override exit(failure?: ScopeFailure): void {
    super.exit(failure);
    if (failure) {
      return;
    }
    this.validateStructure();
  }

  /** Every module built inside this scope must have been registered */
  private validateStructure(): void {
    const registered = new Set<Network>(this.children.values());
    for (const net of this.networks) {
      if (net instanceof Module && !registered.has(net)) {
        throw new StructuralIntegrityError(String(net));
      }
    }
  }

  // ===========================================================================
  // Name Resolution
  // ===========================================================================

  getModule(path: string, stripOutput = false): Module {
    return resolveModule<Module>(this, path, stripOutput);
  }

  /** Port to connect into, by "<module>", "<module>.<input>" or a nested path */
  getModuleInput(path: string): Port {
    return resolvePort<Module>(this, path, 'input');
  }

  /** Port to connect out of, by "<module>", "<module>.<output>" or a nested path */
  getModuleOutput(path: string): Port {
    return resolvePort<Module>(this, path, 'output');
  }

  getModuleInputs(): Iterable<string> {
    return portNames<Module>(this, 'input');
  }

  getModuleOutputs(): Iterable<string> {
    return portNames<Module>(this, 'output');
  }

  getInputVocab(path: string): VocabularyBinding {
    return this.getModuleInput(path).binding;
  }

  getOutputVocab(path: string): VocabularyBinding {
    return this.getModuleOutput(path).binding;
  }

  // ===========================================================================
  // Analysis
  // ===========================================================================

  /**
   * Similarity between recorded data and a vocabulary. Without `vocab`, the
   * vocabulary matching the data's width is taken from this module's map.
   */
  similarity(data: RecordedData, recording: Recording, vocab?: Vocabulary): number[][] {
    const rows = data.get(recording);
    if (!rows) {
      throw new RecordingNotFoundError(recording.label ?? 'unlabeled');
    }
    const width = rows.length > 0 ? rows[0].length : 0;
    const target = vocab ?? this.vocabs.get(width);
    if (!target) {
      throw new VocabularyNotFoundError(width);
    }
    return similarity(rows, target);
  }
}

// =============================================================================
// Helpers
// =============================================================================

function initialVocabs(
  vocabs: VocabularyMap | Iterable<Vocabulary> | undefined,
  seed: number | undefined
): VocabularyMap {
  if (vocabs instanceof VocabularyMap) {
    return vocabs;
  }
  if (vocabs === undefined) {
    const inherited = lookupDefault(Module, 'vocabs')?.value;
    if (inherited instanceof VocabularyMap) {
      return inherited;
    }
  }
  return new VocabularyMap({
    vocabs: vocabs ?? [],
    rng: seed === undefined ? undefined : mulberry32(seed),
  });
}

function inheritedDiagnostics(): DiagnosticChannel | undefined {
  const inherited = lookupDefault(Module, 'diagnostics')?.value;
  return inherited instanceof DiagnosticChannel ? inherited : undefined;
}
