/**
 * Base composable network
 *
 * Networks nest: a network constructed while another network's scope is
 * open is appended to that network's `networks`. Each network also holds
 * per-class configuration defaults that apply to objects built inside
 * its scope.
 */

// =============================================================================
// Configuration
// =============================================================================

/** Any class whose instances can be configured */
export type ConfigurableClass = abstract new (...args: never[]) => object;

export interface ConfigEntry {
  value: unknown;
}

export class NetworkConfig {
  private readonly entries = new Map<Function, Map<string, unknown>>();

  configures(...classes: ConfigurableClass[]): void {
    for (const cls of classes) {
      if (!this.entries.has(cls)) {
        this.entries.set(cls, new Map());
      }
    }
  }

  isConfigured(cls: ConfigurableClass): boolean {
    return this.entries.has(cls);
  }

  set(cls: ConfigurableClass, key: string, value: unknown): void {
    const params = this.entries.get(cls);
    if (!params) {
      throw new Error(`${cls.name} is not configured; call configures(${cls.name}) first`);
    }
    params.set(key, value);
  }

  /**
   * Find a default for `key`, checking `cls` first and then its ancestors.
   */
  lookup(cls: Function, key: string): ConfigEntry | undefined {
    let current: Function | null = cls;
    while (current) {
      const params = this.entries.get(current);
      if (params?.has(key)) {
        return { value: params.get(key) };
      }
      current = Object.getPrototypeOf(current);
    }
    return undefined;
  }
}

// =============================================================================
// Scope Stack
// =============================================================================

const scopeStack: Network[] = [];

/**
 * Resolve a configured default from the open scopes, innermost first.
 */
export function lookupDefault(cls: Function, key: string): ConfigEntry | undefined {
  for (let i = scopeStack.length - 1; i >= 0; i--) {
    const found = scopeStack[i].config.lookup(cls, key);
    if (found) {
      return found;
    }
  }
  return undefined;
}

// =============================================================================
// Network
// =============================================================================

export interface NetworkOptions {
  label?: string;
  seed?: number;
  /** Append to the innermost open scope. Defaults to true when one is open. */
  addToContainer?: boolean;
}

/** Passed to exit() when the scope closes because of an error */
export interface ScopeFailure {
  error: unknown;
}

export class Network {
  readonly seed: number | undefined;
  /** Networks constructed inside this network's scope */
  readonly networks: Network[] = [];
  readonly config = new NetworkConfig();
  private currentLabel: string | undefined;

  constructor(options: NetworkOptions = {}) {
    this.currentLabel = options.label;
    this.seed = options.seed;

    const addToContainer = options.addToContainer ?? scopeStack.length > 0;
    if (addToContainer) {
      const container = Network.current();
      if (!container) {
        throw new Error(`Cannot add ${this} to a container: no network scope is open`);
      }
      container.networks.push(this);
    }
  }

  static current(): Network | undefined {
    return scopeStack[scopeStack.length - 1];
  }

  static get context(): readonly Network[] {
    return scopeStack;
  }

  get label(): string | undefined {
    return this.currentLabel;
  }

  /** Set the label unless one is already assigned */
  labelIfUnset(label: string): boolean {
    if (this.currentLabel !== undefined) {
      return false;
    }
    this.currentLabel = label;
    return true;
  }

  enter(): this {
    scopeStack.push(this);
    return this;
  }

  /**
   * Close this network's scope. On failure, scopes still open inside this
   * one are closed too and nothing is thrown, so the failure propagates
   * unchanged.
   */
  exit(failure?: ScopeFailure): void {
    const index = scopeStack.lastIndexOf(this);
    if (failure) {
      if (index >= 0) {
        scopeStack.length = index;
      }
      return;
    }
    if (index < 0) {
      throw new Error(`Network scope of ${this} is not open`);
    }
    if (index !== scopeStack.length - 1) {
      scopeStack.length = index;
      throw new Error(`Network scope of ${this} closed out of order`);
    }
    scopeStack.pop();
  }

  /**
   * Run `fn` with this network's scope open. Errors thrown by `fn` are
   * passed to exit() and then rethrown unchanged.
   */
  build<T>(fn: (net: this) => T): T {
    this.enter();
    let result: T;
    try {
      result = fn(this);
    } catch (error) {
      this.exit({ error });
      throw error;
    }
    this.exit();
    return result;
  }

  toString(): string {
    const kind = this.constructor.name;
    return this.label === undefined ? `<${kind} (unlabeled)>` : `<${kind} "${this.label}">`;
  }
}
