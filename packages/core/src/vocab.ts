/**
 * Vocabularies and the dimension-keyed VocabularyMap
 *
 * A Vocabulary is a fixed-dimensionality space of named semantic pointers.
 * Modules that declare the same dimensionality share one Vocabulary through
 * the VocabularyMap of their owning composition.
 */

import { checkDimension } from './types';
import { gaussian, type Rng } from './rng';

// =============================================================================
// Vocabulary
// =============================================================================

export class Vocabulary {
  readonly dimension: number;
  private readonly rng: Rng;
  private readonly pointers = new Map<string, Float64Array>();

  constructor(dimension: number, rng: Rng = Math.random) {
    this.dimension = checkDimension(dimension);
    this.rng = rng;
  }

  get keys(): string[] {
    return Array.from(this.pointers.keys());
  }

  get vectors(): Float64Array[] {
    return Array.from(this.pointers.values());
  }

  has(key: string): boolean {
    return this.pointers.has(key);
  }

  /** Add a pointer, drawing a random unit vector when none is given */
  add(key: string, vector?: ArrayLike<number>): Float64Array {
    if (this.pointers.has(key)) {
      throw new Error(`The semantic pointer '${key}' already exists`);
    }
    const v = vector ? Float64Array.from(vector) : this.randomUnitVector();
    if (v.length !== this.dimension) {
      throw new Error(
        `Pointer '${key}' has dimension ${v.length}, expected ${this.dimension}`
      );
    }
    this.pointers.set(key, v);
    return v;
  }

  /** Look up a pointer, creating it on first use */
  parse(key: string): Float64Array {
    return this.pointers.get(key) ?? this.add(key);
  }

  private randomUnitVector(): Float64Array {
    const v = new Float64Array(this.dimension);
    let norm = 0;
    for (let i = 0; i < this.dimension; i++) {
      v[i] = gaussian(this.rng);
      norm += v[i] * v[i];
    }
    norm = Math.sqrt(norm);
    for (let i = 0; i < this.dimension; i++) {
      v[i] /= norm;
    }
    return v;
  }
}

// =============================================================================
// VocabularyMap
// =============================================================================

export interface VocabularyMapOptions {
  vocabs?: Iterable<Vocabulary>;
  /** Random source handed to every vocabulary the map creates */
  rng?: Rng;
}

export class VocabularyMap implements Iterable<Vocabulary> {
  readonly rng: Rng | undefined;
  private readonly vocabs = new Map<number, Vocabulary>();

  constructor(options: VocabularyMapOptions = {}) {
    this.rng = options.rng;
    for (const vocab of options.vocabs ?? []) {
      this.add(vocab);
    }
  }

  get size(): number {
    return this.vocabs.size;
  }

  /**
   * Insert a vocabulary for its dimension. The last vocabulary added for a
   * dimension wins.
   */
  add(vocab: Vocabulary): void {
    if (this.vocabs.has(vocab.dimension)) {
      console.warn(
        `[VocabularyMap] Duplicate vocabularies with dimension ${vocab.dimension}. ` +
          'Using the last entry with that dimensionality.'
      );
    }
    this.vocabs.set(vocab.dimension, vocab);
  }

  /** Remove by dimension, or by handle when it is the one registered */
  discard(vocab: Vocabulary | number): void {
    if (typeof vocab === 'number') {
      this.vocabs.delete(vocab);
    } else if (this.vocabs.get(vocab.dimension) === vocab) {
      this.vocabs.delete(vocab.dimension);
    }
  }

  has(dimension: number): boolean {
    return this.vocabs.has(dimension);
  }

  get(dimension: number): Vocabulary | undefined {
    return this.vocabs.get(dimension);
  }

  getOrCreate(dimension: number): Vocabulary {
    const d = checkDimension(dimension);
    let vocab = this.vocabs.get(d);
    if (!vocab) {
      vocab = new Vocabulary(d, this.rng);
      this.vocabs.set(d, vocab);
    }
    return vocab;
  }

  [Symbol.iterator](): Iterator<Vocabulary> {
    return this.vocabs.values();
  }
}
