/**
 * Similarity between recorded vectors and a vocabulary's pointers
 */

import type { Vocabulary } from './vocab';

/**
 * Dot product of every row against every pointer in the vocabulary.
 * Result is indexed [row][key], keys in `vocab.keys` order.
 */
export function similarity(rows: number[][], vocab: Vocabulary): number[][] {
  const vectors = vocab.vectors;

  return rows.map(row => {
    if (row.length !== vocab.dimension) {
      throw new Error(`Dimension mismatch: ${row.length} vs ${vocab.dimension}`);
    }
    return vectors.map(v => {
      let dot = 0;
      for (let i = 0; i < v.length; i++) {
        dot += row[i] * v[i];
      }
      return dot;
    });
  });
}
