import { port, type Vocabulary, type VocabularyBinding } from '@spa/core';
import { Module, type ModuleOptions } from '../module.js';

/** Module with one input and one output of the given dimensionality */
export class Relay extends Module {
  constructor(dimensions: number, options: ModuleOptions = {}) {
    super(options);
    this.inputs.set('default', port({ node: 'input' }, dimensions));
    this.outputs.set('default', port({ node: 'output' }, dimensions));
  }
}

/** Module exposing arbitrary named ports */
export class PortModule extends Module {
  constructor(inputs: string[], outputs: string[], dimensions = 16, options: ModuleOptions = {}) {
    super(options);
    for (const name of inputs) {
      this.inputs.set(name, port({ node: `in:${name}` }, dimensions));
    }
    for (const name of outputs) {
      this.outputs.set(name, port({ node: `out:${name}` }, dimensions));
    }
  }
}

export function vocabOf(binding: VocabularyBinding): Vocabulary {
  if (binding.kind !== 'resolved') {
    throw new Error(`binding still raw (dimension ${binding.dimension})`);
  }
  return binding.vocab;
}
