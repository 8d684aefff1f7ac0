import { describe, it, expect } from 'vitest';
import { DiagnosticChannel, ModuleNotFoundError, PortNotFoundError, type Diagnostic } from '@spa/core';
import { Module } from '../module.js';
import { splitPath, pathSegments, splitLegacyName } from '../resolver.js';
import { Relay, PortModule } from './fixtures.js';

function recording(): { channel: DiagnosticChannel; seen: Diagnostic[] } {
  const channel = new DiagnosticChannel();
  const seen: Diagnostic[] = [];
  channel.subscribe(d => seen.push(d));
  return { channel, seen };
}

describe('path helpers', () => {
  it('splits a path into head and remainder', () => {
    expect(splitPath('a.b.c')).toEqual({ head: 'a', rest: 'b.c' });
    expect(splitPath('a')).toEqual({ head: 'a', rest: undefined });
  });

  it('walks every segment', () => {
    expect([...pathSegments('a.b.c')].map(s => s.head)).toEqual(['a', 'b', 'c']);
  });

  it('splits legacy names on the last underscore', () => {
    expect(splitLegacyName('my_module_x')).toEqual({ module: 'my_module', port: 'x' });
    expect(splitLegacyName('plain')).toBeUndefined();
  });
});

describe('getModule', () => {
  const root = new Module({ label: 'root' });
  const outer = root.add('outer', new Module());
  const inner = outer.add('inner', new PortModule(['in'], ['X']));

  it('finds direct and nested children', () => {
    expect(root.getModule('outer')).toBe(outer);
    expect(root.getModule('outer.inner')).toBe(inner);
  });

  it('resolves a port name to its module with stripOutput', () => {
    expect(root.getModule('outer.inner.X', true)).toBe(inner);
    expect(root.getModule('outer.inner.in', true)).toBe(inner);
  });

  it('does not match port names without stripOutput', () => {
    expect(() => root.getModule('outer.inner.X')).toThrow(ModuleNotFoundError);
  });

  it('reports the full requested path', () => {
    expect(() => root.getModule('missing.inner')).toThrow("Could not find module 'missing.inner'.");
    expect(() => root.getModule('outer.nope')).toThrow("Could not find module 'outer.nope'.");
  });
});

describe('getModuleInput / getModuleOutput', () => {
  it('resolves dotted paths to the child port', () => {
    const a = new Module({ label: 'A' });
    const b = a.add('B', new PortModule([], ['X']));
    expect(a.getModuleOutput('B.X')).toBe(b.getModuleOutput('X'));
  });

  it('resolves a bare child name to its default port', () => {
    const a = new Module();
    const m = a.add('M', new Relay(16));
    expect(a.getModuleInput('M')).toBe(m.inputs.get('default'));
    expect(a.getModuleOutput('M')).toBe(m.outputs.get('default'));
  });

  it('prefers the module own ports', () => {
    const a = new PortModule(['M'], []);
    a.add('M', new Relay(16));
    expect(a.getModuleInput('M')).toBe(a.inputs.get('M'));
  });

  it('resolves across several levels', () => {
    const root = new Module();
    const mid = root.add('mid', new Module());
    const leaf = mid.add('leaf', new PortModule(['a'], ['b']));
    expect(root.getModuleInput('mid.leaf.a')).toBe(leaf.inputs.get('a'));
    expect(root.getModuleOutput('mid.leaf.b')).toBe(leaf.outputs.get('b'));
  });

  it('accepts the legacy underscore form with a diagnostic', () => {
    const { channel, seen } = recording();
    const a = new Module({ diagnostics: channel });
    a.add('M', new Relay(16));

    const dotted = a.getModuleOutput('M');
    expect(seen).toHaveLength(0);

    expect(a.getModuleOutput('M_default')).toBe(dotted);
    expect(seen).toHaveLength(1);
    expect(seen[0].code).toBe('spa.naming.underscore-deprecated');
    expect(seen[0].subject).toBe('M_default');
  });

  it('splits only on the last underscore', () => {
    const { channel, seen } = recording();
    const a = new Module({ diagnostics: channel });
    const m = a.add('my_module', new PortModule(['x'], []));
    a.add('my', new PortModule(['module_x'], []));
    expect(a.getModuleInput('my_module_x')).toBe(m.inputs.get('x'));
    expect(seen).toHaveLength(1);
  });

  it('reports the legacy form inside a nested path to the queried module', () => {
    const { channel, seen } = recording();
    const root = new Module({ diagnostics: channel });
    const mid = root.add('mid', new Module());
    const midSeen: Diagnostic[] = [];
    mid.diagnostics.subscribe(d => midSeen.push(d));
    const leaf = mid.add('leaf', new PortModule([], ['out']));

    expect(mid.diagnostics).not.toBe(channel);
    expect(root.getModuleOutput('mid.leaf_out')).toBe(leaf.outputs.get('out'));
    expect(seen.map(d => d.subject)).toEqual(['leaf_out']);
    expect(midSeen).toHaveLength(0);
  });

  it('fails without emitting a diagnostic when the legacy port is missing', () => {
    const { channel, seen } = recording();
    const a = new Module({ diagnostics: channel });
    a.add('M', new Relay(16));
    expect(() => a.getModuleInput('M_other')).toThrow(PortNotFoundError);
    expect(seen).toHaveLength(0);
  });

  it('fails for names matching nothing', () => {
    const p = new Module();
    p.add('m', new Relay(16));
    expect(() => p.getModuleInput('nonexistent')).toThrow(PortNotFoundError);
    expect(() => p.getModuleInput('nonexistent')).toThrow("Could not find module input 'nonexistent'.");
    expect(() => p.getModuleOutput('ghost.port')).toThrow("Could not find module output 'ghost.port'.");
  });

  it('fails for a child without a default port', () => {
    const p = new Module();
    p.add('m', new PortModule(['a'], ['b']));
    expect(() => p.getModuleInput('m')).toThrow(PortNotFoundError);
  });

  it('returns only the vocabulary binding from the vocab helpers', () => {
    const p = new Module();
    p.add('m', new Relay(16));
    expect(p.getInputVocab('m')).toBe(p.getModuleInput('m').binding);
    expect(p.getOutputVocab('m')).toEqual({ kind: 'resolved', vocab: p.vocabs.get(16) });
  });
});

describe('getModuleInputs / getModuleOutputs', () => {
  it('lists child ports in legacy form', () => {
    const p = new Module();
    p.add('m1', new PortModule(['default'], []));
    p.add('m2', new PortModule(['a', 'b'], ['c']));
    expect([...p.getModuleInputs()]).toEqual(['m1', 'm2_a', 'm2_b']);
    expect([...p.getModuleOutputs()]).toEqual(['m2_c']);
  });

  it('can be iterated more than once', () => {
    const p = new Module();
    p.add('buf', new Relay(16));
    const names = p.getModuleOutputs();
    expect([...names]).toEqual(['buf']);
    expect([...names]).toEqual(['buf']);
  });

  it('reflects children added after the call', () => {
    const p = new Module();
    const names = p.getModuleInputs();
    p.add('late', new Relay(16));
    expect([...names]).toEqual(['late']);
  });
});
