import { describe, expect, it } from 'vitest';
import { HubError } from './errors';
import { ModelRegistry, freshRuntime } from './registry';
import type { ModelSpec } from './types';

function model(name: string, group: string | null = null): ModelSpec {
  return { name, modelPath: `/models/${name}`, host: '127.0.0.1', port: null, jitEnabled: true, group, options: [] };
}

describe('ModelRegistry', () => {
  it('keeps runtime state when a spec is replaced', () => {
    const registry = new ModelRegistry();
    const first = registry.upsertSpec(model('a'), () => freshRuntime(5005, '/logs/a.log'));
    first.runtime.status = 'Running';

    const updated = { ...model('a'), modelPath: '/models/a-v2' };
    registry.upsertSpec(updated, () => freshRuntime(6000, '/logs/other.log'));

    const entry = registry.get('a');
    expect(entry.spec.modelPath).toBe('/models/a-v2');
    expect(entry.runtime.status).toBe('Running');
    expect(entry.runtime.assignedPort).toBe(5005);
  });

  it('throws NotFound for unknown names', () => {
    const registry = new ModelRegistry();
    expect(() => registry.get('ghost')).toThrow(HubError);
    expect(registry.find('ghost')).toBeUndefined();
  });

  it('only moves last activity forward', () => {
    const registry = new ModelRegistry();
    registry.upsertSpec(model('a'), () => freshRuntime(5005, '/logs/a.log'));

    registry.recordActivity('a', 2_000);
    registry.recordActivity('a', 1_000);
    expect(registry.get('a').runtime.lastActivityAt).toBe(2_000);
  });

  it('reorders to config order and keeps unlisted entries at the end', () => {
    const registry = new ModelRegistry();
    for (const [i, name] of ['a', 'b', 'c'].entries()) {
      registry.upsertSpec(model(name), () => freshRuntime(5005 + i, `/logs/${name}.log`));
    }

    registry.reorder(['c', 'a']);
    expect(registry.names()).toEqual(['c', 'a', 'b']);
  });

  it('lists group members', () => {
    const registry = new ModelRegistry();
    registry.setGroups([{ name: 'g', maxLoaded: 1, idleUnloadTriggerMin: null }]);
    registry.upsertSpec(model('a', 'g'), () => freshRuntime(5005, '/logs/a.log'));
    registry.upsertSpec(model('b'), () => freshRuntime(5006, '/logs/b.log'));

    expect(registry.group('g')?.maxLoaded).toBe(1);
    expect(registry.members('g').map(e => e.spec.name)).toEqual(['a']);
  });
});
