/**
 * Reconciler — diff the running fleet against a new config snapshot.
 *
 * Pure: it only decides. HubRuntime applies the actions under worker locks.
 */

import { specFingerprint } from './config';
import type { ModelSpec } from './types';

export type ReconcileAction =
  | { readonly kind: 'add'; readonly name: string; readonly start: boolean }
  | { readonly kind: 'remove'; readonly name: string }
  | { readonly kind: 'restart'; readonly name: string; readonly reason: 'spec' | 'port' }
  | { readonly kind: 'keep'; readonly name: string };

export interface FleetSnapshot {
  readonly specs: readonly ModelSpec[];
  /** Port each worker is using (current) or will use (next). */
  readonly ports: ReadonlyMap<string, number>;
}

/**
 * Actions for every name in either snapshot, in the new config's order with
 * removals last. A spec that is unchanged but whose resolved port moved
 * still needs a restart: a live worker never changes port.
 */
export function reconcile(current: FleetSnapshot, next: FleetSnapshot): ReconcileAction[] {
  const before = new Map(current.specs.map(s => [s.name, s]));
  const actions: ReconcileAction[] = [];

  for (const spec of next.specs) {
    const old = before.get(spec.name);
    if (!old) {
      actions.push({ kind: 'add', name: spec.name, start: !spec.jitEnabled });
      continue;
    }
    if (specFingerprint(old) !== specFingerprint(spec)) {
      actions.push({ kind: 'restart', name: spec.name, reason: 'spec' });
    } else if (current.ports.get(spec.name) !== next.ports.get(spec.name)) {
      actions.push({ kind: 'restart', name: spec.name, reason: 'port' });
    } else {
      actions.push({ kind: 'keep', name: spec.name });
    }
  }

  const incoming = new Set(next.specs.map(s => s.name));
  for (const spec of current.specs) {
    if (!incoming.has(spec.name)) actions.push({ kind: 'remove', name: spec.name });
  }
  return actions;
}
