/**
 * GroupPolicy — capacity admission and idle-unload selection for groups.
 *
 * Pure reads over the registry; it decides, callers act.
 */

import type { ModelRegistry } from './registry';
import type { GroupSpec, WorkerEntry } from './types';

export type Admission =
  | { readonly kind: 'allow' }
  | { readonly kind: 'evict'; readonly victim: string }
  | { readonly kind: 'reject'; readonly reason: string };

const MS_PER_MINUTE = 60_000;

/** Oldest `startedAt` first; equal timestamps fall back to name order. */
export function byAge(a: WorkerEntry, b: WorkerEntry): number {
  const delta = (a.runtime.startedAt ?? 0) - (b.runtime.startedAt ?? 0);
  if (delta !== 0) return delta;
  return a.spec.name < b.spec.name ? -1 : a.spec.name > b.spec.name ? 1 : 0;
}

export class GroupPolicy {
  constructor(private readonly registry: ModelRegistry) {}

  /** Idle unload applies only when every member of the group is JIT. */
  idleUnloadActive(group: GroupSpec): boolean {
    if (group.idleUnloadTriggerMin === null) return false;
    const members = this.registry.members(group.name);
    return members.length > 0 && members.every(m => m.spec.jitEnabled);
  }

  running(groupName: string): WorkerEntry[] {
    return this.registry.members(groupName).filter(m => m.runtime.status === 'Running');
  }

  /** Members occupying a slot: running, or on their way to running. */
  occupying(groupName: string): WorkerEntry[] {
    return this.registry.members(groupName).filter(m => m.runtime.status === 'Running' || m.runtime.status === 'Starting');
  }

  admit(name: string): Admission {
    const { spec, runtime } = this.registry.get(name);
    if (spec.group === null) return { kind: 'allow' };
    if (runtime.status === 'Running') return { kind: 'allow' };

    const group = this.registry.group(spec.group);
    if (!group || group.maxLoaded === null) return { kind: 'allow' };

    const others = this.occupying(spec.group).filter(m => m.spec.name !== name);
    if (others.length < group.maxLoaded) return { kind: 'allow' };

    const [victim] = others.filter(m => m.runtime.status === 'Running').sort(byAge);
    if (!victim) {
      return {
        kind:   'reject',
        reason: `Group '${group.name}' is full (${others.length}/${group.maxLoaded}) and no member can be evicted yet`,
      };
    }
    return { kind: 'evict', victim: victim.spec.name };
  }

  idleCandidates(now: number): string[] {
    const names: string[] = [];
    for (const group of this.registry.groups()) {
      if (!this.idleUnloadActive(group) || group.idleUnloadTriggerMin === null) continue;
      const limitMs = group.idleUnloadTriggerMin * MS_PER_MINUTE;
      for (const member of this.running(group.name)) {
        const last = member.runtime.lastActivityAt ?? member.runtime.startedAt ?? now;
        if (now - last >= limitMs) names.push(member.spec.name);
      }
    }
    return names;
  }

  /** Running members beyond each group's cap, oldest first. */
  overCapacity(): string[] {
    const victims: string[] = [];
    for (const group of this.registry.groups()) {
      if (group.maxLoaded === null) continue;
      const running = this.running(group.name).sort(byAge);
      const excess = running.length - group.maxLoaded;
      for (const member of running.slice(0, Math.max(0, excess))) victims.push(member.spec.name);
    }
    return victims;
  }
}
