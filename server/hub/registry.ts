/**
 * ModelRegistry — in-memory worker table and group snapshot.
 *
 * Single source of truth for the rest of the hub. Holds no process or network
 * handles of its own; the supervisor writes `runtime.process` on its behalf.
 */

import { HubError } from './errors';
import type { GroupSpec, ModelSpec, RuntimeState, WorkerEntry } from './types';

interface MutableEntry {
  spec: ModelSpec;
  runtime: RuntimeState;
}

export function freshRuntime(assignedPort: number, logPath: string): RuntimeState {
  return {
    status:          'Stopped',
    process:         null,
    assignedPort,
    startedAt:       null,
    lastActivityAt:  null,
    lastExitCode:    null,
    lastError:       null,
    logPath,
    stopRequested:   null,
    restartAttempts: 0,
    nextRestartAt:   null,
  };
}

export class ModelRegistry {
  // Map iteration order follows config order, which status output relies on.
  private entries = new Map<string, MutableEntry>();
  private groupTable = new Map<string, GroupSpec>();

  /** Throws `NotFound` for unknown names. */
  get(name: string): WorkerEntry {
    const entry = this.entries.get(name);
    if (!entry) throw new HubError('NotFound', `Unknown model '${name}'`);
    return entry;
  }

  find(name: string): WorkerEntry | undefined {
    return this.entries.get(name);
  }

  list(): WorkerEntry[] {
    return [...this.entries.values()];
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  upsertSpec(spec: ModelSpec, runtime: () => RuntimeState): WorkerEntry {
    const existing = this.entries.get(spec.name);
    if (existing) {
      existing.spec = spec;
      return existing;
    }
    const entry = { spec, runtime: runtime() };
    this.entries.set(spec.name, entry);
    return entry;
  }

  setRuntime(name: string, runtime: RuntimeState): void {
    const entry = this.entries.get(name);
    if (!entry) throw new HubError('NotFound', `Unknown model '${name}'`);
    entry.runtime = runtime;
  }

  remove(name: string): void {
    this.entries.delete(name);
  }

  /** Re-order entries to match the config snapshot's model order. */
  reorder(names: readonly string[]): void {
    const next = new Map<string, MutableEntry>();
    for (const name of names) {
      const entry = this.entries.get(name);
      if (entry) next.set(name, entry);
    }
    for (const [name, entry] of this.entries) {
      if (!next.has(name)) next.set(name, entry);
    }
    this.entries = next;
  }

  recordActivity(name: string, timestamp: number): void {
    const { runtime } = this.get(name);
    if (runtime.lastActivityAt === null || timestamp > runtime.lastActivityAt) {
      runtime.lastActivityAt = timestamp;
    }
  }

  // --- Groups ---

  setGroups(groups: readonly GroupSpec[]): void {
    this.groupTable = new Map(groups.map(g => [g.name, g]));
  }

  group(name: string): GroupSpec | undefined {
    return this.groupTable.get(name);
  }

  groups(): GroupSpec[] {
    return [...this.groupTable.values()];
  }

  members(groupName: string): WorkerEntry[] {
    return this.list().filter(e => e.spec.group === groupName);
  }
}
