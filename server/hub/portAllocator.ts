/**
 * PortAllocator — stable TCP ports for workers.
 *
 * Explicit ports are reserved as configured. Workers without one keep their
 * previous (persisted) assignment unless something explicit now claims it;
 * otherwise they get the lowest free port at or above the starting port.
 * Assignments are released only when a worker leaves the configuration.
 */

import type { PortAssignment, PortStore } from '../db/portStore';
import { createLogger } from '../lib/logger';
import { Mutex } from '../lib/mutex';
import { isPortAvailable } from '../lib/network';
import { HubError } from './errors';
import type { ModelSpec } from './types';

const log = createLogger('ports');

const MAX_PORT = 65535;

export type PortProbe = (host: string, port: number) => Promise<boolean>;

export interface ResolveOptions {
  /** Ports no worker may take (the hub's own control port). */
  reserved?: Iterable<number>;
}

export class PortAllocator {
  private assignments = new Map<string, PortAssignment>();
  private readonly lock = new Mutex();

  constructor(
    private startingPort: number,
    private readonly store: PortStore,
    private readonly probe: PortProbe = isPortAvailable,
  ) {
    for (const row of store.loadAll()) this.assignments.set(row.name, row);
  }

  setStartingPort(port: number): void {
    this.startingPort = port;
  }

  /**
   * Resolve a whole configuration at once; daemon start and every reload
   * come through here. Names absent from `specs` are released. Nothing is
   * committed if any worker cannot be placed; a clash of explicit ports, or
   * one on a reserved port, is a `PortConflict`.
   */
  resolveAll(specs: readonly ModelSpec[], opts: ResolveOptions = {}): Promise<Map<string, number>> {
    return this.lock.runExclusive(async () => {
      const reserved = new Set(opts.reserved);
      const next = new Map<string, PortAssignment>();
      const owners = new Map<number, string>();

      for (const spec of specs) {
        if (spec.port === null) continue;
        const owner = owners.get(spec.port);
        if (owner !== undefined || reserved.has(spec.port)) {
          throw new HubError('PortConflict', `Port ${spec.port} requested by '${spec.name}' is already reserved${owner ? ` by '${owner}'` : ''}`);
        }
        owners.set(spec.port, spec.name);
        next.set(spec.name, { name: spec.name, port: spec.port, explicit: true });
      }

      // Keep prior ports before handing out fresh ones, so a newcomer
      // never takes the port an existing worker is about to reuse.
      const fresh: ModelSpec[] = [];
      for (const spec of specs) {
        if (spec.port !== null) continue;
        const prior = this.assignments.get(spec.name);
        if (prior && !owners.has(prior.port) && !reserved.has(prior.port)) {
          owners.set(prior.port, spec.name);
          next.set(spec.name, { name: spec.name, port: prior.port, explicit: false });
        } else {
          fresh.push(spec);
        }
      }

      for (const spec of fresh) {
        const port = await this.lowestFree(spec.host, new Set([...owners.keys(), ...reserved]));
        const prior = this.assignments.get(spec.name);
        if (prior) log.info(`Port for '${spec.name}' changed ${prior.port} → ${port}`);
        owners.set(port, spec.name);
        next.set(spec.name, { name: spec.name, port, explicit: false });
      }

      for (const [name, a] of this.assignments) {
        if (!next.has(name)) log.info(`Released port ${a.port} held by removed worker '${name}'`);
      }

      this.commit(next);
      return new Map([...next].map(([name, a]) => [name, a.port]));
    });
  }

  private async lowestFree(host: string, blocked: ReadonlySet<number>): Promise<number> {
    for (let port = this.startingPort; port <= MAX_PORT; port++) {
      if (blocked.has(port)) continue;
      if (await this.probe(host, port)) return port;
      log.debug(`Port ${port} is busy on ${host}; skipping`);
    }
    throw new HubError('PortConflict', `No free port at or above ${this.startingPort}`);
  }

  private commit(next: Map<string, PortAssignment>): void {
    this.store.replaceAll([...next.values()]);
    this.assignments = next;
  }
}
