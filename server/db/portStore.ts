import type { HubDatabase } from './schema';

export interface PortAssignment {
  name:     string;
  port:     number;
  explicit: boolean;
}

/** Durable home of the allocator's name → port map. */
export interface PortStore {
  loadAll(): PortAssignment[];
  /** Replace the whole table in one transaction. */
  replaceAll(assignments: readonly PortAssignment[]): void;
}

interface PortRow {
  name:     string;
  port:     number;
  explicit: number;
}

export class SqlitePortStore implements PortStore {
  constructor(private readonly db: HubDatabase) {}

  loadAll(): PortAssignment[] {
    return this.db
      .prepare<[], PortRow>('SELECT name, port, explicit FROM port_assignments ORDER BY name')
      .all()
      .map(row => ({ name: row.name, port: row.port, explicit: row.explicit === 1 }));
  }

  replaceAll(assignments: readonly PortAssignment[]): void {
    const clear  = this.db.prepare('DELETE FROM port_assignments');
    const insert = this.db.prepare<[string, number, number]>(
      'INSERT INTO port_assignments (name, port, explicit) VALUES (?, ?, ?)',
    );
    this.db.transaction((rows: readonly PortAssignment[]) => {
      clear.run();
      for (const row of rows) insert.run(row.name, row.port, row.explicit ? 1 : 0);
    })(assignments);
  }
}
