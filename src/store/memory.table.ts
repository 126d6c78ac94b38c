import { UniqueConstraintError } from '../types/error.types';

// Undo entries recorded by a transaction, replayed in reverse on rollback
export type Journal = Array<() => void>;

export interface UniqueKey<T> {
  name: string;
  key: (row: T) => string;
}

export interface MemoryTableOptions<T> {
  groupBy?: (row: T) => string;
  unique?: UniqueKey<T>[];
}

/**
 * One in-process table: rows by id, an optional secondary grouping and
 * declared unique keys. Every mutation records its inverse in the journal.
 *
 * Rows go in and out as clones so callers never alias stored state.
 * Updates must not change a unique key or the grouping column.
 */
export class MemoryTable<T extends { id: string }> {
  private rows: Map<string, T> = new Map();
  private groups: Map<string, Set<string>> = new Map();
  private uniqueIndexes: Map<string, Map<string, string>> = new Map();

  constructor(private options: MemoryTableOptions<T> = {}) {
    for (const unique of options.unique ?? []) {
      this.uniqueIndexes.set(unique.name, new Map());
    }
  }

  get size(): number {
    return this.rows.size;
  }

  find(id: string): T | null {
    const row = this.rows.get(id);
    return row ? structuredClone(row) : null;
  }

  findByUnique(name: string, value: string): T | null {
    const id = this.uniqueIndexes.get(name)?.get(value);
    return id === undefined ? null : this.find(id);
  }

  findInGroup(group: string): T[] {
    const ids = this.groups.get(group);
    if (!ids) return [];
    const rows: T[] = [];
    for (const id of ids) {
      const row = this.rows.get(id);
      if (row) rows.push(structuredClone(row));
    }
    return rows;
  }

  all(): T[] {
    return Array.from(this.rows.values(), (row) => structuredClone(row));
  }

  insert(row: T, journal: Journal): T {
    if (this.rows.has(row.id)) {
      throw new UniqueConstraintError('primary_key');
    }
    for (const unique of this.options.unique ?? []) {
      if (this.uniqueIndexes.get(unique.name)?.has(unique.key(row))) {
        throw new UniqueConstraintError(unique.name);
      }
    }

    const stored = structuredClone(row);
    this.attach(stored);
    journal.push(() => this.detach(stored));
    return structuredClone(stored);
  }

  update(id: string, patch: Partial<T>, journal: Journal): T {
    const previous = this.rows.get(id);
    if (!previous) {
      throw new Error(`Row ${id} does not exist`);
    }

    const next: T = { ...previous, ...structuredClone(patch) };
    this.rows.set(id, next);
    journal.push(() => this.rows.set(id, previous));
    return structuredClone(next);
  }

  delete(id: string, journal: Journal): boolean {
    const previous = this.rows.get(id);
    if (!previous) return false;

    this.detach(previous);
    journal.push(() => this.attach(previous));
    return true;
  }

  private attach(row: T): void {
    this.rows.set(row.id, row);
    for (const unique of this.options.unique ?? []) {
      this.uniqueIndexes.get(unique.name)?.set(unique.key(row), row.id);
    }
    if (this.options.groupBy) {
      const group = this.options.groupBy(row);
      let ids = this.groups.get(group);
      if (!ids) {
        ids = new Set();
        this.groups.set(group, ids);
      }
      ids.add(row.id);
    }
  }

  private detach(row: T): void {
    this.rows.delete(row.id);
    for (const unique of this.options.unique ?? []) {
      this.uniqueIndexes.get(unique.name)?.delete(unique.key(row));
    }
    if (this.options.groupBy) {
      this.groups.get(this.options.groupBy(row))?.delete(row.id);
    }
  }
}
