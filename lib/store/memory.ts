import { emptyTables, type RecordStore, type Tables } from '@/lib/store/records';

export class MemoryRecordStore implements RecordStore {
  private tables: Tables;

  constructor(initial?: Tables) {
    this.tables = initial ? structuredClone(initial) : emptyTables();
  }

  async read<T>(fn: (tables: Readonly<Tables>) => T): Promise<T> {
    return fn(structuredClone(this.tables));
  }

  async transact<T>(fn: (tables: Tables) => T): Promise<T> {
    const draft = structuredClone(this.tables);
    const result = fn(draft);
    this.tables = draft;
    return result;
  }

  // Test hook for corrupting or inspecting raw rows.
  snapshot(): Tables {
    return structuredClone(this.tables);
  }
}
