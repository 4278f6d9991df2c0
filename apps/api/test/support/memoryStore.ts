import type { AirtableRecord, RecordStore } from '../../src/providers/airtable.js';

type StoreCall = { op: 'find'; tableId: string; name: string } | { op: 'create'; tableId: string; fields: Record<string, unknown> };

/** In-process stand-in for the Airtable tables, matching on the Name field. */
export class MemoryRecordStore implements RecordStore {
  readonly calls: StoreCall[] = [];
  private readonly tables = new Map<string, AirtableRecord[]>();
  private nextId = 1;

  seed(tableId: string, id: string, name: string): this {
    this.rows(tableId).push({ id, fields: { Name: name } });
    return this;
  }

  rows(tableId: string): AirtableRecord[] {
    let rows = this.tables.get(tableId);
    if (!rows) {
      rows = [];
      this.tables.set(tableId, rows);
    }
    return rows;
  }

  names(tableId: string): unknown[] {
    return this.rows(tableId).map((r) => r.fields.Name);
  }

  async findIdByName(tableId: string, name: string): Promise<string | null> {
    this.calls.push({ op: 'find', tableId, name });
    const hit = this.rows(tableId).find((r) => r.fields.Name === name);
    return hit ? hit.id : null;
  }

  async create(tableId: string, fields: Record<string, unknown>): Promise<AirtableRecord> {
    this.calls.push({ op: 'create', tableId, fields });
    const record: AirtableRecord = { id: `rec_new_${this.nextId++}`, fields };
    this.rows(tableId).push(record);
    return record;
  }
}
