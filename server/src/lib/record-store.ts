import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { SupabaseClient } from '@supabase/supabase-js';
import type {
  Application,
  CouncilDecision,
  Observation,
  TeamProfile,
} from '../agents/types.js';

export interface RecordKinds {
  application: Application;
  decision: CouncilDecision;
  observation: Observation;
  team: TeamProfile;
}

export type RecordKind = keyof RecordKinds;

export type RecordFilter<K extends RecordKind> = (record: RecordKinds[K]) => boolean;

/**
 * Key/value persistence for the four council record kinds. Records are
 * stored whole; `put` replaces any record with the same kind and id.
 */
export interface RecordStore {
  put<K extends RecordKind>(kind: K, id: string, record: RecordKinds[K]): Promise<void>;
  get<K extends RecordKind>(kind: K, id: string): Promise<RecordKinds[K] | null>;
  list<K extends RecordKind>(kind: K, filter?: RecordFilter<K>): Promise<RecordKinds[K][]>;
}

// ─── In-memory ───────────────────────────────────────────────────────

type MemoryTables = { [K in RecordKind]: Map<string, RecordKinds[K]> };

function emptyTables(): MemoryTables {
  return { application: new Map(), decision: new Map(), observation: new Map(), team: new Map() };
}

/** Process-local store; every read and write copies, so callers never share references. */
export class MemoryRecordStore implements RecordStore {
  private tables: MemoryTables = emptyTables();

  async put<K extends RecordKind>(kind: K, id: string, record: RecordKinds[K]): Promise<void> {
    const table: Map<string, RecordKinds[K]> = this.tables[kind];
    table.set(id, structuredClone(record));
  }

  async get<K extends RecordKind>(kind: K, id: string): Promise<RecordKinds[K] | null> {
    const table: Map<string, RecordKinds[K]> = this.tables[kind];
    const stored = table.get(id);
    return stored === undefined ? null : structuredClone(stored);
  }

  async list<K extends RecordKind>(kind: K, filter?: RecordFilter<K>): Promise<RecordKinds[K][]> {
    const table: Map<string, RecordKinds[K]> = this.tables[kind];
    const all = [...table.values()].map((r) => structuredClone(r));
    return filter ? all.filter(filter) : all;
  }

  clear(): void {
    this.tables = emptyTables();
  }
}

// ─── JSON files (one per kind under DATA_DIR) ────────────────────────

export class FileRecordStore implements RecordStore {
  private readonly writeChains = new Map<RecordKind, Promise<void>>();

  constructor(private readonly dir: string) {}

  async put<K extends RecordKind>(kind: K, id: string, record: RecordKinds[K]): Promise<void> {
    // Writes to one kind are serialized so concurrent puts never drop each other
    const previous = this.writeChains.get(kind) ?? Promise.resolve();
    const next = previous.then(async () => {
      const table = await this.readTable(kind);
      table[id] = record;
      await this.writeTable(kind, table);
    });
    this.writeChains.set(kind, next.catch(() => undefined));
    await next;
  }

  async get<K extends RecordKind>(kind: K, id: string): Promise<RecordKinds[K] | null> {
    await this.writeChains.get(kind);
    const table = await this.readTable(kind);
    return (table[id] as RecordKinds[K] | undefined) ?? null;
  }

  async list<K extends RecordKind>(kind: K, filter?: RecordFilter<K>): Promise<RecordKinds[K][]> {
    await this.writeChains.get(kind);
    const table = await this.readTable(kind);
    const all = Object.values(table).map((r) => r as RecordKinds[K]);
    return filter ? all.filter(filter) : all;
  }

  private filePath(kind: RecordKind): string {
    return path.join(this.dir, `${kind}s.json`);
  }

  private async readTable(kind: RecordKind): Promise<Record<string, unknown>> {
    let raw: string;
    try {
      raw = await readFile(this.filePath(kind), 'utf8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return {};
      throw err;
    }
    const parsed: unknown = JSON.parse(raw);
    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
      throw new Error(`Corrupt record file ${this.filePath(kind)}`);
    }
    return Object.fromEntries(Object.entries(parsed));
  }

  private async writeTable(kind: RecordKind, table: Record<string, unknown>): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    const target = this.filePath(kind);
    const tmp = `${target}.tmp`;
    await writeFile(tmp, JSON.stringify(table, null, 2), 'utf8');
    await rename(tmp, target);
  }
}

// ─── Supabase (table council_records: kind, id, data jsonb) ──────────

const RECORDS_TABLE = 'council_records';

export class SupabaseRecordStore implements RecordStore {
  constructor(private readonly client: SupabaseClient) {}

  async put<K extends RecordKind>(kind: K, id: string, record: RecordKinds[K]): Promise<void> {
    const { error } = await this.client
      .from(RECORDS_TABLE)
      .upsert(
        { kind, id, data: record, updated_at: new Date().toISOString() },
        { onConflict: 'kind,id' },
      );
    if (error) {
      throw new Error(`Failed to save ${kind} ${id}: ${error.message}`);
    }
  }

  async get<K extends RecordKind>(kind: K, id: string): Promise<RecordKinds[K] | null> {
    const { data, error } = await this.client
      .from(RECORDS_TABLE)
      .select('data')
      .eq('kind', kind)
      .eq('id', id)
      .maybeSingle();
    if (error) {
      throw new Error(`Failed to load ${kind} ${id}: ${error.message}`);
    }
    return data ? (data.data as RecordKinds[K]) : null;
  }

  async list<K extends RecordKind>(kind: K, filter?: RecordFilter<K>): Promise<RecordKinds[K][]> {
    const { data, error } = await this.client
      .from(RECORDS_TABLE)
      .select('data')
      .eq('kind', kind);
    if (error) {
      throw new Error(`Failed to list ${kind} records: ${error.message}`);
    }
    const all = (data ?? []).map((row: { data: unknown }) => row.data as RecordKinds[K]);
    return filter ? all.filter(filter) : all;
  }
}
