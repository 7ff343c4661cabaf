import { getDb } from '@agenda/shared';

/**
 * Display names for the references an appointment carries. Ids without an
 * entry are simply absent from the returned map.
 */
export interface NameDirectory {
  customerNames(ids: readonly number[]): Promise<Map<number, string>>;
  serviceNames(ids: readonly number[]): Promise<Map<number, string>>;
  providerNames(ids: readonly number[]): Promise<Map<number, string>>;
}

async function namesById(sql: string, ids: readonly number[]): Promise<Map<number, string>> {
  if (ids.length === 0) return new Map();

  const result = await getDb().query<{ id: number; name: string | null }>(sql, [[...ids]]);
  const names = new Map<number, string>();
  for (const row of result.rows) {
    const name = row.name?.trim();
    if (name) names.set(row.id, name);
  }
  return names;
}

export class PostgresNameDirectory implements NameDirectory {
  customerNames(ids: readonly number[]): Promise<Map<number, string>> {
    return namesById(
      `SELECT id, concat_ws(' ', first_name, last_name) AS name
         FROM customers
        WHERE id = ANY($1::int[])`,
      ids
    );
  }

  serviceNames(ids: readonly number[]): Promise<Map<number, string>> {
    return namesById('SELECT id, name FROM services WHERE id = ANY($1::int[])', ids);
  }

  providerNames(ids: readonly number[]): Promise<Map<number, string>> {
    return namesById('SELECT id, display_name AS name FROM providers WHERE id = ANY($1::int[])', ids);
  }
}

export interface DirectoryEntries {
  customers?: Iterable<readonly [number, string]>;
  services?: Iterable<readonly [number, string]>;
  providers?: Iterable<readonly [number, string]>;
}

function pick(source: Map<number, string>, ids: readonly number[]): Map<number, string> {
  const names = new Map<number, string>();
  for (const id of ids) {
    const name = source.get(id);
    if (name !== undefined) names.set(id, name);
  }
  return names;
}

export class InMemoryNameDirectory implements NameDirectory {
  private readonly customers: Map<number, string>;
  private readonly services: Map<number, string>;
  private readonly providers: Map<number, string>;

  constructor(entries: DirectoryEntries = {}) {
    this.customers = new Map(entries.customers ?? []);
    this.services = new Map(entries.services ?? []);
    this.providers = new Map(entries.providers ?? []);
  }

  async customerNames(ids: readonly number[]): Promise<Map<number, string>> {
    return pick(this.customers, ids);
  }

  async serviceNames(ids: readonly number[]): Promise<Map<number, string>> {
    return pick(this.services, ids);
  }

  async providerNames(ids: readonly number[]): Promise<Map<number, string>> {
    return pick(this.providers, ids);
  }
}
