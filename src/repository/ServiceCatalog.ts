import { getDb } from '@agenda/shared';

/** Read-only view of the service catalog, owned by the catalog CRUD surface. */
export interface ServiceCatalog {
  /** The service's default duration in minutes, or `null` when unknown or unset. */
  findDefaultDuration(serviceRef: number): Promise<number | null>;
}

export class PostgresServiceCatalog implements ServiceCatalog {
  async findDefaultDuration(serviceRef: number): Promise<number | null> {
    const result = await getDb().query<{ duration_minutes: number | null }>(
      'SELECT duration_minutes FROM services WHERE id = $1',
      [serviceRef]
    );

    const duration = result.rows[0]?.duration_minutes ?? null;
    return duration && duration > 0 ? duration : null;
  }
}

export class InMemoryServiceCatalog implements ServiceCatalog {
  private readonly durations: Map<number, number>;

  constructor(durations: Iterable<readonly [number, number]> = []) {
    this.durations = new Map(durations);
  }

  async findDefaultDuration(serviceRef: number): Promise<number | null> {
    const duration = this.durations.get(serviceRef);
    return duration && duration > 0 ? duration : null;
  }
}
