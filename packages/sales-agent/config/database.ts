// Vector store factory — selects the backend from settings.vectorStore.backend
// Supported values: 'postgres' (default), 'local'

import type { Settings } from './settings.js';
import type { VectorStore } from '../memory/vector-store.js';

export type VectorBackend = Settings['vectorStore']['backend'];

/**
 * Create a VectorStore for the configured backend.
 * - `postgres`: PgVectorStore (ruvector-postgres), pool configured here
 * - `local`: LocalVectorStore (in-memory)
 */
export async function createVectorStore(settings: Settings): Promise<VectorStore> {
  const { backend, collection, pg } = settings.vectorStore;

  switch (backend) {
    case 'postgres': {
      const { configurePg } = await import('../db/pg-client.js');
      configurePg({
        host: pg.host,
        port: pg.port,
        user: pg.user,
        password: pg.password,
        database: pg.database,
        poolMin: pg.poolMin,
        poolMax: pg.poolMax,
      });
      const { PgVectorStore } = await import('../memory/pg-vector-store.js');
      return new PgVectorStore(collection);
    }
    case 'local': {
      const { LocalVectorStore } = await import('../memory/vector-store.js');
      return new LocalVectorStore(collection);
    }
  }
}
