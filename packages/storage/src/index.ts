import pg from 'pg';
import type { StorageConfig } from '@league/schemas';
import type { ILedger } from '@league/interfaces';
import { ConfigurationError } from '@league/core';
import { MemoryLedger } from './MemoryLedger';
import { PgLedger } from './PgLedger';

export { MemoryLedger } from './MemoryLedger';
export { PgLedger } from './PgLedger';
export type { SqlClient, SqlPool, SqlResult } from './PgLedger';

export function createLedger(storage: StorageConfig): ILedger {
  switch (storage.backend) {
    case 'postgres': {
      if (!storage.url) throw new ConfigurationError('storage.url is required for the postgres backend');
      return new PgLedger(new pg.Pool({ connectionString: storage.url }));
    }
    case 'memory':
    default:
      return new MemoryLedger();
  }
}
