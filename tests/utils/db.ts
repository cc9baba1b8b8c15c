import { openDatabase, setDb, type DatabaseClient } from '../../src/db/client.js';

// Fresh in-memory database with the schema applied; also installed as the process-wide connection.
export function freshTestDb(): DatabaseClient {
  const db = openDatabase(':memory:');
  setDb(db);
  return db;
}
