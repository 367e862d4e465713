import { DestinationRegistry } from '../application/index.js';
import { POSTGRES_TYPE, PostgresAdapter } from './db/index.js';

/** Registry with every destination type this build ships. */
export function createDefaultRegistry(): DestinationRegistry {
  return new DestinationRegistry()
    .register(POSTGRES_TYPE, (context) => new PostgresAdapter(context));
}
