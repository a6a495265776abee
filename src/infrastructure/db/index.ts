export { indexEvents, itemTouches, correlations } from './schema.js';
export { createDbClient } from './client.js';
export type { Database } from './client.js';
export { ensureTables } from './migrate.js';
export {
  insertEvents,
  findSessionEvents,
  listSessions,
  deleteEventsBefore,
  toIndexEvent,
} from './event-repository.js';
export {
  insertTouch,
  findTouches,
  deleteTouchesBefore,
  insertCorrelation,
  findCorrelations,
  deleteCorrelationsBefore,
} from './race-repository.js';
export { PostgresEventStore } from './postgres-event-store.js';
export { default as dbPlugin } from './db-plugin.js';
export type { DbPluginOptions } from './db-plugin.js';
