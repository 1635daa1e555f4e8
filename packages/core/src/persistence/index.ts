export {
  DatabaseManager,
  InMemoryStore,
  createDatabaseManager,
  getDefaultDatabasePath,
  type DatabaseConfig,
  type OverseerStore,
} from './database.js';
