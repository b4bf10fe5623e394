import { DataSource } from 'typeorm';
import { KeyValueEntry } from '../../domain/entities/key-value-entry.entity';
import { RegimeChange } from '../../domain/entities/regime-change.entity';
import { Logger } from '../../shared/logger';

const logger = new Logger('DatabaseModule');

export const ENTITIES = [KeyValueEntry, RegimeChange];

export function createDataSource(database: string): DataSource {
  return new DataSource({
    type: 'sqlite',
    database,
    synchronize: true, // two small tables, no migrations yet
    logging: false,
    entities: ENTITIES,
    migrations: [],
    subscribers: [],
  });
}

export class DatabaseModule {
  private static dataSource: DataSource | null = null;

  static async initialize(database: string): Promise<DataSource> {
    if (DatabaseModule.dataSource?.isInitialized) return DatabaseModule.dataSource;
    const dataSource = createDataSource(database);
    try {
      await dataSource.initialize();
      DatabaseModule.dataSource = dataSource;
      logger.info(`Database connection established (${database})`);
      return dataSource;
    } catch (error) {
      logger.error('Database connection failed:', error);
      throw error;
    }
  }

  static async close(): Promise<void> {
    if (DatabaseModule.dataSource?.isInitialized) {
      await DatabaseModule.dataSource.destroy();
    }
    DatabaseModule.dataSource = null;
  }
}
