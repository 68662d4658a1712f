import { config } from 'dotenv';
import { DataSource, DataSourceOptions } from 'typeorm';
import { join } from 'path';

import { User } from './entities/user.entity';
import { Transcript } from './entities/transcript.entity';

/**
 * Load env vars from the project root .env file.
 * Supports running from the source tree and from dist/.
 */
config({ path: join(__dirname, '../../../.env') });
config({ path: join(__dirname, '../../../../.env') });

/**
 * TypeORM DataSource configuration for CLI-driven migrations.
 *
 * Used by `typeorm migration:run` and `typeorm migration:revert`
 * (see the root package.json scripts). The application itself builds
 * its connection through TypeOrmModule in AppModule.
 */
const dataSourceOptions: DataSourceOptions = {
  type: 'postgres',
  host: process.env['POSTGRES_HOST'] || 'localhost',
  port: parseInt(process.env['POSTGRES_PORT'] || '5432', 10),
  username: process.env['POSTGRES_USER'] || 'scribe',
  password: process.env['POSTGRES_PASSWORD'] || 'scribe_secret',
  database: process.env['POSTGRES_DB'] || 'scribe',
  entities: [User, Transcript],
  migrations: [join(__dirname, 'migrations', '*{.ts,.js}')],
  synchronize: false,
  logging: process.env['NODE_ENV'] !== 'production',
};

const AppDataSource = new DataSource(dataSourceOptions);

export default AppDataSource;
