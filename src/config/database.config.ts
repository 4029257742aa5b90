import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { GeocodeCacheEntry } from '../geocoding/entities/geocode-cache-entry.entity';
import { GeocodingConfig } from './geocoding.config';

/**
 * SQLite compiled to WebAssembly (sql.js). The database lives in memory, is loaded from
 * `location` on startup when the file exists and written back after every change.
 */
export function createCacheDatabaseOptions(config: GeocodingConfig): TypeOrmModuleOptions {
	return {
		type: 'sqljs',
		location: config.cache.databasePath,
		autoSave: true,
		entities: [GeocodeCacheEntry],
		synchronize: true,
		logging: false,
	};
}
