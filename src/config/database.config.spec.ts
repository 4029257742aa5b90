import { GeocodeCacheEntry } from '../geocoding/entities/geocode-cache-entry.entity';
import { createCacheDatabaseOptions } from './database.config';
import { loadGeocodingConfig } from './geocoding.config';

describe('createCacheDatabaseOptions', () => {
	it('should persist the cache table to the configured file through sql.js', () => {
		const options = createCacheDatabaseOptions(loadGeocodingConfig({ GEOCODE_CACHE_DB: 'data/test-cache.sqlite3' }));

		expect(options).toEqual({
			type: 'sqljs',
			location: 'data/test-cache.sqlite3',
			autoSave: true,
			entities: [GeocodeCacheEntry],
			synchronize: true,
			logging: false,
		});
	});

	it('should fall back to the default database file', () => {
		expect(createCacheDatabaseOptions(loadGeocodingConfig({}))).toMatchObject({
			type: 'sqljs',
			location: 'geocode_cache.sqlite3',
		});
	});
});
