import { loadGeocodingConfig, parseProviderOrder } from './geocoding.config';

describe('geocoding config', () => {
	describe('parseProviderOrder', () => {
		it('should split, trim and lowercase a comma separated list', () => {
			expect(parseProviderOrder(' Google, opencage ,,NOMINATIM ')).toEqual(['google', 'opencage', 'nominatim']);
		});

		it('should accept an array and drop blank entries', () => {
			expect(parseProviderOrder(['here', ' ', 'Mapbox'])).toEqual(['here', 'mapbox']);
		});

		it('should return an empty list for an empty string', () => {
			expect(parseProviderOrder('')).toEqual([]);
		});
	});

	describe('loadGeocodingConfig', () => {
		it('should fall back to defaults for an empty environment', () => {
			const config = loadGeocodingConfig({});

			expect(config.providerOrder).toEqual(['nominatim', 'locationiq', 'opencage', 'here', 'mapbox', 'google']);
			expect(config.timeoutMs).toBe(10000);
			expect(config.verbose).toBe(false);
			expect(config.retry).toEqual({ maxAttempts: 3, baseDelayMs: 500 });
			expect(config.cache).toEqual({ enabled: true, databasePath: 'geocode_cache.sqlite3', ttlSeconds: 3600 });
			expect(config.nominatim.minIntervalMs).toBe(1000);
			expect(config.providers.google.apiKey).toBeUndefined();
		});

		it('should read overrides and ignore blank credentials', () => {
			const config = loadGeocodingConfig({
				GEOCODER_ORDER: 'google,nominatim',
				GEOCODER_VERBOSE: 'yes',
				GEOCODER_TIMEOUT_MS: '2500',
				GEOCODE_CACHE_ENABLED: 'false',
				GOOGLE_GEOCODING_API_KEY: 'test-key',
				MAPBOX_TOKEN: '   ',
				NOMINATIM_MIN_INTERVAL_MS: 'not-a-number',
			});

			expect(config.providerOrder).toEqual(['google', 'nominatim']);
			expect(config.verbose).toBe(true);
			expect(config.timeoutMs).toBe(2500);
			expect(config.cache.enabled).toBe(false);
			expect(config.providers.google.apiKey).toBe('test-key');
			expect(config.providers.mapbox.apiKey).toBeUndefined();
			expect(config.nominatim.minIntervalMs).toBe(1000);
		});
	});
});
