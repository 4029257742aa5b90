import { registerAs } from '@nestjs/config';
import { DEFAULT_PROVIDER_ORDER, GeocodingProviderId } from '../geocoding/constants/geocoding.constants';

export interface ProviderSettings {
	baseUrl: string;
	apiKey?: string;
}

export interface GeocodingConfig {
	providerOrder: string[];
	timeoutMs: number;
	verbose: boolean;
	retry: {
		maxAttempts: number;
		baseDelayMs: number;
	};
	cache: {
		enabled: boolean;
		databasePath: string;
		ttlSeconds: number;
	};
	nominatim: {
		userAgent: string;
		minIntervalMs: number;
	};
	providers: Record<GeocodingProviderId, ProviderSettings>;
}

const parseInteger = (value: string | undefined, fallback: number): number => {
	const parsed = parseInt(value ?? '', 10);
	return Number.isNaN(parsed) ? fallback : parsed;
};

const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
	if (value === undefined || value.trim() === '') {
		return fallback;
	}
	return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
};

// Blank values count as absent so an empty line in .env does not enable a provider
const optional = (value: string | undefined): string | undefined => {
	const trimmed = value?.trim();
	return trimmed ? trimmed : undefined;
};

export function parseProviderOrder(order: string | readonly string[]): string[] {
	const items = typeof order === 'string' ? order.split(',') : order;
	return items.map((item) => item.trim().toLowerCase()).filter((item) => item.length > 0);
}

export function loadGeocodingConfig(env: NodeJS.ProcessEnv = process.env): GeocodingConfig {
	return {
		providerOrder: parseProviderOrder(env.GEOCODER_ORDER ?? DEFAULT_PROVIDER_ORDER.join(',')),
		timeoutMs: parseInteger(env.GEOCODER_TIMEOUT_MS, 10000),
		verbose: parseBoolean(env.GEOCODER_VERBOSE, false),
		retry: {
			maxAttempts: parseInteger(env.GEOCODER_RETRY_ATTEMPTS, 3),
			baseDelayMs: parseInteger(env.GEOCODER_RETRY_BASE_DELAY_MS, 500),
		},
		cache: {
			enabled: parseBoolean(env.GEOCODE_CACHE_ENABLED, true),
			databasePath: optional(env.GEOCODE_CACHE_DB) ?? 'geocode_cache.sqlite3',
			ttlSeconds: parseInteger(env.CACHE_EXPIRATION_TIME, 3600),
		},
		nominatim: {
			userAgent: optional(env.NOMINATIM_USER_AGENT) ?? 'supplier-locator/1.0 (ops@example.com)',
			minIntervalMs: parseInteger(env.NOMINATIM_MIN_INTERVAL_MS, 1000),
		},
		providers: {
			[GeocodingProviderId.NOMINATIM]: {
				baseUrl: optional(env.NOMINATIM_URL) ?? 'https://nominatim.openstreetmap.org',
			},
			[GeocodingProviderId.LOCATIONIQ]: {
				baseUrl: optional(env.LOCATIONIQ_URL) ?? 'https://us1.locationiq.com/v1/search',
				apiKey: optional(env.LOCATIONIQ_KEY),
			},
			[GeocodingProviderId.OPENCAGE]: {
				baseUrl: optional(env.OPENCAGE_URL) ?? 'https://api.opencagedata.com/geocode/v1/json',
				apiKey: optional(env.OPENCAGE_KEY),
			},
			[GeocodingProviderId.HERE]: {
				baseUrl: optional(env.HERE_URL) ?? 'https://geocode.search.hereapi.com/v1/geocode',
				apiKey: optional(env.HERE_API_KEY),
			},
			[GeocodingProviderId.MAPBOX]: {
				baseUrl: optional(env.MAPBOX_URL) ?? 'https://api.mapbox.com/geocoding/v5/mapbox.places',
				apiKey: optional(env.MAPBOX_TOKEN),
			},
			[GeocodingProviderId.GOOGLE]: {
				baseUrl: optional(env.GOOGLE_GEOCODING_URL) ?? 'https://maps.googleapis.com/maps/api/geocode/json',
				apiKey: optional(env.GOOGLE_GEOCODING_API_KEY),
			},
		},
	};
}

export default registerAs('geocoding', (): GeocodingConfig => loadGeocodingConfig());
