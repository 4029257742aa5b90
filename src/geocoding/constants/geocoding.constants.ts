export enum GeocodingProviderId {
	NOMINATIM = 'nominatim',
	LOCATIONIQ = 'locationiq',
	OPENCAGE = 'opencage',
	HERE = 'here',
	MAPBOX = 'mapbox',
	GOOGLE = 'google',
}

export const DEFAULT_PROVIDER_ORDER: readonly GeocodingProviderId[] = [
	GeocodingProviderId.NOMINATIM,
	GeocodingProviderId.LOCATIONIQ,
	GeocodingProviderId.OPENCAGE,
	GeocodingProviderId.HERE,
	GeocodingProviderId.MAPBOX,
	GeocodingProviderId.GOOGLE,
];

const PROVIDER_IDS: ReadonlySet<string> = new Set<string>(Object.values(GeocodingProviderId));

export function isGeocodingProviderId(value: string): value is GeocodingProviderId {
	return PROVIDER_IDS.has(value);
}

// Injection tokens
export const GEOCODING_HTTP_CLIENT = 'GEOCODING_HTTP_CLIENT';
export const GEOCODING_CHAIN = 'GEOCODING_CHAIN';
export const GEOCODE_CACHE = 'GEOCODE_CACHE';
export const REVERSE_GEOCODER = 'REVERSE_GEOCODER';

export const GEOCODING_TRACE_EVENT = 'geocoding.trace';
