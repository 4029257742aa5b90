import { GeocodingErrorKind } from '../errors/geocoding.errors';

export interface Coordinates {
	latitude: number;
	longitude: number;
}

/** A resolved position plus the id of the provider that produced it. */
export interface GeoResult {
	readonly latitude: number;
	readonly longitude: number;
	readonly providerId: string;
}

export interface GeocodingProvider {
	readonly id: string;
	resolve(address: string, signal?: AbortSignal): Promise<GeoResult>;
}

export interface ProviderDescriptor {
	readonly id: string;
	readonly credentialPresent: boolean;
	readonly rateLimitMs: number | null;
}

/** Ordered providers a manager tries, with the descriptors of everything that was configured. */
export interface GeocodingChain {
	readonly providers: readonly GeocodingProvider[];
	readonly descriptors: readonly ProviderDescriptor[];
}

export interface GeocodeCache {
	get(key: string): Promise<GeoResult | null>;
	set(key: string, result: GeoResult): Promise<void>;
}

export interface ResolveOptions {
	verbose?: boolean;
	signal?: AbortSignal;
}

export interface ProviderFailure {
	providerId: string;
	kind: GeocodingErrorKind;
	message: string;
}

export type GeocodingTraceEvent =
	| { type: 'cache.hit'; address: string; providerId: string }
	| { type: 'cache.miss'; address: string }
	| { type: 'provider.attempt'; address: string; providerId: string; position: number }
	| {
			type: 'provider.success';
			address: string;
			providerId: string;
			latencyMs: number;
			latitude: number;
			longitude: number;
	  }
	| { type: 'provider.failure'; address: string; providerId: string; latencyMs: number; kind: GeocodingErrorKind; message: string };

/** Address parts of a reverse lookup; a part the upstream does not know is ''. */
export interface PostalAddress {
	street: string;
	postcode: string;
	city: string;
	country: string;
}

export interface ReverseGeocoder {
	reverse(latitude: number, longitude: number, signal?: AbortSignal): Promise<PostalAddress | null>;
}
