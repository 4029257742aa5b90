import { GeocodingProviderId } from '../constants/geocoding.constants';
import { Coordinates, PostalAddress, ReverseGeocoder } from '../interfaces/geocoding.interface';
import { firstItem, isRecord, readNumber, readProperty, readText } from '../utils/payload.util';
import { BaseGeocodingProvider, ProviderRequest, ProviderRuntime } from './base-geocoding.provider';

export interface NominatimSettings {
	baseUrl: string;
	userAgent: string;
}

/**
 * OpenStreetMap Nominatim. Needs no credential, but its usage policy allows at most one
 * request per second per client, so the runtime must carry a shared rate limiter.
 * Reverse lookups go through the same limiter.
 */
export class NominatimProvider extends BaseGeocodingProvider implements ReverseGeocoder {
	readonly id = GeocodingProviderId.NOMINATIM;
	protected readonly rateLimitedStatuses: readonly number[] = [429, 503];

	constructor(
		runtime: ProviderRuntime,
		private readonly settings: NominatimSettings,
	) {
		super(runtime);
	}

	/** Returns null when Nominatim has no address at the position. */
	async reverse(latitude: number, longitude: number, signal?: AbortSignal): Promise<PostalAddress | null> {
		return this.withRetry(async () => {
			const data = await this.fetchPayload(
				{
					url: `${this.trimmedBaseUrl}/reverse`,
					params: { format: 'json', lat: latitude, lon: longitude, zoom: 18, addressdetails: 1 },
					headers: { 'User-Agent': this.settings.userAgent },
				},
				signal,
			);

			const address = readProperty(data, 'address');
			if (!isRecord(address)) {
				return null;
			}
			return {
				street: readText(address.road),
				postcode: readText(address.postcode),
				city: readText(address.city) || readText(address.town),
				country: readText(address.country),
			};
		}, `Reverse geocoding via ${this.id}`);
	}

	protected buildRequest(address: string): ProviderRequest {
		return {
			url: `${this.trimmedBaseUrl}/search`,
			params: { q: address, format: 'json', limit: 1 },
			headers: { 'User-Agent': this.settings.userAgent },
		};
	}

	protected parseResponse(data: unknown): Coordinates | null {
		if (!Array.isArray(data)) {
			throw this.malformed('expected an array');
		}
		const match = firstItem(data);
		if (match === undefined) {
			return null;
		}
		const latitude = readNumber(readProperty(match, 'lat'));
		const longitude = readNumber(readProperty(match, 'lon'));
		if (latitude === null || longitude === null) {
			throw this.malformed('missing lat/lon');
		}
		return { latitude, longitude };
	}

	private get trimmedBaseUrl(): string {
		return this.settings.baseUrl.replace(/\/+$/, '');
	}
}
