import { GeocodingProviderId } from '../constants/geocoding.constants';
import { GeocodingErrorKind } from '../errors/geocoding.errors';
import { Coordinates } from '../interfaces/geocoding.interface';
import { firstItem, readNumber, readProperty } from '../utils/payload.util';
import { BaseGeocodingProvider, ProviderRequest, ProviderRuntime } from './base-geocoding.provider';
import { ProviderSettings } from '../../config/geocoding.config';

/**
 * Google Geocoding API. Google answers most failures with HTTP 200 and a `status`
 * field, so classification happens while parsing the body.
 */
export class GoogleProvider extends BaseGeocodingProvider {
	readonly id = GeocodingProviderId.GOOGLE;
	private readonly apiKey: string;

	constructor(
		runtime: ProviderRuntime,
		private readonly settings: ProviderSettings,
	) {
		super(runtime);
		this.apiKey = this.requireCredential(settings.apiKey, 'GOOGLE_GEOCODING_API_KEY');
	}

	protected buildRequest(address: string): ProviderRequest {
		return {
			url: this.settings.baseUrl,
			params: { address, key: this.apiKey },
		};
	}

	protected parseResponse(data: unknown): Coordinates | null {
		const status = readProperty(data, 'status');
		switch (status) {
			case 'OK':
				break;
			case 'ZERO_RESULTS':
				return null;
			case 'OVER_QUERY_LIMIT':
				throw this.error(GeocodingErrorKind.RATE_LIMITED, 'status OVER_QUERY_LIMIT');
			default: {
				const detail = readProperty(data, 'error_message');
				throw this.error(
					GeocodingErrorKind.UPSTREAM,
					`status ${String(status)}${typeof detail === 'string' ? ` (${detail})` : ''}`,
				);
			}
		}

		const match = firstItem(readProperty(data, 'results'));
		if (match === undefined) {
			return null;
		}
		const latitude = readNumber(readProperty(match, 'geometry', 'location', 'lat'));
		const longitude = readNumber(readProperty(match, 'geometry', 'location', 'lng'));
		if (latitude === null || longitude === null) {
			throw this.malformed('missing geometry.location');
		}
		return { latitude, longitude };
	}
}
