import { GeocodingProviderId } from '../constants/geocoding.constants';
import { GeocodingErrorKind } from '../errors/geocoding.errors';
import { Coordinates } from '../interfaces/geocoding.interface';
import { firstItem, readNumber, readProperty } from '../utils/payload.util';
import { BaseGeocodingProvider, ProviderRequest, ProviderRuntime } from './base-geocoding.provider';
import { ProviderSettings } from '../../config/geocoding.config';

export class LocationIqProvider extends BaseGeocodingProvider {
	readonly id = GeocodingProviderId.LOCATIONIQ;
	private readonly apiKey: string;

	constructor(
		runtime: ProviderRuntime,
		private readonly settings: ProviderSettings,
	) {
		super(runtime);
		this.apiKey = this.requireCredential(settings.apiKey, 'LOCATIONIQ_KEY');
	}

	protected buildRequest(address: string): ProviderRequest {
		return {
			url: this.settings.baseUrl,
			params: { q: address, key: this.apiKey, format: 'json', limit: 1 },
		};
	}

	// LocationIQ answers "Unable to geocode" with a 404 rather than an empty array
	protected classifyStatus(status: number): GeocodingErrorKind {
		return status === 404 ? GeocodingErrorKind.EMPTY_RESULT : super.classifyStatus(status);
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
}
