import { GeocodingProviderId } from '../constants/geocoding.constants';
import { Coordinates } from '../interfaces/geocoding.interface';
import { firstItem, readNumber, readProperty } from '../utils/payload.util';
import { BaseGeocodingProvider, ProviderRequest, ProviderRuntime } from './base-geocoding.provider';
import { ProviderSettings } from '../../config/geocoding.config';

export class HereProvider extends BaseGeocodingProvider {
	readonly id = GeocodingProviderId.HERE;
	private readonly apiKey: string;

	constructor(
		runtime: ProviderRuntime,
		private readonly settings: ProviderSettings,
	) {
		super(runtime);
		this.apiKey = this.requireCredential(settings.apiKey, 'HERE_API_KEY');
	}

	protected buildRequest(address: string): ProviderRequest {
		return {
			url: this.settings.baseUrl,
			params: { q: address, apiKey: this.apiKey },
		};
	}

	protected parseResponse(data: unknown): Coordinates | null {
		const items = readProperty(data, 'items');
		if (!Array.isArray(items)) {
			throw this.malformed('missing items');
		}
		const match = firstItem(items);
		if (match === undefined) {
			return null;
		}
		const latitude = readNumber(readProperty(match, 'position', 'lat'));
		const longitude = readNumber(readProperty(match, 'position', 'lng'));
		if (latitude === null || longitude === null) {
			throw this.malformed('missing position');
		}
		return { latitude, longitude };
	}
}
