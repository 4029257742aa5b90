import { GeocodingProviderId } from '../constants/geocoding.constants';
import { Coordinates } from '../interfaces/geocoding.interface';
import { firstItem, readNumber, readProperty } from '../utils/payload.util';
import { BaseGeocodingProvider, ProviderRequest, ProviderRuntime } from './base-geocoding.provider';
import { ProviderSettings } from '../../config/geocoding.config';

export class OpenCageProvider extends BaseGeocodingProvider {
	readonly id = GeocodingProviderId.OPENCAGE;
	// 402 means the daily quota is spent
	protected readonly rateLimitedStatuses: readonly number[] = [402, 429];
	private readonly apiKey: string;

	constructor(
		runtime: ProviderRuntime,
		private readonly settings: ProviderSettings,
	) {
		super(runtime);
		this.apiKey = this.requireCredential(settings.apiKey, 'OPENCAGE_KEY');
	}

	protected buildRequest(address: string): ProviderRequest {
		return {
			url: this.settings.baseUrl,
			params: { q: address, key: this.apiKey, limit: 1 },
		};
	}

	protected parseResponse(data: unknown): Coordinates | null {
		const results = readProperty(data, 'results');
		if (!Array.isArray(results)) {
			throw this.malformed('missing results');
		}
		const match = firstItem(results);
		if (match === undefined) {
			return null;
		}
		const latitude = readNumber(readProperty(match, 'geometry', 'lat'));
		const longitude = readNumber(readProperty(match, 'geometry', 'lng'));
		if (latitude === null || longitude === null) {
			throw this.malformed('missing geometry');
		}
		return { latitude, longitude };
	}
}
