import { GeocodingProviderId } from '../constants/geocoding.constants';
import { Coordinates } from '../interfaces/geocoding.interface';
import { firstItem, readNumber, readProperty } from '../utils/payload.util';
import { BaseGeocodingProvider, ProviderRequest, ProviderRuntime } from './base-geocoding.provider';
import { ProviderSettings } from '../../config/geocoding.config';

export class MapboxProvider extends BaseGeocodingProvider {
	readonly id = GeocodingProviderId.MAPBOX;
	private readonly token: string;

	constructor(
		runtime: ProviderRuntime,
		private readonly settings: ProviderSettings,
	) {
		super(runtime);
		this.token = this.requireCredential(settings.apiKey, 'MAPBOX_TOKEN');
	}

	protected buildRequest(address: string): ProviderRequest {
		return {
			url: `${this.settings.baseUrl.replace(/\/+$/, '')}/${encodeURIComponent(address)}.json`,
			params: { access_token: this.token, limit: 1 },
		};
	}

	protected parseResponse(data: unknown): Coordinates | null {
		const features = readProperty(data, 'features');
		if (!Array.isArray(features)) {
			throw this.malformed('missing features');
		}
		const match = firstItem(features);
		if (match === undefined) {
			return null;
		}
		// GeoJSON order: [longitude, latitude]
		const center = readProperty(match, 'center');
		if (!Array.isArray(center) || center.length < 2) {
			throw this.malformed('missing center');
		}
		const longitude = readNumber(center[0]);
		const latitude = readNumber(center[1]);
		if (latitude === null || longitude === null) {
			throw this.malformed('non-numeric center');
		}
		return { latitude, longitude };
	}
}
