import { Inject, Injectable, Logger } from '@nestjs/common';
import { CACHE_MANAGER } from '@nestjs/cache-manager';
import { Cache } from 'cache-manager';
import { REVERSE_GEOCODER } from '../constants/geocoding.constants';
import { GeocodingProviderError } from '../errors/geocoding.errors';
import { PostalAddress, ReverseGeocoder } from '../interfaces/geocoding.interface';

@Injectable()
export class ReverseGeocodingService {
	private readonly logger = new Logger(ReverseGeocodingService.name);
	private readonly CACHE_PREFIX = 'reverse:';

	constructor(
		@Inject(REVERSE_GEOCODER)
		private readonly reverseGeocoder: ReverseGeocoder,
		@Inject(CACHE_MANAGER)
		private readonly cacheManager: Cache,
	) {}

	/**
	 * Postal address at a position, or null when there is none or the lookup failed.
	 * Positions are cached at six decimals; misses and failures are not cached.
	 */
	async lookup(latitude: number, longitude: number, signal?: AbortSignal): Promise<PostalAddress | null> {
		const position = `${latitude.toFixed(6)},${longitude.toFixed(6)}`;
		const cacheKey = `${this.CACHE_PREFIX}${position}`;

		const cached = await this.cacheManager.get<PostalAddress>(cacheKey);
		if (cached) {
			return cached;
		}

		let address: PostalAddress | null;
		try {
			address = await this.reverseGeocoder.reverse(latitude, longitude, signal);
		} catch (error) {
			if (!(error instanceof GeocodingProviderError)) {
				throw error;
			}
			this.logger.warn(`Reverse geocoding failed at ${position}: ${error.message}`);
			return null;
		}

		if (address) {
			await this.cacheManager.set(cacheKey, address);
		}
		return address;
	}
}
