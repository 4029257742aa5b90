import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { CACHE_MANAGER } from '@nestjs/cache-manager';
import { Cache } from 'cache-manager';
import { Repository } from 'typeorm';
import { GeocodeCacheEntry } from '../entities/geocode-cache-entry.entity';
import { GeocodeCache, GeoResult } from '../interfaces/geocoding.interface';
import { createGeoResult } from '../providers/base-geocoding.provider';

// ======================================================
// GEOCODE CACHE
//
// The geocode_cache table is the durable record (one row per address key, last write
// wins). The cache manager keeps recent hits in memory so repeated lookups skip the
// database entirely.
// ======================================================

@Injectable()
export class GeocodeCacheService implements GeocodeCache {
	private readonly logger = new Logger(GeocodeCacheService.name);
	private readonly CACHE_PREFIX = 'geocode:';

	constructor(
		@InjectRepository(GeocodeCacheEntry)
		private readonly repository: Repository<GeocodeCacheEntry>,
		@Inject(CACHE_MANAGER)
		private readonly cacheManager: Cache,
	) {}

	async get(key: string): Promise<GeoResult | null> {
		const memoryKey = this.getCacheKey(key);
		const cached = await this.cacheManager.get<GeoResult>(memoryKey);
		if (cached) {
			this.logger.debug(`Memory HIT for key: ${key}`);
			return createGeoResult(cached.latitude, cached.longitude, cached.providerId);
		}

		const entry = await this.repository.findOne({ where: { addressKey: key } });
		if (!entry) {
			this.logger.debug(`Cache MISS for key: ${key}`);
			return null;
		}

		this.logger.debug(`Database HIT for key: ${key} (${entry.providerId})`);
		const result = createGeoResult(entry.latitude, entry.longitude, entry.providerId);
		await this.cacheManager.set(memoryKey, { ...result });
		return result;
	}

	async set(key: string, result: GeoResult): Promise<void> {
		await this.repository.upsert(
			{
				addressKey: key,
				latitude: result.latitude,
				longitude: result.longitude,
				providerId: result.providerId,
				createdAt: new Date(),
			},
			['addressKey'],
		);
		await this.cacheManager.set(this.getCacheKey(key), { ...result });
		this.logger.debug(`Cache SET for key: ${key} (${result.providerId})`);
	}

	private getCacheKey(key: string): string {
		return `${this.CACHE_PREFIX}${key}`;
	}
}
