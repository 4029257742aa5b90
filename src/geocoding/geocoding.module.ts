import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import axios from 'axios';
import geocodingConfig, { GeocodingConfig } from '../config/geocoding.config';
import { LibModule } from '../lib/lib.module';
import {
	GEOCODE_CACHE,
	GEOCODING_CHAIN,
	GEOCODING_HTTP_CLIENT,
	REVERSE_GEOCODER,
} from './constants/geocoding.constants';
import { GeocodeCacheEntry } from './entities/geocode-cache-entry.entity';
import { GeocodingController } from './geocoding.controller';
import { GeocodeCacheService } from './services/geocode-cache.service';
import { GeocodingManagerService } from './services/geocoding-manager.service';
import { GeocodingProviderFactory } from './services/geocoding-provider.factory';
import { ReverseGeocodingService } from './services/reverse-geocoding.service';

@Module({
	imports: [ConfigModule.forFeature(geocodingConfig), TypeOrmModule.forFeature([GeocodeCacheEntry]), LibModule],
	controllers: [GeocodingController],
	providers: [
		{
			provide: GEOCODING_HTTP_CLIENT,
			inject: [geocodingConfig.KEY],
			useFactory: (config: GeocodingConfig) => axios.create({ timeout: config.timeoutMs }),
		},
		GeocodingProviderFactory,
		{
			provide: GEOCODING_CHAIN,
			inject: [GeocodingProviderFactory],
			useFactory: (factory: GeocodingProviderFactory) => factory.createChain(),
		},
		GeocodeCacheService,
		{
			provide: GEOCODE_CACHE,
			useExisting: GeocodeCacheService,
		},
		GeocodingManagerService,
		{
			provide: REVERSE_GEOCODER,
			inject: [GeocodingProviderFactory],
			useFactory: (factory: GeocodingProviderFactory) => factory.createReverseGeocoder(),
		},
		ReverseGeocodingService,
	],
	exports: [GeocodingManagerService, GeocodingProviderFactory, ReverseGeocodingService],
})
export class GeocodingModule {}
