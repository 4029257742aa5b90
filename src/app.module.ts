import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { CacheModule } from '@nestjs/cache-manager';
import geocodingConfig, { GeocodingConfig } from './config/geocoding.config';
import { createCacheDatabaseOptions } from './config/database.config';
import { GeocodingModule } from './geocoding/geocoding.module';
import { SuppliersModule } from './suppliers/suppliers.module';

@Module({
	imports: [
		ConfigModule.forRoot({
			isGlobal: true,
			load: [geocodingConfig],
		}),
		CacheModule.registerAsync({
			isGlobal: true,
			inject: [geocodingConfig.KEY],
			useFactory: (config: GeocodingConfig) => ({
				ttl: config.cache.ttlSeconds * 1000,
				max: parseInt(process.env.CACHE_MAX_ITEMS || '50000', 10) || 50000,
			}),
		}),
		EventEmitterModule.forRoot(),
		TypeOrmModule.forRootAsync({
			inject: [geocodingConfig.KEY],
			useFactory: createCacheDatabaseOptions,
		}),
		GeocodingModule,
		SuppliersModule,
	],
})
export class AppModule {}
