import { Inject, Injectable, Logger } from '@nestjs/common';
import geocodingConfig, { GeocodingConfig, parseProviderOrder } from '../../config/geocoding.config';
import { RetryService } from '../../lib/services/retry.service';
import { RateLimiter } from '../../lib/utils/rate-limiter.util';
import { GEOCODING_HTTP_CLIENT, GeocodingProviderId, isGeocodingProviderId } from '../constants/geocoding.constants';
import { GeocodingErrorKind, GeocodingProviderError } from '../errors/geocoding.errors';
import { GeocodingChain, GeocodingProvider, ProviderDescriptor, ReverseGeocoder } from '../interfaces/geocoding.interface';
import { GeocodingHttpClient, ProviderRuntime } from '../providers/base-geocoding.provider';
import { GoogleProvider } from '../providers/google.provider';
import { HereProvider } from '../providers/here.provider';
import { LocationIqProvider } from '../providers/locationiq.provider';
import { MapboxProvider } from '../providers/mapbox.provider';
import { NominatimProvider } from '../providers/nominatim.provider';
import { OpenCageProvider } from '../providers/opencage.provider';

/**
 * Builds provider chains from an ordered list of provider ids.
 *
 * Providers without credentials are left out rather than failing the whole chain, so the
 * result may be empty. Rate limiters are owned here and reused by every chain this
 * factory builds, keeping request spacing process-wide.
 */
@Injectable()
export class GeocodingProviderFactory {
	private readonly logger = new Logger(GeocodingProviderFactory.name);
	private readonly rateLimiters = new Map<GeocodingProviderId, RateLimiter>();

	constructor(
		@Inject(geocodingConfig.KEY)
		private readonly config: GeocodingConfig,
		@Inject(GEOCODING_HTTP_CLIENT)
		private readonly http: GeocodingHttpClient,
		private readonly retryService: RetryService,
	) {}

	createChain(order: string | readonly string[] = this.config.providerOrder): GeocodingChain {
		const providers: GeocodingProvider[] = [];
		const descriptors: ProviderDescriptor[] = [];
		const seen = new Set<GeocodingProviderId>();

		for (const name of parseProviderOrder(order)) {
			if (!isGeocodingProviderId(name)) {
				this.logger.warn(`Skipping unknown geocoding provider "${name}"`);
				continue;
			}
			if (seen.has(name)) {
				this.logger.warn(`Skipping duplicate geocoding provider "${name}"`);
				continue;
			}
			seen.add(name);
			descriptors.push(this.describe(name));

			try {
				providers.push(this.create(name));
			} catch (error) {
				if (error instanceof GeocodingProviderError && error.kind === GeocodingErrorKind.CREDENTIAL_MISSING) {
					this.logger.warn(`Skipping provider ${name}: ${error.message}`);
					continue;
				}
				throw error;
			}
		}

		this.logger.log(
			providers.length > 0
				? `Geocoding chain: ${providers.map((provider) => provider.id).join(' -> ')}`
				: 'Geocoding chain is empty; every resolution will fail',
		);

		return { providers, descriptors };
	}

	/** Builds one adapter; throws a CREDENTIAL_MISSING error when its key is absent. */
	create(id: GeocodingProviderId): GeocodingProvider {
		const settings = this.config.providers[id];
		const runtime = this.createRuntime(id);

		switch (id) {
			case GeocodingProviderId.NOMINATIM:
				return this.createNominatim();
			case GeocodingProviderId.LOCATIONIQ:
				return new LocationIqProvider(runtime, settings);
			case GeocodingProviderId.OPENCAGE:
				return new OpenCageProvider(runtime, settings);
			case GeocodingProviderId.HERE:
				return new HereProvider(runtime, settings);
			case GeocodingProviderId.MAPBOX:
				return new MapboxProvider(runtime, settings);
			case GeocodingProviderId.GOOGLE:
				return new GoogleProvider(runtime, settings);
		}
	}

	/** Nominatim reverse lookups, spaced by the same limiter as its forward lookups. */
	createReverseGeocoder(): ReverseGeocoder {
		return this.createNominatim();
	}

	describe(id: GeocodingProviderId): ProviderDescriptor {
		return Object.freeze({
			id,
			credentialPresent: id === GeocodingProviderId.NOMINATIM || Boolean(this.config.providers[id].apiKey),
			rateLimitMs: id === GeocodingProviderId.NOMINATIM ? this.config.nominatim.minIntervalMs : null,
		});
	}

	private createNominatim(): NominatimProvider {
		return new NominatimProvider(this.createRuntime(GeocodingProviderId.NOMINATIM), {
			baseUrl: this.config.providers[GeocodingProviderId.NOMINATIM].baseUrl,
			userAgent: this.config.nominatim.userAgent,
		});
	}

	private createRuntime(id: GeocodingProviderId): ProviderRuntime {
		return {
			http: this.http,
			retry: this.retryService,
			maxAttempts: this.config.retry.maxAttempts,
			baseDelayMs: this.config.retry.baseDelayMs,
			rateLimiter: id === GeocodingProviderId.NOMINATIM ? this.getRateLimiter(id) : undefined,
		};
	}

	private getRateLimiter(id: GeocodingProviderId): RateLimiter {
		let limiter = this.rateLimiters.get(id);
		if (!limiter) {
			limiter = new RateLimiter(this.config.nominatim.minIntervalMs);
			this.rateLimiters.set(id, limiter);
		}
		return limiter;
	}
}
