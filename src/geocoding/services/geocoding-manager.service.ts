import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import geocodingConfig, { GeocodingConfig } from '../../config/geocoding.config';
import { GEOCODE_CACHE, GEOCODING_CHAIN, GEOCODING_TRACE_EVENT } from '../constants/geocoding.constants';
import {
	AllProvidersExhaustedError,
	EmptyProviderChainError,
	GeocodingProviderError,
} from '../errors/geocoding.errors';
import {
	GeocodeCache,
	GeocodingChain,
	GeocodingTraceEvent,
	GeoResult,
	ProviderDescriptor,
	ProviderFailure,
	ResolveOptions,
} from '../interfaces/geocoding.interface';

/**
 * Resolves an address to one position: cache first, then each provider of the chain in
 * order until one succeeds. The chain order never changes and every call starts again
 * from the first provider.
 */
@Injectable()
export class GeocodingManagerService {
	private readonly logger = new Logger(GeocodingManagerService.name);

	constructor(
		@Inject(GEOCODING_CHAIN)
		private readonly chain: GeocodingChain,
		@Inject(GEOCODE_CACHE)
		private readonly cache: GeocodeCache,
		private readonly eventEmitter: EventEmitter2,
		@Inject(geocodingConfig.KEY)
		private readonly config: GeocodingConfig,
	) {}

	get providerIds(): string[] {
		return this.chain.providers.map((provider) => provider.id);
	}

	describeProviders(): readonly ProviderDescriptor[] {
		return this.chain.descriptors;
	}

	/**
	 * @throws EmptyProviderChainError when no provider is configured and the cache has no entry
	 * @throws AllProvidersExhaustedError when every provider failed
	 */
	async resolve(address: string, options: ResolveOptions = {}): Promise<GeoResult> {
		const verbose = options.verbose ?? this.config.verbose;
		const cacheEnabled = this.config.cache.enabled;
		const key = address.trim();

		if (cacheEnabled) {
			const cached = await this.readCache(key);
			if (cached) {
				this.trace(verbose, { type: 'cache.hit', address, providerId: cached.providerId });
				return cached;
			}
			this.trace(verbose, { type: 'cache.miss', address });
		}

		if (this.chain.providers.length === 0) {
			throw new EmptyProviderChainError(address);
		}

		const errors: GeocodingProviderError[] = [];

		for (const [position, provider] of this.chain.providers.entries()) {
			options.signal?.throwIfAborted();
			this.trace(verbose, { type: 'provider.attempt', address, providerId: provider.id, position });

			const startedAt = Date.now();
			let result: GeoResult;
			try {
				result = await provider.resolve(address, options.signal);
			} catch (error) {
				// Only classified provider failures advance the chain; anything else is a bug
				if (!(error instanceof GeocodingProviderError)) {
					throw error;
				}
				errors.push(error);
				this.trace(verbose, {
					type: 'provider.failure',
					address,
					providerId: provider.id,
					latencyMs: Date.now() - startedAt,
					kind: error.kind,
					message: error.message,
				});
				continue;
			}

			this.trace(verbose, {
				type: 'provider.success',
				address,
				providerId: provider.id,
				latencyMs: Date.now() - startedAt,
				latitude: result.latitude,
				longitude: result.longitude,
			});

			if (cacheEnabled) {
				await this.writeCache(key, result);
			}
			return result;
		}

		// The chain is non-empty and every provider failed, so at least one error was recorded
		const failures: ProviderFailure[] = errors.map((error) => error.toFailure());
		throw new AllProvidersExhaustedError(address, failures, errors[errors.length - 1]);
	}

	private async readCache(key: string): Promise<GeoResult | null> {
		try {
			return await this.cache.get(key);
		} catch (error) {
			this.logger.error(`Cache get failed for "${key}": ${describeError(error)}`);
			return null;
		}
	}

	private async writeCache(key: string, result: GeoResult): Promise<void> {
		try {
			await this.cache.set(key, result);
		} catch (error) {
			this.logger.error(`Cache set failed for "${key}": ${describeError(error)}`);
		}
	}

	private trace(verbose: boolean, event: GeocodingTraceEvent): void {
		if (!verbose) {
			return;
		}
		this.logger.log(formatTraceEvent(event));
		try {
			this.eventEmitter.emit(GEOCODING_TRACE_EVENT, event);
		} catch (error) {
			this.logger.warn(`Trace listener failed: ${describeError(error)}`);
		}
	}
}

export function formatTraceEvent(event: GeocodingTraceEvent): string {
	switch (event.type) {
		case 'cache.hit':
			return `[geocode] cache hit -> ${event.providerId} for '${event.address}'`;
		case 'cache.miss':
			return `[geocode] cache miss for '${event.address}'`;
		case 'provider.attempt':
			return `[geocode] trying provider ${event.providerId}`;
		case 'provider.success':
			return `[geocode] ${event.providerId} succeeded in ${(event.latencyMs / 1000).toFixed(2)}s -> ${event.latitude},${event.longitude}`;
		case 'provider.failure':
			return `[geocode] ${event.providerId} failed (${event.kind}): ${event.message}`;
	}
}

function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
