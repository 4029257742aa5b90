import { ProviderFailure } from '../interfaces/geocoding.interface';

export enum GeocodingErrorKind {
	CREDENTIAL_MISSING = 'CREDENTIAL_MISSING',
	EMPTY_RESULT = 'EMPTY_RESULT',
	RATE_LIMITED = 'RATE_LIMITED',
	TRANSPORT = 'TRANSPORT',
	UPSTREAM = 'UPSTREAM',
}

/** A classified failure of a single provider. */
export class GeocodingProviderError extends Error {
	readonly name = 'GeocodingProviderError';

	constructor(
		readonly kind: GeocodingErrorKind,
		readonly providerId: string,
		message: string,
		options?: { cause?: unknown },
	) {
		super(`${providerId}: ${message}`, options);
	}

	/** Rate limiting and transport failures are worth repeating; everything else is final. */
	get isTransient(): boolean {
		return this.kind === GeocodingErrorKind.RATE_LIMITED || this.kind === GeocodingErrorKind.TRANSPORT;
	}

	toFailure(): ProviderFailure {
		return { providerId: this.providerId, kind: this.kind, message: this.message };
	}
}

export abstract class GeocodingResolutionError extends Error {
	constructor(
		readonly address: string,
		message: string,
	) {
		super(message);
	}
}

/** No provider could be built from the configuration, so nothing was attempted. */
export class EmptyProviderChainError extends GeocodingResolutionError {
	readonly name = 'EmptyProviderChainError';

	constructor(address: string) {
		super(address, `No geocoding providers are configured; cannot resolve "${address}"`);
	}
}

export class AllProvidersExhaustedError extends GeocodingResolutionError {
	readonly name = 'AllProvidersExhaustedError';

	constructor(
		address: string,
		readonly failures: readonly ProviderFailure[],
		readonly lastError: GeocodingProviderError,
	) {
		super(address, `All providers failed for "${address}": ${lastError.message}`);
	}
}
