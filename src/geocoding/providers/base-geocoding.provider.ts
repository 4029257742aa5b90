import { Logger } from '@nestjs/common';
import { AxiosInstance, AxiosResponse, isAxiosError, isCancel } from 'axios';
import { RetryService } from '../../lib/services/retry.service';
import { RateLimiter } from '../../lib/utils/rate-limiter.util';
import { LocationUtils } from '../../lib/utils/location.utils';
import { GeocodingProviderId } from '../constants/geocoding.constants';
import { GeocodingErrorKind, GeocodingProviderError } from '../errors/geocoding.errors';
import { Coordinates, GeocodingProvider, GeoResult } from '../interfaces/geocoding.interface';

export type GeocodingHttpClient = Pick<AxiosInstance, 'get'>;

/** Collaborators shared by every adapter in a chain. */
export interface ProviderRuntime {
	http: GeocodingHttpClient;
	retry: RetryService;
	maxAttempts: number;
	baseDelayMs: number;
	/** Present only for providers whose upstream enforces a request cadence. */
	rateLimiter?: RateLimiter;
}

export interface ProviderRequest {
	url: string;
	params?: Record<string, string | number>;
	headers?: Record<string, string>;
}

export function createGeoResult(latitude: number, longitude: number, providerId: string): GeoResult {
	return Object.freeze({ latitude, longitude, providerId });
}

/**
 * Shared request/response flow for the geocoding adapters.
 *
 * Subclasses describe the request and read coordinates out of the payload; this class
 * waits on the rate limiter, performs the GET, classifies failures and retries the
 * transient ones through {@link RetryService}.
 */
export abstract class BaseGeocodingProvider implements GeocodingProvider {
	abstract readonly id: GeocodingProviderId;

	protected readonly logger = new Logger(this.constructor.name);

	/** HTTP statuses the upstream uses to signal throttling. */
	protected readonly rateLimitedStatuses: readonly number[] = [429];

	constructor(protected readonly runtime: ProviderRuntime) {}

	get rateLimitMs(): number | null {
		return this.runtime.rateLimiter?.minIntervalMs ?? null;
	}

	async resolve(address: string, signal?: AbortSignal): Promise<GeoResult> {
		return this.withRetry(() => this.attempt(address, signal), `Geocoding via ${this.id}`);
	}

	protected abstract buildRequest(address: string): ProviderRequest;

	/**
	 * Reads the best match out of a successful payload. Returns null when the upstream
	 * found nothing; throws (usually via {@link malformed}) when the payload is unusable.
	 */
	protected abstract parseResponse(data: unknown): Coordinates | null;

	/** Maps a non-2xx status to an error kind. */
	protected classifyStatus(status: number): GeocodingErrorKind {
		return this.rateLimitedStatuses.includes(status) ? GeocodingErrorKind.RATE_LIMITED : GeocodingErrorKind.UPSTREAM;
	}

	protected error(kind: GeocodingErrorKind, message: string, cause?: unknown): GeocodingProviderError {
		return new GeocodingProviderError(kind, this.id, message, cause === undefined ? undefined : { cause });
	}

	protected malformed(detail: string): GeocodingProviderError {
		return this.error(GeocodingErrorKind.UPSTREAM, `malformed response (${detail})`);
	}

	protected requireCredential(value: string | undefined, variable: string): string {
		if (!value) {
			throw this.error(GeocodingErrorKind.CREDENTIAL_MISSING, `credential not configured (${variable})`);
		}
		return value;
	}

	/** Repeats `fn` while it fails with a transient provider error. */
	protected withRetry<T>(fn: () => Promise<T>, operationName: string): Promise<T> {
		return this.runtime.retry.executeWithRetry(fn, {
			maxAttempts: this.runtime.maxAttempts,
			baseDelay: this.runtime.baseDelayMs,
			operationName,
			shouldRetry: (error) => error instanceof GeocodingProviderError && error.isTransient,
		});
	}

	/**
	 * Waits on the rate limiter and performs one GET. Returns the payload of a 2xx
	 * response; transport failures and other statuses throw a classified error.
	 */
	protected async fetchPayload(request: ProviderRequest, signal?: AbortSignal): Promise<unknown> {
		await this.runtime.rateLimiter?.acquire(signal);

		this.logger.debug(`GET ${request.url}`);
		let response: AxiosResponse<unknown>;
		try {
			response = await this.runtime.http.get<unknown>(request.url, {
				params: request.params,
				headers: request.headers,
				signal,
				validateStatus: () => true,
			});
		} catch (error) {
			throw this.classifyRequestError(error);
		}

		if (response.status < 200 || response.status >= 300) {
			const kind = this.classifyStatus(response.status);
			throw this.error(kind, `HTTP ${response.status}${describeBody(response.data)}`);
		}
		return response.data;
	}

	private async attempt(address: string, signal?: AbortSignal): Promise<GeoResult> {
		const data = await this.fetchPayload(this.buildRequest(address), signal);

		const coordinates = this.parseResponse(data);
		if (!coordinates) {
			throw this.error(GeocodingErrorKind.EMPTY_RESULT, `no match for "${address}"`);
		}
		if (!LocationUtils.isValidCoordinate(coordinates.latitude, coordinates.longitude)) {
			throw this.error(
				GeocodingErrorKind.UPSTREAM,
				`coordinates out of range (${coordinates.latitude}, ${coordinates.longitude})`,
			);
		}

		return createGeoResult(coordinates.latitude, coordinates.longitude, this.id);
	}

	private classifyRequestError(error: unknown): unknown {
		// Cancellation belongs to the caller and must not be retried or reported as a provider failure
		if (isCancel(error) || !isAxiosError(error)) {
			return error;
		}
		const reason = error.code ? `${error.code}: ${error.message}` : error.message;
		return this.error(GeocodingErrorKind.TRANSPORT, reason, error);
	}
}

function describeBody(data: unknown): string {
	if (typeof data === 'string' && data.trim() !== '') {
		return `: ${data.trim().slice(0, 200)}`;
	}
	if (data !== null && typeof data === 'object') {
		return `: ${JSON.stringify(data).slice(0, 200)}`;
	}
	return '';
}
