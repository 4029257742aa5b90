import { BadGatewayException, ServiceUnavailableException } from '@nestjs/common';
import { AllProvidersExhaustedError, EmptyProviderChainError } from '../errors/geocoding.errors';

/** Translates manager-level resolution failures into HTTP exceptions; rethrows anything else. */
export function toHttpException(error: unknown): unknown {
	if (error instanceof EmptyProviderChainError) {
		return new ServiceUnavailableException({
			statusCode: 503,
			error: 'EmptyProviderChain',
			message: error.message,
		});
	}
	if (error instanceof AllProvidersExhaustedError) {
		return new BadGatewayException({
			statusCode: 502,
			error: 'AllProvidersExhausted',
			message: error.message,
			failures: error.failures,
		});
	}
	return error;
}
