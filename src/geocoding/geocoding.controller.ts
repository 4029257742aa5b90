import { Controller, Get, Query, ValidationPipe } from '@nestjs/common';
import {
	ApiBadGatewayResponse,
	ApiBadRequestResponse,
	ApiOkResponse,
	ApiOperation,
	ApiProduces,
	ApiServiceUnavailableResponse,
	ApiTags,
} from '@nestjs/swagger';
import { GeocodingManagerService } from './services/geocoding-manager.service';
import { ResolveAddressDto } from './dto/resolve-address.dto';
import { GeoResultDto, ProvidersResponseDto } from './dto/geo-result.dto';
import { toHttpException } from './utils/resolution-error.util';

@ApiTags('🌍 Geocoding')
@Controller('geocoding')
@ApiProduces('application/json')
export class GeocodingController {
	constructor(private readonly geocodingManager: GeocodingManagerService) {}

	@Get('resolve')
	@ApiOperation({
		summary: 'Resolve an address to coordinates',
		description: 'Checks the geocode cache, then tries each configured provider in order until one succeeds.',
	})
	@ApiOkResponse({ type: GeoResultDto })
	@ApiBadRequestResponse({ description: 'Missing or blank address' })
	@ApiBadGatewayResponse({ description: 'Every provider in the chain failed' })
	@ApiServiceUnavailableResponse({ description: 'No provider is configured' })
	async resolve(@Query(new ValidationPipe({ transform: true })) query: ResolveAddressDto): Promise<GeoResultDto> {
		try {
			const result = await this.geocodingManager.resolve(query.address, { verbose: query.verbose });
			return { latitude: result.latitude, longitude: result.longitude, providerId: result.providerId };
		} catch (error) {
			throw toHttpException(error);
		}
	}

	@Get('providers')
	@ApiOperation({ summary: 'List the configured providers and the active chain' })
	@ApiOkResponse({ type: ProvidersResponseDto })
	providers(): ProvidersResponseDto {
		return {
			chain: this.geocodingManager.providerIds,
			configured: this.geocodingManager.describeProviders().map((descriptor) => ({ ...descriptor })),
		};
	}
}
