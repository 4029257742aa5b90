import { Body, Controller, HttpCode, Post, ValidationPipe } from '@nestjs/common';
import {
	ApiBadGatewayResponse,
	ApiBadRequestResponse,
	ApiBody,
	ApiOkResponse,
	ApiOperation,
	ApiServiceUnavailableResponse,
	ApiTags,
} from '@nestjs/swagger';
import { SuppliersService } from './suppliers.service';
import { RankSuppliersDto } from './dto/rank-suppliers.dto';
import { SupplierRanking } from './interfaces/supplier.interface';
import { toHttpException } from '../geocoding/utils/resolution-error.util';

@ApiTags('🏭 Suppliers')
@Controller('suppliers')
export class SuppliersController {
	constructor(private readonly suppliersService: SuppliersService) {}

	@Post('rank')
	@HttpCode(200)
	@ApiOperation({
		summary: 'Rank candidate suppliers around a facility',
		description: 'Geocodes the facility address, then scores, deduplicates and sorts the supplied features by distance.',
	})
	@ApiBody({ type: RankSuppliersDto })
	@ApiOkResponse({ description: 'Facility coordinates and ranked suppliers' })
	@ApiBadRequestResponse({ description: 'Invalid request body' })
	@ApiBadGatewayResponse({ description: 'Every geocoding provider failed' })
	@ApiServiceUnavailableResponse({ description: 'No geocoding provider is configured' })
	async rank(@Body(new ValidationPipe({ transform: true })) body: RankSuppliersDto): Promise<SupplierRanking> {
		try {
			return await this.suppliersService.rankNear(body.address, body.elements, {
				deduplicate: body.deduplicate,
				dedupeDistanceMeters: body.dedupeDistanceMeters,
				reverseGeocode: body.reverseGeocode,
				verbose: body.verbose,
			});
		} catch (error) {
			throw toHttpException(error);
		}
	}
}
