import { ApiProperty } from '@nestjs/swagger';

export class GeoResultDto {
	@ApiProperty({ example: 51.4545 })
	latitude!: number;

	@ApiProperty({ example: -2.5879 })
	longitude!: number;

	@ApiProperty({ description: 'Provider that produced the coordinates', example: 'nominatim' })
	providerId!: string;
}

export class ProviderDescriptorDto {
	@ApiProperty({ example: 'opencage' })
	id!: string;

	@ApiProperty({ description: 'Whether the credential the provider needs is configured' })
	credentialPresent!: boolean;

	@ApiProperty({ description: 'Minimum gap between requests in milliseconds', nullable: true, example: null })
	rateLimitMs!: number | null;
}

export class ProvidersResponseDto {
	@ApiProperty({ description: 'Ids of the providers actually tried, in order', example: ['nominatim', 'google'] })
	chain!: string[];

	@ApiProperty({ type: [ProviderDescriptorDto] })
	configured!: ProviderDescriptorDto[];
}
