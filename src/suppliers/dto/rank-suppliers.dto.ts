import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
	IsArray,
	IsBoolean,
	IsIn,
	IsLatitude,
	IsLongitude,
	IsNotEmpty,
	IsNumber,
	IsObject,
	IsOptional,
	IsPositive,
	IsString,
	Matches,
	ValidateNested,
} from 'class-validator';

class ElementCenterDto {
	@IsLatitude()
	@ApiProperty({ example: 51.52 })
	lat!: number;

	@IsLongitude()
	@ApiProperty({ example: -2.56 })
	lon!: number;
}

export class OverpassElementDto {
	@IsIn(['node', 'way'])
	@ApiProperty({ enum: ['node', 'way'] })
	type!: 'node' | 'way';

	@IsOptional()
	@IsNumber()
	@ApiProperty({ required: false })
	id?: number;

	@IsOptional()
	@IsLatitude()
	@ApiProperty({ required: false, description: 'Node latitude' })
	lat?: number;

	@IsOptional()
	@IsLongitude()
	@ApiProperty({ required: false, description: 'Node longitude' })
	lon?: number;

	@IsOptional()
	@ValidateNested()
	@Type(() => ElementCenterDto)
	@ApiProperty({ required: false, type: ElementCenterDto, description: 'Way center from `out center;`' })
	center?: ElementCenterDto;

	@IsOptional()
	@IsObject()
	@ApiProperty({
		required: false,
		example: { name: 'Filton Composites Ltd', building: 'industrial' },
	})
	tags?: Record<string, string>;
}

export class RankSuppliersDto {
	@IsString()
	@IsNotEmpty()
	@Matches(/\S/, { message: 'address must not be blank' })
	@ApiProperty({ description: 'Facility address', example: '1000 Enterprise Way, Bristol BS34 8QZ, UK' })
	address!: string;

	@IsArray()
	@ValidateNested({ each: true })
	@Type(() => OverpassElementDto)
	@ApiProperty({ type: [OverpassElementDto], description: 'Candidate features from an Overpass query' })
	elements!: OverpassElementDto[];

	@IsOptional()
	@IsBoolean()
	@ApiProperty({ required: false, default: true })
	deduplicate?: boolean;

	@IsOptional()
	@IsPositive()
	@ApiProperty({ required: false, default: 50, description: 'Merge radius for duplicates in meters' })
	dedupeDistanceMeters?: number;

	@IsOptional()
	@IsBoolean()
	@ApiProperty({
		required: false,
		default: false,
		description: 'Add street, postcode, city and country to each supplier via Nominatim reverse lookups',
	})
	reverseGeocode?: boolean;

	@IsOptional()
	@IsBoolean()
	@ApiProperty({ required: false, default: false })
	verbose?: boolean;
}
