import { ApiProperty } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsBoolean, IsNotEmpty, IsOptional, IsString, Matches, MaxLength } from 'class-validator';

export class ResolveAddressDto {
	@IsString()
	@IsNotEmpty()
	@Matches(/\S/, { message: 'address must not be blank' })
	@MaxLength(1000)
	@ApiProperty({
		description: 'Free-text address of the facility',
		example: '1000 Enterprise Way, Bristol BS34 8QZ, UK',
	})
	address!: string;

	@IsOptional()
	@IsBoolean()
	@Transform(({ value }) => value === true || value === 'true' || value === '1')
	@ApiProperty({
		description: 'Emit a trace event per cache check and provider attempt',
		required: false,
		default: false,
	})
	verbose?: boolean;
}
