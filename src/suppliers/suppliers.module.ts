import { Module } from '@nestjs/common';
import { GeocodingModule } from '../geocoding/geocoding.module';
import { SuppliersController } from './suppliers.controller';
import { SuppliersService } from './suppliers.service';

@Module({
	imports: [GeocodingModule],
	controllers: [SuppliersController],
	providers: [SuppliersService],
	exports: [SuppliersService],
})
export class SuppliersModule {}
