import { Module } from '@nestjs/common';
import { RetryService } from './services/retry.service';

@Module({
	providers: [RetryService],
	exports: [RetryService],
})
export class LibModule {}
