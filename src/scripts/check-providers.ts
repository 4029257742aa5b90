#!/usr/bin/env node

/**
 * Check Providers Script
 *
 * Resolves a handful of addresses through the configured geocoding chain with tracing
 * on, to confirm that credentials and provider order work end to end.
 *
 * Usage:
 *   npm run check:providers
 *   npm run check:providers -- --address "10 Downing Street, London, UK" --address "..."
 *   npm run check:providers -- --quiet
 *
 * Environment Variables:
 *   GEOCODER_ORDER, NOMINATIM_URL, LOCATIONIQ_KEY, OPENCAGE_KEY, HERE_API_KEY,
 *   MAPBOX_TOKEN, GOOGLE_GEOCODING_API_KEY, GEOCODE_CACHE_DB
 */

import 'reflect-metadata';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../app.module';
import { GeocodingManagerService } from '../geocoding/services/geocoding-manager.service';

const DEFAULT_ADDRESSES = [
	'1000 Enterprise Way, Bristol BS34 8QZ, UK',
	'10 Downing Street, London, UK',
	'1600 Amphitheatre Parkway, Mountain View, CA',
];

async function main(): Promise<void> {
	const argv = await yargs(hideBin(process.argv))
		.option('address', {
			alias: 'a',
			type: 'string',
			array: true,
			description: 'Address to resolve (repeatable)',
		})
		.option('quiet', {
			alias: 'q',
			type: 'boolean',
			default: false,
			description: 'Do not print per-provider trace lines',
		})
		.strict()
		.help()
		.parse();

	const addresses = argv.address && argv.address.length > 0 ? argv.address : DEFAULT_ADDRESSES;

	const app = await NestFactory.createApplicationContext(AppModule, { logger: ['log', 'warn', 'error'] });
	let failed = 0;

	try {
		const manager = app.get(GeocodingManagerService);
		console.log(`Provider chain: ${manager.providerIds.join(' -> ') || '(empty)'}\n`);

		for (const address of addresses) {
			try {
				const result = await manager.resolve(address, { verbose: !argv.quiet });
				console.log(
					`OK: [${result.providerId}] ${address} -> ${result.latitude.toFixed(6)},${result.longitude.toFixed(6)}`,
				);
			} catch (error) {
				failed++;
				console.error(`FAIL for '${address}': ${error instanceof Error ? error.message : String(error)}`);
			}
		}
	} finally {
		await app.close();
	}

	if (failed === addresses.length) {
		process.exitCode = 1;
	}
}

main().catch((error) => {
	console.error('❌ Provider check failed:', error);
	process.exit(1);
});
