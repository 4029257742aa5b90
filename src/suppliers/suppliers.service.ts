import { Injectable, Logger } from '@nestjs/common';
import { LocationUtils } from '../lib/utils/location.utils';
import { GeocodingManagerService } from '../geocoding/services/geocoding-manager.service';
import { ReverseGeocodingService } from '../geocoding/services/reverse-geocoding.service';
import { Coordinates } from '../geocoding/interfaces/geocoding.interface';
import {
	OverpassElement,
	RankNearOptions,
	RankOptions,
	Supplier,
	SupplierRanking,
} from './interfaces/supplier.interface';

const SPECIALIST_KEYWORDS = ['aero', 'avionics', 'composite', 'defence', 'machining'];
const DEFAULT_DEDUPE_DISTANCE_METERS = 50;
// Lower-cased placeholder name of an untagged element
const UNNAMED = 'unknown';

@Injectable()
export class SuppliersService {
	private readonly logger = new Logger(SuppliersService.name);

	constructor(
		private readonly geocodingManager: GeocodingManagerService,
		private readonly reverseGeocoding: ReverseGeocodingService,
	) {}

	/**
	 * Resolves the facility address and ranks candidate features around it, optionally
	 * adding each supplier's postal address. Resolution failures propagate unchanged.
	 */
	async rankNear(
		address: string,
		elements: readonly OverpassElement[],
		options: RankNearOptions = {},
	): Promise<SupplierRanking> {
		const facility = await this.geocodingManager.resolve(address, {
			verbose: options.verbose,
			signal: options.signal,
		});
		const ranked = this.rank(facility, elements, options);
		const suppliers = options.reverseGeocode ? await this.withPostalAddresses(ranked, options.signal) : ranked;
		this.logger.log(`Ranked ${suppliers.length} suppliers near "${address.trim()}" (${facility.providerId})`);
		return { facility, suppliers };
	}

	rank(origin: Coordinates, elements: readonly OverpassElement[], options: RankOptions = {}): Supplier[] {
		const mapped = elements
			.map((element) => this.toSupplier(element, origin))
			.filter((supplier): supplier is Supplier => supplier !== null);

		const suppliers =
			options.deduplicate === false
				? mapped
				: this.deduplicate(mapped, options.dedupeDistanceMeters ?? DEFAULT_DEDUPE_DISTANCE_METERS);

		return [...suppliers].sort((a, b) => a.distanceMiles - b.distanceMiles);
	}

	/** Suppliers without a known address are returned unchanged; order is kept. */
	async withPostalAddresses(suppliers: readonly Supplier[], signal?: AbortSignal): Promise<Supplier[]> {
		return Promise.all(
			suppliers.map(async (supplier) => {
				const postal = await this.reverseGeocoding.lookup(supplier.latitude, supplier.longitude, signal);
				return postal ? { ...supplier, ...postal } : supplier;
			}),
		);
	}

	scoreSupplier(tags: Record<string, string> = {}): number {
		const name = (tags.name ?? '').toLowerCase();
		if (SPECIALIST_KEYWORDS.some((keyword) => name.includes(keyword))) {
			return 0.9;
		}
		if ('industrial' in tags || 'building' in tags) {
			return 0.7;
		}
		return 0.5;
	}

	/** Returns null for elements that carry neither a position nor a center. */
	toSupplier(element: OverpassElement, origin: Coordinates): Supplier | null {
		const latitude = element.lat ?? element.center?.lat;
		const longitude = element.lon ?? element.center?.lon;
		if (latitude === undefined || longitude === undefined) {
			return null;
		}

		const tags = element.tags ?? {};
		const distance = LocationUtils.distanceInMiles(origin.latitude, origin.longitude, latitude, longitude);

		return {
			name: tags.name ?? 'Unknown',
			address: tags['addr:full'] ?? '',
			latitude,
			longitude,
			distanceMiles: LocationUtils.roundTo(distance, 2),
			source: 'overpass',
			confidence: this.scoreSupplier(tags),
		};
	}

	/**
	 * Collapses records that sit within `distanceMeters` of an earlier record and share its
	 * name (or where either is unnamed). The more confident record takes the earlier slot.
	 */
	deduplicate(suppliers: readonly Supplier[], distanceMeters = DEFAULT_DEDUPE_DISTANCE_METERS): Supplier[] {
		const unique: Supplier[] = [];

		for (const candidate of suppliers) {
			const index = unique.findIndex((kept) => this.isSameSupplier(candidate, kept, distanceMeters));
			if (index === -1) {
				unique.push(candidate);
			} else if (candidate.confidence > unique[index].confidence) {
				unique[index] = candidate;
			}
		}

		return unique;
	}

	private isSameSupplier(a: Supplier, b: Supplier, distanceMeters: number): boolean {
		const distance = LocationUtils.distanceInMeters(a.latitude, a.longitude, b.latitude, b.longitude);
		if (distance >= distanceMeters) {
			return false;
		}
		const nameA = a.name.toLowerCase();
		const nameB = b.name.toLowerCase();
		return nameA === nameB || nameA === UNNAMED || nameB === UNNAMED;
	}
}
