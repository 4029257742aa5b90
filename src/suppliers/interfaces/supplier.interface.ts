import { GeoResult, PostalAddress, ResolveOptions } from '../../geocoding/interfaces/geocoding.interface';

/** A node or way as returned by an Overpass `out center;` query. */
export interface OverpassElement {
	type: 'node' | 'way';
	id?: number;
	lat?: number;
	lon?: number;
	center?: { lat: number; lon: number };
	tags?: Record<string, string>;
}

/** Postal address parts are present only after reverse geocoding found an address. */
export interface Supplier extends Partial<PostalAddress> {
	name: string;
	address: string;
	latitude: number;
	longitude: number;
	distanceMiles: number;
	source: 'overpass';
	confidence: number;
}

export interface RankOptions {
	deduplicate?: boolean;
	dedupeDistanceMeters?: number;
}

export interface RankNearOptions extends RankOptions, ResolveOptions {
	/** Look up each ranked supplier's postal address through Nominatim. */
	reverseGeocode?: boolean;
}

export interface SupplierRanking {
	facility: GeoResult;
	suppliers: Supplier[];
}
