import { Test, TestingModule } from '@nestjs/testing';
import { GeocodingManagerService } from '../geocoding/services/geocoding-manager.service';
import { ReverseGeocodingService } from '../geocoding/services/reverse-geocoding.service';
import { EmptyProviderChainError } from '../geocoding/errors/geocoding.errors';
import { SuppliersService } from './suppliers.service';
import { OverpassElement, Supplier } from './interfaces/supplier.interface';

describe('SuppliersService', () => {
	let service: SuppliersService;

	const mockGeocodingManager = {
		resolve: jest.fn(),
	};

	const mockReverseGeocoding = {
		lookup: jest.fn(),
	};

	const origin = { latitude: 51.5, longitude: -2.5 };

	const elements: OverpassElement[] = [
		{ type: 'node', id: 1, lat: 51.6, lon: -2.5, tags: { name: 'Bristol Composites', 'addr:full': '1 Test Road' } },
		{ type: 'node', id: 2, lat: 51.52, lon: -2.5, tags: { industrial: 'factory' } },
		{ type: 'way', id: 3, center: { lat: 51.52005, lon: -2.5 }, tags: { name: 'Filton Machining' } },
		{ type: 'way', id: 4, tags: { name: 'No Geometry Ltd' } },
	];

	const supplier = (overrides: Partial<Supplier>): Supplier => ({
		name: 'Acme',
		address: '',
		latitude: 51.5,
		longitude: -2.5,
		distanceMiles: 1,
		source: 'overpass',
		confidence: 0.5,
		...overrides,
	});

	beforeEach(async () => {
		jest.clearAllMocks();

		const module: TestingModule = await Test.createTestingModule({
			providers: [
				SuppliersService,
				{ provide: GeocodingManagerService, useValue: mockGeocodingManager },
				{ provide: ReverseGeocodingService, useValue: mockReverseGeocoding },
			],
		}).compile();

		service = module.get<SuppliersService>(SuppliersService);
	});

	describe('scoreSupplier', () => {
		it('should favour specialist names regardless of case', () => {
			expect(service.scoreSupplier({ name: 'Avionics Ltd' })).toBe(0.9);
			expect(service.scoreSupplier({ name: 'Western DEFENCE Systems', building: 'yes' })).toBe(0.9);
		});

		it('should score industrial or building features above the baseline', () => {
			expect(service.scoreSupplier({ name: 'Generic Works', building: 'yes' })).toBe(0.7);
			expect(service.scoreSupplier({ industrial: 'factory' })).toBe(0.7);
			expect(service.scoreSupplier({ name: 'Corner Shop' })).toBe(0.5);
			expect(service.scoreSupplier()).toBe(0.5);
		});
	});

	describe('toSupplier', () => {
		it('should map a node with its distance in miles', () => {
			expect(service.toSupplier(elements[0], origin)).toEqual({
				name: 'Bristol Composites',
				address: '1 Test Road',
				latitude: 51.6,
				longitude: -2.5,
				distanceMiles: 6.91,
				source: 'overpass',
				confidence: 0.9,
			});
		});

		it('should fall back to the way center and an Unknown name', () => {
			expect(service.toSupplier({ type: 'way', center: { lat: 51.52, lon: -2.5 } }, origin)).toEqual({
				name: 'Unknown',
				address: '',
				latitude: 51.52,
				longitude: -2.5,
				distanceMiles: 1.38,
				source: 'overpass',
				confidence: 0.5,
			});
		});

		it('should skip elements without coordinates', () => {
			expect(service.toSupplier(elements[3], origin)).toBeNull();
		});
	});

	describe('deduplicate', () => {
		it('should keep the more confident of two nearby records with the same name', () => {
			const weak = supplier({ name: 'Acme', confidence: 0.5 });
			const strong = supplier({ name: 'ACME', latitude: 51.50005, confidence: 0.7 });

			expect(service.deduplicate([weak, strong])).toEqual([strong]);
		});

		it('should merge an unnamed record into a nearby named one', () => {
			const named = supplier({ name: 'Filton Machining', confidence: 0.9 });
			const unnamed = supplier({ name: 'Unknown', latitude: 51.50005, confidence: 0.7 });

			expect(service.deduplicate([named, unnamed])).toEqual([named]);
		});

		it('should keep a real name that only contains the word unknown apart', () => {
			const named = supplier({ name: 'Acme Aero', confidence: 0.9 });
			const lookalike = supplier({ name: 'Unknown Pleasures Machining', latitude: 51.50005, confidence: 0.9 });

			expect(service.deduplicate([named, lookalike])).toEqual([named, lookalike]);
		});

		it('should keep distinct names and distant records apart', () => {
			const a = supplier({ name: 'Acme' });
			const b = supplier({ name: 'Beta', latitude: 51.50005 });
			const farAcme = supplier({ name: 'Acme', latitude: 51.501 });

			expect(service.deduplicate([a, b, farAcme])).toEqual([a, b, farAcme]);
		});

		it('should honour a custom merge radius', () => {
			const a = supplier({ name: 'Acme' });
			const farAcme = supplier({ name: 'Acme', latitude: 51.501, confidence: 0.9 });

			expect(service.deduplicate([a, farAcme], 200)).toEqual([farAcme]);
		});
	});

	describe('rank', () => {
		it('should drop unusable elements, deduplicate and sort by distance', () => {
			const ranked = service.rank(origin, elements);

			expect(ranked.map((item) => [item.name, item.distanceMiles, item.confidence])).toEqual([
				['Filton Machining', 1.39, 0.9],
				['Bristol Composites', 6.91, 0.9],
			]);
		});

		it('should keep every record when deduplication is off', () => {
			const ranked = service.rank(origin, elements, { deduplicate: false });

			expect(ranked.map((item) => item.name)).toEqual(['Unknown', 'Filton Machining', 'Bristol Composites']);
		});
	});

	describe('rankNear', () => {
		it('should rank around the resolved facility', async () => {
			mockGeocodingManager.resolve.mockResolvedValue({ latitude: 51.5, longitude: -2.5, providerId: 'nominatim' });

			const ranking = await service.rankNear('Bristol', elements, { verbose: true });

			expect(ranking.facility).toEqual({ latitude: 51.5, longitude: -2.5, providerId: 'nominatim' });
			expect(ranking.suppliers).toHaveLength(2);
			expect(mockGeocodingManager.resolve).toHaveBeenCalledWith('Bristol', { verbose: true, signal: undefined });
			expect(mockReverseGeocoding.lookup).not.toHaveBeenCalled();
		});

		it('should add postal addresses to the ranked suppliers when asked', async () => {
			mockGeocodingManager.resolve.mockResolvedValue({ latitude: 51.5, longitude: -2.5, providerId: 'nominatim' });
			mockReverseGeocoding.lookup
				.mockResolvedValueOnce({ street: 'Gipsy Patch Lane', postcode: 'BS34 7QW', city: 'Bristol', country: 'United Kingdom' })
				.mockResolvedValueOnce(null);

			const ranking = await service.rankNear('Bristol', elements, { reverseGeocode: true });

			expect(mockReverseGeocoding.lookup).toHaveBeenCalledTimes(2);
			expect(mockReverseGeocoding.lookup).toHaveBeenNthCalledWith(1, 51.52005, -2.5, undefined);
			expect(mockReverseGeocoding.lookup).toHaveBeenNthCalledWith(2, 51.6, -2.5, undefined);
			expect(ranking.suppliers).toEqual([
				{
					name: 'Filton Machining',
					address: '',
					latitude: 51.52005,
					longitude: -2.5,
					distanceMiles: 1.39,
					source: 'overpass',
					confidence: 0.9,
					street: 'Gipsy Patch Lane',
					postcode: 'BS34 7QW',
					city: 'Bristol',
					country: 'United Kingdom',
				},
				{
					name: 'Bristol Composites',
					address: '1 Test Road',
					latitude: 51.6,
					longitude: -2.5,
					distanceMiles: 6.91,
					source: 'overpass',
					confidence: 0.9,
				},
			]);
		});

		it('should let resolution failures propagate', async () => {
			mockGeocodingManager.resolve.mockRejectedValue(new EmptyProviderChainError('Bristol'));

			await expect(service.rankNear('Bristol', elements)).rejects.toBeInstanceOf(EmptyProviderChainError);
		});
	});
});
