import { LocationUtils } from './location.utils';

describe('LocationUtils', () => {
	describe('calculateDistance', () => {
		it('should return zero for the same point', () => {
			expect(LocationUtils.calculateDistance(51.5, -2.5, 51.5, -2.5)).toBe(0);
		});

		it('should measure a tenth of a degree of latitude as about 11.12 km', () => {
			expect(LocationUtils.calculateDistance(51.5, -2.5, 51.6, -2.5)).toBeCloseTo(11.1195, 3);
			expect(LocationUtils.distanceInMiles(51.5, -2.5, 51.6, -2.5)).toBeCloseTo(6.9093, 3);
			expect(LocationUtils.distanceInMeters(51.5, -2.5, 51.6, -2.5)).toBeCloseTo(11119.5, 0);
		});
	});

	describe('isValidCoordinate', () => {
		it('should accept the bounds of the globe', () => {
			expect(LocationUtils.isValidCoordinate(90, 180)).toBe(true);
			expect(LocationUtils.isValidCoordinate(-90, -180)).toBe(true);
		});

		it('should reject out-of-range or non-finite values', () => {
			expect(LocationUtils.isValidCoordinate(90.1, 0)).toBe(false);
			expect(LocationUtils.isValidCoordinate(0, -180.5)).toBe(false);
			expect(LocationUtils.isValidCoordinate(Number.NaN, 0)).toBe(false);
		});
	});

	it('should round to the requested number of decimals', () => {
		expect(LocationUtils.roundTo(6.90934, 2)).toBe(6.91);
		expect(LocationUtils.roundTo(1.3819, 2)).toBe(1.38);
	});
});
