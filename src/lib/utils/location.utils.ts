const KM_PER_MILE = 1.609344;

export class LocationUtils {
	// Haversine formula to calculate distance between two points
	static calculateDistance(lat1: number, lon1: number, lat2: number, lon2: number): number {
		const R = 6371; // Earth's radius in kilometers
		const dLat = this.toRad(lat2 - lat1);
		const dLon = this.toRad(lon2 - lon1);
		const a =
			Math.sin(dLat / 2) * Math.sin(dLat / 2) +
			Math.cos(this.toRad(lat1)) * Math.cos(this.toRad(lat2)) * Math.sin(dLon / 2) * Math.sin(dLon / 2);
		const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
		return R * c; // Distance in kilometers
	}

	static distanceInMiles(lat1: number, lon1: number, lat2: number, lon2: number): number {
		return this.calculateDistance(lat1, lon1, lat2, lon2) / KM_PER_MILE;
	}

	static distanceInMeters(lat1: number, lon1: number, lat2: number, lon2: number): number {
		return this.calculateDistance(lat1, lon1, lat2, lon2) * 1000;
	}

	static isValidCoordinate(latitude: number, longitude: number): boolean {
		return (
			Number.isFinite(latitude) &&
			Number.isFinite(longitude) &&
			latitude >= -90 &&
			latitude <= 90 &&
			longitude >= -180 &&
			longitude <= 180
		);
	}

	static roundTo(value: number, decimals: number): number {
		const factor = Math.pow(10, decimals);
		return Math.round(value * factor) / factor;
	}

	private static toRad(degrees: number): number {
		return degrees * (Math.PI / 180);
	}
}
