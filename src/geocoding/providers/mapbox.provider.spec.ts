import { createRuntime, httpResponse } from '../../../test/utils/geocoding.mocks';
import { GeocodingErrorKind } from '../errors/geocoding.errors';
import { MapboxProvider } from './mapbox.provider';

describe('MapboxProvider', () => {
	const settings = { baseUrl: 'https://mapbox.test/geocoding/v5/mapbox.places/', apiKey: 'test-token' };

	it('should put the encoded address in the path and swap the [lon, lat] center', async () => {
		const { runtime, get } = createRuntime();
		get.mockResolvedValue(httpResponse(200, { features: [{ center: [-0.1276, 51.5072] }] }));

		const result = await new MapboxProvider(runtime, settings).resolve('London, UK');

		expect(result).toEqual({ latitude: 51.5072, longitude: -0.1276, providerId: 'mapbox' });
		expect(get).toHaveBeenCalledWith(
			'https://mapbox.test/geocoding/v5/mapbox.places/London%2C%20UK.json',
			expect.objectContaining({ params: { access_token: 'test-token', limit: 1 } }),
		);
	});

	it('should report no features as EMPTY_RESULT', async () => {
		const { runtime, get } = createRuntime();
		get.mockResolvedValue(httpResponse(200, { type: 'FeatureCollection', features: [] }));

		await expect(new MapboxProvider(runtime, settings).resolve('zzzz')).rejects.toMatchObject({
			kind: GeocodingErrorKind.EMPTY_RESULT,
		});
	});

	it('should reject a feature without a usable center', async () => {
		const { runtime, get } = createRuntime();
		get.mockResolvedValue(httpResponse(200, { features: [{ center: [-0.1276] }] }));

		await expect(new MapboxProvider(runtime, settings).resolve('London')).rejects.toMatchObject({
			kind: GeocodingErrorKind.UPSTREAM,
			message: 'mapbox: malformed response (missing center)',
		});
	});
});
