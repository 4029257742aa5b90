import { createRuntime, httpResponse } from '../../../test/utils/geocoding.mocks';
import { GeocodingErrorKind } from '../errors/geocoding.errors';
import { OpenCageProvider } from './opencage.provider';

describe('OpenCageProvider', () => {
	const settings = { baseUrl: 'https://opencage.test/geocode/v1/json', apiKey: 'test-key' };

	it('should read geometry from the first result', async () => {
		const { runtime, get } = createRuntime();
		get.mockResolvedValue(
			httpResponse(200, {
				results: [
					{ geometry: { lat: 48.8584, lng: 2.2945 } },
					{ geometry: { lat: 0, lng: 0 } },
				],
			}),
		);

		const result = await new OpenCageProvider(runtime, settings).resolve('Eiffel Tower');

		expect(result).toEqual({ latitude: 48.8584, longitude: 2.2945, providerId: 'opencage' });
		expect(get).toHaveBeenCalledWith(
			'https://opencage.test/geocode/v1/json',
			expect.objectContaining({ params: { q: 'Eiffel Tower', key: 'test-key', limit: 1 } }),
		);
	});

	it('should treat an exhausted quota (402) as rate limiting', async () => {
		const { runtime, get } = createRuntime({ maxAttempts: 2 });
		get.mockResolvedValue(httpResponse(402, { status: { code: 402, message: 'quota exceeded' } }));

		await expect(new OpenCageProvider(runtime, settings).resolve('Paris')).rejects.toMatchObject({
			kind: GeocodingErrorKind.RATE_LIMITED,
		});
		expect(get).toHaveBeenCalledTimes(2);
	});

	it('should report an empty result list as EMPTY_RESULT', async () => {
		const { runtime, get } = createRuntime();
		get.mockResolvedValue(httpResponse(200, { results: [] }));

		await expect(new OpenCageProvider(runtime, settings).resolve('zzzz')).rejects.toMatchObject({
			kind: GeocodingErrorKind.EMPTY_RESULT,
		});
	});

	it('should reject a payload without results', async () => {
		const { runtime, get } = createRuntime();
		get.mockResolvedValue(httpResponse(200, { total_results: 0 }));

		await expect(new OpenCageProvider(runtime, settings).resolve('Paris')).rejects.toMatchObject({
			kind: GeocodingErrorKind.UPSTREAM,
			message: 'opencage: malformed response (missing results)',
		});
	});
});
