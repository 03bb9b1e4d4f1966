import { afterEach, describe, it, expect, vi } from 'vitest';
import { createApp, type App } from '../../src/index';
import { UrlPredictor } from '../../src/services/predictor';
import { ApiRequestError, PhishingApiClient } from '../../src/test-utils/api-client';
import { createTestPredictor } from '../helpers/fixtures';

function routeFetchTo(app: App) {
	const fetchThroughApp: typeof fetch = async (input, init) => app.fetch(new Request(input, init));
	vi.stubGlobal('fetch', fetchThroughApp);
}

describe('PhishingApiClient', () => {
	const client = new PhishingApiClient({ baseUrl: 'http://localhost:5000/' });

	afterEach(() => {
		vi.unstubAllGlobals();
	});

	describe('against a running app', () => {
		it('reads the health endpoint', async () => {
			routeFetchTo(createApp({ predictor: createTestPredictor() }));

			const health = await client.health();
			expect(health.model_loaded).toBe(true);
			expect(health.model_version).toBe('test-model-v1');
		});

		it('classifies single URLs and batches', async () => {
			routeFetchTo(createApp({ predictor: createTestPredictor() }));

			const single = await client.predict('http://192.168.1.1/login');
			expect(single.prediction).toBe('phishing');

			const batch = await client.predictBatch(['https://www.google.com', 'http://example.com']);
			expect(batch.total_processed).toBe(2);
			expect(batch.results.map((entry) => entry.status)).toEqual(['success', 'success']);
		});

		it('reads features', async () => {
			routeFetchTo(createApp({ predictor: createTestPredictor() }));

			const response = await client.features('https://www.google.com');
			expect(response.features.url_length).toBe(22);
			expect(response.features.has_https).toBe(1);
		});
	});

	describe('errors', () => {
		it('surfaces the server error message', async () => {
			routeFetchTo(createApp({ predictor: createTestPredictor() }));

			const failure = client.predict('');
			await expect(failure).rejects.toBeInstanceOf(ApiRequestError);
			await expect(failure).rejects.toMatchObject({ status: 400, message: 'HTTP 400: Invalid URL provided' });
		});

		it('reports an unavailable model', async () => {
			routeFetchTo(createApp({ predictor: new UrlPredictor(null) }));

			await expect(client.predict('http://example.com')).rejects.toMatchObject({
				status: 503,
				message: 'HTTP 503: Model not loaded',
			});
		});

		it('rejects bodies of the wrong shape', async () => {
			vi.stubGlobal('fetch', async () => new Response(JSON.stringify({ ok: true }), { status: 200 }));

			await expect(client.health()).rejects.toThrow('Unexpected response shape from /');
		});

		it('times out slow requests', async () => {
			const hangingFetch: typeof fetch = (_input, init) =>
				new Promise((_resolve, reject) => {
					init?.signal?.addEventListener('abort', () => {
						const error = new Error('aborted');
						error.name = 'AbortError';
						reject(error);
					});
				});
			vi.stubGlobal('fetch', hangingFetch);

			const impatient = new PhishingApiClient({ baseUrl: 'http://localhost:5000', timeout: 10 });
			await expect(impatient.health()).rejects.toThrow('Request timeout after 10ms');
		});
	});
});
