/**
 * API Client
 * Talks to a running classifier deployment; used by the CLI smoke test.
 */

import type {
	BatchPredictionResponse,
	FeatureExtractionResponse,
	HealthResponse,
	PredictionResult,
} from '../types';

export interface APIClientOptions {
	baseUrl: string;
	timeout?: number;
}

export class ApiRequestError extends Error {
	readonly status: number;

	constructor(status: number, message: string) {
		super(`HTTP ${status}: ${message}`);
		this.name = 'ApiRequestError';
		this.status = status;
	}
}

type ResponseGuard<T> = (body: unknown) => body is T;

function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function errorMessageFrom(body: unknown, fallback: string): string {
	if (isRecord(body) && typeof body.error === 'string') {
		return body.error;
	}
	return fallback;
}

const isHealthResponse: ResponseGuard<HealthResponse> = (body): body is HealthResponse =>
	isRecord(body) && typeof body.model_loaded === 'boolean' && typeof body.status === 'string';

const isPredictionResult: ResponseGuard<PredictionResult> = (body): body is PredictionResult =>
	isRecord(body) &&
	body.status === 'success' &&
	(body.prediction === 'safe' || body.prediction === 'phishing') &&
	typeof body.probability === 'number' &&
	typeof body.confidence === 'number';

const isBatchResponse: ResponseGuard<BatchPredictionResponse> = (body): body is BatchPredictionResponse =>
	isRecord(body) && Array.isArray(body.results) && typeof body.total_processed === 'number';

const isFeatureResponse: ResponseGuard<FeatureExtractionResponse> = (body): body is FeatureExtractionResponse =>
	isRecord(body) && isRecord(body.features) && typeof body.url === 'string';

export class PhishingApiClient {
	private baseUrl: string;
	private timeout: number;

	constructor(options: APIClientOptions) {
		this.baseUrl = options.baseUrl.replace(/\/$/, ''); // Remove trailing slash
		this.timeout = options.timeout || 15000;
	}

	private async request<T>(path: string, init: RequestInit, guard: ResponseGuard<T>): Promise<T> {
		const controller = new AbortController();
		const timeoutId = setTimeout(() => controller.abort(), this.timeout);

		try {
			const response = await fetch(`${this.baseUrl}${path}`, {
				...init,
				headers: {
					'Content-Type': 'application/json',
				},
				signal: controller.signal,
			});

			if (!response.ok) {
				const text = await response.text();
				let body: unknown = null;
				try {
					body = JSON.parse(text);
				} catch {
					body = null;
				}
				throw new ApiRequestError(response.status, errorMessageFrom(body, text || response.statusText));
			}

			const body: unknown = await response.json();
			if (!guard(body)) {
				throw new Error(`Unexpected response shape from ${path}`);
			}
			return body;
		} catch (error) {
			if (error instanceof Error && error.name === 'AbortError') {
				throw new Error(`Request timeout after ${this.timeout}ms`);
			}
			throw error;
		} finally {
			clearTimeout(timeoutId);
		}
	}

	/**
	 * Health check
	 */
	async health(): Promise<HealthResponse> {
		return this.request('/', { method: 'GET' }, isHealthResponse);
	}

	async predict(url: string): Promise<PredictionResult> {
		return this.request('/predict', { method: 'POST', body: JSON.stringify({ url }) }, isPredictionResult);
	}

	async predictBatch(urls: string[]): Promise<BatchPredictionResponse> {
		return this.request('/predict_batch', { method: 'POST', body: JSON.stringify({ urls }) }, isBatchResponse);
	}

	async features(url: string): Promise<FeatureExtractionResponse> {
		return this.request('/features', { method: 'POST', body: JSON.stringify({ url }) }, isFeatureResponse);
	}
}
