/**
 * Prediction Routes
 *
 * Thin adapter over UrlPredictor: parse the JSON body, narrow it into a typed
 * request, call the service. Errors are thrown and rendered by the app-level
 * error handler.
 */

import { Hono, type Context, type Next } from 'hono';
import { InputError, ModelUnavailableError } from '../errors';
import { logBatch, logPrediction } from '../logger';
import { parseBatchRequest, parseUrlRequest } from '../validators/url';
import type { UrlPredictor } from '../services/predictor';
import type { BatchPredictionResponse, FeatureExtractionResponse } from '../types';

async function readJsonBody(c: Context): Promise<unknown> {
	try {
		return await c.req.json();
	} catch (error) {
		// Stream errors (body limit) propagate to the middleware that raised them
		if (error instanceof SyntaxError) {
			throw new InputError('Request body must be valid JSON');
		}
		throw error;
	}
}

export function createPredictionRoutes(predictor: UrlPredictor) {
	const routes = new Hono();

	// Runs before body parsing so a missing model is reported first
	const requireModel = async (c: Context, next: Next) => {
		const version = predictor.modelVersion;
		if (!predictor.modelLoaded || version === null) {
			throw new ModelUnavailableError();
		}
		await next();
		c.res.headers.set('X-Model-Version', version);
	};

	routes.post('/predict', requireModel, async (c) => {
		const startTime = Date.now();
		const { url } = parseUrlRequest(await readJsonBody(c));

		const result = predictor.predict(url);
		logPrediction(result, Date.now() - startTime);

		return c.json(result);
	});

	routes.post('/predict_batch', requireModel, async (c) => {
		const startTime = Date.now();
		const { urls } = parseBatchRequest(await readJsonBody(c));

		const results = predictor.predictBatch(urls);
		logBatch({
			total: results.length,
			failed: results.filter((entry) => entry.status === 'error').length,
			phishing: results.filter((entry) => entry.status === 'success' && entry.prediction === 'phishing').length,
			latencyMs: Date.now() - startTime,
		});

		const response: BatchPredictionResponse = {
			results,
			total_processed: results.length,
			status: 'success',
		};
		return c.json(response);
	});

	routes.post('/features', requireModel, async (c) => {
		const { url } = parseUrlRequest(await readJsonBody(c));

		const response: FeatureExtractionResponse = {
			url,
			features: predictor.extractFeatures(url),
			status: 'success',
		};
		return c.json(response);
	});

	return routes;
}
