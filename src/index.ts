import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { bodyLimit } from 'hono/body-limit';
import { logError, logger } from './logger';
import { isServiceError } from './errors';
import { requestLogger } from './middleware/request-logger';
import { createPredictionRoutes } from './routes/predict';
import { DEFAULT_CONFIG, type ServiceConfig } from './config';
import type { UrlPredictor } from './services/predictor';
import type { ErrorResponse, HealthResponse } from './types';
import pkg from '../package.json';

/**
 * URL Phishing Detection API
 *
 * Classifies URLs as safe or phishing from lexical features:
 * - Length, path and query measurements
 * - Character class counts (digits, letters, specials)
 * - Counts of `. - / @ ? % =`
 * - HTTPS scheme and IPv4-literal host flags
 * - Gradient-boosted tree model loaded from disk at startup
 * - Structured logging with Pino
 */

export interface AppDependencies {
	predictor: UrlPredictor;
	config?: ServiceConfig;
}

const ENDPOINTS: Record<string, string> = {
	'/': 'Health check',
	'/predict': 'Single URL prediction',
	'/predict_batch': 'Batch URL prediction',
	'/features': 'Extract features from URL',
};

export function createApp({ predictor, config = DEFAULT_CONFIG }: AppDependencies) {
	const app = new Hono();

	app.use('/*', cors());
	app.use('/*', requestLogger);
	app.use(
		'/*',
		bodyLimit({
			maxSize: config.server.bodyLimitBytes,
			onError: (c) => {
				const body: ErrorResponse = { error: 'Request body too large', status: 'error' };
				return c.json(body, 413);
			},
		})
	);

	// Root endpoint - health check
	app.get('/', (c) => {
		const body: HealthResponse = {
			status: 'running',
			message: 'URL Phishing Detection API',
			model_loaded: predictor.modelLoaded,
			model_version: predictor.modelVersion,
			version: pkg.version,
			endpoints: ENDPOINTS,
		};
		return c.json(body);
	});

	app.route('/', createPredictionRoutes(predictor));

	app.notFound((c) => {
		const body: ErrorResponse = { error: 'Not found', status: 'error' };
		return c.json(body, 404);
	});

	app.onError((error, c) => {
		if (isServiceError(error)) {
			if (error.statusCode >= 500) {
				logger.error({
					event: 'request_failed',
					code: error.code,
					message: error.message,
					path: c.req.path,
				}, 'Request failed');
			}
			const body: ErrorResponse = { error: error.message, status: 'error' };
			return c.json(body, error.statusCode);
		}

		logError(error, `${c.req.method} ${c.req.path}`);
		const body: ErrorResponse = { error: 'Internal server error', status: 'error' };
		return c.json(body, 500);
	});

	return app;
}

export type App = ReturnType<typeof createApp>;
