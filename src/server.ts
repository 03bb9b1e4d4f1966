/**
 * Process entry point: config, model, HTTP server.
 */

import { serve } from '@hono/node-server';
import { createApp } from './index';
import { loadConfig } from './config';
import { loadModel } from './models/model-loader';
import { UrlPredictor } from './services/predictor';
import { logError, logger, setLogLevel } from './logger';

async function main(): Promise<void> {
	const config = await loadConfig();
	setLogLevel(config.logging.level);

	const model = await loadModel(config.model);
	if (!model) {
		logger.error({ event: 'startup_without_model' }, 'Failed to load model on startup!');
	}

	const predictor = new UrlPredictor(model, config.prediction);
	const app = createApp({ predictor, config });

	const server = serve(
		{
			fetch: app.fetch,
			hostname: config.server.host,
			port: config.server.port,
		},
		(info) => {
			logger.info({
				event: 'server_started',
				host: info.address,
				port: info.port,
				modelLoaded: predictor.modelLoaded,
				modelVersion: predictor.modelVersion,
			}, `Listening on ${info.address}:${info.port}`);
		}
	);

	const shutdown = (signal: NodeJS.Signals) => {
		logger.info({ event: 'server_stopping', signal }, 'Shutting down');
		server.close((error) => {
			if (error) {
				logError(error, 'shutdown');
				process.exit(1);
			}
			process.exit(0);
		});
	};

	process.once('SIGINT', shutdown);
	process.once('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
	logError(error, 'startup');
	process.exit(1);
});
