/**
 * Request Logging Middleware
 *
 * One structured line per request once the response is ready.
 */

import type { Context, Next } from 'hono';
import { logger } from '../logger';

export async function requestLogger(c: Context, next: Next) {
	const startTime = Date.now();

	await next();

	const status = c.res.status;
	const entry = {
		event: 'http_request',
		method: c.req.method,
		path: c.req.path,
		status,
		latency_ms: Date.now() - startTime,
	};

	if (status >= 500) {
		logger.error(entry, 'Request failed');
	} else if (status >= 400) {
		logger.warn(entry, 'Request rejected');
	} else {
		logger.info(entry, 'Request completed');
	}
}
