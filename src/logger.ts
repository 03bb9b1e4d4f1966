/**
 * Structured logging with Pino
 *
 * Every entry carries an `event` field so logs can be filtered without
 * parsing messages.
 */

import pino from 'pino';
import type { PredictionResult } from './types';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

const LOG_LEVEL_SET: ReadonlySet<unknown> = new Set(LOG_LEVELS);

export function isLogLevel(value: unknown): value is LogLevel {
	return LOG_LEVEL_SET.has(value);
}

const initialLevel = process.env.LOG_LEVEL;

export const logger = pino({
	level: isLogLevel(initialLevel) ? initialLevel : 'info',
	base: { service: 'url-phishing-detector' },
	timestamp: pino.stdTimeFunctions.isoTime,
});

export function setLogLevel(level: LogLevel): void {
	logger.level = level;
}

export function logPrediction(result: PredictionResult, latencyMs: number): void {
	logger.info({
		event: 'url_prediction',
		url: result.url,
		prediction: result.prediction,
		probability: result.probability,
		confidence: result.confidence,
		latency_ms: latencyMs,
	}, 'URL classified');
}

export function logBatch(summary: { total: number; failed: number; phishing: number; latencyMs: number }): void {
	logger.info({
		event: 'url_batch_prediction',
		total: summary.total,
		failed: summary.failed,
		phishing: summary.phishing,
		latency_ms: summary.latencyMs,
	}, 'URL batch classified');
}

export function logError(error: unknown, context: string): void {
	logger.error({
		event: 'error',
		context,
		error: error instanceof Error ? {
			message: error.message,
			stack: error.stack,
			name: error.name,
		} : { message: String(error) },
	}, `Error in ${context}`);
}
