/**
 * Error taxonomy
 *
 * Every failure the service reports to a caller is a ServiceError subclass.
 * The HTTP layer maps `statusCode` straight onto the response and `message`
 * onto the `error` field of the body.
 */

export type ErrorCode =
	| 'invalid_input'
	| 'model_unavailable'
	| 'prediction_failed'
	| 'model_format'
	| 'config_invalid';

export type ErrorStatusCode = 400 | 500 | 503;

export class ServiceError extends Error {
	readonly code: ErrorCode;
	readonly statusCode: ErrorStatusCode;
	details?: Record<string, unknown>;

	constructor(message: string, code: ErrorCode, statusCode: ErrorStatusCode, details?: Record<string, unknown>) {
		super(message);
		this.name = 'ServiceError';
		this.code = code;
		this.statusCode = statusCode;
		this.details = details;
	}
}

/** Missing, empty or wrong-typed request input, or an oversized batch. */
export class InputError extends ServiceError {
	constructor(message: string, details?: Record<string, unknown>) {
		super(message, 'invalid_input', 400, details);
		this.name = 'InputError';
	}
}

export class ModelUnavailableError extends ServiceError {
	constructor(message = 'Model not loaded') {
		super(message, 'model_unavailable', 503);
		this.name = 'ModelUnavailableError';
	}
}

export class PredictionError extends ServiceError {
	constructor(message = 'Failed to process URL', details?: Record<string, unknown>) {
		super(message, 'prediction_failed', 500, details);
		this.name = 'PredictionError';
	}
}

/** Raised while parsing or validating a model artifact. Never reaches a request. */
export class ModelFormatError extends ServiceError {
	constructor(message: string, details?: Record<string, unknown>) {
		super(message, 'model_format', 500, details);
		this.name = 'ModelFormatError';
	}
}

export class ConfigError extends ServiceError {
	readonly errors: string[];

	constructor(errors: string[]) {
		super(`Invalid configuration: ${errors.join('; ')}`, 'config_invalid', 500, { errors });
		this.name = 'ConfigError';
		this.errors = errors;
	}
}

export function isServiceError(error: unknown): error is ServiceError {
	return error instanceof ServiceError;
}
