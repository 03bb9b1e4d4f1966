/**
 * Default Configuration for the URL phishing classifier
 *
 * The service runs with no configuration at all. Settings can be overridden by:
 * 1. A JSON file (CONFIG_PATH, or ./config.json when present)
 * 2. Environment variables
 *
 * Priority: Env Vars > Config File > Defaults
 */

import { isLogLevel, type LogLevel } from '../logger';

export interface ServiceConfig {
	server: {
		host: string;
		port: number;
		bodyLimitBytes: number; // Requests above this get 413
	};

	model: {
		paths: string[]; // Candidate artifacts, first existing one wins
		version?: string; // Overrides the version stored in the artifact
	};

	prediction: {
		threshold: number; // Probability at or above which a URL is phishing (0-1)
		maxBatchSize: number; // URLs accepted per /predict_batch request
	};

	logging: {
		level: LogLevel;
	};
}

export type ServiceConfigOverrides = {
	[K in keyof ServiceConfig]?: Partial<ServiceConfig[K]>;
};

export const DEFAULT_CONFIG: ServiceConfig = {
	server: {
		host: '0.0.0.0',
		port: 5000,
		bodyLimitBytes: 1024 * 1024,
	},

	// Same lookup order the training pipeline's outputs are published in:
	// the full model first, the lightweight test model last
	model: {
		paths: ['model.txt', 'model.json', 'model_lightweight.txt', 'model_lightweight.json'],
	},

	prediction: {
		threshold: 0.5,
		maxBatchSize: 100,
	},

	logging: {
		level: 'info',
	},
};

function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function checkSection(config: Record<string, unknown>, key: string, errors: string[]): Record<string, unknown> | null {
	const section = config[key];
	if (section === undefined) {
		return null;
	}
	if (!isRecord(section)) {
		errors.push(`${key} must be an object`);
		return null;
	}
	return section;
}

/**
 * Validate a full or partial configuration
 */
export function validateConfig(config: unknown): { valid: boolean; errors: string[] } {
	const errors: string[] = [];

	if (!isRecord(config)) {
		return { valid: false, errors: ['configuration must be an object'] };
	}

	const server = checkSection(config, 'server', errors);
	if (server) {
		if (server.host !== undefined && (typeof server.host !== 'string' || server.host.length === 0)) {
			errors.push('server.host must be a non-empty string');
		}
		if (server.port !== undefined) {
			if (typeof server.port !== 'number' || !Number.isInteger(server.port) || server.port < 0 || server.port > 65535) {
				errors.push('server.port must be an integer between 0 and 65535');
			}
		}
		if (server.bodyLimitBytes !== undefined) {
			if (typeof server.bodyLimitBytes !== 'number' || !Number.isInteger(server.bodyLimitBytes) || server.bodyLimitBytes <= 0) {
				errors.push('server.bodyLimitBytes must be a positive integer');
			}
		}
	}

	const model = checkSection(config, 'model', errors);
	if (model) {
		if (model.paths !== undefined) {
			const paths = model.paths;
			if (!Array.isArray(paths) || paths.length === 0 || !paths.every((p) => typeof p === 'string' && p.length > 0)) {
				errors.push('model.paths must be a non-empty list of file paths');
			}
		}
		if (model.version !== undefined && (typeof model.version !== 'string' || model.version.length === 0)) {
			errors.push('model.version must be a non-empty string');
		}
	}

	const prediction = checkSection(config, 'prediction', errors);
	if (prediction) {
		if (prediction.threshold !== undefined) {
			const threshold = prediction.threshold;
			if (typeof threshold !== 'number' || Number.isNaN(threshold) || threshold < 0 || threshold > 1) {
				errors.push('prediction.threshold must be between 0 and 1');
			}
		}
		if (prediction.maxBatchSize !== undefined) {
			const size = prediction.maxBatchSize;
			if (typeof size !== 'number' || !Number.isInteger(size) || size < 1) {
				errors.push('prediction.maxBatchSize must be a positive integer');
			}
		}
	}

	const logging = checkSection(config, 'logging', errors);
	if (logging && logging.level !== undefined && !isLogLevel(logging.level)) {
		errors.push(`logging.level must be one of fatal, error, warn, info, debug, trace, silent`);
	}

	return {
		valid: errors.length === 0,
		errors,
	};
}
