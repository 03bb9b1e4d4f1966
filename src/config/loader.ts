/**
 * Configuration Loader
 *
 * Loads configuration from multiple sources with the following priority:
 * 1. Environment variables (highest priority)
 * 2. JSON config file (CONFIG_PATH, or ./config.json when it exists)
 * 3. Default Configuration (lowest priority - hardcoded)
 *
 * Configuration is read once at startup; an invalid result stops the process.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { DEFAULT_CONFIG, validateConfig, type ServiceConfig, type ServiceConfigOverrides } from './defaults';
import { ConfigError } from '../errors';
import { isLogLevel, logger } from '../logger';

const DEFAULT_CONFIG_FILE = 'config.json';

export interface ConfigLoadOptions {
	env?: NodeJS.ProcessEnv;
	/** Explicit config file; must exist when given */
	configPath?: string;
}

function isConfigOverrides(value: unknown): value is ServiceConfigOverrides {
	return validateConfig(value).valid;
}

/**
 * Section-wise merge; later sources win key by key
 */
export function mergeConfig(base: ServiceConfig, overrides: ServiceConfigOverrides): ServiceConfig {
	return {
		server: { ...base.server, ...overrides.server },
		model: { ...base.model, ...overrides.model },
		prediction: { ...base.prediction, ...overrides.prediction },
		logging: { ...base.logging, ...overrides.logging },
	};
}

function parseNumberVar(name: string, raw: string, errors: string[]): number | undefined {
	const value = Number(raw);
	if (raw.trim().length === 0 || Number.isNaN(value)) {
		errors.push(`${name} must be a number, got ${JSON.stringify(raw)}`);
		return undefined;
	}
	return value;
}

/**
 * Overrides taken from environment variables. Only meaningful when `errors`
 * is empty.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): { overrides: ServiceConfigOverrides; errors: string[] } {
	const errors: string[] = [];
	const server: Partial<ServiceConfig['server']> = {};
	const model: Partial<ServiceConfig['model']> = {};
	const prediction: Partial<ServiceConfig['prediction']> = {};
	const logging: Partial<ServiceConfig['logging']> = {};

	if (env.HOST) {
		server.host = env.HOST;
	}
	if (env.PORT) {
		server.port = parseNumberVar('PORT', env.PORT, errors);
	}
	if (env.BODY_LIMIT_BYTES) {
		server.bodyLimitBytes = parseNumberVar('BODY_LIMIT_BYTES', env.BODY_LIMIT_BYTES, errors);
	}
	if (env.MODEL_PATH) {
		model.paths = [env.MODEL_PATH];
	}
	if (env.MODEL_VERSION) {
		model.version = env.MODEL_VERSION;
	}
	if (env.PREDICTION_THRESHOLD) {
		prediction.threshold = parseNumberVar('PREDICTION_THRESHOLD', env.PREDICTION_THRESHOLD, errors);
	}
	if (env.MAX_BATCH_SIZE) {
		prediction.maxBatchSize = parseNumberVar('MAX_BATCH_SIZE', env.MAX_BATCH_SIZE, errors);
	}
	if (env.LOG_LEVEL) {
		if (isLogLevel(env.LOG_LEVEL)) {
			logging.level = env.LOG_LEVEL;
		} else {
			errors.push(`LOG_LEVEL must be one of fatal, error, warn, info, debug, trace, silent`);
		}
	}

	return {
		overrides: { server, model, prediction, logging },
		errors,
	};
}

/**
 * Read and validate the JSON config file. Returns null when the default file
 * is absent.
 */
export async function loadConfigFile(path: string, required: boolean): Promise<ServiceConfigOverrides | null> {
	let contents: string;
	try {
		contents = await readFile(path, 'utf8');
	} catch (error) {
		if (!required && error instanceof Error && 'code' in error && error.code === 'ENOENT') {
			return null;
		}
		throw new ConfigError([`cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`]);
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(contents);
	} catch (error) {
		throw new ConfigError([`${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`]);
	}

	if (!isConfigOverrides(parsed)) {
		throw new ConfigError(validateConfig(parsed).errors);
	}
	return parsed;
}

export async function loadConfig(options: ConfigLoadOptions = {}): Promise<ServiceConfig> {
	const env = options.env ?? process.env;
	const explicitPath = options.configPath ?? env.CONFIG_PATH;
	const filePath = resolve(explicitPath ?? DEFAULT_CONFIG_FILE);

	let config = DEFAULT_CONFIG;

	const fileConfig = await loadConfigFile(filePath, explicitPath !== undefined);
	if (fileConfig) {
		config = mergeConfig(config, fileConfig);
	}

	const fromEnv = configFromEnv(env);
	if (fromEnv.errors.length > 0) {
		throw new ConfigError(fromEnv.errors);
	}
	config = mergeConfig(config, fromEnv.overrides);

	const validation = validateConfig(config);
	if (!validation.valid) {
		throw new ConfigError(validation.errors);
	}

	logger.info({
		event: 'config_loaded',
		source: fileConfig ? filePath : 'defaults',
		modelPaths: config.model.paths,
		threshold: config.prediction.threshold,
		maxBatchSize: config.prediction.maxBatchSize,
	}, 'Configuration loaded');

	return config;
}
