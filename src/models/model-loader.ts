/**
 * Model artifact loader
 *
 * Loads the classifier once at startup from the first candidate path that
 * exists. The returned handle is frozen and shared read-only by every request;
 * a null handle means the service runs without a model and refuses to predict.
 */

import { readFile, access } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import { logger, logError } from '../logger';
import { ModelFormatError } from '../errors';
import { FEATURE_NAMES } from '../utils/feature-vector';
import { parseLightGbmModel } from './lightgbm-text';
import { assertBoosterModel, checkFeatureAlignment, type BoosterModel, type CompactTreeNode } from './tree-engine';

export interface ModelHandle {
	readonly model: BoosterModel;
	readonly version: string;
	/** Absolute path the artifact was read from */
	readonly source: string;
	readonly loadedAt: string;
}

export interface ModelLoadOptions {
	paths: readonly string[];
	/** Overrides the version recorded in the artifact */
	version?: string;
}

async function fileExists(path: string): Promise<boolean> {
	try {
		await access(path);
		return true;
	} catch {
		return false;
	}
}

/**
 * Parse one artifact. `.txt` files are LightGBM text dumps, anything else is
 * the compact JSON format.
 */
export async function readModelArtifact(path: string): Promise<BoosterModel> {
	const contents = await readFile(path, 'utf8');

	if (extname(path).toLowerCase() === '.txt') {
		return parseLightGbmModel(contents, { source: path });
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(contents);
	} catch (error) {
		throw new ModelFormatError(`Model file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
	}
	return assertBoosterModel(parsed);
}

function deepFreeze(node: CompactTreeNode): void {
	Object.freeze(node);
	if (node.t === 'n') {
		deepFreeze(node.l);
		deepFreeze(node.r);
	}
}

/**
 * Build the shared handle for a parsed model. Rejects models that read
 * features the extractor never produces.
 */
export function createModelHandle(model: BoosterModel, source: string, version?: string): ModelHandle {
	const alignment = checkFeatureAlignment(model, FEATURE_NAMES);
	if (alignment.missing.length > 0) {
		throw new ModelFormatError(`Model expects unknown features: ${alignment.missing.join(', ')}`, {
			missing: alignment.missing,
		});
	}
	if (alignment.unused.length > 0) {
		logger.warn({
			event: 'model_unused_features',
			unused: alignment.unused,
		}, 'Model does not use every extracted feature');
	}

	model.trees.forEach(deepFreeze);
	Object.freeze(model.trees);
	Object.freeze(model.meta.features);
	Object.freeze(model.meta);
	Object.freeze(model);

	return Object.freeze({
		model,
		version: version ?? model.meta.version,
		source,
		loadedAt: new Date().toISOString(),
	});
}

export async function loadModel(options: ModelLoadOptions): Promise<ModelHandle | null> {
	for (const candidate of options.paths) {
		const path = resolve(candidate);
		if (!(await fileExists(path))) {
			continue;
		}

		try {
			logger.info({ event: 'model_loading', path }, `Loading ${candidate}...`);
			const model = await readModelArtifact(path);
			const handle = createModelHandle(model, path, options.version);

			logger.info({
				event: 'model_loaded',
				path,
				version: handle.version,
				treeCount: model.meta.tree_count,
				features: model.meta.features.length,
			}, 'Model loaded successfully');
			return handle;
		} catch (error) {
			logError(error, 'model_load');
			logger.error({
				event: 'model_load_failed',
				path,
				details: error instanceof ModelFormatError ? error.details : undefined,
			}, 'Failed to load model');
			return null;
		}
	}

	logger.error({
		event: 'model_not_found',
		paths: options.paths,
	}, 'No model file found');
	return null;
}
