/**
 * URL Prediction Service
 *
 * Runs the lexical feature extractor and the boosted-tree model for single
 * URLs and batches. The model handle is injected; a predictor built without
 * one answers every call with ModelUnavailableError.
 */

import { extractUrlFeatures } from '../detectors/lexical-features';
import { predictProbability } from '../models/tree-engine';
import type { ModelHandle } from '../models/model-loader';
import { InputError, ModelUnavailableError, PredictionError, isServiceError } from '../errors';
import { validateUrlValue } from '../validators/url';
import { logger } from '../logger';
import type { UrlFeatures } from '../utils/feature-vector';
import type { BatchPredictionEntry, PredictionLabel, PredictionResult } from '../types';

export interface PredictorOptions {
	/** Probabilities at or above this are labelled phishing */
	threshold: number;
	maxBatchSize: number;
}

export const DEFAULT_PREDICTOR_OPTIONS: PredictorOptions = {
	threshold: 0.5,
	maxBatchSize: 100,
};

export function labelFor(probability: number, threshold: number): PredictionLabel {
	return probability >= threshold ? 'phishing' : 'safe';
}

export function confidenceFor(prediction: PredictionLabel, probability: number): number {
	return prediction === 'phishing' ? probability : 1 - probability;
}

export class UrlPredictor {
	private readonly handle: ModelHandle | null;
	private readonly options: PredictorOptions;

	constructor(handle: ModelHandle | null, options: Partial<PredictorOptions> = {}) {
		this.handle = handle;
		this.options = { ...DEFAULT_PREDICTOR_OPTIONS, ...options };
	}

	get modelLoaded(): boolean {
		return this.handle !== null;
	}

	get modelVersion(): string | null {
		return this.handle?.version ?? null;
	}

	get maxBatchSize(): number {
		return this.options.maxBatchSize;
	}

	private requireModel(): ModelHandle {
		if (!this.handle) {
			throw new ModelUnavailableError();
		}
		return this.handle;
	}

	/**
	 * Named feature values for a URL, without classification.
	 */
	extractFeatures(url: unknown): UrlFeatures {
		this.requireModel();
		return extractUrlFeatures(validateUrlValue(url));
	}

	predict(url: unknown): PredictionResult {
		const handle = this.requireModel();
		const value = validateUrlValue(url);

		let probability: number;
		try {
			probability = predictProbability(handle.model, extractUrlFeatures(value));
		} catch (error) {
			logger.error({
				event: 'prediction_failed',
				url: value,
				message: error instanceof Error ? error.message : String(error),
			}, 'Model evaluation failed');
			throw new PredictionError();
		}

		if (!Number.isFinite(probability)) {
			logger.error({
				event: 'prediction_non_finite',
				url: value,
				probability,
			}, 'Model returned a non-finite probability');
			throw new PredictionError();
		}

		const clamped = Math.min(Math.max(probability, 0), 1);
		const prediction = labelFor(clamped, this.options.threshold);

		return {
			url: value,
			prediction,
			probability: clamped,
			confidence: confidenceFor(prediction, clamped),
			status: 'success',
		};
	}

	/**
	 * Predicts each element independently, keeping input order. Invalid
	 * elements become error entries in place.
	 */
	predictBatch(urls: readonly unknown[]): BatchPredictionEntry[] {
		this.requireModel();
		if (urls.length > this.options.maxBatchSize) {
			throw new InputError(`Maximum ${this.options.maxBatchSize} URLs allowed per request`, {
				received: urls.length,
			});
		}

		return urls.map((url) => this.predictEntry(url));
	}

	private predictEntry(url: unknown): BatchPredictionEntry {
		const echo = typeof url === 'string' ? url : null;
		try {
			return this.predict(validateUrlValue(url, 'Invalid URL'));
		} catch (error) {
			if (!isServiceError(error)) {
				throw error;
			}
			return { url: echo, error: error.message, status: 'error' };
		}
	}
}
