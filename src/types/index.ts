import type { UrlFeatures } from '../utils/feature-vector';

export type PredictionLabel = 'safe' | 'phishing';

export interface PredictionResult {
	url: string;
	prediction: PredictionLabel;
	/** Model output for the phishing class */
	probability: number;
	/** Certainty in the chosen label */
	confidence: number;
	status: 'success';
}

export interface PredictionFailure {
	/** Echo of the input when it was a string */
	url: string | null;
	error: string;
	status: 'error';
}

export type BatchPredictionEntry = PredictionResult | PredictionFailure;

export interface BatchPredictionResponse {
	results: BatchPredictionEntry[];
	total_processed: number;
	status: 'success';
}

export interface FeatureExtractionResponse {
	url: string;
	features: UrlFeatures;
	status: 'success';
}

export interface HealthResponse {
	status: 'running';
	message: string;
	model_loaded: boolean;
	model_version: string | null;
	version: string;
	endpoints: Record<string, string>;
}

export interface ErrorResponse {
	error: string;
	status: 'error';
}
