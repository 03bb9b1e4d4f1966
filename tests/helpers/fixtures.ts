import { fileURLToPath } from 'node:url';
import fixtureModel from '../fixtures/model.json';
import { assertBoosterModel, type BoosterModel } from '../../src/models/tree-engine';
import { createModelHandle, type ModelHandle } from '../../src/models/model-loader';
import { UrlPredictor, type PredictorOptions } from '../../src/services/predictor';
import { FEATURE_NAMES } from '../../src/utils/feature-vector';

export const fixturePath = (name: string) => fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));

/**
 * Fresh copy of tests/fixtures/model.json. Margins against it:
 *   https://www.google.com                  -2.0
 *   http://192.168.1.1/login                 2.3
 *   http://user@evil-bank-login-secure.com   3.0
 *   http://example.com                      -0.7
 */
export function loadFixtureModel(): BoosterModel {
	return assertBoosterModel(structuredClone(fixtureModel));
}

/** Every URL scores `value` before the sigmoid. */
export function constantModel(value: number, version = 'constant'): BoosterModel {
	return {
		meta: {
			version,
			features: [...FEATURE_NAMES],
			tree_count: 1,
			objective: 'binary',
		},
		trees: [{ t: 'l', v: value }],
	};
}

export function fixtureHandle(model: BoosterModel = loadFixtureModel()): ModelHandle {
	return createModelHandle(model, 'memory');
}

export function createTestPredictor(options: Partial<PredictorOptions> = {}, model?: BoosterModel): UrlPredictor {
	return new UrlPredictor(fixtureHandle(model), options);
}
