import { describe, it, expect } from 'vitest';
import {
	MAX_TREE_DEPTH,
	assertBoosterModel,
	checkFeatureAlignment,
	findBoosterModelErrors,
	predictDetailed,
	predictProbability,
	predictRawScore,
	sigmoid,
	validateBoosterModel,
	type BoosterModel,
	type CompactTreeNode,
	type CompactTreeSplit,
} from '../../../src/models/tree-engine';
import { ModelFormatError } from '../../../src/errors';
import { extractUrlFeatures } from '../../../src/detectors/lexical-features';
import { constantModel, loadFixtureModel } from '../../helpers/fixtures';

function singleSplitModel(split: Omit<CompactTreeSplit, 't' | 'l' | 'r'>): BoosterModel {
	return {
		meta: { version: 'split', features: ['x'], tree_count: 1, objective: 'binary' },
		trees: [{ t: 'n', ...split, l: { t: 'l', v: 1 }, r: { t: 'l', v: 2 } }],
	};
}

describe('sigmoid', () => {
	it('maps 0 to 0.5', () => {
		expect(sigmoid(0)).toBe(0.5);
	});

	it('applies the slope to the margin', () => {
		expect(sigmoid(1, 2)).toBeCloseTo(sigmoid(2), 12);
	});
});

describe('tree traversal', () => {
	const model = loadFixtureModel();

	it.each([
		['https://www.google.com', -2.0, 0.11920292202211755],
		['http://192.168.1.1/login', 2.3, 0.9088770389851438],
		['http://user@evil-bank-login-secure.com', 3.0, 0.9525741268224334],
		['http://example.com', -0.7, 0.3318122278318339],
	])('scores %s', (url, margin, probability) => {
		const features = extractUrlFeatures(url);
		expect(predictRawScore(model, features)).toBeCloseTo(margin, 10);
		expect(predictProbability(model, features)).toBeCloseTo(probability, 10);
	});

	it('reports per-tree contributions', () => {
		const detail = predictDetailed(model, extractUrlFeatures('http://192.168.1.1/login'));
		expect(detail.treeScores).toEqual([2.0, 0.5, -0.2]);
		expect(detail.rawScore).toBeCloseTo(2.3, 10);
		expect(detail.probability).toBeCloseTo(0.9088770389851438, 10);
	});

	it('adds the base score and scales by the sigmoid slope', () => {
		const scaled = constantModel(1);
		scaled.meta.base_score = 0.5;
		scaled.meta.sigmoid = 2;
		expect(predictRawScore(scaled, {})).toBe(1.5);
		expect(predictProbability(scaled, {})).toBeCloseTo(sigmoid(3), 12);
	});

	it('goes left when the value equals the threshold', () => {
		const split = singleSplitModel({ f: 'x', v: 0.5 });
		expect(predictRawScore(split, { x: 0.5 })).toBe(1);
		expect(predictRawScore(split, { x: 0.6 })).toBe(2);
	});

	it('reads absent features as 0', () => {
		const split = singleSplitModel({ f: 'x', v: -1 });
		expect(predictRawScore(split, {})).toBe(2);
	});
});

describe('missing value handling', () => {
	it('sends zero down the default branch for zero-missing splits', () => {
		const split = singleSplitModel({ f: 'x', v: -1, m: 'zero', d: 'l' });
		expect(predictRawScore(split, { x: 0 })).toBe(1);
		expect(predictRawScore(split, { x: 1e-40 })).toBe(1);
		expect(predictRawScore(split, { x: -5 })).toBe(1);
		expect(predictRawScore(split, { x: 3 })).toBe(2);
	});

	it('sends NaN down the default branch for nan-missing splits', () => {
		const split = singleSplitModel({ f: 'x', v: 10, m: 'nan', d: 'r' });
		expect(predictRawScore(split, { x: Number.NaN })).toBe(2);
		expect(predictRawScore(split, { x: 0 })).toBe(1);
	});

	it('treats NaN as zero when the split has no nan handling', () => {
		expect(predictRawScore(singleSplitModel({ f: 'x', v: -1 }), { x: Number.NaN })).toBe(2);
		expect(predictRawScore(singleSplitModel({ f: 'x', v: 5, m: 'zero', d: 'r' }), { x: Number.NaN })).toBe(2);
	});

	it('defaults to the left branch when no direction is recorded', () => {
		const split = singleSplitModel({ f: 'x', v: -1, m: 'zero' });
		expect(predictRawScore(split, { x: 0 })).toBe(1);
	});
});

describe('depth limit', () => {
	it('refuses trees deeper than the limit', () => {
		let tree: CompactTreeNode = { t: 'l', v: 0 };
		for (let i = 0; i <= MAX_TREE_DEPTH; i++) {
			tree = { t: 'n', f: 'x', v: 0, l: tree, r: { t: 'l', v: 0 } };
		}
		const deep: BoosterModel = {
			meta: { version: 'deep', features: ['x'], tree_count: 1, objective: 'binary' },
			trees: [tree],
		};

		expect(() => predictRawScore(deep, { x: 0 })).toThrow(`Tree traversal exceeded depth ${MAX_TREE_DEPTH}`);
		expect(findBoosterModelErrors(deep)).toEqual([`trees[0]${'.l'.repeat(MAX_TREE_DEPTH + 1)}: tree deeper than ${MAX_TREE_DEPTH}`]);
	});
});

describe('checkFeatureAlignment', () => {
	it('lists model features the caller lacks and caller features the model ignores', () => {
		const model = singleSplitModel({ f: 'x', v: 0 });
		expect(checkFeatureAlignment(model, ['x', 'y'])).toEqual({ missing: [], unused: ['y'] });
		expect(checkFeatureAlignment(model, ['y'])).toEqual({ missing: ['x'], unused: ['y'] });
	});
});

describe('model validation', () => {
	it('accepts the fixture model', () => {
		expect(findBoosterModelErrors(loadFixtureModel())).toEqual([]);
	});

	it('rejects non-objects', () => {
		expect(findBoosterModelErrors(null)).toEqual(['model must be an object']);
		expect(findBoosterModelErrors({ trees: [] })).toEqual(['meta must be an object']);
	});

	it('reports metadata problems together', () => {
		const errors = findBoosterModelErrors({
			meta: { version: '', features: [], tree_count: 0, objective: 'regression' },
			trees: [],
		});
		expect(errors).toEqual([
			'meta.version must be a non-empty string',
			"meta.objective must be 'binary', got \"regression\"",
			'meta.features must be a non-empty list of names',
			'meta.tree_count must be a positive integer',
			'trees must be a non-empty list',
		]);
	});

	it('checks tree_count against the trees', () => {
		const model = { ...constantModel(0), trees: [{ t: 'l', v: 0 }, { t: 'l', v: 1 }] };
		expect(findBoosterModelErrors(model)).toEqual(['tree count mismatch: meta=1, trees=2']);
	});

	it('rejects splits on unlisted features', () => {
		const model = singleSplitModel({ f: 'x', v: 0 });
		model.meta.features = ['y'];
		expect(findBoosterModelErrors(model)).toEqual(['trees[0]: split feature "x" is not listed in meta.features']);
	});

	it('rejects malformed nodes', () => {
		const badLeaf = { ...constantModel(0), trees: [{ t: 'l', v: 'high' }] };
		expect(findBoosterModelErrors(badLeaf)).toEqual(['trees[0]: leaf value must be a finite number']);

		const badType = { ...constantModel(0), trees: [{ t: 'x' }] };
		expect(findBoosterModelErrors(badType)).toEqual(['trees[0]: unknown node type "x"']);

		const badMissing = {
			meta: { version: 'm', features: ['x'], tree_count: 1, objective: 'binary' },
			trees: [{ t: 'n', f: 'x', v: 0, m: 'none', l: { t: 'l', v: 0 }, r: { t: 'l', v: 0 } }],
		};
		expect(findBoosterModelErrors(badMissing)).toEqual(['trees[0]: unknown missing type "none"']);
	});

	it('accepts infinite thresholds', () => {
		expect(validateBoosterModel(singleSplitModel({ f: 'x', v: Infinity }))).toBe(true);
	});

	it('throws ModelFormatError with the collected errors', () => {
		try {
			assertBoosterModel({ meta: {}, trees: [] });
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(ModelFormatError);
			expect(error).toMatchObject({
				message: 'Invalid model structure',
				code: 'model_format',
			});
		}
	});
});
