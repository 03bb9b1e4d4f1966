/**
 * Gradient-Boosted Tree Inference Engine
 *
 * Traverses JSON-encoded boosted trees and turns the summed margin into a
 * phishing probability. Models are trained offline and either shipped in this
 * compact form or converted from a LightGBM text dump (see lightgbm-text.ts).
 */

import { ModelFormatError } from '../errors';

// Minified JSON types (t=type, f=feature, v=value/threshold, l=left, r=right,
// m=missing-value type, d=default branch for missing values)
export type CompactTreeLeaf = { t: 'l'; v: number };

export type CompactTreeSplit = {
	t: 'n';
	f: string;
	v: number;
	l: CompactTreeNode;
	r: CompactTreeNode;
	m?: MissingType;
	d?: 'l' | 'r';
};

export type CompactTreeNode = CompactTreeLeaf | CompactTreeSplit;

export type MissingType = 'zero' | 'nan';

export interface BoosterMeta {
	version: string;
	features: string[];
	tree_count: number;
	objective: 'binary';
	/** Slope of the output sigmoid, LightGBM's `sigmoid:` parameter */
	sigmoid?: number;
	/** Margin added before the sigmoid */
	base_score?: number;
	feature_importance?: Record<string, number>;
	source?: string;
}

export interface BoosterModel {
	meta: BoosterMeta;
	trees: CompactTreeNode[];
}

export interface DetailedPrediction {
	probability: number;
	rawScore: number;
	treeScores: number[];
}

export const MAX_TREE_DEPTH = 1024;

// LightGBM's kZeroThreshold
const ZERO_THRESHOLD = 1e-35;

export function sigmoid(margin: number, slope = 1): number {
	return 1 / (1 + Math.exp(-slope * margin));
}

/**
 * Sum of all tree outputs plus the base score (the logit before the sigmoid).
 */
export function predictRawScore(model: BoosterModel, features: Record<string, number>): number {
	let margin = model.meta.base_score ?? 0;
	for (const tree of model.trees) {
		margin += traverseTree(tree, features);
	}
	return margin;
}

export function predictProbability(model: BoosterModel, features: Record<string, number>): number {
	return sigmoid(predictRawScore(model, features), model.meta.sigmoid ?? 1);
}

/**
 * Per-tree contributions, for debugging a single prediction.
 */
export function predictDetailed(model: BoosterModel, features: Record<string, number>): DetailedPrediction {
	const treeScores = model.trees.map((tree) => traverseTree(tree, features));
	const rawScore = treeScores.reduce((sum, score) => sum + score, model.meta.base_score ?? 0);

	return {
		probability: sigmoid(rawScore, model.meta.sigmoid ?? 1),
		rawScore,
		treeScores,
	};
}

/**
 * Walk one tree iteratively down to its leaf.
 */
function traverseTree(node: CompactTreeNode, features: Record<string, number>): number {
	let current = node;
	let depth = 0;

	while (current.t === 'n') {
		if (depth >= MAX_TREE_DEPTH) {
			throw new Error(`Tree traversal exceeded depth ${MAX_TREE_DEPTH}`);
		}
		current = goesLeft(current, features[current.f] ?? 0) ? current.l : current.r;
		depth++;
	}

	return current.v;
}

function goesLeft(node: CompactTreeSplit, rawValue: number): boolean {
	let value = rawValue;
	if (Number.isNaN(value) && node.m !== 'nan') {
		value = 0;
	}

	const isMissing =
		(node.m === 'zero' && Math.abs(value) <= ZERO_THRESHOLD) || (node.m === 'nan' && Number.isNaN(value));
	if (isMissing) {
		return (node.d ?? 'l') === 'l';
	}

	return value <= node.v;
}

/**
 * Model features that the caller's vector does not provide, and provided
 * features the model never reads.
 */
export function checkFeatureAlignment(
	model: BoosterModel,
	available: readonly string[]
): { missing: string[]; unused: string[] } {
	const availableSet = new Set(available);
	const modelSet = new Set(model.meta.features);

	return {
		missing: model.meta.features.filter((name) => !availableSet.has(name)),
		unused: available.filter((name) => !modelSet.has(name)),
	};
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
	return typeof value === 'number' && Number.isFinite(value);
}

function validateNode(node: unknown, depth: number, features: ReadonlySet<string>, errors: string[], path: string): void {
	if (errors.length > 0) {
		return;
	}
	if (depth > MAX_TREE_DEPTH) {
		errors.push(`${path}: tree deeper than ${MAX_TREE_DEPTH}`);
		return;
	}
	if (!isRecord(node)) {
		errors.push(`${path}: node must be an object`);
		return;
	}

	if (node.t === 'l') {
		if (!isFiniteNumber(node.v)) {
			errors.push(`${path}: leaf value must be a finite number`);
		}
		return;
	}

	if (node.t !== 'n') {
		errors.push(`${path}: unknown node type ${JSON.stringify(node.t)}`);
		return;
	}
	if (typeof node.f !== 'string' || !features.has(node.f)) {
		errors.push(`${path}: split feature ${JSON.stringify(node.f)} is not listed in meta.features`);
		return;
	}
	// Thresholds may be +/-Infinity in exported models, never NaN
	if (typeof node.v !== 'number' || Number.isNaN(node.v)) {
		errors.push(`${path}: threshold must be a number`);
		return;
	}
	if (node.m !== undefined && node.m !== 'zero' && node.m !== 'nan') {
		errors.push(`${path}: unknown missing type ${JSON.stringify(node.m)}`);
		return;
	}
	if (node.d !== undefined && node.d !== 'l' && node.d !== 'r') {
		errors.push(`${path}: default branch must be 'l' or 'r'`);
		return;
	}

	validateNode(node.l, depth + 1, features, errors, `${path}.l`);
	validateNode(node.r, depth + 1, features, errors, `${path}.r`);
}

/**
 * Structural problems with a candidate model; empty when it is usable.
 */
export function findBoosterModelErrors(model: unknown): string[] {
	if (!isRecord(model)) {
		return ['model must be an object'];
	}

	const meta = model.meta;
	if (!isRecord(meta)) {
		return ['meta must be an object'];
	}

	const errors: string[] = [];
	if (typeof meta.version !== 'string' || meta.version.length === 0) {
		errors.push('meta.version must be a non-empty string');
	}
	if (meta.objective !== 'binary') {
		errors.push(`meta.objective must be 'binary', got ${JSON.stringify(meta.objective)}`);
	}
	if (!Array.isArray(meta.features) || meta.features.length === 0 || !meta.features.every((f) => typeof f === 'string')) {
		errors.push('meta.features must be a non-empty list of names');
	}
	if (typeof meta.tree_count !== 'number' || !Number.isInteger(meta.tree_count) || meta.tree_count <= 0) {
		errors.push('meta.tree_count must be a positive integer');
	}
	if (meta.sigmoid !== undefined && (!isFiniteNumber(meta.sigmoid) || meta.sigmoid <= 0)) {
		errors.push('meta.sigmoid must be a positive number');
	}
	if (meta.base_score !== undefined && !isFiniteNumber(meta.base_score)) {
		errors.push('meta.base_score must be a finite number');
	}
	if (meta.feature_importance !== undefined) {
		if (!isRecord(meta.feature_importance) || !Object.values(meta.feature_importance).every(isFiniteNumber)) {
			errors.push('meta.feature_importance must map names to numbers');
		}
	}
	if (!Array.isArray(model.trees) || model.trees.length === 0) {
		errors.push('trees must be a non-empty list');
	} else if (model.trees.length !== meta.tree_count) {
		errors.push(`tree count mismatch: meta=${String(meta.tree_count)}, trees=${model.trees.length}`);
	}
	if (errors.length > 0) {
		return errors;
	}

	const features: ReadonlySet<string> = new Set(Array.isArray(meta.features) ? meta.features : []);
	const trees: unknown[] = Array.isArray(model.trees) ? model.trees : [];
	trees.forEach((tree, index) => validateNode(tree, 0, features, errors, `trees[${index}]`));
	return errors;
}

export function validateBoosterModel(model: unknown): model is BoosterModel {
	return findBoosterModelErrors(model).length === 0;
}

export function assertBoosterModel(model: unknown): BoosterModel {
	if (validateBoosterModel(model)) {
		return model;
	}
	throw new ModelFormatError('Invalid model structure', { errors: findBoosterModelErrors(model) });
}
