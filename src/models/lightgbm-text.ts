/**
 * LightGBM text model reader
 *
 * Converts the `model.txt` dump written by `Booster.save_model()` into the
 * compact tree format evaluated by tree-engine.ts. Only numerical splits of a
 * single-output binary booster are supported.
 */

import { ModelFormatError } from '../errors';
import type { BoosterModel, CompactTreeNode, CompactTreeSplit, MissingType } from './tree-engine';

type KeyValues = Map<string, string>;

interface RawTree {
	index: number;
	fields: KeyValues;
}

export interface LightGbmParseOptions {
	/** Overrides the version derived from the header */
	version?: string;
	source?: string;
}

const DECISION_CATEGORICAL = 1;
const DECISION_DEFAULT_LEFT = 2;

function parseKeyValue(line: string): [string, string] | null {
	const separator = line.indexOf('=');
	if (separator <= 0) {
		return null;
	}
	return [line.slice(0, separator).trim(), line.slice(separator + 1).trim()];
}

function parseNumber(token: string, context: string): number {
	switch (token) {
		case 'inf':
		case '+inf':
			return Infinity;
		case '-inf':
			return -Infinity;
	}
	const value = Number(token);
	if (token.length === 0 || Number.isNaN(value)) {
		throw new ModelFormatError(`Expected a number in ${context}, got ${JSON.stringify(token)}`);
	}
	return value;
}

function numberList(fields: KeyValues, key: string, tree: number, expected: number): number[] {
	const raw = fields.get(key);
	if (raw === undefined) {
		throw new ModelFormatError(`Tree ${tree} is missing ${key}`);
	}
	const values = raw.length === 0 ? [] : raw.split(/\s+/).map((token) => parseNumber(token, `Tree ${tree} ${key}`));
	if (values.length !== expected) {
		throw new ModelFormatError(`Tree ${tree} ${key} has ${values.length} entries, expected ${expected}`);
	}
	return values;
}

function requireInteger(fields: KeyValues, key: string, tree: number): number {
	const value = parseNumber(fields.get(key) ?? '', `Tree ${tree} ${key}`);
	if (!Number.isInteger(value)) {
		throw new ModelFormatError(`Tree ${tree} ${key} must be an integer`);
	}
	return value;
}

function missingTypeOf(decisionType: number): MissingType | undefined {
	switch ((decisionType >> 2) & 3) {
		case 1:
			return 'zero';
		case 2:
			return 'nan';
		default:
			return undefined;
	}
}

function buildTree(raw: RawTree, featureNames: readonly string[]): CompactTreeNode {
	const { index, fields } = raw;
	const numLeaves = requireInteger(fields, 'num_leaves', index);
	if (numLeaves < 1) {
		throw new ModelFormatError(`Tree ${index} has no leaves`);
	}
	if ((fields.get('num_cat') ?? '0') !== '0') {
		throw new ModelFormatError(`Tree ${index} uses categorical splits, which are not supported`);
	}
	if ((fields.get('is_linear') ?? '0') !== '0') {
		throw new ModelFormatError(`Tree ${index} is a linear tree, which is not supported`);
	}

	const leafValues = numberList(fields, 'leaf_value', index, numLeaves);
	if (numLeaves === 1) {
		return { t: 'l', v: leafValues[0] };
	}

	const splits = numLeaves - 1;
	const splitFeatures = numberList(fields, 'split_feature', index, splits);
	const thresholds = numberList(fields, 'threshold', index, splits);
	const decisionTypes = numberList(fields, 'decision_type', index, splits);
	const leftChildren = numberList(fields, 'left_child', index, splits);
	const rightChildren = numberList(fields, 'right_child', index, splits);

	const visited = new Set<number>();

	const build = (child: number): CompactTreeNode => {
		if (child < 0) {
			// Leaves are stored as bitwise complements of their index
			const leafIndex = ~child;
			if (leafIndex >= numLeaves) {
				throw new ModelFormatError(`Tree ${index} references missing leaf ${leafIndex}`);
			}
			return { t: 'l', v: leafValues[leafIndex] };
		}

		if (child >= splits || visited.has(child)) {
			throw new ModelFormatError(`Tree ${index} has an invalid child reference ${child}`);
		}
		visited.add(child);

		const decisionType = decisionTypes[child];
		if (decisionType & DECISION_CATEGORICAL) {
			throw new ModelFormatError(`Tree ${index} uses categorical splits, which are not supported`);
		}

		const feature = featureNames[splitFeatures[child]];
		if (feature === undefined) {
			throw new ModelFormatError(`Tree ${index} splits on unknown feature index ${splitFeatures[child]}`);
		}

		const node: CompactTreeSplit = {
			t: 'n',
			f: feature,
			v: thresholds[child],
			l: build(leftChildren[child]),
			r: build(rightChildren[child]),
		};
		const missing = missingTypeOf(decisionType);
		if (missing) {
			node.m = missing;
			node.d = decisionType & DECISION_DEFAULT_LEFT ? 'l' : 'r';
		}
		return node;
	};

	return build(0);
}

function parseFeatureImportances(lines: readonly string[], start: number): Record<string, number> | undefined {
	const headerIndex = lines.indexOf('feature_importances:', start);
	if (headerIndex === -1) {
		return undefined;
	}

	const importances: Record<string, number> = {};
	for (let i = headerIndex + 1; i < lines.length; i++) {
		const entry = parseKeyValue(lines[i]);
		if (!entry) {
			break;
		}
		const value = Number(entry[1]);
		if (Number.isFinite(value)) {
			importances[entry[0]] = value;
		}
	}
	return importances;
}

export function parseLightGbmModel(text: string, options: LightGbmParseOptions = {}): BoosterModel {
	const lines = text.split(/\r?\n/).map((line) => line.trim());

	const header: KeyValues = new Map();
	const rawTrees: RawTree[] = [];
	let currentTree: RawTree | null = null;
	let endIndex = lines.length;
	let averageOutput = false;

	for (let i = 0; i < lines.length; i++) {
		const line = lines[i];
		if (line === 'end of trees') {
			endIndex = i;
			break;
		}
		if (line.length === 0) {
			continue;
		}

		// Bare flag written by random-forest boosting: trees are averaged, not summed
		if (line === 'average_output' && !currentTree) {
			averageOutput = true;
			continue;
		}

		const entry = parseKeyValue(line);
		if (!entry) {
			continue;
		}
		const [key, value] = entry;

		if (key === 'Tree') {
			currentTree = { index: Number(value), fields: new Map() };
			rawTrees.push(currentTree);
		} else if (currentTree) {
			currentTree.fields.set(key, value);
		} else {
			header.set(key, value);
		}
	}

	if (lines[0] !== 'tree') {
		throw new ModelFormatError('Not a LightGBM text model (missing "tree" header)');
	}
	if (averageOutput) {
		throw new ModelFormatError('Random-forest (average_output) models are not supported');
	}

	const objective = header.get('objective') ?? '';
	const [objectiveName, ...objectiveParams] = objective.split(/\s+/);
	if (objectiveName !== 'binary') {
		throw new ModelFormatError(`Unsupported objective ${JSON.stringify(objective)}, expected binary`);
	}
	let slope = 1;
	for (const param of objectiveParams) {
		if (param.startsWith('sigmoid:')) {
			slope = parseNumber(param.slice('sigmoid:'.length), 'objective sigmoid');
		}
	}

	const numClass = header.get('num_class') ?? '1';
	const treesPerIteration = header.get('num_tree_per_iteration') ?? '1';
	if (numClass !== '1' || treesPerIteration !== '1') {
		throw new ModelFormatError('Multiclass models are not supported');
	}

	const featureNames = (header.get('feature_names') ?? '').split(/\s+/).filter((name) => name.length > 0);
	if (featureNames.length === 0) {
		throw new ModelFormatError('Model header has no feature_names');
	}
	if (rawTrees.length === 0) {
		throw new ModelFormatError('Model contains no trees');
	}

	const trees = rawTrees.map((raw) => buildTree(raw, featureNames));
	const formatVersion = header.get('version') ?? 'unknown';

	return {
		meta: {
			version: options.version ?? `lightgbm-${formatVersion}-${trees.length}t`,
			features: featureNames,
			tree_count: trees.length,
			objective: 'binary',
			sigmoid: slope,
			base_score: 0,
			feature_importance: parseFeatureImportances(lines, endIndex),
			source: options.source ?? 'lightgbm',
		},
		trees,
	};
}
