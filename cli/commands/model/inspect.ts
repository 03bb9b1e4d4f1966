/**
 * Model Inspect Command
 *
 * Loads a model artifact the same way the service does and prints its
 * metadata, tree statistics and feature usage.
 */

import { resolve } from 'node:path';
import { parseArgs, getOption, hasFlag } from '../../utils/args';
import { logger } from '../../utils/logger';
import { readModelArtifact } from '../../../src/models/model-loader';
import { checkFeatureAlignment, type CompactTreeNode } from '../../../src/models/tree-engine';
import { FEATURE_NAMES } from '../../../src/utils/feature-vector';

interface TreeStats {
	depth: number;
	leaves: number;
	splits: Map<string, number>;
}

function collectStats(node: CompactTreeNode, depth: number, stats: TreeStats): void {
	if (node.t === 'l') {
		stats.leaves++;
		stats.depth = Math.max(stats.depth, depth);
		return;
	}
	stats.splits.set(node.f, (stats.splits.get(node.f) ?? 0) + 1);
	collectStats(node.l, depth + 1, stats);
	collectStats(node.r, depth + 1, stats);
}

function printHelp() {
	console.log(`
Inspect a model artifact (LightGBM model.txt or compact JSON).

USAGE
  npm run cli model:inspect -- [--model <path>] [--json]

OPTIONS
  --model <path>   Model file to read (default: model.txt)
  --json           Print the summary as JSON
  --help, -h       Show this help message
`);
}

export default async function inspectModel(args: string[]) {
	const parsed = parseArgs(args);
	if (hasFlag(parsed, 'help', 'h')) {
		printHelp();
		return;
	}

	const modelPath = resolve(getOption(parsed, 'model') || parsed.positional[0] || 'model.txt');
	const model = await readModelArtifact(modelPath);

	const stats: TreeStats = { depth: 0, leaves: 0, splits: new Map() };
	for (const tree of model.trees) {
		collectStats(tree, 0, stats);
	}
	const alignment = checkFeatureAlignment(model, FEATURE_NAMES);

	const summary = {
		path: modelPath,
		version: model.meta.version,
		objective: model.meta.objective,
		sigmoid: model.meta.sigmoid ?? 1,
		baseScore: model.meta.base_score ?? 0,
		trees: model.trees.length,
		leaves: stats.leaves,
		maxDepth: stats.depth,
		features: model.meta.features,
		missingFeatures: alignment.missing,
		unusedFeatures: alignment.unused,
	};

	if (hasFlag(parsed, 'json')) {
		logger.json({ ...summary, splitCounts: Object.fromEntries(stats.splits) });
		return;
	}

	logger.section('🌲 Model Summary');
	logger.info(`Path:       ${summary.path}`);
	logger.info(`Version:    ${summary.version}`);
	logger.info(`Objective:  ${summary.objective} (sigmoid ${summary.sigmoid})`);
	logger.info(`Trees:      ${summary.trees} (${summary.leaves} leaves, max depth ${summary.maxDepth})`);
	logger.info(`Base score: ${summary.baseScore}`);

	logger.subsection('Feature usage');
	logger.table(
		model.meta.features.map((feature) => ({
			feature,
			splits: stats.splits.get(feature) ?? 0,
			importance: model.meta.feature_importance?.[feature] ?? 0,
		}))
	);

	if (alignment.missing.length > 0) {
		logger.error(`Model reads features the extractor does not produce: ${alignment.missing.join(', ')}`);
		process.exitCode = 1;
	} else if (alignment.unused.length > 0) {
		logger.warn(`Features never read by the model: ${alignment.unused.join(', ')}`);
	} else {
		logger.success('Model features match the extractor');
	}
}
