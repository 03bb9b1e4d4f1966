/**
 * Predict Command
 *
 * Classifies URLs locally with a model file, without starting the server.
 */

import { parseArgs, getOption, getNumberOption, hasFlag } from '../../utils/args';
import { logger } from '../../utils/logger';
import { DEFAULT_CONFIG } from '../../../src/config';
import { loadModel } from '../../../src/models/model-loader';
import { predictDetailed } from '../../../src/models/tree-engine';
import { extractUrlFeatures } from '../../../src/detectors/lexical-features';
import { UrlPredictor } from '../../../src/services/predictor';

function printHelp() {
	console.log(`
Classify URLs with a local model.

USAGE
  npm run cli predict -- <url...> [--model <path>] [--threshold <n>] [--verbose]

OPTIONS
  --model <path>      Model file (default: the service's lookup order)
  --threshold <n>     Phishing threshold (default: ${DEFAULT_CONFIG.prediction.threshold})
  --verbose, -v       Show raw margin and per-tree scores
  --json              Print results as JSON
  --help, -h          Show this help message
`);
}

export default async function predict(args: string[]) {
	const parsed = parseArgs(args);
	if (hasFlag(parsed, 'help', 'h') || parsed.positional.length === 0) {
		printHelp();
		return;
	}

	const modelPath = getOption(parsed, 'model');
	const threshold = getNumberOption(parsed, 'threshold') ?? DEFAULT_CONFIG.prediction.threshold;

	const handle = await loadModel({ paths: modelPath ? [modelPath] : DEFAULT_CONFIG.model.paths });
	if (!handle) {
		logger.error('No model could be loaded');
		process.exitCode = 1;
		return;
	}

	const predictor = new UrlPredictor(handle, { threshold, maxBatchSize: parsed.positional.length });
	const results = predictor.predictBatch(parsed.positional);

	if (hasFlag(parsed, 'json')) {
		logger.json(results);
		return;
	}

	logger.section(`🔎 Predictions (model ${handle.version})`);
	logger.table(
		results.map((result) =>
			result.status === 'success'
				? {
					url: result.url,
					prediction: result.prediction,
					probability: result.probability.toFixed(4),
					confidence: result.confidence.toFixed(4),
				}
				: { url: result.url ?? '', prediction: 'error', probability: '', confidence: result.error }
		)
	);

	if (hasFlag(parsed, 'verbose', 'v')) {
		for (const url of parsed.positional) {
			const detail = predictDetailed(handle.model, extractUrlFeatures(url));
			logger.subsection(url);
			console.log(`  Raw margin: ${detail.rawScore.toFixed(6)}`);
			console.log(`  Tree scores: ${detail.treeScores.map((score) => score.toFixed(4)).join(', ')}`);
		}
	}
}
