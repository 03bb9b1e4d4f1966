/**
 * Feature Extract Command
 *
 * Prints the lexical feature vector of each URL given on the command line.
 */

import { parseArgs, hasFlag } from '../../utils/args';
import { logger } from '../../utils/logger';
import { extractUrlFeatures } from '../../../src/detectors/lexical-features';
import { FEATURE_NAMES } from '../../../src/utils/feature-vector';

function printHelp() {
	console.log(`
Print the 15 lexical features computed for each URL.

USAGE
  npm run cli features:extract -- <url...> [--json]

OPTIONS
  --json        Emit a JSON array instead of a table
  --help, -h    Show this help message
`);
}

export default async function extractFeatures(args: string[]) {
	const parsed = parseArgs(args);
	if (hasFlag(parsed, 'help', 'h') || parsed.positional.length === 0) {
		printHelp();
		return;
	}

	const rows = parsed.positional.map((url) => ({ url, features: extractUrlFeatures(url) }));

	if (hasFlag(parsed, 'json')) {
		logger.json(rows);
		return;
	}

	for (const { url, features } of rows) {
		logger.subsection(url);
		logger.table(FEATURE_NAMES.map((name) => ({ feature: name, value: features[name] })));
	}
}
