/**
 * Model Convert Command
 *
 * Converts a LightGBM text dump into the compact JSON tree format.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { parseArgs, getOption, hasFlag } from '../../utils/args';
import { logger } from '../../utils/logger';
import { parseLightGbmModel } from '../../../src/models/lightgbm-text';
import { createModelHandle } from '../../../src/models/model-loader';

function printHelp() {
	console.log(`
Convert a LightGBM model.txt into compact JSON.

USAGE
  npm run cli model:convert -- [--input <path>] [--output <path>] [--version <v>]

OPTIONS
  --input <path>     LightGBM text model (default: model.txt)
  --output <path>    Destination JSON (default: model.json)
  --version <v>      Version string stored in the artifact
  --pretty           Indent the JSON output
  --help, -h         Show this help message
`);
}

export default async function convertModel(args: string[]) {
	const parsed = parseArgs(args);
	if (hasFlag(parsed, 'help', 'h')) {
		printHelp();
		return;
	}

	const inputPath = resolve(getOption(parsed, 'input') || 'model.txt');
	const outputPath = resolve(getOption(parsed, 'output') || 'model.json');
	const version = getOption(parsed, 'version');

	logger.section('🔁 Converting LightGBM model');
	logger.info(`Input:  ${inputPath}`);
	logger.info(`Output: ${outputPath}`);

	const model = parseLightGbmModel(await readFile(inputPath, 'utf8'), { version, source: inputPath });

	// Same checks the service runs at startup
	createModelHandle(model, inputPath);

	const json = hasFlag(parsed, 'pretty') ? JSON.stringify(model, null, 2) : JSON.stringify(model);
	await writeFile(outputPath, `${json}\n`);

	logger.success(`Wrote ${model.meta.tree_count} trees (version ${model.meta.version}) to ${outputPath}`);
}
