/**
 * Feature Export Command
 *
 * Reads a labeled URL dataset and emits a CSV containing the feature vector
 * the classifier expects, in training column order. Use this output as the
 * input to the offline training pipeline.
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { parseArgs, getOption, getNumberOption, hasFlag } from '../../utils/args';
import { logger } from '../../utils/logger';
import { extractUrlFeatures } from '../../../src/detectors/lexical-features';
import { FEATURE_NAMES, toFeatureArray } from '../../../src/utils/feature-vector';

type DatasetRow = Record<string, string | undefined>;

function printHelp() {
	console.log(`
╔════════════════════════════════════════════════════════╗
║              Feature Export (URL dataset)              ║
╚════════════════════════════════════════════════════════╝

Generate the feature matrix used to train the URL classifier.

USAGE
  npm run cli features:export -- [options]

OPTIONS
  --input <path>          Source CSV with columns: url,label (default: data/urls.csv)
  --output <path>         Destination CSV for features (default: data/features.csv)
  --url-column <name>     URL column name               (default: url)
  --label-column <name>   Label column name             (default: label)
  --include-url           Keep the original URL column in output
  --limit <n>             Only process the first n rows (for sampling)
  --help, -h              Show this help message

Input labels may be 'phishing'/'safe', 'bad'/'good', 0/1, or any number.
`);
}

/**
 * 1 = phishing, 0 = safe; null when the label cannot be read
 */
export function normalizeLabel(value: string): number | null {
	const trimmed = value.trim().toLowerCase();
	if (trimmed === 'phishing' || trimmed === 'bad' || trimmed === 'malicious' || trimmed === 'true') return 1;
	if (trimmed === 'safe' || trimmed === 'good' || trimmed === 'benign' || trimmed === 'legitimate' || trimmed === 'false') return 0;

	const numeric = Number(trimmed);
	if (trimmed.length > 0 && !Number.isNaN(numeric)) {
		return numeric >= 0.5 ? 1 : 0;
	}

	return null;
}

export default async function exportFeatures(args: string[]) {
	const parsed = parseArgs(args);
	if (hasFlag(parsed, 'help', 'h')) {
		printHelp();
		return;
	}

	const inputPath = resolve(getOption(parsed, 'input') || 'data/urls.csv');
	const outputPath = resolve(getOption(parsed, 'output') || 'data/features.csv');
	const urlColumn = getOption(parsed, 'url-column') || 'url';
	const labelColumn = getOption(parsed, 'label-column') || 'label';
	const limit = getNumberOption(parsed, 'limit');
	const includeUrl = hasFlag(parsed, 'include-url');

	logger.section('✨ Exporting feature matrix');
	logger.info(`Input:  ${inputPath}`);
	logger.info(`Output: ${outputPath}`);

	const raw = readFileSync(inputPath, 'utf8');
	const rows: DatasetRow[] = parse(raw, {
		columns: true,
		skip_empty_lines: true,
	});

	if (rows.length === 0) {
		logger.warn('No rows found in dataset.');
		return;
	}

	const records: (string | number)[][] = [];
	let skipped = 0;

	for (const row of rows) {
		if (limit !== undefined && records.length >= limit) break;

		const url = row[urlColumn];
		if (!url || url.trim().length === 0) {
			skipped++;
			continue;
		}

		const labelValue = row[labelColumn];
		const label = labelValue === undefined ? null : normalizeLabel(labelValue);
		if (label === null) {
			logger.warn(`Skipping ${url}: unreadable label ${JSON.stringify(labelValue ?? '')}`);
			skipped++;
			continue;
		}

		const values = toFeatureArray(extractUrlFeatures(url));
		records.push(includeUrl ? [url, ...values, label] : [...values, label]);

		if (records.length % 10000 === 0) {
			logger.info(`Processed ${records.length.toLocaleString()} rows...`);
		}
	}

	if (records.length === 0) {
		logger.warn('No rows were processed successfully.');
		return;
	}

	const header = [...(includeUrl ? ['url'] : []), ...FEATURE_NAMES, 'label'];
	writeFileSync(outputPath, stringify(records, { header: true, columns: header }));

	logger.success(`Wrote ${records.length.toLocaleString()} rows (${skipped} skipped) to ${outputPath}`);
}
