/**
 * Lexical URL features
 *
 * Everything is derived from the characters of the input alone: no DNS, no
 * fetch, no lookups. Lengths and counts are in Unicode code points.
 */

import { splitUrl, isIPv4Literal } from '../utils/url-parts';
import type { UrlFeatures } from '../utils/feature-vector';

export const MAX_DOT_COUNT = 4;

const DIGIT_PATTERN = /^\p{Nd}$/u;
const LETTER_PATTERN = /^\p{L}$/u;

function codePointLength(value: string): number {
	return Array.from(value).length;
}

export function extractUrlFeatures(url: string): UrlFeatures {
	const parts = splitUrl(url);

	let length = 0;
	let digits = 0;
	let letters = 0;
	let special = 0;
	let dots = 0;
	let dashes = 0;
	let slashes = 0;
	let ats = 0;
	let qmarks = 0;
	let percents = 0;
	let equals = 0;

	for (const char of url) {
		length++;

		if (DIGIT_PATTERN.test(char)) {
			digits++;
			continue;
		}
		if (LETTER_PATTERN.test(char)) {
			letters++;
			continue;
		}

		special++;
		switch (char) {
			case '.':
				dots++;
				break;
			case '-':
				dashes++;
				break;
			case '/':
				slashes++;
				break;
			case '@':
				ats++;
				break;
			case '?':
				qmarks++;
				break;
			case '%':
				percents++;
				break;
			case '=':
				equals++;
				break;
		}
	}

	return {
		url_length: length,
		path_length: codePointLength(parts.path),
		query_length: codePointLength(parts.query),
		num_digits: digits,
		num_letters: letters,
		num_special: special,
		count_dot: Math.min(dots, MAX_DOT_COUNT),
		count_dash: dashes,
		count_slash: slashes,
		count_at: ats,
		count_qmark: qmarks,
		count_percent: percents,
		count_equal: equals,
		has_https: parts.scheme.toLowerCase() === 'https' ? 1 : 0,
		has_ip: isIPv4Literal(parts.host) ? 1 : 0,
	};
}
