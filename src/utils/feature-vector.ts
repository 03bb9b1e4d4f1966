/**
 * Feature vector layout shared by the extractor, the model runtime and the CLI.
 *
 * The order below is the column order the classifier was trained on.
 */

export const FEATURE_NAMES = [
	'url_length',
	'path_length',
	'query_length',
	'num_digits',
	'num_letters',
	'num_special',
	'count_dot',
	'count_dash',
	'count_slash',
	'count_at',
	'count_qmark',
	'count_percent',
	'count_equal',
	'has_https',
	'has_ip',
] as const;

export type FeatureName = (typeof FEATURE_NAMES)[number];

export type UrlFeatures = Record<FeatureName, number>;

/** Values in training column order. */
export function toFeatureArray(features: UrlFeatures): number[] {
	return FEATURE_NAMES.map((name) => features[name]);
}
