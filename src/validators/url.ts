import { InputError } from '../errors';

export interface UrlRequest {
	url: string;
}

export interface BatchUrlRequest {
	/** Elements are checked one by one during prediction */
	urls: unknown[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function isValidUrlValue(value: unknown): value is string {
	return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Narrow an untyped URL value, rejecting non-strings and blank strings.
 */
export function validateUrlValue(value: unknown, message = 'Invalid URL provided'): string {
	if (!isValidUrlValue(value)) {
		throw new InputError(message);
	}
	return value;
}

export function parseUrlRequest(body: unknown): UrlRequest {
	if (!isRecord(body) || !('url' in body)) {
		throw new InputError("Missing 'url' field in request");
	}
	return { url: validateUrlValue(body.url) };
}

export function parseBatchRequest(body: unknown): BatchUrlRequest {
	if (!isRecord(body) || !('urls' in body)) {
		throw new InputError("Missing 'urls' field in request");
	}
	if (!Array.isArray(body.urls)) {
		throw new InputError("'urls' must be a list");
	}
	return { urls: body.urls };
}
