import { describe, it, expect } from 'vitest';
import { isValidUrlValue, parseBatchRequest, parseUrlRequest, validateUrlValue } from '../../../src/validators/url';
import { InputError } from '../../../src/errors';

describe('URL request validation', () => {
	it('accepts non-blank strings', () => {
		expect(isValidUrlValue('http://example.com')).toBe(true);
		expect(isValidUrlValue('not a url')).toBe(true);
	});

	it.each([[''], ['   '], [null], [42], [['http://example.com']], [{}]])('rejects %j', (value) => {
		expect(isValidUrlValue(value)).toBe(false);
		expect(() => validateUrlValue(value)).toThrow('Invalid URL provided');
	});

	it('uses the caller-supplied message', () => {
		expect(() => validateUrlValue('', 'Invalid URL')).toThrow('Invalid URL');
	});

	it('reads the url field', () => {
		expect(parseUrlRequest({ url: 'http://example.com' })).toEqual({ url: 'http://example.com' });
	});

	it('reports a missing url field', () => {
		expect(() => parseUrlRequest({})).toThrow("Missing 'url' field in request");
		expect(() => parseUrlRequest(null)).toThrow(InputError);
		expect(() => parseUrlRequest(['http://example.com'])).toThrow("Missing 'url' field in request");
	});

	it('rejects an empty url field as invalid, not missing', () => {
		expect(() => parseUrlRequest({ url: '' })).toThrow('Invalid URL provided');
	});

	it('reads the urls list without validating elements', () => {
		expect(parseBatchRequest({ urls: ['a', 1, null] })).toEqual({ urls: ['a', 1, null] });
	});

	it('reports missing or non-list urls', () => {
		expect(() => parseBatchRequest({})).toThrow("Missing 'urls' field in request");
		expect(() => parseBatchRequest({ urls: 'http://example.com' })).toThrow("'urls' must be a list");
	});
});
