import { describe, it, expect } from 'vitest';
import { splitUrl, hostFromAuthority, isIPv4Literal } from '../../../src/utils/url-parts';

describe('splitUrl', () => {
	it('splits a full URL into its components', () => {
		expect(splitUrl('http://192.168.1.1/login?user=admin&id=5#top')).toEqual({
			scheme: 'http',
			authority: '192.168.1.1',
			host: '192.168.1.1',
			path: '/login',
			query: 'user=admin&id=5',
			fragment: 'top',
		});
	});

	it('returns an empty path for a bare host', () => {
		const parts = splitUrl('https://www.google.com');
		expect(parts.host).toBe('www.google.com');
		expect(parts.path).toBe('');
	});

	it('treats scheme-less input as a path with no host', () => {
		expect(splitUrl('www.example.com/path')).toEqual({
			scheme: '',
			authority: '',
			host: '',
			path: 'www.example.com/path',
			query: '',
			fragment: '',
		});
	});

	it('keeps the path of opaque schemes', () => {
		const parts = splitUrl('mailto:someone@example.com');
		expect(parts.scheme).toBe('mailto');
		expect(parts.host).toBe('');
		expect(parts.path).toBe('someone@example.com');
	});

	it('locates the query before the fragment', () => {
		const parts = splitUrl('http://a.com/p#frag?not-a-query');
		expect(parts.query).toBe('');
		expect(parts.fragment).toBe('frag?not-a-query');
		expect(parts.path).toBe('/p');
	});

	it('never throws on arbitrary strings', () => {
		expect(() => splitUrl('::://??##')).not.toThrow();
		expect(splitUrl('').path).toBe('');
	});
});

describe('hostFromAuthority', () => {
	it('strips userinfo and port', () => {
		expect(hostFromAuthority('user:pw@10.0.0.1:8080')).toBe('10.0.0.1');
	});

	it('uses the last @ as the userinfo separator', () => {
		expect(hostFromAuthority('a@b@evil.com')).toBe('evil.com');
	});

	it('keeps bracketed IPv6 literals', () => {
		expect(hostFromAuthority('[::1]:8080')).toBe('[::1]');
	});
});

describe('isIPv4Literal', () => {
	it.each([
		['192.168.1.1', true],
		['0.0.0.0', true],
		['255.255.255.255', true],
		['256.1.1.1', false],
		['1.2.3', false],
		['1.2.3.4.5', false],
		['1234.1.1.1', false],
		['example.com', false],
		['[::1]', false],
		['', false],
	])('%s -> %s', (host, expected) => {
		expect(isIPv4Literal(host)).toBe(expected);
	});
});
