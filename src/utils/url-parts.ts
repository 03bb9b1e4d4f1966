/**
 * Structural URL split
 *
 * Works on arbitrary strings, not just valid URLs: nothing here throws, and a
 * component that cannot be located comes back as an empty string. Component
 * lengths must match the raw input, so no normalization happens (the WHATWG
 * `URL` class lowercases, percent-encodes and drops default ports).
 */

export interface UrlParts {
	scheme: string;
	/** userinfo@host:port, present only after `//` */
	authority: string;
	host: string;
	/** Includes the leading `/` */
	path: string;
	/** Without the leading `?` */
	query: string;
	/** Without the leading `#` */
	fragment: string;
}

const SCHEME_PATTERN = /^([A-Za-z][A-Za-z0-9+.-]*):/;
const IPV4_PATTERN = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

export function splitUrl(url: string): UrlParts {
	let rest = url;

	let fragment = '';
	const hashIndex = rest.indexOf('#');
	if (hashIndex !== -1) {
		fragment = rest.slice(hashIndex + 1);
		rest = rest.slice(0, hashIndex);
	}

	let query = '';
	const queryIndex = rest.indexOf('?');
	if (queryIndex !== -1) {
		query = rest.slice(queryIndex + 1);
		rest = rest.slice(0, queryIndex);
	}

	let scheme = '';
	const schemeMatch = SCHEME_PATTERN.exec(rest);
	if (schemeMatch) {
		scheme = schemeMatch[1];
		rest = rest.slice(schemeMatch[0].length);
	}

	let authority = '';
	if (rest.startsWith('//')) {
		rest = rest.slice(2);
		const slashIndex = rest.indexOf('/');
		if (slashIndex === -1) {
			authority = rest;
			rest = '';
		} else {
			authority = rest.slice(0, slashIndex);
			rest = rest.slice(slashIndex);
		}
	}

	return {
		scheme,
		authority,
		host: hostFromAuthority(authority),
		path: rest,
		query,
		fragment,
	};
}

/**
 * Strips userinfo and port. Bracketed IPv6 literals keep their brackets.
 */
export function hostFromAuthority(authority: string): string {
	const atIndex = authority.lastIndexOf('@');
	const hostPort = atIndex === -1 ? authority : authority.slice(atIndex + 1);

	if (hostPort.startsWith('[')) {
		const closing = hostPort.indexOf(']');
		return closing === -1 ? hostPort : hostPort.slice(0, closing + 1);
	}

	const colonIndex = hostPort.indexOf(':');
	return colonIndex === -1 ? hostPort : hostPort.slice(0, colonIndex);
}

export function isIPv4Literal(host: string): boolean {
	const match = IPV4_PATTERN.exec(host);
	if (!match) {
		return false;
	}
	return match.slice(1).every((octet) => Number(octet) <= 255);
}
