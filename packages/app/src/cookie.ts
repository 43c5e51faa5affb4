/**
 * Cookies
 * Request-side parsing and Set-Cookie serialization (RFC 6265)
 */

export type CookieOptions = {
	readonly domain?: string
	readonly path?: string
	readonly expires?: Date
	/** Seconds */
	readonly maxAge?: number
	readonly httpOnly?: boolean
	/** HTTPS only */
	readonly secure?: boolean
	readonly sameSite?: 'Strict' | 'Lax' | 'None'
}

export type Cookie = {
	readonly name: string
	readonly value: string
} & CookieOptions

const unquote = (value: string): string =>
	value.length >= 2 && value.startsWith('"') && value.endsWith('"') ? value.slice(1, -1) : value

const decodeValue = (value: string): string => {
	try {
		return decodeURIComponent(value)
	} catch {
		return value
	}
}

/**
 * Cookie header -> name/value record. Pairs without a name are skipped;
 * values that fail to decode are kept as sent.
 */
export const parseCookies = (cookieHeader: string): Record<string, string> => {
	const cookies: Record<string, string> = {}

	for (const pair of cookieHeader.split(';')) {
		const eqIndex = pair.indexOf('=')
		if (eqIndex === -1) continue

		const name = pair.slice(0, eqIndex).trim()
		if (!name) continue

		cookies[name] = decodeValue(unquote(pair.slice(eqIndex + 1).trim()))
	}

	return cookies
}

/**
 * Set-Cookie header value. Attributes follow the value in a fixed order.
 */
export const serializeCookie = (cookie: Cookie): string => {
	const { name, value, domain, path, expires, maxAge, httpOnly, secure, sameSite } = cookie
	const parts = [`${name}=${encodeURIComponent(value)}`]

	if (domain) parts.push(`Domain=${domain}`)
	if (path) parts.push(`Path=${path}`)
	if (expires) parts.push(`Expires=${expires.toUTCString()}`)
	if (maxAge !== undefined) parts.push(`Max-Age=${maxAge}`)
	if (httpOnly) parts.push('HttpOnly')
	if (secure) parts.push('Secure')
	if (sameSite) parts.push(`SameSite=${sameSite}`)

	return parts.join('; ')
}

/**
 * Cookie that tells the client to drop `name`
 */
export const expiredCookie = (
	name: string,
	options: Pick<CookieOptions, 'domain' | 'path'> = {}
): Cookie => ({
	name,
	value: '',
	...options,
	expires: new Date(0),
	maxAge: 0,
})

export const getCookie = (
	headers: Readonly<Record<string, string>>,
	name: string
): string | undefined => parseCookies(headers.cookie ?? '')[name]
