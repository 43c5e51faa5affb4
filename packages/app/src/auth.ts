/**
 * Basic Authentication
 * Challenge / credential-check loop
 */

import { timingSafeEqual } from 'node:crypto'
import type { Outcome } from '@trellis/core'
import { compose, matched, noMatch } from '@trellis/core'
import type { HttpContext, WebPart } from './context'
import { challengeRealm } from './responses'
import { setUserData } from './writers'

export type AuthToken = {
	/** Lower-cased scheme, e.g. "basic" */
	readonly scheme: string
	readonly user: string
	readonly password: string
}

export type BasicValidator = (
	user: string,
	password: string,
	ctx: HttpContext
) => boolean | Promise<boolean>

export type BasicAuthOptions = {
	/** Realm for WWW-Authenticate header (default: protected) */
	readonly realm?: string
	/** Custom unauthorized response */
	readonly onUnauthorized?: WebPart
}

const BASE64 = /^[A-Za-z0-9+/]+={0,2}$/

/**
 * Split "Basic base64(user:pass)" into scheme, user and password.
 * Anything malformed is a no-match.
 */
export const parseAuthToken = (token: string): Outcome<AuthToken> => {
	const trimmed = token.trim()
	const spaceIndex = trimmed.indexOf(' ')
	if (spaceIndex <= 0) return noMatch

	const scheme = trimmed.slice(0, spaceIndex).toLowerCase()
	const encoded = trimmed.slice(spaceIndex + 1).trim()
	if (!BASE64.test(encoded)) return noMatch

	const decoded = Buffer.from(encoded, 'base64').toString('utf-8')
	const colonIndex = decoded.indexOf(':')
	if (colonIndex === -1) return noMatch

	return matched({
		scheme,
		user: decoded.slice(0, colonIndex),
		password: decoded.slice(colonIndex + 1),
	})
}

/**
 * Create Basic Auth header value
 */
export const createBasicAuth = (user: string, password: string): string =>
	`Basic ${Buffer.from(`${user}:${password}`).toString('base64')}`

/**
 * Run `protectedPart` only for requests carrying valid basic credentials.
 * Missing, malformed or rejected credentials get the 401 challenge.
 * On success the user name is stored as userState.userName.
 */
export const authenticateBasic = (
	validate: BasicValidator,
	protectedPart: WebPart,
	options: BasicAuthOptions = {}
): WebPart => {
	const { realm = 'protected', onUnauthorized } = options
	const unauthorized = onUnauthorized ?? challengeRealm(realm)

	return async (ctx) => {
		const header = ctx.request.headers.authorization
		if (!header) return unauthorized(ctx)

		const token = parseAuthToken(header)
		if (!token.matched || token.value.scheme !== 'basic') return unauthorized(ctx)

		const { user, password } = token.value
		const isValid = await validate(user, password, ctx)
		if (!isValid) return unauthorized(ctx)

		return compose(setUserData('userName', user), protectedPart)(ctx)
	}
}

/**
 * Validator for a single static user, compared in constant time
 */
export const basicCredentials = (user: string, password: string): BasicValidator => {
	const expectedUser = Buffer.from(user)
	const expectedPass = Buffer.from(password)

	return (u, p) => {
		const userBuf = Buffer.from(u)
		const passBuf = Buffer.from(p)

		const userMatch = userBuf.length === expectedUser.length && timingSafeEqual(userBuf, expectedUser)
		const passMatch = passBuf.length === expectedPass.length && timingSafeEqual(passBuf, expectedPass)

		return userMatch && passMatch
	}
}
