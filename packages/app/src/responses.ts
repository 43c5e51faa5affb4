/**
 * Response builders, one or two per status
 *
 * Entity statuses get a text form (UTF-8, default body = reason phrase)
 * and a bytes form. Both funnel through respondWithBytes.
 */

import type { HttpCode } from '@trellis/core'
import { compose, message, reason, statusFor } from '@trellis/core'
import type { WebPart } from './context'
import { respondWith, respondWithBytes, setHeader, setHeaderIfAbsent } from './writers'

const TEXT_PLAIN = 'text/plain; charset=utf-8'
const TEXT_HTML = 'text/html; charset=utf-8'
const EMPTY = Buffer.alloc(0)

type EntityBuilders = {
	readonly text: (body?: string) => WebPart
	readonly bytes: (body: Uint8Array) => WebPart
}

const entity = (code: HttpCode): EntityBuilders => {
	const bytes = (body: Uint8Array): WebPart => respondWithBytes(code, body)
	const text = (body: string = reason(statusFor(code))): WebPart =>
		compose(setHeaderIfAbsent('content-type', TEXT_PLAIN), bytes(Buffer.from(body, 'utf8')))
	return { text, bytes }
}

const bodyless = (code: HttpCode): WebPart => respondWith(code, () => null)

const withLocation =
	(code: HttpCode) =>
	(location: string): WebPart =>
		compose(setHeader('location', location), respondWithBytes(code, EMPTY))

export const escapeHtml = (value: string): string =>
	value
		.replace(/&/g, '&amp;')
		.replace(/</g, '&lt;')
		.replace(/>/g, '&gt;')
		.replace(/"/g, '&quot;')
		.replace(/'/g, '&#39;')

// ============================================================================
// 1xx Informational
// ============================================================================

export const continueStatus: WebPart = bodyless(100)
export const switchingProtocols: WebPart = bodyless(101)

// ============================================================================
// 2xx Success
// ============================================================================

export const { text: ok, bytes: okBytes } = entity(200)
export const { text: created, bytes: createdBytes } = entity(201)
export const { text: accepted, bytes: acceptedBytes } = entity(202)
export const noContent: WebPart = bodyless(204)

// ============================================================================
// 3xx Redirection
// ============================================================================

export const movedPermanently = withLocation(301)
export const found = withLocation(302)
export const seeOther = withLocation(303)
export const temporaryRedirect = withLocation(307)

/**
 * 302 with a small HTML page linking to the target
 */
export const redirect = (url: string): WebPart =>
	compose(
		setHeader('location', url),
		setHeader('content-type', TEXT_HTML),
		respondWithBytes(
			302,
			Buffer.from(
				`<html><body><a href="${escapeHtml(url)}">${message(statusFor(302))}</a></body></html>`,
				'utf8'
			)
		)
	)

export const notModified: WebPart = bodyless(304)

// ============================================================================
// 4xx Client errors
// ============================================================================

export const { text: badRequest, bytes: badRequestBytes } = entity(400)
export const { text: unauthorized, bytes: unauthorizedBytes } = entity(401)
export const { text: forbidden, bytes: forbiddenBytes } = entity(403)
export const { text: notFound, bytes: notFoundBytes } = entity(404)
export const { text: methodNotAllowed, bytes: methodNotAllowedBytes } = entity(405)
export const { text: notAcceptable, bytes: notAcceptableBytes } = entity(406)
export const requestTimeout: WebPart = respondWithBytes(408, EMPTY)
export const { text: conflict, bytes: conflictBytes } = entity(409)
export const { text: gone, bytes: goneBytes } = entity(410)
export const { text: requestEntityTooLarge, bytes: requestEntityTooLargeBytes } = entity(413)
export const { text: unsupportedMediaType, bytes: unsupportedMediaTypeBytes } = entity(415)
export const { text: unprocessableEntity, bytes: unprocessableEntityBytes } = entity(422)
export const { text: preconditionRequired, bytes: preconditionRequiredBytes } = entity(428)
export const { text: tooManyRequests, bytes: tooManyRequestsBytes } = entity(429)

/**
 * 401 with a Basic WWW-Authenticate header for `realm`
 */
export const challengeRealm = (realm: string): WebPart =>
	compose(
		setHeader('www-authenticate', `Basic realm="${realm.replace(/["\\]/g, '\\$&')}"`),
		unauthorized('401 Unauthorized.')
	)

export const challenge: WebPart = challengeRealm('protected')

// ============================================================================
// 5xx Server errors
// ============================================================================

export const { text: internalError, bytes: internalErrorBytes } = entity(500)
export const { text: notImplemented, bytes: notImplementedBytes } = entity(501)
export const { text: badGateway, bytes: badGatewayBytes } = entity(502)
export const { text: serviceUnavailable, bytes: serviceUnavailableBytes } = entity(503)
export const { text: gatewayTimeout, bytes: gatewayTimeoutBytes } = entity(504)
export const invalidHttpVersion: WebPart = entity(505).text(message(statusFor(505)))
