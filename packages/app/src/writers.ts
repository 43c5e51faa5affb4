/**
 * Writers
 *
 * Each writer returns a handler that updates one field of the context.
 * respondWith is the single place a status and body are attached.
 */

import type { HttpCode, ResponseBody } from '@trellis/core'
import { isBodyless, statusFor, succeed } from '@trellis/core'
import type { HttpContext, HttpResult, WebPart } from './context'
import type { Cookie, CookieOptions } from './cookie'
import { expiredCookie } from './cookie'

/**
 * Produces the body for a context. May be async; a returned AsyncIterable
 * is the deferred write and is only consumed by the transport.
 */
export type BodyProducer = (ctx: HttpContext) => ResponseBody | Promise<ResponseBody>

const withResponse = (ctx: HttpContext, patch: Partial<HttpResult>): HttpContext => ({
	...ctx,
	response: { ...ctx.response, ...patch },
})

const withoutKey = <V>(record: Readonly<Record<string, V>>, key: string): Record<string, V> => {
	const { [key]: _removed, ...rest } = record
	return rest
}

// ============================================================================
// Response writer
// ============================================================================

/**
 * Set the status and body.
 * 1xx, 204 and 304 never carry a body: the producer is skipped and
 * content-length is dropped.
 */
export const respondWith =
	(code: HttpCode, producer: BodyProducer): WebPart =>
	async (ctx) => {
		const status = statusFor(code)

		if (isBodyless(status)) {
			return succeed(
				withResponse(ctx, {
					status,
					headers: withoutKey(ctx.response.headers, 'content-length'),
					body: null,
				})
			)
		}

		const body = await producer(ctx)
		return succeed(withResponse(ctx, { status, body }))
	}

/**
 * respondWith plus a content-length header derived from the bytes
 */
export const respondWithBytes = (code: HttpCode, bytes: Uint8Array): WebPart => {
	const body = Buffer.isBuffer(bytes)
		? bytes
		: Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength)

	return (ctx) => {
		const headers = { ...ctx.response.headers, 'content-length': body.length.toString() }
		return respondWith(code, () => body)(withResponse(ctx, { headers }))
	}
}

// ============================================================================
// Field writers
// ============================================================================

export const setStatus =
	(code: HttpCode): WebPart =>
	(ctx) =>
		succeed(withResponse(ctx, { status: statusFor(code) }))

/**
 * Set a response header, replacing any earlier value for the same name
 */
export const setHeader =
	(name: string, value: string): WebPart =>
	(ctx) =>
		succeed(
			withResponse(ctx, {
				headers: { ...ctx.response.headers, [name.toLowerCase()]: value },
			})
		)

/**
 * Set a response header unless one is already present
 */
export const setHeaderIfAbsent =
	(name: string, value: string): WebPart =>
	(ctx) =>
		name.toLowerCase() in ctx.response.headers ? succeed(ctx) : setHeader(name, value)(ctx)

export const removeHeader =
	(name: string): WebPart =>
	(ctx) =>
		succeed(withResponse(ctx, { headers: withoutKey(ctx.response.headers, name.toLowerCase()) }))

export const setMimeType = (mimeType: string): WebPart => setHeader('content-type', mimeType)

/**
 * Attach a cookie, replacing any earlier cookie with the same name
 */
export const setCookie =
	(cookie: Cookie): WebPart =>
	(ctx) =>
		succeed(
			withResponse(ctx, {
				cookies: { ...ctx.response.cookies, [cookie.name]: cookie },
			})
		)

export const unsetCookie = (
	name: string,
	options: Pick<CookieOptions, 'domain' | 'path'> = {}
): WebPart => setCookie(expiredCookie(name, options))

export const setUserData =
	(key: string, value: unknown): WebPart =>
	(ctx) =>
		succeed({ ...ctx, userState: { ...ctx.userState, [key]: value } })

export const unsetUserData =
	(key: string): WebPart =>
	(ctx) =>
		succeed({ ...ctx, userState: withoutKey(ctx.userState, key) })
