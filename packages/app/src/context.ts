/**
 * Request Context
 *
 * One context per inbound request: the request, the runtime configuration,
 * the in-progress response and per-request user state.
 * Immutable by convention - writers return updated copies.
 */

import type { Handler, HttpStatus, Outcome, ResponseBody } from '@trellis/core'
import { statusFor } from '@trellis/core'
import type { HttpRuntime } from './config'
import { defaultRuntime } from './config'
import type { Cookie } from './cookie'

// =============================================================================
// Context Type
// =============================================================================

export type HttpRequest = {
	readonly method: string
	/** Percent-decoded path */
	readonly path: string
	readonly rawPath: string
	readonly rawQuery: string
	readonly query: Readonly<Record<string, string>>
	/** Fields of an application/x-www-form-urlencoded body */
	readonly form: Readonly<Record<string, string>>
	/** Lower-cased header names */
	readonly headers: Readonly<Record<string, string>>
	readonly body: Buffer
	/** Host header without the port */
	readonly host: string
	readonly httpVersion: string
	readonly isSecure: boolean
	readonly remoteAddress: string
}

export type HttpResult = {
	readonly status: HttpStatus
	/** Lower-cased header names, last write wins */
	readonly headers: Readonly<Record<string, string>>
	/** Keyed by cookie name, last write wins */
	readonly cookies: Readonly<Record<string, Cookie>>
	readonly body: ResponseBody
}

export type HttpContext = {
	readonly request: HttpRequest
	readonly runtime: HttpRuntime
	readonly response: HttpResult
	readonly userState: Readonly<Record<string, unknown>>
}

/**
 * A handler over the request context.
 * No-match means "does not apply, try the next candidate".
 */
export type WebPart = Handler<HttpContext, HttpContext>

export type RouteResult = Outcome<HttpContext>

// =============================================================================
// Context Creation
// =============================================================================

export type RequestInit = {
	readonly method?: string
	/** Path and optional query string, e.g. /items/42?page=2 */
	readonly url?: string
	readonly headers?: Record<string, string | undefined>
	readonly body?: Buffer | string
	readonly httpVersion?: string
	readonly isSecure?: boolean
	readonly remoteAddress?: string
}

const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded'

const decodePath = (raw: string): string => {
	try {
		return decodeURIComponent(raw)
	} catch {
		return raw
	}
}

const searchParamsToRecord = (params: URLSearchParams): Record<string, string> =>
	Object.fromEntries(params.entries())

const lowerCaseHeaders = (
	headers: Record<string, string | undefined>
): Record<string, string> => {
	const result: Record<string, string> = {}
	for (const [name, value] of Object.entries(headers)) {
		if (value !== undefined) result[name.toLowerCase()] = value
	}
	return result
}

const stripPort = (hostHeader: string): string => {
	if (hostHeader.startsWith('[')) {
		const end = hostHeader.indexOf(']')
		return end === -1 ? hostHeader : hostHeader.slice(0, end + 1)
	}
	const colon = hostHeader.indexOf(':')
	return colon === -1 ? hostHeader : hostHeader.slice(0, colon)
}

/**
 * Create a request from its parts
 */
export const createRequest = (init: RequestInit = {}): HttpRequest => {
	const url = init.url ?? '/'
	const queryIndex = url.indexOf('?')
	const rawPath = queryIndex === -1 ? url : url.slice(0, queryIndex)
	const rawQuery = queryIndex === -1 ? '' : url.slice(queryIndex + 1)
	const headers = lowerCaseHeaders(init.headers ?? {})
	const body = typeof init.body === 'string' ? Buffer.from(init.body) : (init.body ?? Buffer.alloc(0))

	const contentType = headers['content-type'] ?? ''
	const form = contentType.toLowerCase().startsWith(FORM_CONTENT_TYPE)
		? searchParamsToRecord(new URLSearchParams(body.toString('utf8')))
		: {}

	return {
		method: (init.method ?? 'GET').toUpperCase(),
		path: decodePath(rawPath),
		rawPath,
		rawQuery,
		query: searchParamsToRecord(new URLSearchParams(rawQuery)),
		form,
		headers,
		body,
		host: stripPort(headers.host ?? 'localhost'),
		httpVersion: init.httpVersion ?? 'HTTP/1.1',
		isSecure: init.isSecure ?? false,
		remoteAddress: init.remoteAddress ?? '127.0.0.1',
	}
}

/**
 * Empty response: 404 with no headers and no body until a handler writes one
 */
export const emptyResult = (): HttpResult => ({
	status: statusFor(404),
	headers: {},
	cookies: {},
	body: null,
})

export const createContext = (
	request: HttpRequest,
	runtime: HttpRuntime = defaultRuntime
): HttpContext => ({
	request,
	runtime,
	response: emptyResult(),
	userState: {},
})

/**
 * Case-insensitive request header lookup
 */
export const getHeader = (request: HttpRequest, name: string): string | undefined =>
	request.headers[name.toLowerCase()]
