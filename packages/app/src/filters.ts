/**
 * Route matchers
 *
 * Each matcher passes the context through unchanged or rejects it.
 * Routing a request is choose() over an ordered list of handlers built
 * from these.
 *
 * @example
 * ```typescript
 * const app = choose([
 *   compose(GET, url('/'), ok('Home')),
 *   compose(GET, urlScan('/items/%d', ([id]) => ok(`Item ${id}`))),
 *   compose(POST, url('/items'), created('Stored')),
 *   notFound('Page not found.'),
 * ])
 * ```
 */

import { applyToSelf, fail, succeed } from '@trellis/core'
import type { HttpContext, HttpRequest, WebPart } from './context'
import type { LogFormatter, Logger } from './log'
import { logFormat } from './log'
import type { ScanArgs } from './scan'
import { compileFormat, isScanArgs, scanPath } from './scan'

const when =
	(predicate: (ctx: HttpContext) => boolean): WebPart =>
	(ctx) =>
		predicate(ctx) ? succeed(ctx) : fail

// ============================================================================
// Context access
// ============================================================================

/**
 * Build the handler from the context it will run on
 *
 * @example
 * ```typescript
 * context((ctx) => ok(`Hello ${ctx.userState.userName}`))
 * ```
 */
export const context = (f: (ctx: HttpContext) => WebPart): WebPart => applyToSelf(f)

export const request =
	(f: (req: HttpRequest) => WebPart): WebPart =>
	(ctx) =>
		f(ctx.request)(ctx)

// ============================================================================
// Method
// ============================================================================

export const method = (name: string): WebPart => {
	const expected = name.toUpperCase()
	return when((ctx) => ctx.request.method === expected)
}

export const GET: WebPart = method('GET')
export const POST: WebPart = method('POST')
export const PUT: WebPart = method('PUT')
export const DELETE: WebPart = method('DELETE')
export const HEAD: WebPart = method('HEAD')
export const CONNECT: WebPart = method('CONNECT')
export const PATCH: WebPart = method('PATCH')
export const TRACE: WebPart = method('TRACE')
export const OPTIONS: WebPart = method('OPTIONS')

// ============================================================================
// Path
// ============================================================================

/**
 * Exact match on the decoded path
 */
export const url = (path: string): WebPart => when((ctx) => ctx.request.path === path)

export const urlCi = (path: string): WebPart => {
	const expected = path.toLowerCase()
	return when((ctx) => ctx.request.path.toLowerCase() === expected)
}

export const urlStartsWith = (prefix: string): WebPart =>
	when((ctx) => ctx.request.path.startsWith(prefix))

/**
 * Matches when the pattern is found anywhere in the decoded path.
 * Anchor the pattern to require a full match.
 */
export const urlRegex = (pattern: string | RegExp): WebPart => {
	const regex =
		typeof pattern === 'string'
			? new RegExp(pattern)
			: new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''))
	return when((ctx) => regex.test(ctx.request.path))
}

const scanWith =
	(ignoreCase: boolean) =>
	<Format extends string>(
		format: Format,
		handler: (captures: ScanArgs<Format>) => WebPart
	): WebPart => {
		const compiled = compileFormat(format, ignoreCase)
		return (ctx) => {
			const scanned = scanPath(compiled, ctx.request.rawPath)
			if (!scanned.matched || !isScanArgs<Format>(compiled, scanned.value)) return fail
			return handler(scanned.value)(ctx)
		}
	}

/**
 * Parse the path against a typed format and hand the captures to `handler`.
 * A path that does not fit the format is a no-match.
 *
 * @example
 * ```typescript
 * urlScan('/add/%d/%d', ([a, b]) => ok(String(a + b)))
 * ```
 */
export const urlScan = scanWith(false)

export const urlScanCi = scanWith(true)

// ============================================================================
// Connection
// ============================================================================

/**
 * Host header, port excluded, case-insensitive
 */
export const host = (hostname: string): WebPart => {
	const expected = hostname.toLowerCase()
	return when((ctx) => ctx.request.host.toLowerCase() === expected)
}

export const isSecure: WebPart = when((ctx) => ctx.request.isSecure)

// ============================================================================
// Logging
// ============================================================================

/**
 * Always matches. Formats the context and hands the line to the logger.
 */
export const log =
	(logger: Logger, formatter: LogFormatter): WebPart =>
	async (ctx) => {
		await logger(formatter(ctx))
		return succeed(ctx)
	}

/**
 * log() with the runtime's logger and the common log format
 */
export const logRequest: WebPart = context((ctx) => log(ctx.runtime.logger, logFormat))
