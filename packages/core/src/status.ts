/**
 * HTTP status registry
 * Fixed table of status variants: numeric code, reason phrase, long-form message
 */

import statusTable from './status-codes.json'

export const HTTP_CODES = [
	100, 101, 200, 201, 202, 203, 204, 205, 206, 300, 301, 302, 303, 304, 305, 307, 400, 401, 402,
	403, 404, 405, 406, 407, 408, 409, 410, 411, 412, 413, 414, 415, 416, 417, 422, 428, 429, 500,
	501, 502, 503, 504, 505,
] as const

export type HttpCode = (typeof HTTP_CODES)[number]

export type HttpStatus = {
	readonly code: HttpCode
	readonly reason: string
	readonly message: string
}

export type StatusParse =
	| { readonly kind: 'status'; readonly status: HttpStatus }
	| { readonly kind: 'unrecognized'; readonly code: number }

const knownCodes: ReadonlySet<number> = new Set(HTTP_CODES)

const isHttpCode = (code: number): code is HttpCode => knownCodes.has(code)

const registry: ReadonlyMap<number, HttpStatus> = new Map(
	statusTable.map((entry) => {
		if (!isHttpCode(entry.code)) {
			throw new Error(`Status table lists unknown code ${entry.code}`)
		}
		const status: HttpStatus = Object.freeze({
			code: entry.code,
			reason: entry.reason,
			message: entry.message,
		})
		return [entry.code, status] as const
	})
)

for (const code of HTTP_CODES) {
	if (!registry.has(code)) throw new Error(`Status table is missing code ${code}`)
}

/**
 * Look up a known status variant
 */
export const statusFor = (code: HttpCode): HttpStatus => {
	const status = registry.get(code)
	if (!status) throw new Error(`Unknown status code ${code}`)
	return status
}

export const allStatuses: readonly HttpStatus[] = HTTP_CODES.map(statusFor)

export const code = (status: HttpStatus): HttpCode => status.code

export const reason = (status: HttpStatus): string => status.reason

export const message = (status: HttpStatus): string => status.message

/**
 * "404 Not Found"
 */
export const describeStatus = (status: HttpStatus): string => `${status.code} ${status.reason}`

export const tryParse = (value: number): StatusParse => {
	const status = registry.get(value)
	return status ? { kind: 'status', status } : { kind: 'unrecognized', code: value }
}

/**
 * Statuses that never carry a response body
 */
export const isBodyless = (status: HttpStatus): boolean =>
	status.code < 200 || status.code === 204 || status.code === 304
