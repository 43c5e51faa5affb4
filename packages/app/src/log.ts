/**
 * Request logging
 * A logger is any function accepting a formatted line
 */

import { bodyLength } from '@trellis/core'
import type { HttpContext } from './context'

export type Logger = (line: string) => void | Promise<void>

export type LogFormatter = (ctx: HttpContext) => string

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec']

const pad = (n: number): string => n.toString().padStart(2, '0')

/**
 * 19/Oct/2026:08:05:09 +0000
 */
export const formatLogDate = (date: Date): string =>
	`${pad(date.getUTCDate())}/${MONTHS[date.getUTCMonth()]}/${date.getUTCFullYear()}:` +
	`${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())} +0000`

/**
 * Common log format line
 * 127.0.0.1 - alice [19/Oct/2026:08:05:09 +0000] "GET /index.html HTTP/1.1" 200 1043
 */
export const logFormat = (ctx: HttpContext, now: Date = new Date()): string => {
	const { request, response } = ctx
	const userName = ctx.userState.userName
	const user = typeof userName === 'string' && userName !== '' ? userName : '-'
	const length = bodyLength(response.body)
	const size = length === undefined ? '-' : length.toString()

	return (
		`${request.remoteAddress} - ${user} [${formatLogDate(now)}] ` +
		`"${request.method} ${request.path} ${request.httpVersion}" ${response.status.code} ${size}`
	)
}
