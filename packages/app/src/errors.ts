/**
 * Error handling
 * Turns a handler failure into a response
 */

import type { WebPart } from './context'
import { internalError } from './responses'

/**
 * Builds the handler that answers a failed request
 */
export type ErrorHandler = (error: unknown, message: string) => WebPart

export const errorMessage = (error: unknown): string =>
	error instanceof Error ? error.message : String(error)

export const defaultErrorHandler: ErrorHandler = (error, message) => (ctx) => {
	console.error('Request handler error:', error)
	return internalError(message)(ctx)
}
