/**
 * @trellis/core
 * Outcome type, handler combinators, status registry and MIME table
 * Pure functions, no I/O
 */

export type { Handler } from './compose'
// Combinator algebra
export {
	applyToSelf,
	bind,
	choose,
	cnst,
	compose,
	cond,
	delay,
	fail,
	never,
	orElse,
	succeed,
	warbler,
} from './compose'
export type { Matched, MaybePromise, NoMatch, Outcome } from './outcome'
export { matched, noMatch } from './outcome'
export type { MimeType, MimeTypesMap } from './mime'
// MIME table
export { createMimeTypesMap, defaultMimeTypesMap, mkMimeType } from './mime'
export type { ResponseBody } from './response'
export { bodyLength, isStreamingBody } from './response'
export type { HttpCode, HttpStatus, StatusParse } from './status'
// Status registry
export {
	allStatuses,
	code,
	describeStatus,
	HTTP_CODES,
	isBodyless,
	message,
	reason,
	statusFor,
	tryParse,
} from './status'
