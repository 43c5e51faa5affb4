/**
 * @trellis/app
 *
 * Request context, writers, response builders, route matchers and basic auth
 *
 * @example
 * ```typescript
 * import { choose, compose } from '@trellis/core'
 * import { GET, notFound, ok, url, urlScan } from '@trellis/app'
 *
 * const app = choose([
 *   compose(GET, url('/'), ok('Home')),
 *   urlScan('/users/%d', ([id]) => ok(`User ${id}`)),
 *   notFound('Page not found.'),
 * ])
 * ```
 */

// ============================================================================
// Context
// ============================================================================

export type {
	HttpContext,
	HttpRequest,
	HttpResult,
	RequestInit,
	RouteResult,
	WebPart,
} from './context'
export { createContext, createRequest, emptyResult, getHeader } from './context'

// ============================================================================
// Configuration
// ============================================================================

export type { HttpRuntime, RuntimeOptions } from './config'
export { createRuntime, defaultRuntime } from './config'

// ============================================================================
// Errors and logging
// ============================================================================

export type { ErrorHandler } from './errors'
export { defaultErrorHandler, errorMessage } from './errors'
export type { LogFormatter, Logger } from './log'
export { formatLogDate, logFormat } from './log'

// ============================================================================
// Writers
// ============================================================================

export type { BodyProducer } from './writers'
export {
	removeHeader,
	respondWith,
	respondWithBytes,
	setCookie,
	setHeader,
	setHeaderIfAbsent,
	setMimeType,
	setStatus,
	setUserData,
	unsetCookie,
	unsetUserData,
} from './writers'

// Cookies
export type { Cookie, CookieOptions } from './cookie'
export { expiredCookie, getCookie, parseCookies, serializeCookie } from './cookie'

// ============================================================================
// Response builders
// ============================================================================

export {
	accepted,
	acceptedBytes,
	badGateway,
	badGatewayBytes,
	badRequest,
	badRequestBytes,
	challenge,
	challengeRealm,
	conflict,
	conflictBytes,
	continueStatus,
	created,
	createdBytes,
	escapeHtml,
	forbidden,
	forbiddenBytes,
	found,
	gatewayTimeout,
	gatewayTimeoutBytes,
	gone,
	goneBytes,
	internalError,
	internalErrorBytes,
	invalidHttpVersion,
	methodNotAllowed,
	methodNotAllowedBytes,
	movedPermanently,
	noContent,
	notAcceptable,
	notAcceptableBytes,
	notFound,
	notFoundBytes,
	notImplemented,
	notImplementedBytes,
	notModified,
	ok,
	okBytes,
	preconditionRequired,
	preconditionRequiredBytes,
	redirect,
	requestEntityTooLarge,
	requestEntityTooLargeBytes,
	requestTimeout,
	seeOther,
	serviceUnavailable,
	serviceUnavailableBytes,
	switchingProtocols,
	temporaryRedirect,
	tooManyRequests,
	tooManyRequestsBytes,
	unauthorized,
	unauthorizedBytes,
	unprocessableEntity,
	unprocessableEntityBytes,
	unsupportedMediaType,
	unsupportedMediaTypeBytes,
} from './responses'

// ============================================================================
// Matchers
// ============================================================================

export {
	CONNECT,
	context,
	DELETE,
	GET,
	HEAD,
	host,
	isSecure,
	log,
	logRequest,
	method,
	OPTIONS,
	PATCH,
	POST,
	PUT,
	request,
	TRACE,
	url,
	urlCi,
	urlRegex,
	urlScan,
	urlScanCi,
	urlStartsWith,
} from './filters'
export type { Capture, ScanArgs, ScanFormat } from './scan'
export { compileFormat, scanPath } from './scan'

// ============================================================================
// Authentication
// ============================================================================

export type { AuthToken, BasicAuthOptions, BasicValidator } from './auth'
export { authenticateBasic, basicCredentials, createBasicAuth, parseAuthToken } from './auth'
