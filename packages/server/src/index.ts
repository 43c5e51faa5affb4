/**
 * @trellis/server
 *
 * File serving, compression negotiation and the Node.js http transport
 *
 * @example
 * ```typescript
 * import { choose, compose } from '@trellis/core'
 * import { GET, notFound, ok, url } from '@trellis/app'
 * import { browseHome, dirHome, serve } from '@trellis/server'
 *
 * await serve({
 *   port: 3000,
 *   handler: choose([
 *     compose(GET, url('/health'), ok('up')),
 *     compose(GET, choose([browseHome, dirHome])),
 *     notFound('Page not found.'),
 *   ]),
 * })
 * ```
 */

// ============================================================================
// Files
// ============================================================================

export type { ListingEntry } from './files'
export {
	browse,
	browseFile,
	browseFileHome,
	browseHome,
	dir,
	dirHome,
	file,
	localFile,
	renderListing,
	sendFile,
} from './files'

// ============================================================================
// Compression
// ============================================================================

export type { ContentEncoding } from './compression'
export { compressStream, SUPPORTED_ENCODINGS, selectEncoding } from './compression'

// ============================================================================
// Transport
// ============================================================================

export type { ResponseSink, ServeOptions, Server, TlsOptions } from './transport'
export {
	bodyTooLarge,
	clientErrorResponse,
	createRequestListener,
	DEFAULT_MAX_BODY_SIZE,
	exceedsBodyLimit,
	nodeSink,
	readRequestBody,
	runWebPart,
	serve,
	toHttpRequest,
	writeResponse,
} from './transport'
