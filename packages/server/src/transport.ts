/**
 * Node.js transport
 *
 * Turns node:http requests into contexts, runs the handler once per
 * request and writes the resulting response, streaming deferred bodies
 * with back-pressure.
 */

import type { IncomingHttpHeaders, IncomingMessage, ServerResponse } from 'node:http'
import { createServer as createHttpServer } from 'node:http'
import { createServer as createHttpsServer } from 'node:https'
import type { Server as NetServer, Socket } from 'node:net'
import type { Duplex } from 'node:stream'
import type { HttpContext, HttpRequest, HttpRuntime, WebPart } from '@trellis/app'
import {
	createContext,
	createRequest,
	defaultRuntime,
	emptyResult,
	notFound,
	requestEntityTooLarge,
	serializeCookie,
	setHeader,
} from '@trellis/app'
import { bodyLength, code, compose, isBodyless, isStreamingBody, reason, statusFor } from '@trellis/core'

// ============================================================================
// Request
// ============================================================================

/** 1MB */
export const DEFAULT_MAX_BODY_SIZE = 1024 * 1024

/**
 * Read the whole request body. Past `maxSize` bytes the rest is drained
 * and dropped and the result is undefined.
 */
export const readRequestBody = async (
	req: AsyncIterable<Uint8Array | string>,
	maxSize = Number.POSITIVE_INFINITY
): Promise<Buffer | undefined> => {
	const chunks: Uint8Array[] = []
	let size = 0
	for await (const chunk of req) {
		const bytes = typeof chunk === 'string' ? Buffer.from(chunk) : chunk
		size += bytes.length
		if (size <= maxSize) chunks.push(bytes)
	}
	return size > maxSize ? undefined : Buffer.concat(chunks)
}

/**
 * Declared content-length above `maxSize`: answer without reading
 */
export const exceedsBodyLimit = (headers: IncomingHttpHeaders, maxSize: number): boolean => {
	const declared = Number.parseInt(headers['content-length'] ?? '', 10)
	return !Number.isNaN(declared) && declared > maxSize
}

export const bodyTooLarge: WebPart = compose(
	setHeader('connection', 'close'),
	requestEntityTooLarge('Payload Too Large')
)

export const toHttpRequest = (req: IncomingMessage, body: Buffer, isSecure: boolean): HttpRequest => {
	const headers: Record<string, string | undefined> = {}
	for (const [name, value] of Object.entries(req.headers)) {
		headers[name] = Array.isArray(value) ? value.join(', ') : value
	}

	return createRequest({
		method: req.method,
		url: req.url,
		headers,
		body,
		httpVersion: `HTTP/${req.httpVersion}`,
		isSecure,
		remoteAddress: req.socket.remoteAddress,
	})
}

// ============================================================================
// Running a handler
// ============================================================================

const INTERNAL_ERROR = 'Internal Server Error'

const bareInternalError = (ctx: HttpContext): HttpContext => ({
	...ctx,
	response: {
		...emptyResult(),
		status: statusFor(500),
		headers: { 'content-type': 'text/plain; charset=utf-8' },
		body: INTERNAL_ERROR,
	},
})

const recover = async (error: unknown, ctx: HttpContext): Promise<HttpContext> => {
	try {
		const outcome = await ctx.runtime.errorHandler(error, INTERNAL_ERROR)(ctx)
		if (outcome.matched) return outcome.value
	} catch (handlerError) {
		console.error('Error handler failed:', handlerError)
	}
	return bareInternalError(ctx)
}

/**
 * Apply the handler to a fresh context. No match becomes a 404, a throw
 * goes through runtime.errorHandler.
 */
export const runWebPart = async (handler: WebPart, ctx: HttpContext): Promise<HttpContext> => {
	try {
		const outcome = await handler(ctx)
		if (outcome.matched) return outcome.value

		const fallback = await notFound('Page not found.')(ctx)
		return fallback.matched ? fallback.value : ctx
	} catch (error) {
		return recover(error, ctx)
	}
}

// ============================================================================
// Response
// ============================================================================

/**
 * Where a response is written. nodeSink adapts a node:http ServerResponse.
 */
export type ResponseSink = {
	readonly writeHead: (
		statusCode: number,
		statusReason: string,
		headers: Record<string, string | string[]>
	) => void
	/** Returns false when the caller should wait for drain */
	readonly write: (chunk: Uint8Array) => boolean
	readonly end: (chunk?: Uint8Array) => void
	/** Resolves on drain, or on close */
	readonly waitForDrain: () => Promise<void>
	readonly isClosed: () => boolean
	readonly destroy: (error: Error) => void
}

export const nodeSink = (res: ServerResponse): ResponseSink => {
	let closed = false
	res.once('close', () => {
		closed = true
	})

	return {
		writeHead: (statusCode, statusReason, headers) => {
			res.writeHead(statusCode, statusReason, headers)
		},
		write: (chunk) => res.write(chunk),
		end: (chunk) => {
			if (chunk) res.end(chunk)
			else res.end()
		},
		waitForDrain: () =>
			new Promise<void>((resolve) => {
				const done = () => {
					res.off('drain', done)
					res.off('close', done)
					resolve()
				}
				res.once('drain', done)
				res.once('close', done)
			}),
		isClosed: () => closed,
		destroy: (error) => {
			res.destroy(error)
		},
	}
}

const toError = (error: unknown): Error => (error instanceof Error ? error : new Error(String(error)))

/**
 * Write the status line, headers, one set-cookie per cookie and the body.
 * HEAD and bodyless statuses send headers only, and a deferred body is
 * then never started. Streaming stops when the client goes away.
 */
export const writeResponse = async (ctx: HttpContext, sink: ResponseSink): Promise<void> => {
	const { request, response } = ctx
	const { status, body } = response
	const headers: Record<string, string | string[]> = { ...response.headers }

	const cookies = Object.values(response.cookies).map(serializeCookie)
	if (cookies.length > 0) headers['set-cookie'] = cookies

	const sendBody = request.method !== 'HEAD' && !isBodyless(status)

	if (!isStreamingBody(body)) {
		const length = bodyLength(body) ?? 0
		if (!isBodyless(status) && headers['content-length'] === undefined) {
			headers['content-length'] = length.toString()
		}
		sink.writeHead(code(status), reason(status), headers)
		if (sendBody && body !== null && length > 0) {
			sink.end(typeof body === 'string' ? Buffer.from(body) : body)
		} else {
			sink.end()
		}
		return
	}

	sink.writeHead(code(status), reason(status), headers)
	if (!sendBody) {
		sink.end()
		return
	}

	try {
		for await (const chunk of body) {
			if (sink.isClosed()) return
			if (!sink.write(chunk)) await sink.waitForDrain()
		}
	} catch (error) {
		sink.destroy(toError(error))
		throw error
	}
	if (!sink.isClosed()) sink.end()
}

// ============================================================================
// Server
// ============================================================================

export type TlsOptions = {
	/** TLS certificate (PEM format) */
	readonly cert: string | Buffer
	/** TLS private key (PEM format) */
	readonly key: string | Buffer
	/** CA certificate chain (optional) */
	readonly ca?: string | Buffer | Array<string | Buffer>
	/** Passphrase for encrypted key (optional) */
	readonly passphrase?: string
}

export type ServeOptions = {
	readonly handler: WebPart
	readonly port?: number
	readonly hostname?: string
	/** TLS configuration for HTTPS */
	readonly tls?: TlsOptions
	readonly runtime?: HttpRuntime
	/** Request body cap in bytes (default: 1MB); larger bodies get 413 */
	readonly maxBodySize?: number
	readonly onListen?: (info: { port: number; hostname: string; tls: boolean }) => void
}

export type Server = {
	readonly port: number
	readonly hostname: string
	readonly tls: boolean
	/** Close the listener and every open connection */
	readonly stop: () => Promise<void>
}

/**
 * Raw reply for a request Node could not parse: 505 for an unsupported
 * HTTP version, 400 otherwise
 */
export const clientErrorResponse = (error: Error): string => {
	const badVersion = 'code' in error && error.code === 'HPE_INVALID_VERSION'
	const status = statusFor(badVersion ? 505 : 400)
	return `HTTP/1.1 ${code(status)} ${reason(status)}\r\nconnection: close\r\ncontent-length: 0\r\n\r\n`
}

const answerClientError = (error: Error, socket: Duplex): void => {
	if (socket.writable) socket.end(clientErrorResponse(error))
	else socket.destroy()
}

/**
 * Request listener for node:http: read the body, run the handler, write
 * the response. A body over `maxBodySize` is answered with 413 instead.
 */
export const createRequestListener =
	(handler: WebPart, runtime: HttpRuntime, isSecure: boolean, maxBodySize = DEFAULT_MAX_BODY_SIZE) =>
	(req: IncomingMessage, res: ServerResponse): void => {
		const handle = async (): Promise<void> => {
			const body = exceedsBodyLimit(req.headers, maxBodySize)
				? undefined
				: await readRequestBody(req, maxBodySize)
			const request = toHttpRequest(req, body ?? Buffer.alloc(0), isSecure)
			const part = body === undefined ? bodyTooLarge : handler
			const ctx = await runWebPart(part, createContext(request, runtime))
			await writeResponse(ctx, nodeSink(res))
		}

		handle().catch((error: unknown) => {
			console.error('Response write error:', error)
			res.destroy()
		})
	}

const createNodeServer = (
	listener: (req: IncomingMessage, res: ServerResponse) => void,
	tls: TlsOptions | undefined
): NetServer => {
	if (tls) {
		const server = createHttpsServer(
			{ cert: tls.cert, key: tls.key, ca: tls.ca, passphrase: tls.passphrase },
			listener
		)
		server.on('clientError', answerClientError)
		return server
	}

	const server = createHttpServer(listener)
	server.on('clientError', answerClientError)
	return server
}

/**
 * Start an HTTP (or HTTPS, with `tls`) server for `handler`
 *
 * @example
 * ```typescript
 * const server = await serve({
 *   port: 3000,
 *   handler: choose([
 *     compose(GET, url('/'), ok('Hello')),
 *     browseHome,
 *   ]),
 * })
 * ```
 */
export const serve = (options: ServeOptions): Promise<Server> => {
	const {
		handler,
		port = 8080,
		hostname = '127.0.0.1',
		tls,
		runtime = defaultRuntime,
		maxBodySize = DEFAULT_MAX_BODY_SIZE,
		onListen,
	} = options
	const useTls = tls !== undefined
	const server = createNodeServer(
		createRequestListener(handler, runtime, useTls, maxBodySize),
		tls
	)

	// Track connections so stop() does not wait on keep-alive sockets
	const activeConnections = new Set<Socket>()
	server.on('connection', (socket: Socket) => {
		activeConnections.add(socket)
		socket.on('close', () => activeConnections.delete(socket))
	})

	return new Promise((resolve, reject) => {
		server.once('error', reject)

		server.listen(port, hostname, () => {
			server.off('error', reject)
			const address = server.address()
			const boundPort = typeof address === 'object' && address !== null ? address.port : port
			const info = { port: boundPort, hostname, tls: useTls }

			if (onListen) {
				onListen(info)
			} else {
				const line = `Listening on ${useTls ? 'https' : 'http'}://${hostname}:${boundPort}`
				Promise.resolve(runtime.logger(line)).catch((error: unknown) => {
					console.error('Logger error:', error)
				})
			}

			resolve({
				...info,
				stop: () =>
					new Promise<void>((res, rej) => {
						for (const socket of activeConnections) {
							socket.destroy()
						}
						activeConnections.clear()
						server.close((error) => (error ? rej(error) : res()))
					}),
			})
		})
	})
}
