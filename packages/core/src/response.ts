/**
 * Response bodies
 */

/**
 * - string | Buffer: written in one piece
 * - AsyncIterable<Uint8Array>: the deferred write, iterated by the transport only
 * - null: nothing to write
 */
export type ResponseBody = string | Buffer | AsyncIterable<Uint8Array> | null

export const isStreamingBody = (body: ResponseBody): body is AsyncIterable<Uint8Array> =>
	body !== null &&
	typeof body === 'object' &&
	!Buffer.isBuffer(body) &&
	Symbol.asyncIterator in body

/**
 * Byte length of a buffered body, undefined for streams
 */
export const bodyLength = (body: ResponseBody): number | undefined => {
	if (body === null) return 0
	if (typeof body === 'string') return Buffer.byteLength(body)
	if (Buffer.isBuffer(body)) return body.length
	return undefined
}
