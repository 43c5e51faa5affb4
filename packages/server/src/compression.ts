/**
 * Response compression
 * Negotiates br, gzip or deflate and encodes file streams on the fly
 */

import type { Readable, Transform } from 'node:stream'
import { pipeline } from 'node:stream'
import { constants, createBrotliCompress, createDeflate, createGzip } from 'node:zlib'

export type ContentEncoding = 'br' | 'gzip' | 'deflate'

export const SUPPORTED_ENCODINGS: readonly ContentEncoding[] = ['br', 'gzip', 'deflate']

const isSupported = (name: string, supported: readonly ContentEncoding[]): name is ContentEncoding =>
	supported.some((encoding) => encoding === name)

/**
 * Parse Accept-Encoding header and find best encoding
 *
 * @example
 * ```typescript
 * selectEncoding('gzip;q=0.5, br') // 'br'
 * selectEncoding('identity')       // null
 * ```
 */
export const selectEncoding = (
	acceptEncoding: string,
	supported: readonly ContentEncoding[] = SUPPORTED_ENCODINGS
): ContentEncoding | null => {
	if (!acceptEncoding) return null

	// Parse encodings with quality values
	const encodings = acceptEncoding
		.split(',')
		.map((e) => {
			const parts = e.trim().split(/;\s*q=/)
			const name = parts[0]?.trim().toLowerCase() ?? ''
			const qValue = parts[1]
			return {
				name,
				q: qValue ? Number.parseFloat(qValue) : 1,
			}
		})
		.filter((e) => e.q > 0 && e.name)
		.sort((a, b) => b.q - a.q)

	for (const { name } of encodings) {
		if (isSupported(name, supported)) return name
		if (name === '*') return supported[0] ?? null
	}

	return null
}

const createEncoder = (encoding: ContentEncoding, level: number): Transform => {
	switch (encoding) {
		case 'br':
			return createBrotliCompress({
				params: {
					[constants.BROTLI_PARAM_QUALITY]: Math.min(level, 11),
				},
			})
		case 'gzip':
			return createGzip({ level })
		case 'deflate':
			return createDeflate({ level })
	}
}

/**
 * Pipe `source` through an encoder. A failure on either side destroys the
 * returned stream with that error.
 */
export const compressStream = (source: Readable, encoding: ContentEncoding, level = 6): Transform => {
	const encoder = createEncoder(encoding, level)
	pipeline(source, encoder, (error) => {
		if (error) encoder.destroy(error)
	})
	return encoder
}
