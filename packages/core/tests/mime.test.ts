/**
 * MIME Table Tests
 */

import { describe, expect, it } from 'vitest'
import { createMimeTypesMap, defaultMimeTypesMap, mkMimeType } from '../src/mime'
import { bodyLength, isStreamingBody } from '../src/response'

describe('MIME types', () => {
	it('should map html as compressible text/html', () => {
		expect(defaultMimeTypesMap('.html')).toEqual({ name: 'text/html', compression: true })
		expect(defaultMimeTypesMap('.htm')).toEqual({ name: 'text/html', compression: true })
	})

	it('should not compress images', () => {
		expect(defaultMimeTypesMap('.png')).toEqual({ name: 'image/png', compression: false })
		expect(defaultMimeTypesMap('.jpg')?.compression).toBe(false)
	})

	it('should ignore extension case', () => {
		expect(defaultMimeTypesMap('.CSS')?.name).toBe('text/css')
	})

	it('should return undefined for unknown extensions', () => {
		expect(defaultMimeTypesMap('.unknownext')).toBeUndefined()
		expect(defaultMimeTypesMap('')).toBeUndefined()
	})

	it('should extend the defaults without mutating them', () => {
		const mimeTypes = createMimeTypesMap({
			'.avi': mkMimeType('video/x-msvideo', false),
			'.html': mkMimeType('application/xhtml+xml', true),
		})

		expect(mimeTypes('.avi')?.name).toBe('video/x-msvideo')
		expect(mimeTypes('.html')?.name).toBe('application/xhtml+xml')
		expect(mimeTypes('.css')?.name).toBe('text/css')
		expect(defaultMimeTypesMap('.avi')).toBeUndefined()
		expect(defaultMimeTypesMap('.html')?.name).toBe('text/html')
	})

	it('should build frozen descriptors', () => {
		expect(Object.isFrozen(mkMimeType('text/x-test', true))).toBe(true)
	})
})

describe('Response body', () => {
	it('should detect streaming bodies', async () => {
		async function* chunks() {
			yield Buffer.from('a')
		}
		expect(isStreamingBody(chunks())).toBe(true)
		expect(isStreamingBody(Buffer.from('a'))).toBe(false)
		expect(isStreamingBody('a')).toBe(false)
		expect(isStreamingBody(null)).toBe(false)
	})

	it('should measure buffered bodies in bytes', () => {
		expect(bodyLength('héllo')).toBe(6)
		expect(bodyLength(Buffer.alloc(3))).toBe(3)
		expect(bodyLength(null)).toBe(0)
	})
})
