/**
 * Context Tests
 */

import { resolve } from 'node:path'
import { defaultMimeTypesMap } from '@trellis/core'
import { describe, expect, it } from 'vitest'
import { createRuntime, defaultRuntime } from '../src/config'
import { createContext, createRequest, getHeader } from '../src/context'
import { defaultErrorHandler } from '../src/errors'
import { request } from '../src/filters'
import { ok } from '../src/responses'

describe('Context', () => {
	describe('createRequest', () => {
		it('should split and decode the url', () => {
			const req = createRequest({
				method: 'post',
				url: '/a%20b?x=1&y=2',
				headers: {
					'Content-Type': 'application/x-www-form-urlencoded',
					Host: 'example.com:8080',
				},
				body: 'name=Jane+Doe&age=30',
			})

			expect(req.method).toBe('POST')
			expect(req.path).toBe('/a b')
			expect(req.rawPath).toBe('/a%20b')
			expect(req.rawQuery).toBe('x=1&y=2')
			expect(req.query).toEqual({ x: '1', y: '2' })
			expect(req.form).toEqual({ name: 'Jane Doe', age: '30' })
			expect(req.host).toBe('example.com')
			expect(req.headers['content-type']).toBe('application/x-www-form-urlencoded')
		})

		it('should fill defaults', () => {
			const req = createRequest()

			expect(req.method).toBe('GET')
			expect(req.path).toBe('/')
			expect(req.query).toEqual({})
			expect(req.form).toEqual({})
			expect(req.body.length).toBe(0)
			expect(req.host).toBe('localhost')
			expect(req.httpVersion).toBe('HTTP/1.1')
			expect(req.isSecure).toBe(false)
			expect(req.remoteAddress).toBe('127.0.0.1')
		})

		it('should keep the raw path when it cannot be decoded', () => {
			expect(createRequest({ url: '/bad%zz' }).path).toBe('/bad%zz')
		})

		it('should only parse form bodies with the form content type', () => {
			const req = createRequest({
				method: 'POST',
				headers: { 'content-type': 'application/json' },
				body: 'a=1',
			})

			expect(req.form).toEqual({})
		})

		it('should keep an IPv6 host in brackets', () => {
			expect(createRequest({ headers: { host: '[::1]:8080' } }).host).toBe('[::1]')
		})

		it('should drop headers without a value', () => {
			const req = createRequest({ headers: { 'X-Empty': undefined, 'X-Set': 'yes' } })

			expect(req.headers).toEqual({ 'x-set': 'yes' })
			expect(getHeader(req, 'X-SET')).toBe('yes')
		})
	})

	describe('createContext', () => {
		it('should start with an empty 404 response', () => {
			const ctx = createContext(createRequest())

			expect(ctx.response.status.code).toBe(404)
			expect(ctx.response.headers).toEqual({})
			expect(ctx.response.cookies).toEqual({})
			expect(ctx.response.body).toBeNull()
			expect(ctx.userState).toEqual({})
			expect(ctx.runtime).toBe(defaultRuntime)
		})

		it('should give the request to request()', async () => {
			const part = request((req) => ok(req.query.name ?? 'anonymous'))
			const outcome = await part(createContext(createRequest({ url: '/?name=dana' })))

			expect(outcome.matched && String(outcome.value.response.body)).toBe('dana')
		})
	})

	describe('createRuntime', () => {
		it('should apply defaults', () => {
			const runtime = createRuntime()

			expect(runtime.homeDirectory).toBe(resolve(process.cwd()))
			expect(runtime.compression).toBe(true)
			expect(runtime.mimeTypes).toBe(defaultMimeTypesMap)
			expect(runtime.defaultMimeType).toBeUndefined()
			expect(runtime.indexFiles).toEqual(['index.html'])
			expect(runtime.errorHandler).toBe(defaultErrorHandler)
		})

		it('should resolve the home directory and accept a single index file', () => {
			const runtime = createRuntime({ homeDirectory: 'public', indexFiles: 'default.htm' })

			expect(runtime.homeDirectory).toBe(resolve('public'))
			expect(runtime.indexFiles).toEqual(['default.htm'])
		})

		it('should be frozen', () => {
			const runtime = createRuntime({ compression: false })

			expect(Object.isFrozen(runtime)).toBe(true)
			expect(Object.isFrozen(runtime.indexFiles)).toBe(true)
		})
	})
})
