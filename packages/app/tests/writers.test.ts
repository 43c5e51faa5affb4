/**
 * Writer Tests
 */

import { compose } from '@trellis/core'
import { describe, expect, it } from 'vitest'
import type { HttpContext, WebPart } from '../src/context'
import { createContext, createRequest } from '../src/context'
import {
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
} from '../src/writers'

const createMockContext = (): HttpContext => createContext(createRequest({ url: '/test' }))

const run = async (part: WebPart, ctx: HttpContext = createMockContext()): Promise<HttpContext> => {
	const outcome = await part(ctx)
	if (!outcome.matched) throw new Error('expected handler to match')
	return outcome.value
}

describe('Writers', () => {
	describe('respondWith', () => {
		it('should set status and body from the producer', async () => {
			const res = await run(respondWith(200, () => 'hello'))

			expect(res.response.status.code).toBe(200)
			expect(res.response.status.reason).toBe('OK')
			expect(res.response.body).toBe('hello')
		})

		it('should await an async producer with the context', async () => {
			const res = await run(respondWith(201, async (ctx) => `created ${ctx.request.path}`))

			expect(res.response.status.code).toBe(201)
			expect(res.response.body).toBe('created /test')
		})

		it('should leave the body stream unconsumed', async () => {
			let started = false
			async function* chunks() {
				started = true
				yield Buffer.from('data')
			}

			const res = await run(respondWith(200, () => chunks()))

			expect(started).toBe(false)
			expect(res.response.body).not.toBeNull()
		})

		it('should suppress the body for 204 without calling the producer', async () => {
			let called = false
			const part = compose(
				setHeader('content-length', '4'),
				respondWith(204, () => {
					called = true
					return 'body'
				})
			)
			const res = await run(part)

			expect(res.response.status.code).toBe(204)
			expect(res.response.body).toBeNull()
			expect(res.response.headers['content-length']).toBeUndefined()
			expect(called).toBe(false)
		})

		it('should suppress the body for 304 and 1xx', async () => {
			expect((await run(respondWithBytes(304, Buffer.from('x')))).response.body).toBeNull()
			expect((await run(respondWithBytes(100, Buffer.from('x')))).response.body).toBeNull()
		})

		it('should not mutate the input context', async () => {
			const ctx = createMockContext()
			await run(respondWith(200, () => 'x'), ctx)

			expect(ctx.response.status.code).toBe(404)
			expect(ctx.response.body).toBeNull()
		})
	})

	describe('respondWithBytes', () => {
		it('should set content-length from the bytes', async () => {
			const res = await run(respondWithBytes(200, Buffer.from('héllo')))

			expect(res.response.headers['content-length']).toBe('6')
			expect(res.response.body).toEqual(Buffer.from('héllo'))
		})

		it('should accept a plain Uint8Array', async () => {
			const res = await run(respondWithBytes(200, new Uint8Array([104, 105])))

			expect(res.response.headers['content-length']).toBe('2')
			expect(res.response.body).toEqual(Buffer.from('hi'))
		})
	})

	describe('headers', () => {
		it('should keep the last write for the same name', async () => {
			const res = await run(
				compose(setHeader('X-Trace', 'first'), setHeader('x-trace', 'second'))
			)

			expect(res.response.headers).toEqual({ 'x-trace': 'second' })
		})

		it('should only set absent headers with setHeaderIfAbsent', async () => {
			const res = await run(
				compose(
					setHeader('content-type', 'application/json'),
					setHeaderIfAbsent('Content-Type', 'text/plain'),
					setHeaderIfAbsent('x-extra', 'yes')
				)
			)

			expect(res.response.headers).toEqual({
				'content-type': 'application/json',
				'x-extra': 'yes',
			})
		})

		it('should remove a header', async () => {
			const res = await run(compose(setHeader('x-a', '1'), setHeader('x-b', '2'), removeHeader('X-A')))

			expect(res.response.headers).toEqual({ 'x-b': '2' })
		})

		it('should set the content type with setMimeType', async () => {
			const res = await run(setMimeType('application/json'))

			expect(res.response.headers['content-type']).toBe('application/json')
		})
	})

	describe('status', () => {
		it('should set the status without touching the body', async () => {
			const res = await run(setStatus(202))

			expect(res.response.status.code).toBe(202)
			expect(res.response.body).toBeNull()
		})
	})

	describe('cookies', () => {
		it('should keep the last cookie with a given name', async () => {
			const res = await run(
				compose(
					setCookie({ name: 'session', value: 'one' }),
					setCookie({ name: 'theme', value: 'dark' }),
					setCookie({ name: 'session', value: 'two', httpOnly: true })
				)
			)

			expect(res.response.cookies).toEqual({
				session: { name: 'session', value: 'two', httpOnly: true },
				theme: { name: 'theme', value: 'dark' },
			})
		})

		it('should expire a cookie with unsetCookie', async () => {
			const res = await run(unsetCookie('session', { path: '/' }))
			const cookie = res.response.cookies.session

			expect(cookie?.value).toBe('')
			expect(cookie?.maxAge).toBe(0)
			expect(cookie?.expires?.getTime()).toBe(0)
			expect(cookie?.path).toBe('/')
		})
	})

	describe('user state', () => {
		it('should set and unset user data', async () => {
			const res = await run(
				compose(setUserData('userName', 'alice'), setUserData('role', 'admin'), unsetUserData('role'))
			)

			expect(res.userState).toEqual({ userName: 'alice' })
		})
	})
})
