/**
 * Authentication Tests
 */

import { describe, expect, it } from 'vitest'
import { authenticateBasic, basicCredentials, createBasicAuth, parseAuthToken } from '../src/auth'
import type { HttpContext, WebPart } from '../src/context'
import { createContext, createRequest } from '../src/context'
import { ok, unauthorized } from '../src/responses'
import { context } from '../src/filters'

const createMockContext = (authorization?: string): HttpContext =>
	createContext(createRequest({ url: '/protected', headers: { authorization } }))

const run = async (part: WebPart, ctx: HttpContext): Promise<HttpContext> => {
	const outcome = await part(ctx)
	if (!outcome.matched) throw new Error('expected handler to match')
	return outcome.value
}

const base64 = (text: string): string => Buffer.from(text).toString('base64')

describe('Auth', () => {
	describe('parseAuthToken', () => {
		it('should parse a valid Basic header', () => {
			expect(parseAuthToken(createBasicAuth('admin', 'test-secret'))).toEqual({
				matched: true,
				value: { scheme: 'basic', user: 'admin', password: 'test-secret' },
			})
		})

		it('should keep colons in the password', () => {
			const result = parseAuthToken(createBasicAuth('user', 'pass:word:123'))

			expect(result.matched && result.value.password).toBe('pass:word:123')
		})

		it('should lower-case the scheme', () => {
			const result = parseAuthToken(`Digest ${base64('user:pass')}`)

			expect(result.matched && result.value.scheme).toBe('digest')
		})

		it('should reject malformed tokens', () => {
			expect(parseAuthToken('Basic !!!').matched).toBe(false)
			expect(parseAuthToken('Basic').matched).toBe(false)
			expect(parseAuthToken('').matched).toBe(false)
			expect(parseAuthToken(`Basic ${base64('nocolon')}`).matched).toBe(false)
		})
	})

	describe('authenticateBasic', () => {
		const protectedPart = context((ctx) => ok(`Welcome ${String(ctx.userState.userName)}`))
		const part = authenticateBasic(basicCredentials('admin', 'test-secret'), protectedPart)

		it('should challenge a request without credentials', async () => {
			const res = await run(part, createMockContext())

			expect(res.response.status.code).toBe(401)
			expect(res.response.headers['www-authenticate']).toBe('Basic realm="protected"')
			expect(String(res.response.body)).toBe('401 Unauthorized.')
		})

		it('should run the protected part for valid credentials', async () => {
			const res = await run(part, createMockContext(createBasicAuth('admin', 'test-secret')))

			expect(res.response.status.code).toBe(200)
			expect(String(res.response.body)).toBe('Welcome admin')
			expect(res.userState.userName).toBe('admin')
		})

		it('should challenge wrong credentials', async () => {
			const wrongPassword = await run(part, createMockContext(createBasicAuth('admin', 'wrong')))
			const wrongUser = await run(part, createMockContext(createBasicAuth('root', 'test-secret')))

			expect(wrongPassword.response.status.code).toBe(401)
			expect(wrongUser.response.status.code).toBe(401)
			expect(wrongUser.userState.userName).toBeUndefined()
		})

		it('should challenge other schemes and malformed headers', async () => {
			const bearer = await run(part, createMockContext(`Bearer ${base64('admin:test-secret')}`))
			const garbage = await run(part, createMockContext('Basic %%%'))

			expect(bearer.response.status.code).toBe(401)
			expect(garbage.response.status.code).toBe(401)
		})

		it('should always challenge when the validator refuses everyone', async () => {
			const closed = authenticateBasic(() => false, ok('never'))
			const res = await run(closed, createMockContext(createBasicAuth('admin', 'test-secret')))

			expect(res.response.status.code).toBe(401)
			expect(res.response.headers['www-authenticate']).toBe('Basic realm="protected"')
		})

		it('should await an async validator with the context', async () => {
			const paths: string[] = []
			const asyncPart = authenticateBasic(async (user, _password, ctx) => {
				paths.push(ctx.request.path)
				return user === 'carol'
			}, ok('in'))

			const res = await run(asyncPart, createMockContext(createBasicAuth('carol', 'x')))

			expect(res.response.status.code).toBe(200)
			expect(paths).toEqual(['/protected'])
		})

		it('should use a custom realm', async () => {
			const realmPart = authenticateBasic(() => false, ok('never'), { realm: 'admin area' })
			const res = await run(realmPart, createMockContext())

			expect(res.response.headers['www-authenticate']).toBe('Basic realm="admin area"')
		})

		it('should use a custom unauthorized response', async () => {
			const customPart = authenticateBasic(() => false, ok('never'), {
				onUnauthorized: unauthorized('Login required'),
			})
			const res = await run(customPart, createMockContext())

			expect(res.response.status.code).toBe(401)
			expect(String(res.response.body)).toBe('Login required')
			expect(res.response.headers['www-authenticate']).toBeUndefined()
		})
	})
})
