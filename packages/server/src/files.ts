/**
 * File serving
 *
 * Resolves request paths under a root directory, streams files with
 * their MIME type and renders directory listings. Nothing is read until
 * the transport iterates the body.
 */

import type { Stats } from 'node:fs'
import { createReadStream } from 'node:fs'
import { readdir, realpath, stat } from 'node:fs/promises'
import { extname, join, resolve, sep } from 'node:path'
import type { Outcome } from '@trellis/core'
import { compose, fail, matched, noMatch, succeed } from '@trellis/core'
import type { HttpContext, WebPart } from '@trellis/app'
import {
	context,
	escapeHtml,
	movedPermanently,
	ok,
	respondWith,
	setHeader,
	setMimeType,
} from '@trellis/app'
import type { ContentEncoding } from './compression'
import { compressStream, selectEncoding } from './compression'

// ============================================================================
// Path resolution
// ============================================================================

const withTrailingSep = (dir: string): string => (dir.endsWith(sep) ? dir : dir + sep)

const isInside = (path: string, root: string): boolean =>
	path === root || path.startsWith(withTrailingSep(root))

/**
 * Resolve `name` against `rootDir`. Leading slashes are ignored, so a
 * request path can be passed as is. Anything that lands outside the root
 * is a no-match.
 *
 * @example
 * ```typescript
 * localFile('/css/site.css', '/srv/www')   // matched('/srv/www/css/site.css')
 * localFile('../../etc/passwd', '/srv/www') // noMatch
 * ```
 */
export const localFile = (name: string, rootDir: string): Outcome<string> => {
	if (name.includes('\0')) return noMatch

	const root = resolve(rootDir)
	const fullPath = resolve(root, name.replace(/^[/\\]+/, ''))
	return isInside(fullPath, root) ? matched(fullPath) : noMatch
}

const MISSING_CODES = new Set(['ENOENT', 'ENOTDIR', 'ENAMETOOLONG', 'ELOOP'])

const isMissing = (error: unknown): boolean =>
	error instanceof Error &&
	'code' in error &&
	typeof error.code === 'string' &&
	MISSING_CODES.has(error.code)

const statOrUndefined = async (path: string): Promise<Stats | undefined> => {
	try {
		return await stat(path)
	} catch (error) {
		if (isMissing(error)) return undefined
		throw error
	}
}

const realpathOrUndefined = async (path: string): Promise<string | undefined> => {
	try {
		return await realpath(path)
	} catch (error) {
		if (isMissing(error)) return undefined
		throw error
	}
}

type Resolved = {
	readonly path: string
	readonly stats: Stats
}

/**
 * Lexical check, then the same check on the real path so a symlink
 * cannot lead out of the root
 */
const resolveUnderRoot = async (name: string, rootDir: string): Promise<Resolved | undefined> => {
	const local = localFile(name, rootDir)
	if (!local.matched) return undefined

	const stats = await statOrUndefined(local.value)
	if (!stats) return undefined

	const [realRoot, realTarget] = await Promise.all([
		realpathOrUndefined(resolve(rootDir)),
		realpathOrUndefined(local.value),
	])
	if (realRoot === undefined || realTarget === undefined || !isInside(realTarget, realRoot)) {
		return undefined
	}

	return { path: local.value, stats }
}

const findIndexFile = async (
	dir: string,
	rootDir: string,
	indexFiles: readonly string[]
): Promise<string | undefined> => {
	for (const indexFile of indexFiles) {
		const candidate = await resolveUnderRoot(join(dir, indexFile), rootDir)
		if (candidate?.stats.isFile()) return candidate.path
	}
	return undefined
}

// ============================================================================
// Sending files
// ============================================================================

async function* readFileBody(
	path: string,
	encoding: ContentEncoding | null
): AsyncGenerator<Uint8Array> {
	const source = createReadStream(path)
	const stream = encoding ? compressStream(source, encoding) : source
	try {
		for await (const chunk of stream) {
			yield typeof chunk === 'string' ? Buffer.from(chunk) : chunk
		}
	} finally {
		stream.destroy()
		source.destroy()
	}
}

const pass: WebPart = succeed

/**
 * Stream the file at `path` with a 200. No-match when it is not a regular file.
 * Compression is used only when allowed here, by the MIME entry and by
 * the client's Accept-Encoding.
 */
export const sendFile =
	(path: string, allowCompression: boolean): WebPart =>
	async (ctx) => {
		const stats = await statOrUndefined(path)
		if (!stats?.isFile()) return fail

		const { runtime, request } = ctx
		const mimeType = runtime.mimeTypes(extname(path))
		const contentType = mimeType?.name ?? runtime.defaultMimeType
		const encoding =
			allowCompression && mimeType?.compression
				? selectEncoding(request.headers['accept-encoding'] ?? '')
				: null

		return compose(
			contentType === undefined ? pass : setMimeType(contentType),
			setHeader('last-modified', stats.mtime.toUTCString()),
			encoding
				? compose(setHeader('content-encoding', encoding), setHeader('vary', 'accept-encoding'))
				: setHeader('content-length', stats.size.toString()),
			respondWith(200, () => readFileBody(path, encoding))
		)(ctx)
	}

/**
 * sendFile with compression taken from the runtime configuration
 */
export const file = (path: string): WebPart =>
	context((ctx) => sendFile(path, ctx.runtime.compression))

/**
 * Serve `name` from under `rootDir`. Directories are a no-match.
 */
export const browseFile =
	(rootDir: string, name: string): WebPart =>
	async (ctx) => {
		const resolved = await resolveUnderRoot(name, rootDir)
		if (!resolved?.stats.isFile()) return fail
		return file(resolved.path)(ctx)
	}

export const browseFileHome = (name: string): WebPart =>
	context((ctx) => browseFile(ctx.runtime.homeDirectory, name))

/**
 * Serve the file named by the request path from under `rootDir`.
 * A directory serves its first existing index file; requested without a
 * trailing slash it is first redirected to the slashed path, so relative
 * links in the index resolve inside the directory.
 */
export const browse =
	(rootDir: string): WebPart =>
	async (ctx) => {
		const resolved = await resolveUnderRoot(ctx.request.path, rootDir)
		if (!resolved) return fail

		if (resolved.stats.isFile()) return file(resolved.path)(ctx)
		if (!resolved.stats.isDirectory()) return fail

		const indexPath = await findIndexFile(resolved.path, rootDir, ctx.runtime.indexFiles)
		if (indexPath === undefined) return fail

		const { rawPath, rawQuery } = ctx.request
		if (!rawPath.endsWith('/')) {
			const query = rawQuery === '' ? '' : `?${rawQuery}`
			return movedPermanently(`${rawPath}/${query}`)(ctx)
		}
		return file(indexPath)(ctx)
	}

export const browseHome: WebPart = context((ctx) => browse(ctx.runtime.homeDirectory))

// ============================================================================
// Directory listing
// ============================================================================

export type ListingEntry = {
	readonly name: string
	readonly isDirectory: boolean
}

const sortEntries = (entries: readonly ListingEntry[]): ListingEntry[] =>
	[...entries].sort((a, b) => {
		if (a.isDirectory !== b.isDirectory) return a.isDirectory ? -1 : 1
		return a.name < b.name ? -1 : a.name > b.name ? 1 : 0
	})

/**
 * HTML page listing `entries`, directories first
 */
export const renderListing = (requestPath: string, entries: readonly ListingEntry[]): string => {
	const base = requestPath.endsWith('/') ? requestPath : `${requestPath}/`
	const title = escapeHtml(`Index of ${base}`)
	const items = sortEntries(entries).map(({ name, isDirectory }) => {
		const suffix = isDirectory ? '/' : ''
		const href = escapeHtml(`${base}${encodeURIComponent(name)}${suffix}`)
		return `<li><a href="${href}">${escapeHtml(name)}${suffix}</a></li>`
	})

	return [
		'<!DOCTYPE html>',
		`<html><head><title>${title}</title></head><body>`,
		`<h1>${title}</h1>`,
		'<ul>',
		...items,
		'</ul>',
		'</body></html>',
	].join('\n')
}

/**
 * Listing for the directory named by the request path. No-match when the
 * path is not a directory or the directory has an index file.
 */
export const dir =
	(rootDir: string): WebPart =>
	async (ctx: HttpContext) => {
		const resolved = await resolveUnderRoot(ctx.request.path, rootDir)
		if (!resolved?.stats.isDirectory()) return fail

		const indexPath = await findIndexFile(resolved.path, rootDir, ctx.runtime.indexFiles)
		if (indexPath !== undefined) return fail

		const dirents = await readdir(resolved.path, { withFileTypes: true })
		const entries = dirents.map((dirent) => ({
			name: dirent.name,
			isDirectory: dirent.isDirectory(),
		}))

		return compose(
			setMimeType('text/html; charset=utf-8'),
			ok(renderListing(ctx.request.path, entries))
		)(ctx)
	}

export const dirHome: WebPart = context((ctx) => dir(ctx.runtime.homeDirectory))
