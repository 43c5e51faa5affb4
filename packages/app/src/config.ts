/**
 * Runtime configuration
 * Read-only settings shared by every request
 */

import { resolve } from 'node:path'
import type { MimeTypesMap } from '@trellis/core'
import { defaultMimeTypesMap } from '@trellis/core'
import type { ErrorHandler } from './errors'
import { defaultErrorHandler } from './errors'
import type { Logger } from './log'

export type HttpRuntime = {
	/** Root used by browseHome, dirHome and browseFileHome */
	readonly homeDirectory: string
	/** Whether file responses may be compressed */
	readonly compression: boolean
	readonly mimeTypes: MimeTypesMap
	/** Content-Type for files whose extension is not in mimeTypes */
	readonly defaultMimeType: string | undefined
	readonly indexFiles: readonly string[]
	readonly logger: Logger
	readonly errorHandler: ErrorHandler
}

export type RuntimeOptions = {
	readonly homeDirectory?: string
	readonly compression?: boolean
	readonly mimeTypes?: MimeTypesMap
	readonly defaultMimeType?: string
	readonly indexFiles?: string | string[]
	readonly logger?: Logger
	readonly errorHandler?: ErrorHandler
}

const consoleLogger: Logger = (line) => {
	console.log(line)
}

export const createRuntime = (options: RuntimeOptions = {}): HttpRuntime => {
	const {
		homeDirectory = process.cwd(),
		compression = true,
		mimeTypes = defaultMimeTypesMap,
		defaultMimeType,
		indexFiles = ['index.html'],
		logger = consoleLogger,
		errorHandler = defaultErrorHandler,
	} = options

	return Object.freeze({
		homeDirectory: resolve(homeDirectory),
		compression,
		mimeTypes,
		defaultMimeType,
		indexFiles: Object.freeze(Array.isArray(indexFiles) ? [...indexFiles] : [indexFiles]),
		logger,
		errorHandler,
	})
}

export const defaultRuntime: HttpRuntime = createRuntime()
