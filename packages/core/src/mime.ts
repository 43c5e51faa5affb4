/**
 * MIME types
 * Extension -> descriptor lookup. Read-only after load; extended by configuration only.
 */

import mimeTable from './mime-types.json'

export type MimeType = {
	/** Content-Type value */
	readonly name: string
	/** Whether the content may be compressed in transit */
	readonly compression: boolean
}

/**
 * Extension (with leading dot) -> descriptor, undefined when unknown
 */
export type MimeTypesMap = (extension: string) => MimeType | undefined

export const mkMimeType = (name: string, compression: boolean): MimeType =>
	Object.freeze({ name, compression })

const buildTable = (entries: Record<string, MimeType>): ReadonlyMap<string, MimeType> =>
	new Map(
		Object.entries(entries).map(
			([extension, entry]) =>
				[extension.toLowerCase(), mkMimeType(entry.name, entry.compression)] as const
		)
	)

const defaultTable = buildTable(mimeTable)

export const defaultMimeTypesMap: MimeTypesMap = (extension) =>
	defaultTable.get(extension.toLowerCase())

/**
 * Defaults plus extra entries. Extra entries win.
 *
 * @example
 * ```typescript
 * const mimeTypes = createMimeTypesMap({ '.avi': mkMimeType('video/x-msvideo', false) })
 * ```
 */
export const createMimeTypesMap = (extra: Record<string, MimeType>): MimeTypesMap => {
	const table = buildTable(extra)
	return (extension) => table.get(extension.toLowerCase()) ?? defaultMimeTypesMap(extension)
}
