/**
 * Typed path scanning
 *
 * A scan format is a path with printf-style placeholders. The capture
 * types are derived from the format string at compile time:
 *
 *   ScanArgs<'/users/%s/posts/%d'> = [string, number]
 */

import type { Outcome } from '@trellis/core'
import { matched, noMatch } from '@trellis/core'

// ============================================================================
// Type-Level Format Parsing
// ============================================================================

type IntegerSpecifier = 'd' | 'i' | 'u' | 'x' | 'X' | 'o'
type FloatSpecifier = 'f' | 'F' | 'e' | 'E' | 'g' | 'G'

/** Value type produced by one specifier character */
type ScanValue<C extends string> = C extends IntegerSpecifier | FloatSpecifier
	? number
	: C extends 'b'
		? boolean
		: string

/** Tuple of capture types for a format string */
export type ScanArgs<Format extends string> = Format extends `${string}%${infer C}${infer Rest}`
	? C extends '%'
		? ScanArgs<Rest>
		: [ScanValue<C>, ...ScanArgs<Rest>]
	: []

export type Capture = string | number | boolean

// ============================================================================
// Runtime Format
// ============================================================================

type Specifier =
	| { readonly kind: 'integer'; readonly radix: 8 | 10 | 16 }
	| { readonly kind: 'float' }
	| { readonly kind: 'boolean' }
	| { readonly kind: 'string' }
	| { readonly kind: 'char' }

export type ScanFormat = {
	readonly format: string
	readonly regex: RegExp
	readonly specifiers: readonly Specifier[]
}

const PATTERNS: Record<string, { readonly pattern: string; readonly specifier: Specifier }> = {
	d: { pattern: '([+-]?\\d+)', specifier: { kind: 'integer', radix: 10 } },
	i: { pattern: '([+-]?\\d+)', specifier: { kind: 'integer', radix: 10 } },
	u: { pattern: '(\\d+)', specifier: { kind: 'integer', radix: 10 } },
	x: { pattern: '([0-9a-fA-F]+)', specifier: { kind: 'integer', radix: 16 } },
	X: { pattern: '([0-9a-fA-F]+)', specifier: { kind: 'integer', radix: 16 } },
	o: { pattern: '([0-7]+)', specifier: { kind: 'integer', radix: 8 } },
	b: { pattern: '(true|false)', specifier: { kind: 'boolean' } },
	s: { pattern: '(.*?)', specifier: { kind: 'string' } },
	c: { pattern: '((?:%[0-9a-fA-F]{2})+|[^%])', specifier: { kind: 'char' } },
}

const FLOAT_PATTERN = '([+-]?(?:\\d+(?:\\.\\d*)?|\\.\\d+)(?:[eE][+-]?\\d+)?)'
for (const c of ['f', 'F', 'e', 'E', 'g', 'G']) {
	PATTERNS[c] = { pattern: FLOAT_PATTERN, specifier: { kind: 'float' } }
}

const escapeRegex = (literal: string): string => literal.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')

const hexPattern = (byte: number): string =>
	byte
		.toString(16)
		.toUpperCase()
		.padStart(2, '0')
		.replace(/[A-F]/g, (digit) => `[${digit}${digit.toLowerCase()}]`)

/** Printable ASCII a client may send unescaped */
const isPlainAscii = (char: string): boolean => /^[!-~]$/.test(char) && char !== '%'

/**
 * Pattern for a literal part of the format, matched against the raw path.
 * Each character may arrive percent-encoded (either hex case) or, for
 * printable ASCII, as is. `/` only matches a real separator; a literal
 * `%` also matches its raw form.
 */
const literalPattern = (literal: string): string => {
	let pattern = ''
	for (const char of literal) {
		const encoded = [...Buffer.from(char, 'utf8')].map((byte) => `%${hexPattern(byte)}`).join('')
		if (char === '/') pattern += '/'
		else if (isPlainAscii(char)) pattern += `(?:${escapeRegex(char)}|${encoded})`
		else if (char === '%') pattern += `(?:${encoded}|%)`
		else pattern += encoded
	}
	return pattern
}

/**
 * Compile a format string. Throws on an unknown specifier: that is a
 * programming error in the route table, not a request failure.
 */
export const compileFormat = (format: string, ignoreCase = false): ScanFormat => {
	let source = ''
	let literal = ''
	const specifiers: Specifier[] = []

	for (let i = 0; i < format.length; i++) {
		const char = format.charAt(i)
		if (char !== '%') {
			literal += char
			continue
		}

		const next = format.charAt(i + 1)
		i++
		if (next === '%') {
			literal += '%'
			continue
		}

		const entry = PATTERNS[next]
		if (!entry) {
			throw new Error(`Unsupported scan specifier '%${next}' in '${format}'`)
		}

		source += literalPattern(literal) + entry.pattern
		literal = ''
		specifiers.push(entry.specifier)
	}
	source += literalPattern(literal)

	return {
		format,
		regex: new RegExp(`^${source}$`, ignoreCase ? 'i' : ''),
		specifiers,
	}
}

const decode = (raw: string): string | undefined => {
	try {
		return decodeURIComponent(raw)
	} catch {
		return undefined
	}
}

const convert = (specifier: Specifier, raw: string): Capture | undefined => {
	switch (specifier.kind) {
		case 'integer': {
			const value = Number.parseInt(raw, specifier.radix)
			return Number.isSafeInteger(value) ? value : undefined
		}
		case 'float': {
			const value = Number(raw)
			return Number.isFinite(value) ? value : undefined
		}
		case 'boolean':
			return raw.toLowerCase() === 'true'
		case 'string':
			return decode(raw)
		case 'char': {
			const value = decode(raw)
			return value !== undefined && [...value].length === 1 ? value : undefined
		}
	}
}

/**
 * Match a raw (still percent-encoded) path against a format. Literal text
 * in the format is written decoded, as in `url`. Captures are decoded and
 * converted; any failure is a no-match.
 */
export const scanPath = (scanFormat: ScanFormat, rawPath: string): Outcome<Capture[]> => {
	const match = scanFormat.regex.exec(rawPath)
	if (!match) return noMatch

	const captures: Capture[] = []
	for (const [index, specifier] of scanFormat.specifiers.entries()) {
		const raw = match[index + 1]
		if (raw === undefined) return noMatch
		const value = convert(specifier, raw)
		if (value === undefined) return noMatch
		captures.push(value)
	}

	return matched(captures)
}

const expectedType = (specifier: Specifier): 'number' | 'boolean' | 'string' => {
	switch (specifier.kind) {
		case 'integer':
		case 'float':
			return 'number'
		case 'boolean':
			return 'boolean'
		default:
			return 'string'
	}
}

/**
 * Narrow scanned captures to the tuple type of their format
 */
export const isScanArgs = <Format extends string>(
	scanFormat: ScanFormat,
	captures: unknown
): captures is ScanArgs<Format> =>
	Array.isArray(captures) &&
	captures.length === scanFormat.specifiers.length &&
	scanFormat.specifiers.every(
		(specifier, index) => typeof captures[index] === expectedType(specifier)
	)
