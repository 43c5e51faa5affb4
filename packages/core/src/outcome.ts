/**
 * Match outcome
 * Explicit two-variant result used for routing: a handler either
 * does not apply (try the next candidate) or matched with a value.
 */

export type NoMatch = {
	readonly matched: false
}

export type Matched<T> = {
	readonly matched: true
	readonly value: T
}

export type Outcome<T> = NoMatch | Matched<T>

export type MaybePromise<T> = T | Promise<T>

/**
 * The single no-match value
 */
export const noMatch: NoMatch = Object.freeze({ matched: false })

export const matched = <T>(value: T): Matched<T> => ({ matched: true, value })
