/**
 * Handler combinators
 * Pure functional approach - routing is composition of outcome-returning functions
 */

import type { MaybePromise, NoMatch, Outcome } from './outcome'
import { matched, noMatch } from './outcome'

/**
 * Generic handler type
 * Takes an input and either rejects it or produces a (possibly updated) value
 */
export type Handler<A, B = A> = (input: A) => MaybePromise<Outcome<B>>

// ============================================================================
// Primitives
// ============================================================================

export const succeed = <T>(value: T): Outcome<T> => matched(value)

export const fail: NoMatch = noMatch

/**
 * Rejects every input. Keeps a branch in place while disabling it.
 */
export const never = (_input: unknown): NoMatch => fail

export const bind = async <A, B>(
	f: Handler<A, B>,
	outcome: MaybePromise<Outcome<A>>
): Promise<Outcome<B>> => {
	const resolved = await outcome
	return resolved.matched ? f(resolved.value) : noMatch
}

/**
 * Build the handler only when it is applied
 */
export const delay =
	<A, B>(f: () => Handler<A, B>): Handler<A, B> =>
	(input) =>
		f()(input)

// ============================================================================
// Composition
// ============================================================================

/**
 * Sequential composition, left to right.
 * compose(a, b, c)(x) runs a, feeds its value to b, then c.
 * The first no-match stops the chain.
 *
 * Example:
 *   compose(GET, url('/hello'), ok('Hello'))
 */
export function compose<A, B, C>(first: Handler<A, B>, second: Handler<B, C>): Handler<A, C>
export function compose<A, B, C, D>(
	first: Handler<A, B>,
	second: Handler<B, C>,
	third: Handler<C, D>
): Handler<A, D>
export function compose<A, B, C, D, E>(
	first: Handler<A, B>,
	second: Handler<B, C>,
	third: Handler<C, D>,
	fourth: Handler<D, E>
): Handler<A, E>
export function compose<A>(...handlers: Handler<A, A>[]): Handler<A, A>
export function compose(...handlers: Handler<unknown, unknown>[]): Handler<unknown, unknown> {
	return async (input) => {
		let current: Outcome<unknown> = matched(input)
		for (const handler of handlers) {
			if (!current.matched) return noMatch
			current = await handler(current.value)
		}
		return current
	}
}

/**
 * Try first; on no-match try second with the same input
 */
export const orElse =
	<A, B>(first: Handler<A, B>, second: Handler<A, B>): Handler<A, B> =>
	async (input) => {
		const outcome = await first(input)
		return outcome.matched ? outcome : second(input)
	}

/**
 * Try candidates in order. First match wins, later candidates are never evaluated.
 */
export const choose =
	<A, B>(candidates: readonly Handler<A, B>[]): Handler<A, B> =>
	async (input) => {
		for (const candidate of candidates) {
			const outcome = await candidate(input)
			if (outcome.matched) return outcome
		}
		return noMatch
	}

// ============================================================================
// Helpers
// ============================================================================

/**
 * applyToSelf(f)(x) = f(x)(x)
 * Lets a handler be built from the same input it is then applied to.
 */
export const applyToSelf =
	<A, B>(f: (input: A) => (input: A) => B) =>
	(input: A): B =>
		f(input)(input)

export const warbler = applyToSelf

export const cnst =
	<T>(value: T) =>
	(_ignored?: unknown): T =>
		value

/**
 * Branch on an optional value
 */
export const cond = <T, R>(optItem: T | undefined, f: (value: T) => R, g: R): R =>
	optItem === undefined ? g : f(optItem)
