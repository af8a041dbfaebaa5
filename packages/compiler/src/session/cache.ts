/**
 * Incremental session cache.
 *
 * A session owns one ohm matcher. Each compile replaces only the middle of
 * the matcher's input that differs from the previous layout text; ohm drops
 * memo entries overlapping the replaced range and keeps the rest.
 */

import { createHash } from 'node:crypto'
import type { Matcher, MatchResult } from 'ohm-js'
import { createMatcher, type StartRule } from '../grammar/index.ts'

export interface SessionStats {
	/** Compiles parsed through this session */
	readonly compiles: number
	/** Layout characters kept in place across those compiles */
	readonly reusedCharacters: number
	/** Times the matcher input was rebuilt after a fingerprint mismatch */
	readonly resets: number
}

function fingerprintOf(text: string): string {
	return createHash('sha1').update(text, 'utf8').digest('hex')
}

/** Lengths of the common prefix and suffix; they never overlap. */
export function commonEnds(previous: string, next: string): { prefix: number; suffix: number } {
	const max = Math.min(previous.length, next.length)
	let prefix = 0
	while (prefix < max && previous.charCodeAt(prefix) === next.charCodeAt(prefix)) prefix++
	let suffix = 0
	while (
		suffix < max - prefix &&
		previous.charCodeAt(previous.length - 1 - suffix) === next.charCodeAt(next.length - 1 - suffix)
	) {
		suffix++
	}
	return { prefix, suffix }
}

export class SessionCache {
	readonly id: string
	private readonly matcher: Matcher
	private expected = ''
	private fingerprint = fingerprintOf('')
	private compiles = 0
	private reusedCharacters = 0
	private resets = 0

	constructor(id: string, matcher: Matcher = createMatcher()) {
		this.id = id
		this.matcher = matcher
	}

	/**
	 * Match layout text, editing the matcher input in place.
	 * Usable as the parser's match function.
	 */
	match(input: string, startRule: StartRule): MatchResult {
		this.compiles++
		if (fingerprintOf(this.matcher.getInput()) !== this.fingerprint) {
			this.resets++
			this.matcher.setInput(input)
		} else {
			const { prefix, suffix } = commonEnds(this.expected, input)
			this.reusedCharacters += prefix + suffix
			this.matcher.replaceInputRange(prefix, this.expected.length - suffix, input.slice(prefix, input.length - suffix))
		}
		this.expected = input
		this.fingerprint = fingerprintOf(input)
		return this.matcher.match(startRule)
	}

	getStats(): SessionStats {
		return { compiles: this.compiles, resets: this.resets, reusedCharacters: this.reusedCharacters }
	}
}

// =============================================================================
// REGISTRY
// =============================================================================

const sessions = new Map<string, SessionCache>()

/** Register a session; an existing one is kept. */
export function openSession(id: string): SessionCache {
	const existing = sessions.get(id)
	if (existing !== undefined) return existing
	const session = new SessionCache(id)
	sessions.set(id, session)
	return session
}

export function closeSession(id: string): boolean {
	return sessions.delete(id)
}

export function getSession(id: string): SessionCache | undefined {
	return sessions.get(id)
}
