/**
 * Token storage using dense arrays with integer IDs.
 * Tokens reference the source by offset; their text is sliced on demand.
 */

import type { Span } from './source.ts'

/** Token kinds - small integer discriminant. */
export const TokenKind = {
	// Structural tokens (0-9)
	Newline: 0,
	JoinedNewline: 1,
	Continuation: 2,
	Comment: 3,

	// Delimiters (10-19)
	Open: 10,
	Close: 11,

	// Words and literals (100-199)
	Name: 100,
	Number: 101,
	String: 102,
	Operator: 103,

	// Special (255)
	Eof: 255,
} as const

export type TokenKind = (typeof TokenKind)[keyof typeof TokenKind]

export type TokenId = number & { readonly __brand: 'TokenId' }

export function tokenId(n: number): TokenId {
	return n as TokenId
}

/**
 * A single token. Line and column are 1-based and point at `start`.
 */
export interface Token extends Span {
	readonly kind: TokenKind
	readonly line: number
	readonly column: number
}

/**
 * Dense array storage for tokens.
 * Append-only during scanning.
 */
export class TokenStore {
	private readonly tokens: Token[] = []

	add(token: Token): TokenId {
		const id = tokenId(this.tokens.length)
		this.tokens.push(token)
		return id
	}

	*[Symbol.iterator](): Generator<[TokenId, Token]> {
		for (let i = 0; i < this.tokens.length; i++) {
			const token = this.tokens[i]
			if (token !== undefined) yield [tokenId(i), token]
		}
	}
}
