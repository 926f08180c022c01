import type { Maybe } from '@ts-std/monads'

import type { TokenSequence } from '../runtime/tokens'
import type { ParseContext } from '../runtime/context'
import { MatchResult } from '../runtime/match_result'
import { MatchInvariantError } from '../runtime/errors'
import { match_log } from '../runtime/logging'

export interface Matchable {
	match(tokens: TokenSequence, ctx: ParseContext): MatchResult
	// None means this element can't say in advance what it starts with
	simple(ctx: ParseContext, crumbs?: readonly string[]): Maybe<string[]>
	is_optional(): boolean
}

export type GrammarOptions = Partial<Readonly<{
	optional: boolean,
	// whether trivia may sit between the parts this grammar matches
	allow_gaps: boolean,
}>>

export abstract class BaseGrammar implements Matchable {
	readonly optional: boolean
	readonly allow_gaps: boolean
	constructor(options: GrammarOptions = {}) {
		this.optional = options.optional === true
		this.allow_gaps = options.allow_gaps !== false
	}

	protected abstract match_impl(tokens: TokenSequence, ctx: ParseContext): MatchResult
	abstract simple(ctx: ParseContext, crumbs?: readonly string[]): Maybe<string[]>

	is_optional() {
		return this.optional
	}

	get grammar_name() {
		return this.constructor.name
	}

	match(tokens: TokenSequence, ctx: ParseContext): MatchResult {
		const result = this.match_impl(tokens, ctx)
		if (!MatchResult.contains(tokens, result))
			throw new MatchInvariantError([
				`${this} returned tokens that don't reconstruct its input`,
				'input:', tokens.map(token => token.raw),
				'matched:', result.matched.map(token => token.raw),
				'remainder:', result.remainder.map(token => token.raw),
			])

		match_log(ctx, this.grammar_name, 'match', result.has_match() ? 'MATCH' : 'FAIL', 4, {
			matched: JSON.stringify(result.raw_matched()),
			remaining: result.remainder.length,
		})
		return result
	}

	toString() {
		return `<${this.grammar_name}>`
	}
}
