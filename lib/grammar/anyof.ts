import { Maybe, Some, None } from '@ts-std/monads'

import { NonEmpty, unique } from '../utils'
import { TokenSequence, trim_non_code } from '../runtime/tokens'
import type { ParseContext } from '../runtime/context'
import { MatchResult } from '../runtime/match_result'
import { GrammarConfigError } from '../runtime/errors'
import { match_log } from '../runtime/logging'
import { BaseGrammar, Matchable, GrammarOptions } from './base'
import { prune_options } from './prune'

export type AnyNumberOfOptions = GrammarOptions & Partial<Readonly<{
	min_times: number,
	// left out for no upper bound
	max_times: number,
	// a match of this at the start vetoes the whole grammar
	exclude: Matchable,
}>>

function check_times(min_times: number, max_times: number | undefined) {
	const problems: string[] = []
	if (!Number.isInteger(min_times) || min_times < 0)
		problems.push(`min_times must be a non-negative integer, got ${min_times}`)
	if (max_times !== undefined) {
		if (!Number.isInteger(max_times) || max_times < 1)
			problems.push(`max_times must be a positive integer, got ${max_times}`)
		else if (max_times < min_times)
			problems.push(`max_times (${max_times}) can't be less than min_times (${min_times})`)
	}
	return problems
}

/**
 * Matches any of its elements, repeated between `min_times` and `max_times` times.
 *
 * Each repetition takes the first element that consumes the whole of what's left,
 * and otherwise the longest partial match, with the earliest declared element
 * winning a tie. Repetitions are never revisited once made.
 */
export class AnyNumberOf extends BaseGrammar {
	readonly elements: NonEmpty<Matchable>
	readonly min_times: number
	readonly max_times: number | undefined
	readonly exclude: Matchable | undefined

	constructor(elements: readonly Matchable[], options: AnyNumberOfOptions = {}) {
		super(options)
		const min_times = options.min_times === undefined ? 0 : options.min_times
		const problems = check_times(min_times, options.max_times)
		if (problems.length !== 0)
			throw new GrammarConfigError([`invalid ${new.target.name}:`, ...problems])

		this.elements = NonEmpty.from_array(elements).match({
			some: elements => elements,
			none: () => { throw new GrammarConfigError([`${new.target.name} needs at least one element`]) },
		})
		this.min_times = min_times
		this.max_times = options.max_times
		this.exclude = options.exclude
	}

	// only usable by an enclosing grammar when *every* element can describe itself
	simple(ctx: ParseContext, crumbs: readonly string[] = []): Maybe<string[]> {
		const simple_buff: string[] = []
		for (const opt of this.elements) {
			const simple = opt.simple(ctx, crumbs)
			if (!simple.is_some())
				return None
			simple_buff.push(...simple.value)
		}
		return Some(unique(simple_buff))
	}

	is_optional() {
		return this.optional || this.min_times === 0
	}

	match_once(tokens: TokenSequence, ctx: ParseContext): MatchResult {
		const available_options = prune_options(this.elements, tokens, ctx, this.grammar_name)
		if (available_options.length === 0)
			return MatchResult.from_unmatched(tokens)

		let best_match: MatchResult | undefined = undefined
		for (const opt of available_options) {
			const m = ctx.deeper_match(child => opt.match(tokens, child))
			if (m.is_complete())
				return m

			if (!m.has_match())
				continue
			if (best_match !== undefined && m.matched_length() <= best_match.matched_length())
				continue

			best_match = m
			match_log(ctx, this.grammar_name, 'match', 'SAVE', 3, {
				match_length: m.matched_length(),
				m: JSON.stringify(m.raw_matched()),
			})
		}

		return best_match !== undefined
			? best_match
			: MatchResult.from_unmatched(tokens)
	}

	protected match_impl(tokens: TokenSequence, ctx: ParseContext): MatchResult {
		const exclude = this.exclude
		if (exclude !== undefined) {
			const excluded = ctx.deeper_match(child => exclude.match(tokens, child))
			if (excluded.has_match()) {
				match_log(ctx, this.grammar_name, 'match', 'EXCL', 2, { exclude: String(exclude) })
				return MatchResult.from_unmatched(tokens)
			}
		}

		let result = MatchResult.from_unmatched(tokens)
		let n_matches = 0
		while (true) {
			const unmatched = result.remainder
			if (this.max_times !== undefined && n_matches >= this.max_times)
				return result

			if (unmatched.length === 0)
				return n_matches >= this.min_times
					? result
					: MatchResult.from_unmatched(tokens)

			// trivia between repetitions is only taken along with the next match
			const pre_seg = n_matches > 0 && this.allow_gaps ? trim_non_code(unmatched)[0] : []
			const mid_seg = unmatched.slice(pre_seg.length)

			const match = this.match_once(mid_seg, ctx)
			if (match.has_match()) {
				result = result.concat(new MatchResult([...pre_seg, ...match.matched], match.remainder))
				n_matches++
				continue
			}

			return n_matches >= this.min_times
				? result
				: MatchResult.from_unmatched(tokens)
		}
	}

	toString() {
		return `<${this.grammar_name}: [${this.elements.map(String).join(', ')}]>`
	}
}

export class OneOf extends AnyNumberOf {
	constructor(elements: readonly Matchable[], options: GrammarOptions & Pick<AnyNumberOfOptions, 'exclude'> = {}) {
		super(elements, { ...options, min_times: 1, max_times: 1 })
	}
}

export function any_number_of(...elements: NonEmpty<Matchable>) { return new AnyNumberOf(elements) }
export function one_of(...elements: NonEmpty<Matchable>) { return new OneOf(elements) }
export function maybe_one_of(...elements: NonEmpty<Matchable>) { return new OneOf(elements, { optional: true }) }
