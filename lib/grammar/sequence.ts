import { Maybe, Some, None } from '@ts-std/monads'

import { NonEmpty, unique } from '../utils'
import { TokenSequence, trim_non_code } from '../runtime/tokens'
import type { ParseContext } from '../runtime/context'
import { MatchResult } from '../runtime/match_result'
import { GrammarConfigError } from '../runtime/errors'
import { BaseGrammar, Matchable, GrammarOptions } from './base'

export class Sequence extends BaseGrammar {
	readonly elements: NonEmpty<Matchable>
	constructor(elements: readonly Matchable[], options: GrammarOptions = {}) {
		super(options)
		this.elements = NonEmpty.from_array(elements).match({
			some: elements => elements,
			none: () => { throw new GrammarConfigError([`a Sequence needs at least one element`]) },
		})
	}

	// with gaps, any non-code token (a comment too) may come before the first element,
	// so only a sequence without gaps can say what it starts with
	simple(ctx: ParseContext, crumbs: readonly string[] = []): Maybe<string[]> {
		if (this.allow_gaps)
			return None

		const simple_buff: string[] = []
		for (const opt of this.elements) {
			const simple = opt.simple(ctx, crumbs)
			if (!simple.is_some())
				return None

			simple_buff.push(...simple.value)
			if (!opt.is_optional())
				return Some(unique(simple_buff))
		}

		return None
	}

	protected match_impl(tokens: TokenSequence, ctx: ParseContext): MatchResult {
		let result = MatchResult.from_unmatched(tokens)

		for (const elem of this.elements) {
			const unmatched = result.remainder
			const pre_nc = this.allow_gaps ? trim_non_code(unmatched)[0] : []
			const mid_seg = unmatched.slice(pre_nc.length)

			if (mid_seg.length === 0) {
				if (elem.is_optional())
					continue
				return MatchResult.from_unmatched(tokens)
			}

			const elem_match = ctx.deeper_match(child => elem.match(mid_seg, child))
			if (elem_match.has_match()) {
				result = result.concat(new MatchResult([...pre_nc, ...elem_match.matched], elem_match.remainder))
				continue
			}

			if (elem.is_optional())
				continue
			return MatchResult.from_unmatched(tokens)
		}

		return result
	}
}
export function sequence(...elements: NonEmpty<Matchable>) { return new Sequence(elements) }
export function maybe_sequence(...elements: NonEmpty<Matchable>) { return new Sequence(elements, { optional: true }) }
