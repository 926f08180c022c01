import { TokenSequence, flatten_upper } from '../runtime/tokens'
import type { ParseContext } from '../runtime/context'
import { LookaheadInvariantError } from '../runtime/errors'
import { match_log } from '../runtime/logging'
import type { Matchable } from './base'

function is_trivia(str: string) {
	return str.trim() === ''
}

// a trivia option may sit anywhere ahead, anything else has to be the first meaningful string
export function simple_option_matches(simple_opt: string, str_buff: readonly string[]) {
	if (!str_buff.includes(simple_opt))
		return false
	if (is_trivia(simple_opt))
		return true

	const first_elem = str_buff.find(elem => !is_trivia(elem))
	if (first_elem === undefined)
		throw new LookaheadInvariantError([
			`lookahead option ${JSON.stringify(simple_opt)} was checked against input with nothing but trivia:`,
			str_buff,
		])
	return first_elem === simple_opt
}

export function prune_options<M extends Matchable>(
	options: readonly M[],
	tokens: TokenSequence,
	ctx: ParseContext,
	grammar_name = 'AnyNumberOf',
): M[] {
	if (!ctx.config.prune)
		return options.slice()

	// tokens may already be nested, so this works on their raw leaves
	const str_buff = flatten_upper(tokens)

	const available_options: M[] = []
	const prune_buff: M[] = []
	let non_simple = 0
	let pruned_simple = 0
	let matched_simple = 0

	for (const opt of options) {
		const simple = opt.simple(ctx)
		if (!simple.is_some()) {
			available_options.push(opt)
			non_simple++
			continue
		}

		if (simple.value.some(simple_opt => simple_option_matches(simple_opt, str_buff))) {
			available_options.push(opt)
			matched_simple++
		}
		else {
			prune_buff.push(opt)
			pruned_simple++
		}
	}

	match_log(ctx, grammar_name, 'match', 'PRN', 3, {
		ns: non_simple, ps: pruned_simple, ms: matched_simple,
		pruned: prune_buff.map(String),
		opts: available_options.length !== 0 ? available_options.map(String) : 'NONE',
	})

	return available_options
}
