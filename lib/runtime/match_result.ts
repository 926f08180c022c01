import { Token, TokenSequence, raw_of } from './tokens'

export class MatchResult {
	constructor(
		readonly matched: TokenSequence,
		readonly remainder: TokenSequence,
	) {}

	static from_unmatched(tokens: TokenSequence) {
		return new MatchResult([], tokens)
	}
	static from_empty() {
		return new MatchResult([], [])
	}
	static from_matched(tokens: TokenSequence) {
		return new MatchResult(tokens, [])
	}

	is_complete() {
		return this.remainder.length === 0
	}
	has_match() {
		return this.matched.length !== 0
	}

	matched_length() {
		return this.matched.length
	}
	raw_matched() {
		return raw_of(this.matched)
	}

	concat(other: MatchResult) {
		const matched: Token[] = [...this.matched, ...other.matched]
		return new MatchResult(matched, other.remainder)
	}

	// matched followed by remainder has to be exactly the input, token for token
	static contains(input: TokenSequence, result: MatchResult) {
		const { matched, remainder } = result
		if (matched.length + remainder.length !== input.length)
			return false

		return matched.every((token, index) => token === input[index])
			&& remainder.every((token, index) => token === input[matched.length + index])
	}
}
