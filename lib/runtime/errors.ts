import { LogError } from '../utils'

// ordinary non-matches are MatchResult values, everything here is a fault in a grammar or its caller

export class GrammarConfigError extends LogError {}

export class LookaheadInvariantError extends LogError {}

export class MatchInvariantError extends LogError {}

export class ContextError extends LogError {}

export class ParseRecursionError extends LogError {
	constructor(readonly depth: number, lines: unknown[]) {
		super(lines)
	}
}
