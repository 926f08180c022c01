import { Maybe, Some, None } from '@ts-std/monads'
import type { Dict } from '@ts-std/types'

import type { TokenSequence } from '../runtime/tokens'
import type { ParseContext } from '../runtime/context'
import { MatchResult } from '../runtime/match_result'
import { GrammarConfigError } from '../runtime/errors'
import { BaseGrammar, Matchable, GrammarOptions } from './base'

export class Keyword extends BaseGrammar {
	readonly template: string
	constructor(template: string, options: GrammarOptions = {}) {
		super(options)
		if (template === '')
			throw new GrammarConfigError([`a Keyword needs a non-empty template`])
		this.template = template.toUpperCase()
	}

	simple(): Maybe<string[]> {
		return Some([this.template])
	}

	// composites are already recognized structure, never a keyword
	protected match_impl(tokens: TokenSequence): MatchResult {
		const [first] = tokens
		if (first !== undefined && first.type === 'RawToken' && first.raw_upper === this.template)
			return new MatchResult(tokens.slice(0, 1), tokens.slice(1))

		return MatchResult.from_unmatched(tokens)
	}

	toString() {
		return `<Keyword: ${JSON.stringify(this.template)}>`
	}
}
export function keyword(template: string) { return new Keyword(template) }
export function maybe_keyword(template: string) { return new Keyword(template, { optional: true }) }


export class Nothing extends BaseGrammar {
	constructor() {
		super({ optional: true })
	}

	simple(): Maybe<string[]> {
		return Some([])
	}

	protected match_impl(tokens: TokenSequence): MatchResult {
		return MatchResult.from_unmatched(tokens)
	}
}
export function nothing() { return new Nothing() }


export class Registry {
	protected readonly rules: Dict<Matchable> = {}

	define(name: string, grammar: Matchable): this {
		if (this.has(name))
			throw new GrammarConfigError([`a rule named ${name} is already defined`])
		this.rules[name] = grammar
		return this
	}

	has(name: string) {
		return Object.prototype.hasOwnProperty.call(this.rules, name)
	}

	get(name: string): Maybe<Matchable> {
		return this.has(name) ? Some(this.rules[name]) : None
	}

	names() {
		return Object.keys(this.rules)
	}
}

export class Ref extends BaseGrammar {
	constructor(
		readonly registry: Registry,
		readonly rule_name: string,
		options: GrammarOptions = {},
	) { super(options) }

	protected resolve(): Matchable {
		return this.registry.get(this.rule_name).match({
			some: grammar => grammar,
			none: () => {
				throw new GrammarConfigError([
					`${this} refers to an undefined rule, these are defined:`,
					this.registry.names(),
				])
			},
		})
	}

	// a rule met again on the way down can't be described up front
	simple(ctx: ParseContext, crumbs: readonly string[] = []): Maybe<string[]> {
		if (crumbs.includes(this.rule_name))
			return None
		return this.resolve().simple(ctx, [...crumbs, this.rule_name])
	}

	protected match_impl(tokens: TokenSequence, ctx: ParseContext): MatchResult {
		const grammar = this.resolve()
		return ctx.deeper_match(child => grammar.match(tokens, child))
	}

	toString() {
		return `<Ref: ${this.rule_name}>`
	}
}
export function ref(registry: Registry, rule_name: string) { return new Ref(registry, rule_name) }
export function maybe_ref(registry: Registry, rule_name: string) { return new Ref(registry, rule_name, { optional: true }) }
