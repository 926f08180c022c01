import 'mocha'
import { expect } from 'chai'

import { raw, composite, token_sequence } from '../runtime/tokens'
import { ParseContext } from '../runtime/context'
import { Keyword, keyword, maybe_keyword } from './terminals'
import { Sequence, sequence } from './sequence'
import { simple_option_matches, prune_options } from './prune'

const ctx = ParseContext.root()

describe('simple_option_matches', () => {
	const str_buff = [' ', 'SELECT', ' ', 'A']

	it('needs the first meaningful string', () => {
		expect(simple_option_matches('SELECT', str_buff)).eql(true)
		expect(simple_option_matches('A', str_buff)).eql(false)
		expect(simple_option_matches('FROM', str_buff)).eql(false)
	})

	it('takes trivia from anywhere', () => {
		expect(simple_option_matches(' ', ['SELECT', ' ', 'A'])).eql(true)
		expect(simple_option_matches('\n', ['SELECT', ' ', 'A'])).eql(false)
	})

	it('nothing is found in empty input', () => {
		expect(simple_option_matches('SELECT', [])).eql(false)
		expect(simple_option_matches(' ', [])).eql(false)
	})
})

describe('prune_options', () => {
	// every element is optional, so it can't say what it starts with
	const undecided = sequence(maybe_keyword('x'))

	it('drops options that cannot start here and keeps declaration order', () => {
		const select = keyword('select')
		const a = keyword('a')
		const from = keyword('from')
		const options = [undecided, a, select, from]
		const kept = prune_options(options, token_sequence('select', ' ', 'a'), ctx)
		expect(kept).eql([undecided, select])
	})

	it('keeps a trivia option when trivia is anywhere ahead', () => {
		const space = new Keyword(' ')
		expect(prune_options([space], token_sequence('a', ' ', 'b'), ctx)).eql([space])
		expect(prune_options([space], token_sequence('a', 'b'), ctx)).eql([])
	})

	it('looks inside composite tokens', () => {
		const open = keyword('(')
		const x = keyword('x')
		const tokens = [composite('bracketed', [raw('('), raw('x'), raw(')')])]
		expect(prune_options([x, open], tokens, ctx)).eql([open])
	})

	it('keeps an option when any of its strings fits', () => {
		const either = new Sequence([maybe_keyword('with'), keyword('select')], { allow_gaps: false })
		expect(prune_options([either], token_sequence('select'), ctx)).eql([either])
		expect(prune_options([either], token_sequence('with'), ctx)).eql([either])
		expect(prune_options([either], token_sequence('insert'), ctx)).eql([])
	})

	it('keeps everything when pruning is off', () => {
		const options = [keyword('from'), keyword('where')]
		const unpruned = ParseContext.root({ prune: false })
		expect(prune_options(options, token_sequence('select'), unpruned)).eql(options)
	})

	it('logs what it did', () => {
		const lines: string[] = []
		const logged = ParseContext.root({ verbosity: 3, logger: line => { lines.push(line) } })
		prune_options([keyword('select'), keyword('from')], token_sequence('select'), logged, 'OneOf')
		expect(lines).eql([
			`[0] OneOf.match PRN ns=0 ps=1 ms=1 pruned=[ '<Keyword: "FROM">' ] opts=[ '<Keyword: "SELECT">' ]`,
		])
	})
})
