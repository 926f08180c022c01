import 'mocha'
import { expect } from 'chai'

import { ParseConfig } from './config'

describe('ParseConfig.create', () => {
	it('fills defaults', () => {
		const config = ParseConfig.create().unwrap()
		expect(config.verbosity).eql(0)
		expect(config.max_depth).eql(255)
		expect(config.prune).eql(true)
	})

	it('keeps overrides', () => {
		const logger = (_line: string) => {}
		const config = ParseConfig.create({ verbosity: 3, prune: false, logger }).unwrap()
		expect(config.verbosity).eql(3)
		expect(config.prune).eql(false)
		expect(config.logger).equal(logger)
	})

	it('collects every problem', () => {
		const result = ParseConfig.create({ verbosity: 6, max_depth: 0 })
		expect(result.is_err()).eql(true)
		result.match({
			ok: () => { throw new Error('expected problems') },
			err: problems => expect(problems).eql([
				'verbosity must be an integer between 0 and 5, got 6',
				'max_depth must be a positive integer, got 0',
			]),
		})
	})

	it('rejects fractions', () => {
		expect(ParseConfig.create({ verbosity: 1.5 }).is_err()).eql(true)
	})
})

describe('ParseConfig.from_env', () => {
	it('uses defaults with an empty environment', () => {
		const config = ParseConfig.from_env({}).unwrap()
		expect(config.verbosity).eql(0)
		expect(config.max_depth).eql(255)
		expect(config.prune).eql(true)
	})

	it('reads every key', () => {
		const config = ParseConfig.from_env({
			GRAMMAR_MATCH_VERBOSITY: '2',
			GRAMMAR_MATCH_MAX_DEPTH: '40',
			GRAMMAR_MATCH_PRUNE: 'false',
		}).unwrap()
		expect(config.verbosity).eql(2)
		expect(config.max_depth).eql(40)
		expect(config.prune).eql(false)
	})

	it('environment wins over the given input', () => {
		const config = ParseConfig.from_env({ GRAMMAR_MATCH_VERBOSITY: '4' }, { verbosity: 1, max_depth: 10 }).unwrap()
		expect(config.verbosity).eql(4)
		expect(config.max_depth).eql(10)
	})

	it('rejects bad values', () => {
		result_problems(ParseConfig.from_env({ GRAMMAR_MATCH_PRUNE: 'maybe' }), [
			'GRAMMAR_MATCH_PRUNE must be one of 1, 0, true, false, got maybe',
		])
		result_problems(ParseConfig.from_env({ GRAMMAR_MATCH_MAX_DEPTH: 'deep' }), [
			'max_depth must be a positive integer, got NaN',
		])
	})
})

function result_problems(result: ReturnType<typeof ParseConfig.create>, expected: string[]) {
	result.match({
		ok: () => { throw new Error('expected problems') },
		err: problems => expect(problems).eql(expected),
	})
}
