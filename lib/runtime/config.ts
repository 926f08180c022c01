import { Result, Ok, Err } from '@ts-std/monads'
import type { Dict } from '@ts-std/types'

import { default_logger } from './logging'

export type Logger = (line: string) => void

export type ParseConfig = Readonly<{
	// 0 is silent, 5 logs every grammar's outcome
	verbosity: number,
	max_depth: number,
	// only turned off to check that pruning never changes an outcome
	prune: boolean,
	logger: Logger,
}>

export namespace ParseConfig {
	export const MAX_VERBOSITY = 5

	export const defaults: ParseConfig = {
		verbosity: 0,
		max_depth: 255,
		prune: true,
		logger: default_logger,
	}

	export function create(input: Partial<ParseConfig> = {}): Result<ParseConfig, string[]> {
		const config = { ...defaults, ...input }
		const problems: string[] = []

		if (!Number.isInteger(config.verbosity) || config.verbosity < 0 || config.verbosity > MAX_VERBOSITY)
			problems.push(`verbosity must be an integer between 0 and ${MAX_VERBOSITY}, got ${config.verbosity}`)
		if (!Number.isInteger(config.max_depth) || config.max_depth < 1)
			problems.push(`max_depth must be a positive integer, got ${config.max_depth}`)

		return problems.length === 0 ? Ok(config) : Err(problems)
	}

	export const env_keys = {
		verbosity: 'GRAMMAR_MATCH_VERBOSITY',
		max_depth: 'GRAMMAR_MATCH_MAX_DEPTH',
		prune: 'GRAMMAR_MATCH_PRUNE',
	}

	export function from_env(
		env: Dict<string | undefined> = process.env,
		input: Partial<ParseConfig> = {},
	): Result<ParseConfig, string[]> {
		const overrides: { -readonly [K in keyof ParseConfig]?: ParseConfig[K] } = { ...input }

		const verbosity = env[env_keys.verbosity]
		if (verbosity !== undefined)
			overrides.verbosity = Number(verbosity)

		const max_depth = env[env_keys.max_depth]
		if (max_depth !== undefined)
			overrides.max_depth = Number(max_depth)

		const prune = env[env_keys.prune]
		if (prune !== undefined) {
			const flag = parse_flag(prune)
			if (flag === undefined)
				return Err([`${env_keys.prune} must be one of 1, 0, true, false, got ${prune}`])
			overrides.prune = flag
		}

		return create(overrides)
	}

	function parse_flag(value: string) {
		switch (value.trim().toLowerCase()) {
			case '1': case 'true': return true
			case '0': case 'false': return false
			default: return undefined
		}
	}
}
