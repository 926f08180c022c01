import { Console } from 'console'
import type { Dict } from '@ts-std/types'

import { debug } from '../utils'
import type { ParseContext } from './context'

const console = new Console({ stdout: process.stderr, stderr: process.stderr, inspectOptions: { depth: 5 } })

export function default_logger(line: string) {
	console.log(line)
}

export function format_log_value(value: unknown) {
	return typeof value === 'string'
		? value
		: debug(value, 2)
}

export function match_log(
	ctx: ParseContext,
	grammar: string, func: string, code: string,
	v_level: number,
	details: Dict<unknown> = {},
) {
	if (ctx.config.verbosity < v_level)
		return

	const pairs = Object.keys(details).map(key => `${key}=${format_log_value(details[key])}`)
	const prefix = '  '.repeat(ctx.depth) + `[${ctx.depth}]`
	ctx.config.logger([prefix, `${grammar}.${func}`, code, ...pairs].join(' '))
}
