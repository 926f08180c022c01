import * as util from 'util'
import { Maybe, Some, None } from '@ts-std/monads'

export function debug(obj: unknown, depth: number | null = null, colors = false) {
	return util.inspect(obj, { depth, colors, breakLength: Infinity })
}

export class LogError extends Error {
	constructor(lines: unknown[], depth: number | null = null) {
		const message = lines.map(line => {
			return typeof line === 'string'
				? line
				: debug(line, depth)
		}).join('\n')
		super(message)
		this.name = new.target.name
	}
}

export type NonEmpty<T> = [T, ...T[]]
export namespace NonEmpty {
	export function from_array<T>(array: readonly T[]): Maybe<NonEmpty<T>> {
		if (array.length === 0)
			return None
		const non_empty: NonEmpty<T> = [array[0], ...array.slice(1)]
		return Some(non_empty)
	}
}

export function unique<T>(items: readonly T[]): T[] {
	return items.filter((item, index) => items.indexOf(item) === index)
}

export function exhaustive(v: never): never {
	throw new LogError([`unexpected value:`, v])
}
