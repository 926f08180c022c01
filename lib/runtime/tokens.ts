import { tuple as t } from '@ts-std/types'

import { exhaustive } from '../utils'

export type RawToken = Readonly<{
	type: 'RawToken',
	kind: string,
	raw: string,
	raw_upper: string,
	is_code: boolean,
}>

// something earlier passes already recognized, such as a bracketed expression
export type CompositeToken = Readonly<{
	type: 'CompositeToken',
	kind: string,
	raw: string,
	raw_upper: string,
	is_code: boolean,
	children: TokenSequence,
}>

export type Token =
	| RawToken
	| CompositeToken

export type TokenSequence = readonly Token[]


function raw_token(kind: string, content: string, is_code: boolean): RawToken {
	return { type: 'RawToken', kind, raw: content, raw_upper: content.toUpperCase(), is_code }
}

export function raw(content: string, kind = 'word') {
	return raw_token(kind, content, true)
}
export function whitespace(content = ' ') {
	return raw_token('whitespace', content, false)
}
export function newline(content = '\n') {
	return raw_token('newline', content, false)
}
export function comment(content: string) {
	return raw_token('comment', content, false)
}

export function composite(kind: string, children: TokenSequence): CompositeToken {
	const content = raw_of(children)
	return {
		type: 'CompositeToken', kind, children: children.slice(),
		raw: content, raw_upper: content.toUpperCase(),
		is_code: children.some(child => child.is_code),
	}
}

// a string of only whitespace becomes a whitespace or newline token, anything else a word
export function token_sequence(...parts: string[]): Token[] {
	return parts.map(part => {
		if (part.trim() !== '')
			return raw(part)
		return part.includes('\n') ? newline(part) : whitespace(part)
	})
}


export function* iter_raw(token: Token): Generator<RawToken, void, undefined> {
	switch (token.type) {
		case 'RawToken':
			yield token
			return
		case 'CompositeToken':
			for (const child of token.children)
				yield* iter_raw(child)
			return
		default: return exhaustive(token)
	}
}

export function flatten_upper(tokens: TokenSequence): string[] {
	const str_buff: string[] = []
	for (const token of tokens)
		for (const leaf of iter_raw(token))
			str_buff.push(leaf.raw_upper)
	return str_buff
}

export function raw_of(tokens: TokenSequence) {
	return tokens.map(token => token.raw).join('')
}

export function trim_non_code(tokens: TokenSequence) {
	let start = 0
	while (start < tokens.length && !tokens[start].is_code)
		start++

	let end = tokens.length
	while (end > start && !tokens[end - 1].is_code)
		end--

	return t(tokens.slice(0, start), tokens.slice(start, end), tokens.slice(end))
}
