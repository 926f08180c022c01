import { ParseConfig } from './config'
import { ContextError, GrammarConfigError, ParseRecursionError } from './errors'

export class ParseContext {
	protected active_child: ParseContext | undefined = undefined
	protected released = false

	protected constructor(
		readonly config: ParseConfig,
		readonly depth: number,
	) {}

	static root(config: Partial<ParseConfig> = {}) {
		return ParseConfig.create(config).match({
			ok: config => new ParseContext(config, 0),
			err: problems => { throw new GrammarConfigError(['invalid parse configuration:', ...problems]) },
		})
	}

	is_released() {
		return this.released
	}

	// runs fn with a child context one level deeper, which is released however fn exits
	deeper_match<T>(fn: (ctx: ParseContext) => T): T {
		if (this.released)
			throw new ContextError([`a released context at depth ${this.depth} was asked for a child`])
		if (this.active_child !== undefined)
			throw new ContextError([`the context at depth ${this.depth} already has an active child`])

		const depth = this.depth + 1
		if (depth > this.config.max_depth)
			throw new ParseRecursionError(depth, [
				`maximum match depth of ${this.config.max_depth} exceeded`,
				`this usually means a grammar refers to itself without consuming anything`,
			])

		const child = new ParseContext(this.config, depth)
		this.active_child = child
		try {
			return fn(child)
		}
		finally {
			child.released = true
			this.active_child = undefined
		}
	}
}
