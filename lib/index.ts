export * from './runtime/tokens'
export { MatchResult } from './runtime/match_result'
export { ParseContext } from './runtime/context'
export { ParseConfig } from './runtime/config'
export type { Logger } from './runtime/config'
export { match_log } from './runtime/logging'
export * from './runtime/errors'

export { BaseGrammar } from './grammar/base'
export type { Matchable, GrammarOptions } from './grammar/base'
export { prune_options } from './grammar/prune'
export * from './grammar/terminals'
export * from './grammar/sequence'
export * from './grammar/anyof'

export { LogError } from './utils'
