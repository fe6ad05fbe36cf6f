export { parse_to_value, translate, validate } from './translate'
export type { ParseOptions, PrintingBuilder } from './translate'
export { ParseError, format_error, locate } from './error'
export type { SourceFile, Location } from './error'
export { StringOutput } from './output'
export type { Output } from './output'

export { Lexer } from './runtime/lexer'
export type { Pattern, TokenMatch, Span } from './runtime/lexer'
export { Parser } from './runtime/parser'
export { Recorder, replay_call, replay_calls } from './runtime/recorder'
export type { BuilderCall } from './runtime/recorder'

export { NullBuilder, named_constants } from './builder/base'
export type { Builder, ArrayKind, NamedConstant } from './builder/base'
export { ValueBuilder, NumberLiteral, to_json_text } from './builder/value'
export type { Value, ValueBuilderOptions } from './builder/value'
export { PrettyPrinter } from './builder/pretty_print'
export type { PrettyPrintOptions } from './builder/pretty_print'
export { VerbatimPrinter } from './builder/verbatim'
export { JsonPrinter } from './builder/json_printer'
export type { JsonPrintOptions } from './builder/json_printer'
