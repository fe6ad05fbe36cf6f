import type { Result } from '@ts-std/monads'
import { Ok, Err } from '@ts-std/monads'

import type { Output } from './output'
import { ParseError } from './error'
import { Lexer } from './runtime/lexer'
import { Parser } from './runtime/parser'
import type { Builder } from './builder/base'
import { NullBuilder } from './builder/base'
import type { Value } from './builder/value'
import { ValueBuilder } from './builder/value'

export type PrintingBuilder = Builder<unknown> & { readonly output: Output }

export type ParseOptions = {
	keep_number_text: boolean,
	filename: string,
}

// a single document, with nothing after it
export function parse_to_value(source: string, options: Partial<ParseOptions> = {}): Result<Value, ParseError> {
	const lexer = new Lexer(source, options.filename)
	const parser = new Parser(lexer, new ValueBuilder({ keep_number_text: options.keep_number_text === true }))
	try {
		const value = parser.document()
		lexer.exit()
		return Ok(value)
	}
	catch (e) {
		if (e instanceof ParseError)
			return Err(e)
		throw e
	}
}

function parse_documents(
	lexer: Lexer,
	builder: Builder<unknown>,
	single_document: boolean,
	after_document: () => void,
): number {
	const parser = new Parser(lexer, builder)
	let count = 0
	while (single_document ? count === 0 : !lexer.at_end()) {
		parser.document()
		after_document()
		count++
	}
	if (single_document)
		lexer.exit()
	return count
}

/**
 * Streams every document in `source` through `builder`, each followed by a newline.
 *
 * If the input turns out to be malformed part way through, whatever the builder is
 * still holding is flushed, and the rest of the input is copied to the builder's output
 * unchanged.
 */
export function translate(
	builder: PrintingBuilder,
	source: string,
	single_document = false,
	filename?: string,
): Result<number, ParseError> {
	const lexer = new Lexer(source, filename)
	try {
		return Ok(parse_documents(lexer, builder, single_document, () => builder.output.write('\n')))
	}
	catch (e) {
		builder.flush()
		lexer.flush_remainder(builder.output)
		if (e instanceof ParseError)
			return Err(e)
		throw e
	}
}

// checks the grammar without producing anything
export function validate(source: string, single_document = false, filename?: string): Result<number, ParseError> {
	const lexer = new Lexer(source, filename)
	try {
		return Ok(parse_documents(lexer, new NullBuilder(), single_document, () => {}))
	}
	catch (e) {
		if (e instanceof ParseError)
			return Err(e)
		throw e
	}
}
