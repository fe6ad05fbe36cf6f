import 'mocha'
import { expect } from 'chai'

import { ParseError } from '../error'
import { NullBuilder } from '../builder/base'
import { Lexer } from './lexer'
import { Parser } from './parser'
import type { CallType } from './recorder'
import { Recorder } from './recorder'

function events(source: string): CallType[] {
	const recorder = new Recorder(new NullBuilder())
	const lexer = new Lexer(source)
	new Parser(lexer, recorder).document()
	lexer.exit()
	return recorder.calls.map(call => call.type)
}

function events_until_error(source: string): CallType[] {
	const recorder = new Recorder(new NullBuilder())
	expect(() => new Parser(new Lexer(source), recorder).document()).throw(ParseError)
	return recorder.calls.map(call => call.type)
}

function fails(source: string, message: string) {
	expect(() => new Parser(new Lexer(source), new NullBuilder()).document()).throw(ParseError, message)
}

describe('Parser', () => {
	it('scalars', () => {
		const recorder = new Recorder(new NullBuilder())
		const lexer = new Lexer("[1, -2.5e3, True, None, null, NaN, 'a\\n', /x/i, <Foo>, foo]")
		new Parser(lexer, recorder).document()

		const scalars = recorder.calls.filter(call => call.type !== 'array_element')
		expect(scalars).eql([
			{ type: 'open_document' },
			{ type: 'open_array', kind: 'list' },
			{ type: 'int', raw: '1', value: 1 },
			{ type: 'float', raw: '-2.5e3', value: -2500 },
			{ type: 'bool', raw: 'True', value: true },
			{ type: 'null', raw: 'None' },
			{ type: 'null', raw: 'null' },
			{ type: 'named_constant', raw: 'NaN', name: 'NaN' },
			{ type: 'string', raw: "'a\\n'", value: 'a\n' },
			{ type: 'regex', raw: '/x/i', pattern: 'x', flags: 'i' },
			{ type: 'raw_repr', raw: '<Foo>' },
			{ type: 'identifier', name: 'foo' },
			{ type: 'close_array' },
			{ type: 'close_document' },
		])
	})

	it('lists, with holes and a trailing comma', () => {
		expect(events('[1,,2,]')).eql([
			'open_document', 'open_array',
			'int', 'array_element',
			'array_empty_slot', 'array_element',
			'int', 'array_element',
			'close_array', 'close_document',
		])
		expect(events('[,]')).eql([
			'open_document', 'open_array', 'array_empty_slot', 'array_element', 'close_array', 'close_document',
		])
	})

	it('tuples', () => {
		expect(events('()')).eql(['open_document', 'open_array', 'close_array', 'close_document'])
		expect(events('(1,)')).eql(['open_document', 'open_array', 'int', 'array_element', 'close_array', 'close_document'])
		expect(events('(1, 2)')).eql([
			'open_document', 'open_array', 'int', 'array_element', 'int', 'array_element', 'close_array', 'close_document',
		])
		fails('(1)', "Position 2: expected `,`, found ')'")
		fails('(,)', "Position 1: expected expression, found ',)'")
	})

	it('mappings', () => {
		expect(events('{}')).eql(['open_document', 'open_mapping', 'close_mapping', 'close_document'])
		expect(events('{a: 1, "b": 2,}')).eql([
			'open_document', 'open_mapping',
			'string', 'mapping_key', 'int', 'mapping_value',
			'string', 'mapping_key', 'int', 'mapping_value',
			'close_mapping', 'close_document',
		])
		fails('{"a" 1}', "Position 5: expected `:`, found '1}'")
		fails('{,}', "Position 1: expected key, found ',}'")
	})

	it('bare mapping keys are strings', () => {
		const recorder = new Recorder(new NullBuilder())
		new Parser(new Lexer('{key: 1}'), recorder).document()
		expect(recorder.calls[2]).eql({ type: 'string', raw: 'key', value: 'key' })
	})

	it('sets', () => {
		expect(events('{1, 2}')).eql([
			'open_document', 'open_set', 'int', 'set_element', 'int', 'set_element', 'close_set', 'close_document',
		])
		expect(events('{"a",}')).eql(['open_document', 'open_set', 'string', 'set_element', 'close_set', 'close_document'])
	})

	it('a lone bare word in braces is an identifier', () => {
		const recorder = new Recorder(new NullBuilder())
		new Parser(new Lexer('{a}'), recorder).document()
		expect(recorder.calls).eql([
			{ type: 'open_document' },
			{ type: 'open_set' },
			{ type: 'identifier', name: 'a' },
			{ type: 'set_element' },
			{ type: 'close_set' },
			{ type: 'close_document' },
		])
	})

	it('composite keys', () => {
		expect(events('{(1,): {2}}')).eql([
			'open_document', 'open_mapping',
			'open_array', 'int', 'array_element', 'close_array', 'mapping_key',
			'open_set', 'int', 'set_element', 'close_set', 'mapping_value',
			'close_mapping', 'close_document',
		])
	})

	it('function calls', () => {
		expect(events('f()')).eql([
			'open_document', 'open_function_call',
			'function_call_end_positional_arguments',
			'close_function_call', 'close_document',
		])
		expect(events('f(1, k=2,)')).eql([
			'open_document', 'open_function_call',
			'int', 'function_call_positional_argument',
			'function_call_end_positional_arguments',
			'function_call_start_keyword_arguments',
			'string', 'function_call_keyword_argument_key', 'int', 'function_call_keyword_argument_value',
			'function_call_end_keyword_arguments',
			'close_function_call', 'close_document',
		])
	})

	it('a comment between a keyword and its `=`', () => {
		expect(events('f(k // why\n= 2)')).eql([
			'open_document', 'open_function_call',
			'function_call_end_positional_arguments',
			'function_call_start_keyword_arguments',
			'string', 'function_call_keyword_argument_key', 'int', 'function_call_keyword_argument_value',
			'function_call_end_keyword_arguments',
			'close_function_call', 'close_document',
		])
		expect(events('f(a // b = 1\n)')).eql([
			'open_document', 'open_function_call',
			'identifier', 'function_call_positional_argument',
			'function_call_end_positional_arguments',
			'close_function_call', 'close_document',
		])
	})

	it('function call names', () => {
		const names = (source: string) => {
			const recorder = new Recorder(new NullBuilder())
			new Parser(new Lexer(source), recorder).document()
			return recorder.calls.flatMap(call => call.type === 'open_function_call' ? [call.name] : [])
		}
		expect(names('new   Date(1)')).eql(['new Date'])
		expect(names('bson.ObjectId ("a")')).eql(['bson.ObjectId'])
		expect(names('$f(g())')).eql(['$f', 'g'])
	})

	it('function call errors', () => {
		fails('x(a=1, 2)', 'Position 7: positional argument follows keyword argument')
		fails('f(,)', "Position 2: expected expression, found ',)'")
		fails('f(1 2)', "Position 4: expected `)`, found '2)'")
	})

	it('other errors', () => {
		fails('[1 2]', "Position 3: expected `]`, found '2]'")
		fails('', 'Position 0: expected expression, found end of input')
		fails('<"x">', `Position 0: expected python_repr, found '<"x">'`)
		fails("'open", `Position 0: expected single_quoted, found "'open"`)
	})

	it('reports everything it read before an error inside braces', () => {
		expect(events_until_error('{[1, 2')).eql([
			'open_document', 'open_mapping', 'open_array', 'int', 'array_element', 'int',
		])
	})

	it('parses consecutive documents', () => {
		const lexer = new Lexer('1 [2] {}')
		const parser = new Parser(lexer, new NullBuilder())
		let count = 0
		while (!lexer.at_end()) {
			parser.document()
			count++
		}
		expect(count).equal(3)
	})
})
