import 'mocha'
import { expect } from 'chai'

import { StringOutput } from '../output'
import { NullBuilder } from '../builder/base'
import { VerbatimPrinter } from '../builder/verbatim'
import { Lexer } from './lexer'
import { Parser } from './parser'
import type { BuilderCall } from './recorder'
import { Recorder, replay_calls, split_call, split_elements, is_opening, is_closing } from './recorder'

// the calls of a single composite document, without the document events around it
function record(source: string): BuilderCall[] {
	const recorder = new Recorder(new NullBuilder())
	new Parser(new Lexer(source), recorder).document()
	return recorder.calls.slice(1, -1)
}

const int = (value: number): BuilderCall => ({ type: 'int', raw: `${value}`, value })

describe('Recorder', () => {
	it('records calls in order', () => {
		const recorder = new Recorder(new NullBuilder())
		recorder.open_array('tuple')
		recorder.string("'a'", 'a')
		recorder.array_element()
		recorder.close_array()

		expect(recorder.calls).eql([
			{ type: 'open_array', kind: 'tuple' },
			{ type: 'string', raw: "'a'", value: 'a' },
			{ type: 'array_element' },
			{ type: 'close_array' },
		])
	})

	it('replays into its host', () => {
		const host = new Recorder(new NullBuilder())
		const recorder = new Recorder(host)
		recorder.int('1', 1)
		recorder.identifier('x')
		recorder.replay()
		expect(host.calls).eql([int(1), { type: 'identifier', name: 'x' }])
	})

	it('replays into a printer', () => {
		const output = new StringOutput()
		const printer = new VerbatimPrinter(output, { indent: 0 })
		printer.open_document()
		replay_calls(printer, record('[1, {a: 2}]'))
		expect(output.text).equal('[1, {a: 2}]')
	})
})

describe('is_opening and is_closing', () => it('works', () => {
	expect(is_opening({ type: 'open_set' })).true
	expect(is_opening({ type: 'open_function_call', name: 'f' })).true
	expect(is_opening({ type: 'open_document' })).false
	expect(is_closing({ type: 'close_mapping' })).true
	expect(is_closing({ type: 'close_document' })).false
}))

describe('split_elements', () => it('works', () => {
	expect(split_elements(record('[1,,[2]]'))).eql([
		[int(1)],
		undefined,
		[{ type: 'open_array', kind: 'list' }, int(2), { type: 'array_element' }, { type: 'close_array' }],
	])
	expect(split_elements(record('[]'))).eql([])
}))

describe('split_call', () => it('works', () => {
	expect(split_call(record('f(1, k=[2])'))).eql({
		positional: [[int(1)]],
		keyword: [[
			[{ type: 'string', raw: 'k', value: 'k' }],
			[{ type: 'open_array', kind: 'list' }, int(2), { type: 'array_element' }, { type: 'close_array' }],
		]],
	})

	expect(split_call(record('g((1, 2))'))).eql({
		positional: [[
			{ type: 'open_array', kind: 'tuple' },
			int(1), { type: 'array_element' },
			int(2), { type: 'array_element' },
			{ type: 'close_array' },
		]],
		keyword: [],
	})
}))
