import 'mocha'
import { expect } from 'chai'

import { StringOutput } from './output'
import { translate, validate } from './translate'
import { VerbatimPrinter } from './builder/verbatim'
import { JsonPrinter } from './builder/json_printer'

function flat(source: string, single_document = false) {
	const output = new StringOutput()
	const result = translate(new VerbatimPrinter(output, { indent: 0 }), source, single_document)
	return { output: output.text, result }
}

function message_of(result: ReturnType<typeof validate>) {
	return result.match({
		ok: () => { throw new Error('expected a parse error') },
		err: e => e.message,
	})
}

describe('translate', () => {
	it('counts documents', () => {
		const { output, result } = flat('1 2 3')
		expect(output).equal('1\n2\n3\n')
		expect(result.unwrap()).equal(3)
	})

	it('accepts empty input', () => {
		expect(flat('').result.unwrap()).equal(0)
		expect(flat('  // nothing\n').result.unwrap()).equal(0)
	})

	it('single documents', () => {
		expect(flat('[1]', true).result.unwrap()).equal(1)

		const { output, result } = flat('1 2', true)
		expect(output).equal('1\n2')
		expect(message_of(result)).equal("Position 2: expected end of input, found '2'")

		expect(message_of(flat('', true).result)).equal('Position 0: expected expression, found end of input')
	})

	it('copies the rest of the input after an error', () => {
		const { output, result } = flat('[3, 4 5, 6]')
		expect(output).equal('[3, 4 5, 6]')
		expect(message_of(result)).equal("Position 6: expected `]`, found '5, 6]'")

		expect(flat('{"a": 1, "b" 2}').output).equal('{"a": 1, "b" 2}')
		expect(flat('[1] ]').output).equal('[1]\n]')
	})

	it('starts the copy exactly where the error is', () => {
		const { output, result } = flat('[1,   @]')
		expect(output).equal('[1, @]')
		expect(message_of(result)).equal("Position 6: expected expression, found '@]'")

		expect(flat('[1 // note\n 2]').output).equal('[1 2]')
	})

	it('writes separators that were pending', () => {
		const output = new StringOutput()
		translate(new VerbatimPrinter(output, { indent: 2 }), '[1, <bad')
		expect(output.text).equal('[\n  1,\n  <bad')
	})

	it('writes calls that were held back', () => {
		const output = new StringOutput()
		const result = translate(new JsonPrinter(output, { indent: 0 }), 'Date(1')
		expect(result.is_err()).true
		expect(output.text).equal('{"$$Date": [1 ')
	})
})

describe('validate', () => it('works', () => {
	expect(validate('[1, 2] {}').unwrap()).equal(2)
	expect(validate('1 2', true).is_err()).true
	expect(message_of(validate('[1'))).equal('Position 2: expected `]`, found end of input')
}))
