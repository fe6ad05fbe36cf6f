import 'mocha'
import { expect } from 'chai'

import { StringOutput, translate, VerbatimPrinter } from '../lib'

const SPANNER = `<"'>`

const document = `[ 1 , { "a" : 2 , "b" : [ ] } , { 3 , 4 } , ( 5 , ) , f( 6 , k = 7 ) , 'x' ]`

function format(source: string, single_document = false) {
	const output = new StringOutput()
	const result = translate(new VerbatimPrinter(output, { indent: 4 }), source, single_document)
	return { text: output.text, ok: result.is_ok() }
}

describe('recovery', () => {
	const expected = format(document, true)
	it('the document itself is well formed', () => {
		expect(expected.ok).true
	})

	// wherever a broken token lands, the output up to it is formatted and the rest is kept as it was
	const gaps = [...document].flatMap((char, index) => char === ' ' ? [index] : [])
	for (const gap of [0, ...gaps, document.length]) {
		it(`a spanner at ${gap}`, () => {
			const broken = document.slice(0, gap) + SPANNER + document.slice(gap)
			const { text, ok } = format(broken, true)
			expect(ok).false

			const index = text.indexOf(SPANNER)
			expect(index).not.equal(-1)
			const repaired = text.slice(0, index) + text.slice(index + SPANNER.length)
			expect(format(repaired, true)).eql(expected)
		})
	}
})
