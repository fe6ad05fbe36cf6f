import type { Output } from '../output'
import { StringOutput } from '../output'
import type { ArrayKind, NamedConstant } from './base'
import { bare_call_name } from './base'
import { PrettyPrinter } from './pretty_print'
import { normalize_number } from './value'
import type { BuilderCall } from '../runtime/recorder'
import {
	CallDispatcher, replay_call, replay_calls, is_opening, is_closing,
	split_call, split_elements,
} from '../runtime/recorder'

export type JsonPrintOptions = {
	indent: number,
	// escape every character beyond ASCII as \uXXXX
	ensure_ascii: boolean,
}

export function json_string(value: string, ensure_ascii = false) {
	const text = JSON.stringify(value)
	return ensure_ascii
		? text.replace(/[\u0080-\uffff]/g, char => '\\u' + char.charCodeAt(0).toString(16).padStart(4, '0'))
		: text
}

/**
 * Prints strict JSON straight from the parser's events.
 * Anything JSON can't express is written as a mapping under a `$`-prefixed sentinel key.
 */
export class JsonEmitter extends PrettyPrinter {
	protected readonly ensure_ascii: boolean

	constructor(output: Output, { indent = 4, ensure_ascii = false }: Partial<JsonPrintOptions> = {}) {
		super(output, { indent, trailing_commas: false })
		this.ensure_ascii = ensure_ascii
	}

	// a mapping key has to be a string, whatever it was written as
	protected scalar(json: string) {
		this.print(this.in_key_position() ? json_string(json, this.ensure_ascii) : json)
	}

	float(raw: string, _value: number) { this.scalar(normalize_number(raw)) }
	int(raw: string, _value: number) { this.scalar(normalize_number(raw)) }
	bool(_raw: string, value: boolean) { this.scalar(value ? 'true' : 'false') }
	null(_raw: string) { this.scalar('null') }

	string(_raw: string, value: string) {
		this.print(json_string(value, this.ensure_ascii))
	}
	named_constant(_raw: string, name: NamedConstant) {
		this.string(name, `$${name}`)
	}
	identifier(name: string) {
		this.string(name, `$$${name}`)
	}
	raw_repr(raw: string) {
		this.string(raw, `$repr${raw}`)
	}

	regex(_raw: string, pattern: string, flags: string) {
		this.open_mapping()
		this.string('$regex', '$regex')
		this.mapping_key()
		this.string(pattern, pattern)
		this.mapping_value()
		if (flags !== '') {
			this.string('$options', '$options')
			this.mapping_key()
			this.string(flags, flags)
			this.mapping_value()
		}
		this.close_mapping()
	}

	// tuples are lists in JSON
	open_array(_kind: ArrayKind) {
		this.open('list', '[')
	}
	array_empty_slot() {
		this.null('null')
	}

	open_set() {
		this.open_mapping()
		this.string('$set', '$set')
		this.mapping_key()
		this.open_array('list')
	}
	set_element() {
		this.array_element()
	}
	close_set() {
		this.close_array()
		this.mapping_value()
		this.close_mapping()
	}

	open_function_call(name: string) {
		this.open_tagged_call(`$$${name}`)
	}
	open_tagged_call(tag: string) {
		this.open_mapping()
		this.string(tag, tag)
		this.mapping_key()
		this.open_array('list')
	}
	function_call_positional_argument() {
		this.array_element()
	}
	function_call_end_positional_arguments() {
		this.close_array()
		this.mapping_value()
	}
	function_call_start_keyword_arguments() {
		this.string('$kwargs', '$kwargs')
		this.mapping_key()
		this.open_mapping()
	}
	function_call_keyword_argument_key() {
		this.mapping_key()
	}
	function_call_keyword_argument_value() {
		this.mapping_value()
	}
	function_call_end_keyword_arguments() {
		this.close_mapping()
		this.mapping_value()
	}
	close_function_call() {
		this.close_mapping()
	}
}


// the tag each call is printed under, if its encoding is a tagged one
const special_calls = new Map<string, string | undefined>([
	['Date', '$date'],
	['ObjectId', '$oid'],
	['OrderedDict', undefined],
])

function is_special_call(name: string) {
	return special_calls.has(bare_call_name(name))
}

type Capture = {
	kind: 'call' | 'key',
	depth: number,
	calls: BuilderCall[],
}

function pairs_of(calls: BuilderCall[]): [BuilderCall[], BuilderCall[]][] | undefined {
	const as_array = (segment: BuilderCall[]) => {
		const [first] = segment
		return segment.length >= 2 && first.type === 'open_array' && segment[segment.length - 1].type === 'close_array'
	}
	const hole: BuilderCall[] = [{ type: 'null', raw: 'null' }]

	if (!as_array(calls))
		return undefined
	const pairs = [] as [BuilderCall[], BuilderCall[]][]
	for (const element of split_elements(calls)) {
		if (element === undefined || !as_array(element))
			return undefined
		const items = split_elements(element)
		if (items.length !== 2)
			return undefined
		const [key = hole, value = hole] = items
		pairs.push([key, value])
	}
	return pairs
}

/**
 * JSON output for the whole grammar.
 *
 * Most events pass straight through to a `JsonEmitter`. Two things can't be printed
 * as they arrive: calls whose encoding depends on their arguments (`Date`, `ObjectId`,
 * `OrderedDict`), and composite mapping keys, which must become a single string.
 * Those are buffered until they close, then printed in their final form.
 */
export class JsonPrinter extends CallDispatcher {
	protected readonly emitter: JsonEmitter
	protected capture: Capture | undefined = undefined

	constructor(
		readonly output: Output,
		options: Partial<JsonPrintOptions> = {},
	) {
		super()
		this.emitter = new JsonEmitter(output, options)
	}

	protected handle(call: BuilderCall) {
		const { capture } = this
		if (capture !== undefined) {
			capture.calls.push(call)
			if (is_opening(call))
				capture.depth++
			else if (is_closing(call))
				capture.depth--
			if (capture.depth === 0) {
				this.capture = undefined
				this.finish(capture)
			}
			return
		}

		if (this.emitter.in_key_position() && call.type === 'regex') {
			this.composite_key([call])
			return
		}
		if (this.emitter.in_key_position() && is_opening(call)) {
			this.capture = { kind: 'key', depth: 1, calls: [call] }
			return
		}
		if (call.type === 'open_function_call' && is_special_call(call.name)) {
			this.capture = { kind: 'call', depth: 1, calls: [call] }
			return
		}

		replay_call(this.emitter, call)
	}

	protected finish({ kind, calls }: Capture) {
		if (kind === 'key')
			this.composite_key(calls)
		else
			this.special_call(calls)
	}

	protected composite_key(calls: BuilderCall[]) {
		const key = new StringOutput()
		const printer = new JsonPrinter(key, { indent: 0 })
		replay_calls(printer, calls)
		printer.flush()
		this.emitter.string(key.text, key.text)
	}

	protected special_call(calls: BuilderCall[]) {
		const [open] = calls
		const name = open.type === 'open_function_call' ? open.name : ''
		const bare = bare_call_name(name)
		const { positional, keyword } = split_call(calls)
		const lone = positional.length === 1 && keyword.length === 0 ? positional[0] : undefined

		const tag = special_calls.get(bare)
		if (tag !== undefined) {
			if (lone === undefined) {
				this.tagged_call(tag, calls)
				return
			}
			this.emitter.open_mapping()
			this.emitter.string(tag, tag)
			this.emitter.mapping_key()
			replay_calls(this, lone)
			this.emitter.mapping_value()
			this.emitter.close_mapping()
			return
		}

		if (positional.length === 0 && keyword.length === 0) {
			this.emitter.open_mapping()
			this.emitter.close_mapping()
			return
		}
		const pairs = lone !== undefined ? pairs_of(lone) : undefined
		if (pairs === undefined) {
			this.tagged_call(`$$${name}`, calls)
			return
		}
		this.emitter.open_mapping()
		for (const [key, value] of pairs) {
			replay_calls(this, key)
			this.emitter.mapping_key()
			replay_calls(this, value)
			this.emitter.mapping_value()
		}
		this.emitter.close_mapping()
	}

	// the generic encoding, under the given tag
	protected tagged_call(tag: string, calls: BuilderCall[]) {
		this.emitter.open_tagged_call(tag)
		replay_calls(this, calls.slice(1, -1))
		this.emitter.close_function_call()
	}

	flush() {
		const { capture } = this
		this.capture = undefined
		if (capture !== undefined)
			replay_calls(this.emitter, capture.calls)
		this.emitter.flush()
	}
}
