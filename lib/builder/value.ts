import type { Maybe } from '@ts-std/monads'
import { Some, None } from '@ts-std/monads'

import { LogError } from '../utils'
import { float_marker } from '../runtime/tokens'
import type { Builder, ArrayKind, NamedConstant } from './base'
import { bare_call_name } from './base'

// a number that remembers how it was written
export class NumberLiteral {
	constructor(
		readonly raw: string,
		readonly value: number,
	) {}

	// an integer a double can't hold exactly
	get is_unsafe_integer() {
		return !float_marker.test(this.raw) && !Number.isSafeInteger(this.value)
	}

	toJSON() {
		return this.value
	}
}

export type Value =
	| null
	| boolean
	| number
	| string
	| NumberLiteral
	| Value[]
	| { [key: string]: Value }

export type Mapping = { [key: string]: Value }

// JSON has no leading `+` and no leading zeros
export function normalize_number(raw: string) {
	return raw.replace(/^\+/, '').replace(/^(-?)0+(?=\d)/, '$1')
}

export function is_mapping(value: Value): value is Mapping {
	return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof NumberLiteral)
}

// plain assignment would treat `__proto__` as the prototype
export function set_entry(mapping: Mapping, key: string, value: Value) {
	Object.defineProperty(mapping, key, { value, enumerable: true, writable: true, configurable: true })
}

export type Entry = [string, Value]

// every mapping read from input, with its entries as written, repeats included
const written_entries = new WeakMap<Mapping, Entry[]>()

export function ordered_mapping(entries: Entry[]): Mapping {
	const mapping: Mapping = {}
	for (const [key, value] of entries)
		set_entry(mapping, key, value)
	written_entries.set(mapping, entries)
	return mapping
}

export function entries_of(mapping: Mapping): Entry[] {
	const entries = written_entries.get(mapping)
	return entries !== undefined ? entries : Object.entries(mapping)
}

export function to_json_text(value: Value): string {
	if (value === null || typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string')
		return JSON.stringify(value)
	if (value instanceof NumberLiteral)
		return normalize_number(value.raw)
	if (Array.isArray(value))
		return `[${value.map(to_json_text).join(', ')}]`

	const entries = entries_of(value).map(([key, entry]) => `${JSON.stringify(key)}: ${to_json_text(entry)}`)
	return `{${entries.join(', ')}}`
}

export function key_to_string(value: Value) {
	return typeof value === 'string' ? value : to_json_text(value)
}

export function strip_number_text(value: Value): Value {
	if (value instanceof NumberLiteral)
		return value.is_unsafe_integer ? value : value.value
	if (Array.isArray(value))
		return value.map(strip_number_text)
	if (!is_mapping(value))
		return value

	return ordered_mapping(entries_of(value).map(([key, entry]): Entry => [key, strip_number_text(entry)]))
}

function tagged(tag: string, value: Value): Mapping {
	const mapping: Mapping = {}
	set_entry(mapping, tag, value)
	return mapping
}

function pairs_of(value: Value): [Value, Value][] | undefined {
	if (!Array.isArray(value))
		return undefined
	const pairs = [] as [Value, Value][]
	for (const item of value) {
		if (!Array.isArray(item) || item.length !== 2)
			return undefined
		pairs.push([item[0], item[1]])
	}
	return pairs
}

export function function_call_value(name: string, positional: Value[], keyword: Mapping): Value {
	const has_keywords = Object.keys(keyword).length > 0
	const generic = (tag: string) => {
		const mapping = tagged(tag, positional)
		if (has_keywords)
			set_entry(mapping, '$kwargs', keyword)
		return mapping
	}

	const bare = bare_call_name(name)
	switch (bare) {
		case 'Date':
		case 'ObjectId': {
			const tag = bare === 'Date' ? '$date' : '$oid'
			return positional.length === 1 && !has_keywords
				? tagged(tag, positional[0])
				: generic(tag)
		}
		case 'OrderedDict': {
			if (positional.length === 0 && !has_keywords)
				return ordered_mapping([])
			const pairs = positional.length === 1 && !has_keywords ? pairs_of(positional[0]) : undefined
			if (pairs === undefined)
				break
			return ordered_mapping(pairs.map(([key, value]): Entry => [key_to_string(key), value]))
		}
	}

	return generic(`$$${name}`)
}


type Frame =
	| { type: 'array', kind: ArrayKind, items: Value[] }
	| { type: 'set', items: Value[] }
	| { type: 'mapping', entries: Entry[], key: Maybe<string> }
	| { type: 'call', name: string, positional: Value[], keyword: Entry[], key: Maybe<string> }

type FrameOf<T extends Frame['type']> = Extract<Frame, { type: T }>

function is_frame<T extends Frame['type']>(frame: Frame | undefined, type: T): frame is FrameOf<T> {
	return frame !== undefined && frame.type === type
}

export type ValueBuilderOptions = {
	// keep every number as a NumberLiteral instead of a plain number
	keep_number_text: boolean,
}

/**
 * Assembles plain data from the parser's events.
 * Composites are built on a stack of frames; a finished composite is pushed onto
 * the value stack just like a scalar, for its parent to collect.
 */
export class ValueBuilder implements Builder<Value> {
	protected readonly options: ValueBuilderOptions
	protected frames = [] as Frame[]
	protected values = [] as Value[]

	constructor(options: Partial<ValueBuilderOptions> = {}) {
		this.options = { keep_number_text: false, ...options }
	}

	protected frame<T extends Frame['type']>(type: T): FrameOf<T> {
		const frame = this.frames[this.frames.length - 1]
		if (!is_frame(frame, type))
			throw new LogError([`expected to be inside a ${type}, but the frame stack was:`, this.frames])
		return frame
	}

	protected close<T extends Frame['type']>(type: T): FrameOf<T> {
		const frame = this.frame(type)
		this.frames.pop()
		return frame
	}

	protected pop_value(): Value {
		if (this.values.length === 0)
			throw new LogError(['expected a finished value, but there was none'])
		const value = this.values[this.values.length - 1]
		this.values.pop()
		return value
	}

	protected push(value: Value) {
		this.values.push(value)
	}

	float(raw: string, value: number) { this.push(new NumberLiteral(raw, value)) }
	int(raw: string, value: number) { this.push(new NumberLiteral(raw, value)) }
	bool(_raw: string, value: boolean) { this.push(value) }
	null(_raw: string) { this.push(null) }
	named_constant(_raw: string, name: NamedConstant) { this.push(`$${name}`) }
	string(_raw: string, value: string) { this.push(value) }
	raw_repr(raw: string) { this.push(`$repr${raw}`) }
	identifier(name: string) { this.push(`$$${name}`) }

	regex(_raw: string, pattern: string, flags: string) {
		const value = tagged('$regex', pattern)
		if (flags !== '')
			set_entry(value, '$options', flags)
		this.push(value)
	}

	open_document() {
		this.frames = []
		this.values = []
	}

	close_document(): Value {
		const value = this.pop_value()
		if (this.frames.length !== 0 || this.values.length !== 0)
			throw new LogError(['the document closed with unfinished state:', this.frames, this.values])
		return this.options.keep_number_text ? value : strip_number_text(value)
	}

	open_array(kind: ArrayKind) {
		this.frames.push({ type: 'array', kind, items: [] })
	}
	array_element() {
		const value = this.pop_value()
		this.frame('array').items.push(value)
	}
	array_empty_slot() {
		this.push(null)
	}
	close_array() {
		this.push(this.close('array').items)
	}

	open_mapping() {
		this.frames.push({ type: 'mapping', entries: [], key: None })
	}
	mapping_key() {
		const key = key_to_string(this.pop_value())
		this.frame('mapping').key = Some(key)
	}
	mapping_value() {
		const value = this.pop_value()
		const frame = this.frame('mapping')
		const key = frame.key.expect('a mapping value arrived without a key')
		frame.entries.push([key, value])
		frame.key = None
	}
	close_mapping() {
		const frame = this.close('mapping')
		if (frame.key.is_some())
			throw new LogError(['a mapping closed with a dangling key:', frame.key.unwrap()])
		this.push(ordered_mapping(frame.entries))
	}

	open_set() {
		this.frames.push({ type: 'set', items: [] })
	}
	set_element() {
		const value = this.pop_value()
		this.frame('set').items.push(value)
	}
	close_set() {
		this.push(tagged('$set', this.close('set').items))
	}

	open_function_call(name: string) {
		this.frames.push({ type: 'call', name, positional: [], keyword: [], key: None })
	}
	function_call_positional_argument() {
		const value = this.pop_value()
		this.frame('call').positional.push(value)
	}
	function_call_end_positional_arguments() {}
	function_call_start_keyword_arguments() {}
	function_call_keyword_argument_key() {
		const key = key_to_string(this.pop_value())
		this.frame('call').key = Some(key)
	}
	function_call_keyword_argument_value() {
		const value = this.pop_value()
		const frame = this.frame('call')
		const key = frame.key.expect('a keyword argument value arrived without a key')
		frame.keyword.push([key, value])
		frame.key = None
	}
	function_call_end_keyword_arguments() {}
	close_function_call() {
		const { name, positional, keyword, key } = this.close('call')
		if (key.is_some())
			throw new LogError(['a function call closed with a dangling keyword:', key.unwrap()])
		this.push(function_call_value(name, positional, ordered_mapping(keyword)))
	}

	flush() {}
}
