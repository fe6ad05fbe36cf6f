import { tuple as t } from '@ts-std/types'

import { exhaustive } from '../utils'
import type { Builder, ArrayKind, NamedConstant } from '../builder/base'

export type BuilderCall =
	| { type: 'float', raw: string, value: number }
	| { type: 'int', raw: string, value: number }
	| { type: 'bool', raw: string, value: boolean }
	| { type: 'null', raw: string }
	| { type: 'named_constant', raw: string, name: NamedConstant }
	| { type: 'string', raw: string, value: string }
	| { type: 'regex', raw: string, pattern: string, flags: string }
	| { type: 'raw_repr', raw: string }
	| { type: 'identifier', name: string }
	| { type: 'open_document' }
	| { type: 'close_document' }
	| { type: 'open_array', kind: ArrayKind }
	| { type: 'array_element' }
	| { type: 'array_empty_slot' }
	| { type: 'close_array' }
	| { type: 'open_mapping' }
	| { type: 'mapping_key' }
	| { type: 'mapping_value' }
	| { type: 'close_mapping' }
	| { type: 'open_set' }
	| { type: 'set_element' }
	| { type: 'close_set' }
	| { type: 'open_function_call', name: string }
	| { type: 'function_call_positional_argument' }
	| { type: 'function_call_end_positional_arguments' }
	| { type: 'function_call_start_keyword_arguments' }
	| { type: 'function_call_keyword_argument_key' }
	| { type: 'function_call_keyword_argument_value' }
	| { type: 'function_call_end_keyword_arguments' }
	| { type: 'close_function_call' }

export type CallType = BuilderCall['type']

export function replay_call(builder: Builder<unknown>, call: BuilderCall): void {
	switch (call.type) {
		case 'float': return builder.float(call.raw, call.value)
		case 'int': return builder.int(call.raw, call.value)
		case 'bool': return builder.bool(call.raw, call.value)
		case 'null': return builder.null(call.raw)
		case 'named_constant': return builder.named_constant(call.raw, call.name)
		case 'string': return builder.string(call.raw, call.value)
		case 'regex': return builder.regex(call.raw, call.pattern, call.flags)
		case 'raw_repr': return builder.raw_repr(call.raw)
		case 'identifier': return builder.identifier(call.name)
		case 'open_document': return builder.open_document()
		case 'close_document': builder.close_document(); return
		case 'open_array': return builder.open_array(call.kind)
		case 'array_element': return builder.array_element()
		case 'array_empty_slot': return builder.array_empty_slot()
		case 'close_array': return builder.close_array()
		case 'open_mapping': return builder.open_mapping()
		case 'mapping_key': return builder.mapping_key()
		case 'mapping_value': return builder.mapping_value()
		case 'close_mapping': return builder.close_mapping()
		case 'open_set': return builder.open_set()
		case 'set_element': return builder.set_element()
		case 'close_set': return builder.close_set()
		case 'open_function_call': return builder.open_function_call(call.name)
		case 'function_call_positional_argument': return builder.function_call_positional_argument()
		case 'function_call_end_positional_arguments': return builder.function_call_end_positional_arguments()
		case 'function_call_start_keyword_arguments': return builder.function_call_start_keyword_arguments()
		case 'function_call_keyword_argument_key': return builder.function_call_keyword_argument_key()
		case 'function_call_keyword_argument_value': return builder.function_call_keyword_argument_value()
		case 'function_call_end_keyword_arguments': return builder.function_call_end_keyword_arguments()
		case 'close_function_call': return builder.close_function_call()
		default: return exhaustive(call)
	}
}

export function replay_calls(builder: Builder<unknown>, calls: BuilderCall[]) {
	for (const call of calls)
		replay_call(builder, call)
}


// turns every Builder method into a BuilderCall handed to `handle`
export abstract class CallDispatcher implements Builder<void> {
	protected abstract handle(call: BuilderCall): void

	float(raw: string, value: number) { this.handle({ type: 'float', raw, value }) }
	int(raw: string, value: number) { this.handle({ type: 'int', raw, value }) }
	bool(raw: string, value: boolean) { this.handle({ type: 'bool', raw, value }) }
	null(raw: string) { this.handle({ type: 'null', raw }) }
	named_constant(raw: string, name: NamedConstant) { this.handle({ type: 'named_constant', raw, name }) }
	string(raw: string, value: string) { this.handle({ type: 'string', raw, value }) }
	regex(raw: string, pattern: string, flags: string) { this.handle({ type: 'regex', raw, pattern, flags }) }
	raw_repr(raw: string) { this.handle({ type: 'raw_repr', raw }) }
	identifier(name: string) { this.handle({ type: 'identifier', name }) }

	open_document() { this.handle({ type: 'open_document' }) }
	close_document() { this.handle({ type: 'close_document' }) }

	open_array(kind: ArrayKind) { this.handle({ type: 'open_array', kind }) }
	array_element() { this.handle({ type: 'array_element' }) }
	array_empty_slot() { this.handle({ type: 'array_empty_slot' }) }
	close_array() { this.handle({ type: 'close_array' }) }

	open_mapping() { this.handle({ type: 'open_mapping' }) }
	mapping_key() { this.handle({ type: 'mapping_key' }) }
	mapping_value() { this.handle({ type: 'mapping_value' }) }
	close_mapping() { this.handle({ type: 'close_mapping' }) }

	open_set() { this.handle({ type: 'open_set' }) }
	set_element() { this.handle({ type: 'set_element' }) }
	close_set() { this.handle({ type: 'close_set' }) }

	open_function_call(name: string) { this.handle({ type: 'open_function_call', name }) }
	function_call_positional_argument() { this.handle({ type: 'function_call_positional_argument' }) }
	function_call_end_positional_arguments() { this.handle({ type: 'function_call_end_positional_arguments' }) }
	function_call_start_keyword_arguments() { this.handle({ type: 'function_call_start_keyword_arguments' }) }
	function_call_keyword_argument_key() { this.handle({ type: 'function_call_keyword_argument_key' }) }
	function_call_keyword_argument_value() { this.handle({ type: 'function_call_keyword_argument_value' }) }
	function_call_end_keyword_arguments() { this.handle({ type: 'function_call_end_keyword_arguments' }) }
	close_function_call() { this.handle({ type: 'close_function_call' }) }

	flush() {}
}

/**
 * Buffers builder calls so the parser can decide what they meant before committing them.
 * Recorders nest: the host of one recorder may be another.
 */
export class Recorder extends CallDispatcher {
	readonly calls = [] as BuilderCall[]

	constructor(readonly host: Builder<unknown>) {
		super()
	}

	protected handle(call: BuilderCall) {
		this.calls.push(call)
	}

	replay(host: Builder<unknown> = this.host) {
		replay_calls(host, this.calls)
	}
}


const opening_calls: CallType[] = ['open_array', 'open_mapping', 'open_set', 'open_function_call']
const closing_calls: CallType[] = ['close_array', 'close_mapping', 'close_set', 'close_function_call']

export function is_opening(call: BuilderCall) {
	return opening_calls.includes(call.type)
}

export function is_closing(call: BuilderCall) {
	return closing_calls.includes(call.type)
}

// given the calls of one complete composite, from its open to its close,
// gathers the calls of each direct child along with the boundary call that ended it
export function split_children(
	calls: BuilderCall[],
	boundaries: CallType[],
): [CallType, BuilderCall[]][] {
	const segments = [] as [CallType, BuilderCall[]][]
	let current = [] as BuilderCall[]
	let depth = 0

	for (const call of calls.slice(1, -1)) {
		if (depth === 0 && boundaries.includes(call.type)) {
			segments.push(t(call.type, current))
			current = []
			continue
		}

		if (is_opening(call)) depth++
		else if (is_closing(call)) depth--
		current.push(call)
	}

	return segments
}

export type SplitCall = {
	positional: BuilderCall[][],
	keyword: [BuilderCall[], BuilderCall[]][],
}

export function split_call(calls: BuilderCall[]): SplitCall {
	const positional = [] as BuilderCall[][]
	const keyword = [] as [BuilderCall[], BuilderCall[]][]
	let key = [] as BuilderCall[]

	const segments = split_children(calls, [
		'function_call_positional_argument',
		'function_call_end_positional_arguments',
		'function_call_start_keyword_arguments',
		'function_call_keyword_argument_key',
		'function_call_keyword_argument_value',
		'function_call_end_keyword_arguments',
	])
	for (const [boundary, segment] of segments) {
		switch (boundary) {
			case 'function_call_positional_argument':
				positional.push(segment)
				break
			case 'function_call_keyword_argument_key':
				key = segment
				break
			case 'function_call_keyword_argument_value':
				keyword.push(t(key, segment))
				break
		}
	}

	return { positional, keyword }
}

// `undefined` marks a hole
export function split_elements(calls: BuilderCall[]): (BuilderCall[] | undefined)[] {
	return split_children(calls, ['array_element']).map(([, segment]) => {
		return segment.length === 1 && segment[0].type === 'array_empty_slot'
			? undefined
			: segment
	})
}
