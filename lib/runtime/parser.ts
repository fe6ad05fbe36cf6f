import type { Builder } from '../builder/base'
import { is_named_constant } from '../builder/base'
import { ParseError } from '../error'
import type { Lexer, Pattern } from './lexer'
import { Recorder } from './recorder'
import { tok, float_marker, unescape } from './tokens'

export const EXPECTED_KWARG = 'positional argument follows keyword argument'

/**
 * Recursive descent over the lexer, reporting what it finds to a builder as it goes.
 * Nothing is held in memory beyond the short lookahead needed to tell a set from a mapping.
 */
export class Parser<R> {
	protected builder: Builder<unknown>

	constructor(
		readonly lexer: Lexer,
		readonly root: Builder<R>,
	) {
		this.builder = root
	}

	document(): R {
		this.root.open_document()
		this.expression(true)
		return this.root.close_document()
	}

	// `fn` runs with every builder call buffered into `recorder`
	record_builder_calls<T>(recorder: Recorder, fn: () => T): T {
		const previous = this.builder
		this.builder = recorder
		try {
			return fn()
		}
		finally {
			this.builder = previous
		}
	}

	expression(checked = false, is_mapping_key = false): boolean {
		const { lexer } = this

		if (lexer.pop('[')) {
			this.builder.open_array('list')
			this.comma_separated_list(']', () => this.builder.array_element(), false, true)
			this.builder.close_array()
			return true
		}

		if (lexer.pop('(')) {
			this.builder.open_array('tuple')
			this.comma_separated_list(')', () => this.builder.array_element(), true, false)
			this.builder.close_array()
			return true
		}

		if (lexer.pop('{')) {
			this.mapping_or_set()
			return true
		}

		if (lexer.peek("'")) {
			const { content, groups: [body = ''] } = lexer.pop(tok.single_quoted, true)
			this.builder.string(content, unescape(body))
			return true
		}

		if (lexer.peek('"')) {
			const { content, groups: [body = ''] } = lexer.pop(tok.double_quoted, true)
			this.builder.string(content, unescape(body))
			return true
		}

		// patterns are kept as text, never compiled
		if (lexer.peek('/')) {
			const { content, groups: [pattern = '', flags = ''] } = lexer.pop(tok.regex, true)
			this.builder.regex(content, unescape(pattern), flags)
			return true
		}

		const number = lexer.pop(tok.number)
		if (number !== undefined) {
			const raw = number.content
			if (float_marker.test(raw))
				this.builder.float(raw, Number(raw))
			else
				this.builder.int(raw, Number(raw))
			return true
		}

		const bool = lexer.pop(tok.bool)
		if (bool !== undefined) {
			this.builder.bool(bool.content, bool.content[0].toLowerCase() === 't')
			return true
		}

		const null_match = lexer.pop(tok.null)
		if (null_match !== undefined) {
			this.builder.null(null_match.content)
			return true
		}

		const constant = lexer.pop(tok.named_constant)
		if (constant !== undefined && is_named_constant(constant.content)) {
			this.builder.named_constant(constant.content, constant.content)
			return true
		}

		const call = lexer.pop(tok.function_call)
		if (call !== undefined) {
			const [name = ''] = call.groups
			this.function_call(name.replace(/^new\s+/, 'new '))
			return true
		}

		const identifier = lexer.pop(tok.identifier)
		if (identifier !== undefined) {
			const raw = identifier.content
			if (is_mapping_key)
				this.builder.string(raw, raw)
			else
				this.builder.identifier(raw)
			return true
		}

		if (lexer.peek('<')) {
			this.builder.raw_repr(lexer.pop(tok.python_repr, true).content)
			return true
		}

		if (checked)
			lexer.error(is_mapping_key ? 'key' : 'expression')
		return false
	}

	protected comma_separated_list(
		end: Pattern,
		element: () => void,
		needs_comma: boolean,
		allow_holes: boolean,
	) {
		const { lexer } = this
		let count = 0
		while (!lexer.peek(end)) {
			if (allow_holes && lexer.pop(',')) {
				this.builder.array_empty_slot()
				element()
				continue
			}

			this.expression(true)
			count++
			if (lexer.peek(',') || lexer.peek(end))
				element()
			if (!lexer.pop(',', needs_comma && count === 1))
				break
		}
		lexer.pop(end, true)
	}

	protected mapping_or_set() {
		const { lexer } = this

		if (lexer.pop('}')) {
			this.builder.open_mapping()
			this.builder.close_mapping()
			return
		}

		const recorder = new Recorder(this.builder)
		let have_element: boolean
		try {
			have_element = this.record_builder_calls(recorder, () => this.expression(false, true))
		}
		catch (e) {
			if (e instanceof ParseError) {
				// everything consumed so far still has to reach the output
				this.builder.open_mapping()
				recorder.replay()
			}
			throw e
		}

		if (have_element && (lexer.pop(',') || lexer.peek('}')))
			this.continue_set(recorder)
		else
			this.continue_mapping(have_element, recorder)
	}

	protected continue_set(recorder: Recorder) {
		this.builder.open_set()

		// a bare word read as a mapping key turns out to be an identifier
		const [first] = recorder.calls
		if (recorder.calls.length === 1 && first.type === 'string' && first.raw === first.value)
			this.builder.identifier(first.raw)
		else
			recorder.replay()

		this.builder.set_element()
		this.comma_separated_list('}', () => this.builder.set_element(), false, false)
		this.builder.close_set()
	}

	protected continue_mapping(have_first_key: boolean, recorder: Recorder) {
		const { lexer } = this

		this.builder.open_mapping()
		recorder.replay()
		if (!have_first_key)
			this.expression(true, true)

		lexer.pop(':', true)
		this.builder.mapping_key()
		this.expression(true)

		while (true) {
			if (lexer.peek(',') || lexer.peek('}'))
				this.builder.mapping_value()
			if (!lexer.pop(',') || lexer.peek('}'))
				break

			this.expression(true, true)
			lexer.pop(':', true)
			this.builder.mapping_key()
			this.expression(true)
		}

		lexer.pop('}', true)
		this.builder.close_mapping()
	}

	protected function_call(name: string) {
		const { lexer } = this
		let have_reached_keywords = false

		this.builder.open_function_call(name)
		while (!lexer.peek(')')) {
			const key = lexer.pop(tok.keyword_key)
			if (key !== undefined) {
				const [raw = ''] = key.groups
				if (!have_reached_keywords) {
					have_reached_keywords = true
					this.builder.function_call_end_positional_arguments()
					this.builder.function_call_start_keyword_arguments()
				}
				this.builder.string(raw, raw)
				this.builder.function_call_keyword_argument_key()
				this.expression(true)
				if (lexer.peek(',') || lexer.peek(')'))
					this.builder.function_call_keyword_argument_value()
			}
			else {
				if (have_reached_keywords)
					lexer.error('keyword argument', EXPECTED_KWARG)
				this.expression(true)
				if (lexer.peek(',') || lexer.peek(')'))
					this.builder.function_call_positional_argument()
			}

			if (!lexer.pop(','))
				break
		}
		lexer.pop(')', true)

		if (have_reached_keywords)
			this.builder.function_call_end_keyword_arguments()
		else
			this.builder.function_call_end_positional_arguments()
		this.builder.close_function_call()
	}
}
