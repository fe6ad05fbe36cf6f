import { LogError } from '../utils'
import type { Output } from '../output'
import type { Builder, ArrayKind, NamedConstant } from './base'

export type PrettyPrintOptions = {
	// spaces per nesting level, 0 prints everything on one line
	indent: number,
	trailing_commas: boolean,
}

export type ScopeKind = ArrayKind | 'mapping' | 'set' | 'call'

type Scope = {
	kind: ScopeKind,
	count: number,
	hole_pending: boolean,
	last_was_hole: boolean,
	awaiting_key: boolean,
}

/**
 * Writes output as events arrive, never going back over what it wrote.
 *
 * Separators are speculative: after each element the text that would follow it
 * (a comma, a newline and indentation) is held in `spacer`, and only written once
 * the next thing printed shows whether the scope carries on or closes.
 */
export abstract class PrettyPrinter implements Builder<void> {
	protected readonly options: PrettyPrintOptions
	protected readonly scopes = [] as Scope[]
	protected spacer = ''
	// whether the output so far ends where another token could follow directly
	protected separated = true

	constructor(
		readonly output: Output,
		options: Partial<PrettyPrintOptions> = {},
	) {
		this.options = { indent: 4, trailing_commas: true, ...options }
	}

	protected print(text: string) {
		if (this.spacer !== '') {
			this.output.write(this.spacer)
			this.spacer = ''
			this.separated = true
		}
		if (text !== '') {
			this.output.write(text)
			this.separated = /[\s[({]$/.test(text)
		}
	}

	protected indent_string() {
		const { indent } = this.options
		return indent === 0
			? ''
			: '\n' + ' '.repeat(indent * this.scopes.length)
	}

	protected scope(): Scope {
		const scope = this.scopes[this.scopes.length - 1]
		if (scope === undefined)
			throw new LogError(['an element event arrived outside of any scope'])
		return scope
	}

	in_key_position() {
		const scope = this.scopes[this.scopes.length - 1]
		return scope !== undefined && scope.awaiting_key
	}

	protected open(kind: ScopeKind, bracket: string) {
		this.print(bracket)
		this.scopes.push({ kind, count: 0, hole_pending: false, last_was_hole: false, awaiting_key: kind === 'mapping' })
		this.spacer = this.indent_string()
	}

	protected element() {
		const scope = this.scope()
		scope.count++
		scope.last_was_hole = scope.hole_pending
		scope.hole_pending = false
		this.spacer = this.options.indent === 0
			? ', '
			: ',' + this.indent_string()
	}

	protected hole() {
		this.scope().hole_pending = true
	}

	protected close(bracket: string) {
		const scope = this.scope()
		this.scopes.pop()

		// a lone tuple element, or a final hole, would read differently without its comma
		const forced = (scope.kind === 'tuple' && scope.count === 1) || scope.last_was_hole
		if (scope.count === 0)
			this.spacer = ''
		else if (this.options.indent === 0)
			this.spacer = forced ? ',' : ''
		else
			this.spacer = (this.options.trailing_commas || forced ? ',' : '') + this.indent_string()

		this.print(bracket)
	}

	open_document() {
		this.scopes.splice(0, this.scopes.length)
		this.spacer = ''
		this.separated = true
	}
	close_document() {}

	array_element() {
		this.element()
	}
	close_array() {
		this.close(this.scope().kind === 'tuple' ? ')' : ']')
	}

	open_mapping() {
		this.open('mapping', '{')
	}
	mapping_key() {
		this.scope().awaiting_key = false
		this.print(': ')
	}
	mapping_value() {
		this.element()
		this.scope().awaiting_key = true
	}
	close_mapping() {
		this.close('}')
	}

	function_call_end_positional_arguments() {}
	function_call_start_keyword_arguments() {}
	function_call_end_keyword_arguments() {}

	// whatever is echoed after this must not run into the last token
	flush() {
		if (this.spacer === '' && this.scopes.length > 0 && !this.separated)
			this.spacer = ' '
		this.print('')
	}

	abstract float(raw: string, value: number): void
	abstract int(raw: string, value: number): void
	abstract bool(raw: string, value: boolean): void
	abstract null(raw: string): void
	abstract named_constant(raw: string, name: NamedConstant): void
	abstract string(raw: string, value: string): void
	abstract regex(raw: string, pattern: string, flags: string): void
	abstract raw_repr(raw: string): void
	abstract identifier(name: string): void
	abstract open_array(kind: ArrayKind): void
	abstract array_empty_slot(): void
	abstract open_set(): void
	abstract set_element(): void
	abstract close_set(): void
	abstract open_function_call(name: string): void
	abstract function_call_positional_argument(): void
	abstract function_call_keyword_argument_key(): void
	abstract function_call_keyword_argument_value(): void
	abstract close_function_call(): void
}
