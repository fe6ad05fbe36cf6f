import type { ArrayKind, NamedConstant } from './base'
import { PrettyPrinter } from './pretty_print'

// reprints every token as it was written, normalizing only whitespace and commas
export class VerbatimPrinter extends PrettyPrinter {
	float(raw: string, _value: number) { this.print(raw) }
	int(raw: string, _value: number) { this.print(raw) }
	bool(raw: string, _value: boolean) { this.print(raw) }
	null(raw: string) { this.print(raw) }
	named_constant(raw: string, _name: NamedConstant) { this.print(raw) }
	string(raw: string, _value: string) { this.print(raw) }
	regex(raw: string, _pattern: string, _flags: string) { this.print(raw) }
	raw_repr(raw: string) { this.print(raw) }
	identifier(name: string) { this.print(name) }

	open_array(kind: ArrayKind) {
		this.open(kind, kind === 'tuple' ? '(' : '[')
	}
	array_empty_slot() {
		// nothing to print, but the separator before it is owed
		this.print('')
		this.hole()
	}

	open_set() {
		this.open('set', '{')
	}
	set_element() {
		this.element()
	}
	close_set() {
		this.close('}')
	}

	open_function_call(name: string) {
		this.open('call', `${name}(`)
	}
	function_call_positional_argument() {
		this.element()
	}
	function_call_keyword_argument_key() {
		this.print('=')
	}
	function_call_keyword_argument_value() {
		this.element()
	}
	close_function_call() {
		this.close(')')
	}
}
