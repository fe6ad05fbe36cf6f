export type ArrayKind = 'list' | 'tuple'

export const named_constants = ['undefined', 'NotImplemented', 'NaN', 'Infinity'] as const
export type NamedConstant = typeof named_constants[number]

export function is_named_constant(raw: string): raw is NamedConstant {
	return named_constants.some(name => name === raw)
}

/**
 * Receives the events of one parse, in document order.
 * Scalar events always carry their source spelling as `raw`, so a builder can choose
 * between reproducing the input and normalizing it.
 */
export interface Builder<R = void> {
	float(raw: string, value: number): void
	int(raw: string, value: number): void
	bool(raw: string, value: boolean): void
	null(raw: string): void
	named_constant(raw: string, name: NamedConstant): void
	string(raw: string, value: string): void
	regex(raw: string, pattern: string, flags: string): void
	raw_repr(raw: string): void
	identifier(name: string): void

	open_document(): void
	close_document(): R

	open_array(kind: ArrayKind): void
	array_element(): void
	array_empty_slot(): void
	close_array(): void

	open_mapping(): void
	mapping_key(): void
	mapping_value(): void
	close_mapping(): void

	open_set(): void
	set_element(): void
	close_set(): void

	open_function_call(name: string): void
	function_call_positional_argument(): void
	function_call_end_positional_arguments(): void
	function_call_start_keyword_arguments(): void
	function_call_keyword_argument_key(): void
	function_call_keyword_argument_value(): void
	function_call_end_keyword_arguments(): void
	close_function_call(): void

	// write whatever is still pending
	flush(): void
}

export class NullBuilder implements Builder<void> {
	float(_raw: string, _value: number) {}
	int(_raw: string, _value: number) {}
	bool(_raw: string, _value: boolean) {}
	null(_raw: string) {}
	named_constant(_raw: string, _name: NamedConstant) {}
	string(_raw: string, _value: string) {}
	regex(_raw: string, _pattern: string, _flags: string) {}
	raw_repr(_raw: string) {}
	identifier(_name: string) {}

	open_document() {}
	close_document() {}

	open_array(_kind: ArrayKind) {}
	array_element() {}
	array_empty_slot() {}
	close_array() {}

	open_mapping() {}
	mapping_key() {}
	mapping_value() {}
	close_mapping() {}

	open_set() {}
	set_element() {}
	close_set() {}

	open_function_call(_name: string) {}
	function_call_positional_argument() {}
	function_call_end_positional_arguments() {}
	function_call_start_keyword_arguments() {}
	function_call_keyword_argument_key() {}
	function_call_keyword_argument_value() {}
	function_call_end_keyword_arguments() {}
	close_function_call() {}

	flush() {}
}

// special-cased constructors are recognized with or without `new`
export function bare_call_name(name: string) {
	return name.replace(/^new\s+/, '')
}
