import { debug } from '../utils'
import type { Output } from '../output'
import type { SourceFile, Location } from '../error'
import { ParseError, locate } from '../error'
import type { TokenDefinition } from './tokens'
import { tok } from './tokens'

export type Span = Readonly<{
	file: SourceFile, start: number, end: number,
}>

export type TokenMatch = Readonly<{
	content: string,
	groups: (string | undefined)[],
	span: Span,
}>

// a literal string or a named token
export type Pattern = string | TokenDefinition

export function describe_pattern(pattern: Pattern) {
	if (typeof pattern !== 'string')
		return pattern.name
	return /^\w+$/.test(pattern) ? pattern : `\`${pattern}\``
}

export class Lexer {
	readonly file: SourceFile
	protected index = 0

	constructor(source: string, filename?: string) {
		this.file = { source, filename }
		this.skip()
	}

	get position() {
		return this.index
	}

	location(): Location {
		return locate(this.file.source, this.index)
	}

	skip() {
		const match = this.attempt(tok.skipped)
		if (match !== undefined)
			this.index = match.span.end
	}

	protected attempt(pattern: Pattern): TokenMatch | undefined {
		const { source } = this.file
		const start = this.index

		if (typeof pattern === 'string') {
			if (!source.startsWith(pattern, start))
				return undefined
			const end = start + pattern.length
			return { content: pattern, groups: [], span: { file: this.file, start, end } }
		}

		const { regex } = pattern
		regex.lastIndex = start
		const match = regex.exec(source)
		if (match === null)
			return undefined

		const [content, ...groups] = match
		return { content, groups, span: { file: this.file, start, end: start + content.length } }
	}

	peek(pattern: Pattern): TokenMatch | undefined {
		return this.attempt(pattern)
	}

	pop(pattern: Pattern, checked: true, skip_after?: boolean, message?: string): TokenMatch
	pop(pattern: Pattern, checked?: boolean, skip_after?: boolean, message?: string): TokenMatch | undefined
	pop(pattern: Pattern, checked = false, skip_after = true, message?: string): TokenMatch | undefined {
		const match = this.attempt(pattern)
		if (match === undefined) {
			if (checked)
				this.error(describe_pattern(pattern), message)
			return undefined
		}

		this.index = match.span.end
		if (skip_after)
			this.skip()
		return match
	}

	at_end() {
		return this.index >= this.file.source.length
	}

	exit() {
		if (!this.at_end())
			this.error('end of input')
	}

	error(expected: string, message?: string): never {
		throw new ParseError(
			this.file, this.index,
			message !== undefined ? message : `expected ${expected}, found ${this.get_next_source()}`,
		)
	}

	// writes everything from the cursor on, verbatim
	flush_remainder(output: Output) {
		const remainder = this.file.source.slice(this.index)
		if (remainder.length > 0)
			output.write(remainder)
		this.index = this.file.source.length
	}

	get_next_source() {
		return this.at_end()
			? 'end of input'
			: debug(this.file.source.slice(this.index, this.index + 30))
	}
}
