import chalk from 'chalk'

export type SourceFile = Readonly<{
	source: string, filename?: string,
}>

export type Location = Readonly<{ line: number, column: number }>

export function locate(source: string, index: number): Location {
	let line = 1
	let line_start = 0
	for (let i = 0; i < index && i < source.length; i++) {
		if (source[i] !== '\n') continue
		line++
		line_start = i + 1
	}
	return { line, column: index - line_start + 1 }
}

export class ParseError extends Error {
	readonly name = 'ParseError'
	constructor(
		readonly file: SourceFile,
		readonly index: number,
		readonly description: string,
	) {
		super(`Position ${index}: ${description}`)
	}

	location(): Location {
		return locate(this.file.source, this.index)
	}
}


const WINDOW = 80

function window_line(line: string, column: number) {
	const flat = (text: string) => text.replace(/\t/g, '  ')
	if (line.length <= WINDOW)
		return { text: flat(line), prefix: flat(line.slice(0, column - 1)) }

	const start = Math.max(0, Math.min(column - 1 - WINDOW / 2, line.length - WINDOW))
	const end = start + WINDOW
	const lead = start > 0 ? '...' : ''
	const tail = end < line.length ? '...' : ''
	return {
		text: lead + flat(line.slice(start, end)) + tail,
		prefix: lead + flat(line.slice(start, column - 1)),
	}
}

export function format_error(error: ParseError, level: chalk.Level = chalk.level): string {
	const paint = new chalk.Instance({ level })
	const err = paint.red.bold
	const bold = paint.white.bold
	const info = paint.blue.bold
	const file = paint.magentaBright.bold
	const pos = paint.cyanBright.bold

	const { source, filename } = error.file
	const { line, column } = error.location()
	const line_start = error.index - (column - 1)
	const line_end = source.indexOf('\n', line_start)
	const source_line = source.slice(line_start, line_end === -1 ? undefined : line_end)
	const { text, prefix } = window_line(source_line, column)

	const width = line.toString().length
	const margin = (insert: string) => info(`${insert} |`)
	const blank = ' '.repeat(width)

	return [
		err('error') + bold(`: ${error.description}`),
		`${blank}${info('-->')} ${file(filename || '<input>')}:${pos(line)}:${pos(column)}`,
		margin(blank),
		`${margin(line.toString())} ${text}`,
		`${margin(blank)} ${' '.repeat(prefix.length)}${err('^')}`,
	].join('\n')
}
