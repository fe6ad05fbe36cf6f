#!/usr/bin/env node
import { readFileSync } from 'fs'
import { TextDecoder } from 'util'
import chalk from 'chalk'
import type { Result } from '@ts-std/monads'
import { Ok, Err } from '@ts-std/monads'

import type { Output } from './output'
import { format_error } from './error'
import { translate, validate } from './translate'
import { JsonPrinter } from './builder/json_printer'
import { VerbatimPrinter } from './builder/verbatim'

export const USAGE = `usage: jsonoid [options] [file]

Pretty-print JSON and JSON-ish data read from file, or from stdin.

options:
  -i, --indent N              indent each level by N spaces, 0 prints one line (default: 4)
  -f, --flatten               print each document on one line, same as -i 0
  -j, --json-output           convert the data to strict JSON
  -T, --no-trailing-commas    no trailing comma after the last item of a sequence
      --single-document       require the input to hold exactly one document
      --ensure-ascii          escape non-ASCII characters in JSON output as \\uXXXX
  -c, --check                 only check the input, print nothing
  -I, --input-encoding ENC    encoding of the input (default: utf-8)
  -O, --output-encoding ENC   encoding of the output (default: utf8)
  -h, --help                  show this message
`

export type CliOptions = {
	indent: number,
	flatten: boolean,
	json_output: boolean,
	trailing_commas: boolean,
	single_document: boolean,
	ensure_ascii: boolean,
	check: boolean,
	input_encoding: string,
	output_encoding: BufferEncoding,
	file: string | undefined,
	help: boolean,
}

export const default_options: CliOptions = {
	indent: 4,
	flatten: false,
	json_output: false,
	trailing_commas: true,
	single_document: false,
	ensure_ascii: false,
	check: false,
	input_encoding: 'utf-8',
	output_encoding: 'utf8',
	file: undefined,
	help: false,
}

type Flag = Exclude<{ [K in keyof CliOptions]: CliOptions[K] extends boolean ? K : never }[keyof CliOptions], 'trailing_commas'>

const flags: Record<string, Flag | 'no_trailing_commas'> = {
	'-f': 'flatten', '--flatten': 'flatten',
	'-j': 'json_output', '--json-output': 'json_output',
	'-T': 'no_trailing_commas', '--no-trailing-commas': 'no_trailing_commas',
	'--single-document': 'single_document',
	'--ensure-ascii': 'ensure_ascii',
	'-c': 'check', '--check': 'check',
	'-h': 'help', '--help': 'help',
}

const valued = {
	'-i': 'indent', '--indent': 'indent',
	'-I': 'input_encoding', '--input-encoding': 'input_encoding',
	'-O': 'output_encoding', '--output-encoding': 'output_encoding',
} as const

function is_valued(arg: string): arg is keyof typeof valued {
	return arg in valued
}

function is_decodable(encoding: string) {
	try {
		new TextDecoder(encoding)
		return true
	}
	catch (e) {
		if (e instanceof RangeError)
			return false
		throw e
	}
}

export function parse_command_line(args: string[]): Result<CliOptions, string> {
	const options = { ...default_options }
	let indent_given = false

	for (let index = 0; index < args.length; index++) {
		const arg = args[index]
		const [name, inline]: [string, string | undefined] = arg.startsWith('--') && arg.includes('=')
			? [arg.slice(0, arg.indexOf('=')), arg.slice(arg.indexOf('=') + 1)]
			: [arg, undefined]

		const flag = flags[name]
		if (flag !== undefined) {
			if (inline !== undefined)
				return Err(`argument ${name}: takes no value`)
			if (flag === 'no_trailing_commas')
				options.trailing_commas = false
			else
				options[flag] = true
			continue
		}

		if (is_valued(name)) {
			const value = inline !== undefined ? inline : args[++index]
			if (value === undefined)
				return Err(`argument ${name}: expected a value`)

			switch (valued[name]) {
				case 'indent':
					if (!/^\d+$/.test(value))
						return Err(`argument ${name}: invalid indent: ${value}`)
					options.indent = parseInt(value, 10)
					indent_given = true
					break
				case 'input_encoding':
					if (!is_decodable(value))
						return Err(`argument ${name}: unknown encoding: ${value}`)
					options.input_encoding = value
					break
				case 'output_encoding':
					if (!Buffer.isEncoding(value))
						return Err(`argument ${name}: unknown encoding: ${value}`)
					options.output_encoding = value
					break
			}
			continue
		}

		if (arg.startsWith('-') && arg !== '-')
			return Err(`unrecognized argument: ${arg}`)
		if (options.file !== undefined)
			return Err(`unexpected extra argument: ${arg}`)
		options.file = arg
	}

	if (indent_given && options.flatten)
		return Err('argument -f/--flatten: not allowed with argument -i/--indent')
	return Ok(options)
}


export type Sink = { write(chunk: Buffer): unknown }

export class EncodedOutput implements Output {
	constructor(
		readonly sink: Sink,
		readonly encoding: BufferEncoding,
	) {}

	write(text: string) {
		this.sink.write(Buffer.from(text, this.encoding))
	}
}

// returns the exit code
export function run(
	options: CliOptions,
	input: Buffer,
	stdout: Sink,
	stderr: Output,
	level: chalk.Level = chalk.level,
): number {
	const source = new TextDecoder(options.input_encoding).decode(input)
	const filename = options.file !== undefined && options.file !== '-' ? options.file : undefined

	const result = options.check
		? validate(source, options.single_document, filename)
		: translate(
			options.json_output
				? new JsonPrinter(new EncodedOutput(stdout, options.output_encoding), {
					indent: options.flatten ? 0 : options.indent,
					ensure_ascii: options.ensure_ascii,
				})
				: new VerbatimPrinter(new EncodedOutput(stdout, options.output_encoding), {
					indent: options.flatten ? 0 : options.indent,
					trailing_commas: options.trailing_commas,
				}),
			source, options.single_document, filename,
		)

	return result.match({
		ok: () => 0,
		err: error => {
			stderr.write(format_error(error, level) + '\n')
			return 1
		},
	})
}

export function main(args = process.argv.slice(2)) {
	const options = parse_command_line(args).match({
		ok: options => options,
		err: message => {
			process.stderr.write(`${message}\n\n${USAGE}`)
			return process.exit(2)
		},
	})

	if (options.help) {
		process.stdout.write(USAGE)
		return
	}

	const path = options.file === undefined || options.file === '-' ? 0 : options.file
	let input: Buffer
	try {
		input = readFileSync(path)
	}
	catch (e) {
		process.stderr.write(`cannot read ${options.file}: ${e instanceof Error ? e.message : String(e)}\n`)
		process.exitCode = 2
		return
	}

	process.exitCode = run(options, input, process.stdout, process.stderr)
}

if (require.main === module)
	main()
