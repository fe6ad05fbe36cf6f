import type { Dict } from '@ts-std/types'

import { debug } from '../utils'

export type TokenDefinition = Readonly<{
	name: string,
	regex: RegExp,
}>

export type TokenSpec = RegExp | string

export function escape_string(def: string) {
	return def.replace(/[.*+?^${}()|[\]\\\/]/g, '\\$&') // $& means the whole matched string
}

// sticky, so a match can only begin at the lexer's current index
export function finalize_regex(entry: TokenSpec) {
	const final_regex = typeof entry === 'string'
		? new RegExp(escape_string(entry), 'y')
		: new RegExp(entry.source, 'y')
	if (final_regex.test(''))
		throw new Error(`attempted to create a token that matches the empty string:\n${debug(final_regex)}`)
	final_regex.lastIndex = 0
	return final_regex
}

export function Token(name: string, spec: TokenSpec): TokenDefinition {
	return { name, regex: finalize_regex(spec) }
}

type TokensForSpecs<D extends Dict<TokenSpec>> =
	{ [K in keyof D]: TokenDefinition }

export function Tokens<D extends Dict<TokenSpec>>(
	tokens: D,
): TokensForSpecs<D> {
	const give = {} as TokensForSpecs<D>
	for (const key in tokens)
		give[key] = Token(key, tokens[key])
	return give
}


const reserved = '(?:[tT]rue|[fF]alse|null|None|undefined|NotImplemented|NaN|Infinity)\\b'
const identifier = `(?!${reserved}|\\d)\\$?\\w+`
// whitespace and comments, each comment running to the end of its line
const gap = '(?:\\s|\\/\\/[^\\n]*(?=\\n|$))*'

export const tok = Tokens({
	skipped: /(?:\s+|\/\/.*)+/,
	number: /[+-]?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/,
	bool: /(?:[tT]rue|[fF]alse)\b/,
	null: /(?:null|None)\b/,
	named_constant: /(?:undefined|NotImplemented|NaN|Infinity)\b/,
	double_quoted: /"((?:[^\\"]|\\.)*)"/,
	single_quoted: /'((?:[^\\']|\\.)*)'/,
	regex: /\/((?:[^\\\/]|\\.)*)\/(\w*)/,
	python_repr: /<\w+(?:[^'">]|"(?:[^"\\]|\\.)*"|'(?:[^'\\]|\\.)*')*>/,
	identifier: new RegExp(identifier),
	function_call: /((?:new\s+)?\$?\w+(?:\.\$?\w+)*)\s*\(/,
	keyword_key: new RegExp(`(${identifier})${gap}=`),
})

export const float_marker = /[.eE]/


const ESCAPES: Dict<string> = {
	'\\': '\\', '"': '"', "'": "'", '/': '/',
	b: '\b', f: '\f', n: '\n', r: '\r', t: '\t',
}

// unknown escapes are kept as written
export function unescape(text: string) {
	return text.replace(
		/\\(?:u([0-9a-fA-F]{4})|x([0-9a-fA-F]{2})|(.))/g,
		(whole: string, unicode: string | undefined, hex: string | undefined, char: string | undefined) => {
			if (unicode !== undefined)
				return String.fromCharCode(parseInt(unicode, 16))
			if (hex !== undefined)
				return String.fromCharCode(parseInt(hex, 16))
			if (char !== undefined && char in ESCAPES)
				return ESCAPES[char]
			return whole
		},
	)
}
