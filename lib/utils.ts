import * as util from 'util'

export function debug(obj: unknown, depth = null as number | null, colors = false) {
	return util.inspect(obj, { depth, colors })
}

export class LogError extends Error {
	constructor(lines: unknown[], depth = null as number | null) {
		const message = lines.map(line => {
			return typeof line === 'string'
				? line
				: debug(line, depth)
		}).join('\n')
		super(message)
	}
}

export function exhaustive(v: never): never {
	throw new LogError(['reached an unhandled case:', v])
}
