// anything text can be streamed into; a Node Writable fits
export interface Output {
	write(text: string): unknown
}

export class StringOutput implements Output {
	protected readonly chunks = [] as string[]

	write(text: string) {
		this.chunks.push(text)
	}

	get text() {
		return this.chunks.join('')
	}
}
