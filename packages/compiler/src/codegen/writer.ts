/**
 * Line-oriented output buffer for emitted Python.
 *
 * Every line remembers the source line it came from so the optional trailing
 * comments (line numbers, kept source text, warnings) can be added at render
 * time.
 */

export interface WriterOptions {
	readonly minify: boolean
	readonly lineNumbers: boolean
	readonly keepLines: boolean
}

interface OutputLine {
	readonly depth: number
	readonly text: string
	readonly sourceLine: number | null
}

export class OutputWriter {
	private readonly lines: OutputLine[] = []
	private readonly options: WriterOptions
	private depth = 0

	constructor(options: WriterOptions) {
		this.options = options
	}

	line(text: string, sourceLine: number | null): void {
		this.lines.push({ depth: this.depth, sourceLine, text })
	}

	/**
	 * Write an indented block. A block that produced no lines gets `pass`.
	 */
	block(sourceLine: number | null, body: () => void): void {
		this.depth++
		const before = this.lines.length
		body()
		if (this.lines.length === before) this.line('pass', sourceLine)
		this.depth--
	}

	isEmpty(): boolean {
		return this.lines.length === 0
	}

	/**
	 * Join the buffered lines.
	 *
	 * @param sourceText - Looks up original lines for `keepLines`
	 * @param warnings - Messages to attach to the first line emitted for each source line
	 */
	render(sourceText: (line: number) => string, warnings: ReadonlyMap<number, readonly string[]> = new Map()): string {
		const unit = this.options.minify ? ' ' : '    '
		const pending = new Map(warnings)
		const out: string[] = []
		for (const line of this.lines) {
			const notes: string[] = []
			if (line.sourceLine !== null) {
				if (this.options.lineNumbers) {
					notes.push(this.options.minify ? String(line.sourceLine) : `line ${line.sourceLine}`)
				}
				if (this.options.keepLines) notes.push(sourceText(line.sourceLine).trim())
				const messages = pending.get(line.sourceLine)
				if (messages !== undefined) {
					for (const message of messages) notes.push(`WARNING: ${message}`)
					pending.delete(line.sourceLine)
				}
			}
			const comment = notes.length === 0 ? '' : `${this.options.minify ? '#' : '  # '}${notes.join('; ')}`
			out.push(unit.repeat(line.depth) + line.text + comment)
		}
		return out.join('\n')
	}
}
