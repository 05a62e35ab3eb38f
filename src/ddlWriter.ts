import type { GeneratorConfiguration } from "./configuration";

/**
 * Replace `{0}`, `{1}`, ... with the matching argument. Placeholders without
 * an argument are left as they are.
 */
export function formatTemplate(template: string, args: readonly unknown[] = []): string {
	return template.replace(/\{(\d+)\}/g, (match, index: string) => {
		const i = Number(index);
		return i < args.length ? String(args[i]) : match;
	});
}

/**
 * Collects DDL text. Schema objects render themselves through a writer, so
 * line separator, indentation and statement delimiter stay configurable.
 */
export class DdlWriter {
	private readonly _chunks: string[] = [];
	private _indentLevel = 0;
	private _atLineStart = true;

	constructor(private readonly _configuration: GeneratorConfiguration) { }

	get delimiter(): string {
		return this._configuration.statementDelimiter;
	}

	print(template: string, args: readonly unknown[] = []): void {
		const text = formatTemplate(template, args);
		if (text.length === 0) {
			return;
		}
		if (this._atLineStart) {
			this._chunks.push(this._configuration.indent.repeat(this._indentLevel));
		}
		this._chunks.push(text);
		this._atLineStart = false;
	}

	println(template = "", args: readonly unknown[] = []): void {
		this.print(template, args);
		this._chunks.push(this._configuration.lineSeparator);
		this._atLineStart = true;
	}

	indent(): void {
		this._indentLevel++;
	}

	unindent(): void {
		if (this._indentLevel > 0) {
			this._indentLevel--;
		}
	}

	toString(): string {
		return this._chunks.join("");
	}
}
