/**
 * Base class of every failure raised while building or rendering a schema.
 * A run that throws one of these produces no output.
 */
export class GeneratorError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "GeneratorError";
	}
}

/**
 * A declared type is neither a primitive of the dialect nor a mapped class,
 * or a reference field's columns do not line up with the referenced identity.
 */
export class TypeNotFoundException extends GeneratorError {
	constructor(
		message: string,
		public readonly className: string,
		public readonly fieldName?: string
	) {
		super(message);
		this.name = "TypeNotFoundException";
	}
}

export class StructuralMappingError extends GeneratorError {
	constructor(message: string) {
		super(message);
		this.name = "StructuralMappingError";
	}
}

/**
 * A mapping or configuration file failed JSON Schema validation.
 */
export class InvalidDocumentError extends GeneratorError {
	constructor(
		public readonly source: string,
		public readonly errors: readonly string[]
	) {
		super(`Invalid ${source} with ${errors.length} error(s): ${errors.join("; ")}`);
		this.name = "InvalidDocumentError";
	}
}
