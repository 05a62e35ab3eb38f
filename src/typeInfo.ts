import { StructuralMappingError } from "./errors";

/**
 * A column type resolved for one dialect, with its parameters bound.
 */
export interface TypeInfo {
	/** Abstract type name as written in mappings, lower case */
	readonly jdbcType: string;
	toDDL(): string;
}

/**
 * Per-dialect type lookup. `undefined` means the name is not a primitive type
 * and should be resolved as a class reference instead.
 */
export interface TypeMapper {
	lookup(typeName: string): TypeInfo | undefined;
}

/**
 * Describes how one abstract type renders in a dialect.
 */
export interface TypeDefinition {
	readonly jdbcType: string;
	bind(parameters: readonly number[]): TypeInfo;
}

class BoundType implements TypeInfo {
	constructor(
		public readonly jdbcType: string,
		private readonly _sqlType: string,
		private readonly _parameters: readonly number[]
	) { }

	toDDL(): string {
		if (this._parameters.length === 0) {
			return this._sqlType;
		}
		return `${this._sqlType}(${this._parameters.join(",")})`;
	}
}

export class NoParamType implements TypeDefinition {
	constructor(public readonly jdbcType: string, private readonly _sqlType: string) { }

	bind(parameters: readonly number[]): TypeInfo {
		if (parameters.length > 0) {
			throw new StructuralMappingError(`Type '${this.jdbcType}' does not take parameters`);
		}
		return new BoundType(this.jdbcType, this._sqlType, []);
	}
}

/**
 * CHAR(n), VARCHAR(n), ... Falls back to the default length when none is given;
 * without a default the length is omitted.
 */
export class LengthType implements TypeDefinition {
	constructor(
		public readonly jdbcType: string,
		private readonly _sqlType: string,
		private readonly _defaultLength?: number
	) { }

	bind(parameters: readonly number[]): TypeInfo {
		if (parameters.length > 1) {
			throw new StructuralMappingError(`Type '${this.jdbcType}' takes a single length parameter`);
		}
		const length = parameters[0] ?? this._defaultLength;
		return new BoundType(this.jdbcType, this._sqlType, length === undefined ? [] : [length]);
	}
}

/**
 * NUMERIC(p,d) and friends. Decimals without a precision are dropped.
 */
export class PrecisionType implements TypeDefinition {
	constructor(
		public readonly jdbcType: string,
		private readonly _sqlType: string,
		private readonly _defaultPrecision?: number,
		private readonly _defaultDecimals?: number
	) { }

	bind(parameters: readonly number[]): TypeInfo {
		if (parameters.length > 2) {
			throw new StructuralMappingError(`Type '${this.jdbcType}' takes at most precision and decimals`);
		}
		const precision = parameters[0] ?? this._defaultPrecision;
		const decimals = parameters[1] ?? this._defaultDecimals;
		if (precision === undefined) {
			return new BoundType(this.jdbcType, this._sqlType, []);
		}
		return new BoundType(
			this.jdbcType,
			this._sqlType,
			decimals === undefined ? [precision] : [precision, decimals]
		);
	}
}

const TYPE_NAME_PATTERN = /^\s*([A-Za-z][\w ]*?)\s*(?:[[(]([\d\s,]*)[\])])?\s*$/;

/**
 * Split `varchar[40]` or `decimal(10, 2)` into name and numeric parameters.
 * Returns undefined for anything that is not shaped like a type name.
 */
export function parseTypeName(typeName: string): { name: string; parameters: number[] } | undefined {
	const match = TYPE_NAME_PATTERN.exec(typeName);
	if (!match) {
		return undefined;
	}
	const rawParameters = match[2]?.trim();
	const parameters = rawParameters ? rawParameters.split(",").map(p => Number(p.trim())) : [];
	if (parameters.some(p => !Number.isInteger(p))) {
		return undefined;
	}
	return { name: match[1].toLowerCase(), parameters };
}

export class DialectTypeMapper implements TypeMapper {
	private readonly _definitions = new Map<string, TypeDefinition>();

	constructor(definitions: readonly TypeDefinition[]) {
		for (const definition of definitions) {
			this._definitions.set(definition.jdbcType, definition);
		}
	}

	lookup(typeName: string): TypeInfo | undefined {
		const parsed = parseTypeName(typeName);
		if (!parsed) {
			return undefined;
		}
		return this._definitions.get(parsed.name)?.bind(parsed.parameters);
	}
}
