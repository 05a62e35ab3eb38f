import * as fs from "fs";
import Ajv from "ajv";
import { InvalidDocumentError } from "./errors";

export type ReferentialAction = "CASCADE" | "SET NULL" | "SET DEFAULT" | "RESTRICT" | "NO ACTION";

export const GROUP_BY_TABLE = "table";
export const GROUP_BY_DDL_TYPE = "ddltype";

export interface StatementToggles {
	readonly schema: boolean;
	readonly drop: boolean;
	readonly create: boolean;
	readonly primaryKey: boolean;
	readonly foreignKey: boolean;
	readonly index: boolean;
	readonly keyGenerator: boolean;
}

export interface TypeDefaults {
	readonly charLength: number;
	readonly varcharLength: number;
	readonly binaryLength: number;
	readonly numericPrecision?: number;
	readonly numericDecimals?: number;
}

export interface GeneratorConfiguration {
	/** `table` or `ddltype`; anything else is rejected when generating */
	readonly groupBy: string;
	readonly generate: StatementToggles;
	readonly statementDelimiter: string;
	readonly lineSeparator: string;
	readonly indent: string;
	readonly schemaName?: string;
	readonly foreignKey: {
		readonly onDelete?: ReferentialAction;
		readonly onUpdate?: ReferentialAction;
	};
	readonly typeDefaults: TypeDefaults;
	readonly mysql: {
		readonly storageEngine?: string;
	};
}

export interface PartialConfiguration {
	groupBy?: string;
	generate?: Partial<StatementToggles>;
	statementDelimiter?: string;
	lineSeparator?: string;
	indent?: string;
	schemaName?: string;
	foreignKey?: { onDelete?: ReferentialAction; onUpdate?: ReferentialAction };
	typeDefaults?: Partial<TypeDefaults>;
	mysql?: { storageEngine?: string };
}

export const defaultConfiguration: GeneratorConfiguration = {
	groupBy: GROUP_BY_TABLE,
	generate: {
		schema: true,
		drop: true,
		create: true,
		primaryKey: true,
		foreignKey: true,
		index: true,
		keyGenerator: true,
	},
	statementDelimiter: ";",
	lineSeparator: "\n",
	indent: "    ",
	foreignKey: {},
	typeDefaults: {
		charLength: 1,
		varcharLength: 255,
		binaryLength: 255,
	},
	mysql: {},
};

/**
 * Merge a partial configuration over the defaults. Nested sections merge key by key.
 */
export function resolveConfiguration(partial: PartialConfiguration = {}): GeneratorConfiguration {
	return {
		...defaultConfiguration,
		...partial,
		generate: { ...defaultConfiguration.generate, ...partial.generate },
		foreignKey: { ...defaultConfiguration.foreignKey, ...partial.foreignKey },
		typeDefaults: { ...defaultConfiguration.typeDefaults, ...partial.typeDefaults },
		mysql: { ...defaultConfiguration.mysql, ...partial.mysql },
	};
}

const referentialAction = {
	type: "string",
	enum: ["CASCADE", "SET NULL", "SET DEFAULT", "RESTRICT", "NO ACTION"],
};

const positiveInteger = { type: "integer", minimum: 0 };

export const configurationJsonSchema = {
	$schema: "http://json-schema.org/draft-07/schema#",
	type: "object",
	properties: {
		$schema: { type: "string" },
		groupBy: { type: "string" },
		generate: {
			type: "object",
			properties: {
				schema: { type: "boolean" },
				drop: { type: "boolean" },
				create: { type: "boolean" },
				primaryKey: { type: "boolean" },
				foreignKey: { type: "boolean" },
				index: { type: "boolean" },
				keyGenerator: { type: "boolean" },
			},
			additionalProperties: false,
		},
		statementDelimiter: { type: "string" },
		lineSeparator: { type: "string" },
		indent: { type: "string" },
		schemaName: { type: "string", minLength: 1 },
		foreignKey: {
			type: "object",
			properties: {
				onDelete: referentialAction,
				onUpdate: referentialAction,
			},
			additionalProperties: false,
		},
		typeDefaults: {
			type: "object",
			properties: {
				charLength: positiveInteger,
				varcharLength: positiveInteger,
				binaryLength: positiveInteger,
				numericPrecision: positiveInteger,
				numericDecimals: positiveInteger,
			},
			additionalProperties: false,
		},
		mysql: {
			type: "object",
			properties: {
				storageEngine: { type: "string" },
			},
			additionalProperties: false,
		},
	},
	additionalProperties: false,
};

const ajv = new Ajv({ strict: false, allErrors: true });
const validateConfiguration = ajv.compile<PartialConfiguration>(configurationJsonSchema);

/**
 * Parse and validate a JSON configuration file's contents.
 */
export function parseConfiguration(json: string): GeneratorConfiguration {
	let value: unknown;
	try {
		value = JSON.parse(json);
	} catch (error) {
		if (error instanceof SyntaxError) {
			throw new InvalidDocumentError("configuration", [error.message]);
		}
		throw error;
	}

	if (!validateConfiguration(value)) {
		const errors = (validateConfiguration.errors ?? []).map(
			e => `${e.instancePath || "/"} ${e.message ?? "is invalid"}`
		);
		throw new InvalidDocumentError("configuration", errors);
	}
	return resolveConfiguration(value);
}

export function loadConfiguration(filePath: string): GeneratorConfiguration {
	return parseConfiguration(fs.readFileSync(filePath, "utf-8"));
}
