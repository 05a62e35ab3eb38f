import * as fs from "fs";
import Ajv from "ajv";
import type {
	ClassDescriptor,
	FieldDescriptor,
	IndexDescriptor,
	KeyGeneratorDescriptor,
	MappingDocument,
} from "./model";
import { InvalidDocumentError, StructuralMappingError } from "./errors";

// === File format ===

export interface MappingFileField {
	name: string;
	type: string;
	identity?: boolean;
	required?: boolean;
	columns?: string[];
	sqlType?: string;
	manyTable?: string;
	manyKey?: string[];
}

export interface MappingFileIndex {
	name?: string;
	columns: string[];
	unique?: boolean;
}

export interface MappingFileClass {
	name: string;
	table?: string;
	extends?: string;
	keyGenerator?: string;
	identity?: string[];
	fields?: MappingFileField[];
	indexes?: MappingFileIndex[];
}

export interface MappingFileKeyGenerator {
	name: string;
	strategy: string;
	parameters?: Record<string, string | number>;
}

export interface MappingFile {
	$schema?: string;
	keyGenerators?: MappingFileKeyGenerator[];
	classes: MappingFileClass[];
}

const nonEmptyString = { type: "string", minLength: 1 };
const nameList = { type: "array", items: nonEmptyString };

export const mappingJsonSchema = {
	$schema: "http://json-schema.org/draft-07/schema#",
	type: "object",
	required: ["classes"],
	properties: {
		$schema: { type: "string" },
		keyGenerators: {
			type: "array",
			items: {
				type: "object",
				required: ["name", "strategy"],
				properties: {
					name: nonEmptyString,
					strategy: nonEmptyString,
					parameters: {
						type: "object",
						additionalProperties: { type: ["string", "number"] },
					},
				},
				additionalProperties: false,
			},
		},
		classes: {
			type: "array",
			items: {
				type: "object",
				required: ["name"],
				properties: {
					name: nonEmptyString,
					table: nonEmptyString,
					extends: nonEmptyString,
					keyGenerator: nonEmptyString,
					identity: nameList,
					fields: {
						type: "array",
						items: {
							type: "object",
							required: ["name", "type"],
							properties: {
								name: nonEmptyString,
								type: nonEmptyString,
								identity: { type: "boolean" },
								required: { type: "boolean" },
								columns: nameList,
								sqlType: nonEmptyString,
								manyTable: nonEmptyString,
								manyKey: nameList,
							},
							additionalProperties: false,
						},
					},
					indexes: {
						type: "array",
						items: {
							type: "object",
							required: ["columns"],
							properties: {
								name: nonEmptyString,
								columns: { ...nameList, minItems: 1 },
								unique: { type: "boolean" },
							},
							additionalProperties: false,
						},
					},
				},
				additionalProperties: false,
			},
		},
	},
	additionalProperties: false,
};

const ajv = new Ajv({ strict: false, allErrors: true });
const validateMappingFile = ajv.compile<MappingFile>(mappingJsonSchema);

// === Parsing ===

/**
 * Parse a JSON mapping file into a linked mapping document.
 * `extends` names are replaced by references to the parent descriptors.
 */
export function parseMappingDocument(json: string): MappingDocument {
	let value: unknown;
	try {
		value = JSON.parse(json);
	} catch (error) {
		if (error instanceof SyntaxError) {
			throw new InvalidDocumentError("mapping", [error.message]);
		}
		throw error;
	}

	if (!validateMappingFile(value)) {
		const errors = (validateMappingFile.errors ?? []).map(
			e => `${e.instancePath || "/"} ${e.message ?? "is invalid"}`
		);
		throw new InvalidDocumentError("mapping", errors);
	}

	return toMappingDocument(value);
}

export function loadMappingDocument(filePath: string): MappingDocument {
	return parseMappingDocument(fs.readFileSync(filePath, "utf-8"));
}

export function toMappingDocument(file: MappingFile): MappingDocument {
	return {
		keyGenerators: (file.keyGenerators ?? []).map(toKeyGeneratorDescriptor),
		classes: linkClasses(file.classes),
	};
}

function toKeyGeneratorDescriptor(keyGenerator: MappingFileKeyGenerator): KeyGeneratorDescriptor {
	const parameters: Record<string, string> = {};
	for (const [key, value] of Object.entries(keyGenerator.parameters ?? {})) {
		parameters[key] = String(value);
	}
	return { name: keyGenerator.name, strategy: keyGenerator.strategy, parameters };
}

function toFieldDescriptor(field: MappingFileField): FieldDescriptor {
	return {
		name: field.name,
		type: field.type,
		identity: field.identity ?? false,
		required: field.required ?? false,
		columns: field.columns ?? [],
		sqlType: field.sqlType,
		manyTable: field.manyTable,
		manyKey: field.manyKey,
	};
}

function toIndexDescriptor(index: MappingFileIndex): IndexDescriptor {
	return { name: index.name, columns: index.columns, unique: index.unique ?? false };
}

/**
 * Resolve `extends` names in any declaration order. Parents are linked
 * before their children; a class reached again while linking its own
 * ancestors closes a cycle.
 */
function linkClasses(classes: readonly MappingFileClass[]): ClassDescriptor[] {
	const byName = new Map<string, MappingFileClass>();
	for (const cls of classes) {
		if (byName.has(cls.name)) {
			throw new StructuralMappingError(`Class '${cls.name}' is defined more than once`);
		}
		byName.set(cls.name, cls);
	}

	const linked = new Map<string, ClassDescriptor>();
	const visiting = new Set<string>();

	function link(cls: MappingFileClass): ClassDescriptor {
		const existing = linked.get(cls.name);
		if (existing) {
			return existing;
		}
		if (visiting.has(cls.name)) {
			throw new StructuralMappingError(`Class '${cls.name}' extends itself`);
		}

		visiting.add(cls.name);
		let parent: ClassDescriptor | undefined;
		if (cls.extends !== undefined) {
			const parentClass = byName.get(cls.extends);
			if (!parentClass) {
				throw new StructuralMappingError(`Class '${cls.name}' extends unknown class '${cls.extends}'`);
			}
			parent = link(parentClass);
		}
		visiting.delete(cls.name);

		const descriptor: ClassDescriptor = {
			name: cls.name,
			table: cls.table,
			extends: parent,
			keyGenerator: cls.keyGenerator,
			identity: cls.identity,
			fields: (cls.fields ?? []).map(toFieldDescriptor),
			indexes: (cls.indexes ?? []).map(toIndexDescriptor),
		};
		linked.set(cls.name, descriptor);
		return descriptor;
	}

	return classes.map(link);
}
