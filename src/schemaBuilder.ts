import type { ClassDescriptor, FieldDescriptor, MappingDocument } from "./model";
import type { TypeInfo, TypeMapper } from "./typeInfo";
import type { KeyGeneratorRegistry } from "./keyGenerators";
import type { Field, KeyGenerator, Schema, SchemaObjectFactory, Table } from "./schemaObjects";
import { isManyToMany } from "./model";
import { MappingHelper } from "./mappingHelper";
import { StructuralMappingError, TypeNotFoundException } from "./errors";

/**
 * Derives a relational schema from a mapping document.
 *
 * Algorithm:
 * 1. Register the document's key generators
 * 2. Build one table per mapped class, in document order
 * 3. Build the junction tables that many-to-many fields asked for, in the
 *    order their names were first seen
 *
 * Either a complete schema is returned or an error is thrown.
 */
export class SchemaBuilder {
	constructor(
		private readonly _factory: SchemaObjectFactory,
		private readonly _typeMapper: TypeMapper,
		private readonly _keyGenerators: KeyGeneratorRegistry
	) { }

	/**
	 * Document key generators are registered into a copy of the registry, so
	 * one builder can serve several documents.
	 */
	build(document: MappingDocument): Schema {
		const keyGenerators = this._keyGenerators.copy();
		for (const definition of document.keyGenerators) {
			keyGenerators.register(definition);
		}
		return new SchemaBuild(
			this._factory,
			this._typeMapper,
			keyGenerators,
			new MappingHelper(document, this._typeMapper)
		).run(document.classes);
	}
}

interface ResolvedColumns {
	readonly types: readonly TypeInfo[];
	/** Set when the field's type is another class */
	readonly reference?: ClassDescriptor;
}

/** Junction table collected while the primary tables are built */
interface PendingJunction {
	readonly name: string;
	readonly keyGenerator?: string;
	readonly fields: FieldDescriptor[];
}

/**
 * State of a single build.
 */
class SchemaBuild {
	private readonly _schema: Schema;
	private readonly _junctions = new Map<string, PendingJunction>();

	constructor(
		private readonly _factory: SchemaObjectFactory,
		private readonly _typeMapper: TypeMapper,
		private readonly _keyGenerators: KeyGeneratorRegistry,
		private readonly _helper: MappingHelper
	) {
		this._schema = _factory.createSchema();
	}

	run(classes: readonly ClassDescriptor[]): Schema {
		for (const cls of classes) {
			const table = this.createTable(cls, false);
			if (table) {
				this._schema.addTable(table);
			}
		}

		for (const junction of [...this._junctions.values()]) {
			const table = this.createTable({
				name: junction.name,
				table: junction.name,
				keyGenerator: junction.keyGenerator,
				fields: junction.fields,
			}, true);
			if (table) {
				this._schema.addTable(table);
			}
		}

		return this._schema;
	}

	private createTable(cls: ClassDescriptor, isJunction: boolean): Table | undefined {
		if (cls.table === undefined) {
			return undefined;
		}

		const table = this._factory.createTable(cls.table);
		if (cls.fields.length === 0) {
			this.addIndexes(table, cls);
			return table;
		}

		const keyGenerator = this.resolveKeyGenerator(cls);
		table.setKeyGenerator(keyGenerator);

		for (const field of cls.fields) {
			if (isManyToMany(field)) {
				this.addJunctionField(table, cls, field);
				continue;
			}
			if (field.columns.length === 0) {
				continue;
			}

			const resolved = this.resolveColumns(cls, field);
			this.addColumns(table, field, resolved.types, this._helper.isIdentity(cls, field), keyGenerator);
			if (resolved.reference) {
				this.addOneToOneForeignKey(table, field, resolved.reference, isJunction);
			}
		}

		if (cls.extends) {
			this.mergeInheritedIdentity(table, cls, cls, cls.extends);
		}
		this.addIndexes(table, cls);

		return table;
	}

	private resolveKeyGenerator(cls: ClassDescriptor): KeyGenerator | undefined {
		return cls.keyGenerator === undefined ? undefined : this._keyGenerators.get(cls.keyGenerator);
	}

	/**
	 * Column types of a field: its SQL type if the dialect knows it, otherwise
	 * the identity types of the referenced class, otherwise its declared type
	 * as a primitive.
	 */
	private resolveColumns(owner: ClassDescriptor, field: FieldDescriptor): ResolvedColumns {
		if (field.sqlType !== undefined) {
			const type = this._typeMapper.lookup(field.sqlType);
			if (type) {
				return { types: field.columns.map(() => type) };
			}
		}

		const reference = this._helper.findClassByName(field.type);
		if (!reference) {
			const type = this._typeMapper.lookup(field.type);
			if (!type) {
				throw new TypeNotFoundException(
					`Cannot resolve type '${field.type}' of field '${field.name}' in class '${owner.name}'`,
					owner.name,
					field.name
				);
			}
			return { types: field.columns.map(() => type) };
		}

		const identityTypes = this._helper.resolveIdentityTypeNames(reference);
		if (identityTypes.length !== field.columns.length) {
			throw new TypeNotFoundException(
				`Field '${field.name}' of class '${owner.name}' maps ${field.columns.length} column(s) ` +
					`but class '${reference.name}' has ${identityTypes.length} identity column(s)`,
				owner.name,
				field.name
			);
		}

		const types = identityTypes.map(typeName => {
			const type = this._typeMapper.lookup(typeName);
			if (!type) {
				throw new TypeNotFoundException(
					`Cannot find identity type '${typeName}' of class '${reference.name}'`,
					owner.name,
					field.name
				);
			}
			return type;
		});
		return { types, reference };
	}

	private addColumns(
		table: Table,
		field: FieldDescriptor,
		types: readonly TypeInfo[],
		identity: boolean,
		keyGenerator: KeyGenerator | undefined
	): void {
		field.columns.forEach((column, i) => {
			table.addField(this._factory.createField({
				name: column,
				table,
				type: types[i],
				identity,
				required: field.required,
				keyGenerator,
			}));
		});
	}

	private addOneToOneForeignKey(
		table: Table,
		field: FieldDescriptor,
		reference: ClassDescriptor,
		isJunction: boolean
	): void {
		const referenceTableName = reference.table;
		if (referenceTableName === undefined) {
			throw new StructuralMappingError(
				`Class '${reference.name}' referenced by '${table.name}.${field.name}' is not mapped to a table`
			);
		}

		const referenceTable = referenceTableName === table.name
			? table
			: this._schema.getTable(referenceTableName);
		if (!referenceTable) {
			throw new StructuralMappingError(
				`Table '${referenceTableName}' referenced by '${table.name}.${field.name}' must be mapped before it`
			);
		}

		const fields = field.columns.map(column => requireField(table, column));
		const referenceNames = field.manyKey && field.manyKey.length > 0
			? field.manyKey
			: this._helper.sqlIdentityColumnNames(reference, true);
		const referenceFields = referenceNames.map(column => requireField(referenceTable, column));
		if (referenceFields.length !== fields.length) {
			throw new StructuralMappingError(
				`Foreign key '${table.name}_${field.name}' has ${fields.length} column(s) ` +
					`but references ${referenceFields.length} column(s) of '${referenceTable.name}'`
			);
		}

		table.addForeignKey(this._factory.createForeignKey({
			name: `${table.name}_${field.name}`,
			table,
			fields,
			referenceTable,
			referenceFields,
			relationType: isJunction ? "many-to-many" : "one-to-one",
		}));
	}

	/**
	 * Queue one side of a many-to-many relation. The junction table gets an
	 * identity reference to the owning class, built later like any other class.
	 */
	private addJunctionField(ownerTable: Table, owner: ClassDescriptor, field: FieldDescriptor): void {
		const name = field.manyTable;
		if (name === undefined) {
			return;
		}

		let junction = this._junctions.get(name);
		if (!junction) {
			junction = { name, keyGenerator: owner.keyGenerator, fields: [] };
			this._junctions.set(name, junction);
		}

		const columns = field.manyKey && field.manyKey.length > 0
			? field.manyKey
			: junctionColumnNames(ownerTable.name, this._helper.sqlIdentityColumnNames(owner, true));
		if (columns.length === 0) {
			throw new StructuralMappingError(
				`Junction table '${name}' cannot reference class '${owner.name}': it has no identity columns`
			);
		}

		junction.fields.push({
			name: ownerTable.name,
			type: owner.name,
			identity: true,
			required: false,
			columns,
		});
	}

	/**
	 * Bring the identity of an extended class into the child's table.
	 *
	 * A child with identity columns of its own only has its identity types
	 * checked against the parent's. Otherwise the parent's identity columns are
	 * added to the table, reusing same-named fields of the table's own class
	 * where present. `child` moves up the hierarchy on recursion while
	 * `tableClass` stays the class the table is built for.
	 */
	private mergeInheritedIdentity(
		table: Table,
		tableClass: ClassDescriptor,
		child: ClassDescriptor,
		parent: ClassDescriptor
	): void {
		if (this._helper.sqlIdentityColumnNames(child, false).length > 0) {
			const childTypes = this._helper.resolveIdentityTypeNames(child);
			const parentTypes = this._helper.resolveIdentityTypeNames(parent);
			const matches = childTypes.length === parentTypes.length
				&& childTypes.every((type, i) => type.toLowerCase() === parentTypes[i].toLowerCase());
			if (!matches) {
				throw new StructuralMappingError(
					`Identity of class '${child.name}' (${childTypes.join(", ")}) does not match ` +
						`identity of extended class '${parent.name}' (${parentTypes.join(", ")})`
				);
			}
			return;
		}

		const keyGenerator = this.resolveKeyGenerator(parent);
		if (!table.keyGenerator && keyGenerator) {
			table.setKeyGenerator(keyGenerator);
		}

		for (const parentField of parent.fields) {
			if (isManyToMany(parentField) || parentField.columns.length === 0) {
				continue;
			}
			if (!this._helper.isIdentity(parent, parentField)) {
				continue;
			}
			if (this.promoteRedeclaredColumns(table, tableClass, parentField)) {
				continue;
			}

			// Inherited key columns carry no foreign key of their own
			const { types } = this.resolveColumns(parent, parentField);
			this.addColumns(table, parentField, types, true, keyGenerator);
		}

		if (parent.extends) {
			this.mergeInheritedIdentity(table, tableClass, parent, parent.extends);
		}
	}

	/**
	 * A child may re-declare an inherited key column as an ordinary field. Its
	 * columns become the identity instead of being added a second time.
	 */
	private promoteRedeclaredColumns(table: Table, tableClass: ClassDescriptor, parentField: FieldDescriptor): boolean {
		const name = parentField.name.toLowerCase();
		const redeclared = tableClass.fields.find(f => f.name.toLowerCase() === name && f.columns.length > 0);
		if (!redeclared) {
			return false;
		}

		const fields: Field[] = [];
		for (const column of redeclared.columns) {
			const field = table.getField(column);
			if (!field) {
				return false;
			}
			fields.push(field);
		}
		for (const field of fields) {
			table.promoteToIdentity(field);
		}
		return true;
	}

	private addIndexes(table: Table, cls: ClassDescriptor): void {
		for (const index of cls.indexes ?? []) {
			if (index.columns.length === 0) {
				throw new StructuralMappingError(`Index on table '${table.name}' names no columns`);
			}
			table.addIndex(this._factory.createIndex({
				name: index.name ?? `idx_${table.name}_${index.columns.join("_")}`,
				table,
				fields: index.columns.map(column => requireField(table, column)),
				unique: index.unique,
			}));
		}
	}
}

/**
 * A single identity column is named after the owning table; composite
 * identities get `<table>_<column>` per column.
 */
function junctionColumnNames(ownerTable: string, identityColumns: readonly string[]): string[] {
	if (identityColumns.length === 1) {
		return [ownerTable];
	}
	return identityColumns.map(column => `${ownerTable}_${column}`);
}

function requireField(table: Table, column: string): Field {
	const field = table.getField(column);
	if (!field) {
		throw new StructuralMappingError(`Table '${table.name}' has no column '${column}'`);
	}
	return field;
}
