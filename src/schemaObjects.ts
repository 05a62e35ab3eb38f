import type { GeneratorConfiguration } from "./configuration";
import type { DdlWriter } from "./ddlWriter";
import type { TypeInfo } from "./typeInfo";
import { StructuralMappingError } from "./errors";

/**
 * What every schema object needs to render itself for a dialect.
 */
export interface RenderContext {
	readonly configuration: GeneratorConfiguration;
	quoteIdentifier(name: string): string;
}

export abstract class SchemaObject {
	constructor(protected readonly context: RenderContext) { }

	protected get configuration(): GeneratorConfiguration {
		return this.context.configuration;
	}

	protected quote(name: string): string {
		return this.context.quoteIdentifier(name);
	}

	protected quoteList(names: readonly string[]): string {
		return names.map(n => this.quote(n)).join(", ");
	}
}

// === Schema ===

export class Schema extends SchemaObject {
	private readonly _tables: Table[] = [];
	private readonly _tablesByName = new Map<string, Table>();

	get name(): string | undefined {
		return this.configuration.schemaName;
	}

	/** Tables in discovery order */
	get tables(): readonly Table[] {
		return this._tables;
	}

	addTable(table: Table): void {
		if (this._tablesByName.has(table.name)) {
			throw new StructuralMappingError(`Table '${table.name}' is mapped more than once`);
		}
		this._tables.push(table);
		this._tablesByName.set(table.name, table);
	}

	getTable(name: string): Table | undefined {
		return this._tablesByName.get(name);
	}

	toCreateDDL(writer: DdlWriter): void {
		const name = this.name;
		if (name === undefined) {
			return;
		}
		writer.println();
		writer.println("CREATE SCHEMA {0}{1}", [this.quote(name), writer.delimiter]);
	}
}

// === Table ===

export class Table extends SchemaObject {
	readonly primaryKey: PrimaryKey;
	private readonly _fields: Field[] = [];
	private readonly _foreignKeys: ForeignKey[] = [];
	private readonly _indexes: Index[] = [];
	private _keyGenerator: KeyGenerator | undefined;

	constructor(
		context: RenderContext,
		public readonly name: string,
		createPrimaryKey: (table: Table) => PrimaryKey
	) {
		super(context);
		this.primaryKey = createPrimaryKey(this);
	}

	get fields(): readonly Field[] {
		return this._fields;
	}

	get foreignKeys(): readonly ForeignKey[] {
		return this._foreignKeys;
	}

	get indexes(): readonly Index[] {
		return this._indexes;
	}

	get keyGenerator(): KeyGenerator | undefined {
		return this._keyGenerator;
	}

	setKeyGenerator(keyGenerator: KeyGenerator | undefined): void {
		this._keyGenerator = keyGenerator;
	}

	getField(name: string): Field | undefined {
		return this._fields.find(f => f.name === name);
	}

	/**
	 * Append a column. Identity columns join the primary key.
	 */
	addField(field: Field): void {
		if (this.getField(field.name)) {
			throw new StructuralMappingError(`Column '${field.name}' is defined twice in table '${this.name}'`);
		}
		this._fields.push(field);
		if (field.identity) {
			this.primaryKey.addField(field);
		}
	}

	promoteToIdentity(field: Field): void {
		field.markIdentity();
		this.primaryKey.addField(field);
	}

	addForeignKey(foreignKey: ForeignKey): void {
		this._foreignKeys.push(foreignKey);
	}

	addIndex(index: Index): void {
		this._indexes.push(index);
	}

	toCreateDDL(writer: DdlWriter): void {
		writer.println();
		if (this._fields.length === 0) {
			writer.println("CREATE TABLE {0} (){1}{2}", [this.quote(this.name), this.tableOptions(), writer.delimiter]);
			return;
		}
		writer.println("CREATE TABLE {0} (", [this.quote(this.name)]);
		writer.indent();
		this._fields.forEach((field, i) => {
			const separator = i < this._fields.length - 1 ? "," : "";
			writer.println("{0}{1}", [field.toDDL(), separator]);
		});
		writer.unindent();
		writer.println("){0}{1}", [this.tableOptions(), writer.delimiter]);
	}

	toDropDDL(writer: DdlWriter): void {
		writer.println();
		writer.println("DROP TABLE IF EXISTS {0}{1}", [this.quote(this.name), writer.delimiter]);
	}

	/** Text between the closing parenthesis and the delimiter, e.g. a storage engine */
	protected tableOptions(): string {
		return "";
	}
}

// === Field ===

export interface FieldOptions {
	readonly name: string;
	readonly table: Table;
	readonly type: TypeInfo;
	readonly identity: boolean;
	readonly required: boolean;
	readonly keyGenerator?: KeyGenerator;
}

export class Field extends SchemaObject {
	readonly name: string;
	/** Owning table; the table owns the field, not the other way round */
	readonly table: Table;
	readonly type: TypeInfo;
	readonly required: boolean;
	readonly keyGenerator: KeyGenerator | undefined;
	private _identity: boolean;

	constructor(context: RenderContext, options: FieldOptions) {
		super(context);
		this.name = options.name;
		this.table = options.table;
		this.type = options.type;
		this._identity = options.identity;
		this.required = options.required;
		this.keyGenerator = options.keyGenerator;
	}

	get identity(): boolean {
		return this._identity;
	}

	markIdentity(): void {
		this._identity = true;
	}

	/**
	 * Column definition as it appears inside CREATE TABLE.
	 */
	toDDL(): string {
		let ddl = `${this.quote(this.name)} ${this.type.toDDL()}`;
		if (this._identity || this.required) {
			ddl += " NOT NULL";
		}
		const generated = this.generatedClause();
		if (generated) {
			ddl += ` ${generated}`;
		}
		return ddl;
	}

	protected usesIdentityGenerator(): boolean {
		return this._identity && this.keyGenerator?.strategy === KeyGeneratorStrategy.Identity;
	}

	/** Dialect-specific clause for generated identity values */
	protected generatedClause(): string | undefined {
		return undefined;
	}
}

// === Keys and indexes ===

export class PrimaryKey extends SchemaObject {
	private readonly _fields: Field[] = [];

	constructor(context: RenderContext, public readonly table: Table) {
		super(context);
	}

	get name(): string {
		return `pk_${this.table.name}`;
	}

	get fields(): readonly Field[] {
		return this._fields;
	}

	addField(field: Field): void {
		if (!this._fields.includes(field)) {
			this._fields.push(field);
		}
	}

	toCreateDDL(writer: DdlWriter): void {
		if (this._fields.length === 0) {
			return;
		}
		writer.println();
		writer.println("ALTER TABLE {0} ADD CONSTRAINT {1} PRIMARY KEY ({2}){3}", [
			this.quote(this.table.name),
			this.quote(this.name),
			this.quoteList(this._fields.map(f => f.name)),
			writer.delimiter,
		]);
	}
}

export type RelationType = "one-to-one" | "many-to-many";

export interface ForeignKeyOptions {
	readonly name: string;
	readonly table: Table;
	readonly fields: readonly Field[];
	readonly referenceTable: Table;
	/** Parallel to `fields` */
	readonly referenceFields: readonly Field[];
	readonly relationType: RelationType;
}

export class ForeignKey extends SchemaObject {
	readonly name: string;
	readonly table: Table;
	readonly fields: readonly Field[];
	readonly referenceTable: Table;
	readonly referenceFields: readonly Field[];
	readonly relationType: RelationType;

	constructor(context: RenderContext, options: ForeignKeyOptions) {
		super(context);
		this.name = options.name;
		this.table = options.table;
		this.fields = options.fields;
		this.referenceTable = options.referenceTable;
		this.referenceFields = options.referenceFields;
		this.relationType = options.relationType;
	}

	toCreateDDL(writer: DdlWriter): void {
		writer.println();
		writer.println("ALTER TABLE {0} ADD CONSTRAINT {1} FOREIGN KEY ({2}) REFERENCES {3} ({4}){5}{6}", [
			this.quote(this.table.name),
			this.quote(this.name),
			this.quoteList(this.fields.map(f => f.name)),
			this.quote(this.referenceTable.name),
			this.quoteList(this.referenceFields.map(f => f.name)),
			this.referentialActions(),
			writer.delimiter,
		]);
	}

	protected referentialActions(): string {
		const { onDelete, onUpdate } = this.configuration.foreignKey;
		return (onDelete ? ` ON DELETE ${onDelete}` : "") + (onUpdate ? ` ON UPDATE ${onUpdate}` : "");
	}
}

export interface IndexOptions {
	readonly name: string;
	readonly table: Table;
	readonly fields: readonly Field[];
	readonly unique: boolean;
}

export class Index extends SchemaObject {
	readonly name: string;
	readonly table: Table;
	readonly fields: readonly Field[];
	readonly unique: boolean;

	constructor(context: RenderContext, options: IndexOptions) {
		super(context);
		this.name = options.name;
		this.table = options.table;
		this.fields = options.fields;
		this.unique = options.unique;
	}

	toCreateDDL(writer: DdlWriter): void {
		writer.println();
		writer.println("CREATE {0}INDEX {1} ON {2} ({3}){4}", [
			this.unique ? "UNIQUE " : "",
			this.quote(this.name),
			this.quote(this.table.name),
			this.quoteList(this.fields.map(f => f.name)),
			writer.delimiter,
		]);
	}
}

// === Key generators ===

export const KeyGeneratorStrategy = {
	Max: "MAX",
	HighLow: "HIGH-LOW",
	Uuid: "UUID",
	Identity: "IDENTITY",
	Sequence: "SEQUENCE",
} as const;

/**
 * A named key-generation strategy. One generator may serve several tables,
 * so the table it renders for is assigned right before rendering.
 */
export class KeyGenerator extends SchemaObject {
	private _table: Table | undefined;

	constructor(
		context: RenderContext,
		public readonly alias: string,
		public readonly strategy: string,
		public readonly parameters: Readonly<Record<string, string>> = {}
	) {
		super(context);
	}

	get table(): Table | undefined {
		return this._table;
	}

	setTable(table: Table): void {
		this._table = table;
	}

	/** Most strategies work without database objects of their own */
	toCreateDDL(_writer: DdlWriter): void { }
}

// === Factory ===

/**
 * Creates the schema objects of one dialect. Dialects override the methods
 * whose objects render differently from standard SQL.
 */
export class SchemaObjectFactory {
	constructor(protected readonly context: RenderContext) { }

	createSchema(): Schema {
		return new Schema(this.context);
	}

	createTable(name: string): Table {
		return new Table(this.context, name, table => this.createPrimaryKey(table));
	}

	createPrimaryKey(table: Table): PrimaryKey {
		return new PrimaryKey(this.context, table);
	}

	createField(options: FieldOptions): Field {
		return new Field(this.context, options);
	}

	createForeignKey(options: ForeignKeyOptions): ForeignKey {
		return new ForeignKey(this.context, options);
	}

	createIndex(options: IndexOptions): Index {
		return new Index(this.context, options);
	}
}
