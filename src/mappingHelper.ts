import type { ClassDescriptor, FieldDescriptor, MappingDocument } from "./model";
import type { TypeMapper } from "./typeInfo";
import { isManyToMany } from "./model";
import { StructuralMappingError, TypeNotFoundException } from "./errors";

/**
 * Identity and type questions about the classes of one mapping document.
 */
export class MappingHelper {
	private readonly _classesByName = new Map<string, ClassDescriptor>();

	constructor(document: MappingDocument, private readonly _typeMapper: TypeMapper) {
		for (const cls of document.classes) {
			if (!this._classesByName.has(cls.name)) {
				this._classesByName.set(cls.name, cls);
			}
		}
	}

	/**
	 * True if any field of the class carries its own identity flag. Such
	 * classes ignore the class-level identity list.
	 */
	isUsingExplicitFieldIdentity(cls: ClassDescriptor): boolean {
		return cls.fields.some(f => f.identity);
	}

	isIdentityByConvention(cls: ClassDescriptor, field: FieldDescriptor): boolean {
		return cls.identity?.includes(field.name) ?? false;
	}

	isIdentity(cls: ClassDescriptor, field: FieldDescriptor): boolean {
		return this.isUsingExplicitFieldIdentity(cls)
			? field.identity
			: this.isIdentityByConvention(cls, field);
	}

	findClassByName(name: string): ClassDescriptor | undefined {
		return this._classesByName.get(name);
	}

	/**
	 * Identity fields that map to columns. Without identities of its own a
	 * class inherits those of the class it extends, if asked to.
	 */
	identityFields(cls: ClassDescriptor, includeInherited: boolean): FieldDescriptor[] {
		const own = cls.fields.filter(
			f => !isManyToMany(f) && f.columns.length > 0 && this.isIdentity(cls, f)
		);
		if (own.length === 0 && includeInherited && cls.extends) {
			return this.identityFields(cls.extends, true);
		}
		return own;
	}

	sqlIdentityColumnNames(cls: ClassDescriptor, includeInherited: boolean): string[] {
		return this.identityFields(cls, includeInherited).flatMap(f => [...f.columns]);
	}

	/**
	 * Type names of the identity columns, one per column, following references
	 * to other classes until primitive types are reached.
	 */
	resolveIdentityTypeNames(cls: ClassDescriptor): string[] {
		return this.resolveIdentityTypeNamesVisiting(cls, new Set());
	}

	private resolveIdentityTypeNamesVisiting(cls: ClassDescriptor, visiting: Set<string>): string[] {
		if (visiting.has(cls.name)) {
			throw new StructuralMappingError(`Identity of class '${cls.name}' refers back to itself`);
		}
		visiting.add(cls.name);
		const result = this.identityFields(cls, true).flatMap(f => this.columnTypeNames(cls, f, visiting));
		visiting.delete(cls.name);
		return result;
	}

	private columnTypeNames(cls: ClassDescriptor, field: FieldDescriptor, visiting: Set<string>): string[] {
		if (field.sqlType !== undefined && this._typeMapper.lookup(field.sqlType)) {
			const sqlType = field.sqlType;
			return field.columns.map(() => sqlType);
		}
		const reference = this.findClassByName(field.type);
		if (reference) {
			return this.resolveIdentityTypeNamesVisiting(reference, visiting);
		}
		if (this._typeMapper.lookup(field.type)) {
			return field.columns.map(() => field.type);
		}
		throw new TypeNotFoundException(
			`Cannot resolve type '${field.type}' of identity field '${field.name}' in class '${cls.name}'`,
			cls.name,
			field.name
		);
	}
}
