/**
 * Mapping description types: the already-parsed object graph the schema builder reads.
 *
 * Design principle: Immutable, readonly types. The builder never mutates its input.
 */

// === Mapping Types ===

export interface MappingDocument {
  readonly keyGenerators: readonly KeyGeneratorDescriptor[];
  readonly classes: readonly ClassDescriptor[];
}

export interface ClassDescriptor {
  readonly name: string;
  /** Mapped table. Classes without one are not persisted and produce no table. */
  readonly table?: string;
  readonly extends?: ClassDescriptor;
  /** Name of a key generator, either defined by the document or a built-in strategy */
  readonly keyGenerator?: string;
  /** Identity field names, used when no field carries its own identity flag */
  readonly identity?: readonly string[];
  readonly fields: readonly FieldDescriptor[];
  readonly indexes?: readonly IndexDescriptor[];
}

export interface FieldDescriptor {
  readonly name: string;
  /** Primitive type name or the name of another class */
  readonly type: string;
  readonly identity: boolean;
  readonly required: boolean;
  readonly columns: readonly string[];
  /** Column type override, e.g. `varchar[40]` */
  readonly sqlType?: string;
  /** Junction table of a many-to-many relation */
  readonly manyTable?: string;
  readonly manyKey?: readonly string[];
}

export interface IndexDescriptor {
  readonly name?: string;
  readonly columns: readonly string[];
  readonly unique: boolean;
}

export interface KeyGeneratorDescriptor {
  readonly name: string;
  readonly strategy: string;
  readonly parameters: Readonly<Record<string, string>>;
}

// === Helpers ===

export function isManyToMany(field: FieldDescriptor): boolean {
  return field.manyTable !== undefined;
}
