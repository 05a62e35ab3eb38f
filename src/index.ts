// Mapping model
export type {
  MappingDocument,
  ClassDescriptor,
  FieldDescriptor,
  IndexDescriptor,
  KeyGeneratorDescriptor,
} from './model';

export { isManyToMany } from './model';

// Mapping files
export type {
  MappingFile,
  MappingFileClass,
  MappingFileField,
  MappingFileIndex,
  MappingFileKeyGenerator,
} from './mappingDocument';
export { parseMappingDocument, loadMappingDocument, toMappingDocument, mappingJsonSchema } from './mappingDocument';

// Configuration
export type {
  GeneratorConfiguration,
  PartialConfiguration,
  StatementToggles,
  TypeDefaults,
  ReferentialAction,
} from './configuration';
export {
  defaultConfiguration,
  resolveConfiguration,
  parseConfiguration,
  loadConfiguration,
  configurationJsonSchema,
  GROUP_BY_TABLE,
  GROUP_BY_DDL_TYPE,
} from './configuration';

// Errors
export { GeneratorError, TypeNotFoundException, StructuralMappingError, InvalidDocumentError } from './errors';

// Schema model
export type {
  RenderContext,
  FieldOptions,
  ForeignKeyOptions,
  IndexOptions,
  RelationType,
} from './schemaObjects';
export {
  SchemaObject,
  Schema,
  Table,
  Field,
  PrimaryKey,
  ForeignKey,
  Index,
  KeyGenerator,
  KeyGeneratorStrategy,
  SchemaObjectFactory,
} from './schemaObjects';

// Types
export type { TypeInfo, TypeMapper, TypeDefinition } from './typeInfo';
export { DialectTypeMapper, NoParamType, LengthType, PrecisionType, parseTypeName } from './typeInfo';

// Key generators
export type { KeyGeneratorFactory } from './keyGenerators';
export {
  KeyGeneratorRegistry,
  SequenceKeyGenerator,
  simpleKeyGeneratorFactory,
  sequenceKeyGeneratorFactory,
} from './keyGenerators';

// Schema derivation
export { MappingHelper } from './mappingHelper';
export { SchemaBuilder } from './schemaBuilder';

// DDL generation
export type { Dialect } from './dialect';
export { DdlWriter, formatTemplate } from './ddlWriter';
export type { GenerateDdlOptions } from './generator';
export { DdlGenerator, generateDdl } from './generator';
export { getDialect, listDialects, postgresql, mysql, escapeIdentifier, escapeMysqlIdentifier } from './dialects';
