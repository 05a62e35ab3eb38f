import { describe, test, expect } from 'vitest';
import type { ClassDescriptor, FieldDescriptor, MappingDocument } from './model';
import { DdlGenerator, generateDdl } from './generator';
import { resolveConfiguration } from './configuration';
import { postgresql } from './dialects';
import { StructuralMappingError } from './errors';

function field(name: string, type: string, options: Partial<FieldDescriptor> = {}): FieldDescriptor {
  return { name, type, identity: false, required: false, columns: [name], ...options };
}

function lines(...text: string[]): string {
  return [...text, ''].join('\n');
}

const product: MappingDocument = {
  keyGenerators: [],
  classes: [{
    name: 'Product',
    table: 'prod',
    fields: [field('id', 'integer', { identity: true }), field('name', 'varchar')],
  }],
};

const customer: ClassDescriptor = {
  name: 'Customer',
  table: 'customer',
  fields: [field('id', 'integer', { identity: true }), field('name', 'varchar', { required: true })],
};

const order: ClassDescriptor = {
  name: 'Order',
  table: 'orders',
  keyGenerator: 'order_seq',
  fields: [
    field('id', 'bigint', { identity: true }),
    field('customer', 'Customer', { columns: ['customer_id'] }),
  ],
  indexes: [{ columns: ['customer_id'], unique: false }],
};

const shop: MappingDocument = {
  keyGenerators: [{ name: 'order_seq', strategy: 'SEQUENCE', parameters: { sequence: '{0}_id_seq' } }],
  classes: [customer, order],
};

describe('DdlGenerator', () => {
  test('writes a single table', () => {
    expect(generateDdl(product)).toBe(lines(
      '-- PostgreSQL schema',
      '-- Generated by ddl-synth',
      '',
      'DROP TABLE IF EXISTS "prod" CASCADE;',
      '',
      'CREATE TABLE "prod" (',
      '    "id" INTEGER NOT NULL,',
      '    "name" VARCHAR(255)',
      ');',
      '',
      'ALTER TABLE "prod" ADD CONSTRAINT "pk_prod" PRIMARY KEY ("id");',
    ));
  });

  test('groups statements by table', () => {
    expect(generateDdl(shop, { configuration: { groupBy: 'table' } })).toBe(lines(
      '-- PostgreSQL schema',
      '-- Generated by ddl-synth',
      '',
      'DROP TABLE IF EXISTS "customer" CASCADE;',
      '',
      'CREATE TABLE "customer" (',
      '    "id" INTEGER NOT NULL,',
      '    "name" VARCHAR(255) NOT NULL',
      ');',
      '',
      'ALTER TABLE "customer" ADD CONSTRAINT "pk_customer" PRIMARY KEY ("id");',
      '',
      'DROP TABLE IF EXISTS "orders" CASCADE;',
      '',
      'CREATE TABLE "orders" (',
      '    "id" BIGINT NOT NULL,',
      '    "customer_id" INTEGER',
      ');',
      '',
      'ALTER TABLE "orders" ADD CONSTRAINT "pk_orders" PRIMARY KEY ("id");',
      '',
      'ALTER TABLE "orders" ADD CONSTRAINT "orders_customer" FOREIGN KEY ("customer_id") REFERENCES "customer" ("id");',
      '',
      'CREATE INDEX "idx_orders_customer_id" ON "orders" ("customer_id");',
      '',
      'CREATE SEQUENCE IF NOT EXISTS "orders_id_seq";',
    ));
  });

  test('groups statements by kind', () => {
    expect(generateDdl(shop, { configuration: { groupBy: 'DDLType' } })).toBe(lines(
      '-- PostgreSQL schema',
      '-- Generated by ddl-synth',
      '',
      'DROP TABLE IF EXISTS "customer" CASCADE;',
      '',
      'DROP TABLE IF EXISTS "orders" CASCADE;',
      '',
      'CREATE TABLE "customer" (',
      '    "id" INTEGER NOT NULL,',
      '    "name" VARCHAR(255) NOT NULL',
      ');',
      '',
      'CREATE TABLE "orders" (',
      '    "id" BIGINT NOT NULL,',
      '    "customer_id" INTEGER',
      ');',
      '',
      'ALTER TABLE "customer" ADD CONSTRAINT "pk_customer" PRIMARY KEY ("id");',
      '',
      'ALTER TABLE "orders" ADD CONSTRAINT "pk_orders" PRIMARY KEY ("id");',
      '',
      'ALTER TABLE "orders" ADD CONSTRAINT "orders_customer" FOREIGN KEY ("customer_id") REFERENCES "customer" ("id");',
      '',
      'CREATE INDEX "idx_orders_customer_id" ON "orders" ("customer_id");',
      '',
      'CREATE SEQUENCE IF NOT EXISTS "orders_id_seq";',
    ));
  });

  test('leaves out disabled statement kinds', () => {
    const ddl = generateDdl(shop, {
      configuration: {
        generate: { drop: false, create: false, primaryKey: false, index: false, keyGenerator: false },
        foreignKey: { onDelete: 'CASCADE', onUpdate: 'NO ACTION' },
      },
    });

    expect(ddl).toBe(lines(
      '-- PostgreSQL schema',
      '-- Generated by ddl-synth',
      '',
      'ALTER TABLE "orders" ADD CONSTRAINT "orders_customer" FOREIGN KEY ("customer_id") REFERENCES "customer" ("id")' +
        ' ON DELETE CASCADE ON UPDATE NO ACTION;',
    ));
  });

  test('creates the configured schema first', () => {
    const ddl = generateDdl(product, {
      configuration: { schemaName: 'shop', generate: { drop: false, create: false, primaryKey: false } },
    });

    expect(ddl).toBe(lines(
      '-- PostgreSQL schema',
      '-- Generated by ddl-synth',
      '',
      'CREATE SCHEMA IF NOT EXISTS "shop";',
      'SET search_path TO "shop";',
    ));
    expect(generateDdl(product, {
      configuration: { schemaName: 'shop', generate: { schema: false, drop: false, create: false, primaryKey: false } },
    })).toBe(lines('-- PostgreSQL schema', '-- Generated by ddl-synth'));
  });

  test('marks identity-generated columns', () => {
    const document: MappingDocument = {
      keyGenerators: [],
      classes: [{ ...product.classes[0], keyGenerator: 'identity' }],
    };

    const ddl = generateDdl(document, { configuration: { generate: { drop: false, primaryKey: false } } });

    expect(ddl).toBe(lines(
      '-- PostgreSQL schema',
      '-- Generated by ddl-synth',
      '',
      'CREATE TABLE "prod" (',
      '    "id" INTEGER NOT NULL GENERATED BY DEFAULT AS IDENTITY,',
      '    "name" VARCHAR(255)',
      ');',
    ));
  });

  test('writes tables without columns', () => {
    const document: MappingDocument = { keyGenerators: [], classes: [{ name: 'Marker', table: 'marker', fields: [] }] };

    expect(generateDdl(document, { configuration: { generate: { drop: false } } })).toBe(lines(
      '-- PostgreSQL schema',
      '-- Generated by ddl-synth',
      '',
      'CREATE TABLE "marker" ();',
    ));
  });

  test('rejects unknown grouping modes before building', () => {
    const broken: MappingDocument = {
      keyGenerators: [],
      classes: [{ name: 'Broken', table: 'broken', fields: [field('value', 'Money')] }],
    };
    const generator = new DdlGenerator(postgresql, resolveConfiguration({ groupBy: 'column' }));

    expect(() => generator.generate(broken)).toThrow(StructuralMappingError);
    expect(() => generator.generate(broken)).toThrow("Unsupported grouping 'column', expected 'table' or 'ddltype'");
  });

  test('rejects unknown dialects', () => {
    expect(() => generateDdl(product, { dialect: 'oracle' }))
      .toThrow("Unsupported dialect 'oracle'. Supported: postgresql, mysql");
  });

  test('exposes the built schema', () => {
    const schema = new DdlGenerator(postgresql).createSchema(shop);

    expect(schema.tables.map(t => t.name)).toEqual(['customer', 'orders']);
  });
});
