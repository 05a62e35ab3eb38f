import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createProgram, type CliIO } from './program';
import { InvalidDocumentError, StructuralMappingError } from './errors';

const mapping = {
  classes: [
    {
      name: 'Customer',
      table: 'customer',
      fields: [{ name: 'id', type: 'integer', identity: true, columns: ['id'] }],
    },
    {
      name: 'Order',
      table: 'orders',
      fields: [
        { name: 'id', type: 'integer', identity: true, columns: ['id'] },
        { name: 'customer', type: 'Customer', columns: ['customer_id'] },
      ],
    },
  ],
};

describe('ddl-synth CLI', () => {
  let tempDir: string;
  let mappingPath: string;
  let out: string[];
  let log: string[];
  let io: CliIO;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ddl-synth-test-'));
    mappingPath = path.join(tempDir, 'mapping.json');
    fs.writeFileSync(mappingPath, JSON.stringify(mapping));
    out = [];
    log = [];
    io = { out: text => out.push(text), log: message => log.push(message) };
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function run(...args: string[]): void {
    createProgram(io).parse(args, { from: 'user' });
  }

  test('writes the script to stdout', () => {
    run('generate', mappingPath, '--no-drop', '--no-foreign-keys');

    expect(out.join('')).toBe([
      '-- PostgreSQL schema',
      '-- Generated by ddl-synth',
      '',
      'CREATE TABLE "customer" (',
      '    "id" INTEGER NOT NULL',
      ');',
      '',
      'ALTER TABLE "customer" ADD CONSTRAINT "pk_customer" PRIMARY KEY ("id");',
      '',
      'CREATE TABLE "orders" (',
      '    "id" INTEGER NOT NULL,',
      '    "customer_id" INTEGER',
      ');',
      '',
      'ALTER TABLE "orders" ADD CONSTRAINT "pk_orders" PRIMARY KEY ("id");',
      '',
    ].join('\n'));
    expect(log).toEqual([]);
  });

  test('writes the script to a file', () => {
    const outputPath = path.join(tempDir, 'schema.sql');

    run('generate', mappingPath, '--dialect', 'mysql', '--group-by', 'ddltype', '-o', outputPath);

    expect(out).toEqual([]);
    expect(log).toEqual([`Wrote ${outputPath}`]);
    expect(fs.readFileSync(outputPath, 'utf-8')).toBe([
      '-- MySQL schema',
      '-- Generated by ddl-synth',
      '',
      'DROP TABLE IF EXISTS `customer`;',
      '',
      'DROP TABLE IF EXISTS `orders`;',
      '',
      'CREATE TABLE `customer` (',
      '    `id` INTEGER NOT NULL',
      ');',
      '',
      'CREATE TABLE `orders` (',
      '    `id` INTEGER NOT NULL,',
      '    `customer_id` INTEGER',
      ');',
      '',
      'ALTER TABLE `customer` ADD PRIMARY KEY (`id`);',
      '',
      'ALTER TABLE `orders` ADD PRIMARY KEY (`id`);',
      '',
      'ALTER TABLE `orders` ADD CONSTRAINT `orders_customer` FOREIGN KEY (`customer_id`) REFERENCES `customer` (`id`);',
      '',
    ].join('\n'));
  });

  test('reads a configuration file and lets options override it', () => {
    const configPath = path.join(tempDir, 'config.json');
    fs.writeFileSync(configPath, JSON.stringify({
      schemaName: 'sales',
      generate: { create: false, primaryKey: false },
      foreignKey: { onDelete: 'CASCADE' },
    }));

    run('generate', mappingPath, '-c', configPath, '--no-drop', '--schema-name', 'shop');

    expect(out.join('')).toBe([
      '-- PostgreSQL schema',
      '-- Generated by ddl-synth',
      '',
      'CREATE SCHEMA IF NOT EXISTS "shop";',
      'SET search_path TO "shop";',
      '',
      'ALTER TABLE "orders" ADD CONSTRAINT "orders_customer" FOREIGN KEY ("customer_id") REFERENCES "customer" ("id") ON DELETE CASCADE;',
      '',
    ].join('\n'));
  });

  test('lists the dialects', () => {
    run('dialects');

    expect(log).toEqual(['postgresql\tPostgreSQL', 'mysql\tMySQL']);
  });

  test('reports invalid mapping files', () => {
    fs.writeFileSync(mappingPath, JSON.stringify({ tables: [] }));

    expect(() => run('generate', mappingPath)).toThrow(InvalidDocumentError);
  });

  test('reports unknown dialects', () => {
    expect(() => run('generate', mappingPath, '-d', 'sqlite')).toThrow(StructuralMappingError);
    expect(out).toEqual([]);
  });
});
