import { describe, test, expect } from 'vitest';
import type { MappingDocument } from '../model';
import { generateDdl } from '../generator';
import { escapeMysqlIdentifier, mysql } from './mysql';
import { defaultConfiguration } from '../configuration';
import { StructuralMappingError } from '../errors';

const document: MappingDocument = {
  keyGenerators: [],
  classes: [
    {
      name: 'Author',
      table: 'author',
      keyGenerator: 'IDENTITY',
      fields: [
        { name: 'id', type: 'integer', identity: true, required: false, columns: ['id'] },
        { name: 'bio', type: 'clob', identity: false, required: false, columns: ['bio'] },
        { name: 'photo', type: 'varbinary', identity: false, required: false, columns: ['photo'] },
      ],
    },
  ],
};

describe('mysql', () => {
  test('escapes identifiers with backticks', () => {
    expect(escapeMysqlIdentifier('order')).toBe('`order`');
    expect(escapeMysqlIdentifier('a`b')).toBe('`a``b`');
  });

  test('writes MySQL flavoured statements', () => {
    const ddl = generateDdl(document, {
      dialect: 'MySQL',
      configuration: { schemaName: 'library', mysql: { storageEngine: 'InnoDB' } },
    });

    expect(ddl).toBe([
      '-- MySQL schema',
      '-- Generated by ddl-synth',
      '',
      'CREATE DATABASE IF NOT EXISTS `library`;',
      'USE `library`;',
      '',
      'DROP TABLE IF EXISTS `author`;',
      '',
      'CREATE TABLE `author` (',
      '    `id` INTEGER NOT NULL,',
      '    `bio` LONGTEXT,',
      '    `photo` VARBINARY(255)',
      ') ENGINE=InnoDB;',
      '',
      'ALTER TABLE `author` ADD PRIMARY KEY (`id`);',
      '',
    ].join('\n'));
  });

  test('has no sequence key generator', () => {
    const sequenced: MappingDocument = {
      ...document,
      keyGenerators: [{ name: 'seq', strategy: 'SEQUENCE', parameters: {} }],
    };

    expect(() => generateDdl(sequenced, { dialect: 'mysql' })).toThrow(StructuralMappingError);
  });

  test('maps types with the configured defaults', () => {
    const types = mysql.createTypeMapper({ ...defaultConfiguration, typeDefaults: { charLength: 3, varcharLength: 64, binaryLength: 16 } });

    expect(types.lookup('char')?.toDDL()).toBe('CHAR(3)');
    expect(types.lookup('varchar')?.toDDL()).toBe('VARCHAR(64)');
    expect(types.lookup('binary')?.toDDL()).toBe('BINARY(16)');
    expect(types.lookup('bit')?.toDDL()).toBe('BIT');
    expect(types.lookup('double')?.toDDL()).toBe('DOUBLE');
  });
});
