/**
 * Unit tests for the structural validator (PSX_VAL1)
 */

import { describe, it, expect } from 'vitest';
import { StructuralValidator } from '../../../src/lib/validator/schema-validator.js';
import type { DocumentValue } from '../../../src/types/data-model.js';

const EXPECTED_TAGS = "['string', 'integer', 'float', 'boolean', 'date', 'datetime']";

function dataset(columns: DocumentValue[], extra: Record<string, DocumentValue> = {}): DocumentValue {
  return { fqn: 'sales.orders', name: 'orders', columns, ...extra };
}

describe('StructuralValidator', () => {
  const validator = new StructuralValidator();

  it('should identify itself as PSX_VAL1 and be cacheable', () => {
    expect(validator.ruleId).toBe('PSX_VAL1');
    expect(validator.cacheable).toBe(true);
  });

  describe('validate()', () => {
    it('should accept a dataset with every column type', () => {
      const document = dataset([
        { name: 'id', type: 'integer', primary_key: true, minimum: 1 },
        { name: 'code', type: 'string', min_length: 1, max_length: 8, pattern: '^[A-Z]+$' },
        { name: 'amount', type: 'float', minimum: 0.5, precision: 2 },
        { name: 'paid', type: 'boolean' },
        { name: 'due', type: 'date', format: 'DD/MM/YYYY' },
        { name: 'created', type: 'datetime', timezone: 'UTC' },
      ]);

      expect(validator.validate(document)).toEqual([]);
    });

    it('should accept an empty column list', () => {
      expect(validator.validate(dataset([]))).toEqual([]);
    });

    it('should accept scalar metadata and string lists', () => {
      const document = dataset([], {
        metadata: { owner: 'data-team', retention: 30, archived: false, note: null },
        tags: ['finance'],
        inherits: ['sales.base'],
        inherited_by: [],
      });

      expect(validator.validate(document)).toEqual([]);
    });

    it('should accept null for optional attributes', () => {
      const document: DocumentValue = {
        fqn: 'a.b',
        name: 'S',
        description: null,
        tags: null,
        metadata: null,
        columns: [
          { name: 'c', type: 'string', description: null, max_length: null, pattern: null },
          { name: 'd', type: 'datetime', timezone: null, format: null },
          { name: 'e', type: 'float', minimum: null, precision: null },
        ],
      };

      expect(validator.validate(document)).toEqual([]);
    });

    it('should reject null for required attributes and column flags', () => {
      const issues = validator.validate({
        fqn: null,
        name: 'orders',
        columns: [{ name: 'id', type: 'integer', nullable: null }],
      });

      expect(issues.map((issue) => [issue.kind, issue.location, issue.message])).toEqual([
        ['type_error', '$.fqn', "'fqn' expected to be 'string' type"],
        ['type_error', '$.columns[0].nullable', "'nullable' expected to be 'boolean' type"],
      ]);
    });

    it('should accept empty names', () => {
      expect(validator.validate({ fqn: '', name: '', columns: [{ name: '', type: 'boolean' }] })).toEqual([]);
    });

    it('should name only the real type when a nullable attribute is mistyped', () => {
      const issues = validator.validate(dataset([{ name: 'code', type: 'string', max_length: 'ten' }]));

      expect(issues.map((issue) => issue.message)).toEqual(["'max_length' expected to be 'integer' type"]);
    });

    it('should report missing required fields in declaration order', () => {
      const issues = validator.validate({ columns: [] });

      expect(issues).toEqual([
        {
          kind: 'missing',
          location: '$.fqn',
          message: "'fqn' attribute missing",
          detail: { type: 'required', msg: "must have required property 'fqn'" },
        },
        {
          kind: 'missing',
          location: '$.name',
          message: "'name' attribute missing",
          detail: { type: 'required', msg: "must have required property 'name'" },
        },
      ]);
    });

    it('should reject unknown attributes at the dataset level', () => {
      const issues = validator.validate(dataset([], { bogus: 'value' }));

      expect(issues).toHaveLength(1);
      expect(issues[0]).toMatchObject({
        kind: 'extra_field',
        location: '$.bogus',
        message: "invalid attribute 'bogus' provided",
      });
    });

    it('should reject attributes that do not belong to the column type', () => {
      const issues = validator.validate(dataset([{ name: 'id', type: 'integer', max_length: 10 }]));

      expect(issues).toHaveLength(1);
      expect(issues[0]).toMatchObject({
        kind: 'extra_field',
        location: '$.columns[0].max_length',
        message: "'max_length' invalid attribute for 'integer' type",
      });
    });

    it('should report an unknown column type at the type attribute', () => {
      const issues = validator.validate(
        dataset([
          { name: 'id', type: 'integer' },
          { name: 'ref', type: 'uuid' },
        ]),
      );

      expect(issues).toHaveLength(1);
      expect(issues[0]).toMatchObject({
        kind: 'discriminator_mismatch',
        location: '$.columns[1].type',
        message: `'type' expected to be one of ${EXPECTED_TAGS}`,
      });
      expect(issues[0]?.detail?.type).toBe('discriminator');
    });

    it('should report a non-string column type at the type attribute', () => {
      const issues = validator.validate(dataset([{ name: 'id', type: 5 }]));

      expect(issues).toHaveLength(1);
      expect(issues[0]).toMatchObject({
        kind: 'discriminator_mismatch',
        location: '$.columns[0].type',
        message: `'type' expected to be one of ${EXPECTED_TAGS}`,
      });
    });

    it('should report a column without a type at the column', () => {
      const issues = validator.validate(dataset([{ name: 'id' }]));

      expect(issues).toHaveLength(1);
      expect(issues[0]).toMatchObject({
        kind: 'discriminator_mismatch',
        location: '$.columns[0]',
        message: "'type' attribute missing",
      });
    });

    it('should report a column that is not a mapping', () => {
      const issues = validator.validate(dataset(['id']));

      expect(issues).toHaveLength(1);
      expect(issues[0]).toMatchObject({
        kind: 'discriminator_mismatch',
        location: '$.columns[0]',
      });
    });

    it('should report wrong value types with friendly type names', () => {
      const issues = validator.validate({ fqn: 42, name: 'orders', columns: 'id' });

      expect(issues.map((issue) => [issue.kind, issue.location, issue.message])).toEqual([
        ['type_error', '$.fqn', "'fqn' expected to be 'string' type"],
        ['type_error', '$.columns', "'columns' expected to be 'list' type"],
      ]);
    });

    it('should report a float where an integer bound is expected', () => {
      const issues = validator.validate(dataset([{ name: 'qty', type: 'integer', minimum: 1.5 }]));

      expect(issues).toHaveLength(1);
      expect(issues[0]).toMatchObject({
        kind: 'type_error',
        location: '$.columns[0].minimum',
        message: "'minimum' expected to be 'integer' type",
      });
    });

    it('should report constraint violations', () => {
      const issues = validator.validate(
        dataset([
          { name: 'code', type: 'string', min_length: -1 },
          { name: 'amount', type: 'float', precision: -2 },
        ]),
      );

      expect(issues.map((issue) => [issue.kind, issue.location, issue.message])).toEqual([
        [
          'constraint_violation',
          '$.columns[0].min_length',
          "'min_length' should be greater than or equal to 0",
        ],
        [
          'constraint_violation',
          '$.columns[1].precision',
          "'precision' should be greater than or equal to 0",
        ],
      ]);
    });

    it('should reject nested metadata values', () => {
      const issues = validator.validate(dataset([], { metadata: { owner: { team: 'data' } } }));

      expect(issues).toHaveLength(1);
      expect(issues[0]).toMatchObject({ kind: 'type_error', location: '$.metadata.owner' });
    });

    it('should report every independent violation in one pass', () => {
      const issues = validator.validate(
        dataset([{ name: 'code', type: 'string', max_length: -1, colour: 'red' }], { bogus: 1 }),
      );

      expect(issues.map((issue) => issue.location)).toEqual([
        '$.bogus',
        '$.columns[0].colour',
        '$.columns[0].max_length',
      ]);
      expect(issues[1]?.message).toBe("'colour' invalid attribute for 'string' type");
    });

    it('should reject a document whose root is not a mapping', () => {
      const issues = validator.validate(['sales.orders']);

      expect(issues).toEqual([
        {
          kind: 'type_error',
          location: '$',
          message: "'$' expected to be 'object' type",
          detail: { type: 'type', msg: 'must be object' },
        },
      ]);
    });

    it('should keep numeric-looking mapping keys as keys in locations', () => {
      const issues = validator.validate(dataset([], { metadata: { '0': [1] } }));

      expect(issues[0]?.location).toBe('$.metadata.0');
    });
  });

  describe('required attributes', () => {
    it('should require extra dataset and column attributes', () => {
      const strict = new StructuralValidator({
        requiredAttributes: { dataset: ['description'], columns: { string: ['max_length'] } },
      });

      const issues = strict.validate(dataset([{ name: 'code', type: 'string' }, { name: 'n', type: 'integer' }]));

      expect(issues.map((issue) => [issue.kind, issue.location])).toEqual([
        ['missing', '$.description'],
        ['missing', '$.columns[0].max_length'],
      ]);
    });
  });

  describe('parse()', () => {
    it('should apply defaults to a conforming document', () => {
      const outcome = validator.parse(
        dataset([
          { name: 'due', type: 'date' },
          { name: 'created', type: 'datetime' },
          { name: 'id', type: 'integer', nullable: false },
        ]),
      );

      expect(outcome.issues).toEqual([]);
      expect(outcome.dataset?.version).toBe('1.0');
      expect(outcome.dataset?.columns).toEqual([
        { name: 'due', type: 'date', nullable: true, unique: false, primary_key: false, format: 'YYYY-MM-DD' },
        {
          name: 'created',
          type: 'datetime',
          nullable: true,
          unique: false,
          primary_key: false,
          format: 'YYYY-MM-DD HH:MM:SS',
        },
        { name: 'id', type: 'integer', nullable: false, unique: false, primary_key: false },
      ]);
    });

    it('should apply the default format when it is null', () => {
      const outcome = validator.parse(
        dataset([
          { name: 'due', type: 'date', format: null },
          { name: 'created', type: 'datetime', format: null, timezone: null },
        ]),
      );

      expect(outcome.issues).toEqual([]);
      expect(outcome.dataset?.columns.map((column) => ('format' in column ? column.format : undefined))).toEqual([
        'YYYY-MM-DD',
        'YYYY-MM-DD HH:MM:SS',
      ]);
    });

    it('should not return a dataset when there are issues', () => {
      const outcome = validator.parse({ fqn: 'sales.orders' });

      expect(outcome.dataset).toBeUndefined();
      expect(outcome.issues.map((issue) => issue.location)).toEqual(['$.name', '$.columns']);
    });
  });
});
