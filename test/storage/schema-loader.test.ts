/**
 * Tests for schema SQL loading and statement splitting.
 */

import { describe, it, expect } from 'vitest';
import { loadSchemaStatements, splitStatements } from '../../src/storage/schema-loader.js';

describe('schema-loader', () => {
  describe('splitStatements', () => {
    it('splits on trailing semicolons', () => {
      const sql = 'CREATE TABLE a (id INTEGER);\nCREATE TABLE b (id INTEGER);';

      expect(splitStatements(sql)).toEqual(['CREATE TABLE a (id INTEGER)', 'CREATE TABLE b (id INTEGER)']);
    });

    it('skips comments and blank lines between statements', () => {
      const sql = '-- header\n\nCREATE TABLE a (id INTEGER);\n-- trailing note\n';

      expect(splitStatements(sql)).toEqual(['CREATE TABLE a (id INTEGER)']);
    });

    it('keeps a trigger body in one statement', () => {
      const sql = [
        'CREATE TRIGGER t AFTER INSERT ON a BEGIN',
        '  INSERT INTO b VALUES (new.id);',
        '  INSERT INTO c VALUES (new.id);',
        'END;',
        'CREATE INDEX i ON a(id);',
      ].join('\n');

      const statements = splitStatements(sql);

      expect(statements).toHaveLength(2);
      expect(statements[0]).toBe(
        'CREATE TRIGGER t AFTER INSERT ON a BEGIN\n' +
          '  INSERT INTO b VALUES (new.id);\n' +
          '  INSERT INTO c VALUES (new.id);\n' +
          'END',
      );
      expect(statements[1]).toBe('CREATE INDEX i ON a(id)');
    });

    it('keeps a statement without a final semicolon', () => {
      expect(splitStatements('SELECT 1')).toEqual(['SELECT 1']);
    });
  });

  describe('loadSchemaStatements', () => {
    it('loads every statement of the bundled schema', () => {
      const statements = loadSchemaStatements();

      expect(statements).toHaveLength(12);
      expect(statements.filter((s) => s.startsWith('CREATE TRIGGER'))).toHaveLength(3);
      expect(statements.some((s) => s.includes('USING fts5'))).toBe(true);
    });
  });
});
