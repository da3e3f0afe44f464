/**
 * Tests for the guards applied to generated SQL
 */

import {
  DestructiveSqlError,
  ensureLimit,
  findDestructiveKeyword,
  prepareSql,
  stripSqlFences
} from './sqlGuard';

describe('sqlGuard', () => {
  describe('stripSqlFences', () => {
    it('should remove sql code fences', () => {
      expect(stripSqlFences('```sql\nSELECT 1\n```')).toBe('SELECT 1');
    });

    it('should remove bare code fences', () => {
      expect(stripSqlFences('```\nSELECT name FROM location\n```\n')).toBe('SELECT name FROM location');
    });

    it('should leave unfenced SQL alone', () => {
      expect(stripSqlFences('  SELECT 1  ')).toBe('SELECT 1');
    });
  });

  describe('ensureLimit', () => {
    it('should append a limit and drop the trailing semicolon', () => {
      expect(ensureLimit('SELECT * FROM employee;', 80)).toBe('SELECT * FROM employee LIMIT 80');
    });

    it('should keep an existing limit', () => {
      expect(ensureLimit('SELECT * FROM employee LIMIT 5', 80)).toBe('SELECT * FROM employee LIMIT 5');
    });

    it('should not touch statements that do not start with SELECT', () => {
      expect(ensureLimit('WITH t AS (SELECT 1) SELECT * FROM t', 80)).toBe('WITH t AS (SELECT 1) SELECT * FROM t');
    });
  });

  describe('findDestructiveKeyword', () => {
    test.each([
      ['DROP TABLE employee', 'DROP'],
      ['delete from time_entry where id = 1', 'DELETE'],
      ['SELECT 1; TRUNCATE TABLE absence', 'TRUNCATE'],
      ['MERGE INTO employee USING staging ON TRUE', 'MERGE']
    ])('should flag "%s"', (sql, keyword) => {
      expect(findDestructiveKeyword(sql)).toBe(keyword);
    });

    test.each([
      "SELECT * FROM activity WHERE description = 'drop off'",
      'SELECT updated_at, created_date FROM time_entry',
      'SELECT `delete` FROM audit_log',
      'SELECT 1 -- delete later'
    ])('should allow "%s"', sql => {
      expect(findDestructiveKeyword(sql)).toBeNull();
    });
  });

  describe('prepareSql', () => {
    it('should strip fences and add a limit', () => {
      expect(prepareSql('```sql\nSELECT id FROM employee\n```', 80)).toBe('SELECT id FROM employee LIMIT 80');
    });

    it('should throw for statements that modify data', () => {
      expect(() => prepareSql('UPDATE employee SET active = false', 80)).toThrow(DestructiveSqlError);
      expect(() => prepareSql('UPDATE employee SET active = false', 80)).toThrow(
        "Destructive operation 'UPDATE' not allowed"
      );
    });
  });
});
