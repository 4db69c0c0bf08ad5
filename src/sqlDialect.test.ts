import { describe, it, expect } from 'vitest';
import {
	MySQLDialect, PostgreSQLDialect, SQLiteDialect, formatIsoDate, formatIsoTimestamp, getDialect, isDialectName, parseDateTimeParts
} from './sqlDialect';

describe('SqlDialect - Unit Tests', () =>
{
	const mysql = new MySQLDialect();
	const postgresql = new PostgreSQLDialect();
	const sqlite = new SQLiteDialect();

	describe('Identifier escaping', () =>
	{
		it('should quote each part of a qualified identifier', () =>
		{
			expect(mysql.escapeIdentifier('users.id')).toBe('`users`.`id`');
			expect(postgresql.escapeIdentifier('users.id')).toBe('"users"."id"');
			expect(sqlite.escapeIdentifier('users.id')).toBe('"users"."id"');
		});

		it('should double embedded closing quotes', () =>
		{
			expect(mysql.quoteIdentifierPart('a`b')).toBe('`a``b`');
			expect(postgresql.quoteIdentifierPart('a"b')).toBe('"a""b"');
		});

		it('should treat # as a comment only for MySQL', () =>
		{
			expect([mysql.hashComments, postgresql.hashComments, sqlite.hashComments]).toEqual([true, false, false]);
		});
	});

	describe('String literals', () =>
	{
		it('should double single quotes', () =>
		{
			expect(postgresql.quoteString("O'Brien")).toBe("'O''Brien'");
			expect(sqlite.quoteString("O'Brien")).toBe("'O''Brien'");
		});

		it('should also escape backslashes for MySQL', () =>
		{
			expect(mysql.quoteString("it's \\ here")).toBe("'it''s \\\\ here'");
			expect(postgresql.quoteString('a\\b')).toBe("'a\\b'");
		});
	});

	describe('Booleans and dates', () =>
	{
		const day = { year: 2024, month: 3, day: 5 };
		const moment = { ...day, time: { hour: 7, minute: 8, second: 9 } };

		it('should format booleans per dialect', () =>
		{
			expect(mysql.formatBoolean(true)).toBe('TRUE');
			expect(postgresql.formatBoolean(false)).toBe('FALSE');
			expect(sqlite.formatBoolean(true)).toBe('1');
			expect(sqlite.formatBoolean(false)).toBe('0');
		});

		it('should format dates and timestamps per dialect', () =>
		{
			expect(mysql.formatDate(day)).toBe("'2024-03-05'");
			expect(sqlite.formatTimestamp(moment)).toBe("'2024-03-05 07:08:09'");
			expect(postgresql.formatDate(day)).toBe("DATE '2024-03-05'");
			expect(postgresql.formatTimestamp(moment)).toBe("TIMESTAMP '2024-03-05 07:08:09'");
		});

		it('should default the time of a timestamp to midnight', () =>
		{
			expect(formatIsoDate(moment)).toBe('2024-03-05');
			expect(formatIsoTimestamp(day)).toBe('2024-03-05 00:00:00');
		});
	});

	describe('parseDateTimeParts', () =>
	{
		it('should read dates with and without a time', () =>
		{
			expect(parseDateTimeParts('2024-02-29')).toEqual({ year: 2024, month: 2, day: 29 });
			expect(parseDateTimeParts('2024-02-29 13:45')).toEqual({
				year: 2024, month: 2, day: 29, time: { hour: 13, minute: 45, second: 0 }
			});
			expect(parseDateTimeParts(' 2024-02-29T13:45:30 ')).toEqual({
				year: 2024, month: 2, day: 29, time: { hour: 13, minute: 45, second: 30 }
			});
		});

		it('should reject impossible or malformed values', () =>
		{
			expect(parseDateTimeParts('2023-02-29')).toBeUndefined();
			expect(parseDateTimeParts('2024-13-01')).toBeUndefined();
			expect(parseDateTimeParts('2024-01-01 24:00')).toBeUndefined();
			expect(parseDateTimeParts('yesterday')).toBeUndefined();
		});
	});

	describe('getDialect', () =>
	{
		it('should return shared instances by name', () =>
		{
			expect(getDialect('mysql')).toBeInstanceOf(MySQLDialect);
			expect(getDialect('postgresql')).toBeInstanceOf(PostgreSQLDialect);
			expect(getDialect('sqlite')).toBe(getDialect('sqlite'));
		});

		it('should reject unknown names', () =>
		{
			expect(isDialectName('oracle')).toBe(false);
			expect(() => getDialect('oracle')).toThrow("Unknown SQL dialect: 'oracle'");
		});
	});
});
