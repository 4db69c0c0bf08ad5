import { describe, it, expect, vi } from 'vitest';
import * as api from '../index';
import { ScriptGateway } from '../index';

/**
 * Pre-release check - Verify availability and consistency of all public APIs
 */
describe('Release Readiness Tests', () =>
{
	describe('Public API Availability', () =>
	{
		it('should export the gateway and the substitution engine', () =>
		{
			expect(typeof api.ScriptGateway.build).toBe('function');
			expect(typeof api.substitute).toBe('function');
			expect(api.VariableSubstitutor).toBeDefined();
			expect(typeof api.parse).toBe('function');
			expect(typeof api.unparse).toBe('function');
			expect(typeof api.locate).toBe('function');
			expect(typeof api.applyReplacements).toBe('function');
		});

		it('should export every placeholder kind and error class', () =>
		{
			expect(api.QueryPlaceholder.prototype).toBeInstanceOf(api.VariablePlaceholder);
			expect(api.OperandPlaceholder.prototype).toBeInstanceOf(api.VariablePlaceholder);
			expect(api.SimplePlaceholder.prototype).toBeInstanceOf(api.VariablePlaceholder);
			expect(api.FragmentPlaceholder.prototype).toBeInstanceOf(api.VariablePlaceholder);
			expect(api.IdentifierPlaceholder.prototype).toBeInstanceOf(api.VariablePlaceholder);
			expect(new api.OverlapError('x')).toBeInstanceOf(api.SqlScriptError);
			expect(new api.SqlSyntaxError('x', 0, 'x')).toBeInstanceOf(api.SqlScriptError);
		});

		it('should export the dialects by name', () =>
		{
			expect(api.getDialect('mysql')).toBeInstanceOf(api.MySQLDialect);
			expect(api.getDialect('postgresql')).toBeInstanceOf(api.PostgreSQLDialect);
			expect(api.getDialect('sqlite')).toBeInstanceOf(api.SQLiteDialect);
		});
	});
});

describe('Documentation Examples Validation', () =>
{
	it('should work with the README example', async () =>
	{
		const gateway = await ScriptGateway.build({
			providers: { main: { type: 'sqlite', options: { filename: ':memory:' } } },
			logging: { level: api.LogLevel.WARN }
		});

		try
		{
			const sql = gateway.render('main', {
				sql: 'SELECT * FROM orders WHERE region IN (${region})',
				variables: [{ name: 'region', values: ['east'], valueType: 'STRING' }]
			});
			expect(sql).toBe("SELECT * FROM orders WHERE region IN ('east')");

			const result = await gateway.execute('main', { sql: 'SELECT ${n} AS n', variables: [{ name: 'n', values: [42], valueType: 'NUMERIC' }] });
			expect(result).toEqual({ rows: [{ n: 42 }] });
		}
		finally
		{
			await gateway.disconnectAll();
		}
	});

	it('should render the substitute() example', () =>
	{
		expect(api.substitute('SELECT * FROM t WHERE region IN (${region})', [
			{ name: 'region', values: ['east', 'west'], valueType: 'STRING' }
		], 'postgresql')).toBe("SELECT * FROM t WHERE region IN ('east', 'west')");
	});
});

describe('Resource Management', () =>
{
	function fakeProvider()
	{
		return {
			connect: vi.fn().mockResolvedValue(undefined),
			disconnect: vi.fn().mockResolvedValue(undefined),
			execute: vi.fn().mockImplementation(() => new Promise(resolve =>
			{
				setTimeout(() => resolve({ rows: [{ id: 1 }] }), 1);
			})),
			getDialect: vi.fn().mockReturnValue(new api.SQLiteDialect())
		};
	}

	it('should handle multiple disconnect calls gracefully', async () =>
	{
		const provider = fakeProvider();
		const gateway = await ScriptGateway.build({ providers: { test: { type: 'custom', options: { provider } } } });

		await gateway.disconnectAll();
		await gateway.disconnectAll();
		await gateway.disconnectAll();

		expect(provider.disconnect).toHaveBeenCalledTimes(3);
	});

	it('should handle concurrent executions', async () =>
	{
		const provider = fakeProvider();
		const gateway = await ScriptGateway.build({ providers: { test: { type: 'custom', options: { provider } } } });

		const results = await Promise.all(Array.from({ length: 100 }, (_, i) => gateway.execute('test', {
			sql: 'SELECT id FROM t WHERE id = ${id}',
			variables: [{ name: 'id', values: [i], valueType: 'NUMERIC' }]
		})));

		expect(results).toHaveLength(100);
		expect(provider.execute).toHaveBeenCalledTimes(100);
		expect(provider.execute).toHaveBeenLastCalledWith('SELECT id FROM t WHERE id = 99');

		await gateway.disconnectAll();
	});
});
