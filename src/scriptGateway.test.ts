import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ProviderConfig, ScriptGateway } from './scriptGateway';
import { ConnectionPoolStatus, QueryResult } from './dataProvider';
import { MySQLProvider } from './dataProviders/MySQLProvider';
import { PostgreSQLProvider } from './dataProviders/PostgreSQLProvider';
import { SQLiteProvider } from './dataProviders/SQLiteProvider';
import { UnboundVariableError, VariableNotFoundError } from './errors';
import { LogLevel, globalLogger } from './logger';
import { Middleware } from './middleware';
import { QueryScript } from './scriptVariable';
import { MySQLDialect, PostgreSQLDialect, SQLiteDialect, SqlDialect } from './sqlDialect';

vi.mock('./dataProviders/MySQLProvider');
vi.mock('./dataProviders/SQLiteProvider');
vi.mock('./dataProviders/PostgreSQLProvider');

function fakeProvider(dialect: SqlDialect, result: QueryResult = { rows: [] })
{
	return {
		connect: vi.fn().mockResolvedValue(undefined),
		disconnect: vi.fn().mockResolvedValue(undefined),
		execute: vi.fn().mockResolvedValue(result),
		getDialect: vi.fn().mockReturnValue(dialect)
	};
}

const regionScript: QueryScript = {
	sql: 'SELECT * FROM orders WHERE region IN (${region})',
	variables: [{ name: 'region', values: ['east', 'west'], valueType: 'STRING' }]
};

describe('ScriptGateway - Core Integration Tests', () =>
{
	beforeEach(() =>
	{
		vi.clearAllMocks();
	});

	afterEach(() =>
	{
		vi.restoreAllMocks();
		globalLogger.setLevel(LogLevel.INFO);
	});

	describe('Gateway Construction', () =>
	{
		it('should build and connect every built-in provider', async () =>
		{
			const mysql = new MySQLProvider({});
			mysql.connect = vi.fn().mockResolvedValue(undefined);
			mysql.disconnect = vi.fn().mockResolvedValue(undefined);
			const sqlite = new SQLiteProvider({ filename: ':memory:' });
			sqlite.connect = vi.fn().mockResolvedValue(undefined);
			sqlite.disconnect = vi.fn().mockResolvedValue(undefined);
			const postgres = new PostgreSQLProvider({});
			postgres.connect = vi.fn().mockResolvedValue(undefined);
			postgres.disconnect = vi.fn().mockResolvedValue(undefined);

			vi.mocked(MySQLProvider).mockImplementation(() => mysql);
			vi.mocked(SQLiteProvider).mockImplementation(() => sqlite);
			vi.mocked(PostgreSQLProvider).mockImplementation(() => postgres);

			const gateway = await ScriptGateway.build({
				providers: {
					mysql: { type: 'mysql', options: { host: 'localhost' } },
					sqlite: { type: 'sqlite', options: { filename: 'test.db' } },
					postgres: { type: 'postgresql', options: { host: 'localhost' } }
				}
			});

			expect(gateway).toBeInstanceOf(ScriptGateway);
			expect(vi.mocked(MySQLProvider)).toHaveBeenCalledWith({ host: 'localhost' });
			expect(vi.mocked(SQLiteProvider)).toHaveBeenCalledWith({ filename: 'test.db' });
			expect(mysql.connect).toHaveBeenCalledTimes(1);
			expect(sqlite.connect).toHaveBeenCalledTimes(1);
			expect(postgres.connect).toHaveBeenCalledTimes(1);
			expect(gateway.getProvider('mysql')).toBe(mysql);
			expect(gateway.getProvider('postgres')).toBe(postgres);

			await gateway.disconnectAll();
			expect(mysql.disconnect).toHaveBeenCalledTimes(1);
			expect(sqlite.disconnect).toHaveBeenCalledTimes(1);
			expect(postgres.disconnect).toHaveBeenCalledTimes(1);
		});

		it('should accept ready-made providers', async () =>
		{
			const provider = fakeProvider(new MySQLDialect());

			const gateway = await ScriptGateway.build({ providers: { main: { type: 'custom', options: { provider } } } });

			expect(provider.connect).toHaveBeenCalledTimes(1);
			expect(gateway.getProvider('main')).toBe(provider);
			expect(gateway.getProvider('other')).toBeUndefined();
		});

		it('should disconnect connected providers when another one fails', async () =>
		{
			vi.spyOn(console, 'error').mockImplementation(() => undefined);
			const healthy = fakeProvider(new MySQLDialect());
			const broken = fakeProvider(new MySQLDialect());
			broken.connect.mockRejectedValue(new Error('connection refused'));

			await expect(ScriptGateway.build({
				providers: {
					healthy: { type: 'custom', options: { provider: healthy } },
					broken: { type: 'custom', options: { provider: broken } }
				}
			})).rejects.toThrow("[ScriptGateway] Build failed: Connection failed for provider 'broken': connection refused");

			expect(healthy.disconnect).toHaveBeenCalledTimes(1);
			expect(broken.disconnect).not.toHaveBeenCalled();
		});

		it('should throw error for unknown provider type', async () =>
		{
			vi.spyOn(console, 'error').mockImplementation(() => undefined);
			const providers: Record<string, ProviderConfig> = JSON.parse('{"unknown":{"type":"unknown","options":{}}}');

			await expect(ScriptGateway.build({ providers }))
				.rejects.toThrow("[ScriptGateway] Build failed: Unknown provider type: 'unknown'");
		});

		it('should apply logging settings before building', async () =>
		{
			await ScriptGateway.build({ providers: {}, logging: { level: LogLevel.OFF } });

			expect(globalLogger.getLevel()).toBe(LogLevel.OFF);
		});
	});

	describe('Rendering and Execution', () =>
	{
		it('should render in the dialect of each provider', async () =>
		{
			const gateway = await ScriptGateway.build({
				providers: {
					lite: { type: 'custom', options: { provider: fakeProvider(new SQLiteDialect()) } },
					pg: { type: 'custom', options: { provider: fakeProvider(new PostgreSQLDialect()) } }
				}
			});
			const script: QueryScript = {
				sql: 'SELECT * FROM users WHERE active = ${active}',
				variables: [{ name: 'active', values: [true], valueType: 'BOOLEAN' }]
			};

			expect(gateway.render('lite', script)).toBe('SELECT * FROM users WHERE active = 1');
			expect(gateway.render('pg', script)).toBe('SELECT * FROM users WHERE active = TRUE');
			expect(gateway.render('pg', { sql: 'SELECT 1' })).toBe('SELECT 1');
		});

		it('should execute the rendered SQL and return the provider result', async () =>
		{
			const provider = fakeProvider(new MySQLDialect(), { rows: [{ id: 1, region: 'east' }] });
			const gateway = await ScriptGateway.build({ providers: { main: { type: 'custom', options: { provider } } } });

			const result = await gateway.execute('main', regionScript);

			expect(provider.execute).toHaveBeenCalledWith("SELECT * FROM orders WHERE region IN ('east', 'west')");
			expect(result).toEqual({ rows: [{ id: 1, region: 'east' }] });
		});

		it('should return provider errors as results', async () =>
		{
			const provider = fakeProvider(new MySQLDialect(), { error: "[MySQLProvider.execute] Table 'shop.orders' doesn't exist" });
			const gateway = await ScriptGateway.build({ providers: { main: { type: 'custom', options: { provider } } } });

			const result = await gateway.execute('main', regionScript);

			expect(result.error).toBe("[MySQLProvider.execute] Table 'shop.orders' doesn't exist");
		});

		it('should reject rendering errors without executing anything', async () =>
		{
			const provider = fakeProvider(new MySQLDialect());
			const gateway = await ScriptGateway.build({ providers: { main: { type: 'custom', options: { provider } } } });

			await expect(gateway.execute('main', { sql: 'SELECT * FROM t WHERE a = ${missing}' })).rejects.toThrow(UnboundVariableError);
			expect(provider.execute).not.toHaveBeenCalled();
		});

		it('should reject unknown provider names', async () =>
		{
			const gateway = await ScriptGateway.build({ providers: {} });

			expect(() => gateway.render('missing', regionScript)).toThrow("[ScriptGateway] Provider 'missing' not found");
			await expect(gateway.execute('missing', regionScript)).rejects.toThrow("[ScriptGateway] Provider 'missing' not found");
		});

		it('should pass substitution options to every render', async () =>
		{
			vi.spyOn(console, 'warn').mockImplementation(() => undefined);
			const provider = fakeProvider(new MySQLDialect());
			const gateway = await ScriptGateway.build({
				providers: { main: { type: 'custom', options: { provider } } },
				substitution: { strictVariables: true }
			});
			const script: QueryScript = {
				sql: 'SELECT 1',
				variables: [{ name: 'unused', values: [1], valueType: 'NUMERIC' }]
			};

			expect(() => gateway.render('main', script)).toThrow(VariableNotFoundError);
		});

		it('should run configured and added middlewares in order', async () =>
		{
			const order: string[] = [];
			const first: Middleware = async (execution, next) =>
			{
				order.push(`first:${execution.providerName}`);
				return next({ ...execution, sql: `${execution.sql} LIMIT 10` });
			};
			const second: Middleware = async (execution, next) =>
			{
				order.push('second');
				return next(execution);
			};
			const provider = fakeProvider(new MySQLDialect());
			const gateway = await ScriptGateway.build({
				providers: { main: { type: 'custom', options: { provider } } },
				middlewares: [first]
			});
			gateway.use(second);

			await gateway.execute('main', regionScript);

			expect(order).toEqual(['first:main', 'second']);
			expect(provider.execute).toHaveBeenCalledWith("SELECT * FROM orders WHERE region IN ('east', 'west') LIMIT 10");
		});
	});

	describe('Pool Status and Shutdown', () =>
	{
		const status: ConnectionPoolStatus = { totalConnections: 4, idleConnections: 3, activeConnections: 1, maxConnections: 10 };

		it('should report pool status of providers that have one', async () =>
		{
			const pooled = { ...fakeProvider(new MySQLDialect()), getPoolStatus: vi.fn().mockReturnValue(status) };
			const single = fakeProvider(new SQLiteDialect());
			const gateway = await ScriptGateway.build({
				providers: {
					pooled: { type: 'custom', options: { provider: pooled } },
					single: { type: 'custom', options: { provider: single } }
				}
			});

			expect(gateway.getProviderPoolStatus('pooled')).toEqual(status);
			expect(gateway.getProviderPoolStatus('single')).toBeUndefined();
			expect(gateway.getProviderPoolStatus('missing')).toBeUndefined();
			expect([...gateway.getAllPoolStatuses().entries()]).toEqual([['pooled', status]]);
		});

		it('should keep disconnecting when one provider fails', async () =>
		{
			const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);
			const failing = fakeProvider(new MySQLDialect());
			failing.disconnect.mockRejectedValue(new Error('socket closed'));
			const other = fakeProvider(new MySQLDialect());
			const gateway = await ScriptGateway.build({
				providers: {
					failing: { type: 'custom', options: { provider: failing } },
					other: { type: 'custom', options: { provider: other } }
				}
			});

			await expect(gateway.disconnectAll()).resolves.toBeUndefined();
			expect(other.disconnect).toHaveBeenCalledTimes(1);
			expect(errors).toHaveBeenCalledTimes(1);
			expect(errors.mock.calls[0][0]).toMatch(/\[ScriptGateway\] Failed to disconnect provider \{"provider":"failing","error":"socket closed"\}$/);
		});
	});
});
