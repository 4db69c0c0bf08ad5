/**
 * @file ScriptGateway - config-driven front door of the library.
 * Builds and connects the configured providers, renders SQL templates in each
 * provider's dialect and runs the finished SQL through the middleware chain.
 */
import { ConnectionPoolStatus, DataProvider, QueryResult } from './dataProvider';
import type { MySQLProviderOptions } from './dataProviders/MySQLProvider';
import type { PostgreSQLProviderOptions } from './dataProviders/PostgreSQLProvider';
import type { SQLiteProviderOptions } from './dataProviders/SQLiteProvider';
import { LoggerConfig, getLogger, globalLogger } from './logger';
import { Middleware, ScriptExecution, runMiddlewares } from './middleware';
import { QueryScript } from './scriptVariable';
import { SubstitutionOptions, substitute } from './variableSubstitutor';

/**
 * Provider definition: a built-in driver with its options, or a ready-made provider.
 */
export type ProviderConfig =
	| { type: 'mysql'; options: MySQLProviderOptions }
	| { type: 'postgresql'; options: PostgreSQLProviderOptions }
	| { type: 'sqlite'; options: SQLiteProviderOptions }
	| { type: 'custom'; options: { provider: DataProvider } };

/**
 * Gateway configuration.
 */
export interface ScriptGatewayConfig
{
	/** Providers by name */
	providers: Record<string, ProviderConfig>;
	/** Options applied to every substitution */
	substitution?: SubstitutionOptions;
	/** Global logger settings, applied before anything is built */
	logging?: Partial<LoggerConfig>;
	/** Middlewares registered in order */
	middlewares?: Middleware[];
}

const logger = getLogger('ScriptGateway');

/**
 * Creates the provider for one definition. Drivers are loaded on first use so
 * a project only needs the database packages it actually configures.
 */
async function createProvider(config: ProviderConfig): Promise<DataProvider>
{
	switch (config.type)
	{
		case 'mysql':
		{
			const { MySQLProvider } = await import('./dataProviders/MySQLProvider');
			return new MySQLProvider(config.options);
		}
		case 'postgresql':
		{
			const { PostgreSQLProvider } = await import('./dataProviders/PostgreSQLProvider');
			return new PostgreSQLProvider(config.options);
		}
		case 'sqlite':
		{
			const { SQLiteProvider } = await import('./dataProviders/SQLiteProvider');
			return new SQLiteProvider(config.options);
		}
		case 'custom':
			return config.options.provider;
		default:
		{
			const type: unknown = Reflect.get(config, 'type');
			throw new Error(`Unknown provider type: '${String(type)}'`);
		}
	}
}

const errorMessage = (error: unknown): string => error instanceof Error ? error.message : String(error);

/**
 * Coordinates providers, substitution and middlewares.
 *
 * @example
 * const gateway = await ScriptGateway.build({
 *   providers: { main: { type: 'sqlite', options: { filename: ':memory:' } } }
 * });
 * const result = await gateway.execute('main', {
 *   sql: 'SELECT * FROM orders WHERE region IN (${region})',
 *   variables: [{ name: 'region', values: ['east'], valueType: 'STRING' }]
 * });
 */
export class ScriptGateway
{
	private readonly middlewares: Middleware[] = [];

	private constructor(
		private readonly providers: Map<string, DataProvider>,
		private readonly substitution: SubstitutionOptions
	)
	{
	}

	/**
	 * Creates every provider and connects them concurrently.
	 * When any of them fails, the ones already connected are disconnected again.
	 * @throws Error prefixed with `[ScriptGateway] Build failed:`
	 */
	static async build(config: ScriptGatewayConfig): Promise<ScriptGateway>
	{
		if (config.logging)
		{
			globalLogger.configure(config.logging);
		}
		logger.debug('Building ScriptGateway', { providers: Object.keys(config.providers) });

		try
		{
			const providers = new Map<string, DataProvider>();
			for (const [name, providerConfig] of Object.entries(config.providers))
			{
				providers.set(name, await createProvider(providerConfig));
			}

			const entries = [...providers.entries()];
			const results = await Promise.allSettled(entries.map(([, provider]) => provider.connect()));
			const failedIndex = results.findIndex(result => result.status === 'rejected');
			if (failedIndex !== -1)
			{
				const failed = results[failedIndex];
				const reason = failed.status === 'rejected' ? errorMessage(failed.reason) : '';
				await Promise.allSettled(entries
					.filter((_, i) => results[i].status === 'fulfilled')
					.map(([, provider]) => provider.disconnect()));
				throw new Error(`Connection failed for provider '${entries[failedIndex][0]}': ${reason}`);
			}

			const gateway = new ScriptGateway(providers, config.substitution ?? {});
			for (const middleware of config.middlewares ?? [])
			{
				gateway.use(middleware);
			}

			logger.info('ScriptGateway built', { providers: providers.size });
			return gateway;
		}
		catch (error)
		{
			const message = `[ScriptGateway] Build failed: ${errorMessage(error)}`;
			logger.error(message);
			throw new Error(message);
		}
	}

	/**
	 * Adds a middleware to the end of the chain.
	 */
	use(middleware: Middleware): void
	{
		this.middlewares.push(middleware);
	}

	getProvider(name: string): DataProvider | undefined
	{
		return this.providers.get(name);
	}

	/**
	 * Renders a script into finished SQL in the named provider's dialect.
	 * @throws SqlScriptError subclasses when the template or its bindings are invalid
	 */
	render(providerName: string, script: QueryScript): string
	{
		const provider = this.requireProvider(providerName);
		const sql = substitute(script.sql, script.variables ?? [], provider.getDialect(), this.substitution);
		logger.debug('Rendered script', { provider: providerName, length: sql.length });
		return sql;
	}

	/**
	 * Renders a script and runs it on the named provider through the middleware chain.
	 * Execution errors come back as `error`; rendering errors reject.
	 */
	async execute(providerName: string, script: QueryScript): Promise<QueryResult>
	{
		const provider = this.requireProvider(providerName);
		const execution: ScriptExecution = { providerName, script, sql: this.render(providerName, script) };
		return runMiddlewares(this.middlewares, execution, current => provider.execute(current.sql));
	}

	/**
	 * Pool status of one provider, if it pools connections.
	 */
	getProviderPoolStatus(name: string): ConnectionPoolStatus | undefined
	{
		return this.providers.get(name)?.getPoolStatus?.();
	}

	/**
	 * Pool status of every provider that reports one.
	 */
	getAllPoolStatuses(): Map<string, ConnectionPoolStatus>
	{
		const statuses = new Map<string, ConnectionPoolStatus>();
		for (const [name, provider] of this.providers)
		{
			const status = provider.getPoolStatus?.();
			if (status) statuses.set(name, status);
		}
		return statuses;
	}

	/**
	 * Disconnects every provider. Failures are logged, not thrown.
	 */
	async disconnectAll(): Promise<void>
	{
		const entries = [...this.providers.entries()];
		const results = await Promise.allSettled(entries.map(([, provider]) => provider.disconnect()));
		results.forEach((result, i) =>
		{
			if (result.status === 'rejected')
			{
				logger.error('Failed to disconnect provider', { provider: entries[i][0], error: errorMessage(result.reason) });
			}
		});
		logger.info('All providers disconnected');
	}

	private requireProvider(name: string): DataProvider
	{
		const provider = this.providers.get(name);
		if (!provider)
		{
			throw new Error(`[ScriptGateway] Provider '${name}' not found`);
		}
		return provider;
	}
}
