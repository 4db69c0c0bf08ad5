import type { QueryResult } from './dataProvider';
import type { QueryScript } from './scriptVariable';

/**
 * One rendered script on its way to a provider.
 */
export interface ScriptExecution
{
	/** Name of the provider that runs the SQL */
	providerName: string;
	/** Template and bindings the SQL was rendered from */
	script: QueryScript;
	/** Finished SQL; a middleware may pass a changed copy to `next` */
	sql: string;
}

/**
 * Middlewares can intercept and process executions before they are passed to the next stage.
 * @param execution The incoming execution.
 * @param next A function that invokes the next middleware in the chain.
 * @returns A promise that resolves with the query result.
 */
export type Middleware = (execution: ScriptExecution, next: (execution: ScriptExecution) => Promise<QueryResult>) => Promise<QueryResult>;

/**
 * Composes and executes a chain of middleware functions for a given execution.
 * @param middlewares An array of middleware functions to run.
 * @param execution The initial execution.
 * @param final The final function to call after all middlewares have been executed.
 * @returns A promise that resolves with the final query result.
 */
export async function runMiddlewares(
	middlewares: Middleware[],
	execution: ScriptExecution,
	final: (execution: ScriptExecution) => Promise<QueryResult>
): Promise<QueryResult>
{
	if (middlewares.length === 0) { return final(execution); }

	let idx = -1;
	async function dispatch(i: number, current: ScriptExecution): Promise<QueryResult>
	{
		if (i <= idx) throw new Error('middleware: next() called multiple times');
		idx = i;
		const mw = middlewares[i];
		if (!mw)
			return final(current);

		return mw(current, (nextExecution) => dispatch(i + 1, nextExecution));
	}

	return dispatch(0, execution);
}
