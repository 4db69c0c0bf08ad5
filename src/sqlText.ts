/**
 * Offsets around whitespace and comments in raw SQL text.
 *
 * @module sqlText
 */

export interface TriviaOptions
{
	/** Treat `#` as the start of a line comment (MySQL) */
	hashComments?: boolean;
}

/**
 * Index of the first character at or after `from` that is neither whitespace nor part of a comment.
 */
export function skipTrivia(text: string, from: number, options: TriviaOptions = {}): number
{
	let i = from;
	while (i < text.length)
	{
		const ch = text[i];
		if (/\s/.test(ch))
		{
			i++;
		}
		else if (text.startsWith('/*', i))
		{
			const close = text.indexOf('*/', i + 2);
			i = close === -1 ? text.length : close + 2;
		}
		else if (text.startsWith('--', i) || (ch === '#' && options.hashComments))
		{
			const newline = text.indexOf('\n', i);
			i = newline === -1 ? text.length : newline + 1;
		}
		else
		{
			break;
		}
	}
	return i;
}

/**
 * Index just past the last character before `from` that is neither whitespace nor inside a block comment.
 * Line comments are not recognised backwards.
 */
export function skipTriviaBackward(text: string, from: number): number
{
	let i = from;
	while (i > 0)
	{
		if (/\s/.test(text[i - 1]))
		{
			i--;
		}
		else if (i >= 2 && text.startsWith('*/', i - 2))
		{
			const open = text.lastIndexOf('/*', i - 3);
			if (open === -1) break;
			i = open;
		}
		else
		{
			break;
		}
	}
	return i;
}
