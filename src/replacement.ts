import { OverlapError } from './errors';

/**
 * A slice of the template and the SQL that takes its place.
 * `originalFragment` is always `template.slice(start, end)`.
 */
export interface ReplacementPair
{
	originalFragment: string;
	replacement: string;
	start: number;
	end: number;
}

/**
 * Splices every pair into `template` in one left-to-right pass.
 *
 * @throws OverlapError if two pairs overlap, or a pair's fragment is not found at its position
 */
export function applyReplacements(template: string, pairs: readonly ReplacementPair[]): string
{
	const ordered = [...pairs].sort((a, b) => a.start - b.start);
	const parts: string[] = [];
	let cursor = 0;

	for (const pair of ordered)
	{
		if (pair.start < cursor)
		{
			throw new OverlapError(`Replacement of '${pair.originalFragment}' at offset ${pair.start} overlaps the previous replacement ending at offset ${cursor}`);
		}
		if (template.slice(pair.start, pair.end) !== pair.originalFragment)
		{
			throw new OverlapError(`Fragment '${pair.originalFragment}' not found at offset ${pair.start}`);
		}
		parts.push(template.slice(cursor, pair.start), pair.replacement);
		cursor = pair.end;
	}

	parts.push(template.slice(cursor));
	return parts.join('');
}
