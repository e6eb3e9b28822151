/**
 * Priority tags encoded as bracket tokens at the start of a job identifier.
 *
 *   [PP] permanent priority   [P] priority   [H] high
 *   (none) normal             [L] low        [D] disabled
 *
 * Matching is a case-sensitive prefix match in the order above. Only the
 * first token decides the tag; tokens after it ("[P][D]sales.yaml") or
 * elsewhere in the identifier do not count.
 */

export type PriorityTag = 'permanent-priority' | 'priority' | 'high' | 'normal' | 'low' | 'disabled';

/** Tokens in precedence order; [PP] is tried before [P]. */
const TOKENS: ReadonlyArray<readonly [string, PriorityTag]> = [
	['[PP]', 'permanent-priority'],
	['[P]', 'priority'],
	['[H]', 'high'],
	['[L]', 'low'],
	['[D]', 'disabled'],
];

export const PRIORITY_TOKEN = '[P]';

export interface TagMatch {
	tag: PriorityTag;
	/** Tokens found at the start of the identifier, in order */
	tokens: string[];
	/** The identifier opens with a bracket that is not a known token */
	malformed: boolean;
}

function tokenAt(identifier: string, offset: number): readonly [string, PriorityTag] | undefined {
	return TOKENS.find(([token]) => identifier.startsWith(token, offset));
}

/**
 * Classify a job identifier.
 */
export function parsePriorityTag(identifier: string): TagMatch {
	const tokens: string[] = [];
	const tags: PriorityTag[] = [];
	let offset = 0;
	for (let match = tokenAt(identifier, offset); match; match = tokenAt(identifier, offset)) {
		tokens.push(match[0]);
		tags.push(match[1]);
		offset += match[0].length;
	}

	const [tag] = tags;
	if (tag === undefined) {
		return { tag: 'normal', tokens, malformed: identifier.startsWith('[') };
	}
	return { tag, tokens, malformed: false };
}

/**
 * Drop the [P] token from an identifier's leading token run, leaving every
 * other character untouched. Identifiers without a leading [P] come back as-is.
 */
export function stripPriorityToken(identifier: string): string {
	const { tokens } = parsePriorityTag(identifier);
	let offset = 0;
	for (const token of tokens) {
		if (token === PRIORITY_TOKEN) {
			return identifier.slice(0, offset) + identifier.slice(offset + token.length);
		}
		offset += token.length;
	}
	return identifier;
}
