import ipRegex from 'ip-regex';

export type TestStatus = 'success' | 'warning' | 'failed';

export const NEW_LINE_REG_EXP = /\r?\n/;
// A complete dotted quad, not part of a longer number.
export const IPV4_REG_EXP = new RegExp(`(?<![\\d.])${ipRegex.v4().source}(?![\\d.])`);

/**
 * A named capture rule. Rule lists are tried in order and the first match wins.
 */
export type MatchRule = {
	name: string;
	pattern: RegExp;
};

export type RuleMatch = {
	rule: string;
	groups: Record<string, string | undefined>;
};

export const matchFirst = (rules: MatchRule[], input: string): RuleMatch | undefined => {
	for (const rule of rules) {
		const match = rule.pattern.exec(input);

		if (match) {
			return { rule: rule.name, groups: match.groups ?? {} };
		}
	}

	return undefined;
};

export const splitLines = (rawOutput: string): string[] => rawOutput.split(NEW_LINE_REG_EXP);

export const findIpv4 = (input: string): string | undefined => IPV4_REG_EXP.exec(input)?.[0];

export const toFloat = (value: string | undefined, field: string): number => {
	const parsed = Number(value);

	if (value === undefined || value.trim() === '' || !Number.isFinite(parsed)) {
		throw new Error(`invalid numeric value '${value ?? ''}' for ${field}`);
	}

	return parsed;
};

export const toInteger = (value: string | undefined, field: string): number => {
	const parsed = toFloat(value, field);

	if (!Number.isSafeInteger(parsed)) {
		throw new Error(`invalid integer value '${value ?? ''}' for ${field}`);
	}

	return parsed;
};

export const clampPercent = (value: number): number => Math.min(100, Math.max(0, value));

export const errorMessage = (error: unknown): string => error instanceof Error ? error.message : String(error);
