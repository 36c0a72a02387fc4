import z from 'zod';
import { trailingSlashStrategies } from '../constants';

const stringBoolean = z.codec(z.string(), z.boolean(), {
	decode: (strBool) => strBool === 'true' || strBool === '1' || strBool === 'yes' || strBool === 'on',
	encode: (bool) => (bool ? 'true' : 'false'),
});

const trailingSlashAliases: Record<string, string> = {
	redirect_301: 'redirect',
	allow_both: 'both',
};

/** `strip` | `redirect` | `both`, also taking the `STRIP`, `REDIRECT_301` and `ALLOW_BOTH` spellings */
const stringTrailingSlash = z.preprocess((value) => {
	if (typeof value !== 'string') return value;
	const normalized = value.trim().toLowerCase();
	return trailingSlashAliases[normalized] ?? normalized;
}, z.enum(trailingSlashStrategies));

export const codecs = {
	stringBoolean,
	stringTrailingSlash,
};
