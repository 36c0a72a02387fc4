import z from 'zod';
import { methods } from '../constants';

const references = z.union([z.string().min(1), z.array(z.string().min(1))]);

export const methodSchema = z.enum(methods);

export const routeOptionsSchema = z.strictObject({
	name: z.string().optional(),
	middleware: references.optional(),
	constraints: z.record(z.string(), z.string().min(1)).optional(),
	defaults: z.record(z.string(), z.string()).optional(),
	domain: z
		.string()
		.regex(/^[A-Za-z0-9._{}-]*$/, 'Only host characters and {token} placeholders')
		.optional(),
	meta: z.record(z.string(), z.unknown()).optional(),
});

export const groupOptionsSchema = z.strictObject({
	prefix: z.string().optional(),
	middleware: references.optional(),
	where: z.record(z.string(), z.string().min(1)).optional(),
	domain: routeOptionsSchema.shape.domain,
});
