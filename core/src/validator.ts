import { flattenError, treeifyError, ZodObject, type infer as ZodInfer, type ZodType } from 'zod';
import { Exception } from './exception';

type ValidationRes<T extends ZodType> = { data: ZodInfer<T>; error: null } | { data: null; error: Exception };

/**
 * zod Safe-parse with monade return
 */
export function safeValidate<T extends ZodType>(schema: T, data: unknown, invalidMessage: string = 'Invalid Data'): ValidationRes<T> {
	const result = schema.safeParse(data);

	if (!result.success) {
		const detail = schema instanceof ZodObject ? flattenError(result.error).fieldErrors : treeifyError(result.error);

		return { data: null, error: new Exception(invalidMessage, 400, detail) };
	}

	return { data: result.data, error: null };
}
