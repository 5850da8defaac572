/**
 * @module core/validation
 * @description zod parsing that reports failures as ValidationError
 */

import type { z } from 'zod';
import { ValidationError } from './errors';

/**
 * Short "path: message" strings for zod issues
 */
export function formatIssues(issues: readonly z.ZodIssue[]): string[] {
    return issues.map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`);
}

/**
 * Parse `input` with `schema`
 *
 * @throws {ValidationError} listing every issue
 */
export function parseWithSchema<Output, Input>(
    schema: z.ZodType<Output, z.ZodTypeDef, Input>,
    input: unknown,
    what: string
): Output {
    const result = schema.safeParse(input);
    if (!result.success) {
        const issues = formatIssues(result.error.issues);
        throw new ValidationError(`Invalid ${what}: ${issues.join('; ')}`, { issues });
    }
    return result.data;
}
