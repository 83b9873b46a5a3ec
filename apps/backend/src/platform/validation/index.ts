// Validation Layer
// Request validation with zod schemas
// Failures surface as ValidationError with the issue list in context.issues

import type { ZodTypeAny, output } from 'zod';
import { ValidationError } from '../../utils/errors.js';

export function formatIssues(issues: readonly { path: readonly (string | number)[]; message: string }[]): string[] {
    return issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
}

/**
 * Parse untrusted input against a schema, throwing ValidationError on mismatch
 */
export function validate<S extends ZodTypeAny>(schema: S, data: unknown, what: string = 'request body'): output<S> {
    const result = schema.safeParse(data);
    if (!result.success) {
        throw new ValidationError(`Invalid ${what}`, { issues: formatIssues(result.error.issues) });
    }
    return result.data;
}
