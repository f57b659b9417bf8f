import { type APIGatewayProxyEventQueryStringParameters } from 'aws-lambda';

export const MIN_AGE = 0;
export const MAX_AGE = 150;

export type ValidationResult =
    | { valid: true; name: string; age: string | null; parsedAge: number | null }
    | { valid: false; message: string };

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

export const validateParameters = (queryParams: APIGatewayProxyEventQueryStringParameters): ValidationResult => {
    if (Object.keys(queryParams).length === 0) {
        return { valid: false, message: 'No query parameters provided' };
    }

    const name = (queryParams['name'] ?? '').trim();
    const age = queryParams['age'] ?? null;

    if (!name) {
        return { valid: false, message: 'Name parameter is required' };
    }

    let parsedAge: number | null = null;
    if (age) {
        if (!INTEGER_PATTERN.test(age)) {
            return { valid: false, message: 'Age must be a valid number' };
        }
        parsedAge = Number.parseInt(age.trim(), 10);
        if (parsedAge < MIN_AGE || parsedAge > MAX_AGE) {
            return { valid: false, message: `Age must be between ${MIN_AGE} and ${MAX_AGE}` };
        }
    }

    return { valid: true, name, age, parsedAge };
};
