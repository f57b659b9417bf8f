import { type APIGatewayProxyHandler, type APIGatewayProxyResult } from 'aws-lambda';
import { validateParameters } from '../utils/validation';
import { logRequestMetrics } from '../utils/requestMetrics';

export const UNDERAGE_THRESHOLD = 18;

export const RESPONSE_HEADERS = {
    'Content-Type': 'application/json',
    'X-Custom-Header': 'Lambda Demo',
};

export interface GreetingResponseBody {
    message: string;
    age_provided: string | null;
    processed_at: string;
    status: 'success';
}

export interface ErrorResponseBody {
    error: string;
    status: 'failed' | 'error';
}

const errorResponse = (statusCode: number, body: ErrorResponseBody): APIGatewayProxyResult => ({
    statusCode,
    body: JSON.stringify(body),
});

export const handler: APIGatewayProxyHandler = async (event) => {
    const startedAt = Date.now();

    try {
        console.debug(`Received event: ${JSON.stringify(event)}`);

        const queryParams = event.queryStringParameters ?? {};
        const validation = validateParameters(queryParams);

        if (!validation.valid) {
            console.warn(`Validation failed: ${validation.message}`);
            return errorResponse(400, { error: validation.message, status: 'failed' });
        }

        const { name, age, parsedAge } = validation;
        console.info(`Processing request for name: ${name}, age: ${age}`);

        let statusCode = 200;
        if (parsedAge !== null && parsedAge < UNDERAGE_THRESHOLD) {
            console.info('Underage user detected');
            statusCode = 202;
        }

        const body: GreetingResponseBody = {
            message: `Hello ${name}!`,
            age_provided: age,
            processed_at: new Date().toISOString(),
            status: 'success',
        };

        logRequestMetrics(event, startedAt);

        return {
            statusCode,
            headers: RESPONSE_HEADERS,
            body: JSON.stringify(body),
        };
    } catch (e) {
        console.error('Error processing request:', e);
        return errorResponse(500, { error: 'Internal server error', status: 'error' });
    }
};
