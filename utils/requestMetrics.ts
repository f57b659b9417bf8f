import { type APIGatewayProxyEvent } from 'aws-lambda';

export interface RequestMetrics {
    requestId: string;
    httpMethod: string;
    path: string;
    duration: string;
    timestamp: string;
    sourceIp: string;
}

const NOT_AVAILABLE = 'N/A';

// Locally invoked events may carry a partial request context.
export const collectRequestMetrics = (event: APIGatewayProxyEvent, startedAt: number): RequestMetrics => {
    const now = Date.now();
    const requestContext: Partial<APIGatewayProxyEvent['requestContext']> = event.requestContext ?? {};

    return {
        requestId: requestContext.requestId || NOT_AVAILABLE,
        httpMethod: requestContext.httpMethod || event.httpMethod || NOT_AVAILABLE,
        path: requestContext.path || event.path || NOT_AVAILABLE,
        duration: `${(now - startedAt).toFixed(2)}ms`,
        timestamp: new Date(now).toISOString(),
        sourceIp: requestContext.identity?.sourceIp || NOT_AVAILABLE,
    };
};

export const logRequestMetrics = (event: APIGatewayProxyEvent, startedAt: number): void => {
    console.info(collectRequestMetrics(event, startedAt));
};
