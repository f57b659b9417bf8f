import { type APIGatewayProxyEvent, type APIGatewayProxyEventQueryStringParameters, type Context } from 'aws-lambda';

export const buildEvent = (
    queryStringParameters: APIGatewayProxyEventQueryStringParameters | null,
): APIGatewayProxyEvent => ({
    body: null,
    headers: {},
    multiValueHeaders: {},
    httpMethod: 'GET',
    isBase64Encoded: false,
    path: '/api',
    pathParameters: null,
    queryStringParameters,
    multiValueQueryStringParameters: null,
    stageVariables: null,
    resource: '/api',
    requestContext: {
        accountId: '123456789012',
        apiId: 'test-api',
        authorizer: null,
        protocol: 'HTTP/1.1',
        httpMethod: 'GET',
        identity: {
            accessKey: null,
            accountId: null,
            apiKey: null,
            apiKeyId: null,
            caller: null,
            clientCert: null,
            cognitoAuthenticationProvider: null,
            cognitoAuthenticationType: null,
            cognitoIdentityId: null,
            cognitoIdentityPoolId: null,
            principalOrgId: null,
            sourceIp: '203.0.113.7',
            user: null,
            userAgent: 'vitest',
            userArn: null,
        },
        path: '/Prod/api',
        stage: 'Prod',
        requestId: 'req-1',
        requestTimeEpoch: 1767225600000,
        resourceId: 'abc123',
        resourcePath: '/api',
    },
});

export const context: Context = {
    callbackWaitsForEmptyEventLoop: true,
    functionName: 'lambda-gh-action',
    functionVersion: '$LATEST',
    invokedFunctionArn: 'arn:aws:lambda:eu-central-1:123456789012:function:lambda-gh-action',
    memoryLimitInMB: '128',
    awsRequestId: 'aws-req-1',
    logGroupName: '/aws/lambda/lambda-gh-action',
    logStreamName: '2026/01/01/[$LATEST]test',
    getRemainingTimeInMillis: () => 3000,
    done: () => undefined,
    fail: () => undefined,
    succeed: () => undefined,
};
