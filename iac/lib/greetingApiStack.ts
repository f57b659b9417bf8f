import * as cdk from 'aws-cdk-lib';
import {Duration, Size} from 'aws-cdk-lib';
import {Construct} from 'constructs';
import {type GitHubRepositoryConfig, type GitHubStackProps} from './githubStackProps';
import {
    type Conditions,
    Effect,
    OpenIdConnectProvider,
    PolicyDocument,
    PolicyStatement,
    Role,
    ServicePrincipal,
    WebIdentityPrincipal
} from 'aws-cdk-lib/aws-iam';
import {NodejsFunction} from 'aws-cdk-lib/aws-lambda-nodejs';
import {
    Architecture,
    LoggingFormat,
    RecursiveLoop,
    Runtime,
    RuntimeManagementMode,
    SystemLogLevel
} from 'aws-cdk-lib/aws-lambda';
import {LambdaIntegration, RestApi} from 'aws-cdk-lib/aws-apigateway';
import * as path from 'path';
import {HttpMethod} from 'aws-cdk-lib/aws-apigatewayv2';

const githubDomain = 'token.actions.githubusercontent.com';

export const githubSubject = (r: GitHubRepositoryConfig): string =>
    r.branch ? `repo:${r.owner}/${r.repo}:ref:refs/heads/${r.branch}` : `repo:${r.owner}/${r.repo}:*`;

export class GreetingApiStack extends cdk.Stack {
    public readonly fn: NodejsFunction;
    public readonly api: RestApi;

    constructor(scope: Construct, id: string, props: GitHubStackProps) {
        super(scope, id, props);
        const {appName, functionName, stageName, logLevel} = props.config;

        // Lambda execution role, scoped to the function's own log group
        const logGroupArn = `arn:aws:logs:${this.region}:${this.account}:log-group:/aws/lambda/${functionName}:*`;

        const functionRole = new Role(this, `${appName}-function-role`, {
            assumedBy: new ServicePrincipal('lambda.amazonaws.com'),
            inlinePolicies: {
                'logPolicy': new PolicyDocument({
                    statements: [
                        new PolicyStatement({
                            actions: ['logs:CreateLogGroup'],
                            effect: Effect.ALLOW,
                            resources: [`arn:aws:logs:${this.region}:${this.account}:*`]
                        }),
                        new PolicyStatement({
                            actions: ['logs:CreateLogStream', 'logs:PutLogEvents'],
                            effect: Effect.ALLOW,
                            resources: [logGroupArn]
                        })
                    ],
                }),
            },
        });

        // Lambda
        const lambdaAppDir = path.resolve(__dirname, '../../lambda');

        this.fn = new NodejsFunction(this, `${appName}-function`, {
            entry: path.join(lambdaAppDir, 'greeting.ts'),
            handler: 'handler',
            functionName,
            runtime: Runtime.NODEJS_20_X,
            architecture: Architecture.X86_64,
            memorySize: 128,
            timeout: Duration.seconds(3),
            ephemeralStorageSize: Size.mebibytes(512),
            retryAttempts: 2,
            maxEventAge: Duration.hours(6),
            recursiveLoop: RecursiveLoop.TERMINATE,
            runtimeManagementMode: RuntimeManagementMode.AUTO,
            loggingFormat: LoggingFormat.JSON,
            applicationLogLevelV2: logLevel,
            systemLogLevelV2: SystemLogLevel.INFO,
            role: functionRole,
            bundling: {
                target: 'node20',
                sourceMap: true,
            },
        });

        // API
        this.api = new RestApi(this, `${appName}-api-gateway`, {
            deployOptions: {stageName},
            restApiName: `${appName}-api`,
        });

        const apiResource = this.api.root.addResource('api');
        apiResource.addMethod(HttpMethod.ANY, new LambdaIntegration(this.fn));

        //Github deploy role
        const ghProvider = new OpenIdConnectProvider(this, 'githubProvider', {
            url: `https://${githubDomain}`,
            clientIds: ['sts.amazonaws.com'],
        });

        const conditions: Conditions = {
            StringEquals: {
                [`${githubDomain}:aud`]: 'sts.amazonaws.com',
            },
            StringLike: {
                [`${githubDomain}:sub`]: props.repositoryConfig.map(githubSubject),
            },
        };

        new Role(this, `${appName}-deploy-role`, {
            assumedBy: new WebIdentityPrincipal(
                ghProvider.openIdConnectProviderArn,
                conditions
            ),
            inlinePolicies: {
                'deployPolicy': new PolicyDocument({
                    statements: [
                        new PolicyStatement({
                            actions: ['sts:AssumeRole'],
                            effect: Effect.ALLOW,
                            resources: ['arn:aws:iam::*:role/cdk-*']
                        }),
                        new PolicyStatement({
                            actions: ['lambda:UpdateFunctionCode'],
                            effect: Effect.ALLOW,
                            resources: [this.fn.functionArn]
                        })
                    ],
                }),
            },
            roleName: `${appName}-deploy-role`,
            description:
                'This role is used via GitHub Actions to deploy the function code and the CDK stack',
            maxSessionDuration: cdk.Duration.hours(1),
        });

        new cdk.CfnOutput(this, 'ApiUrl', {
            value: this.api.urlForPath(apiResource.path),
        });
        new cdk.CfnOutput(this, 'FunctionName', {
            value: this.fn.functionName,
        });
        new cdk.CfnOutput(this, 'FunctionArn', {
            value: this.fn.functionArn,
        });
    }
}
