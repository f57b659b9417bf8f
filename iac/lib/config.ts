import { ApplicationLogLevel } from 'aws-cdk-lib/aws-lambda';
import { type GitHubRepositoryConfig } from './githubStackProps';

export interface GreetingApiConfig {
    appName: string;
    /** Name of the deployed function, shared with the CI deploy step. */
    functionName: string;
    region: string;
    account?: string;
    stageName: string;
    logLevel: ApplicationLogLevel;
    repositories: GitHubRepositoryConfig[];
}

const configs: Record<string, GreetingApiConfig> = {
    prod: {
        appName: 'greeting-api',
        functionName: 'lambda-gh-action',
        region: 'eu-central-1',
        stageName: 'Prod',
        logLevel: ApplicationLogLevel.INFO,
        repositories: [{ owner: 'greeting-api', repo: 'greeting-api', branch: 'main' }],
    },
    dev: {
        appName: 'greeting-api-dev',
        functionName: 'lambda-gh-action-dev',
        region: 'eu-central-1',
        stageName: 'Dev',
        logLevel: ApplicationLogLevel.DEBUG,
        repositories: [{ owner: 'greeting-api', repo: 'greeting-api' }],
    },
};

export const getConfig = (envName: string): GreetingApiConfig => {
    const config = configs[envName];
    if (!config) {
        throw new Error(`Unknown environment: ${envName}. Available: ${Object.keys(configs).join(', ')}`);
    }
    return config;
};
