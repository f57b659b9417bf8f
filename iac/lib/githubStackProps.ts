import * as cdk from 'aws-cdk-lib';
import { type GreetingApiConfig } from './config';

export interface GitHubRepositoryConfig {
    owner: string;
    repo: string;
    /** Restricts the deploy role to a single branch; any ref when omitted. */
    branch?: string;
}

export interface GitHubStackProps extends cdk.StackProps {
    config: GreetingApiConfig;
    repositoryConfig: GitHubRepositoryConfig[];
}
