#!/usr/bin/env node
import 'source-map-support/register';
import * as cdk from 'aws-cdk-lib';
import { GreetingApiStack } from '../lib/greetingApiStack';
import { getConfig } from '../lib/config';

const app = new cdk.App();
const envName: string = app.node.tryGetContext('env') ?? 'prod';
const config = getConfig(envName);

new GreetingApiStack(app, `GreetingApiStack-${envName}`, {
    env: {
        account: process.env['CDK_DEFAULT_ACCOUNT'] ?? config.account,
        region: process.env['CDK_DEFAULT_REGION'] ?? config.region,
    },
    tags: {
        'project': config.appName,
        'created-using': 'cdk',
    },
    config,
    repositoryConfig: config.repositories,
});
