#!/usr/bin/env node
import 'source-map-support/register';
import * as path from 'path';
import * as cdk from 'aws-cdk-lib';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import { SnapshotStewardStack } from '../lib/stacks/snapshot-steward-stack';

const app = new cdk.App();

const environment = app.node.tryGetContext('environment') || 'development';
const projectName = app.node.tryGetContext('projectName') || 'snapshot-steward';
const scanRegions: string | undefined = app.node.tryGetContext('scanRegions');

new SnapshotStewardStack(app, `${projectName}-${environment}`, {
  env: {
    account: process.env.CDK_DEFAULT_ACCOUNT,
    region: process.env.CDK_DEFAULT_REGION || 'us-east-1',
  },
  description: 'Snapshot Steward - EBS snapshot retention scans and reports',
  tags: {
    Project: projectName,
    Environment: environment,
    ManagedBy: 'CDK',
  },
  projectName,
  environment,
  lambdaCode: lambda.Code.fromAsset(path.resolve(__dirname, '../../lambda-ts/dist')),
  scanRegions: scanRegions ? scanRegions.split(',') : undefined,
  retentionDays: Number(app.node.tryGetContext('retentionDays') ?? 90),
  enableAutoDelete: app.node.tryGetContext('enableAutoDelete') === 'true',
  enableColdArchive: app.node.tryGetContext('enableColdArchive') === 'true',
  smtpUser: app.node.tryGetContext('smtpUser'),
  alertReceiver: app.node.tryGetContext('alertReceiver'),
  alarmEmail: app.node.tryGetContext('alarmEmail'),
});

app.synth();
