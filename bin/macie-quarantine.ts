#!/usr/bin/env node
import * as cdk from 'aws-cdk-lib';
import { MacieQuarantineStack } from '../lib/macie-quarantine-stack';

const app = new cdk.App();

const contextFlag = (name: string): boolean | undefined => {
  const value: unknown = app.node.tryGetContext(name);
  return value === undefined ? undefined : String(value) === 'true';
};

const notificationEmail: unknown = app.node.tryGetContext('notificationEmail');

new MacieQuarantineStack(app, 'MacieQuarantineStack', {
  env: {
    account: process.env.CDK_DEFAULT_ACCOUNT,
    region: process.env.CDK_DEFAULT_REGION,
  },
  notificationEmail:
    typeof notificationEmail === 'string' ? notificationEmail : undefined,
  deleteOriginal: contextFlag('deleteOriginal'),
  enableMacieSession: contextFlag('enableMacieSession'),
});

app.synth();
