#!/usr/bin/env node
import 'source-map-support/register.js';
import { readFileSync } from 'node:fs';
import { App } from 'aws-cdk-lib';
import { DeletionNotifierStack } from './deletion-notifier-stack.js';
import { globalRules } from './rules/global.js';
import { regionalRules } from './rules/regional.js';
import type { AppConfig } from './types.js';

// Global services (IAM, Route 53) only emit CloudTrail events here
const GLOBAL_REGION = 'us-east-1';

const app = new App();

/**
 * Load configuration from config.json with CDK context overrides
 */
const loadConfig = (app: App): AppConfig => {
  const fileConfig: AppConfig = JSON.parse(
    readFileSync('./config.json', 'utf-8')
  );

  // `-c createTrail=true` arrives as a string
  const createTrail =
    app.node.tryGetContext('createTrail') ?? fileConfig.createTrail;

  return {
    appName: app.node.tryGetContext('appName') ?? fileConfig.appName,
    regions: app.node.tryGetContext('regions') ?? fileConfig.regions,
    tags: app.node.tryGetContext('tags') ?? fileConfig.tags,
    webhookUrl: app.node.tryGetContext('webhookUrl') ?? fileConfig.webhookUrl,
    createTrail: createTrail === true || createTrail === 'true',
  };
};

const config = loadConfig(app);
const tags = {
  Service: config.appName,
  ...config.tags,
};

config.regions.forEach((region, index) => {
  new DeletionNotifierStack(app, `${config.appName}-regional-${region}`, {
    env: { region },
    appName: config.appName,
    variant: 'regional',
    entry: './src/regional-handler.ts',
    rules: regionalRules,
    webhookUrl: config.webhookUrl,
    // The trail is multi-region, one is enough
    createTrail: config.createTrail && index === 0,
    tags,
  });
});

new DeletionNotifierStack(app, `${config.appName}-global`, {
  env: { region: GLOBAL_REGION },
  appName: config.appName,
  variant: 'global',
  entry: './src/global-handler.ts',
  rules: globalRules,
  webhookUrl: config.webhookUrl,
  tags,
});
