#!/usr/bin/env node

/**
 * Operator check: authenticate with GOOGLE_API_KEY and list the models it can
 * use, with their supported generation methods.
 */

import * as dotenv from 'dotenv';
import { API_KEY_ENV } from './core/constants.js';
import { ConfigurationError } from './core/errors.js';
import { GeminiApiClient } from './infrastructure/http/GeminiApiClient.js';
import { ModelInfo } from './core/entities/Model.js';

dotenv.config();

export function formatModelLine(model: ModelInfo): string {
  return `${model.name} [${model.supportedActions.join(', ')}]`;
}

async function main() {
  const apiKey = process.env[API_KEY_ENV];
  if (!apiKey) {
    throw new ConfigurationError(`Missing ${API_KEY_ENV} environment variable. Set it in your terminal.`);
  }

  const client = new GeminiApiClient(apiKey);
  const models = await client.listModels();
  for (const model of models) {
    console.log(formatModelLine(model));
  }
}

if (require.main === module) {
  main().catch((error) => {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  });
}
