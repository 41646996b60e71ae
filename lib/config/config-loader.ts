// Copyright 2025-2026 J. Patrick Fulton
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//     http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

/**
 * Loads the bucket input document from layered sources.
 *
 * Priority (high to low):
 *  1. Environment variables (YC_CLOUD_ID, YC_FOLDER_ID, YC_ZONE, YC_STORAGE_ENDPOINT, BUCKET_NAME)
 *  2. `bucket` object in cdktf context (cdktf.json or --context)
 *  3. Environment-specific file (bucket.config.{env}.json)
 *  4. Base file (bucket.config.json)
 */

import * as fs from 'fs';
import * as path from 'path';
import { BucketConfigError } from '../utils/errors.js';
import { logDebug } from '../utils/logger.js';

export type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a JSON configuration file.
 *
 * Returns null if the file does not exist. Throws BucketConfigError if it
 * exists but is not a JSON object.
 */
export function loadJsonFile(filePath: string): ConfigRecord | null {
  if (!fs.existsSync(filePath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new BucketConfigError(
      [`${path.basename(filePath)}: ${error instanceof Error ? error.message : String(error)}`],
      error instanceof Error ? error : undefined,
    );
  }

  if (!isRecord(parsed)) {
    throw new BucketConfigError([`${path.basename(filePath)}: top-level value must be a JSON object`]);
  }
  logDebug(`Loaded ${path.basename(filePath)}`, { phase: 'config' });
  return parsed;
}

/**
 * Shallow merge; later configs override earlier ones and null entries are
 * skipped.
 */
export function mergeConfigs(...configs: (ConfigRecord | null | undefined)[]): ConfigRecord {
  const merged: ConfigRecord = {};
  for (const config of configs) {
    if (config) {
      Object.assign(merged, config);
    }
  }
  return merged;
}

const PROVIDER_ENV_VARS: Readonly<Record<string, string>> = {
  YC_CLOUD_ID: 'cloud_id',
  YC_FOLDER_ID: 'folder_id',
  YC_ZONE: 'zone',
  YC_STORAGE_ENDPOINT: 'storage_endpoint',
};

/**
 * Fill `provider.*` and `bucket_name` from the environment. Empty variables
 * are ignored.
 */
export function applyEnvOverrides(input: ConfigRecord, env: NodeJS.ProcessEnv): ConfigRecord {
  const provider: ConfigRecord = isRecord(input.provider) ? { ...input.provider } : {};
  for (const [envVar, key] of Object.entries(PROVIDER_ENV_VARS)) {
    const value = env[envVar]?.trim();
    if (value) {
      provider[key] = value;
    }
  }

  const result: ConfigRecord = { ...input };
  if (Object.keys(provider).length > 0) {
    result.provider = provider;
  }
  const bucketName = env.BUCKET_NAME?.trim();
  if (bucketName) {
    result.bucket_name = bucketName;
    delete result.bucket_prefix;
  }
  return result;
}

export interface LoadBucketInputOptions {
  /** Directory holding bucket.config*.json */
  readonly configDir: string;
  /** Deployment environment name selecting bucket.config.{envName}.json */
  readonly envName?: string;
  /** Value of the `bucket` context key, if any */
  readonly context?: unknown;
  readonly env?: NodeJS.ProcessEnv;
}

export function loadBucketInput(options: LoadBucketInputOptions): ConfigRecord {
  const base = loadJsonFile(path.join(options.configDir, 'bucket.config.json'));
  const envSpecific = options.envName
    ? loadJsonFile(path.join(options.configDir, `bucket.config.${options.envName}.json`))
    : null;

  let context: ConfigRecord | null = null;
  if (options.context !== undefined) {
    if (!isRecord(options.context)) {
      throw new BucketConfigError(['context.bucket: must be an object']);
    }
    context = options.context;
  }

  const merged = mergeConfigs(base, envSpecific, context);
  return applyEnvOverrides(merged, options.env ?? {});
}
