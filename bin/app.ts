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

import { App, Aspects } from 'cdktf';
import { BucketStack } from '../lib/bucket-stack.js';
import { normalizeBucketName, parseBucketInput } from '../lib/config/bucket-config.js';
import { loadBucketInput } from '../lib/config/config-loader.js';
import { BucketChecks } from '../lib/checks/bucket-checks.js';
import { BucketModuleError } from '../lib/utils/errors.js';
import { logError, logInfo, logWarn } from '../lib/utils/logger.js';

const app = new App();

function contextString(key: string): string | undefined {
  const value: unknown = app.node.tryGetContext(key);
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

function main(): void {
  // ---------------------------------------------------------------------------
  // Read the bucket input from files, cdktf context and environment
  // ---------------------------------------------------------------------------
  const envName = contextString('env') ?? process.env.DEPLOY_ENV;
  const raw = loadBucketInput({
    configDir: contextString('configDir') ?? process.cwd(),
    envName,
    context: app.node.tryGetContext('bucket'),
    env: process.env,
  });

  const input = parseBucketInput(raw);
  const baseName = input.bucket_name ?? input.bucket_prefix ?? '';

  if (baseName === '' || baseName === 'example-bucket') {
    logWarn(
      '"bucket_name" is not set or is still the default placeholder. Set it in bucket.config.json or pass BUCKET_NAME=<name>.',
      { phase: 'config' },
    );
  }
  if (!input.provider.folder_id && !input.folder_id) {
    logWarn('No folder id configured; the provider default folder (YC_FOLDER_ID) will be used at plan time.', {
      phase: 'config',
    });
  }

  // ---------------------------------------------------------------------------
  // Stack instantiation
  // ---------------------------------------------------------------------------
  const stackId = `object-storage-${normalizeBucketName(baseName) || 'bucket'}${envName ? `-${envName}` : ''}`;
  const stack = new BucketStack(app, stackId, input);

  // ---------------------------------------------------------------------------
  // Bucket security checks
  // ---------------------------------------------------------------------------
  Aspects.of(stack).add(new BucketChecks({ verbose: true }));

  app.synth();
  logInfo(`Synthesized ${stackId}`, { phase: 'synth', context: { outdir: app.outdir } });
}

try {
  main();
} catch (error) {
  if (error instanceof BucketModuleError) {
    logError(error.message, { phase: 'config' });
    process.exitCode = 1;
  } else {
    throw error;
  }
}
