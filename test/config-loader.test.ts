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


import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { applyEnvOverrides, loadBucketInput, loadJsonFile, mergeConfigs } from '../lib/config/config-loader.js';
import { BucketConfigError } from '../lib/utils/errors.js';

describe('config loader', () => {
  let configDir: string;

  beforeEach(() => {
    configDir = fs.mkdtempSync(path.join(os.tmpdir(), 'bucket-config-'));
  });

  afterEach(() => {
    fs.rmSync(configDir, { recursive: true, force: true });
  });

  function writeConfig(fileName: string, content: string): string {
    const filePath = path.join(configDir, fileName);
    fs.writeFileSync(filePath, content);
    return filePath;
  }

  describe('loadJsonFile', () => {
    test('returns null for a missing file', () => {
      expect(loadJsonFile(path.join(configDir, 'bucket.config.json'))).toBeNull();
    });

    test('parses a JSON object', () => {
      const filePath = writeConfig('bucket.config.json', '{"bucket_name":"site-bucket"}');
      expect(loadJsonFile(filePath)).toEqual({ bucket_name: 'site-bucket' });
    });

    test('reports malformed JSON with the file name', () => {
      const filePath = writeConfig('bucket.config.json', '{"bucket_name":');
      expect(() => loadJsonFile(filePath)).toThrow(BucketConfigError);
      try {
        loadJsonFile(filePath);
      } catch (error) {
        expect(error instanceof BucketConfigError && error.issues[0].startsWith('bucket.config.json: ')).toBe(true);
      }
    });

    test('rejects a top-level array', () => {
      const filePath = writeConfig('bucket.config.json', '[]');
      expect(() => loadJsonFile(filePath)).toThrow('bucket.config.json: top-level value must be a JSON object');
    });
  });

  describe('mergeConfigs', () => {
    test('later configs win and absent ones are skipped', () => {
      expect(mergeConfigs({ bucket_name: 'a', max_size: 1 }, null, { max_size: 2 }, undefined)).toEqual({
        bucket_name: 'a',
        max_size: 2,
      });
    });
  });

  describe('applyEnvOverrides', () => {
    test('fills provider settings and replaces the bucket prefix with a name', () => {
      expect(
        applyEnvOverrides(
          { bucket_prefix: 'site-', provider: { zone: 'ru-central1-a' } },
          { YC_FOLDER_ID: 'env-folder', BUCKET_NAME: 'env-bucket' },
        ),
      ).toEqual({ bucket_name: 'env-bucket', provider: { zone: 'ru-central1-a', folder_id: 'env-folder' } });
    });

    test('ignores empty variables', () => {
      expect(applyEnvOverrides({ bucket_name: 'site-bucket' }, { YC_ZONE: '  ', BUCKET_NAME: '' })).toEqual({
        bucket_name: 'site-bucket',
      });
    });

    test('does not mutate its input', () => {
      const input = { provider: { zone: 'ru-central1-a' } };
      applyEnvOverrides(input, { YC_CLOUD_ID: 'env-cloud' });
      expect(input).toEqual({ provider: { zone: 'ru-central1-a' } });
    });
  });

  describe('loadBucketInput', () => {
    test('layers base file, environment file and context', () => {
      writeConfig('bucket.config.json', '{"bucket_name":"base-bucket","max_size":100}');
      writeConfig('bucket.config.dev.json', '{"max_size":200}');
      expect(loadBucketInput({ configDir, envName: 'dev', context: { force_destroy: true }, env: {} })).toEqual({
        bucket_name: 'base-bucket',
        max_size: 200,
        force_destroy: true,
      });
    });

    test('environment variables take the highest priority', () => {
      writeConfig('bucket.config.json', '{"bucket_name":"base-bucket"}');
      expect(
        loadBucketInput({ configDir, context: { bucket_name: 'context-bucket' }, env: { BUCKET_NAME: 'env-bucket' } }),
      ).toEqual({ bucket_name: 'env-bucket' });
    });

    test('returns an empty document when nothing is configured', () => {
      expect(loadBucketInput({ configDir, envName: 'prod', env: {} })).toEqual({});
    });

    test('rejects a context value that is not an object', () => {
      expect(() => loadBucketInput({ configDir, context: 'site-bucket', env: {} })).toThrow(
        'context.bucket: must be an object',
      );
    });
  });
});
