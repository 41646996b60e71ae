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

import { Construct } from 'constructs';
import { TerraformOutput } from 'cdktf';
import { EncryptionConfig } from '../config/bucket-config.js';
import { KmsSymmetricKey } from '../resources/kms-symmetric-key.js';
import { YandexProvider } from '../provider/yandex-provider.js';

export interface EncryptionKeyConfig {
  readonly encryption: EncryptionConfig;
  /** Resource name stem, e.g. the normalized bucket name */
  readonly name: string;
  readonly folderId?: string;
  readonly labels: Readonly<Record<string, string>>;
  readonly provider: YandexProvider;
}

export interface EncryptionKeyResult {
  readonly kmsKeyId: string;
  /** Present only when the key is created by this stack */
  readonly key?: KmsSymmetricKey;
}

/**
 * Resolves the KMS key used for the bucket's default server-side encryption.
 *
 * An existing key id is passed through. Otherwise a symmetric key is created
 * next to the bucket, rotated yearly unless configured otherwise, with
 * deletion protection on: objects encrypted under a destroyed key cannot be
 * read back.
 */
export class EncryptionKeyBuilder {
  static create(scope: Construct, config: EncryptionKeyConfig): EncryptionKeyResult {
    if (config.encryption.kmsKeyId) {
      return { kmsKeyId: config.encryption.kmsKeyId };
    }

    const key = new KmsSymmetricKey(scope, 'encryption_key', {
      name: config.encryption.keyName ?? `${config.name}-sse`,
      description: `Default server-side encryption key for bucket ${config.name}`,
      folderId: config.folderId,
      defaultAlgorithm: config.encryption.defaultAlgorithm,
      rotationPeriod: config.encryption.rotationPeriod,
      deletionProtection: true,
      labels: config.labels,
      provider: config.provider,
    });

    new TerraformOutput(scope, 'KmsKeyId', {
      value: key.keyId,
      description: 'KMS key used for default server-side encryption',
    }).overrideLogicalId('kms_key_id');

    return { kmsKeyId: key.keyId, key };
  }
}
