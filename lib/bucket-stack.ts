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
import { TerraformStack } from 'cdktf';
import { BucketConfig, BucketModuleInput, normalizeBucketName, validateConfig } from './config/bucket-config.js';
import { YandexProvider } from './provider/yandex-provider.js';
import { StorageBucket } from './resources/storage-bucket.js';
import { StorageBucketBuilder } from './storage/storage-bucket-builder.js';
import { CertificateBuilder } from './distribution/certificate-builder.js';
import { EncryptionKeyBuilder } from './encryption/encryption-key-builder.js';

export type BucketStackProps = BucketModuleInput;

/** Labels on every resource of the stack, merged under the configured tags. */
export const DEFAULT_LABELS: Readonly<Record<string, string>> = {
  'managed-by': 'cdktf',
  module: 'object-storage-bucket',
};

/**
 * BucketStack
 *
 * Synthesizes one Yandex Cloud Object Storage bucket with its access
 * control, website hosting, retention, lifecycle and encryption settings.
 *
 * Companion resources, created only when no existing id is supplied:
 *   - KMS symmetric key for default server-side encryption
 *   - Certificate Manager managed certificate for the HTTPS endpoint
 *
 * Credentials are read by the yandex provider from its environment.
 */
export class BucketStack extends TerraformStack {
  public readonly bucketConfig: BucketConfig;
  public readonly yandexProvider: YandexProvider;
  public readonly bucket: StorageBucket;

  constructor(scope: Construct, id: string, props: BucketStackProps) {
    super(scope, id);

    const config = validateConfig(props);
    this.bucketConfig = config;

    this.yandexProvider = new YandexProvider(this, 'yandex', config.provider);

    const name = normalizeBucketName(config.bucketName ?? config.bucketPrefix ?? id);
    const folderId = config.folderId ?? config.provider.folderId;

    // KMS key (only when server-side encryption is configured)
    let kmsKeyId: string | undefined;
    if (config.encryption) {
      const { kmsKeyId: keyId } = EncryptionKeyBuilder.create(this, {
        encryption: config.encryption,
        name,
        folderId,
        labels: DEFAULT_LABELS,
        provider: this.yandexProvider,
      });
      kmsKeyId = keyId;
    }

    // Certificate Manager certificate (only when HTTPS is configured)
    let httpsCertificateId: string | undefined;
    if (config.https) {
      const { certificateId } = CertificateBuilder.create(this, {
        https: config.https,
        name,
        folderId,
        labels: DEFAULT_LABELS,
        provider: this.yandexProvider,
      });
      httpsCertificateId = certificateId;
    }

    const { bucket } = StorageBucketBuilder.create(this, {
      bucket: config,
      tags: { ...DEFAULT_LABELS, ...config.tags },
      provider: this.yandexProvider,
      httpsCertificateId,
      kmsKeyId,
    });
    this.bucket = bucket;
  }
}
