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
import { BucketConfig } from '../config/bucket-config.js';
import { StorageBucket } from '../resources/storage-bucket.js';
import { YandexProvider } from '../provider/yandex-provider.js';
import { BucketCheckSuppressions } from '../checks/bucket-checks.js';
import { renderBucketPolicy } from './bucket-policy.js';

export interface StorageBucketBuilderConfig {
  readonly bucket: BucketConfig;
  readonly tags: Readonly<Record<string, string>>;
  readonly provider: YandexProvider;
  readonly httpsCertificateId?: string;
  readonly kmsKeyId?: string;
}

export interface StorageBucketResult {
  readonly bucket: StorageBucket;
}

/**
 * Creates the object storage bucket with every configured setting.
 *
 * - Optional blocks (website, object lock, logging, encryption, ...) are
 *   emitted only when configured
 * - Routing rules arrive already serialized by validateConfig
 * - The policy document is rendered against the literal bucket name
 */
export class StorageBucketBuilder {
  static create(scope: Construct, config: StorageBucketBuilderConfig): StorageBucketResult {
    const settings = config.bucket;

    const bucket = new StorageBucket(scope, 'bucket', {
      bucket: settings.bucketName,
      bucketPrefix: settings.bucketPrefix,
      folderId: settings.folderId,
      maxSize: settings.maxSize,
      defaultStorageClass: settings.defaultStorageClass,
      forceDestroy: settings.forceDestroy,
      acl: settings.acl,
      grants: settings.grants,
      anonymousAccessFlags: settings.anonymousAccessFlags,
      httpsCertificateId: config.httpsCertificateId,
      policy: settings.policy ? renderBucketPolicy(settings.policy, settings.bucketName) : undefined,
      corsRules: settings.corsRules,
      website: settings.website,
      versioningEnabled: settings.versioningEnabled,
      objectLock: settings.objectLock,
      logging: settings.logging,
      lifecycleRules: settings.lifecycleRules,
      serverSideEncryption: config.kmsKeyId ? { kmsMasterKeyId: config.kmsKeyId, sseAlgorithm: 'aws:kms' } : undefined,
      tags: config.tags,
      provider: config.provider,
    });

    // A website needs anonymous read only; anonymous list stays reported.
    const flags = settings.anonymousAccessFlags;
    if (settings.website && flags?.read === true && flags.list !== true) {
      BucketCheckSuppressions.addResourceSuppressions(bucket, [
        {
          id: 'YC-S3',
          reason: 'Static website hosting serves objects to anonymous visitors; read access is the purpose of the bucket.',
        },
      ]);
    }

    new TerraformOutput(scope, 'BucketName', {
      value: bucket.bucket,
      description: 'Object storage bucket name',
    }).overrideLogicalId('bucket_name');

    new TerraformOutput(scope, 'BucketDomainName', {
      value: bucket.bucketDomainName,
      description: 'Bucket domain name for path-free S3 access',
    }).overrideLogicalId('bucket_domain_name');

    if (settings.website) {
      new TerraformOutput(scope, 'WebsiteEndpoint', {
        value: bucket.websiteEndpoint,
        description: 'Static website endpoint of the bucket',
      }).overrideLogicalId('website_endpoint');
    }

    return { bucket };
  }
}
