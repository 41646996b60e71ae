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
import { ITerraformDependable, TerraformProvider, TerraformResource } from 'cdktf';
import { compact, nonEmpty } from '../utils/compact.js';

export type StorageClass = 'STANDARD' | 'COLD' | 'ICE';
export type TransitionStorageClass = 'STANDARD_IA' | 'COLD' | 'ICE';
export type CannedAcl = 'private' | 'public-read' | 'public-read-write' | 'authenticated-read';
export type GrantPermission = 'FULL_CONTROL' | 'WRITE' | 'WRITE_ACP' | 'READ' | 'READ_ACP';
export type CorsMethod = 'GET' | 'PUT' | 'POST' | 'DELETE' | 'HEAD';
export type RetentionMode = 'GOVERNANCE' | 'COMPLIANCE';

export interface BucketGrant {
  readonly type: 'CanonicalUser' | 'Group';
  /** Canonical user id, for CanonicalUser grants */
  readonly id?: string;
  /** Group URI, for Group grants */
  readonly uri?: string;
  readonly permissions: readonly GrantPermission[];
}

export interface AnonymousAccessFlags {
  readonly read?: boolean;
  readonly list?: boolean;
  readonly configRead?: boolean;
}

export interface CorsRule {
  readonly allowedMethods: readonly CorsMethod[];
  readonly allowedOrigins: readonly string[];
  readonly allowedHeaders?: readonly string[];
  readonly exposeHeaders?: readonly string[];
  readonly maxAgeSeconds?: number;
}

export interface BucketWebsite {
  readonly indexDocument?: string;
  readonly errorDocument?: string;
  readonly redirectAllRequestsTo?: string;
  /** Routing rules already serialized to the PascalCase JSON document */
  readonly routingRules?: string;
}

export interface ObjectLockRetention {
  readonly mode: RetentionMode;
  readonly days?: number;
  readonly years?: number;
}

export interface ObjectLock {
  readonly defaultRetention?: ObjectLockRetention;
}

export interface BucketLogging {
  readonly targetBucket: string;
  readonly targetPrefix?: string;
}

export interface LifecycleExpiration {
  readonly days?: number;
  readonly date?: string;
  readonly expiredObjectDeleteMarker?: boolean;
}

export interface LifecycleTransition {
  readonly days?: number;
  readonly date?: string;
  readonly storageClass: TransitionStorageClass;
}

export interface NoncurrentVersionTransition {
  readonly days: number;
  readonly storageClass: TransitionStorageClass;
}

export interface LifecycleRule {
  readonly id?: string;
  readonly prefix?: string;
  readonly enabled: boolean;
  readonly abortIncompleteMultipartUploadDays?: number;
  readonly expiration?: LifecycleExpiration;
  readonly transitions?: readonly LifecycleTransition[];
  readonly noncurrentVersionExpirationDays?: number;
  readonly noncurrentVersionTransitions?: readonly NoncurrentVersionTransition[];
}

export interface ServerSideEncryption {
  readonly kmsMasterKeyId: string;
  readonly sseAlgorithm: 'aws:kms';
}

export interface StorageBucketProps {
  /** Exact bucket name; conflicts with bucketPrefix */
  readonly bucket?: string;
  readonly bucketPrefix?: string;
  readonly folderId?: string;
  /** Quota in bytes */
  readonly maxSize?: number;
  readonly defaultStorageClass?: StorageClass;
  readonly forceDestroy?: boolean;
  readonly acl?: CannedAcl;
  readonly grants?: readonly BucketGrant[];
  readonly anonymousAccessFlags?: AnonymousAccessFlags;
  /** Certificate Manager certificate bound to the bucket's HTTPS endpoint */
  readonly httpsCertificateId?: string;
  /** Bucket policy as a JSON document */
  readonly policy?: string;
  readonly corsRules?: readonly CorsRule[];
  readonly website?: BucketWebsite;
  readonly versioningEnabled?: boolean;
  readonly objectLock?: ObjectLock;
  readonly logging?: BucketLogging;
  readonly lifecycleRules?: readonly LifecycleRule[];
  readonly serverSideEncryption?: ServerSideEncryption;
  readonly tags?: Readonly<Record<string, string>>;

  readonly provider?: TerraformProvider;
  readonly dependsOn?: ITerraformDependable[];
}

/**
 * Terraform JSON arguments of a `yandex_storage_bucket` resource. Blocks that
 * are not configured are left out entirely.
 */
export function renderStorageBucketAttributes(props: StorageBucketProps): Record<string, unknown> {
  const flags = props.anonymousAccessFlags;
  const website = props.website;
  const retention = props.objectLock?.defaultRetention;

  return compact({
    bucket: props.bucket,
    bucket_prefix: props.bucketPrefix,
    folder_id: props.folderId,
    max_size: props.maxSize,
    default_storage_class: props.defaultStorageClass,
    force_destroy: props.forceDestroy,
    acl: props.acl,
    grant: nonEmpty(props.grants)?.map((grant) =>
      compact({ id: grant.id, type: grant.type, uri: grant.uri, permissions: grant.permissions }),
    ),
    anonymous_access_flags: flags
      ? compact({ read: flags.read, list: flags.list, config_read: flags.configRead })
      : undefined,
    https: props.httpsCertificateId ? { certificate_id: props.httpsCertificateId } : undefined,
    policy: props.policy,
    cors_rule: nonEmpty(props.corsRules)?.map((rule) =>
      compact({
        allowed_headers: rule.allowedHeaders,
        allowed_methods: rule.allowedMethods,
        allowed_origins: rule.allowedOrigins,
        expose_headers: rule.exposeHeaders,
        max_age_seconds: rule.maxAgeSeconds,
      }),
    ),
    website: website
      ? compact({
          index_document: website.indexDocument,
          error_document: website.errorDocument,
          redirect_all_requests_to: website.redirectAllRequestsTo,
          routing_rules: website.routingRules,
        })
      : undefined,
    versioning: props.versioningEnabled === undefined ? undefined : { enabled: props.versioningEnabled },
    object_lock_configuration: props.objectLock
      ? compact({
          object_lock_enabled: 'Enabled',
          rule: retention
            ? { default_retention: compact({ mode: retention.mode, days: retention.days, years: retention.years }) }
            : undefined,
        })
      : undefined,
    logging: props.logging
      ? compact({ target_bucket: props.logging.targetBucket, target_prefix: props.logging.targetPrefix })
      : undefined,
    lifecycle_rule: nonEmpty(props.lifecycleRules)?.map(renderLifecycleRule),
    server_side_encryption_configuration: props.serverSideEncryption
      ? {
          rule: {
            apply_server_side_encryption_by_default: {
              kms_master_key_id: props.serverSideEncryption.kmsMasterKeyId,
              sse_algorithm: props.serverSideEncryption.sseAlgorithm,
            },
          },
        }
      : undefined,
    tags: props.tags && Object.keys(props.tags).length > 0 ? props.tags : undefined,
  });
}

function renderLifecycleRule(rule: LifecycleRule): Record<string, unknown> {
  return compact({
    id: rule.id,
    prefix: rule.prefix,
    enabled: rule.enabled,
    abort_incomplete_multipart_upload_days: rule.abortIncompleteMultipartUploadDays,
    expiration: rule.expiration
      ? compact({
          days: rule.expiration.days,
          date: rule.expiration.date,
          expired_object_delete_marker: rule.expiration.expiredObjectDeleteMarker,
        })
      : undefined,
    transition: nonEmpty(rule.transitions)?.map((transition) =>
      compact({ days: transition.days, date: transition.date, storage_class: transition.storageClass }),
    ),
    noncurrent_version_expiration:
      rule.noncurrentVersionExpirationDays === undefined ? undefined : { days: rule.noncurrentVersionExpirationDays },
    noncurrent_version_transition: nonEmpty(rule.noncurrentVersionTransitions)?.map((transition) => ({
      days: transition.days,
      storage_class: transition.storageClass,
    })),
  });
}

/**
 * A Yandex Object Storage bucket (`yandex_storage_bucket`).
 *
 * Written against the provider's documented schema rather than generated
 * bindings, so only the arguments this module manages are typed.
 */
export class StorageBucket extends TerraformResource {
  public static readonly tfResourceType = 'yandex_storage_bucket';

  public readonly bucketProps: StorageBucketProps;

  constructor(scope: Construct, id: string, props: StorageBucketProps) {
    super(scope, id, {
      terraformResourceType: StorageBucket.tfResourceType,
      terraformGeneratorMetadata: { providerName: 'yandex' },
      provider: props.provider,
      dependsOn: props.dependsOn,
    });
    this.bucketProps = props;
  }

  public get bucket(): string {
    return this.getStringAttribute('bucket');
  }

  public get bucketDomainName(): string {
    return this.getStringAttribute('bucket_domain_name');
  }

  public get websiteEndpoint(): string {
    return this.getStringAttribute('website_endpoint');
  }

  public get websiteDomain(): string {
    return this.getStringAttribute('website_domain');
  }

  protected synthesizeAttributes(): Record<string, unknown> {
    return renderStorageBucketAttributes(this.bucketProps);
  }
}
