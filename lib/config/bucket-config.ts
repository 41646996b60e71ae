/**
 * Input document of the object storage bucket module and its validation.
 *
 * The input is snake_case so that a `bucket.config.json` reads like the
 * module variables it replaces. {@link validateConfig} turns it into the
 * camelCase {@link BucketConfig} the builders consume.
 */

import { z } from 'zod';
import { BucketConfigError } from '../utils/errors.js';
import { logWarn } from '../utils/logger.js';
import {
  AnonymousAccessFlags,
  BucketGrant,
  BucketLogging,
  BucketWebsite,
  CannedAcl,
  CorsRule,
  LifecycleRule,
  ObjectLock,
  StorageClass,
} from '../resources/storage-bucket.js';
import { ChallengeType } from '../resources/cm-certificate.js';
import { KmsAlgorithm } from '../resources/kms-symmetric-key.js';
import { BUCKET_PLACEHOLDER } from '../storage/bucket-policy.js';
import { RoutingRulesMode, findUnknownRoutingRuleKeys, serializeRoutingRules } from '../website/routing-rules.js';

const BUCKET_NAME_PATTERN = /^[a-z0-9][a-z0-9.-]{1,61}[a-z0-9]$/;
const BUCKET_PREFIX_PATTERN = /^[a-z0-9][a-z0-9.-]{0,36}$/;
const IPV4_PATTERN = /^\d{1,3}(\.\d{1,3}){3}$/;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}(T[\d:.]+(Z|[+-]\d{2}:\d{2}))?$/;

const transitionStorageClassSchema = z.enum(['STANDARD_IA', 'COLD', 'ICE']);
const positiveInt = z.number().int().positive();
const optionalTrimmed = z.string().trim().min(1).optional();

const grantSchema = z
  .object({
    id: optionalTrimmed,
    type: z.enum(['CanonicalUser', 'Group']),
    uri: optionalTrimmed,
    permissions: z.array(z.enum(['FULL_CONTROL', 'WRITE', 'WRITE_ACP', 'READ', 'READ_ACP'])).min(1),
  })
  .strict();

const corsRuleSchema = z
  .object({
    allowed_methods: z.array(z.enum(['GET', 'PUT', 'POST', 'DELETE', 'HEAD'])).min(1),
    allowed_origins: z.array(z.string().min(1)).min(1),
    allowed_headers: z.array(z.string().min(1)).optional(),
    expose_headers: z.array(z.string().min(1)).optional(),
    max_age_seconds: z.number().int().nonnegative().optional(),
  })
  .strict();

// Values may arrive as numbers from JSON (e.g. http_redirect_code: 301).
const routingRuleValueSchema = z.union([z.string(), z.number().transform(String)]).nullable().optional();
const routingRuleSchema = z.record(z.string(), z.record(z.string(), routingRuleValueSchema).nullable().optional());

const websiteSchema = z
  .object({
    index_document: optionalTrimmed,
    error_document: optionalTrimmed,
    redirect_all_requests_to: optionalTrimmed,
    routing_rules: z.array(routingRuleSchema).nullable().optional(),
  })
  .strict();

const objectLockSchema = z
  .object({
    enabled: z.boolean().default(true),
    default_retention: z
      .object({
        mode: z.enum(['GOVERNANCE', 'COMPLIANCE']),
        days: positiveInt.optional(),
        years: positiveInt.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

const lifecycleDateSchema = z.string().regex(DATE_PATTERN, 'must be an ISO 8601 date');

const lifecycleRuleSchema = z
  .object({
    id: optionalTrimmed,
    prefix: z.string().optional(),
    enabled: z.boolean().default(true),
    abort_incomplete_multipart_upload_days: positiveInt.optional(),
    expiration: z
      .object({
        days: positiveInt.optional(),
        date: lifecycleDateSchema.optional(),
        expired_object_delete_marker: z.boolean().optional(),
      })
      .strict()
      .optional(),
    transitions: z
      .array(
        z
          .object({
            days: z.number().int().nonnegative().optional(),
            date: lifecycleDateSchema.optional(),
            storage_class: transitionStorageClassSchema,
          })
          .strict(),
      )
      .optional(),
    noncurrent_version_expiration: z.object({ days: positiveInt }).strict().optional(),
    noncurrent_version_transitions: z
      .array(z.object({ days: z.number().int().nonnegative(), storage_class: transitionStorageClassSchema }).strict())
      .optional(),
  })
  .strict();

const policyStatementSchema = z
  .object({
    sid: optionalTrimmed,
    effect: z.enum(['Allow', 'Deny']),
    principal: z.union([
      z.literal('*'),
      z.object({ CanonicalUser: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]) }).strict(),
    ]),
    actions: z.array(z.string().min(1)).min(1),
    resources: z.array(z.string().min(1)).min(1).optional(),
    condition: z.record(z.string(), z.record(z.string(), z.union([z.string(), z.array(z.string())]))).optional(),
  })
  .strict();

const encryptionSchema = z
  .object({
    kms_master_key_id: optionalTrimmed,
    sse_algorithm: z.literal('aws:kms').default('aws:kms'),
    key: z
      .object({
        name: optionalTrimmed,
        default_algorithm: z.enum(['AES_128', 'AES_192', 'AES_256', 'AES_256_HSM']).optional(),
        rotation_period: z.string().regex(/^\d+h$/, 'must be a duration in hours, e.g. 8760h').optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export const bucketModuleInputSchema = z
  .object({
    bucket_name: optionalTrimmed,
    bucket_prefix: optionalTrimmed,
    folder_id: optionalTrimmed,
    max_size: positiveInt.optional(),
    default_storage_class: z.enum(['STANDARD', 'COLD', 'ICE']).optional(),
    force_destroy: z.boolean().default(false),
    tags: z.record(z.string(), z.string()).default({}),
    acl: z.enum(['private', 'public-read', 'public-read-write', 'authenticated-read']).optional(),
    grants: z.array(grantSchema).default([]),
    anonymous_access_flags: z
      .object({ read: z.boolean().optional(), list: z.boolean().optional(), config_read: z.boolean().optional() })
      .strict()
      .optional(),
    https: z
      .object({
        certificate_id: optionalTrimmed,
        domains: z.array(z.string().trim().min(1)).optional(),
        challenge_type: z.enum(['DNS_CNAME', 'DNS_TXT', 'HTTP']).default('DNS_CNAME'),
      })
      .strict()
      .optional(),
    policy: z
      .object({ version: z.string().default('2012-10-17'), statements: z.array(policyStatementSchema).min(1) })
      .strict()
      .optional(),
    cors_rules: z.array(corsRuleSchema).default([]),
    website: websiteSchema.nullable().optional(),
    routing_rules_mode: z.enum(['strict', 'tolerant']).default('strict'),
    versioning: z.object({ enabled: z.boolean() }).strict().optional(),
    object_lock: objectLockSchema.optional(),
    logging: z.object({ target_bucket: z.string().trim().min(1), target_prefix: z.string().optional() }).strict().optional(),
    lifecycle_rules: z.array(lifecycleRuleSchema).default([]),
    server_side_encryption: encryptionSchema.optional(),
    provider: z
      .object({
        cloud_id: optionalTrimmed,
        folder_id: optionalTrimmed,
        zone: optionalTrimmed,
        storage_endpoint: optionalTrimmed,
      })
      .strict()
      .default({}),
  })
  .strict();

/** The module input as authored (defaults not yet applied). */
export type BucketModuleInput = z.input<typeof bucketModuleInputSchema>;
/** The module input after schema parsing (defaults applied). */
export type ParsedBucketInput = z.output<typeof bucketModuleInputSchema>;
export type PolicyDocument = NonNullable<ParsedBucketInput['policy']>;
export type PolicyStatement = PolicyDocument['statements'][number];

export interface HttpsConfig {
  /** Existing Certificate Manager certificate; when absent one is issued for `domains` */
  readonly certificateId?: string;
  readonly domains: readonly string[];
  readonly challengeType: ChallengeType;
}

export interface EncryptionConfig {
  /** Existing KMS key; when absent a key is created */
  readonly kmsKeyId?: string;
  readonly keyName?: string;
  readonly defaultAlgorithm: KmsAlgorithm;
  readonly rotationPeriod: string;
}

export interface ProviderConfig {
  readonly cloudId?: string;
  readonly folderId?: string;
  readonly zone?: string;
  readonly storageEndpoint?: string;
}

/**
 * Validated and normalized bucket configuration.
 */
export interface BucketConfig {
  readonly bucketName?: string;
  readonly bucketPrefix?: string;
  readonly folderId?: string;
  readonly maxSize?: number;
  readonly defaultStorageClass?: StorageClass;
  readonly forceDestroy: boolean;
  readonly tags: Readonly<Record<string, string>>;
  readonly acl?: CannedAcl;
  readonly grants: readonly BucketGrant[];
  readonly anonymousAccessFlags?: AnonymousAccessFlags;
  readonly https?: HttpsConfig;
  readonly policy?: PolicyDocument;
  readonly corsRules: readonly CorsRule[];
  readonly website?: BucketWebsite;
  readonly versioningEnabled?: boolean;
  readonly objectLock?: ObjectLock;
  readonly logging?: BucketLogging;
  readonly lifecycleRules: readonly LifecycleRule[];
  readonly encryption?: EncryptionConfig;
  readonly provider: ProviderConfig;
}

/**
 * Normalize a raw name into a lowercase-with-dashes slug usable in bucket
 * names and stack ids.
 *
 * Examples:
 *   "Team Assets, Prod" -> "team-assets-prod"
 *   "  Docs.Site  "     -> "docssite"
 */
export function normalizeBucketName(raw: string): string {
  return raw
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9\s-]/g, '')
    .replace(/\s+/g, '-')
    .replace(/-{2,}/g, '-')
    .replace(/^-|-$/g, '');
}

function formatPath(path: readonly (string | number)[]): string {
  return path.reduce<string>((acc, part) => {
    if (typeof part === 'number') {
      return `${acc}[${part}]`;
    }
    return acc === '' ? part : `${acc}.${part}`;
  }, '');
}

/**
 * Schema-check a raw input document. Every zod issue is reported with its
 * path in a single {@link BucketConfigError}.
 */
export function parseBucketInput(raw: unknown): ParsedBucketInput {
  const result = bucketModuleInputSchema.safeParse(raw);
  if (!result.success) {
    throw new BucketConfigError(
      result.error.issues.map((issue) => {
        const path = formatPath(issue.path);
        return path === '' ? issue.message : `${path}: ${issue.message}`;
      }),
      result.error,
    );
  }
  return result.data;
}

/**
 * Cross-field rules the schema alone cannot express. Returns one message per
 * violated rule; an empty list means the input is consistent.
 */
export function checkPreconditions(input: ParsedBucketInput): string[] {
  const issues: string[] = [];

  if (input.bucket_name === undefined && input.bucket_prefix === undefined) {
    issues.push('bucket_name: one of bucket_name or bucket_prefix is required');
  }
  if (input.bucket_name !== undefined && input.bucket_prefix !== undefined) {
    issues.push('bucket_prefix: bucket_name and bucket_prefix are mutually exclusive');
  }
  if (input.bucket_name !== undefined) {
    const name = input.bucket_name;
    if (!BUCKET_NAME_PATTERN.test(name) || name.includes('..') || IPV4_PATTERN.test(name)) {
      issues.push(
        `bucket_name: "${name}" must be 3-63 lowercase letters, digits, dots or hyphens, start and end with a letter or digit, and not look like an IP address`,
      );
    }
  }
  if (input.bucket_prefix !== undefined && !BUCKET_PREFIX_PATTERN.test(input.bucket_prefix)) {
    issues.push(`bucket_prefix: "${input.bucket_prefix}" must be at most 37 lowercase letters, digits, dots or hyphens`);
  }

  if (input.acl !== undefined && input.grants.length > 0) {
    issues.push('grants: acl and grants are mutually exclusive');
  }
  input.grants.forEach((grant, index) => {
    if (grant.type === 'CanonicalUser' && grant.id === undefined) {
      issues.push(`grants[${index}].id: a CanonicalUser grant needs id`);
    }
    if (grant.type === 'Group' && grant.uri === undefined) {
      issues.push(`grants[${index}].uri: a Group grant needs uri`);
    }
  });

  const retention = input.object_lock?.default_retention;
  if (retention) {
    if ((retention.days === undefined) === (retention.years === undefined)) {
      issues.push('object_lock.default_retention: exactly one of days or years is required');
    }
    if (!input.object_lock?.enabled) {
      issues.push('object_lock.default_retention: requires object_lock.enabled = true');
    }
  }
  if (input.object_lock?.enabled && input.versioning?.enabled !== true) {
    issues.push('object_lock: object lock requires versioning.enabled = true');
  }

  const website = input.website;
  if (website) {
    if (website.redirect_all_requests_to !== undefined) {
      if (
        website.index_document !== undefined ||
        website.error_document !== undefined ||
        (website.routing_rules ?? []).length > 0
      ) {
        issues.push('website.redirect_all_requests_to: cannot be combined with index_document, error_document or routing_rules');
      }
    } else if (website.index_document === undefined) {
      issues.push('website.index_document: required unless redirect_all_requests_to is set');
    }
    if (input.routing_rules_mode === 'strict' && website.routing_rules) {
      for (const path of findUnknownRoutingRuleKeys(website.routing_rules)) {
        issues.push(`website.${path}: unknown routing rule key; set routing_rules_mode to "tolerant" to drop it`);
      }
    }
  }

  if (input.https && input.https.certificate_id === undefined && (input.https.domains ?? []).length === 0) {
    issues.push('https: either certificate_id or a non-empty domains list is required');
  }

  if (input.policy && input.bucket_name === undefined) {
    input.policy.statements.forEach((statement, index) => {
      if (statement.resources === undefined) {
        issues.push(`policy.statements[${index}].resources: required when the bucket is named by bucket_prefix`);
      } else if (statement.resources.some((resource) => resource.includes(BUCKET_PLACEHOLDER))) {
        issues.push(`policy.statements[${index}].resources: ${BUCKET_PLACEHOLDER} needs bucket_name`);
      }
    });
  }

  if (input.server_side_encryption?.kms_master_key_id !== undefined && input.server_side_encryption.key !== undefined) {
    issues.push('server_side_encryption.key: cannot be combined with kms_master_key_id');
  }

  input.lifecycle_rules.forEach((rule, index) => {
    const path = `lifecycle_rules[${index}]`;
    const hasAction =
      rule.abort_incomplete_multipart_upload_days !== undefined ||
      rule.expiration !== undefined ||
      (rule.transitions ?? []).length > 0 ||
      rule.noncurrent_version_expiration !== undefined ||
      (rule.noncurrent_version_transitions ?? []).length > 0;
    if (!hasAction) {
      issues.push(`${path}: at least one expiration, transition or abort action is required`);
    }
    if (rule.expiration) {
      const { days, date, expired_object_delete_marker: marker } = rule.expiration;
      const set = [days, date, marker].filter((value) => value !== undefined).length;
      if (set !== 1) {
        issues.push(`${path}.expiration: exactly one of days, date or expired_object_delete_marker is required`);
      }
    }
    (rule.transitions ?? []).forEach((transition, transitionIndex) => {
      if ((transition.days === undefined) === (transition.date === undefined)) {
        issues.push(`${path}.transitions[${transitionIndex}]: exactly one of days or date is required`);
      }
    });
  });

  return issues;
}

function toWebsite(input: ParsedBucketInput): BucketWebsite | undefined {
  const website = input.website;
  if (!website) {
    return undefined;
  }
  const mode: RoutingRulesMode = input.routing_rules_mode;
  if (mode === 'tolerant' && website.routing_rules) {
    for (const path of findUnknownRoutingRuleKeys(website.routing_rules)) {
      logWarn(`Dropping unknown routing rule key at website.${path}`, { phase: 'config' });
    }
  }
  return {
    indexDocument: website.index_document,
    errorDocument: website.error_document,
    redirectAllRequestsTo: website.redirect_all_requests_to,
    routingRules: serializeRoutingRules(website.routing_rules, { mode }),
  };
}

function toLifecycleRule(rule: ParsedBucketInput['lifecycle_rules'][number]): LifecycleRule {
  return {
    id: rule.id,
    prefix: rule.prefix,
    enabled: rule.enabled,
    abortIncompleteMultipartUploadDays: rule.abort_incomplete_multipart_upload_days,
    expiration: rule.expiration
      ? {
          days: rule.expiration.days,
          date: rule.expiration.date,
          expiredObjectDeleteMarker: rule.expiration.expired_object_delete_marker,
        }
      : undefined,
    transitions: rule.transitions?.map((transition) => ({
      days: transition.days,
      date: transition.date,
      storageClass: transition.storage_class,
    })),
    noncurrentVersionExpirationDays: rule.noncurrent_version_expiration?.days,
    noncurrentVersionTransitions: rule.noncurrent_version_transitions?.map((transition) => ({
      days: transition.days,
      storageClass: transition.storage_class,
    })),
  };
}

/**
 * Validate and normalize the bucket input.
 *
 * Throws {@link BucketConfigError} listing every schema or precondition
 * failure. Under the default strict mode an unknown routing rule key is one
 * of those preconditions. Nothing is synthesized until this passes.
 */
export function validateConfig(raw: unknown): BucketConfig {
  const input = parseBucketInput(raw);

  const issues = checkPreconditions(input);
  if (issues.length > 0) {
    throw new BucketConfigError(issues);
  }

  const flags = input.anonymous_access_flags;
  const sse = input.server_side_encryption;

  return {
    bucketName: input.bucket_name,
    bucketPrefix: input.bucket_prefix,
    folderId: input.folder_id,
    maxSize: input.max_size,
    defaultStorageClass: input.default_storage_class,
    forceDestroy: input.force_destroy,
    tags: input.tags,
    acl: input.acl,
    grants: input.grants,
    anonymousAccessFlags: flags ? { read: flags.read, list: flags.list, configRead: flags.config_read } : undefined,
    https: input.https
      ? {
          certificateId: input.https.certificate_id,
          domains: input.https.domains ?? [],
          challengeType: input.https.challenge_type,
        }
      : undefined,
    policy: input.policy,
    corsRules: input.cors_rules.map((rule) => ({
      allowedMethods: rule.allowed_methods,
      allowedOrigins: rule.allowed_origins,
      allowedHeaders: rule.allowed_headers,
      exposeHeaders: rule.expose_headers,
      maxAgeSeconds: rule.max_age_seconds,
    })),
    website: toWebsite(input),
    versioningEnabled: input.versioning?.enabled,
    objectLock:
      input.object_lock?.enabled === true
        ? {
            defaultRetention: input.object_lock.default_retention,
          }
        : undefined,
    logging: input.logging
      ? { targetBucket: input.logging.target_bucket, targetPrefix: input.logging.target_prefix }
      : undefined,
    lifecycleRules: input.lifecycle_rules.map(toLifecycleRule),
    encryption: sse
      ? {
          kmsKeyId: sse.kms_master_key_id,
          keyName: sse.key?.name,
          defaultAlgorithm: sse.key?.default_algorithm ?? 'AES_256',
          rotationPeriod: sse.key?.rotation_period ?? '8760h',
        }
      : undefined,
    provider: {
      cloudId: input.provider.cloud_id,
      folderId: input.provider.folder_id ?? input.folder_id,
      zone: input.provider.zone,
      storageEndpoint: input.provider.storage_endpoint,
    },
  };
}
