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

import { PolicyDocument, PolicyStatement } from '../config/bucket-config.js';
import { compact } from '../utils/compact.js';

/** Replaced by the bucket name inside statement resources. */
export const BUCKET_PLACEHOLDER = '{bucket}';

export function bucketResourceArns(bucketName: string): string[] {
  return [`arn:aws:s3:::${bucketName}`, `arn:aws:s3:::${bucketName}/*`];
}

function renderStatement(statement: PolicyStatement, bucketName: string | undefined): Record<string, unknown> {
  const resources =
    statement.resources?.map((resource) =>
      bucketName === undefined ? resource : resource.split(BUCKET_PLACEHOLDER).join(bucketName),
    ) ?? (bucketName === undefined ? [] : bucketResourceArns(bucketName));

  return compact({
    Sid: statement.sid,
    Effect: statement.effect,
    Principal: statement.principal,
    Action: statement.actions,
    Resource: resources,
    Condition: statement.condition,
  });
}

/**
 * Render a policy document as the JSON string the bucket's `policy`
 * argument takes.
 *
 * A statement without `resources` applies to the bucket and every object in
 * it. `{bucket}` in an explicit resource is replaced by `bucketName`.
 */
export function renderBucketPolicy(policy: PolicyDocument, bucketName: string | undefined): string {
  return JSON.stringify({
    Version: policy.version,
    Statement: policy.statements.map((statement) => renderStatement(statement, bucketName)),
  });
}
