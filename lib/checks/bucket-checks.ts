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

import { IConstruct } from 'constructs';
import { Annotations, IAspect } from 'cdktf';
import { StorageBucket, StorageBucketProps } from '../resources/storage-bucket.js';
import { BucketModuleError } from '../utils/errors.js';
import { logWarn } from '../utils/logger.js';

export interface BucketCheckSuppression {
  readonly id: string;
  readonly reason: string;
}

export interface BucketCheckFinding {
  readonly ruleId: string;
  readonly resourcePath: string;
  readonly message: string;
}

export interface BucketCheckRule {
  readonly id: string;
  readonly message: string;
  readonly violated: (props: StorageBucketProps) => boolean;
}

const MIN_REASON_LENGTH = 10;

export const BUCKET_CHECK_RULES: readonly BucketCheckRule[] = [
  {
    id: 'YC-S1',
    message: 'The bucket has no access logging configured.',
    violated: (props) => props.logging === undefined,
  },
  {
    id: 'YC-S2',
    message: 'The bucket has no default server-side encryption.',
    violated: (props) => props.serverSideEncryption === undefined,
  },
  {
    id: 'YC-S3',
    message: 'The bucket allows anonymous read or list access.',
    violated: (props) => props.anonymousAccessFlags?.read === true || props.anonymousAccessFlags?.list === true,
  },
  {
    id: 'YC-S4',
    message: 'The bucket uses a public canned ACL.',
    violated: (props) => props.acl === 'public-read' || props.acl === 'public-read-write',
  },
  {
    id: 'YC-S5',
    message: 'The bucket does not have versioning enabled.',
    violated: (props) => props.versioningEnabled !== true,
  },
];

const suppressionsByConstruct = new WeakMap<IConstruct, BucketCheckSuppression[]>();

export class BucketCheckSuppressions {
  /**
   * Silence rules for one resource. Every suppression must carry a reason of
   * at least 10 characters.
   */
  static addResourceSuppressions(construct: IConstruct, suppressions: readonly BucketCheckSuppression[]): void {
    for (const suppression of suppressions) {
      if (suppression.reason.trim().length < MIN_REASON_LENGTH) {
        throw new BucketModuleError({
          message: `Suppression of ${suppression.id} needs a reason of at least ${MIN_REASON_LENGTH} characters`,
          resourceId: construct.node.path,
        });
      }
    }
    const existing = suppressionsByConstruct.get(construct) ?? [];
    suppressionsByConstruct.set(construct, [...existing, ...suppressions]);
  }

  static suppressionsOf(construct: IConstruct): readonly BucketCheckSuppression[] {
    return suppressionsByConstruct.get(construct) ?? [];
  }
}

/**
 * Aspect that reports insecure bucket settings as construct warnings.
 *
 * Findings are kept on the instance so callers (and tests) can inspect them
 * after synthesis. A construct is reported at most once per rule even when
 * the aspect runs more than once.
 */
export class BucketChecks implements IAspect {
  private readonly recorded = new Map<string, BucketCheckFinding>();

  constructor(private readonly options: { readonly verbose?: boolean } = {}) {}

  get findings(): readonly BucketCheckFinding[] {
    return [...this.recorded.values()];
  }

  visit(node: IConstruct): void {
    if (!(node instanceof StorageBucket)) {
      return;
    }

    const suppressed = new Set(BucketCheckSuppressions.suppressionsOf(node).map((suppression) => suppression.id));

    for (const rule of BUCKET_CHECK_RULES) {
      if (suppressed.has(rule.id) || !rule.violated(node.bucketProps)) {
        continue;
      }
      const key = `${rule.id}:${node.node.path}`;
      if (this.recorded.has(key)) {
        continue;
      }

      const finding: BucketCheckFinding = { ruleId: rule.id, resourcePath: node.node.path, message: rule.message };
      this.recorded.set(key, finding);
      Annotations.of(node).addWarning(`${rule.id}: ${rule.message}`);
      if (this.options.verbose) {
        logWarn(`${rule.id}: ${rule.message}`, { phase: 'checks', context: { resource: node.node.path } });
      }
    }
  }
}
