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

export interface BucketModuleErrorOptions {
  readonly message: string;
  /** Suggested next step, appended to the display message */
  readonly remediation?: string;
  /** Construct path or config path that locates the failure */
  readonly resourceId?: string;
  readonly causeError?: Error;
}

/**
 * Base error for everything the module reports before synthesis completes.
 * Nothing here is ever raised by Terraform itself; these are all
 * validation-time failures.
 */
export class BucketModuleError extends Error {
  readonly remediation?: string;
  readonly resourceId?: string;

  constructor(options: BucketModuleErrorOptions) {
    super(BucketModuleError.formatDisplayMessage(options), options.causeError ? { cause: options.causeError } : undefined);
    this.name = 'BucketModuleError';
    this.remediation = options.remediation;
    this.resourceId = options.resourceId;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  private static formatDisplayMessage(options: BucketModuleErrorOptions): string {
    const parts: string[] = [options.message];
    if (options.resourceId) {
      parts.push(`Resource: ${options.resourceId}`);
    }
    if (options.remediation) {
      parts.push(`Remediation: ${options.remediation}`);
    }
    return parts.join('. ');
  }
}

/**
 * One or more problems in the bucket input document. Every issue carries the
 * dotted path of the offending field, e.g. `object_lock.default_retention`.
 */
export class BucketConfigError extends BucketModuleError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[], causeError?: Error) {
    super({
      message: `Invalid bucket configuration:\n  - ${issues.join('\n  - ')}`,
      causeError,
    });
    this.name = 'BucketConfigError';
    this.issues = issues;
  }
}

/**
 * A routing rule used a key with no entry in the routing rule key dictionary.
 */
export class UnknownRoutingRuleKeyError extends BucketModuleError {
  readonly key: string;
  readonly path: string;

  constructor(key: string, path: string) {
    super({
      message: `Unknown routing rule key "${key}"`,
      resourceId: path,
      remediation:
        'Use one of condition, redirect, key_prefix_equals, http_error_code_returned_equals, protocol, host_name, replace_key_prefix_with, replace_key_with, http_redirect_code, or set routing_rules_mode to "tolerant"',
    });
    this.name = 'UnknownRoutingRuleKeyError';
    this.key = key;
    this.path = path;
  }
}
