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

import { UnknownRoutingRuleKeyError } from '../utils/errors.js';

/**
 * snake_case attribute names accepted in the module input, mapped to the
 * PascalCase names of the website hosting configuration upload format.
 * The table is flat: a key is looked up the same way at either level.
 */
export const ROUTING_RULE_KEYS = {
  condition: 'Condition',
  redirect: 'Redirect',
  key_prefix_equals: 'KeyPrefixEquals',
  http_error_code_returned_equals: 'HttpErrorCodeReturnedEquals',
  protocol: 'Protocol',
  host_name: 'HostName',
  replace_key_prefix_with: 'ReplaceKeyPrefixWith',
  replace_key_with: 'ReplaceKeyWith',
  http_redirect_code: 'HttpRedirectCode',
} as const satisfies Record<string, string>;

export type RoutingRuleKey = keyof typeof ROUTING_RULE_KEYS;
export type MappedRoutingRuleKey = (typeof ROUTING_RULE_KEYS)[RoutingRuleKey];

/** Match criteria of a routing rule. */
export type RoutingRuleCondition = {
  readonly key_prefix_equals?: string | null;
  readonly http_error_code_returned_equals?: string | null;
};

/** Redirect action of a routing rule. */
export type RoutingRuleRedirect = {
  readonly protocol?: string | null;
  readonly host_name?: string | null;
  readonly replace_key_prefix_with?: string | null;
  readonly replace_key_with?: string | null;
  readonly http_redirect_code?: string | null;
};

export type RoutingRule = {
  readonly condition?: RoutingRuleCondition | null;
  readonly redirect?: RoutingRuleRedirect | null;
};

/**
 * What a routing rule looks like once it has left the type system, e.g. read
 * from a JSON input file. Keys outside {@link ROUTING_RULE_KEYS} may appear.
 */
export type RawRoutingRule = {
  readonly [key: string]: { readonly [key: string]: string | null | undefined } | null | undefined;
};

export type MappedRoutingRule = Record<string, Record<string, string>>;

/**
 * - strict: an unknown key throws {@link UnknownRoutingRuleKeyError}
 * - tolerant: an unknown key is dropped, along with any mapping it leaves empty
 */
export type RoutingRulesMode = 'strict' | 'tolerant';

export interface RoutingRulesOptions {
  readonly mode?: RoutingRulesMode;
}

const INVERSE_ROUTING_RULE_KEYS: ReadonlyMap<string, string> = new Map(
  Object.entries(ROUTING_RULE_KEYS).map(([key, mapped]): [string, string] => [mapped, key]),
);

export function isRoutingRuleKey(key: string): key is RoutingRuleKey {
  return Object.prototype.hasOwnProperty.call(ROUTING_RULE_KEYS, key);
}

function lookupKey(key: string, path: string, mode: RoutingRulesMode): string | undefined {
  if (isRoutingRuleKey(key)) {
    return ROUTING_RULE_KEYS[key];
  }
  if (mode === 'strict') {
    throw new UnknownRoutingRuleKeyError(key, path);
  }
  return undefined;
}

function mapNested(
  values: { readonly [key: string]: string | null | undefined },
  path: string,
  mode: RoutingRulesMode,
): Record<string, string> {
  const mapped: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    const mappedKey = lookupKey(key, `${path}.${key}`, mode);
    if (mappedKey === undefined || value === null || value === undefined) {
      continue;
    }
    mapped[mappedKey] = value;
  }
  return mapped;
}

/**
 * Rename every key of every rule, at both levels, through
 * {@link ROUTING_RULE_KEYS}. Null values are omitted, as is any nested
 * mapping left empty. Returns undefined for absent input.
 *
 * The input is never mutated; a new list is returned.
 */
export function mapRoutingRules(
  rules: readonly RawRoutingRule[] | null | undefined,
  options: RoutingRulesOptions = {},
): MappedRoutingRule[] | undefined {
  if (rules === null || rules === undefined) {
    return undefined;
  }
  const mode = options.mode ?? 'strict';

  return rules.map((rule, index) => {
    const mapped: MappedRoutingRule = {};
    for (const [key, value] of Object.entries(rule)) {
      const path = `routing_rules[${index}].${key}`;
      const mappedKey = lookupKey(key, path, mode);
      if (value === null || value === undefined) {
        continue;
      }
      const nested = mapNested(value, path, mode);
      if (mappedKey === undefined || Object.keys(nested).length === 0) {
        continue;
      }
      mapped[mappedKey] = nested;
    }
    return mapped;
  });
}

/**
 * Paths (e.g. `routing_rules[0].condition.unknown_key`) of every key that
 * tolerant mode would drop.
 */
export function findUnknownRoutingRuleKeys(rules: readonly RawRoutingRule[]): string[] {
  const unknown: string[] = [];
  rules.forEach((rule, index) => {
    for (const [key, value] of Object.entries(rule)) {
      const path = `routing_rules[${index}].${key}`;
      if (!isRoutingRuleKey(key)) {
        unknown.push(path);
      }
      for (const nestedKey of Object.keys(value ?? {})) {
        if (!isRoutingRuleKey(nestedKey)) {
          unknown.push(`${path}.${nestedKey}`);
        }
      }
    }
  });
  return unknown;
}

/**
 * Serialized form of {@link mapRoutingRules}, as the `routing_rules`
 * attribute of the bucket's website block expects it.
 *
 * Example:
 *   [{ condition: { key_prefix_equals: 'docs/' }, redirect: { replace_key_prefix_with: 'documents/' } }]
 *   -> '[{"Condition":{"KeyPrefixEquals":"docs/"},"Redirect":{"ReplaceKeyPrefixWith":"documents/"}}]'
 */
export function serializeRoutingRules(
  rules: readonly RawRoutingRule[] | null | undefined,
  options: RoutingRulesOptions = {},
): string | undefined {
  const mapped = mapRoutingRules(rules, options);
  return mapped === undefined ? undefined : JSON.stringify(mapped);
}

/**
 * Inverse of {@link mapRoutingRules} for rules that contain no nulls. Used to
 * read rules back out of a synthesized website block. Unknown PascalCase keys
 * always throw.
 */
export function unmapRoutingRules(rules: readonly MappedRoutingRule[]): RawRoutingRule[] {
  const reverse = (key: string, path: string): string => {
    const original = INVERSE_ROUTING_RULE_KEYS.get(key);
    if (original === undefined) {
      throw new UnknownRoutingRuleKeyError(key, path);
    }
    return original;
  };

  return rules.map((rule, index) => {
    const unmapped: Record<string, Record<string, string>> = {};
    for (const [key, nested] of Object.entries(rule)) {
      const path = `routing_rules[${index}].${key}`;
      const values: Record<string, string> = {};
      for (const [nestedKey, value] of Object.entries(nested)) {
        values[reverse(nestedKey, `${path}.${nestedKey}`)] = value;
      }
      unmapped[reverse(key, path)] = values;
    }
    return unmapped;
  });
}
