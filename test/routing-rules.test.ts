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

import {
  ROUTING_RULE_KEYS,
  RawRoutingRule,
  RoutingRule,
  findUnknownRoutingRuleKeys,
  mapRoutingRules,
  serializeRoutingRules,
  unmapRoutingRules,
} from '../lib/website/routing-rules.js';
import { UnknownRoutingRuleKeyError } from '../lib/utils/errors.js';

describe('serializeRoutingRules', () => {
  test('absent input yields absent output', () => {
    expect(serializeRoutingRules(undefined)).toBeUndefined();
    expect(serializeRoutingRules(null)).toBeUndefined();
    expect(serializeRoutingRules(undefined, { mode: 'tolerant' })).toBeUndefined();
  });

  test('renames keys at both levels', () => {
    const rules: RoutingRule[] = [
      { condition: { key_prefix_equals: 'docs/' }, redirect: { replace_key_prefix_with: 'documents/' } },
    ];
    expect(serializeRoutingRules(rules)).toBe(
      '[{"Condition":{"KeyPrefixEquals":"docs/"},"Redirect":{"ReplaceKeyPrefixWith":"documents/"}}]',
    );
  });

  test('maps every redirect attribute', () => {
    const rules: RoutingRule[] = [
      {
        condition: { http_error_code_returned_equals: '404' },
        redirect: {
          protocol: 'https',
          host_name: 'www.example.com',
          replace_key_with: 'missing.html',
          http_redirect_code: '301',
        },
      },
    ];
    expect(serializeRoutingRules(rules)).toBe(
      '[{"Condition":{"HttpErrorCodeReturnedEquals":"404"},' +
        '"Redirect":{"Protocol":"https","HostName":"www.example.com","ReplaceKeyWith":"missing.html","HttpRedirectCode":"301"}}]',
    );
  });

  test('an empty list serializes to an empty JSON array', () => {
    expect(serializeRoutingRules([])).toBe('[]');
  });
});

describe('mapRoutingRules', () => {
  test('omits null nested values', () => {
    const rules: RoutingRule[] = [
      { condition: { key_prefix_equals: 'a/', http_error_code_returned_equals: null }, redirect: { replace_key_with: 'b' } },
    ];
    expect(mapRoutingRules(rules)).toEqual([
      { Condition: { KeyPrefixEquals: 'a/' }, Redirect: { ReplaceKeyWith: 'b' } },
    ]);
  });

  test('omits a nested mapping left empty after null removal', () => {
    const rules: RoutingRule[] = [{ condition: { key_prefix_equals: null }, redirect: { replace_key_with: 'b' } }];
    expect(mapRoutingRules(rules)).toEqual([{ Redirect: { ReplaceKeyWith: 'b' } }]);
  });

  test('omits a top-level key whose value is null', () => {
    const rules: RoutingRule[] = [{ condition: null, redirect: { host_name: 'example.com' } }];
    expect(mapRoutingRules(rules)).toEqual([{ Redirect: { HostName: 'example.com' } }]);
  });

  test('keeps the order and count of rules', () => {
    const rules: RoutingRule[] = [
      { redirect: { replace_key_with: 'first' } },
      { redirect: { replace_key_with: 'second' } },
    ];
    expect(mapRoutingRules(rules)).toEqual([
      { Redirect: { ReplaceKeyWith: 'first' } },
      { Redirect: { ReplaceKeyWith: 'second' } },
    ]);
  });

  test('does not mutate its input', () => {
    const rules: RoutingRule[] = [{ condition: { key_prefix_equals: 'a/' }, redirect: null }];
    const before = JSON.stringify(rules);
    mapRoutingRules(rules);
    expect(JSON.stringify(rules)).toBe(before);
  });

  test('strict mode throws UnknownRoutingRuleKeyError naming the key and its path', () => {
    const rules: RawRoutingRule[] = [{ condition: { unknown_key: 'x' }, redirect: { replace_key_with: 'y' } }];

    expect(() => mapRoutingRules(rules)).toThrow(UnknownRoutingRuleKeyError);
    try {
      mapRoutingRules(rules, { mode: 'strict' });
      throw new Error('expected mapRoutingRules to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(UnknownRoutingRuleKeyError);
      if (error instanceof UnknownRoutingRuleKeyError) {
        expect(error.key).toBe('unknown_key');
        expect(error.path).toBe('routing_rules[0].condition.unknown_key');
      }
    }
  });

  test('strict mode rejects an unknown top-level key', () => {
    const rules: RawRoutingRule[] = [{ redirect: { replace_key_with: 'y' }, conditions: { key_prefix_equals: 'a/' } }];
    expect(() => mapRoutingRules(rules)).toThrow('Unknown routing rule key "conditions"');
  });

  test('tolerant mode drops unknown keys and the mapping they leave empty', () => {
    const rules: RawRoutingRule[] = [{ condition: { unknown_key: 'x' }, redirect: { replace_key_with: 'y' } }];
    expect(serializeRoutingRules(rules, { mode: 'tolerant' })).toBe('[{"Redirect":{"ReplaceKeyWith":"y"}}]');
  });

  test('tolerant mode drops an unknown top-level key with its whole mapping', () => {
    const rules: RawRoutingRule[] = [{ conditions: { key_prefix_equals: 'a/' }, redirect: { replace_key_with: 'y' } }];
    expect(mapRoutingRules(rules, { mode: 'tolerant' })).toEqual([{ Redirect: { ReplaceKeyWith: 'y' } }]);
  });

  test('every dictionary key maps to its PascalCase form', () => {
    expect(Object.keys(ROUTING_RULE_KEYS)).toHaveLength(9);
    expect(ROUTING_RULE_KEYS.http_error_code_returned_equals).toBe('HttpErrorCodeReturnedEquals');
    expect(ROUTING_RULE_KEYS.replace_key_prefix_with).toBe('ReplaceKeyPrefixWith');
  });
});

describe('unmapRoutingRules', () => {
  test('inverts mapRoutingRules for rules without nulls', () => {
    const rules: RoutingRule[] = [
      { condition: { key_prefix_equals: 'docs/' }, redirect: { replace_key_prefix_with: 'documents/' } },
      { condition: { http_error_code_returned_equals: '404' }, redirect: { host_name: 'example.com', protocol: 'https' } },
    ];
    const mapped = mapRoutingRules(rules) ?? [];
    expect(unmapRoutingRules(mapped)).toEqual(rules);
  });

  test('throws on a key outside the dictionary', () => {
    expect(() => unmapRoutingRules([{ Condition: { KeySuffixEquals: '.html' } }])).toThrow(UnknownRoutingRuleKeyError);
  });
});

describe('findUnknownRoutingRuleKeys', () => {
  test('lists the path of every unknown key', () => {
    const rules: RawRoutingRule[] = [
      { condition: { unknown_key: 'x', key_prefix_equals: 'a/' } },
      { redirect: { replace_key_with: 'y' }, extra: null },
    ];
    expect(findUnknownRoutingRuleKeys(rules)).toEqual([
      'routing_rules[0].condition.unknown_key',
      'routing_rules[1].extra',
    ]);
  });
});
