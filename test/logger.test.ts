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


import { formatLogLine, logDebug, logError, logInfo } from '../lib/utils/logger.js';
import { BucketConfigError, BucketModuleError, UnknownRoutingRuleKeyError } from '../lib/utils/errors.js';

describe('formatLogLine', () => {
  test('includes the phase and context', () => {
    expect(formatLogLine('info', 'Synthesized', { phase: 'synth', context: { outdir: 'cdktf.out' } })).toBe(
      '[INFO] [synth] Synthesized {"outdir":"cdktf.out"}',
    );
  });

  test('leaves out an empty context and a missing phase', () => {
    expect(formatLogLine('warn', 'No folder id', { context: {} })).toBe('[WARN] No folder id');
  });
});

describe('log routing', () => {
  afterEach(() => {
    jest.restoreAllMocks();
    delete process.env.BUCKET_MODULE_DEBUG;
  });

  test('info goes to stdout and error to stderr', () => {
    const out = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const err = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    logInfo('ready');
    logError('failed', { phase: 'synth' });
    expect(out).toHaveBeenCalledWith('[INFO] ready');
    expect(err).toHaveBeenCalledWith('[ERROR] [synth] failed');
  });

  test('debug prints only when BUCKET_MODULE_DEBUG is set', () => {
    const out = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    logDebug('hidden');
    expect(out).not.toHaveBeenCalled();
    process.env.BUCKET_MODULE_DEBUG = '1';
    logDebug('shown');
    expect(out).toHaveBeenCalledWith('[DEBUG] shown');
  });
});

describe('errors', () => {
  test('BucketModuleError appends resource and remediation', () => {
    const error = new BucketModuleError({ message: 'Bad input', resourceId: 'website', remediation: 'Fix it' });
    expect(error.message).toBe('Bad input. Resource: website. Remediation: Fix it');
    expect(error.name).toBe('BucketModuleError');
  });

  test('BucketConfigError lists every issue', () => {
    const error = new BucketConfigError(['a: first', 'b: second']);
    expect(error).toBeInstanceOf(BucketModuleError);
    expect(error.message).toBe('Invalid bucket configuration:\n  - a: first\n  - b: second');
    expect(error.issues).toEqual(['a: first', 'b: second']);
  });

  test('UnknownRoutingRuleKeyError locates the key', () => {
    const error = new UnknownRoutingRuleKeyError('unknown_key', 'routing_rules[0].condition.unknown_key');
    expect(error).toBeInstanceOf(BucketModuleError);
    expect(error.message.startsWith('Unknown routing rule key "unknown_key". Resource: routing_rules[0].condition.unknown_key. Remediation: ')).toBe(true);
  });
});
