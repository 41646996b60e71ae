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

import { renderBucketPolicy } from '../lib/storage/bucket-policy.js';

describe('renderBucketPolicy', () => {
  test('a statement without resources covers the bucket and its objects', () => {
    const policy = renderBucketPolicy(
      { version: '2012-10-17', statements: [{ effect: 'Allow', principal: '*', actions: ['s3:GetObject'] }] },
      'site-bucket',
    );
    expect(policy).toBe(
      '{"Version":"2012-10-17","Statement":[{"Effect":"Allow","Principal":"*","Action":["s3:GetObject"],' +
        '"Resource":["arn:aws:s3:::site-bucket","arn:aws:s3:::site-bucket/*"]}]}',
    );
  });

  test('replaces {bucket} in explicit resources and keeps sid and condition', () => {
    const policy = renderBucketPolicy(
      {
        version: '2012-10-17',
        statements: [
          {
            sid: 'DenyInsecure',
            effect: 'Deny',
            principal: { CanonicalUser: 'test-user' },
            actions: ['s3:*'],
            resources: ['arn:aws:s3:::{bucket}/private/*'],
            condition: { Bool: { 'aws:SecureTransport': 'false' } },
          },
        ],
      },
      'site-bucket',
    );
    expect(JSON.parse(policy)).toEqual({
      Version: '2012-10-17',
      Statement: [
        {
          Sid: 'DenyInsecure',
          Effect: 'Deny',
          Principal: { CanonicalUser: 'test-user' },
          Action: ['s3:*'],
          Resource: ['arn:aws:s3:::site-bucket/private/*'],
          Condition: { Bool: { 'aws:SecureTransport': 'false' } },
        },
      ],
    });
  });

  test('explicit resources pass through unchanged without a bucket name', () => {
    const policy = renderBucketPolicy(
      {
        version: '2012-10-17',
        statements: [{ effect: 'Allow', principal: '*', actions: ['s3:ListBucket'], resources: ['arn:aws:s3:::shared'] }],
      },
      undefined,
    );
    expect(JSON.parse(policy).Statement[0].Resource).toEqual(['arn:aws:s3:::shared']);
  });
});
