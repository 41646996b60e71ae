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
import { HttpsConfig } from '../config/bucket-config.js';
import { CmCertificate } from '../resources/cm-certificate.js';
import { YandexProvider } from '../provider/yandex-provider.js';

export interface CertificateConfig {
  readonly https: HttpsConfig;
  /** Resource name stem, e.g. the normalized bucket name */
  readonly name: string;
  readonly folderId?: string;
  readonly labels: Readonly<Record<string, string>>;
  readonly provider: YandexProvider;
}

export interface CertificateResult {
  /** Certificate Manager id to bind to the bucket's HTTPS endpoint */
  readonly certificateId: string;
  /** Present only when the certificate is issued by this stack */
  readonly certificate?: CmCertificate;
}

/**
 * Binds an existing Certificate Manager certificate or issues a managed
 * Let's Encrypt one for the bucket's custom domains.
 *
 * A managed certificate stays in the Validating state until the challenge
 * records (see the `certificate_challenges` output) are added to the
 * domain's DNS zone.
 */
export class CertificateBuilder {
  static create(scope: Construct, config: CertificateConfig): CertificateResult {
    if (config.https.certificateId) {
      return { certificateId: config.https.certificateId };
    }

    const certificate = new CmCertificate(scope, 'certificate', {
      name: `${config.name}-https`,
      description: `HTTPS certificate for ${config.https.domains.join(', ')}`,
      domains: config.https.domains,
      challengeType: config.https.challengeType,
      folderId: config.folderId,
      labels: config.labels,
      provider: config.provider,
    });

    new TerraformOutput(scope, 'CertificateId', {
      value: certificate.certificateId,
      description: 'Certificate Manager id bound to the bucket HTTPS endpoint',
    }).overrideLogicalId('certificate_id');

    new TerraformOutput(scope, 'CertificateChallenges', {
      value: certificate.challenges,
      description: 'Add these records to your DNS zone before the certificate will be issued',
    }).overrideLogicalId('certificate_challenges');

    return { certificateId: certificate.certificateId, certificate };
  }
}
