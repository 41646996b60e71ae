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
import { IResolvable, TerraformProvider, TerraformResource } from 'cdktf';
import { compact } from '../utils/compact.js';

export type ChallengeType = 'DNS_CNAME' | 'DNS_TXT' | 'HTTP';

export interface CmCertificateProps {
  readonly name: string;
  readonly domains: readonly string[];
  readonly challengeType: ChallengeType;
  readonly folderId?: string;
  readonly description?: string;
  readonly labels?: Readonly<Record<string, string>>;
  readonly provider?: TerraformProvider;
}

/**
 * A Let's Encrypt certificate issued and renewed by Certificate Manager
 * (`yandex_cm_certificate` with a `managed` block).
 */
export class CmCertificate extends TerraformResource {
  public static readonly tfResourceType = 'yandex_cm_certificate';

  private readonly certificateProps: CmCertificateProps;

  constructor(scope: Construct, id: string, props: CmCertificateProps) {
    super(scope, id, {
      terraformResourceType: CmCertificate.tfResourceType,
      terraformGeneratorMetadata: { providerName: 'yandex' },
      provider: props.provider,
    });
    this.certificateProps = props;
  }

  public get certificateId(): string {
    return this.getStringAttribute('id');
  }

  /** DNS or HTTP challenges that must be satisfied before the certificate is issued */
  public get challenges(): IResolvable {
    return this.interpolationForAttribute('challenges');
  }

  protected synthesizeAttributes(): Record<string, unknown> {
    return compact({
      name: this.certificateProps.name,
      description: this.certificateProps.description,
      folder_id: this.certificateProps.folderId,
      domains: this.certificateProps.domains,
      labels: this.certificateProps.labels,
      managed: { challenge_type: this.certificateProps.challengeType },
    });
  }
}
