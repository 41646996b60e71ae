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
import { TerraformProvider, TerraformResource } from 'cdktf';
import { compact } from '../utils/compact.js';

export type KmsAlgorithm = 'AES_128' | 'AES_192' | 'AES_256' | 'AES_256_HSM';

export interface KmsSymmetricKeyProps {
  readonly name?: string;
  readonly description?: string;
  readonly folderId?: string;
  readonly defaultAlgorithm?: KmsAlgorithm;
  /** Duration in hours, e.g. `8760h` */
  readonly rotationPeriod?: string;
  readonly deletionProtection?: boolean;
  readonly labels?: Readonly<Record<string, string>>;
  readonly provider?: TerraformProvider;
}

/** A Key Management Service symmetric key (`yandex_kms_symmetric_key`). */
export class KmsSymmetricKey extends TerraformResource {
  public static readonly tfResourceType = 'yandex_kms_symmetric_key';

  private readonly keyProps: KmsSymmetricKeyProps;

  constructor(scope: Construct, id: string, props: KmsSymmetricKeyProps) {
    super(scope, id, {
      terraformResourceType: KmsSymmetricKey.tfResourceType,
      terraformGeneratorMetadata: { providerName: 'yandex' },
      provider: props.provider,
    });
    this.keyProps = props;
  }

  public get keyId(): string {
    return this.getStringAttribute('id');
  }

  protected synthesizeAttributes(): Record<string, unknown> {
    return compact({
      name: this.keyProps.name,
      description: this.keyProps.description,
      folder_id: this.keyProps.folderId,
      default_algorithm: this.keyProps.defaultAlgorithm,
      rotation_period: this.keyProps.rotationPeriod,
      deletion_protection: this.keyProps.deletionProtection,
      labels: this.keyProps.labels,
    });
  }
}
