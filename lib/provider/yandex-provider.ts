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
import { TerraformProvider } from 'cdktf';
import { compact } from '../utils/compact.js';

export const YANDEX_PROVIDER_SOURCE = 'yandex-cloud/yandex';
export const YANDEX_PROVIDER_VERSION = '>= 0.100.0';

export interface YandexProviderProps {
  readonly cloudId?: string;
  readonly folderId?: string;
  readonly zone?: string;
  /** Override for the Object Storage API endpoint (default storage.yandexcloud.net) */
  readonly storageEndpoint?: string;
  readonly version?: string;
}

/**
 * The `yandex` provider block.
 *
 * Credentials are never set here. The provider picks them up from its own
 * environment variables (YC_TOKEN, YC_SERVICE_ACCOUNT_KEY_FILE,
 * YC_STORAGE_ACCESS_KEY / YC_STORAGE_SECRET_KEY) at plan time.
 */
export class YandexProvider extends TerraformProvider {
  public static readonly tfResourceType = 'yandex';

  private readonly providerProps: YandexProviderProps;

  constructor(scope: Construct, id: string, props: YandexProviderProps = {}) {
    super(scope, id, {
      terraformResourceType: YandexProvider.tfResourceType,
      terraformGeneratorMetadata: {
        providerName: 'yandex',
        providerVersionConstraint: props.version ?? YANDEX_PROVIDER_VERSION,
      },
      terraformProviderSource: YANDEX_PROVIDER_SOURCE,
    });
    this.providerProps = props;
  }

  protected synthesizeAttributes(): Record<string, unknown> {
    return compact({
      cloud_id: this.providerProps.cloudId,
      folder_id: this.providerProps.folderId,
      zone: this.providerProps.zone,
      storage_endpoint: this.providerProps.storageEndpoint,
    });
  }
}
