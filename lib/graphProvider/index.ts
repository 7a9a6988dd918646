//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import { CreateError } from '../transitional.js';
import { MicrosoftGraphProvider, type MicrosoftGraphProviderOptions } from './microsoftGraphProvider.js';

import type { SiteConfiguration } from '../../interfaces/index.js';
import type { IEntraApplicationTokens } from '../applicationIdentity.js';
import type { IGraphProvider } from './types.js';

export * from './types.js';
export * from './enums.js';

export function createGraphProviderInstance(
  config: SiteConfiguration,
  entraApplicationTokens: IEntraApplicationTokens
): IGraphProvider {
  const graphConfig = config.graph;
  if (!graphConfig) {
    throw CreateError.InvalidParameters('No graph provider configuration.');
  }
  const provider = graphConfig.provider;
  if (!provider) {
    throw CreateError.InvalidParameters('No graph provider set in the graph config.');
  }
  switch (provider) {
    case 'microsoftGraphProvider': {
      const options: MicrosoftGraphProviderOptions = {
        entraApplicationTokens,
        retries: graphConfig.retries,
        maximumPages: graphConfig.maximumPages,
      };
      return new MicrosoftGraphProvider(options);
    }
    default:
      throw CreateError.InvalidParameters(
        `The graph provider "${provider}" is not implemented or configured at this time.`
      );
  }
}
