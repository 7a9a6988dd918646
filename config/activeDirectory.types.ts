//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

export type ConfigRootActiveDirectory = {
  activeDirectory: ConfigActiveDirectory;
};

export type ConfigActiveDirectory = {
  application: {
    tenantId?: string;
    clientId?: string;
    clientSecret?: string;
    managedIdentityClientId?: string;
    useDeveloperCli: boolean;
  };
};
