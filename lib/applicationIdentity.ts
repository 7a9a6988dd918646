//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import {
  AzureCliCredential,
  ClientAssertionCredential,
  ClientSecretCredential,
  ManagedIdentityCredential,
  type TokenCredential,
} from '@azure/identity';
import Debug from 'debug';

import type { IInsightsClient, SiteConfiguration } from '../interfaces/index.js';
import { CreateError, ErrorHelper, sha256 } from './transitional.js';

export type TokenWithDetails = {
  accessToken: string;
  expiresOn: Date;
  clientId: string;
};

const federatedAudienceUri = 'api://AzureADTokenExchange';

const debug = Debug('entra');
const ENTRA_ALLOW_AZURE_CLI_KEY = 'ENTRA_ALLOW_AZURE_CLI';

export interface IEntraApplicationTokens {
  clientId: string;
  tenantId: string;
  getClientDescription(): string;
  getTenantDisplayName(): string;
  getAccessToken(resource: string): Promise<string>;
}

enum EntraIdentityType {
  Unknown = 'unknown',
  ManagedIdentityClientAssertion = 'managedIdentityClientAssertion',
  ClientSecret = 'clientSecret',
  AzureCli = 'azureCli',
}

export function getScopeWithDefaultAppended(scope: string): string {
  if (scope.endsWith('.default')) {
    return scope;
  }
  return scope.endsWith('/') ? scope + '.default' : scope + '/.default';
}

export class EntraApplication implements IEntraApplicationTokens {
  private credential: TokenCredential;
  private _clientId: string;
  private _tenantId: string;
  private _description: string;
  private _type: EntraIdentityType = EntraIdentityType.Unknown;
  private _cachedTokenByScope: Map<string, TokenWithDetails> = new Map<string, TokenWithDetails>();

  constructor(
    private config: SiteConfiguration,
    description: string,
    private insights?: IInsightsClient
  ) {
    this._description = '[' + description + ']';
    const { clientId, tenantId, type, credential } = this.setup();
    this._clientId = clientId;
    this._tenantId = tenantId;
    this._type = type;
    this.credential = credential;
  }

  get tenantId() {
    return this._tenantId;
  }

  get isDeveloperCli() {
    return this._type === EntraIdentityType.AzureCli;
  }

  get clientId() {
    return this._clientId;
  }

  getClientDescription() {
    return this._description;
  }

  getTenantDisplayName() {
    return this.tenantId;
  }

  private validateAzureCliAvailable() {
    const enabled = !!this.config.process.get(ENTRA_ALLOW_AZURE_CLI_KEY);
    if (!enabled) {
      throw CreateError.InvalidParameters(
        'Azure CLI is not enabled for this environment. To use Azure CLI for identity, set the process environment variable ' +
          ENTRA_ALLOW_AZURE_CLI_KEY +
          ' to "1".'
      );
    }
  }

  private setup(): { clientId: string; tenantId: string; type: EntraIdentityType; credential: TokenCredential } {
    const { clientId, clientSecret, tenantId, managedIdentityClientId, useDeveloperCli } =
      this.config.activeDirectory.application;
    if (!tenantId) {
      throw CreateError.ParameterRequired('tenantId');
    }
    const authorityHost = 'https://login.microsoftonline.com/' + tenantId;
    debug(`${this._description} tenant=${tenantId} and authorityHost=${authorityHost}`);
    if (useDeveloperCli) {
      this.validateAzureCliAvailable();
      debug(`${this._description} using Azure CLI for identity`);
      return {
        clientId: clientId || 'azure-cli',
        tenantId,
        type: EntraIdentityType.AzureCli,
        credential: new AzureCliCredential({ tenantId }),
      };
    }
    if (!clientId) {
      throw CreateError.ParameterRequired('clientId');
    }
    if (managedIdentityClientId && !clientSecret) {
      const managedIdentityCredential = new ManagedIdentityCredential({
        clientId: managedIdentityClientId,
        authorityHost,
      });
      const tryGetToken = async () => {
        try {
          debug(
            `${this._description} obtaining managed identity access token for federated audience=${federatedAudienceUri}`
          );
          const accessToken = await managedIdentityCredential.getToken(federatedAudienceUri);
          debug(
            `${this._description} managed identity access token acquired, expires=${accessToken.expiresOnTimestamp}`
          );
          return accessToken.token;
        } catch (error) {
          console.error(`${this._description} failed to obtain managed identity access token:`, error);
          throw error;
        }
      };
      debug(`${this._description} client assertion identity (${clientId}) for token acquisition`);
      return {
        clientId,
        tenantId,
        type: EntraIdentityType.ManagedIdentityClientAssertion,
        credential: new ClientAssertionCredential(tenantId, clientId, tryGetToken),
      };
    }
    if (!clientSecret) {
      throw CreateError.ParameterRequired(
        `clientSecret to instantiate ClientSecretCredential for ${this._description}`
      );
    }
    debug(`${this._description} secret for acquisition: ${redact(clientSecret)} (redacted)`);
    return {
      clientId,
      tenantId,
      type: EntraIdentityType.ClientSecret,
      credential: new ClientSecretCredential(tenantId, clientId, clientSecret, {
        authorityHost,
      }),
    };
  }

  async getAccessToken(resource: string): Promise<string> {
    const token = await this.getDetailedAccessToken(resource);
    return token.accessToken;
  }

  clearTokenCache() {
    if (this._cachedTokenByScope.size) {
      debug(`${this._description} dropping ${this._cachedTokenByScope.size} cached token(s)`);
    }
    this._cachedTokenByScope.clear();
  }

  async getDetailedAccessToken(resource: string): Promise<TokenWithDetails> {
    try {
      const scope = getScopeWithDefaultAppended(resource);
      const cachedToken = this._cachedTokenByScope.get(scope);
      if (cachedToken) {
        const inTwoMinutes = new Date(Date.now() + 2 * 60 * 1000);
        if (cachedToken.expiresOn > inTwoMinutes) {
          return cachedToken;
        }
        debug(
          `${this._description} not using cached access token for ${resource} expiring ${cachedToken.expiresOn.toISOString()}`
        );
        this._cachedTokenByScope.delete(scope);
      }
      const response = await this.credential.getToken(scope);
      if (!response) {
        throw CreateError.NotAuthenticated(`${this._description} no token returned for ${resource}`);
      }
      const expiresOn = new Date(response.expiresOnTimestamp);
      const shortTokenSha = sha256(response.token).substring(0, 8) + '*';
      debug(
        `${this._description} new token for ${resource} ${shortTokenSha} expires=${expiresOn.toISOString().slice(0, 16)} ${this.isDeveloperCli ? 'via/cli' : 'w/clientId=' + this.clientId}, tenant=${this.getTenantDisplayName()}`
      );
      const token = {
        accessToken: response.token,
        expiresOn,
        clientId: this.clientId,
      };
      this._cachedTokenByScope.set(scope, token);
      return token;
    } catch (error) {
      const message = ErrorHelper.GetMessage(error);
      if (message.includes('The managed identity endpoint is not available.')) {
        this.insights?.trackEvent({
          name: 'ManagedIdentityEndpointNotAvailable',
          properties: {
            resource,
            clientId: this.clientId,
            tenantId: this.tenantId,
          },
        });
      }
      throw error;
    }
  }
}

function redact(value: string) {
  return value.length > 10 ? value.substring(0, 3) + '*'.repeat(6) + '+' : '*'.repeat(value.length);
}
