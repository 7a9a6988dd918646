//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import axios, { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { describe, expect, it } from 'vitest';

import { GraphEntityType, GroupMembershipChange, ManagedDeviceOperatingSystem } from './enums.js';
import { MicrosoftGraphProvider } from './microsoftGraphProvider.js';
import { ErrorHelper, StatusCodeError } from '../transitional.js';

import type { IEntraApplicationTokens } from '../applicationIdentity.js';

type StubRequest = {
  method: string;
  url: URL;
  authorization: string;
  data: unknown;
};

type StubReply = {
  status: number;
  data: unknown;
};

const testTokens: IEntraApplicationTokens = {
  clientId: 'test-client',
  tenantId: 'test-tenant',
  getClientDescription: () => '[test]',
  getTenantDisplayName: () => 'test-tenant',
  getAccessToken: async () => 'test-token',
};

function createStubbedProvider(route: (request: StubRequest) => StubReply, maximumPages?: number) {
  const requests: StubRequest[] = [];
  const httpClient = axios.create({
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      const request: StubRequest = {
        method: (config.method || 'get').toLowerCase(),
        url: new URL(config.url || ''),
        authorization: String(config.headers.get('Authorization')),
        data: typeof config.data === 'string' ? JSON.parse(config.data) : config.data,
      };
      requests.push(request);
      const reply = route(request);
      const response: AxiosResponse = {
        data: reply.data,
        status: reply.status,
        statusText: String(reply.status),
        headers: {},
        config,
      };
      if (reply.status >= 400) {
        const code = reply.status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST;
        throw new AxiosError(`Request failed with status code ${reply.status}`, code, config, null, response);
      }
      return response;
    },
  });
  const provider = new MicrosoftGraphProvider({
    entraApplicationTokens: testTokens,
    httpClient,
    retries: 0,
    maximumPages,
  });
  return { provider, requests };
}

async function captureRejection(promise: Promise<unknown>) {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('MicrosoftGraphProvider', () => {
  it('reads group members across pages and drops unsupported types', async () => {
    const { provider, requests } = createStubbedProvider((request) => {
      if (request.url.searchParams.get('$skiptoken') === 'page2') {
        return {
          status: 200,
          data: { value: [{ '@odata.type': '#microsoft.graph.device', id: 'd1', displayName: 'Laptop1' }] },
        };
      }
      return {
        status: 200,
        data: {
          value: [
            { '@odata.type': '#microsoft.graph.user', id: 'u1', displayName: 'Una User' },
            { '@odata.type': '#microsoft.graph.group', id: 'g2', displayName: 'Nested' },
            { '@odata.type': '#microsoft.graph.orgContact', id: 'c1', displayName: 'Vendor Contact' },
          ],
          '@odata.nextLink': 'https://graph.microsoft.com/v1.0/groups/g1/members?$skiptoken=page2',
        },
      };
    });
    const unsupported: string[] = [];
    const members = await provider.getGroupMembers('g1', {
      onUnsupportedMember: (member) => unsupported.push(`${member.id} ${member.odataType}`),
    });
    expect(unsupported).toEqual(['c1 #microsoft.graph.orgContact']);
    expect(members).toEqual([
      { id: 'u1', displayName: 'Una User', kind: GraphEntityType.User },
      { id: 'g2', displayName: 'Nested', kind: GraphEntityType.Group },
      { id: 'd1', displayName: 'Laptop1', kind: GraphEntityType.Device },
    ]);
    expect(requests).toHaveLength(2);
    expect(requests[0].url.pathname).toBe('/v1.0/groups/g1/members');
    expect(requests[0].url.searchParams.get('$select')).toBe('id,displayName');
    expect(requests[0].authorization).toBe('Bearer test-token');
  });

  it('stops paging at the configured maximum', async () => {
    const { provider, requests } = createStubbedProvider(() => ({
      status: 200,
      data: {
        value: [{ '@odata.type': '#microsoft.graph.user', id: 'u1', displayName: 'Una User' }],
        '@odata.nextLink': 'https://graph.microsoft.com/v1.0/groups/g1/members?$skiptoken=again',
      },
    }), 1);
    const members = await provider.getGroupMembers('g1');
    expect(members).toHaveLength(1);
    expect(requests).toHaveLength(1);
  });

  it('escapes quotes when looking up a group by name', async () => {
    const { provider, requests } = createStubbedProvider(() => ({ status: 200, data: { value: [] } }));
    const group = await provider.getGroupByName("O'Brien Team");
    expect(group).toBeNull();
    expect(requests[0].url.searchParams.get('$filter')).toBe("displayName eq 'O''Brien Team'");
  });

  it('queries managed devices by platform and exact version', async () => {
    const { provider, requests } = createStubbedProvider(() => ({
      status: 200,
      data: {
        value: [
          {
            id: 'md1',
            deviceName: 'iPhone12',
            operatingSystem: 'iOS',
            osVersion: '17.5.1',
            userId: 'u1',
            azureADDeviceId: 'aad-1',
            userPrincipalName: 'una.user@contoso.example',
          },
          { id: 'md2', deviceName: 'Pixel', operatingSystem: 'Android', osVersion: '14', userId: null },
        ],
      },
    }));
    const devices = await provider.listManagedDevices({
      operatingSystem: ManagedDeviceOperatingSystem.iOS,
      osVersion: { operator: 'eq', version: '17.5.1' },
    });
    expect(requests[0].url.pathname).toBe('/v1.0/deviceManagement/managedDevices');
    expect(requests[0].url.searchParams.get('$filter')).toBe("operatingSystem eq 'iOS' and osVersion eq '17.5.1'");
    expect(devices).toEqual([
      {
        id: 'md1',
        deviceName: 'iPhone12',
        operatingSystem: ManagedDeviceOperatingSystem.iOS,
        osVersion: '17.5.1',
        ownerUserId: 'u1',
        azureADDeviceId: 'aad-1',
        userPrincipalName: 'una.user@contoso.example',
      },
      {
        id: 'md2',
        deviceName: 'Pixel',
        operatingSystem: ManagedDeviceOperatingSystem.Other,
        osVersion: '14',
        ownerUserId: null,
        azureADDeviceId: null,
        userPrincipalName: null,
      },
    ]);
  });

  it('combines user ids into one filter', async () => {
    const { provider, requests } = createStubbedProvider(() => ({
      status: 200,
      data: { value: [{ id: 'a', displayName: 'User A', userPrincipalName: 'a@contoso.example', mail: null }] },
    }));
    const users = await provider.getUsersByIds(['a', 'b']);
    expect(requests[0].url.searchParams.get('$filter')).toBe("id eq 'a' or id eq 'b'");
    expect(users).toEqual([
      { id: 'a', displayName: 'User A', userPrincipalName: 'a@contoso.example', mail: null, userType: undefined },
    ]);
  });

  it('adds a member by directory object reference', async () => {
    const { provider, requests } = createStubbedProvider(() => ({ status: 204, data: '' }));
    const change = await provider.addGroupMember('g1', 'u1');
    expect(change).toBe(GroupMembershipChange.Added);
    expect(requests[0].method).toBe('post');
    expect(requests[0].url.pathname).toBe('/v1.0/groups/g1/members/$ref');
    expect(requests[0].data).toEqual({ '@odata.id': 'https://graph.microsoft.com/v1.0/directoryObjects/u1' });
  });

  it('reports an existing member from the already exist reply', async () => {
    const { provider } = createStubbedProvider(() => ({
      status: 400,
      data: {
        error: {
          code: 'Request_BadRequest',
          message:
            "One or more added object references already exist for the following modified properties: 'members'.",
        },
      },
    }));
    expect(await provider.addGroupMember('g1', 'u1')).toBe(GroupMembershipChange.AlreadyMember);
  });

  it('maps a missing member on removal to a not found error with the url', async () => {
    const { provider, requests } = createStubbedProvider(() => ({
      status: 404,
      data: { error: { code: 'Request_ResourceNotFound', message: 'Resource does not exist.' } },
    }));
    const error = await captureRejection(provider.removeGroupMember('g1', 'u1'));
    expect(ErrorHelper.IsNotFound(error)).toBe(true);
    expect(ErrorHelper.GetMessage(error)).toBe('Resource does not exist.');
    expect(requests[0].method).toBe('delete');
    expect(error).toBeInstanceOf(StatusCodeError);
    expect(error).toMatchObject({ url: 'https://graph.microsoft.com/v1.0/groups/g1/members/u1/$ref' });
  });

  it('returns null for a group id that does not exist', async () => {
    const { provider } = createStubbedProvider(() => ({ status: 404, data: {} }));
    expect(await provider.getGroup('missing')).toBeNull();
  });

  it('maps a forbidden reply to a not authorized error', async () => {
    const { provider } = createStubbedProvider(() => ({
      status: 403,
      data: { error: { code: 'Authorization_RequestDenied', message: 'Insufficient privileges.' } },
    }));
    const error = await captureRejection(provider.getUsersByIds(['a']));
    expect(ErrorHelper.IsNotAuthorized(error)).toBe(true);
  });
});
