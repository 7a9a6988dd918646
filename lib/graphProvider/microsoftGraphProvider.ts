//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import axios, { isAxiosError, type AxiosInstance } from 'axios';
import axiosRetry from 'axios-retry';
import Debug from 'debug';
import querystring from 'querystring';

import {
  GraphEntityType,
  GraphUserType,
  GroupMembershipChange,
  ManagedDeviceOperatingSystem,
} from './enums.js';
import type {
  GroupMembersOptions,
  IDirectoryPrincipal,
  IGraphDevice,
  IGraphEntry,
  IGraphGroup,
  IGraphManagedDevice,
  IGraphProvider,
  ManagedDeviceQuery,
} from './types.js';
import { CreateError, ErrorHelper, type StatusCodeError } from '../transitional.js';
import type { IEntraApplicationTokens } from '../applicationIdentity.js';

const debug = Debug('graph');

const axios12BufferDecompressionBugHeaderAddition = true;
const MICROSOFT_GRAPH_RESOURCE_URI = 'https://graph.microsoft.com';
const DEFAULT_RETRIES = 3;

export const graphBaseUrl = 'https://graph.microsoft.com/v1.0/';
const odataNextLink = '@odata.nextLink';

export type MicrosoftGraphProviderOptions = {
  entraApplicationTokens: IEntraApplicationTokens;
  httpClient?: AxiosInstance;
  retries?: number;
  maximumPages?: number;
};

type GraphCollectionResponse<T> = {
  value?: T[];
  '@odata.nextLink'?: string;
};

type GraphRawDirectoryObject = {
  '@odata.type'?: string;
  id: string;
  displayName?: string | null;
};

type GraphRawUser = {
  id: string;
  displayName?: string | null;
  mail?: string | null;
  userPrincipalName?: string | null;
  userType?: string | null;
};

type GraphRawDevice = {
  id: string;
  deviceId?: string | null;
  displayName?: string | null;
};

type GraphRawManagedDevice = {
  id: string;
  deviceName?: string | null;
  operatingSystem?: string | null;
  osVersion?: string | null;
  userId?: string | null;
  azureADDeviceId?: string | null;
  userPrincipalName?: string | null;
};

type GraphErrorDetail = {
  code?: string;
  message?: string;
};

type MicrosoftGraphCallOptions = {
  selectValues?: string;
  filterValues?: string;
  orderBy?: string;
  consistencyLevel?: 'eventual';
};

type HttpMethod = 'get' | 'post' | 'delete';

const userSelectValues = 'id,displayName,mail,userPrincipalName,userType';
const groupSelectValues = 'id,displayName,mailNickname,description';
const managedDeviceSelectValues =
  'id,deviceName,operatingSystem,osVersion,userId,azureADDeviceId,userPrincipalName';

export function microsoftGraphUserTypeFromString(type: string | null | undefined): GraphUserType | undefined {
  if (!type) {
    return;
  }
  switch (type) {
    case GraphUserType.Guest:
      return GraphUserType.Guest;
    case GraphUserType.Member:
      return GraphUserType.Member;
    default:
      return GraphUserType.Unknown;
  }
}

export function microsoftGraphODataTypeFromString(type: string | null | undefined): GraphEntityType | undefined {
  if (!type) {
    return;
  }
  switch (type) {
    case '#microsoft.graph.user':
      return GraphEntityType.User;
    case '#microsoft.graph.device':
      return GraphEntityType.Device;
    case '#microsoft.graph.group':
      return GraphEntityType.Group;
    default:
      return;
  }
}

export function managedDeviceOperatingSystemFromString(
  operatingSystem: string | null | undefined
): ManagedDeviceOperatingSystem {
  switch ((operatingSystem || '').trim().toLowerCase()) {
    case 'ios':
      return ManagedDeviceOperatingSystem.iOS;
    case 'ipados':
      return ManagedDeviceOperatingSystem.iPadOS;
    case 'windows':
      return ManagedDeviceOperatingSystem.Windows;
    default:
      return ManagedDeviceOperatingSystem.Other;
  }
}

export function escapeODataString(value: string) {
  return value.replace(/'/g, "''");
}

function getGraphErrorDetail(data: unknown): GraphErrorDetail | undefined {
  if (!data || typeof data !== 'object' || !('error' in data)) {
    return;
  }
  const error = data.error;
  if (!error || typeof error !== 'object') {
    return;
  }
  return {
    code: 'code' in error && typeof error.code === 'string' ? error.code : undefined,
    message: 'message' in error && typeof error.message === 'string' ? error.message : undefined,
  };
}

export class MicrosoftGraphProvider implements IGraphProvider {
  private _entraApplicationTokens: IEntraApplicationTokens;
  private _client: AxiosInstance;
  private _maximumPages: number | undefined;

  clientId: string;

  constructor(graphOptions: MicrosoftGraphProviderOptions) {
    const { entraApplicationTokens } = graphOptions;
    this.clientId = entraApplicationTokens.clientId;
    this._entraApplicationTokens = entraApplicationTokens;
    this._maximumPages = graphOptions.maximumPages;
    this._client = graphOptions.httpClient || axios.create();
    // Under heavy load, make sure to retry timeouts and throttling.
    axiosRetry(this._client, {
      retries: graphOptions.retries ?? DEFAULT_RETRIES,
      retryDelay: axiosRetry.exponentialDelay,
      retryCondition: (error) => {
        return (
          error?.code === 'ETIMEDOUT' ||
          error?.response?.status === 429 ||
          axiosRetry.isNetworkOrIdempotentRequestError(error)
        );
      },
      shouldResetTimeout: true,
    });
  }

  async getGroupByName(displayName: string): Promise<IGraphGroup | null> {
    // prettier-ignore
    const response = await this.lookupCollectionInGraph<IGraphGroup>([
      'groups',
    ], {
      filterValues: `displayName eq '${escapeODataString(displayName)}'`,
      selectValues: groupSelectValues,
    });
    if (response.length === 0) {
      return null;
    }
    if (response.length > 1) {
      console.warn(
        `WARN: ${response.length} groups are named "${displayName}"; using the first, ${response[0].id}`
      );
    }
    return response[0];
  }

  async getGroup(groupId: string): Promise<IGraphGroup | null> {
    try {
      // prettier-ignore
      return await this.lookupEntityInGraph<IGraphGroup>([
        'groups',
        groupId,
      ], {
        selectValues: groupSelectValues,
      });
    } catch (error) {
      if (ErrorHelper.IsNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  async getGroupMembers(groupId: string, options?: GroupMembersOptions): Promise<IDirectoryPrincipal[]> {
    // prettier-ignore
    const response = await this.lookupCollectionInGraph<GraphRawDirectoryObject>([
      'groups',
      groupId,
      'members',
    ], {
      selectValues: 'id,displayName',
    });
    const members: IDirectoryPrincipal[] = [];
    for (const entry of response) {
      const kind = microsoftGraphODataTypeFromString(entry['@odata.type']);
      if (!kind) {
        debug(`group ${groupId}: skipping member ${entry.id} of unsupported type ${entry['@odata.type']}`);
        options?.onUnsupportedMember?.({
          id: entry.id,
          displayName: entry.displayName || entry.id,
          odataType: entry['@odata.type'] || 'unknown',
        });
        continue;
      }
      members.push({
        id: entry.id,
        displayName: entry.displayName || entry.id,
        kind,
      });
    }
    return members;
  }

  async listManagedDevices(query?: ManagedDeviceQuery): Promise<IGraphManagedDevice[]> {
    const clauses: string[] = [];
    if (query?.operatingSystem && query.operatingSystem !== ManagedDeviceOperatingSystem.Other) {
      clauses.push(`operatingSystem eq '${escapeODataString(query.operatingSystem)}'`);
    }
    if (query?.osVersion) {
      clauses.push(`osVersion ${query.osVersion.operator} '${escapeODataString(query.osVersion.version)}'`);
    }
    // prettier-ignore
    const response = await this.lookupCollectionInGraph<GraphRawManagedDevice>([
      'deviceManagement',
      'managedDevices',
    ], {
      filterValues: clauses.length ? clauses.join(' and ') : undefined,
      selectValues: managedDeviceSelectValues,
    });
    return response.map(toManagedDevice);
  }

  async getManagedDeviceByName(deviceName: string): Promise<IGraphManagedDevice | null> {
    // prettier-ignore
    const response = await this.lookupCollectionInGraph<GraphRawManagedDevice>([
      'deviceManagement',
      'managedDevices',
    ], {
      filterValues: `deviceName eq '${escapeODataString(deviceName)}'`,
      selectValues: managedDeviceSelectValues,
    });
    if (response.length > 1) {
      console.warn(`WARN: ${response.length} managed devices are named "${deviceName}"; using the first`);
    }
    return response.length ? toManagedDevice(response[0]) : null;
  }

  async getUsersByIds(userIds: string[]): Promise<IGraphEntry[]> {
    if (!userIds || userIds.length === 0) {
      return [];
    }
    const response = await this.lookupCollectionInGraph<GraphRawUser>(['users'], {
      filterValues: userIds.map((id) => `id eq '${escapeODataString(id.trim())}'`).join(' or '),
      selectValues: userSelectValues,
    });
    return response.map((entry) => {
      return {
        id: entry.id,
        displayName: entry.displayName || '',
        userPrincipalName: entry.userPrincipalName || '',
        mail: entry.mail || null,
        userType: microsoftGraphUserTypeFromString(entry.userType),
      };
    });
  }

  async getDirectoryDevicesByDeviceIds(deviceIds: string[]): Promise<IGraphDevice[]> {
    if (!deviceIds || deviceIds.length === 0) {
      return [];
    }
    const response = await this.lookupCollectionInGraph<GraphRawDevice>(['devices'], {
      filterValues: deviceIds.map((id) => `deviceId eq '${escapeODataString(id.trim())}'`).join(' or '),
      selectValues: 'id,deviceId,displayName',
    });
    return response.map((entry) => {
      return {
        id: entry.id,
        deviceId: entry.deviceId || '',
        displayName: entry.displayName || '',
      };
    });
  }

  async addGroupMember(groupId: string, principalId: string): Promise<GroupMembershipChange> {
    const url = this.createUrl(['groups', groupId, 'members', '$ref']);
    const body = {
      '@odata.id': `${graphBaseUrl}directoryObjects/${encodeURIComponent(principalId)}`,
    };
    try {
      await this.request<unknown>(url, 'post', body);
    } catch (error) {
      if (ErrorHelper.IsAlreadyMember(error)) {
        return GroupMembershipChange.AlreadyMember;
      }
      throw error;
    }
    return GroupMembershipChange.Added;
  }

  async removeGroupMember(groupId: string, principalId: string): Promise<void> {
    const url = this.createUrl(['groups', groupId, 'members', principalId, '$ref']);
    await this.request<unknown>(url, 'delete');
  }

  private createUrl(entityPath: string[], options?: MicrosoftGraphCallOptions) {
    const subUrl = entityPath
      .map((item) => (item.startsWith('$') ? item : encodeURIComponent(item)))
      .join('/');
    const queries: Record<string, string> = {};
    if (options?.filterValues) {
      queries['$filter'] = options.filterValues;
    }
    if (options?.selectValues) {
      queries['$select'] = options.selectValues;
    }
    if (options?.orderBy) {
      queries['$orderby'] = options.orderBy;
    }
    const query = querystring.stringify(queries);
    return query ? `${graphBaseUrl}${subUrl}?${query}` : `${graphBaseUrl}${subUrl}`;
  }

  private async lookupEntityInGraph<T>(entityPath: string[], options: MicrosoftGraphCallOptions): Promise<T> {
    const url = this.createUrl(entityPath, options);
    const body = await this.request<T>(url, 'get', undefined, options.consistencyLevel);
    if (!body) {
      throw CreateError.NotFound(`No entity returned for ${entityPath.join('/')}`);
    }
    return body;
  }

  private async lookupCollectionInGraph<T>(entityPath: string[], options: MicrosoftGraphCallOptions): Promise<T[]> {
    let url: string | null = this.createUrl(entityPath, options);
    const originalUrl = url;
    let value: T[] = [];
    let pages = 0;
    const maximumPages = this._maximumPages;
    do {
      const body: GraphCollectionResponse<T> = await this.request<GraphCollectionResponse<T>>(
        url,
        'get',
        undefined,
        options.consistencyLevel
      );
      if (body?.value && !Array.isArray(body.value)) {
        throw new Error(`Page ${pages} in response is not an array type: ${url}`);
      }
      value = value.concat(body?.value || []);
      ++pages;
      url = body?.[odataNextLink] || null;
    } while (url && (maximumPages ? pages < maximumPages : true));
    if (url && maximumPages && pages >= maximumPages) {
      console.warn(`WARN: Maximum pages exceeded for this resource: ${originalUrl}`);
    }
    debug(`${pages} page(s), ${value.length} entries: ${originalUrl}`);
    return value;
  }

  private async request<T>(url: string, method: HttpMethod, body?: unknown, eventualConsistency?: string): Promise<T> {
    const token = await this.getToken();
    try {
      const headers: Record<string, string> = {
        Authorization: `Bearer ${token}`,
      };
      if (axios12BufferDecompressionBugHeaderAddition) {
        headers['Accept-Encoding'] = 'identity';
      }
      if (eventualConsistency) {
        headers['ConsistencyLevel'] = eventualConsistency;
      }
      const response = await this._client.request<T>({
        url,
        method,
        data: method === 'post' ? body : undefined,
        headers,
      });
      // post and delete reply 204 No Content
      if (!response.data && method === 'get') {
        throw CreateError.ServerError('Empty response');
      }
      const graphError = getGraphErrorDetail(response.data);
      if (graphError?.message) {
        throw CreateError.InvalidParameters(graphError.message);
      }
      return response.data;
    } catch (error) {
      if (isAxiosError(error) && error.response) {
        const status = error.response.status;
        const graphError = getGraphErrorDetail(error.response.data);
        let err: StatusCodeError;
        if (status === 404) {
          err = CreateError.NotFound(graphError?.message || 'Not found', error);
        } else if (status >= 500) {
          err = CreateError.ServerError(graphError?.message || 'Graph server error', error);
        } else if (status === 401) {
          err = CreateError.NotAuthenticated(graphError?.message || 'Invalid authorization to access the graph', error);
        } else if (status === 403) {
          err = CreateError.NotAuthorized(graphError?.message || 'Not authorized to access the graph', error);
        } else if (graphError?.code === 'Request_UnsupportedQuery') {
          console.warn(`Graph query unsupported: ${graphError.message} (client ${this.clientId})`);
          err = CreateError.Wrap(graphError.message || 'Unsupported query', error);
        } else {
          err = CreateError.InvalidParameters(graphError?.message || 'Incorrect graph parameters', error);
        }
        err.url = url;
        throw err;
      }
      throw error;
    }
  }

  async getToken() {
    const clientId = this._entraApplicationTokens.clientId;
    try {
      return await this._entraApplicationTokens.getAccessToken(MICROSOFT_GRAPH_RESOURCE_URI);
    } catch (error) {
      if (isAxiosError(error) && error.response) {
        console.log(`graph token request error ${error} (client ${clientId})`);
        if (error.response.status === 401) {
          throw CreateError.NotAuthenticated('Invalid authorization to access to the graph', error);
        } else if (error.response.status === 403) {
          throw CreateError.NotAuthorized('Not authorized to access the graph', error);
        }
      }
      throw CreateError.NotAuthenticated(
        `Could not acquire a graph token for ${this._entraApplicationTokens.getClientDescription()}: ${ErrorHelper.GetMessage(error)}`,
        error
      );
    }
  }
}

function toManagedDevice(entry: GraphRawManagedDevice): IGraphManagedDevice {
  return {
    id: entry.id,
    deviceName: entry.deviceName || '',
    operatingSystem: managedDeviceOperatingSystemFromString(entry.operatingSystem),
    osVersion: entry.osVersion || '',
    ownerUserId: entry.userId || null,
    azureADDeviceId: entry.azureADDeviceId || null,
    userPrincipalName: entry.userPrincipalName || null,
  };
}
