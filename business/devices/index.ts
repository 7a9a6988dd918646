//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

export * from './types.js';
export * from './versionComparator.js';
export * from './deviceFilter.js';
export * from './runContext.js';
export * from './groupExpander.js';
export * from './resolver.js';
export * from './batchIdentityLookup.js';
export * from './desiredMembers.js';
export * from './groupSynchronizer.js';
