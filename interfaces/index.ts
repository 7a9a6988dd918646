//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

export * from './app.js';
export * from './providers.js';
export * from './config.js';
